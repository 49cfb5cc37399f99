/**
 * Document discovery - core types
 */

/**
 * File pattern matching strategy
 */
export type FilePattern =
  | {
      /** Flat structure - files directly in directory (e.g., skills/*.md) */
      type: 'flat';
      /** File extension including dot (e.g., '.md') */
      extension: string;
    }
  | {
      /** Nested structure - one file per subdirectory (e.g., skills/<id>/SKILL.md) */
      type: 'nested';
      /** Exact filename to match (e.g., 'SKILL.md') */
      filename: string;
    };

/**
 * Where a discovered resource was loaded from
 */
export interface ResourceSource {
  /** Absolute path to the resource file */
  path: string;
}

export interface DiscoverableResource {
  /** Unique resource name */
  id: string;

  source: ResourceSource;
}

/**
 * Parses one discovered file into a resource.
 *
 * Implementations throw on invalid input; discovery does not skip bad files.
 */
export interface ResourceParser<T extends DiscoverableResource> {
  parse(filePath: string): Promise<T>;

  isValidName(name: string): boolean;
}
