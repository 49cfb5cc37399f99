/**
 * Skill Registry - immutable snapshot of the skill documents in one directory
 */

import * as path from 'path';
import type { FilePattern } from '../base/discovery/types.js';
import type { RegistryLoadOptions, SkillCategory, SkillLayout, SkillRecord } from './types.js';
import { SKILL_CATEGORIES } from './types.js';
import { scanDirectory } from '../base/discovery/file-scanner.js';
import { isDirectory, pathExists } from '../base/utils/path-utils.js';
import { NotFoundError, ParseError } from '../base/errors.js';
import { logger } from '../base/utils/logger.js';
import { isDebugEnabled } from '../base/utils/debug.js';
import { SkillParser } from './parser.js';
import { normalizePhrase } from './tokenizer.js';

/** Skill document name in the nested layout */
export const SKILL_FILENAME = 'SKILL.md';

/** Always skipped; a directory README is documentation, not a skill */
export const DEFAULT_IGNORE: readonly string[] = ['README.md', '*/README.md'];

const FLAT: FilePattern = { type: 'flat', extension: '.md' };
const NESTED: FilePattern = { type: 'nested', filename: SKILL_FILENAME };

export function layoutPatterns(layout: SkillLayout): FilePattern[] {
  switch (layout) {
    case 'flat':
      return [FLAT];
    case 'nested':
      return [NESTED];
    case 'auto':
      return [FLAT, NESTED];
  }
}

/**
 * Read-only collection of SkillRecords keyed by id
 *
 * Built once and never mutated; a refresh builds a new registry.
 */
export class SkillRegistry {
  private readonly records: ReadonlyMap<string, SkillRecord>;
  private readonly sortedIds: readonly string[];

  /**
   * @throws ParseError when two records share an id, or ids equal after normalization
   */
  constructor(
    records: Iterable<SkillRecord>,
    readonly sourcePath: string = '',
    readonly loadedAt: Date = new Date()
  ) {
    const map = new Map<string, SkillRecord>();
    // keyed by normalized id
    const byPhrase = new Map<string, SkillRecord>();
    for (const record of records) {
      const existing = map.get(record.id);
      if (existing) {
        throw new ParseError(record.source.path, [
          `duplicate skill id "${record.id}" (also defined in ${existing.source.path})`,
        ]);
      }
      const phrase = normalizePhrase(record.id);
      const clash = byPhrase.get(phrase);
      if (clash) {
        throw new ParseError(record.source.path, [
          `skill id "${record.id}" collides with "${clash.id}" (defined in ${clash.source.path})`,
        ]);
      }
      map.set(record.id, record);
      byPhrase.set(phrase, record);
    }
    this.records = map;
    this.sortedIds = Object.freeze([...map.keys()].sort());
  }

  get size(): number {
    return this.records.size;
  }

  get(id: string): SkillRecord | undefined {
    return this.records.get(id);
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  /**
   * All ids, sorted
   */
  ids(): string[] {
    return [...this.sortedIds];
  }

  /**
   * All records, sorted by id
   */
  all(): SkillRecord[] {
    return this.sortedIds.flatMap((id) => {
      const record = this.records.get(id);
      return record ? [record] : [];
    });
  }

  byCategory(category: SkillCategory): SkillRecord[] {
    return this.all().filter((record) => record.category === category);
  }

  /**
   * Categories with at least one record, in category order
   */
  categories(): SkillCategory[] {
    const present = new Set(this.all().map((record) => record.category));
    return SKILL_CATEGORIES.filter((category) => present.has(category));
  }
}

/**
 * Load all skill documents under a directory
 *
 * @throws NotFoundError if the directory is missing
 * @throws ParseError for the first document (in path order) that cannot be parsed,
 *   or for a duplicate id
 */
export async function loadRegistry(
  sourcePath: string,
  options: RegistryLoadOptions = {}
): Promise<SkillRegistry> {
  const root = path.resolve(sourcePath);

  if (!(await pathExists(root))) {
    throw new NotFoundError(root);
  }
  if (!(await isDirectory(root))) {
    throw new NotFoundError(root, `Skill source is not a directory: ${root}`);
  }

  const layout = options.layout ?? 'auto';
  const files = await scanDirectory(root, layoutPatterns(layout), [
    ...DEFAULT_IGNORE,
    ...(options.ignore ?? []),
  ]);

  const parser = new SkillParser();
  const records: SkillRecord[] = [];

  for (const filePath of files) {
    const record = await parser.parse(filePath);
    records.push(record);

    if (isDebugEnabled('registry')) {
      logger.debug('Registry', `Loaded "${record.id}"`, {
        file: filePath,
        category: record.category,
        aliases: record.aliases.length,
      });
    }
  }

  const registry = new SkillRegistry(records, root);

  logger.debug('Registry', `Loaded ${registry.size} skills`, { dir: root, layout });

  return registry;
}
