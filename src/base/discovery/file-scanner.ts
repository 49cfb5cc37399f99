/**
 * File Scanner - find resource files under a directory
 *
 * Supports two layouts, usable together:
 * - flat: files directly in the directory
 * - nested: one file per subdirectory
 */

import fg from 'fast-glob';
import type { FilePattern } from './types.js';
import { isDirectory } from '../utils/path-utils.js';
import { logger } from '../utils/logger.js';
import { isVerboseDebugEnabled } from '../utils/debug.js';

/**
 * Convert a file pattern to a glob relative to the scanned directory
 */
export function patternToGlob(pattern: FilePattern): string {
  switch (pattern.type) {
    case 'flat':
      return `*${pattern.extension}`;
    case 'nested':
      return `*/${pattern.filename}`;
  }
}

/**
 * Scan directory for files matching any of the patterns
 *
 * @param dirPath Absolute path to the directory to scan
 * @param ignore Globs (relative to dirPath) to leave out
 * @returns Absolute file paths, de-duplicated and sorted
 */
export async function scanDirectory(
  dirPath: string,
  patterns: FilePattern[],
  ignore: string[] = []
): Promise<string[]> {
  if (!(await isDirectory(dirPath))) {
    return [];
  }

  const globs = patterns.map(patternToGlob);
  const files = await fg(globs, {
    cwd: dirPath,
    absolute: true,
    onlyFiles: true,
    dot: false,
    ignore,
  });

  const sorted = Array.from(new Set(files)).sort();

  if (isVerboseDebugEnabled('discovery')) {
    logger.debug('Discovery', `Scanned ${dirPath}`, { globs, ignore, found: sorted.length });
  }

  return sorted;
}
