/**
 * Configuration Merger - Merge settings from multiple sources
 *
 * - Scalar values: higher priority replaces lower
 * - Arrays (ignore): concatenated with de-duplication
 */

import type { ConfigSource, Settings } from './types.js';

const SCALAR_KEYS = [
  'skillsDir',
  'semanticThreshold',
  'minOverlap',
  'categoryTieBreak',
  'refreshIntervalDays',
  'layout',
] as const satisfies ReadonlyArray<keyof Settings>;

function assignDefined<K extends keyof Settings>(target: Settings, source: Settings, key: K): void {
  const value = source[key];
  if (value !== undefined) {
    target[key] = value;
  }
}

function deduplicate(values: string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Merge override on top of base
 */
export function mergeTwo(base: Settings, override: Settings): Settings {
  const merged: Settings = { ...base };

  for (const key of SCALAR_KEYS) {
    assignDefined(merged, override, key);
  }

  if (override.ignore) {
    merged.ignore = deduplicate([...(base.ignore ?? []), ...override.ignore]);
  }

  return merged;
}

/**
 * Merge all sources into one settings object
 *
 * Sources must be in priority order (lowest first).
 */
export function mergeSettings(sources: ConfigSource[]): Settings {
  let merged: Settings = {};
  for (const source of sources) {
    merged = mergeTwo(merged, source.settings);
  }
  return merged;
}
