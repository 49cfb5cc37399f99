/**
 * SkillRecord construction
 */

import type { SkillCategory, SkillRecord } from './types.js';
import { inferCategory } from './categories.js';
import { normalizePhrase, tokenSet } from './tokenizer.js';

export interface SkillRecordInput {
  id: string;
  description: string;
  category?: SkillCategory;
  aliases?: readonly string[];
  tags?: readonly string[];
  version?: string;
  content?: string;
  /** Absolute path of the document; defaults to `<id>.md` for in-memory records */
  sourcePath?: string;
}

/**
 * Trim, drop empties and de-duplicate by normalized form, keeping first occurrence order
 */
export function cleanPhrases(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    const key = normalizePhrase(trimmed);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    result.push(trimmed);
  }
  return result;
}

/**
 * Build a frozen SkillRecord
 *
 * A missing category is inferred from the id, description, aliases and tags.
 */
export function createSkillRecord(input: SkillRecordInput): SkillRecord {
  const aliases = Object.freeze(cleanPhrases(input.aliases ?? []));
  const tags = Object.freeze(cleanPhrases(input.tags ?? []));
  const category =
    input.category ?? inferCategory(tokenSet(input.id, input.description, ...aliases, ...tags));

  return Object.freeze({
    id: input.id,
    description: input.description,
    category,
    aliases,
    tags,
    version: input.version,
    content: input.content ?? '',
    source: Object.freeze({ path: input.sourcePath ?? `${input.id}.md` }),
  });
}
