/**
 * Category keyword tables
 *
 * Used at load time to infer a category for documents that do not declare one,
 * and by the resolver's category tier.
 */

import { z } from 'zod';
import keywordData from './data/categories.json';
import { SKILL_CATEGORIES, type SkillCategory } from './types.js';
import { stem } from './tokenizer.js';

const KeywordTableSchema = z.record(z.enum(SKILL_CATEGORIES), z.array(z.string()));

/**
 * Stemmed keywords per category; the category name itself always counts.
 * `general` has no keywords and is never detected.
 */
const CATEGORY_KEYWORDS: ReadonlyMap<SkillCategory, ReadonlySet<string>> = buildKeywordTable(
  KeywordTableSchema.parse(keywordData)
);

function buildKeywordTable(
  table: Partial<Record<SkillCategory, string[]>>
): Map<SkillCategory, Set<string>> {
  const keywords = new Map<SkillCategory, Set<string>>();
  for (const category of SKILL_CATEGORIES) {
    if (category === 'general') continue;
    const words = [category, ...(table[category] ?? [])].map((word) => stem(word.toLowerCase()));
    keywords.set(category, new Set(words));
  }
  return keywords;
}

export function getCategoryKeywords(category: SkillCategory): ReadonlySet<string> {
  return CATEGORY_KEYWORDS.get(category) ?? new Set<string>();
}

export interface CategoryHit {
  category: SkillCategory;
  /** Tokens that matched the category's keywords, sorted */
  keywords: string[];
}

/**
 * Find the categories named by a set of tokens
 *
 * Sorted by number of keyword hits (descending), then by category order.
 */
export function detectCategories(tokens: Iterable<string>): CategoryHit[] {
  const unique = new Set(tokens);
  const hits: CategoryHit[] = [];

  for (const category of SKILL_CATEGORIES) {
    const keywords = CATEGORY_KEYWORDS.get(category);
    if (!keywords) continue;

    const matched = [...unique].filter((token) => keywords.has(token)).sort();
    if (matched.length > 0) {
      hits.push({ category, keywords: matched });
    }
  }

  // Array.prototype.sort is stable, so equal counts keep category order
  return hits.sort((a, b) => b.keywords.length - a.keywords.length);
}

/**
 * Pick the category whose keywords best describe the given tokens, or `general`
 */
export function inferCategory(tokens: Iterable<string>): SkillCategory {
  const [best] = detectCategories(tokens);
  return best ? best.category : 'general';
}
