/**
 * Skills - core types
 */

import type { DiscoverableResource, ResourceSource } from '../base/discovery/types.js';

/**
 * Closed set of skill categories, in tie-break order
 */
export const SKILL_CATEGORIES = [
  'crypto',
  'storage',
  'media',
  'web',
  'search',
  'documents',
  'messaging',
  'general',
] as const;

export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

/**
 * One skill document, as loaded. Frozen once created.
 */
export interface SkillRecord extends DiscoverableResource {
  /** Stable identifier, from the `name` front-matter field */
  readonly id: string;
  readonly description: string;
  readonly category: SkillCategory;
  /** Alternative phrasings that select this skill at the exact tier */
  readonly aliases: readonly string[];
  readonly tags: readonly string[];
  readonly version?: string;
  /** Markdown body without front matter */
  readonly content: string;
  readonly source: ResourceSource;
}

/**
 * Resolution tiers, in priority order
 */
export type MatchTier = 'exact' | 'semantic' | 'category' | 'none';

export interface MatchResult {
  matchedId?: string;
  matchedTier: MatchTier;
  /** 1 for exact, overlap ratio for semantic, a fixed low value for category, 0 for none */
  confidence: number;
  /** What produced the match: the alias hit, overlapping tokens, or category keywords */
  evidence: string[];
}

export const CATEGORY_TIE_BREAKS = ['best-overlap', 'alphabetical'] as const;

/**
 * How the category tier picks among several skills of one category
 */
export type CategoryTieBreak = (typeof CATEGORY_TIE_BREAKS)[number];

export interface ResolverOptions {
  /** Minimum overlap ratio for the semantic tier (0..1) */
  semanticThreshold?: number;
  /** Minimum number of shared tokens for the semantic tier */
  minOverlap?: number;
  categoryTieBreak?: CategoryTieBreak;
}

export const LAYOUTS = ['flat', 'nested', 'auto'] as const;

/**
 * Document layout of a skill directory
 * - flat: `<dir>/<any>.md`
 * - nested: `<dir>/<id>/SKILL.md`
 * - auto: both
 */
export type SkillLayout = (typeof LAYOUTS)[number];

export interface RegistryLoadOptions {
  layout?: SkillLayout;
  /** Extra globs, relative to the skill directory, to skip */
  ignore?: string[];
}
