/**
 * Resolver - map a free-text request to at most one skill
 *
 * Tiers run in a fixed order and the first one that matches wins:
 *   exact → semantic → category → none
 *
 * Resolution is synchronous and pure: the registry is read-only and the same
 * request against the same registry always yields the same result.
 */

import type {
  CategoryTieBreak,
  MatchResult,
  ResolverOptions,
  SkillRecord,
} from './types.js';
import type { SkillRegistry } from './registry.js';
import { detectCategories } from './categories.js';
import { normalizePhrase, tokenSet } from './tokenizer.js';
import { logger } from '../base/utils/logger.js';
import { isDebugEnabled, isVerboseDebugEnabled } from '../base/utils/debug.js';

export const DEFAULT_SEMANTIC_THRESHOLD = 0.5;
export const DEFAULT_MIN_OVERLAP = 1;
export const DEFAULT_CATEGORY_TIE_BREAK: CategoryTieBreak = 'best-overlap';
export const CATEGORY_CONFIDENCE = 0.25;

export const NO_MATCH: Readonly<MatchResult> = Object.freeze({
  matchedTier: 'none',
  confidence: 0,
  evidence: [],
});

// Records are frozen, so a vocabulary computed once stays valid
const vocabularyCache = new WeakMap<SkillRecord, ReadonlySet<string>>();

/**
 * Tokens a request can share with a record: id, aliases, description and tags
 */
export function recordVocabulary(record: SkillRecord): ReadonlySet<string> {
  const cached = vocabularyCache.get(record);
  if (cached) return cached;

  const vocabulary = tokenSet(record.id, record.description, ...record.aliases, ...record.tags);
  vocabularyCache.set(record, vocabulary);
  return vocabulary;
}

function sharedTokens(requestTokens: ReadonlySet<string>, record: SkillRecord): string[] {
  const vocabulary = recordVocabulary(record);
  return [...requestTokens].filter((token) => vocabulary.has(token)).sort();
}

function exactMatch(record: SkillRecord, evidence: string): MatchResult {
  return { matchedId: record.id, matchedTier: 'exact', confidence: 1, evidence: [evidence] };
}

/**
 * Exact tier: the request names a record by id, then by normalized id, then by alias
 *
 * Ids are checked across all records before any alias, so an alias never
 * shadows another record's id.
 */
export function matchExact(registry: SkillRegistry, request: string): MatchResult | null {
  const phrase = normalizePhrase(request);
  if (!phrase) return null;

  const named = registry.get(request.trim());
  if (named) return exactMatch(named, named.id);

  const records = registry.all();

  const byId = records.find((record) => normalizePhrase(record.id) === phrase);
  if (byId) return exactMatch(byId, byId.id);

  for (const record of records) {
    const alias = record.aliases.find((candidate) => normalizePhrase(candidate) === phrase);
    if (alias !== undefined) return exactMatch(record, alias);
  }

  return null;
}

/**
 * Semantic tier: share of request tokens found in a record's vocabulary
 *
 * Best ratio wins; ties go to the larger overlap, then the smaller id.
 */
export function matchSemantic(
  registry: SkillRegistry,
  requestTokens: ReadonlySet<string>,
  threshold: number,
  minOverlap: number
): MatchResult | null {
  if (requestTokens.size === 0) return null;

  let best: { record: SkillRecord; shared: string[]; score: number } | null = null;

  for (const record of registry.all()) {
    const shared = sharedTokens(requestTokens, record);
    const score = shared.length / requestTokens.size;

    if (isVerboseDebugEnabled('resolver')) {
      logger.debug('Resolver', `Semantic score for "${record.id}"`, { score, shared });
    }

    if (shared.length < minOverlap || score < threshold) continue;

    // all() is sorted by id, so strict comparisons keep the smaller id on ties
    if (
      !best ||
      score > best.score ||
      (score === best.score && shared.length > best.shared.length)
    ) {
      best = { record, shared, score };
    }
  }

  if (!best) return null;

  return {
    matchedId: best.record.id,
    matchedTier: 'semantic',
    confidence: best.score,
    evidence: best.shared,
  };
}

/**
 * Category tier: the request names a category that has skills
 */
export function matchCategory(
  registry: SkillRegistry,
  requestTokens: ReadonlySet<string>,
  tieBreak: CategoryTieBreak
): MatchResult | null {
  const hit = detectCategories(requestTokens).find(
    (candidate) => registry.byCategory(candidate.category).length > 0
  );
  if (!hit) return null;

  const [first, ...rest] = registry.byCategory(hit.category);
  if (!first) return null;

  let chosen = first;
  if (tieBreak === 'best-overlap') {
    let bestOverlap = sharedTokens(requestTokens, first).length;
    for (const record of rest) {
      const overlap = sharedTokens(requestTokens, record).length;
      if (overlap > bestOverlap) {
        chosen = record;
        bestOverlap = overlap;
      }
    }
  }

  return {
    matchedId: chosen.id,
    matchedTier: 'category',
    confidence: CATEGORY_CONFIDENCE,
    evidence: hit.keywords,
  };
}

/**
 * Resolve a request against a registry
 *
 * "No skill found" is a normal result (tier `none`), never an error.
 */
export function resolve(
  registry: SkillRegistry,
  request: string,
  options: ResolverOptions = {}
): MatchResult {
  const threshold = options.semanticThreshold ?? DEFAULT_SEMANTIC_THRESHOLD;
  const minOverlap = options.minOverlap ?? DEFAULT_MIN_OVERLAP;
  const tieBreak = options.categoryTieBreak ?? DEFAULT_CATEGORY_TIE_BREAK;

  const exact = matchExact(registry, request);
  if (exact) return traced(request, exact);

  const requestTokens = tokenSet(request);

  const semantic = matchSemantic(registry, requestTokens, threshold, minOverlap);
  if (semantic) return traced(request, semantic);

  const category = matchCategory(registry, requestTokens, tieBreak);
  if (category) return traced(request, category);

  return traced(request, { ...NO_MATCH, evidence: [] });
}

/**
 * Resolve several requests against the same registry
 */
export function resolveAll(
  registry: SkillRegistry,
  requests: readonly string[],
  options: ResolverOptions = {}
): MatchResult[] {
  return requests.map((request) => resolve(registry, request, options));
}

function traced(request: string, result: MatchResult): MatchResult {
  if (isDebugEnabled('resolver')) {
    logger.debug('Resolver', `Resolved at ${result.matchedTier} tier`, {
      request,
      matchedId: result.matchedId,
      confidence: result.confidence,
    });
  }
  return result;
}
