/**
 * Skills System - Module exports
 */

export * from './types.js';
export { parseSkillFile, parseSkillDocument, SkillParser } from './parser.js';
export { createSkillRecord, type SkillRecordInput } from './record.js';
export { SkillRegistry, loadRegistry, layoutPatterns, DEFAULT_IGNORE, SKILL_FILENAME } from './registry.js';
export {
  RegistryCache,
  DEFAULT_REFRESH_INTERVAL_MS,
  type RegistryCacheOptions,
  type RegistryLoader,
} from './registry-cache.js';
export {
  resolve,
  resolveAll,
  recordVocabulary,
  NO_MATCH,
  DEFAULT_SEMANTIC_THRESHOLD,
  DEFAULT_MIN_OVERLAP,
  DEFAULT_CATEGORY_TIE_BREAK,
  CATEGORY_CONFIDENCE,
} from './resolver.js';
export { detectCategories, inferCategory, getCategoryKeywords, type CategoryHit } from './categories.js';
export { normalizePhrase, tokenize, tokenSet, stem } from './tokenizer.js';
export { formatResponse, describeResolution, NO_SKILL_FOUND, type SkillResponse } from './response.js';
export { buildSkillIndex } from './skill-index.js';
