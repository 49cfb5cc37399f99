/**
 * Text normalization and tokenization for request matching
 */

import stopwordList from './data/stopwords.json';

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

/**
 * Normalize a phrase for exact comparison
 *
 * Lower-cases, treats runs of whitespace, `-` and `_` as one space and drops
 * trailing sentence punctuation, so `Check-Crypto  balance?` equals `check crypto balance`.
 */
export function normalizePhrase(text: string): string {
  return text
    .toLowerCase()
    .replace(/[\s_-]+/g, ' ')
    .trim()
    .replace(/[?!.]+$/, '')
    .trim();
}

/**
 * Reduce simple English plurals to their singular form
 *
 * Words of four letters or fewer are left alone (`ipfs`, `news`, `this`).
 */
export function stem(word: string): string {
  if (word.length <= 4) return word;
  if (word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (word.endsWith('ss') || word.endsWith('us') || word.endsWith('is')) return word;
  if (word.endsWith('s')) return word.slice(0, -1);
  return word;
}

export function isStopword(word: string): boolean {
  return STOPWORDS.has(word);
}

/**
 * Split text into content tokens
 *
 * Apostrophes are removed before splitting (`what's` → `whats`), single
 * characters and stop words are dropped, and the rest are stemmed.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/['’]/g, '')
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 1 && !isStopword(word))
    .map(stem);
}

export function tokenSet(...texts: string[]): Set<string> {
  const set = new Set<string>();
  for (const text of texts) {
    for (const token of tokenize(text)) {
      set.add(token);
    }
  }
  return set;
}
