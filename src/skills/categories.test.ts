/**
 * Category Keyword Tests
 */

import { describe, it, expect } from '@jest/globals';
import { detectCategories, getCategoryKeywords, inferCategory } from './categories.js';
import { tokenSet } from './tokenizer.js';

describe('detectCategories', () => {
  it('should rank by keyword hits and keep category order on ties', () => {
    expect(detectCategories(tokenSet('upload a qr code image to ipfs'))).toEqual([
      { category: 'storage', keywords: ['ipfs', 'upload'] },
      { category: 'media', keywords: ['image', 'qr'] },
    ]);
  });

  it('should count the category name itself', () => {
    expect(detectCategories(tokenSet('crypto'))).toEqual([
      { category: 'crypto', keywords: ['crypto'] },
    ]);
  });

  it('should match plural forms through stemming', () => {
    expect(detectCategories(tokenSet('scan these documents'))).toEqual([
      { category: 'documents', keywords: ['document'] },
    ]);
  });

  it('should return nothing when no keyword appears', () => {
    expect(detectCategories(tokenSet('translate to French'))).toEqual([]);
  });
});

describe('inferCategory', () => {
  it('should pick the best category', () => {
    expect(inferCategory(tokenSet('telegram bot that posts prices'))).toBe('messaging');
  });

  it('should fall back to general', () => {
    expect(inferCategory(tokenSet('generic helper'))).toBe('general');
  });
});

describe('getCategoryKeywords', () => {
  it('should hold stemmed keywords', () => {
    expect(getCategoryKeywords('documents').has('document')).toBe(true);
    expect(getCategoryKeywords('crypto').has('bitcoin')).toBe(true);
  });

  it('should be empty for general', () => {
    expect(getCategoryKeywords('general').size).toBe(0);
  });
});
