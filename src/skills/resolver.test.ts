/**
 * Resolver Tests
 */

import { describe, it, expect } from '@jest/globals';
import { resolve, resolveAll, recordVocabulary, CATEGORY_CONFIDENCE } from './resolver.js';
import { SkillRegistry } from './registry.js';
import { createSkillRecord } from './record.js';
import { ParseError } from '../base/errors.js';

const balance = createSkillRecord({
  id: 'check-crypto-address-balance',
  description:
    'Check the balance of a crypto wallet address (BTC, ETH, SOL) using public block explorers',
  category: 'crypto',
  aliases: ['check bitcoin balance', 'wallet balance'],
});

const price = createSkillRecord({
  id: 'fetch-token-price',
  description: 'Fetch the current market price of a token',
  category: 'crypto',
});

const qr = createSkillRecord({
  id: 'generate-qr-code',
  description: 'Generate a QR code image from text or a URL',
  category: 'media',
});

const ipfs = createSkillRecord({
  id: 'upload-to-ipfs',
  description: 'Upload a file to IPFS and return the gateway link',
  category: 'storage',
  aliases: ['pin file'],
});

const registry = new SkillRegistry([balance, price, qr, ipfs]);

describe('resolve', () => {
  describe('exact tier', () => {
    it('should match an alias case-insensitively', () => {
      expect(resolve(registry, 'check bitcoin balance')).toEqual({
        matchedId: 'check-crypto-address-balance',
        matchedTier: 'exact',
        confidence: 1,
        evidence: ['check bitcoin balance'],
      });
      expect(resolve(registry, 'Check Bitcoin Balance?').matchedTier).toBe('exact');
    });

    it('should match every id exactly', () => {
      for (const id of registry.ids()) {
        expect(resolve(registry, id)).toEqual({
          matchedId: id,
          matchedTier: 'exact',
          confidence: 1,
          evidence: [id],
        });
      }
    });

    it('should treat spaces and dashes alike', () => {
      const result = resolve(registry, 'Upload to IPFS');

      expect(result.matchedId).toBe('upload-to-ipfs');
      expect(result.matchedTier).toBe('exact');
    });

    it('should win over the semantic tier', () => {
      expect(resolve(registry, 'wallet balance').matchedTier).toBe('exact');
    });

    it("should prefer another record's id over an earlier alias", () => {
      const shadowing = new SkillRegistry([
        createSkillRecord({ id: 'a-skill', description: 'First skill', aliases: ['z-skill'] }),
        createSkillRecord({ id: 'z-skill', description: 'Last skill' }),
      ]);

      expect(resolve(shadowing, 'z-skill')).toEqual({
        matchedId: 'z-skill',
        matchedTier: 'exact',
        confidence: 1,
        evidence: ['z-skill'],
      });
      expect(resolve(shadowing, 'Z Skill').matchedId).toBe('z-skill');
    });

    it('should reject a registry whose ids only differ by separator or case', () => {
      const dashed = createSkillRecord({ id: 'foo-bar', description: 'Dashed' });
      const underscored = createSkillRecord({ id: 'foo_bar', description: 'Underscored' });
      const capitalized = createSkillRecord({ id: 'Foo-Bar', description: 'Capitalized' });

      expect(() => new SkillRegistry([dashed, underscored])).toThrow(
        'Invalid skill document foo_bar.md: skill id "foo_bar" collides with "foo-bar" (defined in foo-bar.md)'
      );
      expect(() => new SkillRegistry([dashed, capitalized])).toThrow(ParseError);
    });
  });

  describe('semantic tier', () => {
    it('should match by token overlap with the description', () => {
      const result = resolve(registry, "what's the value in this BTC wallet?");

      expect(result.matchedId).toBe('check-crypto-address-balance');
      expect(result.matchedTier).toBe('semantic');
      expect(result.confidence).toBeCloseTo(2 / 3, 10);
      expect(result.evidence).toEqual(['btc', 'wallet']);
    });

    it('should accept a ratio equal to the threshold', () => {
      const result = resolve(registry, 'market value');

      expect(result.matchedId).toBe('fetch-token-price');
      expect(result.matchedTier).toBe('semantic');
      expect(result.confidence).toBe(0.5);
    });

    it('should respect a higher threshold', () => {
      expect(resolve(registry, 'market value', { semanticThreshold: 0.6 })).toEqual({
        matchedTier: 'none',
        confidence: 0,
        evidence: [],
      });
    });

    it('should pick the best ratio', () => {
      const onePdf = createSkillRecord({ id: 'a-one', description: 'pdf tools' });
      const mergePdf = createSkillRecord({ id: 'b-two', description: 'merge pdf tools' });

      const result = resolve(new SkillRegistry([onePdf, mergePdf]), 'merge pdf');

      expect(result.matchedId).toBe('b-two');
      expect(result.confidence).toBe(1);
    });

    it('should break score ties by id', () => {
      const beta = createSkillRecord({ id: 'beta-skill', description: 'convert pdf files' });
      const alpha = createSkillRecord({ id: 'alpha-skill', description: 'convert pdf files' });

      const result = resolve(new SkillRegistry([beta, alpha]), 'convert pdf');

      expect(result.matchedId).toBe('alpha-skill');
      expect(result.matchedTier).toBe('semantic');
    });
  });

  describe('category tier', () => {
    it('should fall back to a skill in the named category', () => {
      expect(resolve(registry, 'something about blockchain stuff')).toEqual({
        matchedId: 'check-crypto-address-balance',
        matchedTier: 'category',
        confidence: CATEGORY_CONFIDENCE,
        evidence: ['blockchain'],
      });
    });

    it('should prefer the skill with the most overlap by default', () => {
      const result = resolve(registry, 'ethereum market mood today');

      expect(result.matchedId).toBe('fetch-token-price');
      expect(result.matchedTier).toBe('category');
      expect(result.evidence).toEqual(['ethereum']);
    });

    it('should pick the first id with the alphabetical tie-break', () => {
      const result = resolve(registry, 'ethereum market mood today', {
        categoryTieBreak: 'alphabetical',
      });

      expect(result.matchedId).toBe('check-crypto-address-balance');
      expect(result.matchedTier).toBe('category');
    });

    it('should be reached when overlap is below minOverlap', () => {
      expect(resolve(registry, 'btc').matchedTier).toBe('semantic');

      const result = resolve(registry, 'btc', { minOverlap: 2 });

      expect(result.matchedTier).toBe('category');
      expect(result.matchedId).toBe('check-crypto-address-balance');
    });

    it('should ignore categories without skills', () => {
      expect(resolve(registry, 'send a telegram message').matchedTier).toBe('none');
    });
  });

  describe('no match', () => {
    it('should return none for an unrelated request', () => {
      expect(resolve(registry, 'translate this document to French')).toEqual({
        matchedTier: 'none',
        confidence: 0,
        evidence: [],
      });
    });

    it('should return none for a blank request', () => {
      expect(resolve(registry, '   ').matchedTier).toBe('none');
    });

    it('should return none against an empty registry', () => {
      expect(resolve(new SkillRegistry([]), 'check bitcoin balance').matchedTier).toBe('none');
    });
  });

  it('should be idempotent', () => {
    const requests = [
      'check bitcoin balance',
      "what's the value in this BTC wallet?",
      'ethereum market mood today',
      'translate this document to French',
    ];

    for (const request of requests) {
      expect(resolve(registry, request)).toEqual(resolve(registry, request));
    }
  });
});

describe('resolveAll', () => {
  it('should resolve each request independently', () => {
    const results = resolveAll(registry, ['pin file', 'qr code image', 'weather tomorrow']);

    expect(results.map((result) => [result.matchedId, result.matchedTier])).toEqual([
      ['upload-to-ipfs', 'exact'],
      ['generate-qr-code', 'semantic'],
      [undefined, 'none'],
    ]);
  });
});

describe('recordVocabulary', () => {
  it('should cover id, aliases and description', () => {
    const vocabulary = recordVocabulary(ipfs);

    expect([...vocabulary].sort()).toEqual([
      'file',
      'gateway',
      'ipfs',
      'link',
      'pin',
      'return',
      'upload',
    ]);
  });
});
