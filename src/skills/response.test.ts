/**
 * Response Template and Skill Index Tests
 */

import { describe, it, expect } from '@jest/globals';
import { describeResolution, formatResponse, NO_SKILL_FOUND } from './response.js';
import { buildSkillIndex } from './skill-index.js';
import { SkillRegistry } from './registry.js';
import { createSkillRecord } from './record.js';

const balance = createSkillRecord({
  id: 'check-crypto-address-balance',
  description: 'Check the balance of a crypto wallet address',
  category: 'crypto',
  aliases: ['check bitcoin balance', 'wallet balance'],
});

const qr = createSkillRecord({
  id: 'generate-qr-code',
  description: 'Generate a QR code image from text or a URL',
  category: 'media',
});

const registry = new SkillRegistry([qr, balance]);

describe('formatResponse', () => {
  it('should render the three template fields', () => {
    expect(
      formatResponse({ skillsUsed: ['a', 'b'], result: 'Done.', nextStep: 'Ship it.' })
    ).toBe('Skill(s) used: a, b\nResult: Done.\nNext step: Ship it.');
  });

  it('should say none when no skill was used', () => {
    expect(formatResponse({ skillsUsed: [], result: 'r', nextStep: 'n' })).toBe(
      'Skill(s) used: none\nResult: r\nNext step: n'
    );
  });
});

describe('describeResolution', () => {
  it('should state that no skill was found', () => {
    const response = describeResolution(
      { matchedTier: 'none', confidence: 0, evidence: [] },
      registry
    );

    expect(response).toEqual({
      skillsUsed: [],
      result: `${NO_SKILL_FOUND} for this request.`,
      nextStep: 'Proceed with best-effort general handling.',
    });
  });

  it('should describe a match', () => {
    const response = describeResolution(
      {
        matchedId: 'check-crypto-address-balance',
        matchedTier: 'semantic',
        confidence: 2 / 3,
        evidence: ['btc', 'wallet'],
      },
      registry
    );

    expect(response).toEqual({
      skillsUsed: ['check-crypto-address-balance'],
      result:
        'Matched "check-crypto-address-balance" at the semantic tier (confidence 0.67): Check the balance of a crypto wallet address',
      nextStep:
        'Follow the "check-crypto-address-balance" skill document (check-crypto-address-balance.md).',
    });
  });

  it('should treat an id missing from the registry as no match', () => {
    const response = describeResolution(
      { matchedId: 'retired-skill', matchedTier: 'exact', confidence: 1, evidence: [] },
      registry
    );

    expect(response.skillsUsed).toEqual([]);
    expect(response.result).toBe('No skill found for this request.');
  });
});

describe('buildSkillIndex', () => {
  it('should group skills by category', () => {
    expect(buildSkillIndex(registry)).toBe(
      [
        '# Available Skills',
        '',
        '## crypto',
        '',
        '- **check-crypto-address-balance**: Check the balance of a crypto wallet address (aliases: check bitcoin balance, wallet balance)',
        '',
        '## media',
        '',
        '- **generate-qr-code**: Generate a QR code image from text or a URL',
      ].join('\n')
    );
  });

  it('should say when there are no skills', () => {
    expect(buildSkillIndex(new SkillRegistry([]))).toBe('# Available Skills\n\nNo skills available.');
  });
});
