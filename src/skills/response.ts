/**
 * Response template
 *
 * Every answer given after resolution carries three fields:
 *
 *   Skill(s) used: <ids, or "none">
 *   Result: <what happened>
 *   Next step: <what the caller should do next>
 */

import type { MatchResult } from './types.js';
import type { SkillRegistry } from './registry.js';

export const NO_SKILL_FOUND = 'No skill found';

export interface SkillResponse {
  skillsUsed: string[];
  result: string;
  nextStep: string;
}

export function formatResponse(response: SkillResponse): string {
  const used = response.skillsUsed.length > 0 ? response.skillsUsed.join(', ') : 'none';
  return [
    `Skill(s) used: ${used}`,
    `Result: ${response.result}`,
    `Next step: ${response.nextStep}`,
  ].join('\n');
}

/**
 * Fill the response template from a resolution
 *
 * A match whose id is not in the registry is reported as no match.
 */
export function describeResolution(match: MatchResult, registry: SkillRegistry): SkillResponse {
  const record = match.matchedId !== undefined ? registry.get(match.matchedId) : undefined;

  if (match.matchedTier === 'none' || !record) {
    return {
      skillsUsed: [],
      result: `${NO_SKILL_FOUND} for this request.`,
      nextStep: 'Proceed with best-effort general handling.',
    };
  }

  return {
    skillsUsed: [record.id],
    result: `Matched "${record.id}" at the ${match.matchedTier} tier (confidence ${match.confidence.toFixed(2)}): ${record.description}`,
    nextStep: `Follow the "${record.id}" skill document (${record.source.path}).`,
  };
}
