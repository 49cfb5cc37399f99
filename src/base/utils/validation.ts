/**
 * Shared Validation Utilities
 */

/**
 * Validate a skill id
 *
 * Ids can only contain letters, numbers, dash, underscore and colon
 * (for namespaced skills such as `crypto:check-balance`).
 */
export function isValidSkillId(name: string): boolean {
  return /^[a-zA-Z0-9_:-]+$/.test(name);
}
