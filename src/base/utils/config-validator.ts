/**
 * Configuration Validator
 *
 * Zod schemas for the two structured inputs skillroute reads:
 * - skill document front matter
 * - settings.json files
 */

import { z } from 'zod';
import { SKILL_CATEGORIES, LAYOUTS, CATEGORY_TIE_BREAKS } from '../../skills/types.js';

const stringOrList = z.union([z.string(), z.array(z.string())]);

/**
 * Skill document front matter schema
 *
 * YAML turns `version: 1.0` into a number, so version accepts both.
 */
export const SkillFrontmatterSchema = z.object({
  name: z.string({ required_error: 'missing required field' }).trim().min(1, 'must not be empty'),
  description: z
    .string({ required_error: 'missing required field' })
    .trim()
    .min(1, 'must not be empty'),
  category: z.enum(SKILL_CATEGORIES).optional(),
  aliases: stringOrList.optional().describe('Alternative phrasings that select this skill exactly'),
  tags: stringOrList.optional(),
  version: z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .optional(),
});

export type SkillFrontmatter = z.infer<typeof SkillFrontmatterSchema>;

/**
 * settings.json schema
 */
export const SettingsSchema = z
  .object({
    skillsDir: z.string().min(1).optional(),
    semanticThreshold: z.number().min(0).max(1).optional(),
    minOverlap: z.number().int().min(1).optional(),
    categoryTieBreak: z.enum(CATEGORY_TIE_BREAKS).optional(),
    refreshIntervalDays: z.number().positive().optional(),
    layout: z.enum(LAYOUTS).optional(),
    ignore: z.array(z.string()).optional(),
  })
  .strict();

export type SettingsInput = z.infer<typeof SettingsSchema>;

export interface ValidationResult<T> {
  valid: boolean;
  data?: T;
  errors?: string[];
}

/**
 * Format zod issues as `path: message` strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue: z.ZodIssue) => {
    const issuePath = issue.path.join('.');
    return issuePath ? `${issuePath}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate data against a Zod schema
 */
export function validateConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { valid: true, data: result.data };
  }
  return { valid: false, errors: formatIssues(result.error) };
}
