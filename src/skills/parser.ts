/**
 * Skills Parser - Parse skill documents with YAML front matter
 *
 * Uses gray-matter to split front matter from the Markdown body and a Zod
 * schema to validate it.
 */

import matter from 'gray-matter';
import * as fs from 'fs/promises';
import type { SkillRecord } from './types.js';
import type { ResourceParser } from '../base/discovery/types.js';
import { isValidSkillId } from '../base/utils/validation.js';
import { SkillFrontmatterSchema, validateConfig } from '../base/utils/config-validator.js';
import { ParseError } from '../base/errors.js';
import { createSkillRecord } from './record.js';

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return typeof value === 'string' ? [value] : value;
}

/**
 * Parse a skill document and return a SkillRecord
 *
 * @param filePath - Absolute path to the Markdown file
 * @throws ParseError if the front matter is malformed or lacks `name`/`description`
 */
export async function parseSkillFile(filePath: string): Promise<SkillRecord> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseSkillDocument(content, filePath);
}

/**
 * Parse skill document text already in memory
 */
export function parseSkillDocument(text: string, filePath: string): SkillRecord {
  let data: unknown;
  let body: string;
  try {
    // gray-matter caches by input string; pass a fresh options object to bypass it
    const parsed = matter(text, {});
    data = parsed.data;
    body = parsed.content;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(filePath, [`front matter: ${message}`]);
  }

  const validation = validateConfig(SkillFrontmatterSchema, data);
  if (!validation.valid || !validation.data) {
    throw new ParseError(filePath, validation.errors ?? ['unknown validation error']);
  }

  const frontmatter = validation.data;
  if (!isValidSkillId(frontmatter.name)) {
    throw new ParseError(filePath, [
      `name: invalid skill id "${frontmatter.name}" (letters, digits, "-", "_" and ":" only)`,
    ]);
  }

  return createSkillRecord({
    id: frontmatter.name,
    description: frontmatter.description,
    category: frontmatter.category,
    aliases: toList(frontmatter.aliases),
    tags: toList(frontmatter.tags),
    version: frontmatter.version,
    content: body.trim(),
    sourcePath: filePath,
  });
}

/**
 * Skill Parser - implements ResourceParser
 */
export class SkillParser implements ResourceParser<SkillRecord> {
  parse(filePath: string): Promise<SkillRecord> {
    return parseSkillFile(filePath);
  }

  isValidName(name: string): boolean {
    return isValidSkillId(name);
  }
}
