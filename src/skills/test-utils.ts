/**
 * Shared helpers for tests that need skill documents on disk
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

export interface SkillDocFields {
  name?: string;
  description?: string;
  category?: string;
  aliases?: string[];
  tags?: string[];
}

/**
 * Render a skill document; values are written as JSON strings, which YAML reads verbatim
 */
export function skillDocument(fields: SkillDocFields, body = '# Skill\n'): string {
  const lines = ['---'];
  if (fields.name !== undefined) lines.push(`name: ${JSON.stringify(fields.name)}`);
  if (fields.description !== undefined) {
    lines.push(`description: ${JSON.stringify(fields.description)}`);
  }
  if (fields.category !== undefined) lines.push(`category: ${JSON.stringify(fields.category)}`);
  if (fields.aliases) {
    lines.push('aliases:', ...fields.aliases.map((alias) => `  - ${JSON.stringify(alias)}`));
  }
  if (fields.tags) {
    lines.push('tags:', ...fields.tags.map((tag) => `  - ${JSON.stringify(tag)}`));
  }
  lines.push('---', '', body);
  return lines.join('\n');
}

export async function writeFile(dir: string, relPath: string, content: string): Promise<string> {
  const filePath = path.join(dir, relPath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  return filePath;
}

export async function writeSkillDoc(
  dir: string,
  relPath: string,
  fields: SkillDocFields,
  body?: string
): Promise<string> {
  return writeFile(dir, relPath, skillDocument(fields, body));
}

export async function createTempDir(prefix = 'skillroute-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export const BALANCE_SKILL: SkillDocFields = {
  name: 'check-crypto-address-balance',
  description:
    'Check the balance of a crypto wallet address (BTC, ETH, SOL) using public block explorers',
  category: 'crypto',
  aliases: ['check bitcoin balance', 'wallet balance'],
};

export const QR_SKILL: SkillDocFields = {
  name: 'generate-qr-code',
  description: 'Generate a QR code image from text or a URL',
  category: 'media',
};

export const IPFS_SKILL: SkillDocFields = {
  name: 'upload-to-ipfs',
  description: 'Upload a file to IPFS and return the gateway link',
  aliases: ['pin file'],
};
