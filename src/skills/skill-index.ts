/**
 * Skill index - Markdown listing of a registry, grouped by category
 *
 * Meant to be placed in an agent prompt so it can see which skills exist.
 */

import type { SkillRegistry } from './registry.js';

export function buildSkillIndex(registry: SkillRegistry): string {
  const lines: string[] = ['# Available Skills', ''];

  if (registry.size === 0) {
    lines.push('No skills available.');
    return lines.join('\n');
  }

  for (const category of registry.categories()) {
    lines.push(`## ${category}`, '');
    for (const record of registry.byCategory(category)) {
      const aliases = record.aliases.length > 0 ? ` (aliases: ${record.aliases.join(', ')})` : '';
      lines.push(`- **${record.id}**: ${record.description}${aliases}`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}
