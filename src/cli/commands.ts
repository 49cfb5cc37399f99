/**
 * CLI commands
 *
 * Exit codes: 0 success (including "no skill found"), 1 load or config error,
 * 2 usage error.
 */

import * as path from 'path';
import { parseCliArgs, UsageError, HELP_TEXT, type CliArgs } from './args.js';
import { colors, formatError, tierColor, type Output } from './ui.js';
import { ConfigManager, createRegistryCache, toResolverOptions } from '../base/config/index.js';
import type { ResolvedConfig, Settings } from '../base/config/index.js';
import { isSkillrouteError, ParseError } from '../base/errors.js';
import type { SkillRegistry } from '../skills/registry.js';
import { resolve } from '../skills/resolver.js';
import { describeResolution, formatResponse } from '../skills/response.js';
import { buildSkillIndex } from '../skills/skill-index.js';
import type { SkillRecord } from '../skills/types.js';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;

export interface CommandContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Overrides ~/.skillroute */
  userDir?: string;
  output: Output;
}

function recordToJson(record: SkillRecord) {
  return {
    id: record.id,
    description: record.description,
    category: record.category,
    aliases: [...record.aliases],
    tags: [...record.tags],
    version: record.version,
    path: record.source.path,
  };
}

async function loadConfig(args: CliArgs, ctx: CommandContext): Promise<ResolvedConfig> {
  const manager = new ConfigManager({ cwd: ctx.cwd, userDir: ctx.userDir, env: ctx.env });

  const overrides: Settings = {};
  if (args.dir !== undefined) overrides.skillsDir = path.resolve(ctx.cwd, args.dir);
  if (args.threshold !== undefined) overrides.semanticThreshold = args.threshold;
  manager.setCliArgs(overrides);

  return manager.resolve();
}

function runResolve(
  args: CliArgs,
  registry: SkillRegistry,
  config: ResolvedConfig,
  output: Output
): number {
  const request = args.positionals.join(' ');
  const match = resolve(registry, request, toResolverOptions(config));
  const response = describeResolution(match, registry);

  if (args.json) {
    output.out(JSON.stringify({ request, match, response }, null, 2));
    return EXIT_OK;
  }

  const [usedLine, ...restLines] = formatResponse(response).split('\n');
  output.out(tierColor(match.matchedTier)(usedLine ?? ''));
  for (const line of restLines) {
    output.out(line);
  }
  return EXIT_OK;
}

function runList(args: CliArgs, registry: SkillRegistry, output: Output): number {
  const records = registry.all();

  if (args.json) {
    output.out(JSON.stringify(records.map(recordToJson), null, 2));
    return EXIT_OK;
  }

  if (records.length === 0) {
    output.out(colors.muted(`No skills in ${registry.sourcePath}`));
    return EXIT_OK;
  }

  for (const record of records) {
    output.out(
      `${colors.highlight(record.id)} ${colors.muted(`[${record.category}]`)} ${record.description}`
    );
  }
  return EXIT_OK;
}

function runShow(args: CliArgs, registry: SkillRegistry, output: Output): number {
  const [id] = args.positionals;
  const record = id !== undefined ? registry.get(id) : undefined;

  if (!record) {
    output.err(formatError(`Unknown skill: ${id ?? ''}`));
    return EXIT_ERROR;
  }

  if (args.json) {
    output.out(JSON.stringify({ ...recordToJson(record), content: record.content }, null, 2));
    return EXIT_OK;
  }

  output.out(`${colors.highlight(record.id)} ${colors.muted(`[${record.category}]`)}`);
  output.out(record.description);
  if (record.content) {
    output.out('');
    output.out(record.content);
  }
  return EXIT_OK;
}

function runCommand(
  args: CliArgs,
  registry: SkillRegistry,
  config: ResolvedConfig,
  output: Output
): number {
  switch (args.command) {
    case 'resolve':
      return runResolve(args, registry, config, output);
    case 'list':
      return runList(args, registry, output);
    case 'show':
      return runShow(args, registry, output);
    case 'index':
      output.out(buildSkillIndex(registry));
      return EXIT_OK;
    case 'help':
      output.out(HELP_TEXT);
      return EXIT_OK;
  }
}

function checkUsage(args: CliArgs): void {
  if (args.command === 'resolve' && args.positionals.join(' ').trim() === '') {
    throw new UsageError('resolve requires a request');
  }
  if (args.command === 'show' && args.positionals.length !== 1) {
    throw new UsageError('show requires exactly one skill id');
  }
}

/**
 * Run one CLI invocation and return its exit code
 */
export async function runCli(argv: string[], ctx: CommandContext): Promise<number> {
  const { output } = ctx;

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
    checkUsage(args);
  } catch (error) {
    if (error instanceof UsageError) {
      output.err(formatError(error.message));
      output.err(HELP_TEXT);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.command === 'help') {
    output.out(HELP_TEXT);
    return EXIT_OK;
  }

  try {
    const config = await loadConfig(args, ctx);
    const registry = await createRegistryCache(config).get();

    return runCommand(args, registry, config, output);
  } catch (error) {
    if (isSkillrouteError(error)) {
      output.err(formatError(error.message));
      if (error instanceof ParseError) {
        output.err(colors.muted(`  file: ${error.filePath}`));
      }
      return EXIT_ERROR;
    }
    throw error;
  }
}
