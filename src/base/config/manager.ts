/**
 * Configuration Manager - multi-level configuration
 *
 * Merge order (later overrides earlier):
 * 1. User: ~/.skillroute/settings.json
 * 2. Project: .skillroute/settings.json
 * 3. Local: .skillroute/settings.local.json
 * 4. Environment: SKILLROUTE_SKILLS_DIR, SKILLROUTE_SEMANTIC_THRESHOLD
 * 5. CLI: command line arguments
 */

import * as path from 'path';
import type {
  ConfigManagerOptions,
  ConfigSource,
  MergedConfig,
  ResolvedConfig,
  Settings,
} from './types.js';
import { DEFAULT_SKILLS_DIR } from './types.js';
import { loadAllSources } from './loader.js';
import { mergeSettings } from './merger.js';
import { SettingsSchema, validateConfig } from '../utils/config-validator.js';
import { ConfigError } from '../errors.js';
import { expandHome, findProjectRoot, getUserConfigDir } from '../utils/path-utils.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_REFRESH_INTERVAL_MS, RegistryCache } from '../../skills/registry-cache.js';
import {
  DEFAULT_CATEGORY_TIE_BREAK,
  DEFAULT_MIN_OVERLAP,
  DEFAULT_SEMANTIC_THRESHOLD,
} from '../../skills/resolver.js';
import type { ResolverOptions } from '../../skills/types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export class ConfigManager {
  private readonly cwd: string;
  private readonly userDir: string;
  private readonly env: NodeJS.ProcessEnv;
  private cliArgs: Settings = {};
  private mergedConfig: MergedConfig | null = null;

  constructor(options: ConfigManagerOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.userDir = options.userDir ?? getUserConfigDir();
    this.env = options.env ?? process.env;
  }

  /**
   * Set CLI argument overrides
   *
   * @throws ConfigError when an override fails validation
   */
  setCliArgs(args: Settings): void {
    const validation = validateConfig(SettingsSchema, args);
    if (!validation.valid || !validation.data) {
      throw new ConfigError(validation.errors ?? ['unknown validation error']);
    }
    this.cliArgs = validation.data;
  }

  /**
   * Load and merge all configuration sources
   */
  async load(): Promise<MergedConfig> {
    const projectRoot = await findProjectRoot(this.cwd);
    const sources: ConfigSource[] = await loadAllSources(projectRoot, this.userDir, this.env);

    if (Object.keys(this.cliArgs).length > 0) {
      sources.push({ level: 'cli', settings: this.cliArgs });
    }

    const settings = mergeSettings(sources);
    this.mergedConfig = { settings, sources, projectRoot };

    logger.debug('Config', 'Configuration loaded', {
      projectRoot,
      levels: sources.map((source) => source.level),
    });

    return this.mergedConfig;
  }

  /**
   * Current merged settings (empty before load)
   */
  get(): Settings {
    return { ...(this.mergedConfig?.settings ?? {}) };
  }

  /**
   * Apply defaults and resolve paths, loading first if needed
   *
   * A relative skillsDir resolves against the project root.
   */
  async resolve(): Promise<ResolvedConfig> {
    const merged = this.mergedConfig ?? (await this.load());
    return applyDefaults(merged.settings, merged.projectRoot);
  }
}

export function applyDefaults(settings: Settings, projectRoot: string): ResolvedConfig {
  const skillsDir = path.resolve(projectRoot, expandHome(settings.skillsDir ?? DEFAULT_SKILLS_DIR));

  return {
    projectRoot,
    skillsDir,
    semanticThreshold: settings.semanticThreshold ?? DEFAULT_SEMANTIC_THRESHOLD,
    minOverlap: settings.minOverlap ?? DEFAULT_MIN_OVERLAP,
    categoryTieBreak: settings.categoryTieBreak ?? DEFAULT_CATEGORY_TIE_BREAK,
    refreshIntervalMs:
      settings.refreshIntervalDays !== undefined
        ? settings.refreshIntervalDays * DAY_MS
        : DEFAULT_REFRESH_INTERVAL_MS,
    layout: settings.layout ?? 'auto',
    ignore: settings.ignore ?? [],
  };
}

export function toResolverOptions(config: ResolvedConfig): Required<ResolverOptions> {
  return {
    semanticThreshold: config.semanticThreshold,
    minOverlap: config.minOverlap,
    categoryTieBreak: config.categoryTieBreak,
  };
}

/**
 * Registry cache for the configured skill directory
 */
export function createRegistryCache(config: ResolvedConfig): RegistryCache {
  return new RegistryCache(config.skillsDir, {
    refreshIntervalMs: config.refreshIntervalMs,
    layout: config.layout,
    ignore: config.ignore,
  });
}
