/**
 * Configuration Types
 *
 * Configuration hierarchy (priority from low to high):
 * 1. User Level: ~/.skillroute/settings.json
 * 2. Project Level: <root>/.skillroute/settings.json
 * 3. Local Level: <root>/.skillroute/settings.local.json
 * 4. Environment: SKILLROUTE_* variables
 * 5. CLI Arguments: command line overrides
 */

import type { SettingsInput } from '../utils/config-validator.js';
import type { CategoryTieBreak, SkillLayout } from '../../skills/types.js';

export type Settings = SettingsInput;

export type ConfigLevelType = 'user' | 'project' | 'local' | 'env' | 'cli';

export interface ConfigSource {
  level: ConfigLevelType;
  /** Settings file, absent for env and cli sources */
  path?: string;
  settings: Settings;
}

export interface MergedConfig {
  settings: Settings;
  sources: ConfigSource[];
  projectRoot: string;
}

/**
 * Settings with defaults applied and paths made absolute
 */
export interface ResolvedConfig {
  projectRoot: string;
  skillsDir: string;
  semanticThreshold: number;
  minOverlap: number;
  categoryTieBreak: CategoryTieBreak;
  refreshIntervalMs: number;
  layout: SkillLayout;
  ignore: string[];
}

export const SETTINGS_FILE_NAME = 'settings.json';
export const SETTINGS_LOCAL_FILE_NAME = 'settings.local.json';
export const DEFAULT_SKILLS_DIR = 'skills';

export const ENV_SKILLS_DIR = 'SKILLROUTE_SKILLS_DIR';
export const ENV_SEMANTIC_THRESHOLD = 'SKILLROUTE_SEMANTIC_THRESHOLD';

export interface ConfigManagerOptions {
  cwd?: string;
  /** Overrides ~/.skillroute, e.g. in tests */
  userDir?: string;
  env?: NodeJS.ProcessEnv;
}
