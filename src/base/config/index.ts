/**
 * Configuration Module
 */

export type {
  Settings,
  ConfigLevelType,
  ConfigSource,
  MergedConfig,
  ResolvedConfig,
  ConfigManagerOptions,
} from './types.js';

export {
  SETTINGS_FILE_NAME,
  SETTINGS_LOCAL_FILE_NAME,
  DEFAULT_SKILLS_DIR,
  ENV_SKILLS_DIR,
  ENV_SEMANTIC_THRESHOLD,
} from './types.js';

export { loadSettingsFile, loadEnvSettings, loadAllSources } from './loader.js';
export { mergeTwo, mergeSettings } from './merger.js';
export { ConfigManager, applyDefaults, createRegistryCache, toResolverOptions } from './manager.js';
