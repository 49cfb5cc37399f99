/**
 * Configuration Loader - Load settings from each level
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { ConfigSource, Settings } from './types.js';
import {
  ENV_SEMANTIC_THRESHOLD,
  ENV_SKILLS_DIR,
  SETTINGS_FILE_NAME,
  SETTINGS_LOCAL_FILE_NAME,
} from './types.js';
import { SettingsSchema, validateConfig } from '../utils/config-validator.js';
import { ConfigError } from '../errors.js';
import { SKILLROUTE_DIR } from '../utils/path-utils.js';
import { logger } from '../utils/logger.js';

// fs errors come from another realm under Jest, so no instanceof Error here
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load and validate one JSON settings file
 *
 * @returns null when the file does not exist
 * @throws ConfigError when the file is not valid JSON or fails the schema
 */
export async function loadSettingsFile(filePath: string): Promise<Settings | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`invalid JSON: ${message}`], filePath);
  }

  const validation = validateConfig(SettingsSchema, data);
  if (!validation.valid || !validation.data) {
    throw new ConfigError(validation.errors ?? ['unknown validation error'], filePath);
  }

  logger.debug('Config', 'Loaded settings file', { file: filePath });
  return validation.data;
}

/**
 * Read the SKILLROUTE_* environment variables
 *
 * @throws ConfigError when a variable holds an invalid value
 */
export function loadEnvSettings(env: NodeJS.ProcessEnv): Settings {
  const raw: Record<string, unknown> = {};

  const skillsDir = env[ENV_SKILLS_DIR]?.trim();
  if (skillsDir) {
    raw.skillsDir = skillsDir;
  }

  const threshold = env[ENV_SEMANTIC_THRESHOLD]?.trim();
  if (threshold) {
    const value = Number(threshold);
    if (Number.isNaN(value)) {
      throw new ConfigError([`${ENV_SEMANTIC_THRESHOLD}: expected a number, got "${threshold}"`]);
    }
    raw.semanticThreshold = value;
  }

  const validation = validateConfig(SettingsSchema, raw);
  if (!validation.valid || !validation.data) {
    throw new ConfigError(validation.errors ?? ['unknown validation error']);
  }
  return validation.data;
}

/**
 * Load all configuration sources, lowest priority first
 */
export async function loadAllSources(
  projectRoot: string,
  userDir: string,
  env: NodeJS.ProcessEnv
): Promise<ConfigSource[]> {
  const projectDir = path.join(projectRoot, SKILLROUTE_DIR);
  const files: Array<{ level: ConfigSource['level']; path: string }> = [
    { level: 'user', path: path.join(userDir, SETTINGS_FILE_NAME) },
    { level: 'project', path: path.join(projectDir, SETTINGS_FILE_NAME) },
    { level: 'local', path: path.join(projectDir, SETTINGS_LOCAL_FILE_NAME) },
  ];

  const sources: ConfigSource[] = [];
  for (const file of files) {
    const settings = await loadSettingsFile(file.path);
    if (settings) {
      sources.push({ level: file.level, path: file.path, settings });
    }
  }

  const envSettings = loadEnvSettings(env);
  if (Object.keys(envSettings).length > 0) {
    sources.push({ level: 'env', settings: envSettings });
  }

  return sources;
}
