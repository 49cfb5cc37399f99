/**
 * skillroute - load Markdown skill documents and route requests to them
 */

export * from './skills/index.js';
export * from './base/errors.js';
export * from './base/config/index.js';
export { logger, LogLevel, type LogContext } from './base/utils/logger.js';
export { resetDebugConfig } from './base/utils/debug.js';
export { SkillFrontmatterSchema, SettingsSchema, type SkillFrontmatter } from './base/utils/config-validator.js';
