/**
 * Error types
 *
 * Load-time failures surface as one of these. Resolving a request never throws:
 * "no skill found" is a normal MatchResult, not an error.
 */

export type SkillrouteErrorCode = 'NOT_FOUND' | 'PARSE_ERROR' | 'CONFIG_ERROR';

export class SkillrouteError extends Error {
  readonly code: SkillrouteErrorCode;

  constructor(code: SkillrouteErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when the skill source directory is missing or is not a directory.
 */
export class NotFoundError extends SkillrouteError {
  readonly path: string;

  constructor(path: string, message = `Skill directory not found: ${path}`) {
    super('NOT_FOUND', message);
    this.path = path;
  }
}

/**
 * Raised when a skill document cannot be turned into a SkillRecord.
 */
export class ParseError extends SkillrouteError {
  readonly filePath: string;
  readonly issues: string[];

  constructor(filePath: string, issues: string[]) {
    super('PARSE_ERROR', `Invalid skill document ${filePath}: ${issues.join('; ')}`);
    this.filePath = filePath;
    this.issues = issues;
  }
}

export class ConfigError extends SkillrouteError {
  readonly filePath?: string;
  readonly issues: string[];

  constructor(issues: string[], filePath?: string) {
    const where = filePath ? ` in ${filePath}` : '';
    super('CONFIG_ERROR', `Invalid configuration${where}: ${issues.join('; ')}`);
    this.filePath = filePath;
    this.issues = issues;
  }
}

export function isSkillrouteError(error: unknown): error is SkillrouteError {
  return error instanceof SkillrouteError;
}
