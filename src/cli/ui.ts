/**
 * CLI output helpers
 */

import chalk from 'chalk';
import type { MatchTier } from '../skills/types.js';

export const colors = {
  primary: chalk.cyan,
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  muted: chalk.dim,
  highlight: chalk.bold.white,
};

/**
 * Where command output goes; the CLI binds this to stdout/stderr
 */
export interface Output {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const consoleOutput: Output = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function tierColor(tier: MatchTier): (text: string) => string {
  switch (tier) {
    case 'exact':
      return colors.success;
    case 'semantic':
      return colors.primary;
    case 'category':
      return colors.warning;
    case 'none':
      return colors.muted;
  }
}

export function formatError(message: string): string {
  return `${colors.error('✖')} ${message}`;
}
