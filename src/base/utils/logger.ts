/**
 * Structured logging
 *
 * Lines look like `[2024-01-01T00:00:00.000Z] Registry:warn - message [key="value" n=2]`.
 * Debug lines go to stderr and only when the component's debug level is on,
 * so command output on stdout stays clean.
 */

import { isLogComponentDebugEnabled } from './debug.js';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

export type LogContext = Record<string, unknown>;

// Resolved per call so tests can spy on console
const writers: Record<LogLevel, (line: string) => void> = {
  [LogLevel.ERROR]: (line) => console.error(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.INFO]: (line) => console.log(line),
  [LogLevel.DEBUG]: (line) => console.error(line),
};

function formatValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return `"${value}"`;
    case 'object':
      return value === null ? 'null' : JSON.stringify(value);
    default:
      return String(value);
  }
}

/**
 * Render a context object as ` [k="v" n=2]`, or nothing when empty
 */
export function formatContext(context: LogContext): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${formatValue(value)}`);
  return pairs.length > 0 ? ` [${pairs.join(' ')}]` : '';
}

export function formatLogLine(
  level: LogLevel,
  component: string,
  message: string,
  context?: LogContext
): string {
  const suffix = context ? formatContext(context) : '';
  return `[${new Date().toISOString()}] ${component}:${level} - ${message}${suffix}`;
}

/**
 * @param component - Component name (e.g. 'Registry', 'Resolver', 'Config')
 */
export function log(level: LogLevel, component: string, message: string, context?: LogContext): void {
  if (level === LogLevel.DEBUG && !isLogComponentDebugEnabled(component)) return;
  writers[level](formatLogLine(level, component, message, context));
}

type LogMethod = (component: string, message: string, context?: LogContext) => void;

function bind(level: LogLevel): LogMethod {
  return (component, message, context) => log(level, component, message, context);
}

export const logger = {
  error: bind(LogLevel.ERROR),
  warn: bind(LogLevel.WARN),
  info: bind(LogLevel.INFO),
  debug: bind(LogLevel.DEBUG),
};
