/**
 * Logger
 *
 * Console-backed logger with a level threshold. The threshold comes from
 * CONTENT_LOG_LEVEL through the application config and can be overridden
 * at runtime with setLogLevel().
 */

import { getConfig } from '../config.js';

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  none: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

let levelOverride: LogLevel | null = null;

/**
 * Override the configured log level (pass null to go back to the config)
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level;
}

function enabled(level: LogLevel): boolean {
  const threshold = levelOverride ?? getConfig().logLevel;
  return LEVEL_ORDER[level] <= LEVEL_ORDER[threshold];
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (enabled('debug')) console.debug(`[content] ${message}`, ...args);
  },
  info(message: string, ...args: unknown[]): void {
    if (enabled('info')) console.log(`[content] ${message}`, ...args);
  },
  warn(message: string, ...args: unknown[]): void {
    if (enabled('warn')) console.warn(`[content] ${message}`, ...args);
  },
  error(message: string, ...args: unknown[]): void {
    if (enabled('error')) console.error(`[content] ${message}`, ...args);
  },
};
