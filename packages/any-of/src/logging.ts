/**
 * Logging
 *
 * Tag-prefixed console output, gated by `log.level` (or `debug: true`).
 */

import { config, type LogLevel } from "./config.js";

const PREFIX = "[any-of]";

const SEVERITY: Readonly<Record<LogLevel, number>> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

/**
 * Effective level: `debug: true` overrides `log.level`.
 */
export function currentLevel(): LogLevel {
  const { debug, log } = config.getAll();
  return debug ? "debug" : log.level;
}

export function isLevelEnabled(level: Exclude<LogLevel, "silent">): boolean {
  return SEVERITY[level] <= SEVERITY[currentLevel()];
}

export const logger = {
  error(message: string, ...details: unknown[]): void {
    if (isLevelEnabled("error")) console.error(`${PREFIX} ${message}`, ...details);
  },
  warn(message: string, ...details: unknown[]): void {
    if (isLevelEnabled("warn")) console.warn(`${PREFIX} ${message}`, ...details);
  },
  info(message: string, ...details: unknown[]): void {
    if (isLevelEnabled("info")) console.info(`${PREFIX} ${message}`, ...details);
  },
  debug(message: string, ...details: unknown[]): void {
    if (isLevelEnabled("debug")) console.debug(`${PREFIX} ${message}`, ...details);
  },
};
