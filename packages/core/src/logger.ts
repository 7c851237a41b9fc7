/**
 * Logging - pino loggers scoped per component
 *
 * The root logger level comes from PKGMETA_LOG_LEVEL (default: warn) and writes
 * to stderr so command output on stdout stays machine-readable. Components take
 * an optional logger so callers can inject their own.
 */

import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS: readonly LevelWithSilent[] = [ 'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent' ];

let rootLogger: Logger | null = null;

/**
 * Check whether a string names a pino level.
 */
export function isLogLevel(value: string): value is LevelWithSilent {
   return LOG_LEVELS.some((level) => {
      return level === value;
   });
}

/**
 * Resolve the log level from the environment.
 */
export function getDefaultLogLevel(): LevelWithSilent {
   // eslint-disable-next-line no-process-env
   const envLevel = process.env.PKGMETA_LOG_LEVEL?.toLowerCase();

   return envLevel && isLogLevel(envLevel) ? envLevel : 'warn';
}

/**
 * Get a logger for a component.
 *
 * @param scope - Component name, bound as `scope` on every line
 */
export function getLogger(scope?: string): Logger {
   if (!rootLogger) {
      rootLogger = pino({ name: 'pkgmeta', level: getDefaultLogLevel() }, pino.destination(2));
   }

   return scope ? rootLogger.child({ scope }) : rootLogger;
}

/**
 * Change the level of the root logger (and of children created afterwards).
 */
export function setLogLevel(level: LevelWithSilent): void {
   getLogger().level = level;
}

/**
 * Drop the cached root logger so the next call re-reads the environment.
 */
export function resetLogger(): void {
   rootLogger = null;
}
