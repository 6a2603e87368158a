import { createConsola, LogLevels, type ConsolaInstance } from 'consola';
import type { LogLevel } from '@roomrelay/shared/config-schema';

/**
 * Logging for the relay, backed by consola.
 *
 * Verbose relay output is written with `logger.debug`, so "verbose logging"
 * simply means running at debug level.
 *
 * @module relay/logger
 */

export interface RelayLoggerOptions {
  /** Enable debug-level output. */
  verbose?: boolean;
  /** Explicit level; wins over `verbose`. */
  level?: LogLevel;
}

/** Numeric consola level for the given options. */
export function resolveLogLevel(options: RelayLoggerOptions = {}): number {
  if (options.level) return LogLevels[options.level];
  return options.verbose ? LogLevels.debug : LogLevels.info;
}

/** Create a tagged relay logger. */
export function createRelayLogger(options: RelayLoggerOptions = {}): ConsolaInstance {
  return createConsola({ level: resolveLogLevel(options) }).withTag('relay');
}

/** Default logger instance (info level). */
export const logger: ConsolaInstance = createRelayLogger();
