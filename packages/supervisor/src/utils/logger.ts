/**
 * Logger Utility
 *
 * Provides a structured logging framework with level-based filtering.
 * Supports DEBUG, INFO, WARNING, and ERROR levels. The minimum level comes
 * from `setLogLevel` (fed from the supervisor configuration) and otherwise
 * from the LOG_LEVEL environment variable.
 *
 * Usage:
 *   import { createLogger } from '../utils/logger.js';
 *   const logger = createLogger('patrol-loop');
 *   logger.info('Cycle complete');
 *   logger.debug('Gate closed');
 *   logger.warn('Theme failed');
 *   logger.error('Ledger write failed', error);
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Supported log levels in ascending severity order.
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

/**
 * Logger interface with leveled logging methods.
 */
export interface Logger {
  /** Log at DEBUG level: per-cycle detail (gate decisions, poll attempts) */
  debug(message: string, ...args: unknown[]): void;
  /** Log at INFO level: key events (session started, cycle complete) */
  info(message: string, ...args: unknown[]): void;
  /** Log at WARNING level: swallowed best-effort failures */
  warn(message: string, ...args: unknown[]): void;
  /** Log at ERROR level: critical failures */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

let overrideLevel: LogLevel | undefined;

// ============================================================================
// Log Level Resolution
// ============================================================================

/**
 * Type guard for LogLevel strings
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'DEBUG' || value === 'INFO' || value === 'WARNING' || value === 'ERROR';
}

/**
 * Sets (or clears, with undefined) the process-wide minimum level.
 */
export function setLogLevel(level: LogLevel | undefined): void {
  overrideLevel = level;
}

/**
 * Resolves the current log level: explicit override first, then the
 * LOG_LEVEL environment variable, then INFO.
 *
 * The environment is read on each call so changes take effect immediately.
 */
export function getLogLevel(): LogLevel {
  if (overrideLevel) {
    return overrideLevel;
  }
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return DEFAULT_LOG_LEVEL;
}

function shouldLog(messageLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[messageLevel] >= LOG_LEVEL_VALUES[getLogLevel()];
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a scoped logger instance with the given service name prefix.
 *
 * @example
 * ```ts
 * const logger = createLogger('session-lifecycle');
 * logger.info('Started gt-mayor');
 * // Output: [session-lifecycle] Started gt-mayor
 * ```
 */
export function createLogger(serviceName: string): Logger {
  const prefix = `[${serviceName}]`;

  return {
    debug(message: string, ...args: unknown[]): void {
      if (shouldLog('DEBUG')) {
        console.debug(prefix, message, ...args);
      }
    },

    info(message: string, ...args: unknown[]): void {
      if (shouldLog('INFO')) {
        console.log(prefix, message, ...args);
      }
    },

    warn(message: string, ...args: unknown[]): void {
      if (shouldLog('WARNING')) {
        console.warn(prefix, message, ...args);
      }
    },

    error(message: string, ...args: unknown[]): void {
      if (shouldLog('ERROR')) {
        console.error(prefix, message, ...args);
      }
    },
  };
}
