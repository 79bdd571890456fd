/**
 * @module @sprig/plugin-contracts/logger
 */

/**
 * Structured logger used across the host.
 */
export interface Logger {
  /**
   * Debug level log (only shown in verbose mode)
   */
  debug(message: string, meta?: Record<string, unknown>): void;

  /**
   * Info level log
   */
  info(message: string, meta?: Record<string, unknown>): void;

  /**
   * Warning level log
   */
  warn(message: string, meta?: Record<string, unknown>): void;

  /**
   * Error level log
   */
  error(message: string, meta?: Record<string, unknown> | Error): void;

  /**
   * Logger with extra fields bound to every entry
   */
  child(fields: Record<string, unknown>): Logger;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logger that drops everything.
 */
export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return noopLogger;
  },
};
