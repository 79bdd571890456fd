/**
 * pino-backed implementation of the host Logger
 */

import { pino, type DestinationStream, type Logger as PinoLogger } from 'pino';
import type { Logger, LogLevel } from '@sprig/plugin-contracts';

type Fields = Record<string, unknown>;

export interface CreateLoggerOptions {
  /** Minimum level (default: SPRIG_LOG_LEVEL, then 'warn') */
  level?: LogLevel;
  /** Fields bound to every entry */
  fields?: Fields;
  /** Where entries go (default: stdout) */
  destination?: DestinationStream;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVELS.some((level) => level === value);
}

/**
 * Adapt pino's `(fields, message)` order to `(message, fields)`.
 */
function wrap(base: PinoLogger): Logger {
  return {
    debug(message: string, meta?: Fields) {
      base.debug(meta ?? {}, message);
    },
    info(message: string, meta?: Fields) {
      base.info(meta ?? {}, message);
    },
    warn(message: string, meta?: Fields) {
      base.warn(meta ?? {}, message);
    },
    error(message: string, meta?: Fields | Error) {
      if (meta instanceof Error) {
        base.error({ err: meta }, message);
      } else {
        base.error(meta ?? {}, message);
      }
    },
    child(fields: Fields) {
      return wrap(base.child(fields));
    },
  };
}

/**
 * Create a logger for one host component.
 *
 * @example
 * const log = createLogger('registry', { level: 'debug' });
 * log.info('Grammar loaded', { languageId: 'rust' });
 */
export function createLogger(category: string, options: CreateLoggerOptions = {}): Logger {
  const envLevel = process.env.SPRIG_LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'warn');
  const config = {
    name: 'sprig',
    level,
    base: { category, ...options.fields },
  };
  return wrap(options.destination ? pino(config, options.destination) : pino(config));
}
