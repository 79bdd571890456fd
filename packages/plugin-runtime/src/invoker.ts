/**
 * Highlight invoker
 *
 * Runs a grammar module's entry point and validates what comes back before
 * it reaches the renderer.
 */

import {
  AbortError,
  ExecutionTimeoutError,
  ExecutionTrapError,
  MalformedOutputError,
  decodeParseResult,
  isHighlightError,
  noopLogger,
  type Injection,
  type Logger,
  type Span,
} from '@sprig/plugin-contracts';
import type { PluginInstance } from './instance.js';
import { isModuleExitSignal } from './runtime/capability-env.js';
import { createTimeoutPromise } from './utils.js';

/** Safety net, not a latency target */
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface InvokeOptions {
  /** Bound for one call (default 10s) */
  timeoutMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface InvokeResult {
  spans: Span[];
  injections: Injection[];
  /** Entries the module returned, valid or not */
  total: number;
  /** Entries dropped by validation */
  dropped: number;
  /** Present when anything was dropped */
  diagnostic?: MalformedOutputError;
}

function inBounds(entry: { start: number; end: number }, length: number): boolean {
  return entry.start <= entry.end && entry.end <= length;
}

function toTrap(languageId: string, error: unknown): ExecutionTrapError {
  if (error instanceof ExecutionTrapError) {
    return error;
  }
  if (isModuleExitSignal(error)) {
    return new ExecutionTrapError(languageId, `${languageId}: ${error.message}`, {
      cause: error,
      details: { exit: error.status },
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExecutionTrapError(languageId, `${languageId} trapped: ${message}`, { cause: error });
}

/**
 * Keep only entries whose bounds fit the source.
 */
export function validateOutput(
  languageId: string,
  source: string,
  raw: unknown
): InvokeResult {
  const decoded = decodeParseResult(raw);
  const length = source.length;

  const spans = decoded.spans.filter((span) => inBounds(span, length));
  const injections = decoded.injections.filter((injection) => inBounds(injection, length));

  const total = decoded.spans.length + decoded.injections.length + decoded.rejected;
  const dropped =
    decoded.rejected +
    (decoded.spans.length - spans.length) +
    (decoded.injections.length - injections.length);

  const result: InvokeResult = { spans, injections, total, dropped };
  if (decoded.error !== undefined) {
    result.diagnostic = new MalformedOutputError(languageId, dropped, total, decoded.error);
  } else if (dropped > 0) {
    result.diagnostic = new MalformedOutputError(languageId, dropped, total);
  }
  return result;
}

/**
 * Call `highlight(source)` on an instance.
 *
 * Any trap, exit request or timeout discards the instance and rejects with
 * ExecutionTrapError. Invalid captures are dropped, never thrown.
 */
export async function invokeHighlight(
  instance: PluginInstance,
  source: string,
  options: InvokeOptions = {}
): Promise<InvokeResult> {
  const { signal } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const logger = (options.logger ?? noopLogger).child({
    languageId: instance.languageId,
    instanceId: instance.id,
  });
  const { languageId } = instance;

  if (signal?.aborted) {
    throw new AbortError('Highlight aborted');
  }

  const raw = await instance.runExclusive(async () => {
    // Aborted while queued behind another call
    if (signal?.aborted) {
      throw new AbortError('Highlight aborted');
    }
    const timeout = createTimeoutPromise(
      timeoutMs,
      () => new ExecutionTimeoutError(languageId, timeoutMs),
      signal
    );
    try {
      const call = Promise.resolve().then(() => instance.exports.highlight(source));
      return await Promise.race([call, timeout.promise]);
    } catch (error) {
      // The module may still be running or in an undefined state
      const trap = isHighlightError(error) && error.code === 'ABORTED' ? error : toTrap(languageId, error);
      instance.discard(trap.message);
      logger.warn('Grammar instance discarded', { code: trap.code, reason: trap.message });
      throw trap;
    } finally {
      timeout.cancel();
    }
  });

  const result = validateOutput(languageId, source, raw);
  if (result.diagnostic) {
    logger.warn('Dropped invalid captures', {
      dropped: result.dropped,
      total: result.total,
      reason: result.diagnostic.message,
    });
  }
  logger.debug('Highlight complete', { spans: result.spans.length, injections: result.injections.length });
  return result;
}
