/**
 * @module @sprig/plugin-runtime/utils
 */

import { randomBytes } from 'node:crypto';
import { AbortError } from '@sprig/plugin-contracts';

/**
 * Create unique instance ID.
 * Format: inst_{pid}_{timestamp}_{random}
 *
 * @example "inst_12345_1703088000000_a1b2c3d4"
 */
export function createInstanceId(): string {
  const pid = process.pid;
  const timestamp = Date.now();
  const random = randomBytes(4).toString('hex');
  return `inst_${pid}_${timestamp}_${random}`;
}

export interface TimeoutHandle {
  /** Rejects with the timeout error, or AbortError when the signal fires */
  promise: Promise<never>;
  /** Clear the timer and the abort listener */
  cancel(): void;
}

/**
 * Create a promise that rejects after timeout.
 *
 * Callers must `cancel()` once the raced work settles, otherwise the timer
 * keeps the event loop alive until it fires.
 */
export function createTimeoutPromise(
  timeoutMs: number,
  onTimeout: () => Error,
  signal?: AbortSignal
): TimeoutHandle {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let abortHandler: (() => void) | undefined;

  const cleanup = () => {
    if (timer) {
      clearTimeout(timer);
      timer = undefined;
    }
    if (signal && abortHandler) {
      signal.removeEventListener('abort', abortHandler);
      abortHandler = undefined;
    }
  };

  const promise = new Promise<never>((_, reject) => {
    if (signal?.aborted) {
      reject(new AbortError('Highlight aborted'));
      return;
    }

    timer = setTimeout(() => {
      cleanup();
      reject(onTimeout());
    }, timeoutMs);

    if (signal) {
      abortHandler = () => {
        cleanup();
        reject(new AbortError('Highlight aborted'));
      };
      signal.addEventListener('abort', abortHandler);
    }
  });

  return { promise, cancel: cleanup };
}
