/**
 * Standard stream shims handed to sandboxed modules
 */

import type { InputStreamHandle, OutputStreamHandle } from '@sprig/plugin-contracts';

/** Bytes an output stream claims it can take in one write */
export const WRITE_BUDGET = 1024 * 1024;

/**
 * Output stream that drops everything written to it.
 *
 * Writes always succeed with the full byte count, so a module never spins
 * retrying output it believes failed.
 */
export class DiscardingOutputStream implements OutputStreamHandle {
  constructor(private readonly onWrite?: (bytes: number) => void) {}

  checkWrite(): bigint {
    return BigInt(WRITE_BUDGET);
  }

  write(contents: Uint8Array): bigint {
    this.onWrite?.(contents.byteLength);
    return BigInt(contents.byteLength);
  }

  blockingWriteAndFlush(contents: Uint8Array): bigint {
    return this.write(contents);
  }

  blockingFlush(): void {
    // Nothing buffered
  }
}

/**
 * Input stream that is already at end of input.
 */
export class EmptyInputStream implements InputStreamHandle {
  constructor(private readonly onRead?: () => void) {}

  read(_len: bigint): Uint8Array {
    this.onRead?.();
    return new Uint8Array(0);
  }

  blockingRead(len: bigint): Uint8Array {
    return this.read(len);
  }
}
