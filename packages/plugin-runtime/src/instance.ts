/**
 * Live grammar module instance
 */

import { ExecutionTrapError, type GrammarExports, type ModuleLocation } from '@sprig/plugin-contracts';
import { createInstanceId } from './utils.js';

export interface PluginInstanceInit {
  languageId: string;
  interfaceVersion: string;
  exports: GrammarExports;
  location?: ModuleLocation;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * One instantiated grammar module.
 *
 * Calls into the module are serialized per instance. After a trap or a
 * timeout the instance is discarded: queued calls are rejected, the module
 * is released and the registry re-instantiates on the next acquire.
 */
export class PluginInstance {
  readonly id = createInstanceId();
  readonly languageId: string;
  readonly interfaceVersion: string;
  readonly exports: GrammarExports;
  readonly location?: ModuleLocation;
  readonly createdAt = Date.now();

  private busy = false;
  private readonly waiters: Waiter[] = [];
  private discardReason?: string;
  private released = false;
  private calls = 0;

  constructor(init: PluginInstanceInit) {
    this.languageId = init.languageId;
    this.interfaceVersion = init.interfaceVersion;
    this.exports = init.exports;
    this.location = init.location;
  }

  /** Cache key: `languageId@interfaceVersion` */
  get key(): string {
    return `${this.languageId}@${this.interfaceVersion}`;
  }

  get discarded(): boolean {
    return this.discardReason !== undefined;
  }

  /** Number of calls that entered the module */
  get callCount(): number {
    return this.calls;
  }

  /**
   * Mark the instance unusable and release the module now. Queued calls are
   * rejected. The first reason wins.
   */
  discard(reason: string): void {
    this.discardReason ??= reason;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(this.discardedError());
    }
    this.release();
  }

  /**
   * Refuse new calls, let queued ones finish, then release the module.
   */
  close(reason: string): void {
    if (this.discardReason !== undefined) {
      return;
    }
    this.discardReason = reason;
    if (!this.busy) {
      this.release();
    }
  }

  /**
   * Run a task with exclusive access to the module.
   */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    await this.lock();
    try {
      this.calls++;
      return await task();
    } finally {
      this.unlock();
    }
  }

  private async lock(): Promise<void> {
    if (this.discardReason !== undefined) {
      throw this.discardedError();
    }
    if (!this.busy) {
      this.busy = true;
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private unlock(): void {
    const next = this.waiters.shift();
    if (next) {
      next.resolve();
    } else {
      this.busy = false;
      if (this.discardReason !== undefined) {
        this.release();
      }
    }
  }

  private release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.exports.dispose?.();
  }

  private discardedError(): ExecutionTrapError {
    return new ExecutionTrapError(
      this.languageId,
      `Instance for ${this.languageId} was discarded: ${this.discardReason ?? 'unknown'}`,
      { details: { instanceId: this.id } }
    );
  }
}
