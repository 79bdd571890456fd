/**
 * @module @sprig/plugin-runtime/__tests__/invoker
 *
 * Tests for invoking grammar instances: validation, traps, timeouts,
 * aborts and per-instance serialization.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  AbortError,
  ExecutionTimeoutError,
  ExecutionTrapError,
  MalformedOutputError,
  type GrammarExports,
} from '@sprig/plugin-contracts';
import { PluginInstance } from '../instance.js';
import { invokeHighlight, validateOutput } from '../invoker.js';
import { ModuleExitSignal } from '../runtime/index.js';

function createInstance(highlight: GrammarExports['highlight']): PluginInstance {
  return new PluginInstance({
    languageId: 'test',
    interfaceVersion: '0.2.3',
    exports: { highlight },
  });
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('validateOutput', () => {
  it('should keep captures inside the source', () => {
    const result = validateOutput('test', 'hello', {
      spans: [{ start: 0, end: 5, capture: 'keyword' }],
    });

    expect(result).toEqual({
      spans: [{ start: 0, end: 5, capture: 'keyword' }],
      injections: [],
      total: 1,
      dropped: 0,
    });
  });

  it('should drop inverted and out-of-range captures', () => {
    const result = validateOutput('test', 'hello', {
      spans: [
        { start: 0, end: 2, capture: 'keyword' },
        { start: 3, end: 1, capture: 'string' },
        { start: 4, end: 6, capture: 'comment' },
        { start: -1, end: 2, capture: 'type' },
        { start: 0.5, end: 2, capture: 'type' },
      ],
    });

    expect(result.spans).toEqual([{ start: 0, end: 2, capture: 'keyword' }]);
    expect(result.dropped).toBe(4);
    expect(result.total).toBe(5);
    expect(result.diagnostic).toBeInstanceOf(MalformedOutputError);
    expect(result.diagnostic?.message).toBe('test produced 4 of 5 invalid captures');
  });

  it('should allow empty captures at the end of the source', () => {
    const result = validateOutput('test', 'ab', { spans: [{ start: 2, end: 2, capture: 'comment' }] });

    expect(result.dropped).toBe(0);
  });

  it('should validate injections like captures', () => {
    const result = validateOutput('test', 'abc', {
      spans: [],
      injections: [
        { start: 0, end: 3, language: 'css', includeChildren: true },
        { start: 0, end: 9, language: 'js' },
      ],
    });

    expect(result.injections).toEqual([{ start: 0, end: 3, language: 'css', includeChildren: true }]);
    expect(result.dropped).toBe(1);
  });

  it('should treat an undecodable payload as all invalid', () => {
    const result = validateOutput('test', 'abc', undefined);

    expect(result.spans).toEqual([]);
    expect(result.total).toBe(0);
    expect(result.diagnostic?.code).toBe('MALFORMED_OUTPUT');
  });
});

describe('invokeHighlight', () => {
  it('should return validated spans', async () => {
    const instance = createInstance(() => ({ spans: [{ start: 0, end: 3, capture: 'keyword' }] }));

    const result = await invokeHighlight(instance, 'let');

    expect(result.spans).toEqual([{ start: 0, end: 3, capture: 'keyword' }]);
    expect(instance.callCount).toBe(1);
    expect(instance.discarded).toBe(false);
  });

  it('should accept asynchronous engines', async () => {
    const instance = createInstance(async () => ({ spans: [] }));

    await expect(invokeHighlight(instance, 'x')).resolves.toMatchObject({ spans: [], dropped: 0 });
  });

  it('should turn a trap into ExecutionTrapError and discard the instance', async () => {
    const instance = createInstance(() => {
      throw new WebAssembly.RuntimeError('unreachable');
    });

    const promise = invokeHighlight(instance, 'x');

    await expect(promise).rejects.toBeInstanceOf(ExecutionTrapError);
    await expect(promise).rejects.toThrow('test trapped: unreachable');
    expect(instance.discarded).toBe(true);
  });

  it('should report a module exit as a trap', async () => {
    const instance = createInstance(() => {
      throw new ModuleExitSignal({ tag: 'err' });
    });

    await expect(invokeHighlight(instance, 'x')).rejects.toMatchObject({
      code: 'EXECUTION_TRAP',
      message: 'test: Module exited with error',
    });
    expect(instance.discarded).toBe(true);
  });

  it('should refuse calls on a discarded instance', async () => {
    const highlight = vi.fn(() => ({ spans: [] }));
    const instance = createInstance(highlight);
    instance.discard('test');

    await expect(invokeHighlight(instance, 'x')).rejects.toBeInstanceOf(ExecutionTrapError);
    expect(highlight).not.toHaveBeenCalled();
  });

  it('should time out and discard a call that never returns', async () => {
    const instance = createInstance(() => new Promise(() => {}));

    const promise = invokeHighlight(instance, 'x', { timeoutMs: 20 });

    await expect(promise).rejects.toBeInstanceOf(ExecutionTimeoutError);
    await expect(promise).rejects.toMatchObject({
      code: 'EXECUTION_TIMEOUT',
      message: 'Highlighting test timed out after 20ms',
    });
    expect(instance.discarded).toBe(true);
  });

  it('should reject queued calls when the running one times out', async () => {
    const instance = createInstance(() => new Promise(() => {}));

    const first = invokeHighlight(instance, 'a', { timeoutMs: 20 });
    const second = invokeHighlight(instance, 'b', { timeoutMs: 20 });

    const [firstResult, secondResult] = await Promise.allSettled([first, second]);

    expect(firstResult.status === 'rejected' && firstResult.reason).toBeInstanceOf(ExecutionTimeoutError);
    expect(secondResult.status === 'rejected' && secondResult.reason).toMatchObject({
      code: 'EXECUTION_TRAP',
      message: 'Instance for test was discarded: Highlighting test timed out after 20ms',
    });
    expect(instance.callCount).toBe(1);
  });

  it('should not call the module when already aborted', async () => {
    const highlight = vi.fn(() => ({ spans: [] }));
    const instance = createInstance(highlight);
    const controller = new AbortController();
    controller.abort();

    await expect(invokeHighlight(instance, 'x', { signal: controller.signal })).rejects.toBeInstanceOf(
      AbortError
    );
    expect(highlight).not.toHaveBeenCalled();
    expect(instance.discarded).toBe(false);
  });

  it('should abort a running call and discard the instance', async () => {
    const instance = createInstance(() => new Promise(() => {}));
    const controller = new AbortController();

    const promise = invokeHighlight(instance, 'x', { signal: controller.signal });
    setTimeout(() => controller.abort(), 5);

    await expect(promise).rejects.toMatchObject({ code: 'ABORTED' });
    expect(instance.discarded).toBe(true);
  });

  it('should serialize calls on one instance', async () => {
    const gate = deferred<void>();
    let active = 0;
    let maxActive = 0;
    const instance = createInstance(async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await gate.promise;
      active--;
      return { spans: [] };
    });

    const calls = [invokeHighlight(instance, 'a'), invokeHighlight(instance, 'b'), invokeHighlight(instance, 'c')];
    gate.resolve();
    await Promise.all(calls);

    expect(maxActive).toBe(1);
    expect(instance.callCount).toBe(3);
  });

  it('should not block other instances', async () => {
    const blocked = createInstance(() => new Promise(() => {}));
    const free = createInstance(() => ({ spans: [] }));

    const pending = invokeHighlight(blocked, 'x', { timeoutMs: 50 });
    await expect(invokeHighlight(free, 'y')).resolves.toMatchObject({ dropped: 0 });
    await expect(pending).rejects.toBeInstanceOf(ExecutionTimeoutError);
  });

  it('should log dropped captures', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
    logger.child.mockReturnValue(logger);
    const instance = createInstance(() => ({ spans: [{ start: 0, end: 9, capture: 'keyword' }] }));

    await invokeHighlight(instance, 'x', { logger });

    expect(logger.child).toHaveBeenCalledWith({ languageId: 'test', instanceId: instance.id });
    expect(logger.warn).toHaveBeenCalledWith('Dropped invalid captures', {
      dropped: 1,
      total: 1,
      reason: 'test produced 1 of 1 invalid captures',
    });
  });
});

describe('PluginInstance', () => {
  it('should release the module once when discarded', () => {
    const dispose = vi.fn();
    const instance = new PluginInstance({
      languageId: 'test',
      interfaceVersion: '0.2.3',
      exports: { highlight: () => ({ spans: [] }), dispose },
    });

    instance.discard('first');
    instance.discard('second');

    expect(dispose).toHaveBeenCalledTimes(1);
  });

  it('should let queued calls finish before releasing a closed instance', async () => {
    const gate = deferred<void>();
    const dispose = vi.fn();
    const instance = new PluginInstance({
      languageId: 'test',
      interfaceVersion: '0.2.3',
      exports: {
        highlight: async () => {
          await gate.promise;
          return { spans: [] };
        },
        dispose,
      },
    });

    const first = invokeHighlight(instance, 'a');
    const second = invokeHighlight(instance, 'b');
    await Promise.resolve();
    instance.close('evicted');

    expect(instance.discarded).toBe(true);
    await expect(invokeHighlight(instance, 'c')).rejects.toMatchObject({
      message: 'Instance for test was discarded: evicted',
    });
    expect(dispose).not.toHaveBeenCalled();

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toHaveLength(2);
    expect(dispose).toHaveBeenCalledTimes(1);
  });

  it('should release an idle instance as soon as it is closed', () => {
    const dispose = vi.fn();
    const instance = new PluginInstance({
      languageId: 'test',
      interfaceVersion: '0.2.3',
      exports: { highlight: () => ({ spans: [] }), dispose },
    });

    instance.close('evicted');

    expect(dispose).toHaveBeenCalledTimes(1);
  });
});
