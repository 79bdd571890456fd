/**
 * @module @sprig/plugin-runtime/__tests__/process-engine
 *
 * Tests for running grammar modules in forked processes, including
 * preempting a module that never returns.
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  ExecutionTimeoutError,
  InstantiationError,
  type CapabilityEnvironment,
  type GrammarExports,
} from '@sprig/plugin-contracts';
import { ProcessEngine } from '../engine/index.js';
import { PluginInstance } from '../instance.js';
import { invokeHighlight } from '../invoker.js';
import { createCapabilityEnvironment, type CapabilityEvent } from '../runtime/index.js';
import { I32, RETPTR, SPIN, buildGrammarModule, call, i32, op, type GrammarFixture } from './wasm-builder.js';

const started: GrammarExports[] = [];

async function instantiate(
  fixture: GrammarFixture,
  onEffect?: (languageId: string, event: CapabilityEvent) => void
): Promise<GrammarExports> {
  const engine = new ProcessEngine({ onEffect });
  const grammar = await engine.instantiate(buildGrammarModule(fixture), {
    languageId: 'test',
    environment: createCapabilityEnvironment(),
  });
  started.push(grammar);
  return grammar;
}

function createInstance(exports: GrammarExports): PluginInstance {
  return new PluginInstance({ languageId: 'test', interfaceVersion: '0.2.3', exports });
}

afterEach(() => {
  for (const grammar of started.splice(0)) {
    grammar.dispose?.();
  }
});

describe('ProcessEngine', { timeout: 20_000 }, () => {
  it('should return the payload from the grammar process', async () => {
    const grammar = await instantiate({
      payload: '{"spans":[{"start":0,"end":5,"capture":"keyword"}]}',
    });

    await expect(grammar.highlight('hello')).resolves.toEqual({
      spans: [{ start: 0, end: 5, capture: 'keyword' }],
    });
  });

  it('should answer languageId with what the module reported', async () => {
    const grammar = await instantiate({ languageId: 'rust' });

    expect(grammar.languageId?.()).toBe('rust');
  });

  it('should carry instantiation errors back with their code', async () => {
    const engine = new ProcessEngine();

    const promise = engine.instantiate(buildGrammarModule({ omit: ['highlight'] }), {
      languageId: 'test',
      environment: createCapabilityEnvironment(),
    });

    await expect(promise).rejects.toBeInstanceOf(InstantiationError);
    await expect(promise).rejects.toMatchObject({
      code: 'MISSING_EXPORT',
      message: 'Grammar module for test is missing exports: highlight',
    });
  });

  it('should refuse an environment for another interface version without forking', async () => {
    const environment: CapabilityEnvironment = { ...createCapabilityEnvironment(), version: '0.3.0' };

    await expect(
      new ProcessEngine().instantiate(buildGrammarModule({}), { languageId: 'test', environment })
    ).rejects.toMatchObject({ code: 'INCOMPATIBLE_INTERFACE' });
  });

  it('should report traps as ExecutionTrapError through the invoker', async () => {
    const instance = createInstance(await instantiate({ highlightBody: [op.unreachable] }));

    await expect(invokeHighlight(instance, 'x')).rejects.toMatchObject({
      code: 'EXECUTION_TRAP',
      message: 'test trapped: unreachable',
    });
    expect(instance.discarded).toBe(true);
  });

  it('should report exit requests and their effects', async () => {
    const onEffect = vi.fn();
    const instance = createInstance(
      await instantiate(
        {
          imports: [{ module: 'wasi:cli/exit@0.2.3', name: 'exit', params: [I32] }],
          prelude: [...i32(1), ...call(0)],
        },
        onEffect
      )
    );

    await expect(invokeHighlight(instance, 'x')).rejects.toMatchObject({
      code: 'EXECUTION_TRAP',
      message: 'test: Module exited with error (1)',
      details: { exit: { tag: 'err', val: 1 } },
    });
    expect(onEffect).toHaveBeenCalledWith('test', { kind: 'exit', status: { tag: 'err', val: 1 } });
  });

  it('should stop a module that never returns and kill its process', async () => {
    const grammar = await instantiate({ highlightBody: [...SPIN, ...i32(RETPTR)] });
    const instance = createInstance(grammar);

    const promise = invokeHighlight(instance, 'x', { timeoutMs: 100 });

    await expect(promise).rejects.toBeInstanceOf(ExecutionTimeoutError);
    await expect(promise).rejects.toMatchObject({ message: 'Highlighting test timed out after 100ms' });
    expect(instance.discarded).toBe(true);
    await expect(grammar.highlight('y')).rejects.toThrow('Grammar process for test is not running');
  });

  it('should keep serving calls after a fast one completes', async () => {
    const instance = createInstance(await instantiate({ payload: '{"spans":[]}' }));

    await invokeHighlight(instance, 'a', { timeoutMs: 5_000 });
    const second = await invokeHighlight(instance, 'b', { timeoutMs: 5_000 });

    expect(second.spans).toEqual([]);
    expect(instance.callCount).toBe(2);
  });
});
