/**
 * @module @sprig/plugin-runtime/engine/grammar-process
 *
 * Grammar process entry point, forked by ProcessEngine.
 * Hosts one module on WebAssemblyEngine and answers highlight requests over
 * IPC. The parent kills the process when a call overruns its timeout.
 */

import { normalizeError, type GrammarExports } from '@sprig/plugin-contracts';
import { createCapabilityEnvironment, isModuleExitSignal } from '../runtime/capability-env.js';
import { parentMessageSchema, type ChildMessage } from './process-protocol.js';
import { WebAssemblyEngine } from './webassembly-engine.js';

let grammar: GrammarExports | undefined;

function send(message: ChildMessage): void {
  process.send?.(message);
}

async function handleInstantiate(languageId: string, bytes: Uint8Array): Promise<void> {
  if (grammar) {
    send({
      type: 'failed',
      error: { name: 'InstantiationError', message: 'Grammar process already hosts a module', code: 'INSTANTIATION_FAILED' },
    });
    return;
  }
  try {
    const environment = createCapabilityEnvironment({
      onEffect: (event) => send({ type: 'effect', event }),
    });
    const instantiated = await new WebAssemblyEngine().instantiate(bytes, { languageId, environment });
    // language-id is read once here; the parent answers it synchronously
    const reported = instantiated.languageId?.();
    grammar = instantiated;
    send({ type: 'instantiated', languageId: reported });
  } catch (error) {
    const { name, message, code, details } = normalizeError(error);
    send({ type: 'failed', error: { name, message, code, details } });
  }
}

async function handleHighlight(requestId: number, source: string): Promise<void> {
  if (!grammar) {
    send({ type: 'error', requestId, message: 'No grammar module instantiated' });
    return;
  }
  try {
    const payload = await grammar.highlight(source);
    send({ type: 'result', requestId, payload });
  } catch (error) {
    send({
      type: 'error',
      requestId,
      message: error instanceof Error ? error.message : String(error),
      exit: isModuleExitSignal(error) ? error.status : undefined,
    });
  }
}

function onMessage(raw: unknown): void {
  const parsed = parentMessageSchema.safeParse(raw);
  if (!parsed.success) {
    console.error('[grammar-process] Ignoring malformed message:', parsed.error.message);
    return;
  }
  const message = parsed.data;
  switch (message.type) {
    case 'instantiate':
      void handleInstantiate(message.languageId, message.bytes);
      break;

    case 'highlight':
      void handleHighlight(message.requestId, message.source);
      break;
  }
}

process.on('message', onMessage);

// The parent going away takes the grammar with it
process.on('disconnect', () => {
  process.exit(0);
});

process.on('uncaughtException', (error) => {
  console.error('[grammar-process] Uncaught exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('[grammar-process] Unhandled rejection:', reason);
  process.exit(1);
});

send({ type: 'ready', pid: process.pid });
