/**
 * @module @sprig/plugin-runtime/engine/process-engine
 *
 * Sandbox engine that runs each grammar module in its own child process.
 *
 * WebAssembly calls run to completion on the thread that makes them, so a
 * timer on that thread cannot stop a module stuck in a loop. Here the call
 * runs in a forked process and `dispose()` kills it: a timed-out or discarded
 * instance takes its process with it.
 *
 * Lifecycle of one grammar process:
 * 1. fork the entry script
 * 2. wait for 'ready', send the module bytes
 * 3. wait for 'instantiated' (or 'failed')
 * 4. answer 'highlight' requests until killed
 */

import { fork, type ChildProcess } from 'node:child_process';
import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  INTERFACE_VERSION,
  InstantiationError,
  type GrammarExports,
  type InstantiateOptions,
  type InstantiationErrorCode,
  type SandboxEngine,
} from '@sprig/plugin-contracts';
import { ModuleExitSignal, type CapabilityEvent } from '../runtime/capability-env.js';
import { createTimeoutPromise } from '../utils.js';
import { childMessageSchema, type ChildMessage, type ParentMessage } from './process-protocol.js';

const DEFAULT_STARTUP_TIMEOUT_MS = 10_000;

const INSTANTIATION_CODES: readonly InstantiationErrorCode[] = [
  'MALFORMED_MODULE',
  'UNSATISFIED_IMPORT',
  'INCOMPATIBLE_INTERFACE',
  'MISSING_EXPORT',
  'INSTANTIATION_FAILED',
];

function isInstantiationCode(code: string): code is InstantiationErrorCode {
  return INSTANTIATION_CODES.some((known) => known === code);
}

/**
 * Entry script beside this module: grammar-process.ts when running from
 * sources, grammar-process.js in a build.
 */
function defaultScript(): string {
  const extension = extname(fileURLToPath(import.meta.url));
  return fileURLToPath(new URL(`./grammar-process${extension}`, import.meta.url));
}

/** A TypeScript entry script is loaded through tsx */
function defaultExecArgv(script: string): string[] {
  return extname(script) === '.ts' ? ['--import', 'tsx'] : [];
}

export interface ProcessEngineOptions {
  /** Grammar process entry script (default: grammar-process beside this module) */
  script?: string;
  /** Node.js flags for the child (default: `--import tsx` for a .ts script) */
  execArgv?: string[];
  /** Bound for fork plus instantiation (default 10s) */
  startupTimeoutMs?: number;
  /** Effects the module attempted, reported from its process */
  onEffect?: (languageId: string, event: CapabilityEvent) => void;
}

interface Pending {
  resolve: (payload: unknown) => void;
  reject: (error: Error) => void;
}

interface Startup {
  bytes: Uint8Array;
  resolve: (languageId: string | undefined) => void;
  reject: (error: Error) => void;
}

/**
 * One forked grammar process.
 */
export class GrammarProcess {
  readonly languageId: string;
  private readonly child: ChildProcess;
  private readonly pending = new Map<number, Pending>();
  private readonly onEffect?: (event: CapabilityEvent) => void;
  private startup?: Startup;
  private nextRequestId = 1;
  private exited = false;

  constructor(
    languageId: string,
    options: { script: string; execArgv: string[]; onEffect?: (event: CapabilityEvent) => void }
  ) {
    this.languageId = languageId;
    this.onEffect = options.onEffect;
    this.child = fork(options.script, [], {
      execArgv: options.execArgv,
      stdio: ['ignore', 'ignore', 'inherit', 'ipc'],
      serialization: 'advanced',
    });

    // An idle grammar process never holds the host open
    this.child.unref();
    this.child.channel?.unref();

    this.child.on('message', (message) => {
      this.handleMessage(message);
    });
    this.child.on('exit', (code, signal) => {
      this.handleExit(`exited (${signal ?? `code ${code ?? 'unknown'}`})`);
    });
    this.child.on('error', (error) => {
      this.handleExit(`failed: ${error.message}`);
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get running(): boolean {
    return !this.exited;
  }

  /**
   * Wait for the process, then instantiate the module in it.
   * Resolves with the language ID the module reports, if any.
   */
  async start(bytes: Uint8Array, timeoutMs: number): Promise<string | undefined> {
    const timeout = createTimeoutPromise(
      timeoutMs,
      () =>
        new InstantiationError(
          `Grammar process for ${this.languageId} did not start within ${timeoutMs}ms`,
          'INSTANTIATION_FAILED',
          { languageId: this.languageId }
        )
    );
    const instantiated = new Promise<string | undefined>((resolve, reject) => {
      this.startup = { bytes, resolve, reject };
    });
    this.track(true);
    try {
      return await Promise.race([instantiated, timeout.promise]);
    } catch (error) {
      this.kill();
      throw error;
    } finally {
      timeout.cancel();
      this.startup = undefined;
      this.track(false);
    }
  }

  highlight(source: string): Promise<unknown> {
    if (this.exited) {
      return Promise.reject(new Error(`Grammar process for ${this.languageId} is not running`));
    }
    const requestId = this.nextRequestId++;
    const result = new Promise<unknown>((resolve, reject) => {
      this.pending.set(requestId, { resolve, reject });
    });
    this.track(true);
    this.send({ type: 'highlight', requestId, source });
    return result;
  }

  /**
   * Forceful termination. Pending calls reject.
   */
  kill(): void {
    if (!this.exited) {
      this.child.kill('SIGKILL');
    }
    this.handleExit('was terminated');
  }

  private send(message: ParentMessage): void {
    this.child.send(message, (error) => {
      if (error) {
        this.handleExit(`is unreachable: ${error.message}`);
        this.child.kill('SIGKILL');
      }
    });
  }

  /** Hold the event loop open only while the parent waits on the child */
  private track(waiting: boolean): void {
    if (this.exited) {
      return;
    }
    if (waiting || this.startup || this.pending.size > 0) {
      this.child.channel?.ref();
    } else {
      this.child.channel?.unref();
    }
  }

  private handleMessage(raw: unknown): void {
    const parsed = childMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.handleExit(`sent a malformed message: ${parsed.error.message}`);
      this.child.kill('SIGKILL');
      return;
    }
    this.dispatch(parsed.data);
  }

  private dispatch(message: ChildMessage): void {
    switch (message.type) {
      case 'ready':
        if (this.startup) {
          this.send({ type: 'instantiate', languageId: this.languageId, bytes: this.startup.bytes });
        }
        break;

      case 'instantiated':
        this.startup?.resolve(message.languageId);
        break;

      case 'failed': {
        const { message: reason, code, details } = message.error;
        this.startup?.reject(
          new InstantiationError(reason, isInstantiationCode(code) ? code : 'INSTANTIATION_FAILED', {
            ...details,
            languageId: this.languageId,
          })
        );
        break;
      }

      case 'result':
        this.settle(message.requestId)?.resolve(message.payload);
        break;

      case 'error': {
        const error = message.exit ? new ModuleExitSignal(message.exit) : new Error(message.message);
        this.settle(message.requestId)?.reject(error);
        break;
      }

      case 'effect':
        this.onEffect?.(message.event);
        break;
    }
  }

  private settle(requestId: number): Pending | undefined {
    const pending = this.pending.get(requestId);
    this.pending.delete(requestId);
    this.track(false);
    return pending;
  }

  private handleExit(how: string): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    const error = new Error(`Grammar process for ${this.languageId} ${how}`);
    this.startup?.reject(
      new InstantiationError(error.message, 'INSTANTIATION_FAILED', { languageId: this.languageId }, { cause: error })
    );
    for (const pending of this.pending.values()) {
      pending.reject(error);
    }
    this.pending.clear();
  }
}

/**
 * Runs each grammar module in a forked process so that a call can be
 * preempted by killing it.
 *
 * The child builds its own capability environment with
 * createCapabilityEnvironment(); handler functions cannot cross a process
 * boundary. The environment passed to instantiate() must therefore be the
 * standard one: its version is checked and its effects are reported through
 * `onEffect`.
 */
export class ProcessEngine implements SandboxEngine {
  readonly name = 'process';
  private readonly script: string;
  private readonly execArgv: string[];
  private readonly startupTimeoutMs: number;
  private readonly onEffect?: (languageId: string, event: CapabilityEvent) => void;

  constructor(options: ProcessEngineOptions = {}) {
    this.script = options.script ?? defaultScript();
    this.execArgv = options.execArgv ?? defaultExecArgv(this.script);
    this.startupTimeoutMs = options.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
    this.onEffect = options.onEffect;
  }

  async instantiate(bytes: Uint8Array, options: InstantiateOptions): Promise<GrammarExports> {
    const { languageId, environment } = options;
    if (environment.version !== INTERFACE_VERSION) {
      throw new InstantiationError(
        `Grammar process supplies interface ${INTERFACE_VERSION}, environment targets ${environment.version}`,
        'INCOMPATIBLE_INTERFACE',
        { languageId, interfaceVersion: environment.version }
      );
    }

    const onEffect = this.onEffect;
    const child = new GrammarProcess(languageId, {
      script: this.script,
      execArgv: this.execArgv,
      onEffect: onEffect ? (event) => onEffect(languageId, event) : undefined,
    });
    const reported = await child.start(bytes, this.startupTimeoutMs);

    const grammar: GrammarExports = {
      highlight: (source) => child.highlight(source),
      dispose: () => child.kill(),
    };
    if (reported !== undefined) {
      grammar.languageId = () => reported;
    }
    return grammar;
  }
}
