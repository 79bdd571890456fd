/**
 * Capability environment for sandboxed grammar modules
 *
 * Every effect a module can import resolves to one of these handlers.
 * Only randomness and the clocks reach real host facilities; everything
 * else is a deterministic stub.
 */

import { randomBytes } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import {
  CAPABILITY_INTERFACES,
  GRAMMAR_TYPES_INTERFACE,
  GRAMMAR_TYPES_VERSION,
  INTERFACE_VERSION,
  versionedName,
  type CapabilityEnvironment,
  type CapabilityHandlers,
  type Datetime,
  type ExitStatus,
} from '@sprig/plugin-contracts';
import { DiscardingOutputStream, EmptyInputStream } from './streams.js';

/** Upper bound for a single get-random-bytes request */
export const RANDOM_BYTES_LIMIT = 1024 * 1024;

/** Fixed clock granularity reported to modules: 1ms */
const CLOCK_RESOLUTION_NS = 1_000_000;

/**
 * Thrown by the exit handler. Unwinds the module call instead of exiting
 * the host process; the invoker reports it as an execution trap.
 */
export class ModuleExitSignal extends Error {
  readonly status: ExitStatus;

  constructor(status: ExitStatus) {
    super(
      status.tag === 'ok'
        ? 'Module requested exit'
        : `Module exited with error${status.val !== undefined ? ` (${status.val})` : ''}`
    );
    this.name = 'ModuleExitSignal';
    this.status = status;
  }
}

export function isModuleExitSignal(error: unknown): error is ModuleExitSignal {
  return error instanceof ModuleExitSignal;
}

/**
 * Audit event for an effect a module attempted.
 */
export interface CapabilityEvent {
  kind: 'exit' | 'stdout' | 'stderr' | 'stdin' | 'random';
  /** Bytes written or requested, where it applies */
  bytes?: number;
  status?: ExitStatus;
}

export interface CreateCapabilityEnvironmentOptions {
  /** Called for every audited effect */
  onEffect?: (event: CapabilityEvent) => void;
  /** Wall-clock source in epoch milliseconds (default: Date.now) */
  now?: () => number;
  /** Entropy source (default: node:crypto randomBytes) */
  random?: (size: number) => Uint8Array;
}

function toDatetime(ms: number): Datetime {
  return {
    seconds: BigInt(Math.floor(ms / 1000)),
    nanoseconds: (ms % 1000) * 1_000_000,
  };
}

/**
 * Create the capability environment for one module instance
 */
export function createCapabilityEnvironment(
  options: CreateCapabilityEnvironmentOptions = {}
): CapabilityEnvironment {
  const { onEffect } = options;
  const now = options.now ?? Date.now;
  const random = options.random ?? ((size: number) => new Uint8Array(randomBytes(size)));

  const stdin = new EmptyInputStream(() => onEffect?.({ kind: 'stdin' }));
  const stdout = new DiscardingOutputStream((bytes) => onEffect?.({ kind: 'stdout', bytes }));
  const stderr = new DiscardingOutputStream((bytes) => onEffect?.({ kind: 'stderr', bytes }));

  const handlers: CapabilityHandlers = {
    'wasi:cli/environment': {
      getEnvironment: () => [],
      getArguments: () => [],
      initialCwd: () => undefined,
    },
    'wasi:cli/exit': {
      exit(status: ExitStatus): never {
        onEffect?.({ kind: 'exit', status });
        throw new ModuleExitSignal(status);
      },
    },
    'wasi:cli/stdin': { getStdin: () => stdin },
    'wasi:cli/stdout': { getStdout: () => stdout },
    'wasi:cli/stderr': { getStderr: () => stderr },
    'wasi:clocks/wall-clock': {
      now: () => toDatetime(now()),
      resolution: () => ({ seconds: 0n, nanoseconds: CLOCK_RESOLUTION_NS }),
    },
    'wasi:clocks/monotonic-clock': {
      now: () => BigInt(Math.round(performance.now() * 1_000_000)),
      resolution: () => BigInt(CLOCK_RESOLUTION_NS),
    },
    'wasi:filesystem/types': {
      filesystemErrorCode: () => undefined,
    },
    'wasi:filesystem/preopens': {
      getDirectories: () => [],
    },
    'wasi:io/error': {
      toDebugString: () => '',
    },
    'wasi:io/streams': {},
    'wasi:random/random': {
      getRandomBytes(len: bigint): Uint8Array {
        if (len < 0n || len > BigInt(RANDOM_BYTES_LIMIT)) {
          throw new RangeError(`get-random-bytes length ${len} exceeds ${RANDOM_BYTES_LIMIT}`);
        }
        const size = Number(len);
        onEffect?.({ kind: 'random', bytes: size });
        return random(size);
      },
      getRandomU64(): bigint {
        onEffect?.({ kind: 'random', bytes: 8 });
        const bytes = random(8);
        return new DataView(bytes.buffer, bytes.byteOffset, 8).getBigUint64(0, true);
      },
    },
  };

  const imports: Record<string, object> = {};
  for (const iface of CAPABILITY_INTERFACES) {
    const handler = Object.freeze(handlers[iface]);
    imports[iface] = handler;
    imports[versionedName(iface, INTERFACE_VERSION)] = handler;
  }

  // Types-only interface: nothing to supply, but the names must resolve
  const grammarTypes = Object.freeze({});
  imports[GRAMMAR_TYPES_INTERFACE] = grammarTypes;
  imports[versionedName(GRAMMAR_TYPES_INTERFACE, GRAMMAR_TYPES_VERSION)] = grammarTypes;

  return Object.freeze({
    version: INTERFACE_VERSION,
    handlers: Object.freeze(handlers),
    imports: Object.freeze(imports),
  });
}
