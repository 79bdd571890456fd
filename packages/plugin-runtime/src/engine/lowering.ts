/**
 * Lowering of capability handlers to core WebAssembly imports
 *
 * Handlers speak JS values (strings, bigint, Uint8Array); core modules
 * speak i32/i64 and pointers. Each lowered function follows the canonical
 * ABI: compound results are written to a caller-provided `retptr`,
 * resources travel as i32 handles.
 */

import {
  parseImportName,
  type CapabilityEnvironment,
  type CapabilityHandlers,
  type InputStreamHandle,
  type OutputStreamHandle,
} from '@sprig/plugin-contracts';
import type { GuestMemory } from './guest-memory.js';

type CoreFunction = (...args: Array<number | bigint>) => number | bigint | void;

/** `result` discriminants */
const OK = 0;
const ERR = 1;

/** `stream-error` discriminant for a closed stream */
const STREAM_CLOSED = 1;

/**
 * Resource table for stream handles a module holds.
 */
class HandleTable<T> {
  private readonly entries = new Map<number, T>();
  private next = 1;

  insert(value: T): number {
    const handle = this.next++;
    this.entries.set(handle, value);
    return handle;
  }

  get(handle: number): T {
    const value = this.entries.get(handle);
    if (value === undefined) {
      throw new RangeError(`Unknown resource handle ${handle}`);
    }
    return value;
  }

  drop(handle: number): void {
    this.entries.delete(handle);
  }
}

function asNumber(value: number | bigint | undefined): number {
  return typeof value === 'bigint' ? Number(value) : (value ?? 0);
}

function asU64(value: number | bigint | undefined): bigint {
  return BigInt.asUintN(64, typeof value === 'bigint' ? value : BigInt(value ?? 0));
}

/** u64 results cross the JS boundary as signed i64 */
function toI64(value: bigint): bigint {
  return BigInt.asIntN(64, value);
}

type LoweredInterface = Record<string, CoreFunction>;

/**
 * Build the lowered function tables, one per capability interface.
 */
function lowerHandlers(
  handlers: Readonly<CapabilityHandlers>,
  memory: GuestMemory
): Record<string, LoweredInterface> {
  const inputs = new HandleTable<InputStreamHandle>();
  const outputs = new HandleTable<OutputStreamHandle>();

  const writeEmptyList = (retptr: number | bigint | undefined): void => {
    memory.writePair(asNumber(retptr), 0, 0);
  };

  const writeOk = (retptr: number | bigint | undefined): void => {
    memory.writeU8(asNumber(retptr), OK);
  };

  const readInput = (self: number | bigint | undefined, len: number | bigint | undefined, retptr: number | bigint | undefined, blocking: boolean): void => {
    const stream = inputs.get(asNumber(self));
    const chunk = blocking ? stream.blockingRead(asU64(len)) : stream.read(asU64(len));
    const base = asNumber(retptr);
    if (chunk.byteLength === 0) {
      // End of input is reported as a closed stream
      memory.writeU8(base, ERR);
      memory.writeU8(base + 4, STREAM_CLOSED);
      return;
    }
    const [ptr, size] = memory.lowerBytes(chunk);
    memory.writeU8(base, OK);
    memory.writePair(base + 4, ptr, size);
  };

  const writeOutput = (self: number | bigint | undefined, ptr: number | bigint | undefined, len: number | bigint | undefined, retptr: number | bigint | undefined, blocking: boolean): void => {
    const stream = outputs.get(asNumber(self));
    const contents = memory.readBytes(asNumber(ptr), asNumber(len));
    if (blocking) {
      stream.blockingWriteAndFlush(contents);
    } else {
      stream.write(contents);
    }
    writeOk(retptr);
  };

  const environment = handlers['wasi:cli/environment'];
  const exit = handlers['wasi:cli/exit'];
  const wallClock = handlers['wasi:clocks/wall-clock'];
  const monotonic = handlers['wasi:clocks/monotonic-clock'];
  const filesystem = handlers['wasi:filesystem/types'];
  const preopens = handlers['wasi:filesystem/preopens'];
  const ioError = handlers['wasi:io/error'];
  const random = handlers['wasi:random/random'];

  return {
    'wasi:cli/environment': {
      'get-environment': (retptr) => {
        if (environment.getEnvironment().length > 0) {
          throw new Error('Environment must be empty');
        }
        writeEmptyList(retptr);
      },
      'get-arguments': (retptr) => {
        if (environment.getArguments().length > 0) {
          throw new Error('Arguments must be empty');
        }
        writeEmptyList(retptr);
      },
      'initial-cwd': (retptr) => {
        const cwd = environment.initialCwd();
        const base = asNumber(retptr);
        if (cwd === undefined) {
          memory.writeU8(base, 0);
          return;
        }
        const [ptr, len] = memory.lowerString(cwd);
        memory.writeU8(base, 1);
        memory.writePair(base + 4, ptr, len);
      },
    },
    'wasi:cli/exit': {
      exit: (status) => {
        const code = asNumber(status);
        exit.exit(code === OK ? { tag: 'ok' } : { tag: 'err', val: code });
      },
    },
    'wasi:cli/stdin': {
      'get-stdin': () => inputs.insert(handlers['wasi:cli/stdin'].getStdin()),
    },
    'wasi:cli/stdout': {
      'get-stdout': () => outputs.insert(handlers['wasi:cli/stdout'].getStdout()),
    },
    'wasi:cli/stderr': {
      'get-stderr': () => outputs.insert(handlers['wasi:cli/stderr'].getStderr()),
    },
    'wasi:io/streams': {
      '[method]output-stream.check-write': (self, retptr) => {
        const permitted = outputs.get(asNumber(self)).checkWrite();
        const base = asNumber(retptr);
        memory.writeU8(base, OK);
        memory.writeU64(base + 8, permitted);
      },
      '[method]output-stream.write': (self, ptr, len, retptr) => writeOutput(self, ptr, len, retptr, false),
      '[method]output-stream.blocking-write-and-flush': (self, ptr, len, retptr) =>
        writeOutput(self, ptr, len, retptr, true),
      '[method]output-stream.blocking-flush': (self, retptr) => {
        outputs.get(asNumber(self)).blockingFlush();
        writeOk(retptr);
      },
      '[method]input-stream.read': (self, len, retptr) => readInput(self, len, retptr, false),
      '[method]input-stream.blocking-read': (self, len, retptr) => readInput(self, len, retptr, true),
      '[resource-drop]input-stream': (self) => inputs.drop(asNumber(self)),
      '[resource-drop]output-stream': (self) => outputs.drop(asNumber(self)),
    },
    'wasi:clocks/wall-clock': {
      now: (retptr) => {
        const { seconds, nanoseconds } = wallClock.now();
        const base = asNumber(retptr);
        memory.writeU64(base, seconds);
        memory.writeU32(base + 8, nanoseconds);
      },
      resolution: (retptr) => {
        const { seconds, nanoseconds } = wallClock.resolution();
        const base = asNumber(retptr);
        memory.writeU64(base, seconds);
        memory.writeU32(base + 8, nanoseconds);
      },
    },
    'wasi:clocks/monotonic-clock': {
      now: () => toI64(monotonic.now()),
      resolution: () => toI64(monotonic.resolution()),
    },
    'wasi:filesystem/types': {
      'filesystem-error-code': (err, retptr) => {
        const code = filesystem.filesystemErrorCode(asNumber(err));
        if (code !== undefined) {
          throw new Error(`Unexpected filesystem error code ${code}`);
        }
        memory.writeU8(asNumber(retptr), 0);
      },
      '[resource-drop]descriptor': () => {},
      '[resource-drop]directory-entry-stream': () => {},
    },
    'wasi:filesystem/preopens': {
      'get-directories': (retptr) => {
        if (preopens.getDirectories().length > 0) {
          throw new Error('No directories may be preopened');
        }
        writeEmptyList(retptr);
      },
    },
    'wasi:io/error': {
      '[method]error.to-debug-string': (self, retptr) => {
        const [ptr, len] = memory.lowerString(ioError.toDebugString(asNumber(self)));
        memory.writePair(asNumber(retptr), ptr, len);
      },
      '[resource-drop]error': () => {},
    },
    'wasi:random/random': {
      'get-random-bytes': (len, retptr) => {
        const [ptr, size] = memory.lowerBytes(random.getRandomBytes(asU64(len)));
        memory.writePair(asNumber(retptr), ptr, size);
      },
      'get-random-u64': () => toI64(random.getRandomU64()),
    },
  };
}

export interface LoweredImports {
  /** Import object for WebAssembly.instantiate */
  importObject: WebAssembly.Imports;
  /** Whether a given (module, name) import is satisfied */
  has(module: string, name: string): boolean;
}

/**
 * Lower an import set. Every name in `imports` (versioned or not) maps to
 * the lowered table of its interface; the grammar types interface lowers to
 * an empty table.
 */
export function lowerImports(environment: CapabilityEnvironment, memory: GuestMemory): LoweredImports {
  const tables = lowerHandlers(environment.handlers, memory);
  const importObject: Record<string, Record<string, CoreFunction>> = {};

  for (const name of Object.keys(environment.imports)) {
    const table = tables[parseImportName(name).interface];
    importObject[name] = table ?? {};
  }

  return {
    importObject,
    has(module, name) {
      const table = importObject[module];
      return table !== undefined && Object.prototype.hasOwnProperty.call(table, name);
    },
  };
}
