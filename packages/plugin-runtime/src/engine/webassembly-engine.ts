/**
 * Sandbox engine backed by the WebAssembly VM built into Node.js
 *
 * Module contract (core ABI):
 * - exports `memory`, `cabi_realloc(oldPtr, oldSize, align, newSize) -> ptr`
 *   and `highlight(ptr, len) -> retptr`, where `retptr` holds the
 *   `(ptr, len)` of a UTF-8 JSON ParseResult
 * - optionally exports `cabi_post_highlight(retptr)`, `language-id() -> retptr`
 *   and `wire-version() -> i32`, checked against WIRE_VERSION
 * - imports nothing but the capability interfaces
 */

import {
  InstantiationError,
  WIRE_VERSION,
  isVersionCompatible,
  parseImportName,
  supportedInterfaceVersions,
  type GrammarExports,
  type InstantiateOptions,
  type SandboxEngine,
} from '@sprig/plugin-contracts';
import { GuestMemory, exportedFunction, toPointer, type WasmFunction } from './guest-memory.js';
import { lowerImports, type LoweredImports } from './lowering.js';

const REQUIRED_FUNCTIONS = ['cabi_realloc', 'highlight'] as const;

const encoder = new TextEncoder();

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check every import of a compiled module against the lowered environment.
 */
function checkImports(module: WebAssembly.Module, lowered: LoweredImports, languageId: string): void {
  const unsatisfied: string[] = [];
  const incompatible: string[] = [];

  for (const descriptor of WebAssembly.Module.imports(module)) {
    if (descriptor.kind === 'function' && lowered.has(descriptor.module, descriptor.name)) {
      continue;
    }
    const label = `${descriptor.module}#${descriptor.name}`;
    const { interface: iface, version } = parseImportName(descriptor.module);
    const supported = supportedInterfaceVersions(iface);
    if (version !== undefined && supported.length > 0 && !supported.includes(version)) {
      incompatible.push(label);
    } else {
      unsatisfied.push(label);
    }
  }

  if (incompatible.length > 0) {
    throw new InstantiationError(
      `Grammar module for ${languageId} targets an unsupported interface version: ${incompatible.join(', ')}`,
      'INCOMPATIBLE_INTERFACE',
      { languageId, imports: incompatible }
    );
  }
  if (unsatisfied.length > 0) {
    throw new InstantiationError(
      `Grammar module for ${languageId} has unsatisfied imports: ${unsatisfied.join(', ')}`,
      'UNSATISFIED_IMPORT',
      { languageId, imports: unsatisfied }
    );
  }
}

/**
 * Refuse a module that declares a ParseResult wire version this host does
 * not speak. Modules without the export are taken to speak the current one.
 */
function checkWireVersion(exports: WebAssembly.Exports, languageId: string): void {
  const wireVersion = exportedFunction(exports, 'wire-version');
  if (!wireVersion) {
    return;
  }
  let version: unknown;
  try {
    version = wireVersion();
  } catch (error) {
    throw new InstantiationError(
      `Grammar module for ${languageId} trapped reporting its wire version: ${messageOf(error)}`,
      'INSTANTIATION_FAILED',
      { languageId },
      { cause: error }
    );
  }
  if (typeof version !== 'number' || !isVersionCompatible(version)) {
    throw new InstantiationError(
      `Grammar module for ${languageId} speaks wire version ${String(version)}, host speaks ${WIRE_VERSION}`,
      'INCOMPATIBLE_INTERFACE',
      { languageId, wireVersion: version }
    );
  }
}

/**
 * Read the `(ptr, len)` string a core function returned through `retptr`.
 */
function liftString(memory: GuestMemory, retptr: number): string {
  return memory.readString(memory.readU32(retptr), memory.readU32(retptr + 4));
}

/**
 * Decode the JSON payload. Anything undecodable yields undefined, which the
 * invoker treats as a result with no valid captures.
 */
function liftPayload(memory: GuestMemory, retptr: number): unknown {
  let text: string;
  try {
    text = liftString(memory, retptr);
  } catch (error) {
    if (error instanceof TypeError) {
      // Invalid UTF-8
      return undefined;
    }
    throw error;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
}

export class WebAssemblyEngine implements SandboxEngine {
  readonly name = 'webassembly';

  async instantiate(bytes: Uint8Array, options: InstantiateOptions): Promise<GrammarExports> {
    const { languageId, environment } = options;

    let module: WebAssembly.Module;
    try {
      module = await WebAssembly.compile(new Uint8Array(bytes));
    } catch (error) {
      throw new InstantiationError(
        `Grammar module for ${languageId} is malformed: ${messageOf(error)}`,
        'MALFORMED_MODULE',
        { languageId },
        { cause: error }
      );
    }

    const memory = new GuestMemory();
    const lowered = lowerImports(environment, memory);
    checkImports(module, lowered, languageId);

    let instance: WebAssembly.Instance;
    try {
      instance = await WebAssembly.instantiate(module, lowered.importObject);
    } catch (error) {
      throw new InstantiationError(
        `Failed to instantiate grammar module for ${languageId}: ${messageOf(error)}`,
        'INSTANTIATION_FAILED',
        { languageId },
        { cause: error }
      );
    }

    const { exports } = instance;
    const missing: string[] = [];
    const exportedMemory = exports.memory;
    if (!(exportedMemory instanceof WebAssembly.Memory)) {
      missing.push('memory');
    }
    const functions = new Map<string, WasmFunction>();
    for (const name of REQUIRED_FUNCTIONS) {
      const fn = exportedFunction(exports, name);
      if (fn) {
        functions.set(name, fn);
      } else {
        missing.push(name);
      }
    }

    const realloc = functions.get('cabi_realloc');
    const highlight = functions.get('highlight');
    if (!(exportedMemory instanceof WebAssembly.Memory) || !realloc || !highlight) {
      throw new InstantiationError(
        `Grammar module for ${languageId} is missing exports: ${missing.join(', ')}`,
        'MISSING_EXPORT',
        { languageId, exports: missing }
      );
    }

    memory.attach(exportedMemory, realloc);
    checkWireVersion(exports, languageId);
    const postHighlight = exportedFunction(exports, 'cabi_post_highlight');
    const reportLanguage = exportedFunction(exports, 'language-id');

    const grammar: GrammarExports = {
      highlight(source: string): unknown {
        const [ptr, len] = memory.lowerBytes(encoder.encode(source));
        const retptr = toPointer(highlight(ptr, len), 'highlight');
        try {
          return liftPayload(memory, retptr);
        } finally {
          postHighlight?.(retptr);
        }
      },
    };

    if (reportLanguage) {
      grammar.languageId = () => liftString(memory, toPointer(reportLanguage(), 'language-id'));
    }

    return grammar;
  }
}
