/**
 * Access to a module's linear memory using canonical ABI layouts
 */

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export type WasmFunction = (...args: Array<number | bigint>) => unknown;

/**
 * Narrow an export to a callable function.
 */
export function exportedFunction(exports: WebAssembly.Exports, name: string): WasmFunction | undefined {
  const value = exports[name];
  if (typeof value !== 'function') {
    return undefined;
  }
  return (...args) => value(...args);
}

/**
 * Coerce a core function result to an i32 pointer.
 */
export function toPointer(value: unknown, what: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new TypeError(`${what} returned ${typeof value}, expected i32`);
  }
  return value >>> 0;
}

/**
 * View over guest memory. Bound after instantiation, since imports are
 * created before the memory they write into exists.
 */
export class GuestMemory {
  private memory?: WebAssembly.Memory;
  private realloc?: WasmFunction;

  attach(memory: WebAssembly.Memory, realloc: WasmFunction): void {
    this.memory = memory;
    this.realloc = realloc;
  }

  get attached(): boolean {
    return this.memory !== undefined;
  }

  private view(): DataView {
    if (!this.memory) {
      throw new Error('Guest memory accessed before instantiation completed');
    }
    // Re-read the buffer each time: memory.grow() detaches the old one
    return new DataView(this.memory.buffer);
  }

  private bytes(ptr: number, len: number): Uint8Array {
    if (!this.memory) {
      throw new Error('Guest memory accessed before instantiation completed');
    }
    if (ptr + len > this.memory.buffer.byteLength) {
      throw new RangeError(`Guest pointer ${ptr}+${len} out of bounds`);
    }
    return new Uint8Array(this.memory.buffer, ptr, len);
  }

  writeU8(ptr: number, value: number): void {
    this.view().setUint8(ptr, value);
  }

  writeU32(ptr: number, value: number): void {
    this.view().setUint32(ptr, value, true);
  }

  writeU64(ptr: number, value: bigint): void {
    this.view().setBigUint64(ptr, value, true);
  }

  readU32(ptr: number): number {
    return this.view().getUint32(ptr, true);
  }

  readBytes(ptr: number, len: number): Uint8Array {
    return this.bytes(ptr, len).slice();
  }

  readString(ptr: number, len: number): string {
    return decoder.decode(this.bytes(ptr, len));
  }

  /**
   * Allocate `len` bytes in the guest via its cabi_realloc export.
   */
  allocate(len: number, align = 1): number {
    if (!this.realloc) {
      throw new Error('Guest memory accessed before instantiation completed');
    }
    if (len === 0) {
      return 0;
    }
    return toPointer(this.realloc(0, 0, align, len), 'cabi_realloc');
  }

  /**
   * Copy bytes into freshly allocated guest memory; returns [ptr, len].
   */
  lowerBytes(contents: Uint8Array): [number, number] {
    const ptr = this.allocate(contents.byteLength);
    if (contents.byteLength > 0) {
      this.bytes(ptr, contents.byteLength).set(contents);
    }
    return [ptr, contents.byteLength];
  }

  lowerString(value: string): [number, number] {
    return this.lowerBytes(encoder.encode(value));
  }

  /** Store a `(ptr, len)` pair, the layout of strings and lists */
  writePair(retptr: number, ptr: number, len: number): void {
    this.writeU32(retptr, ptr);
    this.writeU32(retptr + 4, len);
  }
}
