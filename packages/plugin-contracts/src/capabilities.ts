/**
 * @module @sprig/plugin-contracts/capabilities
 *
 * Names and shapes of the effect handlers a host supplies to a grammar
 * module. A module may import each interface unversioned
 * (`wasi:cli/exit`) or versioned (`wasi:cli/exit@0.2.3`); both resolve to
 * the same handler object.
 */

/**
 * Version of the capability handler set this host supplies.
 */
export const INTERFACE_VERSION = '0.2.3' as const;

/**
 * Version of the grammar types interface plugins are built against.
 */
export const GRAMMAR_TYPES_VERSION = '0.1.0' as const;

export const GRAMMAR_TYPES_INTERFACE = 'sprig:grammar/types' as const;

/**
 * Every capability interface a module may import.
 */
export const CAPABILITY_INTERFACES = [
  'wasi:cli/environment',
  'wasi:cli/exit',
  'wasi:cli/stdin',
  'wasi:cli/stdout',
  'wasi:cli/stderr',
  'wasi:clocks/wall-clock',
  'wasi:clocks/monotonic-clock',
  'wasi:filesystem/types',
  'wasi:filesystem/preopens',
  'wasi:io/error',
  'wasi:io/streams',
  'wasi:random/random',
] as const;

export type CapabilityInterface = (typeof CAPABILITY_INTERFACES)[number];

export interface ImportName {
  /** Interface without version, e.g. "wasi:cli/exit" */
  interface: string;
  /** Version suffix, undefined for the unversioned alias */
  version?: string;
}

/**
 * Split an import module name into interface and version.
 *
 * @example parseImportName('wasi:cli/exit@0.2.3') // { interface: 'wasi:cli/exit', version: '0.2.3' }
 */
export function parseImportName(name: string): ImportName {
  const at = name.lastIndexOf('@');
  if (at <= 0) {
    return { interface: name };
  }
  return { interface: name.slice(0, at), version: name.slice(at + 1) };
}

export function versionedName(iface: string, version: string): string {
  return `${iface}@${version}`;
}

/**
 * Interface versions this host can satisfy, per interface.
 */
export function supportedInterfaceVersions(iface: string): readonly string[] {
  if (iface === GRAMMAR_TYPES_INTERFACE) {
    return [GRAMMAR_TYPES_VERSION];
  }
  if ((CAPABILITY_INTERFACES as readonly string[]).includes(iface)) {
    return [INTERFACE_VERSION];
  }
  return [];
}

// ============================================================================
// Handler shapes
// ============================================================================

export interface Datetime {
  seconds: bigint;
  nanoseconds: number;
}

export type ExitStatus = { tag: 'ok' } | { tag: 'err'; val?: number };

export interface OutputStreamHandle {
  /** Bytes the stream accepts right now */
  checkWrite(): bigint;
  /** Write bytes, returning how many were accepted */
  write(contents: Uint8Array): bigint;
  blockingWriteAndFlush(contents: Uint8Array): bigint;
  blockingFlush(): void;
}

export interface InputStreamHandle {
  /** An empty result means end of input */
  read(len: bigint): Uint8Array;
  blockingRead(len: bigint): Uint8Array;
}

export interface EnvironmentCapability {
  getEnvironment(): Array<[string, string]>;
  getArguments(): string[];
  initialCwd(): string | undefined;
}

export interface ExitCapability {
  exit(status: ExitStatus): never;
}

export interface StdinCapability {
  getStdin(): InputStreamHandle;
}

export interface StdoutCapability {
  getStdout(): OutputStreamHandle;
}

export interface StderrCapability {
  getStderr(): OutputStreamHandle;
}

export interface WallClockCapability {
  now(): Datetime;
  resolution(): Datetime;
}

export interface MonotonicClockCapability {
  /** Nanoseconds from an arbitrary origin */
  now(): bigint;
  resolution(): bigint;
}

export interface FilesystemTypesCapability {
  filesystemErrorCode(error: unknown): string | undefined;
}

export interface PreopensCapability {
  getDirectories(): Array<[unknown, string]>;
}

export interface IoErrorCapability {
  toDebugString(error: unknown): string;
}

export interface RandomCapability {
  getRandomBytes(len: bigint): Uint8Array;
  getRandomU64(): bigint;
}

/**
 * The full handler set, keyed by unversioned interface name.
 */
export interface CapabilityHandlers {
  'wasi:cli/environment': EnvironmentCapability;
  'wasi:cli/exit': ExitCapability;
  'wasi:cli/stdin': StdinCapability;
  'wasi:cli/stdout': StdoutCapability;
  'wasi:cli/stderr': StderrCapability;
  'wasi:clocks/wall-clock': WallClockCapability;
  'wasi:clocks/monotonic-clock': MonotonicClockCapability;
  'wasi:filesystem/types': FilesystemTypesCapability;
  'wasi:filesystem/preopens': PreopensCapability;
  'wasi:io/error': IoErrorCapability;
  'wasi:io/streams': Record<string, never>;
  'wasi:random/random': RandomCapability;
}

/**
 * Handlers as presented to a module: every interface under both its
 * unversioned and its versioned name.
 */
export type CapabilityImports = Readonly<Record<string, object>>;

/**
 * A constructed handler set, ready to hand to an engine.
 */
export interface CapabilityEnvironment {
  /** Capability handler set version */
  readonly version: string;
  /** Handlers keyed by unversioned interface name */
  readonly handlers: Readonly<CapabilityHandlers>;
  /** Handlers keyed by both unversioned and versioned names */
  readonly imports: CapabilityImports;
}
