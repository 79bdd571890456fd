/**
 * @module @sprig/plugin-contracts/engine
 *
 * Seam between the registry and whatever executes module bytes.
 * The registry never looks inside a module: it hands bytes and a capability
 * import set to an engine and gets back the exported entry points.
 */

import type { CapabilityEnvironment } from './capabilities.js';

/**
 * Entry points of an instantiated grammar module.
 */
export interface GrammarExports {
  /**
   * Highlight source text. Returns the raw, untrusted ParseResult payload.
   * May throw when the module traps.
   */
  highlight(source: string): unknown | Promise<unknown>;

  /** Language ID the module reports for itself, if it exports one */
  languageId?(): string;

  /**
   * Release what the engine holds for this module, such as a child process.
   * Called once, when the instance is discarded or evicted.
   */
  dispose?(): void;
}

export interface InstantiateOptions {
  /** Language being instantiated, for error details */
  languageId: string;
  /** Capability handler set the module's imports resolve against */
  environment: CapabilityEnvironment;
}

/**
 * Compiles and instantiates module bytes inside a sandbox.
 * Implementations throw InstantiationError.
 */
export interface SandboxEngine {
  readonly name: string;
  instantiate(bytes: Uint8Array, options: InstantiateOptions): Promise<GrammarExports>;
}
