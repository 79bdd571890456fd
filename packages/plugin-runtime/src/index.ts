/**
 * @module @sprig/plugin-runtime
 * Sandbox side of the grammar plugin host: what a module can reach, how it
 * is instantiated and called, and how its output is rendered.
 */

// Capability environment
export {
  createCapabilityEnvironment,
  ModuleExitSignal,
  isModuleExitSignal,
  RANDOM_BYTES_LIMIT,
  DiscardingOutputStream,
  EmptyInputStream,
  WRITE_BUDGET,
  type CapabilityEvent,
  type CreateCapabilityEnvironmentOptions,
} from './runtime/index.js';

// Engine
export { WebAssemblyEngine, ProcessEngine, GrammarProcess, type ProcessEngineOptions } from './engine/index.js';

// Instances and invocation
export { PluginInstance, type PluginInstanceInit } from './instance.js';
export {
  invokeHighlight,
  validateOutput,
  DEFAULT_TIMEOUT_MS,
  type InvokeOptions,
  type InvokeResult,
} from './invoker.js';

// Rendering
export {
  spansToHtml,
  toSegments,
  escapeHtml,
  tagForCapture,
  type CaptureTag,
  type Segment,
} from './presenter/index.js';

// Logging
export { createLogger, isLogLevel, type CreateLoggerOptions } from './logging.js';

// Utils
export { createInstanceId, createTimeoutPromise, type TimeoutHandle } from './utils.js';
