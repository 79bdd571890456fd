/**
 * @sprig/plugin-contracts
 *
 * Contract between the Sprig host and grammar plugins: wire types,
 * capability interface names, engine and catalog seams, error taxonomy.
 */

// Wire
export {
  WIRE_VERSION,
  isVersionCompatible,
  captureSchema,
  injectionSchema,
  parseResultSchema,
  decodeParseResult,
  type Capture,
  type Span,
  type Injection,
  type ParseResult,
  type DecodedParseResult,
} from './wire.js';

// Capabilities
export {
  INTERFACE_VERSION,
  GRAMMAR_TYPES_VERSION,
  GRAMMAR_TYPES_INTERFACE,
  CAPABILITY_INTERFACES,
  parseImportName,
  versionedName,
  supportedInterfaceVersions,
  type CapabilityInterface,
  type ImportName,
  type Datetime,
  type ExitStatus,
  type OutputStreamHandle,
  type InputStreamHandle,
  type EnvironmentCapability,
  type ExitCapability,
  type StdinCapability,
  type StdoutCapability,
  type StderrCapability,
  type WallClockCapability,
  type MonotonicClockCapability,
  type FilesystemTypesCapability,
  type PreopensCapability,
  type IoErrorCapability,
  type RandomCapability,
  type CapabilityHandlers,
  type CapabilityImports,
  type CapabilityEnvironment,
} from './capabilities.js';

// Engine
export type { GrammarExports, InstantiateOptions, SandboxEngine } from './engine.js';

// Catalog
export type { ModuleLocation, ModuleCatalog, ModuleFetcher } from './catalog.js';

// Logger
export { noopLogger, type Logger, type LogLevel } from './logger.js';

// Errors
export {
  ErrorCode,
  HighlightError,
  UnknownLanguageError,
  FetchFailureError,
  InstantiationError,
  ExecutionTrapError,
  ExecutionTimeoutError,
  MalformedOutputError,
  AbortError,
  ConfigError,
  isHighlightError,
  isKnownErrorCode,
  normalizeError,
  type HighlightErrorCode,
  type InstantiationErrorCode,
  type SerializedHighlightError,
} from './errors.js';
