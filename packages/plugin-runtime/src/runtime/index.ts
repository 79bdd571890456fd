/**
 * Capability environment handed to sandboxed grammar modules
 */

export {
  createCapabilityEnvironment,
  ModuleExitSignal,
  isModuleExitSignal,
  RANDOM_BYTES_LIMIT,
  type CapabilityEvent,
  type CreateCapabilityEnvironmentOptions,
} from './capability-env.js';
export { DiscardingOutputStream, EmptyInputStream, WRITE_BUDGET } from './streams.js';
