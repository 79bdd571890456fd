export { WebAssemblyEngine } from './webassembly-engine.js';
export { GuestMemory } from './guest-memory.js';
export { lowerImports, type LoweredImports } from './lowering.js';
export { ProcessEngine, GrammarProcess, type ProcessEngineOptions } from './process-engine.js';
