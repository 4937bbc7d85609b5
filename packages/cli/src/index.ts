export { createProgram } from './program.js';
export type { ProgramOptions } from './program.js';
export { ProviderRegistry, createDefaultRegistry } from './registry.js';
