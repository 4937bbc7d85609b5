export * from './config/index.js';
export * from './orchestrator/index.js';
