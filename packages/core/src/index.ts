// Logging with redaction
export * from './logging/index.js';

export * from './errors/index.js';
export * from './retry/index.js';
export * from './http/index.js';
export * from './auth/index.js';
export * from './orchestrator/index.js';
export * from './config/index.js';
export * from './payload/index.js';
export * from './backend/index.js';
export * from './saga/index.js';
export * from './dispatcher/index.js';
