export { defineJob } from './define-job.js';
export { BaseCredentialBackend } from './base-backend.js';
export type {
  CredentialBackend,
  JobDependencies,
  JobDefinition,
  BoundBackend,
  ConfiguredJob,
  ProviderJob,
} from './types.js';
