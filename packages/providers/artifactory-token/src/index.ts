export { artifactoryTokenJob, fetchAdminToken } from './job.js';
export { ArtifactoryTokenBackend, accessErrorDetail } from './token-backend.js';
export type { ArtifactoryTokenBackendOptions } from './token-backend.js';
export type { ArtifactoryTokenConfig } from './types.js';
