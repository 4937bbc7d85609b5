export { iamApiKeyJob, apiKeyName, apiKeyDescription, fetchLoginApiKey } from './job.js';
export { IamApiKeyBackend, isApiKeyNotFound, iamErrorDetail } from './api-key-backend.js';
export type { IamApiKeyConfig, ActionWhenLeaked } from './types.js';
