export { SecretsManagerClient } from './secrets-manager-client.js';
export type { SecretsManagerClientOptions } from './secrets-manager-client.js';
export { isSecretOfType } from './types.js';
export type { OrchestratorClient, SecretOfType } from './types.js';
