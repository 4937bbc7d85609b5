export { ProvisioningSaga } from './provisioning-saga.js';
export type { ProvisioningSagaOptions } from './provisioning-saga.js';
export { errorCodeFor } from './error-codes.js';
