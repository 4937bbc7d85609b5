export { RetryPolicy, DEFAULT_RETRY_CONFIG } from './retry-policy.js';
export type { RetryPolicyConfig, RetryContext } from './retry-policy.js';
