export {
  ProviderError,
  ProviderErrorKind,
  toError,
  errorMessage,
  isProviderError,
} from './provider-error.js';
export type { ProviderErrorOptions } from './provider-error.js';
export { isRetryableStatus, createErrorFromHttpStatus } from './http-status.js';
