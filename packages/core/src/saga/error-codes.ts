import { TaskErrorCodes, type TaskErrorCode } from '@credential-providers/models';
import { ProviderErrorKind, isProviderError } from '../errors/index.js';

/**
 * Error code reported for a failure, falling back to `fallback` for
 * permanent backend rejections and unclassified errors.
 */
export function errorCodeFor(error: unknown, fallback: TaskErrorCode): TaskErrorCode {
  if (!isProviderError(error)) {
    return fallback;
  }
  switch (error.kind) {
    case ProviderErrorKind.Configuration:
      return TaskErrorCodes.CONFIGURATION_INVALID;
    case ProviderErrorKind.UpstreamFetch:
      return TaskErrorCodes.LOGIN_SECRET_UNAVAILABLE;
    case ProviderErrorKind.BackendTransient:
      return TaskErrorCodes.BACKEND_UNREACHABLE;
    case ProviderErrorKind.BackendPermanent:
    case ProviderErrorKind.Report:
      return fallback;
  }
}
