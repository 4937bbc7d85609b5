import { ProviderError, ProviderErrorKind } from './provider-error.js';

/**
 * Whether a response status is worth retrying: rate limiting (429) and
 * everything above it.
 * @param statusCode - HTTP status code to check
 */
export function isRetryableStatus(statusCode: number): boolean {
  return statusCode >= 429;
}

/**
 * Builds the ProviderError for a failed backend response.
 *
 * - 429 and 5xx: BackendTransient
 * - other statuses: BackendPermanent
 * @param statusCode - HTTP status code
 * @param context - Operation that failed, e.g. `create API key`
 * @param detail - Error text extracted from the response body
 */
export function createErrorFromHttpStatus(
  statusCode: number,
  context: string,
  detail?: string,
): ProviderError {
  const message = detail
    ? `${context}: HTTP ${statusCode}: ${detail}`
    : `${context}: HTTP ${statusCode}`;
  const kind = isRetryableStatus(statusCode)
    ? ProviderErrorKind.BackendTransient
    : ProviderErrorKind.BackendPermanent;
  return new ProviderError(message, kind, { status: statusCode });
}
