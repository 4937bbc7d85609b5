/**
 * Failure classes a job run distinguishes. The saga maps each kind to the
 * error code it reports.
 */
export enum ProviderErrorKind {
  /** Missing or malformed parameter, unknown action. Nothing was attempted. */
  Configuration = 'configuration',
  /** A referenced secret could not be fetched or has the wrong type or shape. */
  UpstreamFetch = 'upstream_fetch',
  /** Network failure, 5xx or 429 that outlived the retry policy. */
  BackendTransient = 'backend_transient',
  /** Rejected parameters, conflict, any other structured rejection. */
  BackendPermanent = 'backend_permanent',
  /** The orchestrator did not accept a task update. */
  Report = 'report',
}

export interface ProviderErrorOptions {
  status?: number;
  cause?: Error;
  retryable?: boolean;
}

/**
 * Error raised by every layer of a job run.
 *
 * Carries the failure kind, whether the retry policy may retry it, and the HTTP
 * status when one was involved.
 * @public
 */
export class ProviderError extends Error {
  public readonly kind: ProviderErrorKind;
  public readonly retryable: boolean;
  public readonly status?: number;
  public declare readonly cause?: Error;

  public constructor(
    message: string,
    kind: ProviderErrorKind = ProviderErrorKind.BackendPermanent,
    options: ProviderErrorOptions = {},
  ) {
    super(message);
    this.name = 'ProviderError';
    this.kind = kind;
    this.retryable = options.retryable ?? kind === ProviderErrorKind.BackendTransient;
    this.status = options.status;
    this.cause = options.cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ProviderError.prototype);
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   * @returns JSON object containing error details
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      kind: this.kind,
      retryable: this.retryable,
      status: this.status,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  public static configuration(message: string, cause?: Error): ProviderError {
    return new ProviderError(message, ProviderErrorKind.Configuration, { cause });
  }

  public static upstreamFetch(message: string, status?: number, cause?: Error): ProviderError {
    return new ProviderError(message, ProviderErrorKind.UpstreamFetch, { status, cause });
  }

  public static backendTransient(message: string, status?: number, cause?: Error): ProviderError {
    return new ProviderError(message, ProviderErrorKind.BackendTransient, { status, cause });
  }

  public static backendPermanent(message: string, status?: number, cause?: Error): ProviderError {
    return new ProviderError(message, ProviderErrorKind.BackendPermanent, { status, cause });
  }

  public static report(message: string, status?: number, cause?: Error): ProviderError {
    return new ProviderError(message, ProviderErrorKind.Report, { status, cause });
  }

  /**
   * Prefixes an error with the operation it belongs to.
   *
   * Keeps the kind and status of a ProviderError unless `kind` overrides it;
   * anything else becomes `kind` or a permanent backend error.
   * @param error - Caught value
   * @param context - Operation and identifier, e.g. `revoke role 16384`
   * @param kind - Kind forced onto the wrapped error
   */
  public static wrap(error: unknown, context: string, kind?: ProviderErrorKind): ProviderError {
    const cause = toError(error);
    if (error instanceof ProviderError) {
      const resolvedKind = kind ?? error.kind;
      return new ProviderError(`${context}: ${error.message}`, resolvedKind, {
        status: error.status,
        cause: error.cause ?? cause,
        retryable: resolvedKind === error.kind ? error.retryable : undefined,
      });
    }
    return new ProviderError(
      `${context}: ${cause.message}`,
      kind ?? ProviderErrorKind.BackendPermanent,
      { cause },
    );
  }
}

/**
 * Normalises a caught value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return toError(error).message;
}

export function isProviderError(error: unknown, kind?: ProviderErrorKind): error is ProviderError {
  return error instanceof ProviderError && (kind === undefined || error.kind === kind);
}
