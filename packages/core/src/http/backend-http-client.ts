import type { Logger } from 'pino';
import { ProviderError, isProviderError, isRetryableStatus, errorMessage, toError } from '../errors/index.js';
import { RetryPolicy } from '../retry/index.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface BackendRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  bearerToken?: string;
  /** Serialised as a JSON body */
  json?: unknown;
  /** Serialised as `application/x-www-form-urlencoded` */
  form?: Record<string, string>;
  /** Operation name used in log lines and error messages */
  description?: string;
}

export interface BackendResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON body, the raw text when it is not JSON, undefined when empty */
  body: unknown;
  text: string;
}

export interface BackendHttpClientOptions {
  logger: Logger;
  retryPolicy?: RetryPolicy;
  fetchFn?: typeof fetch;
}

/**
 * Parses a response body as JSON, keeping the text when it is not JSON.
 */
export function parseResponseBody(text: string): unknown {
  if (text.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * fetch wrapper for calls to credential backends.
 *
 * Every request goes through the retry policy; a transport error or a status
 * of 429 and above triggers a retry. Once retries run out the last response is
 * returned for the backend to classify, or a transient ProviderError is thrown
 * when the transport never answered.
 * @public
 */
export class BackendHttpClient {
  private readonly logger: Logger;
  private readonly retryPolicy: RetryPolicy;
  private readonly fetchFn?: typeof fetch;

  public constructor(options: BackendHttpClientOptions) {
    this.logger = options.logger;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy({ logger: options.logger });
    this.fetchFn = options.fetchFn;
  }

  public async request(request: BackendRequest): Promise<BackendResponse> {
    const description = request.description ?? `${request.method} ${request.url}`;
    try {
      return await this.retryPolicy.execute(
        ({ attempt }) => this.send(request, attempt),
        (response) => isRetryableStatus(response.status),
        description,
      );
    } catch (error) {
      if (isProviderError(error)) {
        throw error;
      }
      throw ProviderError.backendTransient(
        `${description}: request failed after ${this.retryPolicy.maxRetries + 1} attempts: ${errorMessage(error)}`,
        undefined,
        toError(error),
      );
    }
  }

  private async send(request: BackendRequest, attempt: number): Promise<BackendResponse> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...request.headers,
    };
    if (request.bearerToken) {
      headers.Authorization = `Bearer ${request.bearerToken}`;
    }

    let body: string | undefined;
    if (request.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(request.form).toString();
    } else if (request.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.json);
    }

    this.logger.debug({ method: request.method, url: request.url, attempt }, 'backend request');

    const fetchFn = this.fetchFn ?? fetch;
    const response = await fetchFn(request.url, { method: request.method, headers, body });
    const text = await response.text();

    this.logger.debug(
      { method: request.method, url: request.url, status: response.status, attempt },
      'backend response',
    );

    return {
      status: response.status,
      ok: response.ok,
      body: parseResponseBody(text),
      text,
    };
  }
}
