import type { Logger } from 'pino';
import { IamTokenResponseSchema } from '@credential-providers/schemas';
import {
  ProviderError,
  ProviderErrorKind,
  createErrorFromHttpStatus,
  errorMessage,
  isRetryableStatus,
  toError,
} from '../errors/index.js';
import { parseResponseBody } from '../http/index.js';
import type { RetryPolicy } from '../retry/index.js';

export const IAM_URL = 'https://iam.cloud.ibm.com';
export const IAM_TEST_URL = 'https://iam.test.cloud.ibm.com';
export const IAM_APIKEY_GRANT_TYPE = 'urn:ibm:params:oauth:grant-type:apikey';

/** Tokens are refreshed this long before they expire */
const EXPIRY_MARGIN_MS = 60_000;
const DEFAULT_EXPIRY_SECONDS = 3600;

/**
 * IAM endpoint matching an orchestrator instance: test instances authenticate
 * against the test IAM.
 */
export function iamUrlForInstance(instanceUrl: string): string {
  return instanceUrl.includes('secrets-manager.test.appdomain.cloud') ? IAM_TEST_URL : IAM_URL;
}

/**
 * Anything that can hand out a bearer token.
 * @public
 */
export interface TokenProvider {
  getToken(): Promise<string>;
}

export interface IamAuthenticatorOptions {
  apiKey: string;
  url?: string;
  logger?: Logger;
  fetchFn?: typeof fetch;
  /** Clock, for tests */
  now?: () => number;
  /** Kind of the error raised when the grant fails */
  errorKind?: ProviderErrorKind;
  /**
   * Treats the token endpoint as a credential backend: requests are retried
   * and failures are classified by HTTP status, ignoring `errorKind`.
   */
  retryPolicy?: RetryPolicy;
}

interface TokenResponse {
  status: number;
  ok: boolean;
  text: string;
}

/**
 * Exchanges an API key for an IAM access token and caches it until shortly
 * before it expires.
 * @example
 * ```typescript
 * const auth = new IamAuthenticator({ apiKey, url: iamUrlForInstance(instanceUrl) });
 * const headers = await auth.getHeaders();
 * ```
 * @public
 */
export class IamAuthenticator implements TokenProvider {
  private readonly apiKey: string;
  private readonly url: string;
  private readonly logger?: Logger;
  private readonly fetchFn?: typeof fetch;
  private readonly now: () => number;
  private readonly errorKind: ProviderErrorKind;
  private readonly retryPolicy?: RetryPolicy;
  private cached?: { token: string; expiresAt: number };

  public constructor(options: IamAuthenticatorOptions) {
    this.apiKey = options.apiKey;
    this.url = (options.url ?? IAM_URL).replace(/\/+$/, '');
    this.logger = options.logger;
    this.fetchFn = options.fetchFn;
    this.now = options.now ?? Date.now;
    this.errorKind = options.errorKind ?? ProviderErrorKind.UpstreamFetch;
    this.retryPolicy = options.retryPolicy;
  }

  public async getToken(): Promise<string> {
    if (this.cached && this.now() < this.cached.expiresAt - EXPIRY_MARGIN_MS) {
      return this.cached.token;
    }

    const tokenUrl = `${this.url}/identity/token`;
    const fetchFn = this.fetchFn ?? fetch;
    const request = async (): Promise<TokenResponse> => {
      const response = await fetchFn(tokenUrl, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams({
          grant_type: IAM_APIKEY_GRANT_TYPE,
          apikey: this.apiKey,
        }).toString(),
      });
      return { status: response.status, ok: response.ok, text: await response.text() };
    };

    let response: TokenResponse;
    try {
      response = this.retryPolicy
        ? await this.retryPolicy.execute(
            request,
            (result) => isRetryableStatus(result.status),
            'IAM token request',
          )
        : await request();
    } catch (error) {
      throw new ProviderError(
        `IAM token request to ${tokenUrl} failed: ${errorMessage(error)}`,
        this.retryPolicy ? ProviderErrorKind.BackendTransient : this.errorKind,
        { cause: toError(error) },
      );
    }

    if (!response.ok) {
      const context = `IAM token request to ${tokenUrl} failed`;
      throw this.retryPolicy
        ? createErrorFromHttpStatus(response.status, context)
        : new ProviderError(`${context}: HTTP ${response.status}`, this.errorKind, {
            status: response.status,
          });
    }

    const parsed = IamTokenResponseSchema.safeParse(parseResponseBody(response.text));
    if (!parsed.success) {
      throw new ProviderError(
        `IAM token response from ${tokenUrl} is malformed: ${parsed.error.message}`,
        this.errorKind,
      );
    }

    const expiresInMs = (parsed.data.expires_in ?? DEFAULT_EXPIRY_SECONDS) * 1000;
    this.cached = { token: parsed.data.access_token, expiresAt: this.now() + expiresInMs };
    this.logger?.debug({ url: tokenUrl, expiresInMs }, 'obtained IAM token');
    return parsed.data.access_token;
  }

  public async getHeaders(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${await this.getToken()}` };
  }
}
