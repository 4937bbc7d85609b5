import type { Logger } from 'pino';
import type { Credential } from '@credential-providers/models';
import {
  BaseCredentialBackend,
  ProviderError,
  createErrorFromHttpStatus,
  type BackendHttpClient,
  type BackendResponse,
  type TokenProvider,
} from '@credential-providers/core';
import {
  CreatedApiKeySchema,
  IamErrorResponseSchema,
  type IamApiKeyConfig,
} from './types.js';

export interface IamApiKeyBackendOptions {
  url: string;
  http: BackendHttpClient;
  authenticator: TokenProvider;
  logger: Logger;
}

/**
 * First error message of an IAM error body.
 */
export function iamErrorDetail(body: unknown): string | undefined {
  const parsed = IamErrorResponseSchema.safeParse(body);
  if (!parsed.success) {
    return typeof body === 'string' && body !== '' ? body : undefined;
  }
  const [first] = parsed.data.errors;
  return first?.message ?? first?.code;
}

/**
 * An IAM 404 whose body holds exactly one `not_found` error.
 */
export function isApiKeyNotFound(response: BackendResponse): boolean {
  if (response.status !== 404) {
    return false;
  }
  const parsed = IamErrorResponseSchema.safeParse(response.body);
  return parsed.success && parsed.data.errors.length === 1 && parsed.data.errors[0]?.code === 'not_found';
}

/**
 * IAM Identity API keys.
 *
 * Keys are created locked so they cannot be deleted by accident; revoke
 * unlocks first and treats an unknown key as already deleted.
 */
export class IamApiKeyBackend extends BaseCredentialBackend<IamApiKeyConfig> {
  private readonly url: string;
  private readonly http: BackendHttpClient;
  private readonly authenticator: TokenProvider;

  public constructor(options: IamApiKeyBackendOptions) {
    super('iam-apikey', options.logger);
    this.url = options.url;
    this.http = options.http;
    this.authenticator = options.authenticator;
  }

  protected async doCreate(config: IamApiKeyConfig): Promise<Credential> {
    const body: Record<string, unknown> = {
      name: config.name,
      description: config.description,
      iam_id: config.iamId,
      account_id: config.accountId,
      support_sessions: config.supportSessions,
    };
    if (config.actionWhenLeaked) {
      body.action_when_leaked = config.actionWhenLeaked;
    }

    const response = await this.http.request({
      method: 'POST',
      url: `${this.url}/v1/apikeys`,
      bearerToken: await this.authenticator.getToken(),
      headers: { 'Entity-Lock': 'true', 'Entity-Disable': 'false' },
      json: body,
      description: `create API key ${config.name}`,
    });

    if (!response.ok) {
      throw createErrorFromHttpStatus(
        response.status,
        `create API key ${config.name}`,
        iamErrorDetail(response.body),
      );
    }

    const parsed = CreatedApiKeySchema.safeParse(response.body);
    if (!parsed.success) {
      throw ProviderError.backendPermanent(
        `IAM returned an unexpected API key representation: ${parsed.error.message}`,
        response.status,
      );
    }

    const key = parsed.data;
    return {
      id: key.id,
      payload: {
        apikey: key.apikey,
        id: key.id,
        crn: key.crn,
        iam_id: key.iam_id,
        account_id: key.account_id,
      },
    };
  }

  protected async doRevoke(credentialId: string): Promise<void> {
    const token = await this.authenticator.getToken();
    const keyUrl = `${this.url}/v1/apikeys/${encodeURIComponent(credentialId)}`;

    const unlock = await this.http.request({
      method: 'POST',
      url: `${keyUrl}/unlock`,
      bearerToken: token,
      description: `unlock API key ${credentialId}`,
    });

    if (isApiKeyNotFound(unlock)) {
      this.logger.info({ credentialId }, 'API key does not exist; nothing to delete');
      return;
    }
    if (unlock.status !== 204) {
      if (unlock.ok) {
        throw ProviderError.backendPermanent(
          `unexpected ${unlock.status} response from IAM when unlocking API key ${credentialId}`,
          unlock.status,
        );
      }
      throw createErrorFromHttpStatus(
        unlock.status,
        `unlock API key ${credentialId}`,
        iamErrorDetail(unlock.body),
      );
    }

    const deletion = await this.http.request({
      method: 'DELETE',
      url: keyUrl,
      bearerToken: token,
      description: `delete API key ${credentialId}`,
    });

    if (!deletion.ok && !isApiKeyNotFound(deletion)) {
      throw createErrorFromHttpStatus(
        deletion.status,
        `delete API key ${credentialId}`,
        iamErrorDetail(deletion.body),
      );
    }
  }
}
