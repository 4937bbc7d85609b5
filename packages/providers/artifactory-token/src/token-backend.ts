import type { Logger } from 'pino';
import type { Credential } from '@credential-providers/models';
import {
  BaseCredentialBackend,
  ProviderError,
  createErrorFromHttpStatus,
  type BackendHttpClient,
} from '@credential-providers/core';
import {
  AccessErrorResponseSchema,
  CreatedTokenSchema,
  TOKENS_PATH,
  type ArtifactoryTokenConfig,
} from './types.js';

const NO_DETAIL = 'error details were not provided by the server';

/**
 * Message of the first error in an access API error body.
 */
export function accessErrorDetail(body: unknown): string {
  const parsed = AccessErrorResponseSchema.safeParse(body);
  if (!parsed.success) {
    return typeof body === 'string' && body !== '' ? body : NO_DETAIL;
  }
  return parsed.data.errors[0]?.message ?? NO_DETAIL;
}

export interface ArtifactoryTokenBackendOptions {
  baseUrl: string;
  /** Admin token sent as bearer on every call */
  adminToken: string;
  http: BackendHttpClient;
  logger: Logger;
}

export class ArtifactoryTokenBackend extends BaseCredentialBackend<ArtifactoryTokenConfig> {
  private readonly tokensUrl: string;
  private readonly adminToken: string;
  private readonly http: BackendHttpClient;

  public constructor(options: ArtifactoryTokenBackendOptions) {
    super('artifactory-token', options.logger);
    this.tokensUrl = `${options.baseUrl}${TOKENS_PATH}`;
    this.adminToken = options.adminToken;
    this.http = options.http;
  }

  protected async doCreate(config: ArtifactoryTokenConfig): Promise<Credential> {
    const response = await this.http.request({
      method: 'POST',
      url: this.tokensUrl,
      bearerToken: this.adminToken,
      json: {
        grant_type: config.grantType,
        username: config.username,
        scope: config.scope,
        expires_in: config.expiresInSeconds,
        refreshable: config.refreshable,
        description: config.description,
        audience: config.audience,
        include_reference_token: config.includeReferenceToken,
      },
      description: 'create access token',
    });

    if (!response.ok) {
      throw createErrorFromHttpStatus(
        response.status,
        'create access token',
        accessErrorDetail(response.body),
      );
    }

    const parsed = CreatedTokenSchema.safeParse(response.body);
    if (!parsed.success) {
      throw ProviderError.backendPermanent(
        `unexpected access token response: ${parsed.error.message}`,
        response.status,
      );
    }

    return {
      id: parsed.data.token_id,
      payload: { access_token: parsed.data.access_token },
    };
  }

  protected async doRevoke(credentialId: string): Promise<void> {
    const response = await this.http.request({
      method: 'DELETE',
      url: `${this.tokensUrl}${encodeURIComponent(credentialId)}`,
      bearerToken: this.adminToken,
      description: `revoke access token ${credentialId}`,
    });

    if (response.status === 404) {
      this.logger.info({ credentialId }, 'access token does not exist; nothing to revoke');
      return;
    }
    if (!response.ok) {
      throw createErrorFromHttpStatus(
        response.status,
        `revoke access token ${credentialId}`,
        accessErrorDetail(response.body),
      );
    }
  }
}
