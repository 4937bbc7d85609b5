import type { Logger } from 'pino';
import type { Credential } from '@credential-providers/models';
import {
  BaseCredentialBackend,
  ProviderError,
  createErrorFromHttpStatus,
  errorMessage,
  toError,
  type BackendHttpClient,
  type OrchestratorClient,
  type SecretOfType,
} from '@credential-providers/core';
import {
  ExchangeCredentialsSchema,
  SLACK_CREDENTIAL_ID,
  SLACK_OAUTH_URL,
  TokenExchangeResponseSchema,
  type ExchangeCredentials,
  type SlackOAuthConfig,
} from './types.js';

export interface SlackOAuthBackendOptions {
  orchestrator: OrchestratorClient;
  http: BackendHttpClient;
  logger: Logger;
  oauthUrl?: string;
}

interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

/**
 * Refresh-token rotation against the chat platform's OAuth endpoint.
 *
 * The previous secret version's refresh token is tried first; when it is
 * missing or the exchange rejects it, the exchange secret's token is used.
 */
export class SlackOAuthBackend extends BaseCredentialBackend<SlackOAuthConfig> {
  private readonly orchestrator: OrchestratorClient;
  private readonly http: BackendHttpClient;
  private readonly oauthUrl: string;

  public constructor(options: SlackOAuthBackendOptions) {
    super('slack-oauth', options.logger);
    this.orchestrator = options.orchestrator;
    this.http = options.http;
    this.oauthUrl = options.oauthUrl ?? SLACK_OAUTH_URL;
  }

  protected async doCreate(config: SlackOAuthConfig): Promise<Credential> {
    const exchange = await this.fetchExchangeCredentials(config.exchangeSecretId);
    const previous = await this.previousRefreshToken(config.secretId);

    let tokens: TokenPair;
    if (previous === undefined || previous === exchange.refresh_token) {
      tokens = await this.exchangeRefreshToken(exchange, exchange.refresh_token);
    } else {
      try {
        tokens = await this.exchangeRefreshToken(exchange, previous);
      } catch (error) {
        this.logger.info(
          { err: toError(error) },
          'previous refresh token was rejected; retrying with the exchange secret token',
        );
        tokens = await this.exchangeRefreshToken(exchange, exchange.refresh_token);
      }
    }

    return {
      id: SLACK_CREDENTIAL_ID,
      payload: {
        slack_access_token: tokens.accessToken,
        slack_refresh_token: tokens.refreshToken,
      },
    };
  }

  protected async doRevoke(credentialId: string): Promise<void> {
    this.logger.debug({ credentialId }, 'tokens are rotated by exchange; nothing to revoke');
  }

  private async fetchExchangeCredentials(secretId: string): Promise<ExchangeCredentials> {
    const secret = await this.orchestrator.getSecret(secretId, ['arbitrary']);
    let content: unknown;
    try {
      content = JSON.parse(secret.payload);
    } catch (error) {
      throw ProviderError.upstreamFetch(
        `secret ${secretId} does not hold JSON exchange credentials: ${errorMessage(error)}`,
      );
    }
    const parsed = ExchangeCredentialsSchema.safeParse(content);
    if (!parsed.success) {
      throw ProviderError.upstreamFetch(
        `secret ${secretId} holds malformed exchange credentials: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`,
      );
    }
    return parsed.data;
  }

  /**
   * Refresh token issued by the last rotation, if the secret has a version
   * carrying one.
   */
  private async previousRefreshToken(secretId: string): Promise<string | undefined> {
    let secret: SecretOfType<'custom_credentials'>;
    try {
      secret = await this.orchestrator.getSecret(secretId, ['custom_credentials']);
    } catch (error) {
      this.logger.warn({ err: toError(error), secretId }, 'cannot read the previous secret version');
      return undefined;
    }
    if (secret.versions_total <= 0) {
      return undefined;
    }
    const token = secret.credentials_content.slack_refresh_token;
    return typeof token === 'string' && token !== '' ? token : undefined;
  }

  private async exchangeRefreshToken(
    exchange: ExchangeCredentials,
    refreshToken: string,
  ): Promise<TokenPair> {
    const response = await this.http.request({
      method: 'POST',
      url: this.oauthUrl,
      form: {
        client_id: exchange.client_id,
        client_secret: exchange.client_secret,
        refresh_token: refreshToken,
        grant_type: 'refresh_token',
      },
      description: 'exchange refresh token',
    });

    if (response.status !== 200) {
      throw createErrorFromHttpStatus(response.status, 'exchange refresh token', response.text);
    }

    const parsed = TokenExchangeResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw ProviderError.backendPermanent(
        `unexpected token exchange response: ${parsed.error.message}`,
        response.status,
      );
    }
    const result = parsed.data;
    if (!result.ok) {
      throw ProviderError.backendPermanent(
        `token exchange rejected: ${result.error ?? 'no error given'}`,
        response.status,
      );
    }
    if (!result.access_token || !result.refresh_token) {
      throw ProviderError.backendPermanent('token exchange response is missing tokens', response.status);
    }
    return { accessToken: result.access_token, refreshToken: result.refresh_token };
  }
}
