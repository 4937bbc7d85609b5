import { z } from 'zod';

export const SLACK_OAUTH_URL = 'https://slack.com/api/oauth.v2.access';

/** Tokens are rotated by exchange, so there is nothing to address on revoke */
export const SLACK_CREDENTIAL_ID = 'na';

export interface SlackOAuthConfig {
  exchangeSecretId: string;
  /** Secret whose current version may hold the last issued refresh token */
  secretId: string;
}

/**
 * JSON payload of the arbitrary secret holding the app's exchange credentials.
 */
export const ExchangeCredentialsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
  access_token: z.string().optional(),
});

export type ExchangeCredentials = z.infer<typeof ExchangeCredentialsSchema>;

export const TokenExchangeResponseSchema = z.object({
  ok: z.boolean(),
  access_token: z.string().optional(),
  refresh_token: z.string().optional(),
  error: z.string().optional(),
});
