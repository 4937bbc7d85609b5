import { defineJob } from '@credential-providers/core';
import { SlackOAuthBackend } from './oauth-backend.js';
import type { SlackOAuthConfig } from './types.js';

export const slackOAuthJob = defineJob<SlackOAuthConfig>({
  name: 'slack-oauth',
  description: 'Chat-platform OAuth tokens rotated by refresh-token exchange',
  parameters: {
    SMIN_EXCHANGE_TOKENS_SECRET_ID: { type: 'secret_id', required: true },
    SMOUT_SLACK_ACCESS_TOKEN: { type: 'string', required: true },
    SMOUT_SLACK_REFRESH_TOKEN: { type: 'string', required: true },
  },
  toConfig: (values, context) => ({
    exchangeSecretId: values.requireString('SMIN_EXCHANGE_TOKENS_SECRET_ID'),
    secretId: context.secretId,
  }),
  // Secrets are read on create only; delete has nothing to revoke.
  connect: async (_config, deps) =>
    new SlackOAuthBackend({
      orchestrator: deps.orchestrator,
      http: deps.http,
      logger: deps.logger,
    }),
});
