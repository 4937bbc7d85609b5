export { slackOAuthJob } from './job.js';
export { SlackOAuthBackend } from './oauth-backend.js';
export type { SlackOAuthBackendOptions } from './oauth-backend.js';
export { SLACK_OAUTH_URL, type SlackOAuthConfig, type ExchangeCredentials } from './types.js';
