import type { TaskContext } from '@credential-providers/models';
import {
  IAM_URL,
  IamAuthenticator,
  ProviderError,
  defineJob,
  type OrchestratorClient,
  type ParameterValues,
} from '@credential-providers/core';
import { IamApiKeyBackend } from './api-key-backend.js';
import { ACTIONS_WHEN_LEAKED, type ActionWhenLeaked, type IamApiKeyConfig } from './types.js';

/**
 * Key name: secret name plus the last six characters of the task id.
 */
export function apiKeyName(context: TaskContext): string {
  return `${context.secretName}-${context.taskId.slice(-6)}`;
}

export function apiKeyDescription(context: TaskContext): string {
  return `Created by the IAM user API key credentials provider for secret ${context.secretName} (${context.secretId}) by ${context.taskId}`;
}

function toActionWhenLeaked(value: string | undefined): ActionWhenLeaked | undefined {
  return ACTIONS_WHEN_LEAKED.find((action) => action === value);
}

/**
 * Reads the API key used to call IAM from an arbitrary secret, or from the
 * `apikey` field of a custom-credentials secret.
 */
export async function fetchLoginApiKey(
  orchestrator: OrchestratorClient,
  secretId: string,
): Promise<string> {
  const secret = await orchestrator.getSecret(secretId, ['arbitrary', 'custom_credentials']);
  if (secret.secret_type === 'arbitrary') {
    return secret.payload;
  }
  const apikey = secret.credentials_content.apikey;
  if (typeof apikey !== 'string' || apikey === '') {
    throw ProviderError.upstreamFetch(`secret ${secretId} is missing the 'apikey' field`);
  }
  return apikey;
}

export function toConfig(values: ParameterValues, context: TaskContext): IamApiKeyConfig {
  return {
    apiKeySecretId: values.requireString('SMIN_APIKEY_SECRET_ID'),
    url: (values.string('SMIN_URL') ?? IAM_URL).replace(/\/+$/, ''),
    iamId: values.requireString('SMIN_IAM_ID'),
    accountId: values.requireString('SMIN_ACCOUNT_ID'),
    supportSessions: values.boolean('SMIN_SUPPORT_SESSIONS') ?? false,
    actionWhenLeaked: toActionWhenLeaked(values.string('SMIN_ACTION_WHEN_LEAKED')),
    name: apiKeyName(context),
    description: apiKeyDescription(context),
  };
}

export const iamApiKeyJob = defineJob<IamApiKeyConfig>({
  name: 'iam-apikey',
  description: 'IAM user API keys, created locked and deleted after unlocking',
  parameters: {
    SMIN_APIKEY_SECRET_ID: { type: 'secret_id', required: true },
    SMIN_IAM_ID: { type: 'string', required: true },
    SMIN_ACCOUNT_ID: { type: 'string', required: true },
    SMIN_URL: { type: 'string' },
    SMIN_SUPPORT_SESSIONS: { type: 'boolean' },
    SMIN_ACTION_WHEN_LEAKED: { type: `enum[${ACTIONS_WHEN_LEAKED.join('|')}]` },
    SMOUT_APIKEY: { type: 'string', required: true },
    SMOUT_ID: { type: 'string' },
    SMOUT_CRN: { type: 'string' },
    SMOUT_IAM_ID: { type: 'string' },
    SMOUT_ACCOUNT_ID: { type: 'string' },
  },
  toConfig,
  connect: async (config, deps) => {
    deps.logger.info({ secretId: config.apiKeySecretId }, 'fetching IAM login API key');
    const apiKey = await fetchLoginApiKey(deps.orchestrator, config.apiKeySecretId);
    return new IamApiKeyBackend({
      url: config.url,
      http: deps.http,
      logger: deps.logger,
      authenticator: new IamAuthenticator({
        apiKey,
        url: config.url,
        logger: deps.logger,
        retryPolicy: deps.retryPolicy,
        fetchFn: deps.fetchFn,
      }),
    });
  },
});
