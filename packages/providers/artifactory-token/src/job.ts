import {
  defineJob,
  type OrchestratorClient,
  type ParameterValues,
} from '@credential-providers/core';
import { ArtifactoryTokenBackend } from './token-backend.js';
import {
  DEFAULT_AUDIENCE,
  DEFAULT_EXPIRES_IN_SECONDS,
  DEFAULT_SCOPE,
  type ArtifactoryTokenConfig,
} from './types.js';

/**
 * Admin token from an arbitrary secret's payload or a username/password
 * secret's password.
 */
export async function fetchAdminToken(
  orchestrator: OrchestratorClient,
  secretId: string,
): Promise<string> {
  const secret = await orchestrator.getSecret(secretId, ['arbitrary', 'username_password']);
  return secret.secret_type === 'arbitrary' ? secret.payload : secret.password;
}

export function toConfig(values: ParameterValues): ArtifactoryTokenConfig {
  return {
    loginSecretId: values.requireString('SMIN_LOGIN_SECRET_ID'),
    baseUrl: values.requireString('SMIN_JFROG_BASE_URL').replace(/\/+$/, ''),
    grantType: values.string('SMIN_GRANT_TYPE'),
    username: values.string('SMIN_USERNAME'),
    scope: values.string('SMIN_SCOPE') ?? DEFAULT_SCOPE,
    expiresInSeconds: values.integer('SMIN_EXPIRES_IN_SECONDS') || DEFAULT_EXPIRES_IN_SECONDS,
    refreshable: values.boolean('SMIN_REFRESHABLE') ?? false,
    description: values.string('SMIN_DESCRIPTION'),
    audience: values.string('SMIN_AUDIENCE') ?? DEFAULT_AUDIENCE,
    includeReferenceToken: values.boolean('SMIN_INCLUDE_REFERENCE_TOKEN') ?? false,
  };
}

export const artifactoryTokenJob = defineJob<ArtifactoryTokenConfig>({
  name: 'artifactory-token',
  description: 'Scoped access tokens on an artifact repository',
  parameters: {
    SMIN_LOGIN_SECRET_ID: { type: 'secret_id', required: true },
    SMIN_JFROG_BASE_URL: { type: 'string', required: true },
    SMIN_GRANT_TYPE: { type: 'string' },
    SMIN_USERNAME: { type: 'string' },
    SMIN_SCOPE: { type: 'string' },
    SMIN_EXPIRES_IN_SECONDS: { type: 'integer' },
    SMIN_REFRESHABLE: { type: 'boolean' },
    SMIN_DESCRIPTION: { type: 'string' },
    SMIN_AUDIENCE: { type: 'string' },
    SMIN_INCLUDE_REFERENCE_TOKEN: { type: 'boolean' },
    SMOUT_ACCESS_TOKEN: { type: 'string', required: true },
  },
  toConfig,
  connect: async (config, deps) => {
    const adminToken = await fetchAdminToken(deps.orchestrator, config.loginSecretId);
    return new ArtifactoryTokenBackend({
      baseUrl: config.baseUrl,
      adminToken,
      http: deps.http,
      logger: deps.logger,
    });
  },
});
