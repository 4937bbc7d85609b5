import {
  ProviderError,
  defineJob,
  type OrchestratorClient,
  type ProviderJob,
} from '@credential-providers/core';
import { createPostgresPool, type PoolFactory } from './database.js';
import { PostgresRoleBackend } from './role-backend.js';
import {
  DEFAULT_SCHEMA_NAME,
  PostgresServiceCredentialsSchema,
  type PostgresConnectionInfo,
  type PostgresRoleConfig,
} from './types.js';

/**
 * Reads the CA certificate and admin URL from a database service-credentials
 * secret.
 */
export async function fetchConnectionInfo(
  orchestrator: OrchestratorClient,
  secretId: string,
): Promise<PostgresConnectionInfo> {
  const secret = await orchestrator.getSecret(secretId, ['service_credentials']);
  const parsed = PostgresServiceCredentialsSchema.safeParse(secret.credentials);
  if (!parsed.success) {
    throw ProviderError.upstreamFetch(
      `secret ${secretId} does not hold postgres connection details: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
  }
  const { certificate, composed } = parsed.data.connection.postgres;
  const [url] = composed;
  if (url === undefined || !URL.canParse(url)) {
    throw ProviderError.upstreamFetch(`secret ${secretId} holds an invalid postgres connection URL`);
  }
  return { certificateBase64: certificate.certificate_base64, composed: url };
}

export function decodeCertificate(certificateBase64: string): string {
  const pem = Buffer.from(certificateBase64, 'base64').toString('utf8');
  if (!pem.includes('-----BEGIN CERTIFICATE-----')) {
    throw ProviderError.upstreamFetch('postgres certificate is not a base64-encoded PEM');
  }
  return pem;
}

/**
 * Builds the job around a pool factory; tests pass an in-memory one.
 */
export function createPostgresRoleJob(createPool: PoolFactory = createPostgresPool): ProviderJob {
  return defineJob<PostgresRoleConfig>({
    name: 'postgres-role',
    description: 'Read-only Postgres login roles on one schema',
    parameters: {
      SMIN_LOGIN_SECRET_ID: { type: 'secret_id', required: true },
      SMIN_SCHEMA_NAME: { type: 'string' },
      SMOUT_CERTIFICATE_BASE64: { type: 'string', required: true },
      SMOUT_USERNAME: { type: 'string', required: true },
      SMOUT_PASSWORD: { type: 'string', required: true },
      SMOUT_COMPOSED: { type: 'string', required: true },
    },
    toConfig: (values) => ({
      loginSecretId: values.requireString('SMIN_LOGIN_SECRET_ID'),
      schemaName: values.string('SMIN_SCHEMA_NAME') ?? DEFAULT_SCHEMA_NAME,
    }),
    connect: async (config, deps) => {
      const connection = await fetchConnectionInfo(deps.orchestrator, config.loginSecretId);
      const pool = createPool({
        composed: connection.composed,
        caCertificate: decodeCertificate(connection.certificateBase64),
        logger: deps.logger,
      });
      return new PostgresRoleBackend({
        pool,
        connection,
        schemaName: config.schemaName,
        retryPolicy: deps.retryPolicy,
        logger: deps.logger,
      });
    },
  });
}

export const postgresRoleJob = createPostgresRoleJob();
