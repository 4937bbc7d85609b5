import { z } from 'zod';

export const DEFAULT_SCHEMA_NAME = 'public';

export interface PostgresRoleConfig {
  loginSecretId: string;
  schemaName: string;
}

/**
 * The part of a database service-credentials secret this job reads:
 * `connection.postgres.certificate.certificate_base64` and
 * `connection.postgres.composed[0]`.
 */
export const PostgresServiceCredentialsSchema = z.object({
  connection: z.object({
    postgres: z.object({
      certificate: z.object({
        certificate_base64: z.string().min(1),
      }),
      composed: z.array(z.string().min(1)).min(1),
    }),
  }),
});

export interface PostgresConnectionInfo {
  /** Base64 of the CA certificate PEM, as stored in the secret */
  certificateBase64: string;
  /** Admin connection URL */
  composed: string;
}
