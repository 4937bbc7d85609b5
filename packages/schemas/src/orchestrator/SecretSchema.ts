import { z } from 'zod';

const SecretMetadataShape = {
  id: z.string(),
  name: z.string().optional(),
  secret_group_id: z.string().optional(),
};

export const ArbitrarySecretSchema = z.object({
  ...SecretMetadataShape,
  secret_type: z.literal('arbitrary'),
  payload: z.string(),
});

export const UsernamePasswordSecretSchema = z.object({
  ...SecretMetadataShape,
  secret_type: z.literal('username_password'),
  username: z.string(),
  password: z.string(),
});

export const CustomCredentialsSecretSchema = z.object({
  ...SecretMetadataShape,
  secret_type: z.literal('custom_credentials'),
  credentials_content: z.record(z.string(), z.unknown()).default({}),
  versions_total: z.number().int().nonnegative().default(0),
});

export const ServiceCredentialsSecretSchema = z.object({
  ...SecretMetadataShape,
  secret_type: z.literal('service_credentials'),
  credentials: z.record(z.string(), z.unknown()),
});

export const IamCredentialsSecretSchema = z.object({
  ...SecretMetadataShape,
  secret_type: z.literal('iam_credentials'),
  api_key: z.string().optional(),
});

/**
 * Secret returned by `GET /api/v2/secrets/{id}`, discriminated on `secret_type`.
 */
export const SecretSchema = z.discriminatedUnion('secret_type', [
  ArbitrarySecretSchema,
  UsernamePasswordSecretSchema,
  CustomCredentialsSecretSchema,
  ServiceCredentialsSecretSchema,
  IamCredentialsSecretSchema,
]);

export type ArbitrarySecret = z.infer<typeof ArbitrarySecretSchema>;
export type UsernamePasswordSecret = z.infer<typeof UsernamePasswordSecretSchema>;
export type CustomCredentialsSecret = z.infer<typeof CustomCredentialsSecretSchema>;
export type ServiceCredentialsSecret = z.infer<typeof ServiceCredentialsSecretSchema>;
export type IamCredentialsSecret = z.infer<typeof IamCredentialsSecretSchema>;
export type Secret = z.infer<typeof SecretSchema>;
export type SecretType = Secret['secret_type'];
