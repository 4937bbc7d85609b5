import { z } from 'zod';

export const DEFAULT_SCOPE = 'applied-permissions/user';
/** 90 days */
export const DEFAULT_EXPIRES_IN_SECONDS = 7_776_000;
export const DEFAULT_AUDIENCE = '*@*';

export const TOKENS_PATH = '/access/api/v1/tokens/';

export interface ArtifactoryTokenConfig {
  loginSecretId: string;
  /** Without trailing slash */
  baseUrl: string;
  grantType?: string;
  username?: string;
  scope: string;
  expiresInSeconds: number;
  refreshable: boolean;
  description?: string;
  audience: string;
  includeReferenceToken: boolean;
}

export const CreatedTokenSchema = z.object({
  access_token: z.string().min(1),
  token_id: z.string().min(1),
  expires_in: z.number().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});

export const AccessErrorResponseSchema = z.object({
  errors: z.array(
    z.object({
      code: z.string().optional(),
      message: z.string().optional(),
    }),
  ),
});
