import { z } from 'zod';

export const ACTIONS_WHEN_LEAKED = ['none', 'disable', 'delete'] as const;

export type ActionWhenLeaked = (typeof ACTIONS_WHEN_LEAKED)[number];

/**
 * Typed configuration of one API key run.
 */
export interface IamApiKeyConfig {
  /** Secret holding the API key used to call IAM */
  apiKeySecretId: string;
  /** IAM endpoint, without trailing slash */
  url: string;
  iamId: string;
  accountId: string;
  supportSessions: boolean;
  actionWhenLeaked?: ActionWhenLeaked;
  name: string;
  description: string;
}

export const CreatedApiKeySchema = z.object({
  id: z.string().min(1),
  crn: z.string(),
  iam_id: z.string(),
  account_id: z.string(),
  apikey: z.string().min(1),
});

export type CreatedApiKey = z.infer<typeof CreatedApiKeySchema>;

export const IamErrorResponseSchema = z.object({
  errors: z.array(
    z.object({
      code: z.string(),
      message: z.string().optional(),
      details: z.string().optional(),
    }),
  ),
});
