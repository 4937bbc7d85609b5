import { z } from 'zod';

/**
 * Response of the IAM `apikey` grant.
 */
export const IamTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive().optional(),
  expiration: z.number().optional(),
});

export type IamTokenResponse = z.infer<typeof IamTokenResponseSchema>;
