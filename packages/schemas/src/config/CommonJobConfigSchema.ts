import { z } from 'zod';

const requiredValue = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} must not be empty`);

const optionalValue = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

/**
 * Orchestrator-supplied parameters every job receives through its environment.
 */
export const CommonJobConfigSchema = z.object({
  SM_ACCESS_APIKEY: requiredValue('SM_ACCESS_APIKEY'),
  SM_INSTANCE_URL: requiredValue('SM_INSTANCE_URL').pipe(
    z.string().url('SM_INSTANCE_URL must be a URL'),
  ),
  SM_SECRET_ID: requiredValue('SM_SECRET_ID'),
  SM_SECRET_TASK_ID: requiredValue('SM_SECRET_TASK_ID'),
  SM_SECRET_GROUP_ID: requiredValue('SM_SECRET_GROUP_ID'),
  SM_SECRET_NAME: requiredValue('SM_SECRET_NAME'),
  SM_ACTION: requiredValue('SM_ACTION'),
  SM_TRIGGER: requiredValue('SM_TRIGGER'),
  SM_CREDENTIALS_ID: optionalValue,
  SM_SECRET_VERSION_ID: optionalValue,
});

export type CommonJobConfigZod = z.infer<typeof CommonJobConfigSchema>;
