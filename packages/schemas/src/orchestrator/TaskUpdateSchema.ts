import { z } from 'zod';

const CredentialPayloadSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean()]),
);

export const TaskErrorSchema = z.object({
  code: z.string().min(1),
  description: z.string(),
});

/**
 * Body of `PUT /api/v2/secrets/{secret_id}/tasks/{task_id}`.
 */
export const TaskUpdateSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('credentials_created'),
    credentials: z.object({
      id: z.string().min(1),
      payload: CredentialPayloadSchema,
    }),
  }),
  z.object({
    status: z.literal('credentials_deleted'),
  }),
  z.object({
    status: z.literal('failed'),
    errors: z.array(TaskErrorSchema).min(1),
  }),
]);

export type TaskUpdate = z.infer<typeof TaskUpdateSchema>;
export type TaskError = z.infer<typeof TaskErrorSchema>;
