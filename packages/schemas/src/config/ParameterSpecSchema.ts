import { z } from 'zod';

export const ParameterNameSchema = z
  .string()
  .regex(/^(SMIN_|SMOUT_)[A-Z0-9_]+$/, 'parameter names start with SMIN_ or SMOUT_ followed by A-Z, 0-9 or _');

/**
 * `enum[a|b|...]` with at least two non-empty options.
 */
export const EnumTypePattern = /^enum\[([^|\]]+(?:\|[^|\]]+)+)\]$/;

export const ParameterTypeNameSchema = z
  .string()
  .refine(
    (type) => ['string', 'integer', 'boolean', 'secret_id'].includes(type) || EnumTypePattern.test(type),
    (type) => ({ message: `unsupported parameter type '${type}'` }),
  );

export const ParameterSpecSchema = z
  .object({
    type: ParameterTypeNameSchema,
    required: z.boolean().optional(),
  })
  .strict();

export const ParameterSpecsSchema = z
  .record(ParameterNameSchema, ParameterSpecSchema)
  .refine(
    (specs) =>
      Object.entries(specs).some(([name, spec]) => name.startsWith('SMOUT_') && spec.required === true),
    { message: 'at least one output parameter must be required' },
  );

export type ParameterSpecZod = z.infer<typeof ParameterSpecSchema>;
