import type { CredentialPayload, ParameterDeclaration } from '@credential-providers/models';

/** Longest string value the orchestrator accepts for one output */
export const MAX_STRING_OUTPUT_LENGTH = 100_000;

/**
 * Checks a credential payload against the job's output declarations.
 *
 * @returns Problems found; empty when the payload may be reported
 */
export function validatePayload(
  payload: CredentialPayload,
  declarations: readonly ParameterDeclaration[],
): string[] {
  const outputs = declarations.filter((declaration) => declaration.direction === 'output');
  const declaredKeys = new Set(outputs.map((output) => output.key));
  const problems: string[] = [];

  for (const key of Object.keys(payload)) {
    if (!declaredKeys.has(key)) {
      problems.push(`${key} is not a declared output`);
    }
  }

  for (const output of outputs) {
    const value = payload[output.key];
    if (value === undefined || value === '') {
      if (output.required) {
        problems.push(`${output.key} is required`);
      }
      continue;
    }

    switch (output.type.kind) {
      case 'integer':
        if (typeof value !== 'number' || !Number.isInteger(value)) {
          problems.push(`${output.key} must be an integer`);
        }
        break;
      case 'boolean':
        if (typeof value !== 'boolean') {
          problems.push(`${output.key} must be a boolean`);
        }
        break;
      case 'enum':
        if (typeof value !== 'string' || !output.type.options.includes(value)) {
          problems.push(`${output.key} must be one of ${output.type.options.join(', ')}`);
        }
        break;
      case 'string':
      case 'secret_id':
        if (typeof value !== 'string') {
          problems.push(`${output.key} must be a string`);
        } else if (value.length > MAX_STRING_OUTPUT_LENGTH) {
          problems.push(
            `${output.key} is ${value.length} characters long; the limit is ${MAX_STRING_OUTPUT_LENGTH}`,
          );
        }
        break;
    }
  }

  return problems;
}
