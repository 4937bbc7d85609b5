/**
 * Value types a job parameter may declare.
 */
export type ParameterType =
  | { kind: 'string' }
  | { kind: 'integer' }
  | { kind: 'boolean' }
  | { kind: 'secret_id' }
  | { kind: 'enum'; options: readonly string[] };

/**
 * Raw declaration as written by a job definition, e.g.
 * `SMIN_SCOPE: { type: 'string', required: false }` or
 * `SMIN_KEY_ALGO: { type: 'enum[RSA|ECDSA]' }`.
 */
export interface ParameterSpec {
  type: string;
  required?: boolean;
}

export type ParameterDirection = 'input' | 'output';

/**
 * Validated parameter declaration.
 */
export interface ParameterDeclaration {
  /** Declared name, including its `SMIN_` or `SMOUT_` prefix */
  name: string;
  direction: ParameterDirection;
  /** Environment variable (inputs) or payload key (outputs) */
  key: string;
  type: ParameterType;
  required: boolean;
}

export type ParameterValue = string | number | boolean;
