import type { Credential, TaskContext } from '@credential-providers/models';
import type { Secret, SecretType } from '@credential-providers/schemas';

export type SecretOfType<T extends SecretType> = Extract<Secret, { secret_type: T }>;

/**
 * Calls a job makes to the secrets-lifecycle orchestrator.
 *
 * None of these calls is retried: the orchestrator owns task state and a
 * failed report ends the run.
 * @public
 */
export interface OrchestratorClient {
  /**
   * Fetches a referenced secret, failing with an `upstream_fetch` error when
   * it is missing or not one of `expectedTypes`.
   */
  getSecret<T extends SecretType>(id: string, expectedTypes: readonly T[]): Promise<SecretOfType<T>>;

  reportCreated(context: TaskContext, credential: Credential): Promise<void>;

  reportDeleted(context: TaskContext): Promise<void>;

  reportFailed(context: TaskContext, code: string, description: string): Promise<void>;
}

/**
 * Narrows a secret to one of the accepted types.
 */
export function isSecretOfType<T extends SecretType>(
  secret: Secret,
  types: readonly T[],
): secret is SecretOfType<T> {
  return types.some((type) => type === secret.secret_type);
}
