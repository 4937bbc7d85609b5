import type { TaskContext } from '@credential-providers/models';
import { CommonJobConfigSchema } from '@credential-providers/schemas';
import { ProviderError } from '../errors/index.js';

export type Environment = Readonly<Record<string, string | undefined>>;

export interface CommonJobConfig {
  context: TaskContext;
  /** API key the job authenticates to the orchestrator with */
  accessApiKey: string;
}

/**
 * Reads the orchestrator-supplied parameters every job receives.
 * @throws {ProviderError} Configuration error listing every invalid value
 */
export function loadCommonConfig(env: Environment): CommonJobConfig {
  const parsed = CommonJobConfigSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.message.startsWith('SM_') ? issue.message : `${issue.path.join('.')}: ${issue.message}`,
    );
    throw ProviderError.configuration(`invalid job environment: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  return {
    accessApiKey: values.SM_ACCESS_APIKEY,
    context: {
      instanceUrl: values.SM_INSTANCE_URL.replace(/\/+$/, ''),
      secretId: values.SM_SECRET_ID,
      taskId: values.SM_SECRET_TASK_ID,
      secretGroupId: values.SM_SECRET_GROUP_ID,
      secretName: values.SM_SECRET_NAME,
      action: values.SM_ACTION,
      trigger: values.SM_TRIGGER,
      credentialsId: values.SM_CREDENTIALS_ID,
      secretVersionId: values.SM_SECRET_VERSION_ID,
    },
  };
}
