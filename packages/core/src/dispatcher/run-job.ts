import type { Logger } from 'pino';
import {
  SagaState,
  TaskAction,
  TaskErrorCodes,
  type Outcome,
  type TaskContext,
} from '@credential-providers/models';
import { loadCommonConfig, type CommonJobConfig, type Environment } from '../config/index.js';
import { createJobLogger } from '../logging/index.js';
import { errorMessage, toError } from '../errors/index.js';
import { IamAuthenticator, iamUrlForInstance } from '../auth/index.js';
import { SecretsManagerClient, type OrchestratorClient } from '../orchestrator/index.js';
import { BackendHttpClient } from '../http/index.js';
import { RetryPolicy, type RetryPolicyConfig } from '../retry/index.js';
import { validatePayload } from '../payload/index.js';
import { ProvisioningSaga, errorCodeFor } from '../saga/index.js';
import type { BoundBackend, ConfiguredJob, ProviderJob } from '../backend/index.js';

export interface RunJobOptions {
  job: ProviderJob;
  env: Environment;
  /** Replaces the run logger built from `LOG_LEVEL` */
  logger?: Logger;
  /** Replaces the HTTP orchestrator client */
  orchestrator?: (context: TaskContext, accessApiKey: string, logger: Logger) => OrchestratorClient;
  retry?: RetryPolicyConfig;
  fetchFn?: typeof fetch;
}

const ACTIONS: readonly string[] = Object.values(TaskAction);

function isTaskAction(action: string): action is TaskAction {
  return ACTIONS.includes(action);
}

/**
 * Process exit code for an outcome.
 */
export function exitCodeFor(outcome: Outcome): number {
  return outcome.status === 'succeeded' ? 0 : 1;
}

/**
 * Runs one job action from start to finish and returns its outcome.
 *
 * Order of checks: job environment (fatal, nothing can be reported), action
 * selector, provider inputs, credential id for deletes, login material. Only
 * then does the saga touch the backend.
 * @public
 */
export async function runJob(options: RunJobOptions): Promise<Outcome> {
  const { job, env } = options;

  let common: CommonJobConfig;
  try {
    common = loadCommonConfig(env);
  } catch (error) {
    const logger = options.logger ?? createJobLogger({ level: env.LOG_LEVEL });
    logger.fatal({ err: toError(error), job: job.name }, 'job environment is invalid');
    return {
      status: 'failed',
      state: SagaState.Fatal,
      code: TaskErrorCodes.CONFIGURATION_INVALID,
      description: errorMessage(error),
      reported: false,
    };
  }

  const { context, accessApiKey } = common;
  const logger =
    options.logger ??
    createJobLogger({ level: env.LOG_LEVEL, taskId: context.taskId, action: context.action });
  const orchestrator = options.orchestrator
    ? options.orchestrator(context, accessApiKey, logger)
    : new SecretsManagerClient({
        instanceUrl: context.instanceUrl,
        authenticator: new IamAuthenticator({
          apiKey: accessApiKey,
          url: iamUrlForInstance(context.instanceUrl),
          logger,
          fetchFn: options.fetchFn,
        }),
        logger,
        fetchFn: options.fetchFn,
      });

  const saga = new ProvisioningSaga({
    context,
    orchestrator,
    logger,
    validatePayload: (payload) => validatePayload(payload, job.declarations),
  });

  logger.info(
    { job: job.name, secretId: context.secretId, trigger: context.trigger },
    'job started',
  );

  const action = context.action;
  if (!isTaskAction(action)) {
    return finish(
      logger,
      await saga.abort(
        TaskErrorCodes.UNKNOWN_ACTION,
        `unknown action '${action}'; expected ${ACTIONS.join(' or ')}`,
      ),
    );
  }

  let configured: ConfiguredJob;
  try {
    configured = job.configure(env, context);
  } catch (error) {
    return finish(
      logger,
      await saga.abort(errorCodeFor(error, TaskErrorCodes.CONFIGURATION_INVALID), errorMessage(error)),
    );
  }

  let run: (backend: BoundBackend) => Promise<Outcome>;
  if (action === TaskAction.Delete) {
    const credentialId = context.credentialsId;
    if (credentialId === undefined) {
      return finish(
        logger,
        await saga.abort(
          TaskErrorCodes.CONFIGURATION_INVALID,
          'SM_CREDENTIALS_ID is required to delete credentials',
        ),
      );
    }
    run = (connected) => saga.delete(connected, credentialId);
  } else {
    run = (connected) => saga.create(connected);
  }

  const retryPolicy = new RetryPolicy({ ...options.retry, logger: options.retry?.logger ?? logger });
  const backendLogger = logger.child({ backend: job.name });
  let backend: BoundBackend;
  try {
    backend = await configured.connect({
      context,
      orchestrator,
      http: new BackendHttpClient({ logger: backendLogger, retryPolicy, fetchFn: options.fetchFn }),
      retryPolicy,
      logger: backendLogger,
      fetchFn: options.fetchFn,
    });
  } catch (error) {
    return finish(
      logger,
      await saga.abort(
        errorCodeFor(error, TaskErrorCodes.LOGIN_SECRET_UNAVAILABLE),
        errorMessage(error),
      ),
    );
  }

  try {
    return finish(logger, await run(backend));
  } finally {
    await backend.close().catch((error: unknown) => {
      logger.warn({ err: toError(error) }, 'failed to release backend resources');
    });
  }
}

function finish(logger: Logger, outcome: Outcome): Outcome {
  if (outcome.status === 'succeeded') {
    logger.info({ state: outcome.state, credentialId: outcome.credentialId }, 'job finished');
  } else {
    logger.error(
      { state: outcome.state, code: outcome.code, reported: outcome.reported },
      'job failed',
    );
  }
  return outcome;
}
