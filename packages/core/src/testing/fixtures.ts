import type { TaskContext } from '@credential-providers/models';
import type { Logger } from 'pino';
import { createSilentLogger } from '../logging/index.js';
import { RetryPolicy } from '../retry/index.js';
import { BackendHttpClient } from '../http/index.js';
import type { JobDependencies } from '../backend/index.js';
import type { OrchestratorClient } from '../orchestrator/index.js';

export function createTestContext(overrides: Partial<TaskContext> = {}): TaskContext {
  return {
    instanceUrl: 'https://instance.example.com',
    secretId: 'secret-1',
    taskId: 'task-abcdef123456',
    secretGroupId: 'group-1',
    secretName: 'my-secret',
    action: 'create_credentials',
    trigger: 'manual',
    ...overrides,
  };
}

/**
 * Environment with every orchestrator-supplied value set.
 */
export function createTestEnvironment(
  overrides: Record<string, string | undefined> = {},
): Record<string, string | undefined> {
  return {
    SM_ACCESS_APIKEY: 'test-apikey',
    SM_INSTANCE_URL: 'https://instance.example.com',
    SM_SECRET_ID: 'secret-1',
    SM_SECRET_TASK_ID: 'task-abcdef123456',
    SM_SECRET_GROUP_ID: 'group-1',
    SM_SECRET_NAME: 'my-secret',
    SM_ACTION: 'create_credentials',
    SM_TRIGGER: 'manual',
    ...overrides,
  };
}

export function createTestLogger(): Logger {
  return createSilentLogger();
}

/**
 * Retry policy that records its waits instead of sleeping.
 */
export function createInstantRetryPolicy(waits: number[] = []): RetryPolicy {
  return new RetryPolicy({
    sleep: async (ms) => {
      waits.push(ms);
    },
  });
}

export function createTestDependencies(
  orchestrator: OrchestratorClient,
  options: { fetchFn?: typeof fetch; context?: TaskContext; waits?: number[] } = {},
): JobDependencies {
  const logger = createTestLogger();
  const retryPolicy = createInstantRetryPolicy(options.waits);
  return {
    context: options.context ?? createTestContext(),
    orchestrator,
    logger,
    retryPolicy,
    http: new BackendHttpClient({ logger, retryPolicy, fetchFn: options.fetchFn }),
    fetchFn: options.fetchFn,
  };
}

/**
 * Builds a fetch Response; `undefined` bodies produce an empty response.
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), {
    status,
    headers: body === undefined ? {} : { 'Content-Type': 'application/json' },
  });
}
