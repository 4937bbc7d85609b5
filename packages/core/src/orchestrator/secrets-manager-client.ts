import type { Logger } from 'pino';
import type { Credential, TaskContext } from '@credential-providers/models';
import { TaskStatus } from '@credential-providers/models';
import {
  SecretSchema,
  TaskUpdateSchema,
  type SecretType,
  type TaskUpdate,
} from '@credential-providers/schemas';
import { ProviderError, errorMessage, toError } from '../errors/index.js';
import { parseResponseBody } from '../http/index.js';
import type { TokenProvider } from '../auth/index.js';
import { isSecretOfType, type OrchestratorClient, type SecretOfType } from './types.js';

export interface SecretsManagerClientOptions {
  instanceUrl: string;
  authenticator: TokenProvider;
  logger: Logger;
  fetchFn?: typeof fetch;
}

/**
 * HTTP client for the secrets-lifecycle orchestrator.
 *
 * Secrets are read from `GET /api/v2/secrets/{id}`; task outcomes are written
 * to `PUT /api/v2/secrets/{secret_id}/tasks/{task_id}`.
 * @public
 */
export class SecretsManagerClient implements OrchestratorClient {
  private readonly baseUrl: string;
  private readonly authenticator: TokenProvider;
  private readonly logger: Logger;
  private readonly fetchFn?: typeof fetch;

  public constructor(options: SecretsManagerClientOptions) {
    this.baseUrl = options.instanceUrl.replace(/\/+$/, '');
    this.authenticator = options.authenticator;
    this.logger = options.logger;
    this.fetchFn = options.fetchFn;
  }

  public async getSecret<T extends SecretType>(
    id: string,
    expectedTypes: readonly T[],
  ): Promise<SecretOfType<T>> {
    const url = `${this.baseUrl}/api/v2/secrets/${encodeURIComponent(id)}`;
    let status: number;
    let body: unknown;
    try {
      const token = await this.authenticator.getToken();
      const response = await this.send(url, { method: 'GET', token });
      status = response.status;
      body = response.body;
    } catch (error) {
      throw ProviderError.upstreamFetch(
        `failed to fetch secret ${id}: ${errorMessage(error)}`,
        undefined,
        toError(error),
      );
    }

    if (status !== 200) {
      throw ProviderError.upstreamFetch(`failed to fetch secret ${id}: HTTP ${status}`, status);
    }

    const parsed = SecretSchema.safeParse(body);
    if (!parsed.success) {
      throw ProviderError.upstreamFetch(
        `secret ${id} has an unsupported type or shape: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ')}`,
      );
    }

    const secret = parsed.data;
    const secretType = secret.secret_type;
    if (!isSecretOfType(secret, expectedTypes)) {
      throw ProviderError.upstreamFetch(
        `secret ${id} is of type ${secretType}; expected ${expectedTypes.join(' or ')}`,
      );
    }

    this.logger.debug({ secretId: id, secretType }, 'fetched secret');
    return secret;
  }

  public async reportCreated(context: TaskContext, credential: Credential): Promise<void> {
    await this.updateTask(context, {
      status: TaskStatus.CREDENTIALS_CREATED,
      credentials: { id: credential.id, payload: credential.payload },
    });
  }

  public async reportDeleted(context: TaskContext): Promise<void> {
    await this.updateTask(context, { status: TaskStatus.CREDENTIALS_DELETED });
  }

  public async reportFailed(context: TaskContext, code: string, description: string): Promise<void> {
    await this.updateTask(context, {
      status: TaskStatus.FAILED,
      errors: [{ code, description }],
    });
  }

  private async updateTask(context: TaskContext, update: TaskUpdate): Promise<void> {
    const target = `task ${context.taskId} of secret ${context.secretId}`;
    const validated = TaskUpdateSchema.safeParse(update);
    if (!validated.success) {
      throw ProviderError.report(`refusing to send malformed update for ${target}: ${validated.error.message}`);
    }

    const url = `${this.baseUrl}/api/v2/secrets/${encodeURIComponent(
      context.secretId,
    )}/tasks/${encodeURIComponent(context.taskId)}`;

    let status: number;
    let text: string;
    try {
      const token = await this.authenticator.getToken();
      const response = await this.send(url, { method: 'PUT', token, json: validated.data });
      status = response.status;
      text = response.text;
    } catch (error) {
      throw ProviderError.report(
        `failed to update ${target}: ${errorMessage(error)}`,
        undefined,
        toError(error),
      );
    }

    if (status !== 200) {
      throw ProviderError.report(
        `failed to update ${target} with status ${update.status}: HTTP ${status}${
          text ? `: ${text.slice(0, 500)}` : ''
        }`,
        status,
      );
    }

    this.logger.info({ taskId: context.taskId, status: update.status }, 'task updated');
  }

  private async send(
    url: string,
    request: { method: 'GET' | 'PUT'; token: string; json?: unknown },
  ): Promise<{ status: number; body: unknown; text: string }> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Bearer ${request.token}`,
    };
    let body: string | undefined;
    if (request.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.json);
    }

    const fetchFn = this.fetchFn ?? fetch;
    const response = await fetchFn(url, { method: request.method, headers, body });
    const text = await response.text();
    return { status: response.status, body: parseResponseBody(text), text };
  }
}
