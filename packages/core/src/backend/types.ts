import type { Logger } from 'pino';
import type { Credential, ParameterDeclaration, TaskContext } from '@credential-providers/models';
import type { OrchestratorClient } from '../orchestrator/index.js';
import type { BackendHttpClient } from '../http/index.js';
import type { RetryPolicy } from '../retry/index.js';
import type { Environment, ParameterSpecs, ParameterValues } from '../config/index.js';

/**
 * One third-party system able to create and revoke credentials.
 *
 * `revoke` must succeed for an identifier the system does not know.
 * @public
 */
export interface CredentialBackend<TParams> {
  readonly name: string;
  create(params: TParams): Promise<Credential>;
  revoke(credentialId: string): Promise<void>;
  /** Releases connections held by the backend */
  close?(): Promise<void>;
}

/**
 * Collaborators handed to a job when it connects its backend.
 */
export interface JobDependencies {
  context: TaskContext;
  orchestrator: OrchestratorClient;
  http: BackendHttpClient;
  retryPolicy: RetryPolicy;
  logger: Logger;
  /** Replaces global fetch for calls made outside `http` */
  fetchFn?: typeof fetch;
}

/**
 * What a provider package declares.
 * @public
 */
export interface JobDefinition<TConfig> {
  name: string;
  description: string;
  /** `SMIN_*` inputs and `SMOUT_*` outputs */
  parameters: ParameterSpecs;
  /** Builds the typed configuration by direct assignment from the input values */
  toConfig(values: ParameterValues, context: TaskContext): TConfig;
  /** Fetches login material and returns a ready backend */
  connect(config: TConfig, deps: JobDependencies): Promise<CredentialBackend<TConfig>>;
}

/**
 * Backend with its create parameters already bound.
 */
export interface BoundBackend {
  readonly name: string;
  create(): Promise<Credential>;
  revoke(credentialId: string): Promise<void>;
  close(): Promise<void>;
}

export interface ConfiguredJob {
  connect(deps: JobDependencies): Promise<BoundBackend>;
}

/**
 * Type-erased job as the dispatcher and the CLI registry see it.
 * @public
 */
export interface ProviderJob {
  readonly name: string;
  readonly description: string;
  readonly declarations: readonly ParameterDeclaration[];
  /**
   * Reads the job's inputs from the environment.
   * @throws {ProviderError} Configuration error when an input is missing or malformed
   */
  configure(env: Environment, context: TaskContext): ConfiguredJob;
}
