import type { Logger } from 'pino';
import {
  SagaState,
  TaskErrorCodes,
  type Credential,
  type CredentialPayload,
  type Outcome,
  type TaskContext,
  type TaskErrorCode,
} from '@credential-providers/models';
import { errorMessage, toError } from '../errors/index.js';
import type { OrchestratorClient } from '../orchestrator/index.js';
import type { BoundBackend } from '../backend/index.js';
import { errorCodeFor } from './error-codes.js';

/**
 * Allowed saga transitions. Terminal states have no successors.
 */
const TRANSITIONS: Readonly<Record<SagaState, readonly SagaState[]>> = {
  [SagaState.Start]: [SagaState.Created, SagaState.CreateFailed, SagaState.ReportedOk, SagaState.ReportedError, SagaState.Fatal],
  [SagaState.Created]: [SagaState.ReportedOk, SagaState.ReportFailed],
  [SagaState.CreateFailed]: [SagaState.ReportedError, SagaState.Fatal],
  [SagaState.ReportFailed]: [SagaState.Compensated, SagaState.CompensationFailed],
  [SagaState.Compensated]: [SagaState.ReportedError, SagaState.Fatal],
  [SagaState.CompensationFailed]: [SagaState.Fatal],
  [SagaState.ReportedOk]: [],
  [SagaState.ReportedError]: [],
  [SagaState.Fatal]: [],
};

export interface ProvisioningSagaOptions {
  context: TaskContext;
  orchestrator: OrchestratorClient;
  logger: Logger;
  /** Returns the problems that keep a payload from being reported */
  validatePayload?: (payload: CredentialPayload) => string[];
}

/**
 * Create-then-report with compensation, and revoke-then-report, for one run.
 *
 * Each step runs once. A credential created in this run is either reported or
 * revoked before the saga returns; when both the report and the revoke fail the
 * saga ends in `Fatal` without a further report.
 * @example
 * ```typescript
 * const saga = new ProvisioningSaga({ context, orchestrator, logger });
 * const outcome = await saga.create(backend);
 * ```
 * @public
 */
export class ProvisioningSaga {
  private readonly context: TaskContext;
  private readonly orchestrator: OrchestratorClient;
  private readonly logger: Logger;
  private readonly validatePayload: (payload: CredentialPayload) => string[];
  private currentState = SagaState.Start;
  private readonly visited: SagaState[] = [SagaState.Start];

  public constructor(options: ProvisioningSagaOptions) {
    this.context = options.context;
    this.orchestrator = options.orchestrator;
    this.logger = options.logger;
    this.validatePayload = options.validatePayload ?? (() => []);
  }

  public get state(): SagaState {
    return this.currentState;
  }

  /** States passed through so far, starting with `Start` */
  public get history(): readonly SagaState[] {
    return [...this.visited];
  }

  /**
   * Creates a credential and reports it, revoking it when the report fails.
   */
  public async create(backend: BoundBackend): Promise<Outcome> {
    this.assertFresh();

    let credential: Credential;
    try {
      credential = await backend.create();
    } catch (error) {
      this.transition(SagaState.CreateFailed);
      this.logger.error({ err: toError(error) }, 'credential creation failed');
      return this.reportFailure(
        errorCodeFor(error, TaskErrorCodes.CREATE_REJECTED),
        errorMessage(error),
      );
    }
    this.transition(SagaState.Created);

    const problems = this.validatePayload(credential.payload);
    let failureCode: TaskErrorCode;
    let failureReason: string;
    if (problems.length > 0) {
      failureCode = TaskErrorCodes.PAYLOAD_INVALID;
      failureReason = `credential payload is invalid: ${problems.join('; ')}`;
    } else {
      try {
        await this.orchestrator.reportCreated(this.context, credential);
        this.transition(SagaState.ReportedOk);
        return { status: 'succeeded', state: this.currentState, credentialId: credential.id };
      } catch (error) {
        failureCode = TaskErrorCodes.REPORT_FAILED_AFTER_CREATE;
        failureReason = errorMessage(error);
      }
    }

    this.transition(SagaState.ReportFailed);
    this.logger.warn(
      { credentialId: credential.id, reason: failureReason },
      'credential could not be reported; revoking it',
    );

    try {
      await backend.revoke(credential.id);
    } catch (revokeError) {
      this.transition(SagaState.CompensationFailed);
      const description = `${failureReason}; revoking credentials ${credential.id} also failed: ${errorMessage(revokeError)}`;
      this.logger.fatal(
        { credentialId: credential.id, reportError: failureReason, err: toError(revokeError) },
        'credential was neither reported nor revoked; operator intervention required',
      );
      this.transition(SagaState.Fatal);
      return {
        status: 'failed',
        state: this.currentState,
        code: TaskErrorCodes.REVOKE_FAILED_AFTER_REPORT_FAILURE,
        description,
        reported: false,
      };
    }
    this.transition(SagaState.Compensated);

    return this.reportFailure(
      failureCode,
      `${failureReason}; credentials ${credential.id} were revoked`,
    );
  }

  /**
   * Revokes a credential and reports the deletion.
   */
  public async delete(backend: BoundBackend, credentialId: string): Promise<Outcome> {
    this.assertFresh();

    try {
      await backend.revoke(credentialId);
    } catch (error) {
      this.logger.error({ credentialId, err: toError(error) }, 'credential revocation failed');
      return this.reportFailure(
        errorCodeFor(error, TaskErrorCodes.DELETE_REJECTED),
        errorMessage(error),
      );
    }

    try {
      await this.orchestrator.reportDeleted(this.context);
    } catch (error) {
      this.logger.fatal({ credentialId, err: toError(error) }, 'deletion could not be reported');
      this.transition(SagaState.Fatal);
      return {
        status: 'failed',
        state: this.currentState,
        code: TaskErrorCodes.ORCHESTRATOR_UNREACHABLE,
        description: errorMessage(error),
        reported: false,
      };
    }

    this.transition(SagaState.ReportedOk);
    return { status: 'succeeded', state: this.currentState, credentialId };
  }

  /**
   * Ends the run before any backend call, reporting `code`.
   */
  public async abort(code: TaskErrorCode, description: string): Promise<Outcome> {
    this.assertFresh();
    return this.reportFailure(code, description);
  }

  private async reportFailure(code: TaskErrorCode, description: string): Promise<Outcome> {
    try {
      await this.orchestrator.reportFailed(this.context, code, description);
    } catch (error) {
      this.logger.fatal(
        { code, description, err: toError(error) },
        'failure could not be reported',
      );
      this.transition(SagaState.Fatal);
      return { status: 'failed', state: this.currentState, code, description, reported: false };
    }

    this.transition(SagaState.ReportedError);
    this.logger.error({ code, description }, 'task failed');
    return { status: 'failed', state: this.currentState, code, description, reported: true };
  }

  private assertFresh(): void {
    if (this.currentState !== SagaState.Start) {
      throw new Error(`saga already ran (state ${this.currentState})`);
    }
  }

  private transition(to: SagaState): void {
    const from = this.currentState;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`illegal saga transition ${from} -> ${to}`);
    }
    this.currentState = to;
    this.visited.push(to);
    this.logger.debug({ from, to }, 'saga transition');
  }
}
