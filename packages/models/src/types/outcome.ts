import type { SagaState, TaskErrorCode } from '../enums/task.js';

export interface SucceededOutcome {
  status: 'succeeded';
  state: SagaState;
  credentialId?: string;
}

export interface FailedOutcome {
  status: 'failed';
  state: SagaState;
  code: TaskErrorCode;
  description: string;
  /** Whether the failure was delivered to the orchestrator. */
  reported: boolean;
}

/**
 * Result of one job run. Only the process entry point turns it into an exit
 * code.
 */
export type Outcome = SucceededOutcome | FailedOutcome;
