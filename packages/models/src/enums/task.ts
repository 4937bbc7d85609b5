/**
 * Action selectors the orchestrator passes to a job run.
 */
export enum TaskAction {
  Create = 'create_credentials',
  Delete = 'delete_credentials',
}

/**
 * Task statuses sent back to the orchestrator when a run reports its outcome.
 */
export const TaskStatus = {
  CREDENTIALS_CREATED: 'credentials_created',
  CREDENTIALS_DELETED: 'credentials_deleted',
  FAILED: 'failed',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/**
 * Stable error codes attached to a failed task.
 *
 * `revoke_failed_after_report_failure` is never sent: it marks the run that
 * ends in the `Fatal` state and is only logged.
 */
export const TaskErrorCodes = {
  UNKNOWN_ACTION: 'unknown_action',
  CONFIGURATION_INVALID: 'configuration_invalid',
  LOGIN_SECRET_UNAVAILABLE: 'login_secret_unavailable',
  BACKEND_UNREACHABLE: 'backend_unreachable',
  CREATE_REJECTED: 'create_rejected',
  DELETE_REJECTED: 'delete_rejected',
  PAYLOAD_INVALID: 'payload_invalid',
  REPORT_FAILED_AFTER_CREATE: 'report_failed_after_create',
  REVOKE_FAILED_AFTER_REPORT_FAILURE: 'revoke_failed_after_report_failure',
  ORCHESTRATOR_UNREACHABLE: 'orchestrator_unreachable',
} as const;

export type TaskErrorCode = (typeof TaskErrorCodes)[keyof typeof TaskErrorCodes];

/**
 * States of one provisioning saga run.
 */
export enum SagaState {
  Start = 'start',
  Created = 'created',
  CreateFailed = 'create_failed',
  ReportedOk = 'reported_ok',
  ReportFailed = 'report_failed',
  Compensated = 'compensated',
  CompensationFailed = 'compensation_failed',
  ReportedError = 'reported_error',
  Fatal = 'fatal',
}
