/**
 * Immutable per-run input bundle supplied by the orchestrator.
 *
 * `action` stays a raw string: an unrecognised selector must still reach the
 * dispatcher so it can be reported.
 */
export interface TaskContext {
  readonly instanceUrl: string;
  readonly secretId: string;
  readonly taskId: string;
  readonly secretGroupId: string;
  readonly secretName: string;
  readonly action: string;
  readonly trigger: string;
  /** Credential identifier assigned at creation; present on delete runs. */
  readonly credentialsId?: string;
  readonly secretVersionId?: string;
}
