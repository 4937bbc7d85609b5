export type { TaskContext } from './task-context.js';
export type { Credential, CredentialPayload, CredentialPayloadValue } from './credential.js';
export type { Outcome, SucceededOutcome, FailedOutcome } from './outcome.js';
export type {
  ParameterType,
  ParameterSpec,
  ParameterDirection,
  ParameterDeclaration,
  ParameterValue,
} from './parameters.js';
