export type CredentialPayloadValue = string | number | boolean;

/**
 * Flat mapping from output parameter name to value, as reported to the
 * orchestrator.
 */
export type CredentialPayload = Record<string, CredentialPayloadValue>;

/**
 * Artifact returned by a backend create: the identifier used later for revoke
 * plus the provider-specific payload.
 */
export interface Credential {
  id: string;
  payload: CredentialPayload;
}
