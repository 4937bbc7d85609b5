export const KEY_ALGORITHMS = ['RSA', 'ECDSA'] as const;
export type KeyAlgorithm = (typeof KEY_ALGORITHMS)[number];

export const SIGN_ALGORITHMS = ['SHA256', 'SHA512'] as const;
export type SignAlgorithm = (typeof SIGN_ALGORITHMS)[number];

export const DEFAULT_EXPIRATION_DAYS = 90;

export interface CertificateConfig {
  commonName: string;
  organization?: string;
  country?: string;
  /** DNS subject alternative names */
  subjectAltNames: string[];
  expirationDays: number;
  keyAlgorithm: KeyAlgorithm;
  signAlgorithm: SignAlgorithm;
}
