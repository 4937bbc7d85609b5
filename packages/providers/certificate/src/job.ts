import { defineJob, type ParameterValues } from '@credential-providers/core';
import { CertificateBackend } from './certificate-backend.js';
import {
  DEFAULT_EXPIRATION_DAYS,
  KEY_ALGORITHMS,
  SIGN_ALGORITHMS,
  type CertificateConfig,
} from './types.js';

export function parseSubjectAltNames(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name !== '');
}

export function toConfig(values: ParameterValues): CertificateConfig {
  const keyAlgorithm = values.string('SMIN_KEY_ALGO');
  const signAlgorithm = values.string('SMIN_SIGN_ALGO');
  return {
    commonName: values.requireString('SMIN_COMMON_NAME'),
    organization: values.string('SMIN_ORG'),
    country: values.string('SMIN_COUNTRY'),
    subjectAltNames: parseSubjectAltNames(values.string('SMIN_SAN')),
    expirationDays: values.integer('SMIN_EXPIRATION_DAYS') || DEFAULT_EXPIRATION_DAYS,
    keyAlgorithm: KEY_ALGORITHMS.find((algorithm) => algorithm === keyAlgorithm) ?? 'RSA',
    signAlgorithm: SIGN_ALGORITHMS.find((algorithm) => algorithm === signAlgorithm) ?? 'SHA256',
  };
}

export const certificateJob = defineJob<CertificateConfig>({
  name: 'certificate',
  description: 'Self-signed server certificates',
  parameters: {
    SMIN_COMMON_NAME: { type: 'string', required: true },
    SMIN_ORG: { type: 'string' },
    SMIN_COUNTRY: { type: 'string' },
    SMIN_SAN: { type: 'string' },
    SMIN_EXPIRATION_DAYS: { type: 'integer' },
    SMIN_KEY_ALGO: { type: `enum[${KEY_ALGORITHMS.join('|')}]` },
    SMIN_SIGN_ALGO: { type: `enum[${SIGN_ALGORITHMS.join('|')}]` },
    SMOUT_CERTIFICATE_BASE64: { type: 'string', required: true },
    SMOUT_PRIVATE_KEY_BASE64: { type: 'string', required: true },
  },
  toConfig,
  connect: async (_config, deps) => new CertificateBackend({ logger: deps.logger }),
});
