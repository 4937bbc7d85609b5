export { certificateJob, parseSubjectAltNames } from './job.js';
export {
  CertificateBackend,
  keyAlgorithmsFor,
  randomSerialNumber,
  serialNumberHex,
} from './certificate-backend.js';
export type { CertificateBackendOptions } from './certificate-backend.js';
export type { CertificateConfig, KeyAlgorithm, SignAlgorithm } from './types.js';
