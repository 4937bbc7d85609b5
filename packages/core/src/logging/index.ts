export {
  createJobLogger,
  createSilentLogger,
  REDACT_PATHS,
  REDACT_CENSOR,
} from './pino-setup.js';
export type { JobLoggerOptions } from './pino-setup.js';
export type { Logger } from 'pino';
