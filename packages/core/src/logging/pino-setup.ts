/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact (through pino's `redact` option) for path-based redaction
 * of credential material. One logger is built per run and handed to every
 * component that logs.
 */

import { pino, stdSerializers, type DestinationStream, type Level, type Logger } from 'pino';

/**
 * Paths censored in every log line.
 *
 * Covers login material read from the orchestrator, credential payload fields
 * produced by the backends, and outbound request headers.
 * @public
 */
export const REDACT_PATHS: readonly string[] = [
  // Login material
  'password',
  '*.password',
  'apikey',
  '*.apikey',
  'api_key',
  '*.api_key',
  'token',
  '*.token',
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'client_secret',
  '*.client_secret',
  'authorization',
  '*.authorization',
  'headers.Authorization',
  '*.headers.Authorization',

  // Credential payloads
  'payload',
  '*.payload',
  'slack_access_token',
  '*.slack_access_token',
  'slack_refresh_token',
  '*.slack_refresh_token',
  'private_key_base64',
  '*.private_key_base64',
  'composed',
  '*.composed',
];

export const REDACT_CENSOR = '[REDACTED]';

const LEVELS: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface JobLoggerOptions {
  /** pino level name; unknown names fall back to `info` */
  level?: string;
  taskId?: string;
  action?: string;
  /** Alternate destination, stdout when omitted */
  destination?: DestinationStream;
}

function isLevel(level: string): level is Level | 'silent' {
  return LEVELS.includes(level);
}

/**
 * Creates the logger for one job run.
 *
 * The task id and action are bound to every line so a run can be followed
 * through the orchestrator's job logs.
 * @example
 * ```typescript
 * const logger = createJobLogger({ taskId: 'task-1', action: 'create_credentials' });
 * logger.info({ password: 'secret' }, 'login'); // password: '[REDACTED]'
 * ```
 * @public
 */
export function createJobLogger(options: JobLoggerOptions = {}): Logger {
  const level = options.level && isLevel(options.level) ? options.level : 'info';
  const config = {
    level,
    redact: {
      paths: [...REDACT_PATHS],
      censor: REDACT_CENSOR,
      remove: false, // Keep the keys, just redact values
    },
    serializers: {
      err: stdSerializers.err,
    },
  };
  const logger = options.destination ? pino(config, options.destination) : pino(config);

  const bindings: Record<string, string> = {};
  if (options.taskId) {
    bindings.taskId = options.taskId;
  }
  if (options.action) {
    bindings.action = options.action;
  }
  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}

/**
 * Logger that discards everything, for tests.
 * @public
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
