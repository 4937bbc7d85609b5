export { postgresRoleJob, createPostgresRoleJob, fetchConnectionInfo, decodeCertificate } from './job.js';
export { PostgresRoleBackend } from './role-backend.js';
export type { PostgresRoleBackendOptions } from './role-backend.js';
export {
  createPostgresPool,
  quoteIdentifier,
  quoteLiteral,
  type DatabaseClient,
  type DatabasePool,
  type PoolFactory,
} from './database.js';
export { generateRoleName, generateRolePassword, parseRoleOid } from './credentials.js';
export type { PostgresRoleConfig, PostgresConnectionInfo } from './types.js';
