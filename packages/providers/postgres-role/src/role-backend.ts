import type { Logger } from 'pino';
import type { Credential } from '@credential-providers/models';
import {
  BaseCredentialBackend,
  ProviderError,
  errorMessage,
  toError,
  type RetryPolicy,
} from '@credential-providers/core';
import { quoteIdentifier, quoteLiteral, type DatabaseClient, type DatabasePool } from './database.js';
import {
  composeRoleUrl,
  generateRoleName,
  generateRolePassword,
  parseRoleOid,
} from './credentials.js';
import type { PostgresConnectionInfo, PostgresRoleConfig } from './types.js';

export interface PostgresRoleBackendOptions {
  pool: DatabasePool;
  connection: PostgresConnectionInfo;
  schemaName: string;
  retryPolicy: RetryPolicy;
  logger: Logger;
  roleName?: () => string;
  rolePassword?: () => string;
}

function readOid(rows: Record<string, unknown>[]): string {
  const oid = rows[0]?.oid;
  if ((typeof oid === 'number' || typeof oid === 'string') && /^\d+$/.test(String(oid))) {
    return String(oid);
  }
  throw new Error('role OID was not returned');
}

/**
 * Read-only login roles on a Postgres schema.
 *
 * Both operations run in a single transaction; nothing is left behind when
 * a statement fails.
 */
export class PostgresRoleBackend extends BaseCredentialBackend<PostgresRoleConfig> {
  private readonly pool: DatabasePool;
  private readonly connection: PostgresConnectionInfo;
  private readonly schemaName: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly roleName: () => string;
  private readonly rolePassword: () => string;

  public constructor(options: PostgresRoleBackendOptions) {
    super('postgres-role', options.logger);
    this.pool = options.pool;
    this.connection = options.connection;
    this.schemaName = options.schemaName;
    this.retryPolicy = options.retryPolicy;
    this.roleName = options.roleName ?? generateRoleName;
    this.rolePassword = options.rolePassword ?? (() => generateRolePassword());
  }

  protected async doCreate(): Promise<Credential> {
    const roleName = this.roleName();
    const password = this.rolePassword();
    const role = quoteIdentifier(roleName);
    const schema = quoteIdentifier(this.schemaName);

    const oid = await this.inTransaction(async (client) => {
      await client.query(`CREATE ROLE ${role} WITH LOGIN PASSWORD ${quoteLiteral(password)}`);
      const { rows } = await client.query('SELECT oid FROM pg_roles WHERE rolname = $1', [roleName]);
      const roleOid = readOid(rows);
      await client.query(`GRANT USAGE ON SCHEMA ${schema} TO ${role}`);
      await client.query(`GRANT SELECT ON ALL TABLES IN SCHEMA ${schema} TO ${role}`);
      return roleOid;
    }, `cannot create role for schema '${this.schemaName}'`);

    this.logger.info({ oid, schema: this.schemaName }, 'created role');

    return {
      id: oid,
      payload: {
        certificate_base64: this.connection.certificateBase64,
        username: roleName,
        password,
        composed: composeRoleUrl(this.connection.composed, roleName, password),
      },
    };
  }

  protected async doRevoke(credentialId: string): Promise<void> {
    const oid = parseRoleOid(credentialId);
    const schema = quoteIdentifier(this.schemaName);

    await this.inTransaction(async (client) => {
      const { rows } = await client.query('SELECT rolname FROM pg_roles WHERE oid = $1', [oid]);
      const roleName = rows[0]?.rolname;
      if (typeof roleName !== 'string') {
        this.logger.info({ oid }, 'role does not exist; nothing to drop');
        return false;
      }
      const role = quoteIdentifier(roleName);
      await client.query(`REVOKE ALL PRIVILEGES ON SCHEMA ${schema} FROM ${role}`);
      await client.query(`REVOKE ALL PRIVILEGES ON ALL TABLES IN SCHEMA ${schema} FROM ${role}`);
      await client.query(`DROP ROLE IF EXISTS ${role}`);
      return true;
    }, `cannot drop role ${oid}`);
  }

  public override async close(): Promise<void> {
    await this.pool.end();
  }

  private async connect(): Promise<DatabaseClient> {
    try {
      return await this.retryPolicy.execute(() => this.pool.connect(), undefined, 'connect to postgres');
    } catch (error) {
      throw ProviderError.backendTransient(
        `cannot connect to postgres: ${errorMessage(error)}`,
        undefined,
        toError(error),
      );
    }
  }

  /**
   * Runs `work` between BEGIN and COMMIT. A `false` result, or a thrown error,
   * rolls the transaction back instead.
   */
  private async inTransaction<T>(
    work: (client: DatabaseClient) => Promise<T>,
    failure: string,
  ): Promise<T> {
    const client = await this.connect();
    let broken: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query(result === false ? 'ROLLBACK' : 'COMMIT');
      return result;
    } catch (error) {
      broken = toError(error);
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        this.logger.warn({ err: toError(rollbackError) }, 'rollback failed');
      });
      throw new Error(`${failure}: ${broken.message}`, { cause: broken });
    } finally {
      client.release(broken);
    }
  }
}
