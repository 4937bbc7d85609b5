import pg from 'pg';
import type { Logger } from 'pino';

export interface QueryRows {
  rows: Record<string, unknown>[];
}

/**
 * One checked-out connection.
 */
export interface DatabaseClient {
  query(text: string, values?: unknown[]): Promise<QueryRows>;
  /** Pass the error that broke the connection to discard it */
  release(error?: Error): void;
}

export interface DatabasePool {
  connect(): Promise<DatabaseClient>;
  end(): Promise<void>;
}

export interface PoolOptions {
  /** Admin connection URL */
  composed: string;
  /** CA certificate PEM */
  caCertificate: string;
  logger: Logger;
}

export type PoolFactory = (options: PoolOptions) => DatabasePool;

/**
 * A single-connection pg pool verifying the server against the given CA.
 */
export const createPostgresPool: PoolFactory = ({ composed, caCertificate, logger }) => {
  // sslmode in the URL would replace the ssl options below
  const url = new URL(composed);
  url.searchParams.delete('sslmode');
  url.searchParams.delete('sslrootcert');

  const pool = new pg.Pool({
    connectionString: url.toString(),
    ssl: { ca: caCertificate, rejectUnauthorized: true },
    max: 1,
  });
  // idle clients dropped by the server; the next connect() fails and is retried
  pool.on('error', (error) => {
    logger.warn({ err: error }, 'idle postgres connection failed');
  });

  return {
    connect: async () => {
      const client = await pool.connect();
      return {
        query: async (text, values) => {
          const result = await client.query<Record<string, unknown>>(text, values);
          return { rows: result.rows };
        },
        release: (error) => client.release(error),
      };
    },
    end: () => pool.end(),
  };
};

export function quoteIdentifier(identifier: string): string {
  return `"${identifier.replaceAll('"', '""')}"`;
}

export function quoteLiteral(literal: string): string {
  return `'${literal.replaceAll("'", "''")}'`;
}
