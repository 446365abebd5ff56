import { Pool, type PoolConfig } from 'pg';
import type { ServiceConfig } from '../config/serviceConfig';
import { logger } from '../observability/logger';

export type SqlRow = Record<string, unknown>;

/** Parameterised query runner; the seam the registry and migrations talk to. */
export type SqlExecutor = (text: string, values?: unknown[]) => Promise<{ rows: SqlRow[] }>;

export interface PostgresHandle {
  execute: SqlExecutor;
  close(): Promise<void>;
}

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

export function createPostgresHandle(config: ServiceConfig['registry']): PostgresHandle {
  if (!config.databaseUrl) {
    throw new Error('Postgres registry requires a database URL');
  }
  const poolConfig: PoolConfig = {
    connectionString: config.databaseUrl,
    max: config.maxConnections,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000
  };
  const pool = new Pool(poolConfig);

  pool.on('error', (err: Error) => {
    logger.error('Unexpected error on idle postgres client', { component: 'postgres', error: err });
  });

  return {
    async execute(text, values) {
      const result = await pool.query(text, values);
      return { rows: result.rows };
    },
    async close() {
      await pool.end();
    }
  };
}
