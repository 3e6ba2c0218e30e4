/**
 * Process-wide PostgreSQL pool plus the narrow executor the store is written against.
 */
import pg from 'pg';
import type { Pool } from 'pg';
import type { PgConfig } from '../types.js';
import { getLogger } from '../utils/logger.js';

const log = getLogger('db/pg');

export type SqlValue = string | number | boolean | null | Uint8Array | Date;
export type DbRow = Record<string, unknown>;

export type SqlResult<R> = { rows: R[]; rowCount: number };

export interface SqlExecutor {
  run(text: string, values?: SqlValue[]): Promise<SqlResult<DbRow>>;
}

let pool: Pool | null = null;

export function createPgPool(cfg: PgConfig & { applicationName?: string }): Pool {
  if (pool) return pool;
  pool = new pg.Pool({
    connectionString: cfg.connectionString,
    host: cfg.host,
    port: cfg.port,
    user: cfg.user,
    password: cfg.password,
    database: cfg.database,
    ssl: cfg.ssl ? { rejectUnauthorized: false } : undefined,
    max: cfg.poolSize,
    application_name: cfg.applicationName ?? 'hac-indexer',
  });
  pool.on('error', (err) => {
    log.error(`[pg] idle client error: ${err.message}`);
  });
  return pool;
}

export async function closePgPool(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}

export function poolExecutor(p: Pool): SqlExecutor {
  return {
    async run(text, values = []) {
      const res = await p.query<DbRow>(text, values);
      return { rows: res.rows, rowCount: res.rowCount ?? 0 };
    },
  };
}
