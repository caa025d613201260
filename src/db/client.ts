import { Pool } from 'pg';
import type { QueryResultRow } from 'pg';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

/**
 * The slice of a pg client the repositories use. Tests pass a recording fake.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: R[]; rowCount: number | null }>;
}

let pool: Pool | null = null;

export function getDb(): Pool {
  if (!pool) {
    logger.info('DB', 'Initializing connection pool...');
    pool = new Pool({
      connectionString: config.DATABASE_URL,
      ssl: config.DATABASE_SSL ? { rejectUnauthorized: false } : false,
      max: config.DATABASE_POOL_SIZE,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    pool.on('error', (err) => logger.error('DB', 'Unexpected error on idle client', err));

    logger.info('DB', `Pool initialized (max ${config.DATABASE_POOL_SIZE} connections)`);
  }
  return pool;
}

/**
 * Queryable backed by the shared pool
 */
export function getQueryable(): Queryable {
  return {
    query: <R extends QueryResultRow>(text: string, values?: unknown[]) => getDb().query<R>(text, values),
  };
}

/**
 * Round-trip time of SELECT 1 in milliseconds
 */
export async function pingDb(db: Queryable = getQueryable()): Promise<number> {
  const started = Date.now();
  await db.query('SELECT 1');
  return Date.now() - started;
}

export async function disconnectDb(): Promise<void> {
  if (pool) {
    logger.info('DB', 'Closing connection pool...');
    await pool.end();
    pool = null;
    logger.info('DB', 'Disconnected');
  }
}
