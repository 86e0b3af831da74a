import pg from 'pg';
import { env } from '../config/env.js';
import { logger } from '../config/logger.js';
import type { Queryable } from './types.js';

export const pool = new pg.Pool({
  connectionString: env.DATABASE_URL,
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

pool.on('error', (err) => {
  logger.error('Idle database client failed', { error: err.message });
});

/**
 * Run a statement on the pool. Every statement is timed at debug level;
 * failures are logged with their SQL and rethrown.
 */
export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  const startedAt = Date.now();
  try {
    const result = await pool.query<T>(text, params);
    logger.debug('Query executed', { text, ms: Date.now() - startedAt, rows: result.rowCount });
    return result;
  } catch (error) {
    logger.error('Query failed', { text, error: error instanceof Error ? error.message : String(error) });
    throw error;
  }
}

export const db: Queryable = { query };

/**
 * Run `work` on one client between BEGIN and COMMIT; rolls back on failure
 */
export async function withTransaction<T>(work: (client: Queryable) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function disconnect() {
  await pool.end();
  logger.info('Database pool closed');
}
