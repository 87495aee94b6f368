import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import type { Logger } from '../logging/logger.js';

const { Pool } = pg;

export type DbPool = PgPool;

/**
 * Create the Postgres pool. Connections are opened lazily, so a bad URL only
 * surfaces on first query.
 */
export function createPool(connectionString: string, logger: Logger): DbPool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error', { error: err });
  });

  return pool;
}
