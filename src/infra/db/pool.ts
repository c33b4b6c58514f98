import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import { logger as rootLogger } from '../logger.js';

const { Pool } = pg;

export interface PoolOptions {
  connectionString: string;
  /** Upper bound for a single query, in ms. */
  queryTimeoutMs: number;
}

const logger = rootLogger.child({ component: 'db' });

export function createPool(options: PoolOptions): PgPool {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: options.queryTimeoutMs,
    query_timeout: options.queryTimeoutMs,
  });

  pool.on('connect', () => {
    logger.debug({}, 'Database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database error');
  });

  return pool;
}
