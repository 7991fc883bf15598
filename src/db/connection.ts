/**
 * PostgreSQL Database Connection Pool
 * @module db/connection
 */

import pg from 'pg';
import { createModuleLogger } from '../logging/index.js';

const { Pool } = pg;

export interface DbConfig {
  connectionString: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

const DEFAULT_POOL_SETTINGS = {
  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
} as const;

/**
 * PostgreSQL connection pool singleton
 */
let pool: pg.Pool | null = null;

/**
 * Get or create the database connection pool
 */
export function getPool(config: Partial<DbConfig> & { connectionString: string }): pg.Pool {
  if (!pool) {
    const logger = createModuleLogger('db-connection');
    pool = new Pool({ ...DEFAULT_POOL_SETTINGS, ...config });

    pool.on('connect', () => {
      logger.debug('New client connected to pool');
    });

    pool.on('error', (err) => {
      logger.error({ err }, 'Unexpected pool error');
    });

    pool.on('remove', () => {
      logger.debug('Client removed from pool');
    });
  }

  return pool;
}

/**
 * Close the database connection pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    createModuleLogger('db-connection').info('Database pool closed');
  }
}

/**
 * Check database connectivity
 */
export async function checkConnection(db: pg.Pool): Promise<boolean> {
  try {
    const result = await db.query('SELECT 1 as health_check');
    return result.rows.length > 0;
  } catch (error) {
    createModuleLogger('db-connection').error({ err: error }, 'Database health check failed');
    return false;
  }
}
