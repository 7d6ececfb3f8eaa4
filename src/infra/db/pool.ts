import pg from 'pg';
import type { Pool } from 'pg';

export interface PoolOptions {
  max?: number;
}

/**
 * Build a connection pool from an opaque connection string.
 * Nothing connects until the first query, so a bad string surfaces there.
 */
export function createPool(connectionString: string, options: PoolOptions = {}): Pool {
  const pool = new pg.Pool({
    connectionString,
    max: options.max ?? 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    console.log('Database connection established');
  });

  pool.on('error', (err) => {
    console.error('Unexpected database error:', err);
  });

  return pool;
}
