/**
 * PostgreSQL connection pool shared by every storage class.
 */

import pg from 'pg';
import type { DatabaseConfig } from '@plugstead/shared';

const { Pool } = pg;

let pool: pg.Pool | null = null;

export interface PgPoolConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  poolSize: number;
}

/** Creates the pool once; later calls return the existing pool. */
export function initPool(config: PgPoolConfig, onError?: (err: Error) => void): pg.Pool {
  if (pool) {
    return pool;
  }

  pool = new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
    max: config.poolSize,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  // Idle client errors would otherwise crash the process
  pool.on('error', (err: Error) => onError?.(err));

  return pool;
}

export function initPoolFromConfig(dbConfig: DatabaseConfig, onError?: (err: Error) => void): pg.Pool {
  return initPool(
    {
      host: process.env.PLUGSTEAD_DB_HOST ?? dbConfig.host,
      port: dbConfig.port,
      database: dbConfig.database,
      user: dbConfig.user,
      password: process.env[dbConfig.passwordEnv] ?? '',
      ssl: dbConfig.ssl,
      poolSize: dbConfig.poolSize,
    },
    onError
  );
}

export function getPool(): pg.Pool {
  if (!pool) {
    throw new Error('PostgreSQL pool not initialized. Call initPool() first.');
  }
  return pool;
}

export function isPoolInitialized(): boolean {
  return pool !== null;
}

export async function closePool(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    await closing.end();
  }
}

/** Reset pool reference (for testing) */
export function resetPool(): void {
  pool = null;
}
