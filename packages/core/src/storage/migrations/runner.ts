/**
 * Migration Runner: applies the core SQL migrations in manifest order.
 *
 * Applied ids are tracked in `schema_migrations`. Concurrent processes
 * serialize on a Postgres advisory lock.
 */

import { getPool } from '../pg-pool.js';
import { MIGRATION_MANIFEST, type MigrationEntry } from './manifest.js';

const LOCK_KEY = 'plugstead_migrations';

/** The part of pg.Pool the runner needs. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(): void }>;
}

async function latestAppliedId(client: SqlClient): Promise<string | undefined> {
  const result = await client.query('SELECT id FROM schema_migrations ORDER BY id DESC LIMIT 1');
  const id = result.rows[0]?.id;
  return typeof id === 'string' ? id : undefined;
}

/** Returns the ids applied by this call. */
export async function runMigrations(
  migrations: MigrationEntry[] = MIGRATION_MANIFEST,
  pool: SqlPool = getPool()
): Promise<string[]> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at BIGINT NOT NULL
    )
  `);

  const last = migrations.at(-1);
  if (!last) return [];

  // Fast path without the lock
  if ((await latestAppliedId(pool)) === last.id) {
    return [];
  }

  const applied: string[] = [];
  const client = await pool.connect();
  try {
    await client.query('SELECT pg_advisory_lock(hashtext($1))', [LOCK_KEY]);
    try {
      // Another process may have finished while we waited
      if ((await latestAppliedId(client)) === last.id) {
        return applied;
      }

      for (const { id, sql } of migrations) {
        const existing = await client.query('SELECT id FROM schema_migrations WHERE id = $1', [id]);
        if (existing.rows.length > 0) continue;

        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (id, applied_at) VALUES ($1, $2)', [
          id,
          Date.now(),
        ]);
        applied.push(id);
      }
    } finally {
      await client.query('SELECT pg_advisory_unlock(hashtext($1))', [LOCK_KEY]);
    }
  } finally {
    client.release();
  }
  return applied;
}
