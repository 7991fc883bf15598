/**
 * Migration Runner
 * @module db/migrations
 *
 * Applies pending migrations in version order, each in its own transaction.
 */

import { createModuleLogger } from '../../logging/index.js';
import type { Queryable } from '../../repositories/interfaces.js';
import { migration as syncRuns, type Migration } from './001_sync_runs.js';

export type { Migration };

/**
 * The part of a pg Pool the runner uses
 */
export interface MigrationPool {
  connect(): Promise<Queryable & { release(): void }>;
}

export const MIGRATIONS: readonly Migration[] = [syncRuns];

/**
 * @returns versions applied by this call
 */
export async function runMigrations(
  pool: MigrationPool,
  migrations: readonly Migration[] = MIGRATIONS
): Promise<string[]> {
  const logger = createModuleLogger('migrations');
  const client = await pool.connect();
  const applied: string[] = [];

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);
    const existing = await client.query<{ version: string }>('SELECT version FROM schema_migrations');
    const done = new Set(existing.rows.map(row => row.version));

    const pending = [...migrations]
      .filter(m => !done.has(m.version))
      .sort((a, b) => a.version.localeCompare(b.version));

    for (const migration of pending) {
      await client.query('BEGIN');
      try {
        await migration.up(client);
        await client.query(
          'INSERT INTO schema_migrations (version, name) VALUES ($1, $2)',
          [migration.version, migration.name]
        );
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
      applied.push(migration.version);
      logger.info({ version: migration.version, name: migration.name }, 'Migration applied');
    }
  } finally {
    client.release();
  }

  return applied;
}
