/**
 * Database Migration: Sync Runs
 * @module db/migrations/001_sync_runs
 *
 * Creates the sync_runs table holding one row per reconcile cycle.
 */

import type { Queryable } from '../../repositories/interfaces.js';

/**
 * Migration interface
 */
export interface Migration {
  readonly version: string;
  readonly name: string;
  up(client: Queryable): Promise<void>;
  down(client: Queryable): Promise<void>;
}

export const migration: Migration = {
  version: '001',
  name: 'sync_runs',

  async up(client: Queryable): Promise<void> {
    await client.query(`
      CREATE TABLE IF NOT EXISTS sync_runs (
        id UUID PRIMARY KEY,
        application TEXT NOT NULL,
        trigger TEXT NOT NULL,
        revision TEXT,
        status TEXT NOT NULL CHECK (status IN (
          'Succeeded', 'Failed', 'Cancelled', 'AwaitingApproval', 'DriftReported', 'Errored'
        )),
        operations JSONB NOT NULL DEFAULT '[]'::jsonb,
        results JSONB NOT NULL DEFAULT '[]'::jsonb,
        error JSONB,
        started_at TIMESTAMPTZ NOT NULL,
        finished_at TIMESTAMPTZ NOT NULL
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_sync_runs_application_started
        ON sync_runs (application, started_at DESC)
    `);
  },

  async down(client: Queryable): Promise<void> {
    await client.query(`DROP TABLE IF EXISTS sync_runs CASCADE`);
  },
};

export default migration;
