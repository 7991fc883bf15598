/**
 * PostgreSQL Sync History
 * @module repositories/sync-history-repository
 *
 * Stores sync runs in the `sync_runs` table. Older runs beyond the
 * per-Application limit are trimmed on insert.
 */

import type { SerializedError } from '../errors/index.js';
import type { OperationSummary, RunStatus, SyncResult, SyncRun, TriggerType } from '../types/sync.js';
import { BaseRepository } from './base-repository.js';
import type { ISyncHistoryRepository, Queryable, SyncRunFilter } from './interfaces.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Database row type for the sync_runs table
 */
interface SyncRunRow {
  id: string;
  application: string;
  trigger: TriggerType;
  revision: string | null;
  status: RunStatus;
  operations: OperationSummary[];
  results: SyncResult[];
  error: SerializedError | null;
  started_at: Date;
  finished_at: Date;
}

// ============================================================================
// Repository Implementation
// ============================================================================

export class SyncHistoryRepository extends BaseRepository implements ISyncHistoryRepository {
  constructor(db: Queryable, private readonly maxRunsPerApplication: number = 50) {
    super(db, 'sync_runs');
  }

  async record(run: SyncRun): Promise<void> {
    await this.query(
      `
      INSERT INTO sync_runs (
        id, application, trigger, revision, status,
        operations, results, error, started_at, finished_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      ON CONFLICT (id) DO NOTHING
      `,
      [
        run.id,
        run.application,
        run.trigger,
        run.revision,
        run.status,
        JSON.stringify(run.operations),
        JSON.stringify(run.results),
        run.error ? JSON.stringify(run.error) : null,
        run.startedAt,
        run.finishedAt,
      ]
    );

    await this.query(
      `
      DELETE FROM sync_runs
      WHERE application = $1
        AND id NOT IN (
          SELECT id FROM sync_runs
          WHERE application = $1
          ORDER BY started_at DESC
          LIMIT $2
        )
      `,
      [run.application, this.maxRunsPerApplication]
    );
  }

  async latest(application: string): Promise<SyncRun | null> {
    const row = await this.queryOne<SyncRunRow>(
      `
      SELECT * FROM sync_runs
      WHERE application = $1
      ORDER BY started_at DESC
      LIMIT 1
      `,
      [application]
    );
    return row ? this.mapRowToRun(row) : null;
  }

  async list(application: string, filter: SyncRunFilter): Promise<SyncRun[]> {
    const conditions: string[] = ['application = $1'];
    const params: unknown[] = [application];
    let paramIndex = 2;

    if (filter.status !== undefined) {
      const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
      const placeholders = statuses.map(() => `$${paramIndex++}`);
      conditions.push(`status IN (${placeholders.join(', ')})`);
      params.push(...statuses);
    }

    params.push(filter.limit);
    const rows = await this.queryAll<SyncRunRow>(
      `
      SELECT * FROM sync_runs
      WHERE ${conditions.join(' AND ')}
      ORDER BY started_at DESC
      LIMIT $${paramIndex}
      `,
      params
    );

    return rows.map(row => this.mapRowToRun(row));
  }

  async deleteForApplication(application: string): Promise<number> {
    const result = await this.query('DELETE FROM sync_runs WHERE application = $1', [application]);
    return result.rowCount ?? 0;
  }

  private mapRowToRun(row: SyncRunRow): SyncRun {
    return {
      id: row.id,
      application: row.application,
      trigger: row.trigger,
      revision: row.revision,
      status: row.status,
      operations: row.operations,
      results: row.results,
      startedAt: row.started_at.toISOString(),
      finishedAt: row.finished_at.toISOString(),
      ...(row.error ? { error: row.error } : {}),
    };
  }
}
