/**
 * In-Memory Sync History
 * @module repositories/in-memory-sync-history-repository
 *
 * Keeps the most recent runs of each Application in process memory.
 */

import type { SyncRun } from '../types/sync.js';
import type { ISyncHistoryRepository, SyncRunFilter } from './interfaces.js';

export class InMemorySyncHistoryRepository implements ISyncHistoryRepository {
  private readonly runs = new Map<string, SyncRun[]>();

  constructor(private readonly maxRunsPerApplication: number = 50) {}

  async record(run: SyncRun): Promise<void> {
    const runs = this.runs.get(run.application) ?? [];
    runs.unshift(run);
    if (runs.length > this.maxRunsPerApplication) {
      runs.length = this.maxRunsPerApplication;
    }
    this.runs.set(run.application, runs);
  }

  async latest(application: string): Promise<SyncRun | null> {
    return this.runs.get(application)?.[0] ?? null;
  }

  async list(application: string, filter: SyncRunFilter): Promise<SyncRun[]> {
    const statuses = filter.status === undefined
      ? null
      : Array.isArray(filter.status) ? filter.status : [filter.status];
    return (this.runs.get(application) ?? [])
      .filter(run => statuses === null || statuses.includes(run.status))
      .slice(0, filter.limit);
  }

  async deleteForApplication(application: string): Promise<number> {
    const count = this.runs.get(application)?.length ?? 0;
    this.runs.delete(application);
    return count;
  }
}
