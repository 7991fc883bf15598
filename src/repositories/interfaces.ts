/**
 * Repository Interface Definitions
 * @module repositories/interfaces
 *
 * Contracts for sync history storage.
 */

import type pg from 'pg';
import type { RunStatus, SyncRun } from '../types/sync.js';

/**
 * Filter for listing runs of one Application
 */
export interface SyncRunFilter {
  readonly limit: number;
  readonly status?: RunStatus | RunStatus[];
}

/**
 * Sync run history for Applications
 */
export interface ISyncHistoryRepository {
  /**
   * Stores a finished run
   */
  record(run: SyncRun): Promise<void>;

  /**
   * Most recent run of an Application
   */
  latest(application: string): Promise<SyncRun | null>;

  /**
   * Recent runs of an Application, newest first
   */
  list(application: string, filter: SyncRunFilter): Promise<SyncRun[]>;

  /**
   * Drops the history of an Application; returns the number of runs removed
   */
  deleteForApplication(application: string): Promise<number>;
}

/**
 * The part of a pg Pool or client the repositories use
 */
export interface Queryable {
  query<T extends pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
}
