/**
 * Base Repository Implementation
 * @module repositories/base-repository
 *
 * Parameterized queries with timing logs; driver failures surface as
 * DatabaseError.
 */

import type pg from 'pg';
import { DatabaseError, getErrorMessage } from '../errors/index.js';
import { StructuredLogger, createModuleLogger } from '../logging/index.js';
import type { Queryable } from './interfaces.js';

export abstract class BaseRepository {
  protected readonly logger: StructuredLogger;

  constructor(
    protected readonly db: Queryable,
    protected readonly tableName: string
  ) {
    this.logger = createModuleLogger(`repository:${tableName}`);
  }

  // ============================================================================
  // Query Execution
  // ============================================================================

  protected async query<T extends pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<pg.QueryResult<T>> {
    const start = Date.now();

    try {
      const result = await this.db.query<T>(text, params);
      this.logger.debug(
        { durationMs: Date.now() - start, rows: result.rowCount, table: this.tableName },
        'Query executed'
      );
      return result;
    } catch (error) {
      this.logger.error({ err: error, table: this.tableName }, 'Query failed');
      throw new DatabaseError(`Query on ${this.tableName} failed: ${getErrorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  protected async queryOne<T extends pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<T | null> {
    const result = await this.query<T>(text, params);
    return result.rows[0] ?? null;
  }

  protected async queryAll<T extends pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<T[]> {
    const result = await this.query<T>(text, params);
    return result.rows;
  }
}
