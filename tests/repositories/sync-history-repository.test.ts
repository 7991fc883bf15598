/**
 * Sync History Repository Tests
 * @module tests/repositories/sync-history-repository
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DatabaseError } from '../../src/errors/index.js';
import { InMemorySyncHistoryRepository } from '../../src/repositories/in-memory-sync-history-repository.js';
import { SyncHistoryRepository } from '../../src/repositories/sync-history-repository.js';
import { RunStatus, SyncRun, TriggerType } from '../../src/types/sync.js';
import { MockQueryable, createMockQueryable, executedStatements, queryResult } from '../mocks/index.js';

function createRun(id: string, overrides: Partial<SyncRun> = {}): SyncRun {
  return {
    id,
    application: 'web',
    trigger: TriggerType.POLL,
    revision: 'sha256:abc',
    status: RunStatus.SUCCEEDED,
    operations: [],
    results: [],
    startedAt: '2026-03-01T10:00:00.000Z',
    finishedAt: '2026-03-01T10:00:02.000Z',
    ...overrides,
  };
}

describe('SyncHistoryRepository', () => {
  let mock: MockQueryable;
  let repository: SyncHistoryRepository;

  beforeEach(() => {
    mock = createMockQueryable();
    repository = new SyncHistoryRepository(mock.db, 25);
  });

  describe('record', () => {
    it('should insert the run and trim older runs', async () => {
      const run = createRun('run-1', { status: RunStatus.ERRORED });
      const error = {
        name: 'SourceUnreachableError',
        message: 'down',
        code: 'SOURCE_UNREACHABLE',
        statusCode: 502,
        timestamp: '2026-03-01T10:00:01.000Z',
        retryable: true,
      };

      await repository.record({ ...run, error });

      const statements = executedStatements(mock.query);
      expect(statements).toHaveLength(2);
      expect(statements[0]).toMatch(/^INSERT INTO sync_runs \(.*\) VALUES \(\$1, .*\$10\) ON CONFLICT \(id\) DO NOTHING$/);
      expect(statements[1]).toMatch(/^DELETE FROM sync_runs WHERE application = \$1 AND id NOT IN/);
      expect(mock.query.mock.calls[0]?.[1]).toEqual([
        'run-1',
        'web',
        'poll',
        'sha256:abc',
        'Errored',
        '[]',
        '[]',
        JSON.stringify(error),
        '2026-03-01T10:00:00.000Z',
        '2026-03-01T10:00:02.000Z',
      ]);
      expect(mock.query.mock.calls[1]?.[1]).toEqual(['web', 25]);
    });

    it('should raise DatabaseError when the query fails', async () => {
      mock.query.mockRejectedValueOnce(new Error('connection terminated'));

      const result = repository.record(createRun('run-1'));

      await expect(result).rejects.toThrow(DatabaseError);
      expect(mock.query).toHaveBeenCalledTimes(1);
    });

    it('should name the table in database errors', async () => {
      mock.query.mockRejectedValueOnce(new Error('connection terminated'));

      await expect(repository.latest('web')).rejects.toThrow('Query on sync_runs failed: connection terminated');
    });
  });

  describe('latest', () => {
    it('should map the newest row', async () => {
      mock.query.mockResolvedValueOnce(queryResult([{
        id: 'run-1',
        application: 'web',
        trigger: 'manual',
        revision: null,
        status: 'Succeeded',
        operations: [],
        results: [],
        error: null,
        started_at: new Date('2026-03-01T10:00:00.000Z'),
        finished_at: new Date('2026-03-01T10:00:02.000Z'),
      }]));

      const run = await repository.latest('web');

      expect(run).toEqual({
        id: 'run-1',
        application: 'web',
        trigger: 'manual',
        revision: null,
        status: 'Succeeded',
        operations: [],
        results: [],
        startedAt: '2026-03-01T10:00:00.000Z',
        finishedAt: '2026-03-01T10:00:02.000Z',
      });
      expect(run && 'error' in run).toBe(false);
      expect(mock.query.mock.calls[0]?.[1]).toEqual(['web']);
    });

    it('should return null without runs', async () => {
      expect(await repository.latest('web')).toBeNull();
    });
  });

  describe('list', () => {
    it('should filter by status and limit', async () => {
      await repository.list('web', { limit: 10, status: [RunStatus.FAILED, RunStatus.ERRORED] });

      expect(executedStatements(mock.query)).toEqual([
        'SELECT * FROM sync_runs WHERE application = $1 AND status IN ($2, $3) ORDER BY started_at DESC LIMIT $4',
      ]);
      expect(mock.query.mock.calls[0]?.[1]).toEqual(['web', 'Failed', 'Errored', 10]);
    });

    it('should list without a status filter', async () => {
      await repository.list('web', { limit: 5 });

      expect(executedStatements(mock.query)).toEqual([
        'SELECT * FROM sync_runs WHERE application = $1 ORDER BY started_at DESC LIMIT $2',
      ]);
      expect(mock.query.mock.calls[0]?.[1]).toEqual(['web', 5]);
    });
  });

  describe('deleteForApplication', () => {
    it('should return the number of deleted runs', async () => {
      mock.query.mockResolvedValueOnce(queryResult([], 4));

      expect(await repository.deleteForApplication('web')).toBe(4);
      expect(executedStatements(mock.query)).toEqual(['DELETE FROM sync_runs WHERE application = $1']);
    });
  });
});

describe('InMemorySyncHistoryRepository', () => {
  it('should keep the newest runs up to the limit', async () => {
    const repository = new InMemorySyncHistoryRepository(2);
    await repository.record(createRun('run-1'));
    await repository.record(createRun('run-2', { status: RunStatus.FAILED }));
    await repository.record(createRun('run-3'));

    const runs = await repository.list('web', { limit: 10 });

    expect(runs.map(run => run.id)).toEqual(['run-3', 'run-2']);
    expect((await repository.latest('web'))?.id).toBe('run-3');
  });

  it('should filter by status', async () => {
    const repository = new InMemorySyncHistoryRepository();
    await repository.record(createRun('run-1', { status: RunStatus.FAILED }));
    await repository.record(createRun('run-2'));
    await repository.record(createRun('run-3', { status: RunStatus.ERRORED }));

    const failed = await repository.list('web', { limit: 10, status: [RunStatus.FAILED, RunStatus.ERRORED] });
    const one = await repository.list('web', { limit: 1, status: RunStatus.FAILED });

    expect(failed.map(run => run.id)).toEqual(['run-3', 'run-1']);
    expect(one.map(run => run.id)).toEqual(['run-1']);
  });

  it('should delete the history of one Application', async () => {
    const repository = new InMemorySyncHistoryRepository();
    await repository.record(createRun('run-1'));
    await repository.record(createRun('run-2', { application: 'payment' }));

    expect(await repository.deleteForApplication('web')).toBe(1);
    expect(await repository.latest('web')).toBeNull();
    expect((await repository.latest('payment'))?.id).toBe('run-2');
  });
});
