/**
 * Logging and Metrics Tests
 * @module tests/logging
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { pino } from 'pino';
import {
  StructuredLogger,
  getMetrics,
  metrics,
  resetMetrics,
  withLogging,
} from '../../src/logging/index.js';

function captureLogger(): { logger: StructuredLogger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const base = pino({ level: 'trace', base: undefined, timestamp: false }, {
    write(line: string): void {
      lines.push(JSON.parse(line));
    },
  });
  return { logger: new StructuredLogger(base), lines };
}

describe('StructuredLogger', () => {
  it('should log reconcile lifecycle events', () => {
    const { logger, lines } = captureLogger();

    logger.reconcileStarted('web', 'run-1', 'poll');
    logger.reconcileCompleted('web', 'run-1', 'Succeeded', 12, { Created: 2 });

    expect(lines).toEqual([
      {
        level: 30,
        event: 'reconcile_started',
        application: 'web',
        runId: 'run-1',
        trigger: 'poll',
        msg: 'Reconcile started for web (poll)',
      },
      {
        level: 30,
        event: 'reconcile_completed',
        application: 'web',
        runId: 'run-1',
        status: 'Succeeded',
        durationMs: 12,
        Created: 2,
        msg: 'Reconcile of web finished Succeeded in 12ms',
      },
    ]);
  });

  it('should report drift as a warning', () => {
    const { logger, lines } = captureLogger();

    logger.driftDetected('web', ['/ConfigMap/default/cfg']);

    expect(lines[0]).toMatchObject({
      level: 40,
      event: 'drift_detected',
      count: 1,
      msg: 'Drift detected in web: 1 resource(s)',
    });
  });

  it('should bind context on children', () => {
    const { logger, lines } = captureLogger();

    logger.child({ module: 'scheduler' }).info('Scheduler started');

    expect(lines[0]).toMatchObject({ module: 'scheduler', msg: 'Scheduler started' });
  });

  it('should time wrapped operations', async () => {
    const { logger, lines } = captureLogger();

    await expect(withLogging(logger, 'load', async () => 'done')).resolves.toBe('done');
    await expect(withLogging(logger, 'load', async () => {
      throw new Error('unreachable source');
    })).rejects.toThrow('unreachable source');

    expect(lines.map(line => line.status)).toEqual(['success', 'error']);
    expect(lines[0]?.msg).toMatch(/^load took \d+ms$/);
  });
});

describe('metrics', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('should count reconcile cycles by status and trigger', async () => {
    metrics.recordReconcile('web', 'Succeeded', 'poll', 0.5);
    metrics.recordReconcile('web', 'Succeeded', 'poll', 0.25);

    expect(await getMetrics()).toMatch(
      /^driftguard_reconcile_cycles_total\{application="web",status="Succeeded",trigger="poll",[^}]*\} 2$/m
    );
  });

  it('should skip empty sync result counts', async () => {
    metrics.recordSyncResult('web', 'Created', 3);
    metrics.recordSyncResult('web', 'Deleted', 0);

    const output = await getMetrics();
    expect(output).toMatch(/^driftguard_sync_results_total\{application="web",outcome="Created",[^}]*\} 3$/m);
    expect(output).not.toContain('outcome="Deleted"');
  });

  it('should replace application phase gauges', async () => {
    metrics.setApplicationPhases({ Synced: 2, Degraded: 1 });
    metrics.setApplicationPhases({ Synced: 3 });

    const output = await getMetrics();
    expect(output).toMatch(/^driftguard_applications\{phase="Synced",[^}]*\} 3$/m);
    expect(output).not.toContain('phase="Degraded"');
  });
});
