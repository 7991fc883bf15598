/**
 * Reconciler Tests
 * @module tests/reconciler/reconciler
 *
 * Full cycles against on-disk source trees and the in-memory runtime.
 */

import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ApplicationNotFoundError } from '../../src/errors/index.js';
import type { DeclaredSyncPolicy } from '../../src/types/application.js';
import { refFromManifest } from '../../src/types/resource.js';
import { RunStatus, SyncOutcome, TriggerType } from '../../src/types/sync.js';
import type { SyncRun } from '../../src/types/sync.js';
import {
  createApplicationManifest,
  createApplicationSpec,
  createConfigMap,
  createSecret,
} from '../factories/index.js';
import {
  TestHarness,
  createSourceTree,
  createTestHarness,
  removeSourceFile,
  removeSourceTree,
  writeSourceFile,
} from '../helpers/index.js';

const AUTOMATED: DeclaredSyncPolicy = { mode: 'automated', prune: true, selfHeal: false };
const SELF_HEALING: DeclaredSyncPolicy = { mode: 'automated', prune: true, selfHeal: true };
const WEB_CONFIG = refFromManifest(createConfigMap('web-config'), 'default');

function outcomeOf(run: SyncRun, key: string): SyncOutcome | undefined {
  return run.results.find(result => result.key === key)?.outcome;
}

describe('Reconciler', () => {
  let harness: TestHarness;
  let root: string;

  beforeEach(async () => {
    harness = createTestHarness();
    root = await createSourceTree({
      'apps/web.yaml': createApplicationManifest('web', { path: 'web' }),
      'apps/token.yaml': createApplicationManifest('token', { path: 'token' }),
      'web/config.yaml': createConfigMap('web-config'),
      'token/secret.yaml': createSecret('token-secret'),
    });
  });

  afterEach(async () => {
    await removeSourceTree(root);
  });

  function register(name: string, path: string, policy: DeclaredSyncPolicy): void {
    harness.controller.registerRoot(createApplicationSpec(name, root, { path, policy }));
  }

  function reconcile(name: string, trigger: TriggerType = TriggerType.REGISTER, approved = false) {
    return harness.controller.reconciler.reconcile(name, trigger, { approved });
  }

  describe('app of apps', () => {
    beforeEach(() => {
      register('platform', 'apps', AUTOMATED);
    });

    it('should apply child Application objects and register the children', async () => {
      const outcome = await reconcile('platform');

      expect(outcome.run.status).toBe(RunStatus.SUCCEEDED);
      expect([...outcome.registered].sort()).toEqual(['token', 'web']);
      expect(harness.runtime.keys()).toEqual([
        'driftguard.io/Application/driftguard/token',
        'driftguard.io/Application/driftguard/web',
      ]);

      const { graph } = harness.controller;
      expect(graph.get('web')?.parent).toBe('platform');
      expect(graph.effectivePolicy('web')).toEqual({ mode: 'automated', prune: true, selfHeal: false });
      expect(graph.get('platform')?.phase).toBe('Synced');
      expect(graph.get('platform')?.syncStatus).toBe('Synced');
    });

    it('should sync children from their own source paths', async () => {
      await reconcile('platform');
      const outcome = await reconcile('web');

      expect(outcome.run.status).toBe(RunStatus.SUCCEEDED);
      expect(outcomeOf(outcome.run, '/ConfigMap/default/web-config')).toBe(SyncOutcome.CREATED);
      expect(harness.runtime.has(WEB_CONFIG)).toBe(true);
      expect(harness.controller.graph.get('web')?.ownedResources.size).toBe(1);
    });

    it('should remove a child dropped from the source and prune what it owned', async () => {
      await reconcile('platform');
      await reconcile('token');
      expect(harness.runtime.has(refFromManifest(createSecret('token-secret'), 'default'))).toBe(true);

      await removeSourceFile(root, 'apps/token.yaml');
      const outcome = await reconcile('platform', TriggerType.WEBHOOK);

      expect(outcome.run.status).toBe(RunStatus.SUCCEEDED);
      expect(outcome.removed).toEqual(['token']);
      expect(outcomeOf(outcome.run, 'driftguard.io/Application/driftguard/token')).toBe(SyncOutcome.DELETED);
      expect(outcomeOf(outcome.run, '/Secret/default/token-secret')).toBe(SyncOutcome.DELETED);
      expect(harness.runtime.keys()).toEqual(['driftguard.io/Application/driftguard/web']);
      expect(harness.controller.graph.has('token')).toBe(false);
      expect([...(harness.controller.graph.get('platform')?.children ?? [])]).toEqual(['web']);
    });

    it('should leave sibling Applications untouched when one is removed', async () => {
      await writeSourceFile(root, 'apps/payment.yaml', createApplicationManifest('payment', { path: 'payment' }));
      await writeSourceFile(root, 'payment/config.yaml', createConfigMap('payment-config'));
      const first = await reconcile('platform');
      expect([...first.registered].sort()).toEqual(['payment', 'token', 'web']);
      for (const child of ['payment', 'token', 'web']) {
        await reconcile(child);
      }

      await removeSourceFile(root, 'apps/token.yaml');
      const outcome = await reconcile('platform', TriggerType.WEBHOOK);

      expect(outcome.removed).toEqual(['token']);
      expect(harness.runtime.has(refFromManifest(createSecret('token-secret'), 'default'))).toBe(false);
      expect(harness.runtime.has(WEB_CONFIG)).toBe(true);
      expect(harness.runtime.has(refFromManifest(createConfigMap('payment-config'), 'default'))).toBe(true);
      expect([...(harness.controller.graph.get('platform')?.children ?? [])].sort()).toEqual(['payment', 'web']);
    });

    it('should reject a child that declares its own ancestor', async () => {
      await writeSourceFile(root, 'web/loop.yaml', createApplicationManifest('platform', { path: 'apps' }));
      await reconcile('platform');

      const outcome = await reconcile('web');

      expect(outcome.run.status).toBe(RunStatus.FAILED);
      const failure = outcome.run.results.find(result => result.key === 'driftguard.io/Application/driftguard/platform');
      expect(failure?.failure?.code).toBe('CYCLIC_APPLICATION_GRAPH');
      expect(outcomeOf(outcome.run, '/ConfigMap/default/web-config')).toBe(SyncOutcome.CREATED);
      expect(harness.controller.graph.get('web')?.phase).toBe('Degraded');
      expect(harness.controller.graph.get('platform')?.phase).toBe('Synced');
      expect(harness.controller.graph.get('platform')?.parent).toBeNull();
    });
  });

  describe('drift', () => {
    it('should leave an unchanged tree alone on the next cycle', async () => {
      register('web', 'web', AUTOMATED);
      await reconcile('web');

      const outcome = await reconcile('web', TriggerType.POLL);

      expect(outcome.run.status).toBe(RunStatus.SUCCEEDED);
      expect(outcome.run.operations.map(operation => operation.type)).toEqual(['noop']);
      expect(outcomeOf(outcome.run, '/ConfigMap/default/web-config')).toBe(SyncOutcome.UNCHANGED);
    });

    it('should only report drift when self-heal is off', async () => {
      register('web', 'web', AUTOMATED);
      await reconcile('web');
      harness.runtime.mutate(WEB_CONFIG, manifest => {
        manifest.data = { key: 'changed' };
      });

      const outcome = await reconcile('web', TriggerType.POLL);

      expect(outcome.run.status).toBe(RunStatus.DRIFT_REPORTED);
      expect(outcome.run.operations[0]?.annotations).toEqual(['drift']);
      expect((await harness.runtime.get(WEB_CONFIG))?.manifest.data).toEqual({ key: 'changed' });

      const record = harness.controller.graph.get('web');
      expect(record?.phase).toBe('Synced');
      expect(record?.syncStatus).toBe('OutOfSync');
      expect(record?.message).toBe('Drift detected in 1 resource(s)');
    });

    it('should correct drift on a manual sync even with self-heal off', async () => {
      register('web', 'web', AUTOMATED);
      await reconcile('web');
      harness.runtime.mutate(WEB_CONFIG, manifest => {
        manifest.data = { key: 'changed' };
      });

      const outcome = await reconcile('web', TriggerType.MANUAL);

      expect(outcome.run.status).toBe(RunStatus.SUCCEEDED);
      expect(outcomeOf(outcome.run, '/ConfigMap/default/web-config')).toBe(SyncOutcome.UPDATED);
      expect((await harness.runtime.get(WEB_CONFIG))?.manifest.data).toEqual({ key: 'value' });
    });

    it('should correct drift when self-heal is on', async () => {
      register('web', 'web', SELF_HEALING);
      await reconcile('web');
      harness.runtime.mutate(WEB_CONFIG, manifest => {
        manifest.data = { key: 'changed' };
      });

      const outcome = await reconcile('web', TriggerType.SELF_HEAL);

      expect(outcome.run.status).toBe(RunStatus.SUCCEEDED);
      expect((await harness.runtime.get(WEB_CONFIG))?.manifest.data).toEqual({ key: 'value' });
      expect(harness.controller.graph.get('web')?.syncStatus).toBe('Synced');
    });

    it('should apply a revert to an earlier desired state', async () => {
      register('web', 'web', AUTOMATED);
      await reconcile('web');

      await writeSourceFile(root, 'web/config.yaml', createConfigMap('web-config', { key: 'second' }));
      const second = await reconcile('web', TriggerType.WEBHOOK);
      await writeSourceFile(root, 'web/config.yaml', createConfigMap('web-config'));
      const third = await reconcile('web', TriggerType.WEBHOOK);

      expect(second.run.status).toBe(RunStatus.SUCCEEDED);
      expect(third.run.status).toBe(RunStatus.SUCCEEDED);
      expect(outcomeOf(third.run, '/ConfigMap/default/web-config')).toBe(SyncOutcome.UPDATED);
      expect((await harness.runtime.get(WEB_CONFIG))?.manifest.data).toEqual({ key: 'value' });
    });
  });

  describe('manual mode', () => {
    beforeEach(() => {
      register('web', 'web', {});
    });

    it('should store the plan and wait for approval', async () => {
      const outcome = await reconcile('web');

      expect(outcome.run.status).toBe(RunStatus.AWAITING_APPROVAL);
      expect(harness.runtime.has(WEB_CONFIG)).toBe(false);

      const record = harness.controller.graph.get('web');
      expect(record?.phase).toBe('Pending');
      expect(record?.syncStatus).toBe('OutOfSync');
      expect(record?.pendingPlan?.operations.map(operation => operation.type)).toEqual(['create']);
    });

    it('should keep waiting on an unapproved manual sync', async () => {
      const outcome = await reconcile('web', TriggerType.MANUAL);

      expect(outcome.run.status).toBe(RunStatus.AWAITING_APPROVAL);
    });

    it('should execute once approved', async () => {
      await reconcile('web');
      const outcome = await reconcile('web', TriggerType.CONFIRM, true);

      expect(outcome.run.status).toBe(RunStatus.SUCCEEDED);
      expect(harness.runtime.has(WEB_CONFIG)).toBe(true);
      expect(harness.controller.graph.get('web')?.pendingPlan).toBeNull();
    });
  });

  describe('after a restart', () => {
    let restarted: TestHarness;

    function restart(): void {
      restarted = createTestHarness({}, { runtime: harness.runtime });
    }

    it('should prune owned objects of kinds no longer in the source', async () => {
      await writeSourceFile(root, 'web/secret.yaml', createSecret('web-secret'));
      register('web', 'web', AUTOMATED);
      await reconcile('web');
      expect(harness.runtime.has(WEB_CONFIG)).toBe(true);

      restart();
      restarted.controller.registerRoot(createApplicationSpec('web', root, { path: 'web', policy: AUTOMATED }));
      await removeSourceFile(root, 'web/config.yaml');
      const outcome = await restarted.controller.reconciler.reconcile('web', TriggerType.POLL);

      expect(outcome.run.status).toBe(RunStatus.SUCCEEDED);
      expect(outcomeOf(outcome.run, '/ConfigMap/default/web-config')).toBe(SyncOutcome.DELETED);
      expect(harness.runtime.keys()).toEqual(['/Secret/default/web-secret']);
    });

    it('should prune what a removed child owned when the child was never registered', async () => {
      register('platform', 'apps', AUTOMATED);
      await reconcile('platform');
      await reconcile('web');
      expect(harness.runtime.has(WEB_CONFIG)).toBe(true);

      restart();
      restarted.controller.registerRoot(createApplicationSpec('platform', root, { path: 'apps', policy: AUTOMATED }));
      await removeSourceFile(root, 'apps/web.yaml');
      const outcome = await restarted.controller.reconciler.reconcile('platform', TriggerType.WEBHOOK);

      expect(outcome.run.status).toBe(RunStatus.SUCCEEDED);
      expect(outcome.removed).toEqual(['web']);
      expect(outcomeOf(outcome.run, 'driftguard.io/Application/driftguard/web')).toBe(SyncOutcome.DELETED);
      expect(outcomeOf(outcome.run, '/ConfigMap/default/web-config')).toBe(SyncOutcome.DELETED);
      expect(harness.runtime.keys()).toEqual(['driftguard.io/Application/driftguard/token']);
    });

    it('should cascade a deletion through children that were never registered', async () => {
      register('platform', 'apps', AUTOMATED);
      await reconcile('platform');
      await reconcile('web');

      restart();
      restarted.controller.registerRoot(createApplicationSpec('platform', root, { path: 'apps', policy: AUTOMATED }));
      const outcome = await restarted.controller.reconciler.removeApplication('platform', true);

      expect([...outcome.removed].sort()).toEqual(['platform', 'token', 'web']);
      expect(harness.runtime.keys()).toEqual([]);
      expect(restarted.controller.graph.has('platform')).toBe(false);
    });
  });

  describe('failures', () => {
    it('should record an errored cycle when the source is unreachable', async () => {
      harness.controller.registerRoot(
        createApplicationSpec('web', join(root, 'missing'), { policy: AUTOMATED })
      );

      const outcome = await reconcile('web');

      expect(outcome.run.status).toBe(RunStatus.ERRORED);
      expect(outcome.run.error?.code).toBe('SOURCE_UNREACHABLE');
      expect(harness.controller.graph.get('web')?.phase).toBe('Degraded');
      expect(harness.controller.graph.get('web')?.syncStatus).toBe('Unknown');
      expect((await harness.history.latest('web'))?.id).toBe(outcome.run.id);
    });

    it('should fail resources owned by another Application', async () => {
      register('web', 'web', AUTOMATED);
      register('payment', 'web', AUTOMATED);
      await reconcile('web');

      const outcome = await reconcile('payment');

      expect(outcome.run.status).toBe(RunStatus.FAILED);
      const failure = outcome.run.results.find(result => result.key === '/ConfigMap/default/web-config');
      expect(failure?.failure?.code).toBe('OWNERSHIP_CONFLICT');
      expect((await harness.runtime.get(WEB_CONFIG))?.owner).toBe('web');
      expect(harness.controller.graph.get('payment')?.phase).toBe('Degraded');
      expect(harness.controller.graph.get('payment')?.message).toBe('1 resource(s) failed');
    });

    it('should reject unknown Applications', async () => {
      await expect(reconcile('ghost')).rejects.toThrow(ApplicationNotFoundError);
    });
  });
});
