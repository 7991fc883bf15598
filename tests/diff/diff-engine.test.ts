/**
 * Diff Engine Tests
 * @module tests/diff/diff-engine
 */

import { describe, it, expect } from 'vitest';
import { DiffEngine, reportDrift } from '../../src/diff/diff-engine.js';
import { prepareDesired } from '../../src/diff/normalizer.js';
import { OwnershipConflictError } from '../../src/errors/index.js';
import {
  DesiredResource,
  JsonObject,
  LiveResource,
  getMetadata,
  isJsonObject,
} from '../../src/types/resource.js';
import { OperationAnnotation, OperationType } from '../../src/types/sync.js';
import {
  createConfigMap,
  createDeployment,
  createDesiredResource,
} from '../factories/index.js';

const LAST_APPLIED_POINTER = '/metadata/annotations/driftguard.io~1last-applied';

/**
 * Live object as the runtime would return it after applying `resource`
 */
function liveOf(
  resource: DesiredResource,
  owner: string | undefined = resource.application,
  edit?: (manifest: JsonObject) => void
): LiveResource {
  const manifest = owner === undefined
    ? structuredClone(resource.manifest)
    : prepareDesired({ ...resource, application: owner });
  const metadata = getMetadata(manifest);
  metadata.namespace = resource.ref.namespace;
  metadata.uid = `uid-${resource.ref.name}`;
  metadata.resourceVersion = '7';
  manifest.metadata = metadata;
  manifest.status = { observed: true };
  edit?.(manifest);
  return {
    ref: resource.ref,
    key: resource.key,
    manifest,
    resourceVersion: '7',
    observedAt: new Date(),
    owner,
  };
}

function liveMap(...resources: LiveResource[]): Map<string, LiveResource> {
  return new Map(resources.map(resource => [resource.key, resource]));
}

describe('DiffEngine', () => {
  const engine = new DiffEngine();

  describe('plan', () => {
    it('should create resources missing from the runtime', () => {
      const desired = createDesiredResource(createConfigMap('cfg'), 'web');

      const { operations, conflicts } = engine.plan({
        application: 'web',
        desired: [desired],
        live: new Map(),
        prune: false,
      });

      expect(conflicts).toEqual([]);
      expect(operations).toHaveLength(1);
      expect(operations[0]).toMatchObject({ type: OperationType.CREATE, key: '/ConfigMap/default/cfg', annotations: [] });
    });

    it('should ignore runtime fields and defaults', () => {
      const desired = createDesiredResource(createDeployment('api'), 'web');
      const live = liveOf(desired, 'web', manifest => {
        const spec = manifest.spec;
        if (isJsonObject(spec)) {
          spec.replicas = 1;
          spec.revisionHistoryLimit = 10;
        }
      });

      const { operations } = engine.plan({
        application: 'web',
        desired: [desired],
        live: liveMap(live),
        prune: false,
      });

      expect(operations[0]).toMatchObject({ type: OperationType.NOOP, changes: [], annotations: [] });
    });

    it('should update managed fields that differ', () => {
      const desired = createDesiredResource(createConfigMap('cfg'), 'web');
      const live = liveOf(desired, 'web', manifest => {
        manifest.data = { key: 'old' };
      });

      const { operations } = engine.plan({
        application: 'web',
        desired: [desired],
        live: liveMap(live),
        prune: false,
      });

      expect(operations[0]).toMatchObject({
        type: OperationType.UPDATE,
        changes: [{ op: 'set', path: '/data/key', value: 'value', previous: 'old' }],
      });
    });

    it('should remove fields that were applied before and are no longer desired', () => {
      const previous = createDesiredResource(createConfigMap('cfg', { key: 'value', extra: 'x' }), 'web');
      const desired = createDesiredResource(createConfigMap('cfg', { key: 'value' }), 'web');

      const { operations } = engine.plan({
        application: 'web',
        desired: [desired],
        live: liveMap(liveOf(previous)),
        prune: false,
      });

      expect(operations[0].type).toBe(OperationType.UPDATE);
      expect(operations[0]).toMatchObject({
        changes: [
          { op: 'set', path: LAST_APPLIED_POINTER },
          { op: 'remove', path: '/data/extra', previous: 'x' },
        ],
      });
    });

    it('should honor ignoreDifferences for matching resources', () => {
      const desired = createDesiredResource(createDeployment('api', { replicas: 2 }), 'web');
      const live = liveOf(desired, 'web', manifest => {
        const spec = manifest.spec;
        if (isJsonObject(spec)) {
          spec.replicas = 5;
        }
      });

      const ignored = engine.plan({
        application: 'web',
        desired: [desired],
        live: liveMap(live),
        prune: false,
        ignoreDifferences: [{ group: 'apps', kind: 'Deployment', jsonPointers: ['/spec/replicas'] }],
      });
      const compared = engine.plan({
        application: 'web',
        desired: [desired],
        live: liveMap(live),
        prune: false,
        ignoreDifferences: [{ group: 'apps', kind: 'Deployment', name: 'other', jsonPointers: ['/spec/replicas'] }],
      });

      expect(ignored.operations[0].type).toBe(OperationType.NOOP);
      expect(compared.operations[0]).toMatchObject({
        type: OperationType.UPDATE,
        changes: [{ op: 'set', path: '/spec/replicas', value: 2, previous: 5 }],
      });
    });

    it('should report objects owned by another Application as conflicts', () => {
      const desired = createDesiredResource(createConfigMap('shared'), 'web');

      const { operations, conflicts } = engine.plan({
        application: 'web',
        desired: [desired],
        live: liveMap(liveOf(desired, 'payment')),
        prune: true,
      });

      expect(operations).toEqual([]);
      expect(conflicts).toHaveLength(1);
      expect(conflicts[0]).toBeInstanceOf(OwnershipConflictError);
      expect(conflicts[0].message).toBe(
        "'/ConfigMap/default/shared' is owned by 'payment' and cannot be claimed by 'web'"
      );
    });

    it('should take over transferable objects as adopted', () => {
      const desired = createDesiredResource(createConfigMap('shared'), 'web');

      const { operations, conflicts } = engine.plan({
        application: 'web',
        desired: [desired],
        live: liveMap(liveOf(desired, 'payment')),
        prune: true,
        transferable: new Set([desired.key]),
      });

      expect(conflicts).toEqual([]);
      expect(operations[0]).toMatchObject({
        type: OperationType.UPDATE,
        annotations: [OperationAnnotation.ADOPTED],
      });
    });

    it('should adopt unlabelled pre-existing objects', () => {
      const desired = createDesiredResource(createConfigMap('legacy'), 'web');

      const { operations } = engine.plan({
        application: 'web',
        desired: [desired],
        live: liveMap(liveOf(desired, undefined)),
        prune: true,
      });

      expect(operations[0]).toMatchObject({
        type: OperationType.UPDATE,
        annotations: [OperationAnnotation.ADOPTED],
      });
    });

    it('should delete owned objects no longer declared when prune is on', () => {
      const removed = createDesiredResource(createConfigMap('removed'), 'web');

      const { operations } = engine.plan({
        application: 'web',
        desired: [],
        live: liveMap(liveOf(removed)),
        prune: true,
      });

      expect(operations).toHaveLength(1);
      expect(operations[0]).toMatchObject({ type: OperationType.DELETE, key: '/ConfigMap/default/removed' });
    });

    it('should mark owned objects as would-prune when prune is off', () => {
      const removed = createDesiredResource(createConfigMap('removed'), 'web');

      const { operations } = engine.plan({
        application: 'web',
        desired: [],
        live: liveMap(liveOf(removed)),
        prune: false,
      });

      expect(operations[0]).toMatchObject({
        type: OperationType.NOOP,
        annotations: [OperationAnnotation.WOULD_PRUNE],
      });
    });

    it('should never prune objects it does not own', () => {
      const foreign = createDesiredResource(createConfigMap('foreign'), 'payment');
      const unmanaged = createDesiredResource(createConfigMap('unmanaged'), 'web');

      const { operations } = engine.plan({
        application: 'web',
        desired: [],
        live: liveMap(liveOf(foreign), liveOf(unmanaged, undefined)),
        prune: true,
      });

      expect(operations).toEqual([]);
    });

    it('should sort operations by identity key', () => {
      const resources = ['zeta', 'alpha', 'mid'].map(name =>
        createDesiredResource(createConfigMap(name), 'web')
      );

      const { operations } = engine.plan({
        application: 'web',
        desired: resources,
        live: new Map(),
        prune: false,
      });

      expect(operations.map(op => op.key)).toEqual([
        '/ConfigMap/default/alpha',
        '/ConfigMap/default/mid',
        '/ConfigMap/default/zeta',
      ]);
    });
  });
});

describe('reportDrift', () => {
  it('should turn every change into a drift noop', () => {
    const engine = new DiffEngine();
    const created = createDesiredResource(createConfigMap('new'), 'web');
    const changed = createDesiredResource(createConfigMap('changed'), 'web');
    const same = createDesiredResource(createConfigMap('same'), 'web');
    const changedLive = liveOf(changed, 'web', manifest => {
      manifest.data = { key: 'edited' };
    });

    const { operations } = engine.plan({
      application: 'web',
      desired: [created, changed, same],
      live: liveMap(changedLive, liveOf(same)),
      prune: true,
    });
    const reported = reportDrift(operations);

    expect(reported.map(op => [op.key, op.type, op.annotations])).toEqual([
      ['/ConfigMap/default/changed', OperationType.NOOP, [OperationAnnotation.DRIFT]],
      ['/ConfigMap/default/new', OperationType.NOOP, [OperationAnnotation.DRIFT]],
      ['/ConfigMap/default/same', OperationType.NOOP, []],
    ]);
    expect(reported[0]).toMatchObject({
      changes: [{ op: 'set', path: '/data/key', value: 'value', previous: 'edited' }],
    });
  });
});
