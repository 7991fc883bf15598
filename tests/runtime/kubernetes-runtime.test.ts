/**
 * Kubernetes Runtime Tests
 * @module tests/runtime/kubernetes-runtime
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ownershipLabels } from '../../src/constants/index.js';
import {
  ApplyConflictError,
  ApplyRejectedError,
  ObservationError,
  RuntimeUnavailableError,
} from '../../src/errors/index.js';
import {
  KubernetesRuntime,
  collectionPath,
  pluralize,
  statusCodeOf,
} from '../../src/runtime/kubernetes-runtime.js';
import { refFromManifest } from '../../src/types/resource.js';
import { createConfigMap } from '../factories/index.js';
import { FakeApiError, FakeDiscoveryClient, FakeObjectClient, FakeWatchClient } from '../mocks/index.js';

const WEB_LABELS = ownershipLabels('web');

describe('KubernetesRuntime', () => {
  let client: FakeObjectClient;
  let watcher: FakeWatchClient;
  let runtime: KubernetesRuntime;

  beforeEach(() => {
    client = new FakeObjectClient();
    watcher = new FakeWatchClient();
    runtime = new KubernetesRuntime({ name: 'prod', client, watcher });
    client.seed({
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: { name: 'web', namespace: 'default', labels: WEB_LABELS },
    });
    client.seed({
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: { name: 'payment', namespace: 'default', labels: ownershipLabels('payment') },
    });
  });

  describe('get', () => {
    it('should read objects with their owner', async () => {
      const live = await runtime.get(refFromManifest(createConfigMap('web'), 'default'));

      expect(live).toMatchObject({ key: '/ConfigMap/default/web', resourceVersion: '1', owner: 'web' });
    });

    it('should return null for missing objects', async () => {
      expect(await runtime.get(refFromManifest(createConfigMap('missing'), 'default'))).toBeNull();
    });

    it('should raise ObservationError for other failures', async () => {
      client.failNext('read', new FakeApiError(500, 'boom'));

      const result = runtime.get(refFromManifest(createConfigMap('web'), 'default'));

      await expect(result).rejects.toBeInstanceOf(ObservationError);
    });
  });

  describe('list', () => {
    it('should list each kind by label selector', async () => {
      const live = await runtime.list({ kinds: [{ apiVersion: 'v1', kind: 'ConfigMap' }], labels: WEB_LABELS });

      expect(live.map(r => r.key)).toEqual(['/ConfigMap/default/web']);
    });

    it('should skip kinds the cluster does not serve', async () => {
      client.failNext('list', new FakeApiError(404, 'the server could not find the requested resource'));

      const live = await runtime.list({ kinds: [{ apiVersion: 'example.com/v1', kind: 'Widget' }], labels: WEB_LABELS });

      expect(live).toEqual([]);
    });

    it('should list every discovered kind when no kinds are given', async () => {
      client.seed({
        apiVersion: 'v1',
        kind: 'Secret',
        metadata: { name: 'web', namespace: 'default', labels: WEB_LABELS },
      });
      const discovery = new FakeDiscoveryClient([
        { apiVersion: 'v1', kind: 'ConfigMap' },
        { apiVersion: 'v1', kind: 'Secret' },
        { apiVersion: 'apps/v1', kind: 'Deployment' },
      ]);
      const discovering = new KubernetesRuntime({ name: 'prod', client, discovery });

      const live = await discovering.list({ labels: WEB_LABELS });

      expect(live.map(r => r.key)).toEqual(['/ConfigMap/default/web', '/Secret/default/web']);
      expect(client.calls.filter(call => call.method === 'list').map(call => call.key)).toEqual([
        'v1/ConfigMap//',
        'v1/Secret//',
        'apps/v1/Deployment//',
      ]);
      expect(discovery.calls).toBe(1);
    });

    it('should list nothing without kinds or a discovery client', async () => {
      expect(await runtime.list({ labels: WEB_LABELS })).toEqual([]);
      expect(client.calls).toEqual([]);
    });

    it('should raise ObservationError when listing fails', async () => {
      client.failNext('list', new FakeApiError(500, 'etcd timeout'));

      await expect(
        runtime.list({ kinds: [{ apiVersion: 'v1', kind: 'ConfigMap' }], labels: WEB_LABELS })
      ).rejects.toThrow('Failed to list ConfigMap: etcd timeout');
    });
  });

  describe('writes', () => {
    it('should create objects', async () => {
      const live = await runtime.create(createConfigMap('new', { key: 'value' }, { namespace: 'default' }));

      expect(live).toMatchObject({ key: '/ConfigMap/default/new', resourceVersion: '3' });
      expect(client.calls.at(-1)).toEqual({ method: 'create', key: 'v1/ConfigMap/default/new' });
    });

    it('should map 409 to ApplyConflictError', async () => {
      const result = runtime.create(createConfigMap('web', undefined, { namespace: 'default' }));

      await expect(result).rejects.toThrow(
        new ApplyConflictError('Conflict writing /ConfigMap/default/web: already exists')
      );
    });

    it('should send the resource version with updates', async () => {
      const current = await runtime.get(refFromManifest(createConfigMap('web'), 'default'));
      const manifest = createConfigMap('web', { key: 'changed' }, { namespace: 'default', labels: WEB_LABELS });

      await expect(runtime.update(manifest, 'stale')).rejects.toBeInstanceOf(ApplyConflictError);
      await expect(runtime.update(manifest, current?.resourceVersion ?? '')).resolves.toMatchObject({
        resourceVersion: '3',
      });
    });

    it('should map validation failures to ApplyRejectedError', async () => {
      client.failNext('create', new FakeApiError(422, 'spec.replicas: Invalid value'));

      const error: unknown = await runtime
        .create(createConfigMap('bad', undefined, { namespace: 'default' }))
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ApplyRejectedError);
      expect(error).toMatchObject({ reason: 'HTTP 422' });
    });

    it('should map other failures to RuntimeUnavailableError', async () => {
      client.failNext('create', new Error('socket hang up'));

      await expect(
        runtime.create(createConfigMap('new', undefined, { namespace: 'default' }))
      ).rejects.toBeInstanceOf(RuntimeUnavailableError);
    });

    it('should treat deleting a missing object as success', async () => {
      await expect(runtime.delete(refFromManifest(createConfigMap('missing'), 'default'))).resolves.toBeUndefined();
      await runtime.delete(refFromManifest(createConfigMap('web'), 'default'));

      expect(client.objects.has('v1/ConfigMap/default/web')).toBe(false);
    });
  });

  describe('watch', () => {
    it('should watch the collection path of each kind', async () => {
      const controller = new AbortController();
      const stream = runtime.watch(
        { kinds: [{ apiVersion: 'v1', kind: 'ConfigMap' }], labels: WEB_LABELS },
        controller.signal
      );
      const iterator = stream[Symbol.asyncIterator]();
      const first = iterator.next();

      await vi.waitFor(() => expect(watcher.sessions).toHaveLength(1));
      const session = watcher.sessions[0];
      session.callback('BOOKMARK', { metadata: { resourceVersion: '9' } });
      session.callback('MODIFIED', {
        apiVersion: 'v1',
        kind: 'ConfigMap',
        metadata: { name: 'web', namespace: 'default', resourceVersion: '9', labels: WEB_LABELS },
      });

      const event = await first;
      expect(session.path).toBe('/api/v1/configmaps');
      expect(session.queryParams).toEqual({
        labelSelector: 'app.kubernetes.io/managed-by=driftguard,driftguard.io/instance=web',
      });
      expect(event.value).toMatchObject({ type: 'MODIFIED', resource: { key: '/ConfigMap/default/web', owner: 'web' } });

      session.done(null);
      await expect(iterator.next()).resolves.toMatchObject({ done: true });
      expect(session.controller.signal.aborted).toBe(true);
    });

    it('should end immediately without a watch client', async () => {
      const bare = new KubernetesRuntime({ name: 'bare', client });
      const iterator = bare.watch({ labels: WEB_LABELS }, new AbortController().signal)[Symbol.asyncIterator]();

      await expect(iterator.next()).resolves.toMatchObject({ done: true });
    });
  });
});

describe('collection paths', () => {
  it('should pluralize kinds', () => {
    expect(pluralize('Deployment')).toBe('deployments');
    expect(pluralize('Ingress')).toBe('ingresses');
    expect(pluralize('NetworkPolicy')).toBe('networkpolicies');
    expect(pluralize('Endpoints')).toBe('endpoints');
  });

  it('should use the core and group API prefixes', () => {
    expect(collectionPath({ apiVersion: 'v1', kind: 'ConfigMap' })).toBe('/api/v1/configmaps');
    expect(collectionPath({ apiVersion: 'apps/v1', kind: 'Deployment' })).toBe('/apis/apps/v1/deployments');
  });
});

describe('statusCodeOf', () => {
  it('should read code or statusCode', () => {
    expect(statusCodeOf(new FakeApiError(404, 'not found'))).toBe(404);
    expect(statusCodeOf({ statusCode: 503 })).toBe(503);
    expect(statusCodeOf('failure')).toBeUndefined();
  });
});
