/**
 * Normalizer and Patch Tests
 * @module tests/diff/normalizer
 */

import { describe, it, expect } from 'vitest';
import { FieldPolicy, isIgnored } from '../../src/diff/field-policy.js';
import {
  getAtPath,
  parsePointer,
  prepareDesired,
  readLastApplied,
  toPointer,
} from '../../src/diff/normalizer.js';
import { applyChanges } from '../../src/diff/patch.js';
import { ANNOTATIONS } from '../../src/constants/index.js';
import { getAnnotations, getLabels, getMetadata } from '../../src/types/resource.js';
import type { JsonObject } from '../../src/types/resource.js';
import {
  createConfigMap,
  createDesiredResource,
  createNamespace,
} from '../factories/index.js';

describe('JSON pointers', () => {
  it('should escape slashes and tildes', () => {
    expect(toPointer(['metadata', 'annotations', 'example.com/a~b'])).toBe(
      '/metadata/annotations/example.com~1a~0b'
    );
    expect(parsePointer('/metadata/annotations/example.com~1a~0b')).toEqual([
      'metadata',
      'annotations',
      'example.com/a~b',
    ]);
  });

  it('should treat the root pointer as an empty path', () => {
    expect(parsePointer('')).toEqual([]);
    expect(parsePointer('/')).toEqual([]);
  });

  it('should read values through objects and arrays', () => {
    const value = { spec: { ports: [{ port: 80 }, { port: 443 }] } };

    expect(getAtPath(value, ['spec', 'ports', '1', 'port'])).toBe(443);
    expect(getAtPath(value, ['spec', 'missing', 'port'])).toBeUndefined();
  });
});

describe('prepareDesired', () => {
  it('should resolve the namespace and add ownership labels', () => {
    const manifest = createConfigMap('cfg', { key: 'value' }, { labels: { tier: 'backend' } });
    const prepared = prepareDesired(createDesiredResource(manifest, 'web', 'team'));

    expect(getMetadata(prepared).namespace).toBe('team');
    expect(getLabels(prepared)).toEqual({
      tier: 'backend',
      'app.kubernetes.io/managed-by': 'driftguard',
      'driftguard.io/instance': 'web',
    });
  });

  it('should drop status and the namespace of cluster-scoped kinds', () => {
    const manifest: JsonObject = { ...createNamespace('team'), status: { phase: 'Active' } };
    manifest.metadata = { name: 'team', namespace: 'ignored' };

    const prepared = prepareDesired(createDesiredResource(manifest, 'platform'));

    expect(prepared.status).toBeUndefined();
    expect(getMetadata(prepared).namespace).toBeUndefined();
  });

  it('should record the applied manifest without the annotation itself', () => {
    const prepared = prepareDesired(createDesiredResource(createConfigMap('cfg'), 'web'));

    expect(readLastApplied(prepared)).toEqual({
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: {
        name: 'cfg',
        namespace: 'default',
        labels: {
          'app.kubernetes.io/managed-by': 'driftguard',
          'driftguard.io/instance': 'web',
        },
        annotations: {},
      },
      data: { key: 'value' },
    });
  });

  it('should not modify the source manifest', () => {
    const manifest = createConfigMap('cfg');
    prepareDesired(createDesiredResource(manifest, 'web'));

    expect(manifest).toEqual(createConfigMap('cfg'));
  });

  it('should ignore unreadable last-applied annotations', () => {
    const manifest = createConfigMap('cfg', {}, { annotations: { [ANNOTATIONS.LAST_APPLIED]: '{not json' } });

    expect(getAnnotations(manifest)[ANNOTATIONS.LAST_APPLIED]).toBe('{not json');
    expect(readLastApplied(manifest)).toBeNull();
  });
});

describe('applyChanges', () => {
  it('should set and remove fields without touching the base', () => {
    const base = createConfigMap('cfg', { key: 'value', extra: 'x' });

    const result = applyChanges(base, [
      { op: 'set', path: '/data/key', value: 'new' },
      { op: 'remove', path: '/data/extra' },
      { op: 'set', path: '/metadata/labels/example.com~1tier', value: 'web' },
    ]);

    expect(result.data).toEqual({ key: 'new' });
    expect(getLabels(result)).toEqual({ 'example.com/tier': 'web' });
    expect(base).toEqual(createConfigMap('cfg', { key: 'value', extra: 'x' }));
  });

  it('should replace array elements by index', () => {
    const base = { apiVersion: 'v1', kind: 'Service', metadata: { name: 's' }, spec: { ports: [{ port: 80 }] } };

    const result = applyChanges(base, [{ op: 'set', path: '/spec/ports/0/port', value: 8080 }]);

    expect(result.spec).toEqual({ ports: [{ port: 8080 }] });
  });
});

describe('FieldPolicy', () => {
  const identity = { group: 'apps', kind: 'Deployment', namespace: 'default', name: 'api' };

  it('should always ignore runtime metadata and status', () => {
    const ignored = new FieldPolicy().ignoredPaths(identity);

    expect(isIgnored(['status', 'replicas'], ignored)).toBe(true);
    expect(isIgnored(['metadata', 'resourceVersion'], ignored)).toBe(true);
    expect(isIgnored(['metadata', 'labels'], ignored)).toBe(false);
  });

  it('should add pointers of matching rules only', () => {
    const policy = new FieldPolicy([
      { kind: 'Deployment', jsonPointers: ['/spec/replicas'] },
      { kind: 'Deployment', namespace: 'other', jsonPointers: ['/spec/paused'] },
      { kind: 'StatefulSet', jsonPointers: ['/spec/template'] },
    ]);

    const ignored = policy.ignoredPaths(identity);

    expect(isIgnored(['spec', 'replicas'], ignored)).toBe(true);
    expect(isIgnored(['spec', 'paused'], ignored)).toBe(false);
    expect(isIgnored(['spec', 'template'], ignored)).toBe(false);
  });
});
