/**
 * Kubernetes Client Mocks
 * @module tests/mocks/kubernetes.mock
 *
 * In-process stand-ins for the object API, watch and discovery clients.
 */

import type { KubernetesListObject, KubernetesObject, KubernetesObjectApi } from '@kubernetes/client-node';
import type { KubernetesDiscoveryClient } from '../../src/runtime/kubernetes-discovery.js';
import type {
  KubernetesObjectClient,
  KubernetesWatchClient,
} from '../../src/runtime/kubernetes-runtime.js';
import type { KindRef } from '../../src/types/resource.js';

/**
 * Error shaped like the client's ApiException
 */
export class FakeApiError extends Error {
  constructor(readonly code: number, message: string) {
    super(message);
    this.name = 'FakeApiError';
  }
}

type ObjectMethod = 'read' | 'create' | 'replace' | 'delete' | 'list';

function keyOf(object: KubernetesObject): string {
  return `${object.apiVersion ?? ''}/${object.kind ?? ''}/${object.metadata?.namespace ?? ''}/${object.metadata?.name ?? ''}`;
}

function matchesSelector(object: KubernetesObject, selector: string | undefined): boolean {
  if (!selector) return true;
  const labels = object.metadata?.labels ?? {};
  return selector.split(',').every(term => {
    const [key = '', value = ''] = term.split('=');
    return labels[key] === value;
  });
}

export class FakeObjectClient implements KubernetesObjectClient {
  readonly objects = new Map<string, KubernetesObject>();
  readonly calls: Array<{ method: ObjectMethod; key: string }> = [];
  private readonly failures = new Map<ObjectMethod, Error>();
  private version = 0;

  failNext(method: ObjectMethod, error: Error): void {
    this.failures.set(method, error);
  }

  seed(object: KubernetesObject): void {
    this.version += 1;
    this.objects.set(keyOf(object), {
      ...object,
      metadata: { ...object.metadata, resourceVersion: String(this.version) },
    });
  }

  async read(spec: Parameters<KubernetesObjectApi['read']>[0]): Promise<KubernetesObject> {
    this.enter('read', spec);
    const found = this.objects.get(keyOf(spec));
    if (!found) {
      throw new FakeApiError(404, 'not found');
    }
    return structuredClone(found);
  }

  async create(spec: KubernetesObject): Promise<KubernetesObject> {
    this.enter('create', spec);
    if (this.objects.has(keyOf(spec))) {
      throw new FakeApiError(409, 'already exists');
    }
    this.seed(spec);
    return structuredClone(this.objects.get(keyOf(spec)) ?? spec);
  }

  async replace(spec: KubernetesObject): Promise<KubernetesObject> {
    this.enter('replace', spec);
    const existing = this.objects.get(keyOf(spec));
    if (!existing) {
      throw new FakeApiError(404, 'not found');
    }
    if (existing.metadata?.resourceVersion !== spec.metadata?.resourceVersion) {
      throw new FakeApiError(409, 'the object has been modified');
    }
    this.seed(spec);
    return structuredClone(this.objects.get(keyOf(spec)) ?? spec);
  }

  async delete(spec: KubernetesObject): Promise<unknown> {
    this.enter('delete', spec);
    if (!this.objects.delete(keyOf(spec))) {
      throw new FakeApiError(404, 'not found');
    }
    return { status: 'Success' };
  }

  async list(
    apiVersion: string,
    kind: string,
    _namespace?: string,
    _pretty?: string,
    _exact?: boolean,
    _exportt?: boolean,
    _fieldSelector?: string,
    labelSelector?: string
  ): Promise<KubernetesListObject<KubernetesObject>> {
    this.enter('list', { apiVersion, kind });
    const items = [...this.objects.values()]
      .filter(object => object.apiVersion === apiVersion && object.kind === kind)
      .filter(object => matchesSelector(object, labelSelector))
      .map(object => ({ metadata: structuredClone(object.metadata) }));
    return { apiVersion, kind: `${kind}List`, items };
  }

  private enter(method: ObjectMethod, spec: KubernetesObject): void {
    this.calls.push({ method, key: keyOf(spec) });
    const failure = this.failures.get(method);
    if (failure) {
      this.failures.delete(method);
      throw failure;
    }
  }
}

export interface WatchSession {
  path: string;
  queryParams: Record<string, string>;
  callback: (phase: string, apiObj: unknown) => void;
  done: (err: unknown) => void;
  controller: AbortController;
}

export class FakeWatchClient implements KubernetesWatchClient {
  readonly sessions: WatchSession[] = [];

  async watch(
    path: string,
    queryParams: Record<string, string>,
    callback: (phase: string, apiObj: unknown) => void,
    done: (err: unknown) => void
  ): Promise<AbortController> {
    const controller = new AbortController();
    this.sessions.push({ path, queryParams, callback, done, controller });
    return controller;
  }
}

export class FakeDiscoveryClient implements KubernetesDiscoveryClient {
  calls = 0;

  constructor(readonly kinds: KindRef[]) {}

  async servedKinds(): Promise<KindRef[]> {
    this.calls += 1;
    return this.kinds;
  }
}
