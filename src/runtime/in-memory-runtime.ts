/**
 * In-Memory Target Runtime
 * @module runtime/in-memory-runtime
 *
 * Process-local runtime with resource versions, runtime-assigned defaults,
 * namespace checks and watch fan-out. Backs `runtime.type=memory` and the
 * test suite.
 */

import { v4 as uuidv4 } from 'uuid';
import { LABELS } from '../constants/index.js';
import {
  ApplyConflictError,
  ApplyRejectedError,
} from '../errors/index.js';
import { sleep } from '../errors/recovery.js';
import {
  JsonObject,
  LiveResource,
  ResourceRef,
  cloneJson,
  getLabels,
  getMetadata,
  identityKey,
  isClusterScoped,
  isJsonObject,
  refFromManifest,
  stableStringify,
} from '../types/resource.js';
import {
  ListOptions,
  TargetRuntime,
  WatchEvent,
  WatchEventType,
  WatchOptions,
  matchesLabels,
} from './interface.js';

// ============================================================================
// Types
// ============================================================================

export interface InMemoryRuntimeOptions {
  name?: string;
  /** Namespaces that exist without a Namespace object */
  namespaces?: string[];
  /** Reject namespaced objects whose namespace does not exist */
  enforceNamespaces?: boolean;
  /** Delay applied to every write, so concurrent operations overlap */
  latencyMs?: number;
}

export type RuntimeOperation = 'get' | 'list' | 'create' | 'update' | 'delete';

/**
 * Entry of the call log kept for ordering assertions
 */
export interface RuntimeCall {
  operation: RuntimeOperation;
  key: string;
  phase: 'start' | 'end';
}

interface StoredObject {
  ref: ResourceRef;
  manifest: JsonObject;
  resourceVersion: string;
}

interface InjectedFailure {
  operation: RuntimeOperation;
  key?: string;
  error: Error;
  remaining: number;
}

class WatchSubscription {
  private readonly queue: WatchEvent[] = [];
  private wake: (() => void) | null = null;
  closed = false;

  constructor(readonly options: WatchOptions) {}

  push(event: WatchEvent): void {
    this.queue.push(event);
    this.wake?.();
  }

  close(): void {
    this.closed = true;
    this.wake?.();
  }

  async *events(signal: AbortSignal): AsyncGenerator<WatchEvent> {
    const onAbort = (): void => this.wake?.();
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      while (!signal.aborted) {
        const next = this.queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (this.closed) return;
        await new Promise<void>(resolve => {
          this.wake = resolve;
        });
        this.wake = null;
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

// ============================================================================
// Runtime Defaults
// ============================================================================

function withPodTemplateDefaults(podSpec: JsonObject): void {
  for (const field of ['containers', 'initContainers']) {
    const containers = podSpec[field];
    if (!Array.isArray(containers)) continue;
    for (const container of containers) {
      if (isJsonObject(container) && container.imagePullPolicy === undefined) {
        container.imagePullPolicy = 'IfNotPresent';
      }
    }
  }
}

/**
 * Fills fields a real API server would default
 */
function applyKindDefaults(manifest: JsonObject): void {
  const kind = manifest.kind;
  const spec = manifest.spec;
  if (!isJsonObject(spec)) return;

  if (kind === 'Deployment' || kind === 'StatefulSet' || kind === 'ReplicaSet') {
    if (spec.replicas === undefined) {
      spec.replicas = 1;
    }
  }

  if (kind === 'Service' && Array.isArray(spec.ports)) {
    for (const port of spec.ports) {
      if (isJsonObject(port) && port.protocol === undefined) {
        port.protocol = 'TCP';
      }
    }
  }

  const template = spec.template;
  if (isJsonObject(template) && isJsonObject(template.spec)) {
    withPodTemplateDefaults(template.spec);
  }
  if (kind === 'Pod') {
    withPodTemplateDefaults(spec);
  }
}

// ============================================================================
// In-Memory Runtime
// ============================================================================

export class InMemoryRuntime implements TargetRuntime {
  readonly name: string;
  readonly calls: RuntimeCall[] = [];

  private readonly objects = new Map<string, StoredObject>();
  private readonly baseNamespaces: Set<string>;
  private readonly enforceNamespaces: boolean;
  private readonly latencyMs: number;
  private readonly subscriptions = new Set<WatchSubscription>();
  private failures: InjectedFailure[] = [];
  private version = 0;

  constructor(options: InMemoryRuntimeOptions = {}) {
    this.name = options.name ?? 'in-memory';
    this.baseNamespaces = new Set(options.namespaces ?? ['default']);
    this.enforceNamespaces = options.enforceNamespaces ?? true;
    this.latencyMs = options.latencyMs ?? 0;
  }

  // --------------------------------------------------------------------------
  // TargetRuntime
  // --------------------------------------------------------------------------

  async get(ref: ResourceRef): Promise<LiveResource | null> {
    const key = identityKey(ref);
    this.consumeFailure('get', key);
    const stored = this.objects.get(key);
    return stored ? this.toLive(stored) : null;
  }

  async list(options: ListOptions): Promise<LiveResource[]> {
    this.consumeFailure('list');
    const kinds = options.kinds?.map(k => k.kind);
    const results: LiveResource[] = [];

    for (const stored of this.objects.values()) {
      if (kinds && !kinds.includes(stored.ref.kind)) continue;
      if (!matchesLabels(getLabels(stored.manifest), options.labels)) continue;
      results.push(this.toLive(stored));
    }

    return results.sort((a, b) => a.key.localeCompare(b.key));
  }

  async create(manifest: JsonObject): Promise<LiveResource> {
    const ref = this.validate(manifest);
    const key = identityKey(ref);
    return this.timed('create', key, () => {
      this.consumeFailure('create', key);

      if (this.objects.has(key)) {
        throw new ApplyConflictError(`${key} already exists`, { resource: key });
      }
      this.checkNamespace(ref, key);

      const stored = this.store(ref, manifest, null);
      this.emit('ADDED', stored);
      return this.toLive(stored);
    });
  }

  async update(manifest: JsonObject, resourceVersion: string): Promise<LiveResource> {
    const ref = this.validate(manifest);
    const key = identityKey(ref);
    return this.timed('update', key, () => {
      this.consumeFailure('update', key);

      const existing = this.objects.get(key);
      if (!existing) {
        throw new ApplyRejectedError(`${key} not found`, 'NotFound', { resource: key });
      }
      if (existing.resourceVersion !== resourceVersion) {
        throw new ApplyConflictError(
          `${key} was modified (have ${resourceVersion}, current ${existing.resourceVersion})`,
          { resource: key }
        );
      }

      const stored = this.store(ref, manifest, existing);
      this.emit('MODIFIED', stored);
      return this.toLive(stored);
    });
  }

  async delete(ref: ResourceRef): Promise<void> {
    const key = identityKey(ref);
    await this.timed('delete', key, () => {
      this.consumeFailure('delete', key);

      const existing = this.objects.get(key);
      if (!existing) return;

      if (ref.kind === 'Namespace') {
        for (const [childKey, child] of [...this.objects]) {
          if (child.ref.namespace === ref.name) {
            this.objects.delete(childKey);
            this.emit('DELETED', child);
          }
        }
      }

      this.objects.delete(key);
      this.emit('DELETED', existing);
    });
  }

  watch(options: WatchOptions, signal: AbortSignal): AsyncIterable<WatchEvent> {
    const subscription = new WatchSubscription(options);
    this.subscriptions.add(subscription);
    const subscriptions = this.subscriptions;

    return {
      async *[Symbol.asyncIterator]() {
        try {
          yield* subscription.events(signal);
        } finally {
          subscriptions.delete(subscription);
        }
      },
    };
  }

  // --------------------------------------------------------------------------
  // Test controls
  // --------------------------------------------------------------------------

  /**
   * Makes the next matching call(s) throw `error`
   */
  failNext(
    operation: RuntimeOperation,
    error: Error,
    options: { key?: string; times?: number } = {}
  ): void {
    this.failures.push({ operation, error, key: options.key, remaining: options.times ?? 1 });
  }

  /**
   * Edits an object out of band, as a user with cluster access would
   */
  mutate(ref: ResourceRef, mutator: (manifest: JsonObject) => void): LiveResource {
    const key = identityKey(ref);
    const existing = this.objects.get(key);
    if (!existing) {
      throw new Error(`${key} does not exist`);
    }
    const manifest = cloneJson(existing.manifest);
    mutator(manifest);
    existing.manifest = manifest;
    existing.resourceVersion = this.nextVersion();
    getMetadata(manifest).resourceVersion = existing.resourceVersion;
    this.emit('MODIFIED', existing);
    return this.toLive(existing);
  }

  /**
   * Ends every open watch stream
   */
  closeWatchers(): void {
    for (const subscription of this.subscriptions) {
      subscription.close();
    }
    this.subscriptions.clear();
  }

  get watcherCount(): number {
    return this.subscriptions.size;
  }

  has(ref: ResourceRef): boolean {
    return this.objects.has(identityKey(ref));
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private validate(manifest: JsonObject): ResourceRef {
    const ref = refFromManifest(manifest);
    if (!ref.apiVersion || !ref.kind || !ref.name) {
      throw new ApplyRejectedError('Object requires apiVersion, kind and metadata.name', 'Invalid');
    }
    if (!isClusterScoped(ref.kind) && !ref.namespace) {
      throw new ApplyRejectedError(`${ref.kind}/${ref.name} requires a namespace`, 'Invalid');
    }
    return ref;
  }

  private checkNamespace(ref: ResourceRef, key: string): void {
    if (!this.enforceNamespaces || isClusterScoped(ref.kind)) return;
    if (this.baseNamespaces.has(ref.namespace)) return;
    if (this.objects.has(`/Namespace//${ref.namespace}`)) return;
    throw new ApplyRejectedError(
      `namespace "${ref.namespace}" not found`,
      'NamespaceNotFound',
      { resource: key }
    );
  }

  private store(ref: ResourceRef, manifest: JsonObject, existing: StoredObject | null): StoredObject {
    const copy = cloneJson(manifest);
    delete copy.status;
    applyKindDefaults(copy);

    const metadata = getMetadata(copy);
    const resourceVersion = this.nextVersion();
    const previous = existing ? getMetadata(existing.manifest) : null;

    metadata.name = ref.name;
    if (ref.namespace) {
      metadata.namespace = ref.namespace;
    }
    metadata.uid = previous?.uid ?? uuidv4();
    metadata.creationTimestamp = previous?.creationTimestamp ?? new Date().toISOString();
    metadata.resourceVersion = resourceVersion;

    const previousGeneration = typeof previous?.generation === 'number' ? previous.generation : 0;
    const specChanged = !existing
      || stableStringify(existing.manifest.spec ?? null) !== stableStringify(copy.spec ?? null);
    metadata.generation = specChanged ? previousGeneration + 1 : previousGeneration;
    copy.metadata = metadata;

    const stored: StoredObject = { ref, manifest: copy, resourceVersion };
    this.objects.set(identityKey(ref), stored);
    return stored;
  }

  private toLive(stored: StoredObject): LiveResource {
    const labels = getLabels(stored.manifest);
    return {
      ref: { ...stored.ref },
      key: identityKey(stored.ref),
      manifest: cloneJson(stored.manifest),
      resourceVersion: stored.resourceVersion,
      observedAt: new Date(),
      owner: labels[LABELS.INSTANCE],
    };
  }

  private emit(type: WatchEventType, stored: StoredObject): void {
    for (const subscription of this.subscriptions) {
      const { kinds, labels } = subscription.options;
      if (kinds && !kinds.some(k => k.kind === stored.ref.kind)) continue;
      if (!matchesLabels(getLabels(stored.manifest), labels)) continue;
      subscription.push({ type, resource: this.toLive(stored) });
    }
  }

  private consumeFailure(operation: RuntimeOperation, key?: string): void {
    const failure = this.failures.find(
      f => f.operation === operation && (f.key === undefined || f.key === key)
    );
    if (!failure) return;

    failure.remaining -= 1;
    if (failure.remaining <= 0) {
      this.failures = this.failures.filter(f => f !== failure);
    }
    throw failure.error;
  }

  private async timed<T>(operation: RuntimeOperation, key: string, fn: () => T): Promise<T> {
    this.calls.push({ operation, key, phase: 'start' });
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    }
    try {
      return fn();
    } finally {
      this.calls.push({ operation, key, phase: 'end' });
    }
  }

  private nextVersion(): string {
    this.version += 1;
    return String(this.version);
  }
}
