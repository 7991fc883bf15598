/**
 * Kubernetes Target Runtime
 * @module runtime/kubernetes-runtime
 *
 * TargetRuntime over @kubernetes/client-node. Objects are addressed
 * generically through KubernetesObjectApi; watches go through Watch on the
 * collection path of each kind. Listing without kinds walks every kind API
 * discovery reports as served.
 */

import { KubeConfig, KubernetesObjectApi, Watch } from '@kubernetes/client-node';
import type {
  KubernetesListObject,
  KubernetesObject,
  V1ObjectMeta,
} from '@kubernetes/client-node';
import { LABELS } from '../constants/index.js';
import {
  ApplyConflictError,
  ApplyRejectedError,
  ObservationError,
  RuntimeUnavailableError,
  getErrorMessage,
} from '../errors/index.js';
import { createModuleLogger, StructuredLogger } from '../logging/logger.js';
import {
  JsonObject,
  JsonValue,
  KindRef,
  LiveResource,
  ResourceRef,
  getLabels,
  getMetadata,
  identityKey,
  isJsonObject,
  readString,
  refFromManifest,
  toJsonObject,
} from '../types/resource.js';
import {
  ListOptions,
  TargetRuntime,
  WatchEvent,
  WatchEventType,
  WatchOptions,
  labelSelector,
} from './interface.js';
import { ClusterDiscovery, KubernetesDiscoveryClient } from './kubernetes-discovery.js';

// ============================================================================
// Client Seams
// ============================================================================

/**
 * The KubernetesObjectApi calls the runtime makes
 */
export interface KubernetesObjectClient {
  read(spec: Parameters<KubernetesObjectApi['read']>[0]): Promise<KubernetesObject>;
  create(spec: KubernetesObject): Promise<KubernetesObject>;
  replace(spec: KubernetesObject): Promise<KubernetesObject>;
  delete(spec: KubernetesObject): Promise<unknown>;
  list(
    apiVersion: string,
    kind: string,
    namespace?: string,
    pretty?: string,
    exact?: boolean,
    exportt?: boolean,
    fieldSelector?: string,
    labelSelector?: string
  ): Promise<KubernetesListObject<KubernetesObject>>;
}

/**
 * The Watch call the runtime makes
 */
export interface KubernetesWatchClient {
  watch(
    path: string,
    queryParams: Record<string, string>,
    callback: (phase: string, apiObj: unknown) => void,
    done: (err: unknown) => void
  ): Promise<AbortController>;
}

export interface KubernetesRuntimeOptions {
  name: string;
  client: KubernetesObjectClient;
  watcher?: KubernetesWatchClient;
  discovery?: KubernetesDiscoveryClient;
  logger?: StructuredLogger;
}

// ============================================================================
// Conversion Helpers
// ============================================================================

function stringMap(value: JsonValue | undefined): Record<string, string> | undefined {
  if (!isJsonObject(value)) return undefined;
  const result: Record<string, string> = {};
  for (const [key, member] of Object.entries(value)) {
    if (typeof member === 'string') result[key] = member;
  }
  return result;
}

function toObjectMeta(metadata: JsonObject): V1ObjectMeta {
  return {
    name: readString(metadata.name),
    namespace: readString(metadata.namespace),
    labels: stringMap(metadata.labels),
    annotations: stringMap(metadata.annotations),
    resourceVersion: readString(metadata.resourceVersion),
  };
}

function toKubernetesObject(manifest: JsonObject): KubernetesObject {
  return {
    ...manifest,
    apiVersion: readString(manifest.apiVersion),
    kind: readString(manifest.kind),
    metadata: toObjectMeta(getMetadata(manifest)),
  };
}

function headerOf(ref: ResourceRef): KubernetesObject & { metadata: { name: string } } {
  return {
    apiVersion: ref.apiVersion,
    kind: ref.kind,
    metadata: ref.namespace ? { name: ref.name, namespace: ref.namespace } : { name: ref.name },
  };
}

/**
 * HTTP status carried by client errors (`ApiException.code`)
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'number') return code;
  const statusCode: unknown = Reflect.get(error, 'statusCode');
  return typeof statusCode === 'number' ? statusCode : undefined;
}

const REJECTED_STATUS: ReadonlySet<number> = new Set([400, 403, 404, 422]);

function mapWriteError(error: unknown, key: string): Error {
  const status = statusCodeOf(error);
  const message = getErrorMessage(error);
  const cause = error instanceof Error ? error : undefined;

  if (status === 409) {
    return new ApplyConflictError(`Conflict writing ${key}: ${message}`, { resource: key, cause });
  }
  if (status !== undefined && REJECTED_STATUS.has(status)) {
    return new ApplyRejectedError(`Runtime rejected ${key}: ${message}`, `HTTP ${status}`, {
      resource: key,
      cause,
    });
  }
  return new RuntimeUnavailableError(`Runtime unavailable writing ${key}: ${message}`, {
    resource: key,
    cause,
  });
}

const IRREGULAR_PLURALS: Readonly<Record<string, string>> = {
  Endpoints: 'endpoints',
  PodSecurityPolicy: 'podsecuritypolicies',
};

/**
 * Resource plural for a kind, as used in collection paths
 */
export function pluralize(kind: string): string {
  const irregular = IRREGULAR_PLURALS[kind];
  if (irregular) return irregular;
  const lower = kind.toLowerCase();
  if (/(s|x|z|ch|sh)$/.test(lower)) return `${lower}es`;
  if (/[^aeiou]y$/.test(lower)) return `${lower.slice(0, -1)}ies`;
  return `${lower}s`;
}

export function collectionPath(kind: KindRef): string {
  const base = kind.apiVersion.includes('/') ? `/apis/${kind.apiVersion}` : `/api/${kind.apiVersion}`;
  return `${base}/${pluralize(kind.kind)}`;
}

function isWatchEventType(value: string): value is WatchEventType {
  return value === 'ADDED' || value === 'MODIFIED' || value === 'DELETED';
}

// ============================================================================
// Kubernetes Runtime
// ============================================================================

export class KubernetesRuntime implements TargetRuntime {
  readonly name: string;
  private readonly client: KubernetesObjectClient;
  private readonly watcher?: KubernetesWatchClient;
  private readonly discovery?: KubernetesDiscoveryClient;
  private readonly logger: StructuredLogger;

  constructor(options: KubernetesRuntimeOptions) {
    this.name = options.name;
    this.client = options.client;
    this.watcher = options.watcher;
    this.discovery = options.discovery;
    this.logger = options.logger ?? createModuleLogger('kubernetes-runtime');
  }

  /**
   * Builds a runtime from a kubeconfig file, or the default loading rules
   */
  static fromKubeConfig(name: string, kubeconfig?: string, context?: string): KubernetesRuntime {
    const kc = new KubeConfig();
    if (kubeconfig) {
      kc.loadFromFile(kubeconfig);
    } else {
      kc.loadFromDefault();
    }
    if (context) {
      kc.setCurrentContext(context);
    }
    return new KubernetesRuntime({
      name,
      client: KubernetesObjectApi.makeApiClient(kc),
      watcher: new Watch(kc),
      discovery: ClusterDiscovery.fromKubeConfig(kc),
    });
  }

  async get(ref: ResourceRef): Promise<LiveResource | null> {
    try {
      const object = await this.client.read(headerOf(ref));
      return this.toLive(object);
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        return null;
      }
      throw new ObservationError(`Failed to read ${identityKey(ref)}: ${getErrorMessage(error)}`, {
        resource: identityKey(ref),
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async list(options: ListOptions): Promise<LiveResource[]> {
    const kinds = options.kinds ?? (await this.servedKinds());
    const selector = labelSelector(options.labels);
    const results: LiveResource[] = [];

    for (const kind of kinds) {
      try {
        const list = await this.client.list(
          kind.apiVersion,
          kind.kind,
          undefined,
          undefined,
          undefined,
          undefined,
          undefined,
          selector
        );
        for (const item of list.items) {
          const live = this.toLive({ ...item, apiVersion: kind.apiVersion, kind: kind.kind });
          if (live) results.push(live);
        }
      } catch (error) {
        if (statusCodeOf(error) === 404) {
          // Kind not served by this cluster
          continue;
        }
        throw new ObservationError(`Failed to list ${kind.kind}: ${getErrorMessage(error)}`, {
          cause: error instanceof Error ? error : undefined,
        });
      }
    }

    return results.sort((a, b) => a.key.localeCompare(b.key));
  }

  async create(manifest: JsonObject): Promise<LiveResource> {
    const key = identityKey(refFromManifest(manifest));
    try {
      return this.requireLive(await this.client.create(toKubernetesObject(manifest)), key);
    } catch (error) {
      throw mapWriteError(error, key);
    }
  }

  async update(manifest: JsonObject, resourceVersion: string): Promise<LiveResource> {
    const key = identityKey(refFromManifest(manifest));
    const object = toKubernetesObject(manifest);
    object.metadata = { ...object.metadata, resourceVersion };
    try {
      return this.requireLive(await this.client.replace(object), key);
    } catch (error) {
      throw mapWriteError(error, key);
    }
  }

  async delete(ref: ResourceRef): Promise<void> {
    try {
      await this.client.delete(headerOf(ref));
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        return;
      }
      throw mapWriteError(error, identityKey(ref));
    }
  }

  async *watch(options: WatchOptions, signal: AbortSignal): AsyncIterable<WatchEvent> {
    if (!this.watcher) {
      return;
    }

    const queue: WatchEvent[] = [];
    let wake: (() => void) | null = null;
    const state: { open: number; failure: Error | null } = { open: 0, failure: null };
    const controllers: AbortController[] = [];

    const notify = (): void => {
      wake?.();
    };

    const kinds = options.kinds ?? (await this.servedKinds());
    for (const kind of kinds) {
      state.open += 1;
      const controller = await this.watcher.watch(
        collectionPath(kind),
        { labelSelector: labelSelector(options.labels) },
        (phase: string, object: unknown) => {
          if (!isWatchEventType(phase)) return;
          const live = this.toLive(object);
          if (live) {
            queue.push({ type: phase, resource: live });
            notify();
          }
        },
        (error: unknown) => {
          state.open -= 1;
          if (error && !signal.aborted) {
            state.failure = error instanceof Error ? error : new Error(getErrorMessage(error));
          }
          notify();
        }
      );
      controllers.push(controller);
    }

    signal.addEventListener('abort', notify, { once: true });
    try {
      while (!signal.aborted) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (state.failure) {
          this.logger.debug({ err: state.failure }, 'Watch stream failed');
          return;
        }
        if (state.open <= 0) return;
        await new Promise<void>(resolve => {
          wake = resolve;
        });
        wake = null;
      }
    } finally {
      signal.removeEventListener('abort', notify);
      for (const controller of controllers) {
        controller.abort();
      }
    }
  }

  private async servedKinds(): Promise<KindRef[]> {
    if (!this.discovery) {
      this.logger.debug('No discovery client; listing without kinds finds nothing');
      return [];
    }
    return this.discovery.servedKinds();
  }

  private requireLive(object: unknown, key: string): LiveResource {
    const live = this.toLive(object);
    if (!live) {
      throw new RuntimeUnavailableError(`Runtime returned an unreadable object for ${key}`, {
        resource: key,
      });
    }
    return live;
  }

  private toLive(object: unknown): LiveResource | null {
    const manifest = toJsonObject(object);
    if (!manifest) return null;

    const ref = refFromManifest(manifest);
    if (!ref.kind || !ref.name) return null;

    const metadata = getMetadata(manifest);
    return {
      ref,
      key: identityKey(ref),
      manifest,
      resourceVersion: readString(metadata.resourceVersion) ?? '',
      observedAt: new Date(),
      owner: getLabels(manifest)[LABELS.INSTANCE],
    };
  }
}
