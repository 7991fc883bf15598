/**
 * Kubernetes API Discovery
 * @module runtime/kubernetes-discovery
 *
 * Enumerates the listable kinds a cluster serves, so owned objects can be
 * found by label without knowing their kinds in advance.
 */

import { ApisApi, CoreV1Api, CustomObjectsApi, KubeConfig } from '@kubernetes/client-node';
import { ObservationError, getErrorMessage } from '../errors/index.js';
import { createModuleLogger, StructuredLogger } from '../logging/logger.js';
import { KindRef, kindId } from '../types/resource.js';

export const DEFAULT_DISCOVERY_TTL_MS = 300_000;

/**
 * Source of the kinds a cluster serves
 */
export interface KubernetesDiscoveryClient {
  servedKinds(): Promise<KindRef[]>;
}

interface ApiResource {
  name: string;
  kind: string;
  verbs: string[];
}

interface ApiResourceList {
  groupVersion: string;
  resources: ApiResource[];
}

interface ApiGroupList {
  groups: Array<{ name: string; preferredVersion?: { groupVersion: string; version: string } }>;
}

/**
 * The discovery calls made against CoreV1Api, ApisApi and CustomObjectsApi
 */
export interface DiscoveryApis {
  core: { getAPIResources(): Promise<ApiResourceList> };
  apis: { getAPIVersions(): Promise<ApiGroupList> };
  groups: { getAPIResources(param: { group: string; version: string }): Promise<ApiResourceList> };
}

export interface ClusterDiscoveryOptions {
  apis: DiscoveryApis;
  ttlMs?: number;
  now?: () => number;
  logger?: StructuredLogger;
}

function listableKinds(list: ApiResourceList): KindRef[] {
  return list.resources
    .filter(resource => !resource.name.includes('/') && resource.verbs.includes('list'))
    .map(resource => ({ apiVersion: list.groupVersion, kind: resource.kind }));
}

export class ClusterDiscovery implements KubernetesDiscoveryClient {
  private readonly apis: DiscoveryApis;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: StructuredLogger;
  private cached: { kinds: KindRef[]; expiresAt: number } | null = null;

  constructor(options: ClusterDiscoveryOptions) {
    this.apis = options.apis;
    this.ttlMs = options.ttlMs ?? DEFAULT_DISCOVERY_TTL_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createModuleLogger('kubernetes-discovery');
  }

  static fromKubeConfig(kc: KubeConfig): ClusterDiscovery {
    return new ClusterDiscovery({
      apis: {
        core: kc.makeApiClient(CoreV1Api),
        apis: kc.makeApiClient(ApisApi),
        groups: kc.makeApiClient(CustomObjectsApi),
      },
    });
  }

  async servedKinds(): Promise<KindRef[]> {
    if (this.cached && this.cached.expiresAt > this.now()) {
      return this.cached.kinds;
    }

    let core: ApiResourceList;
    let groups: ApiGroupList;
    try {
      [core, groups] = await Promise.all([this.apis.core.getAPIResources(), this.apis.apis.getAPIVersions()]);
    } catch (error) {
      throw new ObservationError(`API discovery failed: ${getErrorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const found = new Map<string, KindRef>();
    for (const kind of listableKinds(core)) {
      found.set(kindId(kind), kind);
    }

    for (const group of groups.groups) {
      const preferred = group.preferredVersion;
      if (!preferred) continue;
      try {
        const list = await this.apis.groups.getAPIResources({ group: group.name, version: preferred.version });
        for (const kind of listableKinds(list)) {
          found.set(kindId(kind), kind);
        }
      } catch (error) {
        this.logger.warn({ group: preferred.groupVersion, err: error }, 'Skipping API group that failed discovery');
      }
    }

    const kinds = [...found.values()];
    this.cached = { kinds, expiresAt: this.now() + this.ttlMs };
    this.logger.debug({ kinds: kinds.length }, 'Discovered served kinds');
    return kinds;
  }
}
