/**
 * Sync Dependency Graph
 * @module sync/dependency-graph
 *
 * Orders operations into tiers. The base rank comes from the sync wave
 * annotation and the kind; dependency edges between resources push
 * dependents into later tiers.
 */

import { ANNOTATIONS } from '../constants/index.js';
import {
  JsonObject,
  JsonValue,
  ResourceRef,
  getAnnotations,
  isClusterScoped,
  isJsonObject,
  readString,
} from '../types/resource.js';

// ============================================================================
// Types
// ============================================================================

export interface PlanNode {
  key: string;
  ref: ResourceRef;
  manifest: JsonObject;
}

/**
 * `to` depends on `from`
 */
export interface DependencyEdge {
  from: string;
  to: string;
  reason: string;
}

export interface ExecutionPlan {
  /** Ascending execution order */
  tiers: Array<{ tier: number; keys: string[] }>;
  tierOf: Map<string, number>;
  /** key -> keys that must not start before it succeeds */
  dependents: Map<string, string[]>;
  edges: DependencyEdge[];
  /** Edges removed because they formed a cycle */
  droppedEdges: DependencyEdge[];
}

// ============================================================================
// Ranking
// ============================================================================

const KIND_TIERS: Readonly<Record<string, number>> = {
  Namespace: 0,
  CustomResourceDefinition: 0,

  ServiceAccount: 1,
  Secret: 1,
  ConfigMap: 1,
  ResourceQuota: 1,
  LimitRange: 1,
  NetworkPolicy: 1,
  PodDisruptionBudget: 1,
  PodSecurityPolicy: 1,
  PersistentVolume: 1,
  PersistentVolumeClaim: 1,
  StorageClass: 1,
  ClusterRole: 1,
  Role: 1,
  IngressClass: 1,
  PriorityClass: 1,

  RoleBinding: 2,
  ClusterRoleBinding: 2,

  Service: 3,

  Deployment: 4,
  StatefulSet: 4,
  DaemonSet: 4,
  ReplicaSet: 4,
  ReplicationController: 4,
  Pod: 4,
  Job: 4,
  CronJob: 4,

  Ingress: 5,
  APIService: 5,
  HorizontalPodAutoscaler: 5,
  MutatingWebhookConfiguration: 5,
  ValidatingWebhookConfiguration: 5,
  Application: 5,
};

/** Custom resources and unknown kinds run last */
const DEFAULT_KIND_TIER = 5;

/** Width reserved for kind tiers and dependency steps within one wave */
const WAVE_WIDTH = 1000;

export function kindTier(kind: string): number {
  return KIND_TIERS[kind] ?? DEFAULT_KIND_TIER;
}

export function syncWave(manifest: JsonObject): number {
  const annotations = getAnnotations(manifest);
  const raw = annotations[ANNOTATIONS.SYNC_WAVE] ?? annotations[ANNOTATIONS.ARGO_SYNC_WAVE];
  if (raw === undefined) return 0;
  const wave = Number.parseInt(raw, 10);
  return Number.isFinite(wave) ? wave : 0;
}

export function baseRank(node: PlanNode): number {
  return syncWave(node.manifest) * WAVE_WIDTH + kindTier(node.ref.kind);
}

// ============================================================================
// Edge Discovery
// ============================================================================

function nameKey(kind: string, namespace: string, name: string): string {
  return `${kind}/${namespace}/${name}`;
}

function strings(values: Array<JsonValue | undefined>): string[] {
  return values.filter((v): v is string => typeof v === 'string' && v !== '');
}

function objects(value: JsonValue | undefined): JsonObject[] {
  return Array.isArray(value) ? value.filter(isJsonObject) : [];
}

function field(value: JsonValue | undefined, ...path: string[]): JsonValue | undefined {
  let current = value;
  for (const token of path) {
    if (!isJsonObject(current)) return undefined;
    current = current[token];
  }
  return current;
}

function podSpecOf(manifest: JsonObject): JsonObject | null {
  const candidates = [
    field(manifest, 'spec', 'template', 'spec'),
    field(manifest, 'spec', 'jobTemplate', 'spec', 'template', 'spec'),
    manifest.kind === 'Pod' ? field(manifest, 'spec') : undefined,
  ];
  const found = candidates.find(isJsonObject);
  return found ?? null;
}

interface PodReferences {
  secrets: string[];
  configMaps: string[];
  serviceAccounts: string[];
  claims: string[];
}

export function podTemplateReferences(manifest: JsonObject): PodReferences {
  const refs: PodReferences = { secrets: [], configMaps: [], serviceAccounts: [], claims: [] };
  const pod = podSpecOf(manifest);
  if (!pod) return refs;

  refs.serviceAccounts.push(...strings([pod.serviceAccountName, pod.serviceAccount]));
  refs.secrets.push(...strings(objects(pod.imagePullSecrets).map(s => s.name)));

  for (const volume of objects(pod.volumes)) {
    refs.secrets.push(...strings([field(volume, 'secret', 'secretName')]));
    refs.configMaps.push(...strings([field(volume, 'configMap', 'name')]));
    refs.claims.push(...strings([field(volume, 'persistentVolumeClaim', 'claimName')]));
    for (const source of objects(field(volume, 'projected', 'sources'))) {
      refs.secrets.push(...strings([field(source, 'secret', 'name')]));
      refs.configMaps.push(...strings([field(source, 'configMap', 'name')]));
    }
  }

  const containers = [...objects(pod.containers), ...objects(pod.initContainers)];
  for (const container of containers) {
    for (const env of objects(container.env)) {
      refs.secrets.push(...strings([field(env, 'valueFrom', 'secretKeyRef', 'name')]));
      refs.configMaps.push(...strings([field(env, 'valueFrom', 'configMapKeyRef', 'name')]));
    }
    for (const envFrom of objects(container.envFrom)) {
      refs.secrets.push(...strings([field(envFrom, 'secretRef', 'name')]));
      refs.configMaps.push(...strings([field(envFrom, 'configMapRef', 'name')]));
    }
  }

  return refs;
}

function ingressReferences(manifest: JsonObject): { services: string[]; secrets: string[] } {
  const spec = field(manifest, 'spec');
  const services = strings([
    field(spec, 'defaultBackend', 'service', 'name'),
    field(spec, 'backend', 'serviceName'),
  ]);
  for (const rule of objects(field(spec, 'rules'))) {
    for (const path of objects(field(rule, 'http', 'paths'))) {
      services.push(...strings([
        field(path, 'backend', 'service', 'name'),
        field(path, 'backend', 'serviceName'),
      ]));
    }
  }
  const secrets = strings(objects(field(spec, 'tls')).map(tls => tls.secretName));
  return { services, secrets };
}

/**
 * Finds dependency edges among the given nodes
 */
export function discoverEdges(nodes: readonly PlanNode[]): DependencyEdge[] {
  const byName = new Map<string, string>();
  const crdTargets = new Map<string, string>();

  for (const node of nodes) {
    byName.set(nameKey(node.ref.kind, node.ref.namespace, node.ref.name), node.key);
    if (node.ref.kind === 'CustomResourceDefinition') {
      const group = readString(field(node.manifest, 'spec', 'group'));
      const kind = readString(field(node.manifest, 'spec', 'names', 'kind'));
      if (group && kind) {
        crdTargets.set(`${group}/${kind}`, node.key);
      }
    }
  }

  const edges: DependencyEdge[] = [];
  const seen = new Set<string>();
  const add = (from: string | undefined, to: string, reason: string): void => {
    if (from === undefined || from === to) return;
    const id = `${from}->${to}`;
    if (seen.has(id)) return;
    seen.add(id);
    edges.push({ from, to, reason });
  };
  const lookup = (kind: string, namespace: string, name: string): string | undefined =>
    byName.get(nameKey(kind, isClusterScoped(kind) ? '' : namespace, name));

  for (const node of nodes) {
    const { ref, manifest, key } = node;

    if (ref.namespace) {
      add(lookup('Namespace', '', ref.namespace), key, 'namespace');
    }

    add(crdTargets.get(`${ref.group}/${ref.kind}`), key, 'custom-resource-definition');

    const pod = podTemplateReferences(manifest);
    for (const name of pod.secrets) add(lookup('Secret', ref.namespace, name), key, 'secret');
    for (const name of pod.configMaps) add(lookup('ConfigMap', ref.namespace, name), key, 'config-map');
    for (const name of pod.serviceAccounts) {
      add(lookup('ServiceAccount', ref.namespace, name), key, 'service-account');
    }
    for (const name of pod.claims) {
      add(lookup('PersistentVolumeClaim', ref.namespace, name), key, 'persistent-volume-claim');
    }

    if (ref.kind === 'Ingress') {
      const ingress = ingressReferences(manifest);
      for (const name of ingress.services) add(lookup('Service', ref.namespace, name), key, 'ingress-backend');
      for (const name of ingress.secrets) add(lookup('Secret', ref.namespace, name), key, 'ingress-tls');
    }

    if (ref.kind === 'RoleBinding' || ref.kind === 'ClusterRoleBinding') {
      const roleKind = readString(field(manifest, 'roleRef', 'kind'));
      const roleName = readString(field(manifest, 'roleRef', 'name'));
      if (roleKind && roleName) {
        add(lookup(roleKind, ref.namespace, roleName), key, 'role-ref');
      }
      for (const subject of objects(manifest.subjects)) {
        if (subject.kind !== 'ServiceAccount') continue;
        const name = readString(subject.name);
        const namespace = readString(subject.namespace) ?? ref.namespace;
        if (name) add(lookup('ServiceAccount', namespace, name), key, 'binding-subject');
      }
    }

    const dependsOn = getAnnotations(manifest)[ANNOTATIONS.DEPENDS_ON];
    if (dependsOn) {
      for (const entry of dependsOn.split(',').map(s => s.trim()).filter(Boolean)) {
        const parts = entry.split('/');
        const [kind, first, second] = parts;
        if (!kind || !first) continue;
        const target = parts.length >= 3 && second
          ? lookup(kind, first, second)
          : lookup(kind, ref.namespace, first);
        add(target, key, 'depends-on');
      }
    }
  }

  return edges;
}

// ============================================================================
// Cycle Removal (Tarjan's strongly connected components)
// ============================================================================

function stronglyConnected(keys: readonly string[], edges: readonly DependencyEdge[]): Map<string, number> {
  const adjacency = new Map<string, string[]>();
  for (const edge of edges) {
    const list = adjacency.get(edge.from) ?? [];
    list.push(edge.to);
    adjacency.set(edge.from, list);
  }

  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const component = new Map<string, number>();
  let counter = 0;
  let componentId = 0;

  const visit = (node: string): void => {
    index.set(node, counter);
    lowLink.set(node, counter);
    counter += 1;
    stack.push(node);
    onStack.add(node);

    for (const next of adjacency.get(node) ?? []) {
      if (!index.has(next)) {
        visit(next);
        lowLink.set(node, Math.min(lowLink.get(node) ?? 0, lowLink.get(next) ?? 0));
      } else if (onStack.has(next)) {
        lowLink.set(node, Math.min(lowLink.get(node) ?? 0, index.get(next) ?? 0));
      }
    }

    if (lowLink.get(node) === index.get(node)) {
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        component.set(member, componentId);
      } while (member !== node);
      componentId += 1;
    }
  };

  for (const key of keys) {
    if (!index.has(key)) visit(key);
  }

  return component;
}

// ============================================================================
// Execution Plan
// ============================================================================

/**
 * Assigns tiers so that tier(B) >= max(base(B), tier(A) + 1) for every kept
 * edge A -> B. With `reverse`, base ranks are negated and edges flipped, which
 * yields deletion order.
 */
export function buildExecutionPlan(
  nodes: readonly PlanNode[],
  options: { reverse?: boolean } = {}
): ExecutionPlan {
  const reverse = options.reverse ?? false;
  const keys = nodes.map(n => n.key);
  const discovered = discoverEdges(nodes);
  const oriented = reverse
    ? discovered.map(e => ({ from: e.to, to: e.from, reason: e.reason }))
    : discovered;

  const component = stronglyConnected(keys, oriented);
  const edges: DependencyEdge[] = [];
  const droppedEdges: DependencyEdge[] = [];
  for (const edge of oriented) {
    if (component.get(edge.from) === component.get(edge.to)) {
      droppedEdges.push(edge);
    } else {
      edges.push(edge);
    }
  }

  // Kahn's algorithm over the acyclic remainder
  const dependents = new Map<string, string[]>();
  const inDegree = new Map<string, number>();
  for (const key of keys) {
    inDegree.set(key, 0);
    dependents.set(key, []);
  }
  for (const edge of edges) {
    dependents.get(edge.from)?.push(edge.to);
    inDegree.set(edge.to, (inDegree.get(edge.to) ?? 0) + 1);
  }

  const tierOf = new Map<string, number>();
  for (const node of nodes) {
    const rank = baseRank(node);
    tierOf.set(node.key, reverse ? -rank : rank);
  }

  const queue = keys.filter(key => inDegree.get(key) === 0);
  while (queue.length > 0) {
    const key = queue.shift();
    if (key === undefined) break;
    const tier = tierOf.get(key) ?? 0;
    for (const next of dependents.get(key) ?? []) {
      tierOf.set(next, Math.max(tierOf.get(next) ?? 0, tier + 1));
      const degree = (inDegree.get(next) ?? 1) - 1;
      inDegree.set(next, degree);
      if (degree === 0) queue.push(next);
    }
  }

  const grouped = new Map<number, string[]>();
  for (const key of [...keys].sort()) {
    const tier = tierOf.get(key) ?? 0;
    const list = grouped.get(tier) ?? [];
    list.push(key);
    grouped.set(tier, list);
  }

  const tiers = [...grouped.entries()]
    .sort(([a], [b]) => a - b)
    .map(([tier, tierKeys]) => ({ tier, keys: tierKeys }));

  return { tiers, tierOf, dependents, edges, droppedEdges };
}
