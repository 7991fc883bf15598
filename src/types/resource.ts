/**
 * Resource Type Definitions
 * @module types/resource
 *
 * Identities, manifests and the desired/live resource snapshots compared by
 * the diff engine.
 */

// ============================================================================
// JSON Documents
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Converts an arbitrary value (parsed YAML, API client models) into plain JSON.
 * Dates become ISO strings; functions and undefined members are dropped.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return value.map(item => toJsonValue(item) ?? null);
  }
  if (typeof value === 'object') {
    const result: JsonObject = {};
    for (const [key, member] of Object.entries(value)) {
      const converted = toJsonValue(member);
      if (converted !== undefined) {
        result[key] = converted;
      }
    }
    return result;
  }
  return undefined;
}

export function toJsonObject(value: unknown): JsonObject | null {
  const converted = toJsonValue(value);
  return isJsonObject(converted) ? converted : null;
}

/**
 * JSON with object keys sorted, so equal documents serialize identically
 */
export function stableStringify(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (isJsonObject(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map(key => `${JSON.stringify(key)}:${stableStringify(value[key] ?? null)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

// ============================================================================
// Resource Identity
// ============================================================================

/**
 * Uniquely names an object in a target runtime
 */
export interface ResourceIdentity {
  /** API group, "" for the core group */
  group: string;
  kind: string;
  /** "" for cluster-scoped kinds */
  namespace: string;
  name: string;
}

/**
 * Identity plus the apiVersion needed to address the object
 */
export interface ResourceRef extends ResourceIdentity {
  apiVersion: string;
}

export interface KindRef {
  apiVersion: string;
  kind: string;
}

export function kindId(kind: KindRef): string {
  return `${kind.apiVersion}/${kind.kind}`;
}

const CLUSTER_SCOPED_KINDS: ReadonlySet<string> = new Set([
  'Namespace',
  'CustomResourceDefinition',
  'ClusterRole',
  'ClusterRoleBinding',
  'PersistentVolume',
  'StorageClass',
  'PriorityClass',
  'IngressClass',
  'APIService',
  'MutatingWebhookConfiguration',
  'ValidatingWebhookConfiguration',
  'Node',
]);

export function isClusterScoped(kind: string): boolean {
  return CLUSTER_SCOPED_KINDS.has(kind);
}

/**
 * `apps/v1` -> `apps`, `v1` -> `""`
 */
export function groupOf(apiVersion: string): string {
  const slash = apiVersion.indexOf('/');
  return slash === -1 ? '' : apiVersion.slice(0, slash);
}

/**
 * Stable string key `group/kind/namespace/name`
 */
export function identityKey(identity: ResourceIdentity): string {
  return `${identity.group}/${identity.kind}/${identity.namespace}/${identity.name}`;
}

/**
 * Human readable `Kind/namespace/name` or `Kind/name`
 */
export function formatIdentity(identity: ResourceIdentity): string {
  return identity.namespace
    ? `${identity.kind}/${identity.namespace}/${identity.name}`
    : `${identity.kind}/${identity.name}`;
}

export function readString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function getMetadata(manifest: JsonObject): JsonObject {
  const metadata = manifest.metadata;
  return isJsonObject(metadata) ? metadata : {};
}

export function getStringMap(manifest: JsonObject, field: 'labels' | 'annotations'): Record<string, string> {
  const raw = getMetadata(manifest)[field];
  const result: Record<string, string> = {};
  if (isJsonObject(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      if (typeof value === 'string') {
        result[key] = value;
      }
    }
  }
  return result;
}

export function getLabels(manifest: JsonObject): Record<string, string> {
  return getStringMap(manifest, 'labels');
}

export function getAnnotations(manifest: JsonObject): Record<string, string> {
  return getStringMap(manifest, 'annotations');
}

/**
 * Builds the reference for a manifest that carries apiVersion, kind and
 * metadata.name. Namespaced kinds without a namespace take `defaultNamespace`.
 */
export function refFromManifest(manifest: JsonObject, defaultNamespace = ''): ResourceRef {
  const apiVersion = readString(manifest.apiVersion) ?? '';
  const kind = readString(manifest.kind) ?? '';
  const metadata = getMetadata(manifest);
  const name = readString(metadata.name) ?? '';
  const namespace = isClusterScoped(kind)
    ? ''
    : readString(metadata.namespace) || defaultNamespace;

  return { apiVersion, group: groupOf(apiVersion), kind, namespace, name };
}

export function toIdentity(ref: ResourceRef): ResourceIdentity {
  return { group: ref.group, kind: ref.kind, namespace: ref.namespace, name: ref.name };
}

// ============================================================================
// Desired and Live Resources
// ============================================================================

/**
 * Where a desired manifest came from
 */
export interface Provenance {
  repoURL: string;
  revision: string;
  /** File path relative to the repository root */
  path: string;
  documentIndex: number;
}

/**
 * A manifest as declared in the source tree for one sync cycle
 */
export interface DesiredResource {
  ref: ResourceRef;
  key: string;
  manifest: JsonObject;
  provenance: Provenance;
  /** Owning Application */
  application: string;
}

/**
 * An object as observed in the target runtime
 */
export interface LiveResource {
  ref: ResourceRef;
  key: string;
  manifest: JsonObject;
  resourceVersion: string;
  observedAt: Date;
  /** Application named by the instance label, absent for unmanaged objects */
  owner?: string;
}
