/**
 * Manifest Test Factories
 * @module tests/factories/manifest
 *
 * Builders for resource manifests, desired resources and Application specs.
 */

import { ANNOTATIONS } from '../../src/constants/index.js';
import type { ApplicationSpec, DeclaredSyncPolicy } from '../../src/types/application.js';
import {
  DesiredResource,
  JsonObject,
  getMetadata,
  identityKey,
  isJsonObject,
  refFromManifest,
} from '../../src/types/resource.js';

// ============================================================================
// Resource Manifests
// ============================================================================

export interface ManifestOptions {
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

function metadataOf(name: string, options: ManifestOptions): JsonObject {
  const metadata: JsonObject = { name };
  if (options.namespace !== undefined) metadata.namespace = options.namespace;
  if (options.labels) metadata.labels = { ...options.labels };
  if (options.annotations) metadata.annotations = { ...options.annotations };
  return metadata;
}

export function createNamespace(name: string): JsonObject {
  return { apiVersion: 'v1', kind: 'Namespace', metadata: { name } };
}

export function createConfigMap(
  name: string,
  data: Record<string, string> = { key: 'value' },
  options: ManifestOptions = {}
): JsonObject {
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: metadataOf(name, options),
    data: { ...data },
  };
}

export function createSecret(
  name: string,
  stringData: Record<string, string> = { password: 'test-secret' },
  options: ManifestOptions = {}
): JsonObject {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: metadataOf(name, options),
    stringData: { ...stringData },
  };
}

export function createService(name: string, options: ManifestOptions & { port?: number } = {}): JsonObject {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: metadataOf(name, options),
    spec: {
      selector: { app: name },
      ports: [{ port: options.port ?? 80 }],
    },
  };
}

export interface DeploymentOptions extends ManifestOptions {
  replicas?: number;
  image?: string;
  configMap?: string;
  secret?: string;
}

export function createDeployment(name: string, options: DeploymentOptions = {}): JsonObject {
  const container: JsonObject = { name, image: options.image ?? 'nginx:1.25' };
  if (options.configMap) {
    container.envFrom = [{ configMapRef: { name: options.configMap } }];
  }

  const podSpec: JsonObject = { containers: [container] };
  if (options.secret) {
    podSpec.volumes = [{ name: 'credentials', secret: { secretName: options.secret } }];
  }

  const spec: JsonObject = {
    selector: { matchLabels: { app: name } },
    template: {
      metadata: { labels: { app: name } },
      spec: podSpec,
    },
  };
  if (options.replicas !== undefined) {
    spec.replicas = options.replicas;
  }

  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: metadataOf(name, options),
    spec,
  };
}

export function withSyncWave(manifest: JsonObject, wave: number): JsonObject {
  return withAnnotation(manifest, ANNOTATIONS.SYNC_WAVE, String(wave));
}

export function withAnnotation(manifest: JsonObject, key: string, value: string): JsonObject {
  const base: JsonObject = { ...getMetadata(manifest) };
  const annotations = base.annotations;
  base.annotations = { ...(isJsonObject(annotations) ? annotations : {}), [key]: value };
  return { ...manifest, metadata: base };
}

// ============================================================================
// Application Manifests
// ============================================================================

export interface ApplicationManifestOptions {
  path: string;
  repoURL?: string;
  namespace?: string;
  destinationNamespace?: string;
  recurse?: boolean;
  /** `undefined` leaves syncPolicy out so every field inherits */
  syncPolicy?: JsonObject;
  apiVersion?: string;
}

export function createApplicationManifest(name: string, options: ApplicationManifestOptions): JsonObject {
  const source: JsonObject = { path: options.path };
  if (options.repoURL !== undefined) source.repoURL = options.repoURL;
  if (options.recurse !== undefined) source.directory = { recurse: options.recurse };

  const spec: JsonObject = {
    source,
    destination: { namespace: options.destinationNamespace ?? 'default' },
  };
  if (options.syncPolicy !== undefined) spec.syncPolicy = options.syncPolicy;

  const metadata: JsonObject = { name };
  if (options.namespace !== undefined) metadata.namespace = options.namespace;

  return {
    apiVersion: options.apiVersion ?? 'driftguard.io/v1alpha1',
    kind: 'Application',
    metadata,
    spec,
  };
}

export const AUTOMATED_PRUNE: JsonObject = { automated: { prune: true } };
export const AUTOMATED_SELF_HEAL: JsonObject = { automated: { prune: true, selfHeal: true } };
export const AUTOMATED_NO_SELF_HEAL: JsonObject = { automated: { prune: true, selfHeal: false } };
export const MANUAL: JsonObject = {};

// ============================================================================
// Specs and Desired Resources
// ============================================================================

export function createApplicationSpec(
  name: string,
  repoURL: string,
  overrides: {
    path?: string;
    recurse?: boolean;
    policy?: DeclaredSyncPolicy;
    namespace?: string;
  } = {}
): ApplicationSpec {
  return {
    name,
    source: {
      repoURL,
      revision: 'HEAD',
      path: overrides.path ?? '.',
      recurse: overrides.recurse ?? false,
    },
    destination: { namespace: overrides.namespace ?? 'default' },
    policy: overrides.policy ?? {},
    ignoreDifferences: [],
  };
}

export function createDesiredResource(
  manifest: JsonObject,
  application: string,
  defaultNamespace = 'default'
): DesiredResource {
  const ref = refFromManifest(manifest, defaultNamespace);
  return {
    ref,
    key: identityKey(ref),
    manifest,
    provenance: {
      repoURL: 'file:///repo',
      revision: 'sha256:0000000000000000',
      path: `${ref.kind.toLowerCase()}-${ref.name}.yaml`,
      documentIndex: 0,
    },
    application,
  };
}
