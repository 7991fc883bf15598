/**
 * Application Manifest Parser
 * @module source/application-parser
 *
 * Reads `Application` manifests (driftguard.io and argoproj.io groups) into
 * ApplicationSpecs. Sync policy fields are recorded only when declared, so
 * undeclared fields can inherit from the parent.
 */

import { APPLICATION, APPLICATION_GROUPS } from '../constants/index.js';
import { InvalidApplicationError } from '../errors/index.js';
import {
  ApplicationSpec,
  DeclaredSyncPolicy,
  Destination,
  IgnoreDifference,
  SourceLocator,
  SyncMode,
} from '../types/application.js';
import {
  JsonObject,
  JsonValue,
  getMetadata,
  groupOf,
  isJsonObject,
  readString,
} from '../types/resource.js';

export interface ApplicationParseContext {
  /** Used when the manifest omits `spec.source.repoURL` */
  defaultRepoURL?: string;
}

export function isApplicationManifest(manifest: JsonObject): boolean {
  const apiVersion = readString(manifest.apiVersion) ?? '';
  return manifest.kind === APPLICATION.KIND && APPLICATION_GROUPS.has(groupOf(apiVersion));
}

function readBoolean(value: JsonValue | undefined): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function parseSource(spec: JsonObject, name: string, context: ApplicationParseContext): SourceLocator {
  const source = spec.source;
  if (!isJsonObject(source)) {
    throw new InvalidApplicationError(`Application '${name}' has no spec.source`, { application: name });
  }

  const repoURL = readString(source.repoURL) ?? context.defaultRepoURL;
  if (!repoURL) {
    throw new InvalidApplicationError(`Application '${name}' has no spec.source.repoURL`, {
      application: name,
    });
  }

  const directory = source.directory;
  const recurse = (isJsonObject(directory) ? readBoolean(directory.recurse) : undefined)
    ?? readBoolean(source.recurse)
    ?? false;

  return {
    repoURL,
    revision: readString(source.targetRevision) ?? readString(source.revision) ?? APPLICATION.DEFAULT_REVISION,
    path: readString(source.path) ?? '.',
    recurse,
  };
}

function parseDestination(spec: JsonObject): Destination {
  const destination = isJsonObject(spec.destination) ? spec.destination : {};
  return {
    server: readString(destination.server),
    name: readString(destination.name),
    namespace: readString(destination.namespace) || APPLICATION.DEFAULT_NAMESPACE,
  };
}

/**
 * `syncPolicy` absent: everything inherits. Present without `automated`:
 * manual is declared. `automated.prune` / `automated.selfHeal` are declared
 * only when they are booleans.
 */
export function parseSyncPolicy(spec: JsonObject): DeclaredSyncPolicy {
  const syncPolicy = spec.syncPolicy;
  if (!isJsonObject(syncPolicy)) {
    return {};
  }

  const automated = syncPolicy.automated;
  if (!isJsonObject(automated)) {
    return { mode: SyncMode.MANUAL };
  }

  const policy: DeclaredSyncPolicy = { mode: SyncMode.AUTOMATED };
  const prune = readBoolean(automated.prune);
  const selfHeal = readBoolean(automated.selfHeal);
  if (prune !== undefined) policy.prune = prune;
  if (selfHeal !== undefined) policy.selfHeal = selfHeal;
  return policy;
}

function parseIgnoreDifferences(spec: JsonObject, name: string): IgnoreDifference[] {
  const raw = spec.ignoreDifferences;
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) {
    throw new InvalidApplicationError(`Application '${name}': ignoreDifferences must be a list`, {
      application: name,
    });
  }

  return raw.map((entry, index) => {
    if (!isJsonObject(entry) || typeof entry.kind !== 'string') {
      throw new InvalidApplicationError(
        `Application '${name}': ignoreDifferences[${index}] requires kind`,
        { application: name }
      );
    }
    const pointers = Array.isArray(entry.jsonPointers)
      ? entry.jsonPointers.filter((p): p is string => typeof p === 'string')
      : [];
    return {
      group: readString(entry.group),
      kind: entry.kind,
      name: readString(entry.name),
      namespace: readString(entry.namespace),
      jsonPointers: pointers,
    };
  });
}

/**
 * Parses an Application manifest
 *
 * @throws InvalidApplicationError when required fields are missing
 */
export function parseApplicationManifest(
  manifest: JsonObject,
  context: ApplicationParseContext = {}
): ApplicationSpec {
  const name = readString(getMetadata(manifest).name);
  if (!name) {
    throw new InvalidApplicationError('Application manifest has no metadata.name');
  }

  const spec = manifest.spec;
  if (!isJsonObject(spec)) {
    throw new InvalidApplicationError(`Application '${name}' has no spec`, { application: name });
  }

  return {
    name,
    source: parseSource(spec, name, context),
    destination: parseDestination(spec),
    policy: parseSyncPolicy(spec),
    ignoreDifferences: parseIgnoreDifferences(spec, name),
  };
}
