/**
 * Manifest Normalization
 * @module diff/normalizer
 *
 * JSON pointer helpers and preparation of desired manifests before they are
 * compared or applied.
 */

import { ANNOTATIONS, ownershipLabels } from '../constants/index.js';
import {
  DesiredResource,
  JsonObject,
  JsonValue,
  cloneJson,
  getAnnotations,
  getMetadata,
  isJsonObject,
  stableStringify,
  toJsonValue,
} from '../types/resource.js';

// ============================================================================
// JSON Pointers
// ============================================================================

export function escapePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function unescapePointerToken(token: string): string {
  return token.replace(/~1/g, '/').replace(/~0/g, '~');
}

export function toPointer(path: readonly string[]): string {
  return path.map(token => `/${escapePointerToken(token)}`).join('');
}

export function parsePointer(pointer: string): string[] {
  if (pointer === '' || pointer === '/') return [];
  const trimmed = pointer.startsWith('/') ? pointer.slice(1) : pointer;
  return trimmed.split('/').map(unescapePointerToken);
}

/**
 * Value at `path`, or undefined when any segment is missing
 */
export function getAtPath(value: JsonValue | undefined, path: readonly string[]): JsonValue | undefined {
  let current: JsonValue | undefined = value;
  for (const token of path) {
    if (Array.isArray(current)) {
      const index = Number(token);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (isJsonObject(current)) {
      current = current[token];
    } else {
      return undefined;
    }
  }
  return current;
}

// ============================================================================
// Desired Manifest Preparation
// ============================================================================

/**
 * Copy of the desired manifest as it will be applied: namespace resolved,
 * status dropped, ownership labels and the last-applied annotation added
 */
export function prepareDesired(desired: DesiredResource): JsonObject {
  const manifest = cloneJson(desired.manifest);
  delete manifest.status;

  const metadata = getMetadata(manifest);
  if (desired.ref.namespace) {
    metadata.namespace = desired.ref.namespace;
  } else {
    delete metadata.namespace;
  }

  const labels = isJsonObject(metadata.labels) ? metadata.labels : {};
  metadata.labels = { ...labels, ...ownershipLabels(desired.application) };

  const annotations = isJsonObject(metadata.annotations) ? metadata.annotations : {};
  delete annotations[ANNOTATIONS.LAST_APPLIED];
  metadata.annotations = annotations;
  manifest.metadata = metadata;

  annotations[ANNOTATIONS.LAST_APPLIED] = stableStringify(manifest);

  return manifest;
}

/**
 * The manifest recorded in the last-applied annotation, if readable
 */
export function readLastApplied(manifest: JsonObject): JsonObject | null {
  const raw = getAnnotations(manifest)[ANNOTATIONS.LAST_APPLIED];
  if (!raw) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    const value = toJsonValue(parsed);
    return isJsonObject(value) ? value : null;
  } catch {
    return null;
  }
}
