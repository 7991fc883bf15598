/**
 * Field Patches
 * @module diff/patch
 *
 * Applies field changes on top of a live manifest, producing the object sent
 * with an update. Fields the runtime owns survive untouched.
 */

import type { FieldChange } from '../types/sync.js';
import { JsonObject, JsonValue, cloneJson, isJsonObject } from '../types/resource.js';
import { parsePointer } from './normalizer.js';

type Container = JsonObject | JsonValue[];

function isContainer(value: JsonValue | undefined): value is Container {
  return Array.isArray(value) || isJsonObject(value);
}

function child(container: Container, token: string): JsonValue | undefined {
  if (Array.isArray(container)) {
    return container[Number(token)];
  }
  return container[token];
}

function assign(container: Container, token: string, value: JsonValue): void {
  if (Array.isArray(container)) {
    container[Number(token)] = value;
  } else {
    container[token] = value;
  }
}

function remove(container: Container, token: string): void {
  if (Array.isArray(container)) {
    container.splice(Number(token), 1);
  } else {
    delete container[token];
  }
}

function setAtPath(root: JsonObject, path: string[], value: JsonValue): void {
  let current: Container = root;
  for (const token of path.slice(0, -1)) {
    const next = child(current, token);
    if (isContainer(next)) {
      current = next;
    } else {
      const created: JsonObject = {};
      assign(current, token, created);
      current = created;
    }
  }
  const last = path[path.length - 1];
  if (last !== undefined) {
    assign(current, last, cloneJson(value));
  }
}

function removeAtPath(root: JsonObject, path: string[]): void {
  let current: Container = root;
  for (const token of path.slice(0, -1)) {
    const next = child(current, token);
    if (!isContainer(next)) return;
    current = next;
  }
  const last = path[path.length - 1];
  if (last !== undefined) {
    remove(current, last);
  }
}

/**
 * `base` with every change applied; `base` itself is not modified
 */
export function applyChanges(base: JsonObject, changes: readonly FieldChange[]): JsonObject {
  const result = cloneJson(base);
  for (const change of changes) {
    const path = parsePointer(change.path);
    if (path.length === 0) continue;
    if (change.op === 'set' && change.value !== undefined) {
      setAtPath(result, path, change.value);
    } else if (change.op === 'remove') {
      removeAtPath(result, path);
    }
  }
  return result;
}
