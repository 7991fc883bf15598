/**
 * Diff Engine
 * @module diff/diff-engine
 *
 * Computes the operations that converge live state to desired state.
 * Comparison is semantic: only fields present in the desired manifest are
 * managed, so fields the runtime defaults never cause an update.
 */

import { OwnershipConflictError } from '../errors/index.js';
import type { IgnoreDifference } from '../types/application.js';
import {
  DesiredResource,
  JsonObject,
  JsonValue,
  LiveResource,
  isJsonObject,
} from '../types/resource.js';
import {
  FieldChange,
  OperationAnnotation,
  OperationType,
  PlannedOperation,
} from '../types/sync.js';
import { FieldPolicy, isIgnored } from './field-policy.js';
import { prepareDesired, readLastApplied, toPointer } from './normalizer.js';

// ============================================================================
// Types
// ============================================================================

export interface DiffInput {
  application: string;
  desired: readonly DesiredResource[];
  live: ReadonlyMap<string, LiveResource>;
  ignoreDifferences?: IgnoreDifference[];
  prune: boolean;
  /** Keys whose live object may be taken over from another Application */
  transferable?: ReadonlySet<string>;
}

export interface DiffResult {
  /** Sorted by identity key */
  operations: PlannedOperation[];
  /** Desired resources whose live object belongs to another Application */
  conflicts: OwnershipConflictError[];
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Collects `set` changes for every managed field of `desired` that differs
 * from `live`
 */
export function compareManaged(
  desired: JsonValue,
  live: JsonValue | undefined,
  path: string[],
  ignored: readonly string[][],
  changes: FieldChange[]
): void {
  if (isIgnored(path, ignored)) return;

  if (isJsonObject(desired)) {
    if (!isJsonObject(live)) {
      changes.push({ op: 'set', path: toPointer(path), value: desired, previous: live });
      return;
    }
    for (const key of Object.keys(desired).sort()) {
      const value = desired[key];
      if (value === undefined) continue;
      compareManaged(value, live[key], [...path, key], ignored, changes);
    }
    return;
  }

  if (Array.isArray(desired)) {
    if (!Array.isArray(live) || live.length !== desired.length) {
      changes.push({ op: 'set', path: toPointer(path), value: desired, previous: live });
      return;
    }
    desired.forEach((item, index) => {
      compareManaged(item, live[index], [...path, String(index)], ignored, changes);
    });
    return;
  }

  if (desired !== live) {
    changes.push({ op: 'set', path: toPointer(path), value: desired, previous: live });
  }
}

/**
 * Collects `remove` changes for fields recorded as last applied, no longer
 * desired and still present live
 */
export function collectRemovals(
  lastApplied: JsonObject,
  desired: JsonObject,
  live: JsonObject,
  path: string[],
  ignored: readonly string[][],
  changes: FieldChange[]
): void {
  for (const key of Object.keys(lastApplied).sort()) {
    const fieldPath = [...path, key];
    if (isIgnored(fieldPath, ignored)) continue;

    const previous = lastApplied[key];
    const wanted = desired[key];
    const current = live[key];

    if (wanted === undefined) {
      if (current !== undefined) {
        changes.push({ op: 'remove', path: toPointer(fieldPath), previous: current });
      }
      continue;
    }

    if (isJsonObject(previous) && isJsonObject(wanted) && isJsonObject(current)) {
      collectRemovals(previous, wanted, current, fieldPath, ignored, changes);
    }
  }
}

/**
 * All changes needed to bring `live` to the prepared desired manifest
 */
export function computeChanges(
  prepared: JsonObject,
  live: JsonObject,
  ignored: readonly string[][]
): FieldChange[] {
  const changes: FieldChange[] = [];
  compareManaged(prepared, live, [], ignored, changes);

  const lastApplied = readLastApplied(live);
  if (lastApplied) {
    collectRemovals(lastApplied, prepared, live, [], ignored, changes);
  }

  return changes;
}

// ============================================================================
// Diff Engine
// ============================================================================

export class DiffEngine {
  /**
   * Plans create/update/delete/noop operations for one Application
   */
  plan(input: DiffInput): DiffResult {
    const { application, prune } = input;
    const policy = new FieldPolicy(input.ignoreDifferences);
    const operations: PlannedOperation[] = [];
    const conflicts: OwnershipConflictError[] = [];
    const desiredKeys = new Set<string>();

    for (const resource of input.desired) {
      desiredKeys.add(resource.key);
      const prepared: DesiredResource = { ...resource, manifest: prepareDesired(resource) };
      const live = input.live.get(resource.key);

      if (!live) {
        operations.push({
          type: OperationType.CREATE,
          key: resource.key,
          ref: resource.ref,
          desired: prepared,
          annotations: [],
        });
        continue;
      }

      if (live.owner !== undefined && live.owner !== application && !input.transferable?.has(resource.key)) {
        conflicts.push(new OwnershipConflictError(resource.key, live.owner, application));
        continue;
      }

      const changes = computeChanges(prepared.manifest, live.manifest, policy.ignoredPaths(resource.ref));
      const annotations: OperationAnnotation[] = live.owner !== application
        ? [OperationAnnotation.ADOPTED]
        : [];

      if (changes.length === 0) {
        operations.push({
          type: OperationType.NOOP,
          key: resource.key,
          ref: resource.ref,
          desired: prepared,
          live,
          changes: [],
          annotations,
        });
      } else {
        operations.push({
          type: OperationType.UPDATE,
          key: resource.key,
          ref: resource.ref,
          desired: prepared,
          live,
          changes,
          annotations,
        });
      }
    }

    for (const live of input.live.values()) {
      if (desiredKeys.has(live.key)) continue;
      // Never touch objects another Application (or nobody) owns
      if (live.owner !== application) continue;

      if (prune) {
        operations.push({
          type: OperationType.DELETE,
          key: live.key,
          ref: live.ref,
          live,
          annotations: [],
        });
      } else {
        operations.push({
          type: OperationType.NOOP,
          key: live.key,
          ref: live.ref,
          live,
          changes: [],
          annotations: [OperationAnnotation.WOULD_PRUNE],
        });
      }
    }

    operations.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    conflicts.sort((a, b) => (a.context.resource ?? '').localeCompare(b.context.resource ?? ''));

    return { operations, conflicts };
  }
}

/**
 * Turns every pending change into a Noop annotated `drift`, leaving the live
 * state alone
 */
export function reportDrift(operations: readonly PlannedOperation[]): PlannedOperation[] {
  return operations.map(operation => {
    switch (operation.type) {
      case OperationType.NOOP:
        return operation;
      case OperationType.CREATE:
        return {
          type: OperationType.NOOP,
          key: operation.key,
          ref: operation.ref,
          desired: operation.desired,
          changes: [],
          annotations: [...operation.annotations, OperationAnnotation.DRIFT],
        };
      case OperationType.UPDATE:
        return {
          type: OperationType.NOOP,
          key: operation.key,
          ref: operation.ref,
          desired: operation.desired,
          live: operation.live,
          changes: operation.changes,
          annotations: [...operation.annotations, OperationAnnotation.DRIFT],
        };
      case OperationType.DELETE:
        return {
          type: OperationType.NOOP,
          key: operation.key,
          ref: operation.ref,
          live: operation.live,
          changes: [],
          annotations: [...operation.annotations, OperationAnnotation.DRIFT],
        };
    }
  });
}
