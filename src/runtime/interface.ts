/**
 * Target Runtime Interface
 * @module runtime/interface
 *
 * The operations the observer and executor need from a cluster.
 */

import type { JsonObject, KindRef, LiveResource, ResourceRef } from '../types/resource.js';

export interface ListOptions {
  /** Kinds to list; every served kind when omitted */
  kinds?: KindRef[];
  /** Label equality selector */
  labels: Record<string, string>;
}

export interface WatchOptions {
  /** Kinds to watch; every served kind when omitted */
  kinds?: KindRef[];
  labels: Record<string, string>;
}

export type WatchEventType = 'ADDED' | 'MODIFIED' | 'DELETED';

export interface WatchEvent {
  type: WatchEventType;
  resource: LiveResource;
}

/**
 * A cluster the reconciler converges
 *
 * Errors: reads raise `ObservationError`; writes raise `ApplyConflictError`
 * on a stale resourceVersion, `ApplyRejectedError` when the object is refused
 * and `RuntimeUnavailableError` when the runtime cannot be reached.
 */
export interface TargetRuntime {
  readonly name: string;

  /** Returns null when the object does not exist */
  get(ref: ResourceRef): Promise<LiveResource | null>;

  list(options: ListOptions): Promise<LiveResource[]>;

  create(manifest: JsonObject): Promise<LiveResource>;

  update(manifest: JsonObject, resourceVersion: string): Promise<LiveResource>;

  /** Deleting an absent object succeeds */
  delete(ref: ResourceRef): Promise<void>;

  /** Ends when the signal aborts or the underlying stream closes */
  watch(options: WatchOptions, signal: AbortSignal): AsyncIterable<WatchEvent>;
}

export function matchesLabels(
  labels: Record<string, string>,
  selector: Record<string, string>
): boolean {
  return Object.entries(selector).every(([key, value]) => labels[key] === value);
}

export function labelSelector(selector: Record<string, string>): string {
  return Object.entries(selector)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
}
