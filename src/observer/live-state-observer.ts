/**
 * Live State Observer
 * @module observer/live-state-observer
 *
 * Builds a fresh snapshot of the objects an Application owns, plus any
 * desired objects that exist in the runtime without its labels. Owned
 * objects are found by ownership labels across every kind the runtime
 * serves, so nothing depends on what earlier cycles remembered.
 */

import { ownershipLabels } from '../constants/index.js';
import {
  ObservationError,
  getErrorMessage,
  isBaseError,
  parallelWithLimit,
} from '../errors/index.js';
import { createModuleLogger, StructuredLogger } from '../logging/logger.js';
import type { TargetRuntime } from '../runtime/interface.js';
import { KindRef, LiveResource, ResourceRef, identityKey, kindId } from '../types/resource.js';

export interface LiveSnapshot {
  application: string;
  resources: Map<string, LiveResource>;
  /** Kinds already listed by label */
  kinds: KindRef[];
  /** Every kind has been listed by label */
  complete: boolean;
  observedAt: Date;
}

export interface ObserveRequest {
  application: string;
  runtime: TargetRuntime;
  /** Kinds to list by label; every kind when omitted */
  kinds?: KindRef[];
  /** Desired objects, read individually when the labelled listing misses them */
  desired: ResourceRef[];
}

export interface LiveStateObserverOptions {
  concurrency?: number;
  logger?: StructuredLogger;
}

function toObservationError(error: unknown, message: string): ObservationError {
  if (error instanceof ObservationError) return error;
  return new ObservationError(`${message}: ${getErrorMessage(error)}`, {
    cause: error instanceof Error ? error : undefined,
    details: isBaseError(error) ? { code: error.code } : undefined,
  });
}

/**
 * Unique kinds, keyed by apiVersion and kind
 */
export function uniqueKinds(refs: Iterable<KindRef>): KindRef[] {
  const kinds = new Map<string, KindRef>();
  for (const ref of refs) {
    kinds.set(kindId(ref), { apiVersion: ref.apiVersion, kind: ref.kind });
  }
  return [...kinds.values()].sort((a, b) => kindId(a).localeCompare(kindId(b)));
}

export class LiveStateObserver {
  private readonly concurrency: number;
  private readonly logger: StructuredLogger;

  constructor(options: LiveStateObserverOptions = {}) {
    this.concurrency = options.concurrency ?? 8;
    this.logger = options.logger ?? createModuleLogger('observer');
  }

  /**
   * @throws ObservationError when the runtime cannot be listed or read
   */
  async observe(request: ObserveRequest): Promise<LiveSnapshot> {
    const empty: LiveSnapshot = {
      application: request.application,
      resources: new Map(),
      kinds: [],
      complete: false,
      observedAt: new Date(),
    };
    return this.extend(empty, request);
  }

  /**
   * Lists kinds the snapshot has not covered yet and reads desired objects
   * still missing from it. A complete snapshot is never listed again. The
   * input snapshot is left unchanged.
   *
   * @throws ObservationError when the runtime cannot be listed or read
   */
  async extend(snapshot: LiveSnapshot, request: ObserveRequest): Promise<LiveSnapshot> {
    const { application, runtime } = request;
    const startTime = Date.now();
    const resources = new Map(snapshot.resources);

    const listAll = !snapshot.complete && request.kinds === undefined;
    const listedKinds = new Set(snapshot.kinds.map(kindId));
    const kinds = snapshot.complete
      ? []
      : uniqueKinds(request.kinds ?? []).filter(kind => !listedKinds.has(kindId(kind)));

    let listed: LiveResource[] = [];
    if (listAll || kinds.length > 0) {
      try {
        listed = await runtime.list({
          kinds: listAll ? undefined : kinds,
          labels: ownershipLabels(application),
        });
      } catch (error) {
        throw toObservationError(error, `Failed to list live state of ${application}`);
      }
    }

    for (const live of listed) {
      resources.set(live.key, live);
    }

    const missing = request.desired.filter(ref => !resources.has(identityKey(ref)));

    const { results, errors } = await parallelWithLimit(
      missing,
      ref => runtime.get(ref),
      this.concurrency
    );

    const firstError = errors[0];
    if (firstError) {
      throw toObservationError(firstError.error, `Failed to read live state of ${application}`);
    }

    for (const live of results) {
      if (live) {
        resources.set(live.key, live);
      }
    }

    const observedAt = new Date();
    this.logger.debug(
      {
        application,
        kinds: listAll ? 'all' : kinds.length,
        labelled: listed.length,
        readIndividually: missing.length,
        durationMs: observedAt.getTime() - startTime,
      },
      'Live state observed'
    );

    return {
      application,
      resources,
      kinds: uniqueKinds([...snapshot.kinds, ...kinds]),
      complete: snapshot.complete || listAll,
      observedAt,
    };
  }
}
