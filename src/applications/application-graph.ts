/**
 * Application Graph Manager
 * @module applications/application-graph
 *
 * Holds the forest of Applications. Roots are registered from configuration
 * or the API; children are discovered in a parent's source tree. Sync policy
 * is inherited field by field down the tree.
 *
 * Events:
 * - `registered` (name, parent | null)
 * - `specChanged` (name)
 * - `removed` (names in post-order)
 * - `phaseChanged` (name, from, to)
 */

import { createHash } from 'node:crypto';
import { EventEmitter } from 'node:events';
import {
  ApplicationNotFoundError,
  BaseError,
  CyclicApplicationGraphError,
  OwnershipConflictError,
} from '../errors/index.js';
import { StructuredLogger, createModuleLogger } from '../logging/index.js';
import {
  ApplicationPhase,
  ApplicationSpec,
  ApplicationStatus,
  ROOT_DEFAULT_POLICY,
  SyncPolicy,
  SyncStatus,
} from '../types/application.js';
import { ResourceRef, stableStringify, toJsonValue } from '../types/resource.js';
import type { OperationSummary, SyncResult } from '../types/sync.js';
import { applyTransition, worstPhase } from './state-machine.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Operations computed for a manual Application, waiting for confirmation
 */
export interface PendingPlan {
  runId: string;
  revision: string;
  desiredStateKey: string;
  operations: OperationSummary[];
  createdAt: string;
}

export interface ApplicationRecord {
  readonly name: string;
  spec: ApplicationSpec;
  specHash: string;
  parent: string | null;
  children: Set<string>;
  phase: ApplicationPhase;
  syncStatus: SyncStatus;
  revision: string | null;
  lastSyncedAt: string | null;
  /** Revision plus spec hash of the last executed desired state */
  lastSyncedKey: string | null;
  message: string | null;
  ownedResources: Map<string, ResourceRef>;
  pendingPlan: PendingPlan | null;
  lastPlan: OperationSummary[];
  lastResults: SyncResult[];
  /** Registration order, used by last-writer-wins ownership */
  sequence: number;
}

export interface RegistrationResult {
  record: ApplicationRecord;
  created: boolean;
  specChanged: boolean;
}

export function specHash(spec: ApplicationSpec): string {
  const document = toJsonValue(spec) ?? null;
  return createHash('sha256').update(stableStringify(document)).digest('hex').slice(0, 16);
}

// ============================================================================
// Application Graph
// ============================================================================

export class ApplicationGraph extends EventEmitter {
  private readonly records = new Map<string, ApplicationRecord>();
  private readonly logger: StructuredLogger;
  private sequence = 0;

  constructor(options: { logger?: StructuredLogger } = {}) {
    super();
    this.logger = options.logger ?? createModuleLogger('application-graph');
  }

  // --------------------------------------------------------------------------
  // Lookup
  // --------------------------------------------------------------------------

  has(name: string): boolean {
    return this.records.has(name);
  }

  get(name: string): ApplicationRecord | undefined {
    return this.records.get(name);
  }

  require(name: string): ApplicationRecord {
    const record = this.records.get(name);
    if (!record) {
      throw new ApplicationNotFoundError(name);
    }
    return record;
  }

  names(): string[] {
    return [...this.records.keys()].sort();
  }

  roots(): string[] {
    return this.names().filter(name => this.records.get(name)?.parent === null);
  }

  /**
   * Ancestors of `name`, nearest first
   */
  ancestors(name: string): string[] {
    const result: string[] = [];
    let current = this.records.get(name)?.parent ?? null;
    while (current !== null && !result.includes(current)) {
      result.push(current);
      current = this.records.get(current)?.parent ?? null;
    }
    return result;
  }

  /**
   * `name` and every descendant, children before parents
   */
  subtree(name: string): string[] {
    const order: string[] = [];
    const visit = (current: string): void => {
      const record = this.records.get(current);
      if (!record) return;
      for (const child of [...record.children].sort()) {
        visit(child);
      }
      order.push(current);
    };
    visit(name);
    return order;
  }

  // --------------------------------------------------------------------------
  // Registration
  // --------------------------------------------------------------------------

  registerRoot(spec: ApplicationSpec): RegistrationResult {
    const existing = this.records.get(spec.name);
    if (existing && existing.parent !== null) {
      throw new OwnershipConflictError(`Application/${spec.name}`, existing.parent, 'root');
    }
    return this.upsert(spec, null);
  }

  /**
   * The error that registering `child` under `parent` would raise, if any
   */
  checkChild(parent: string, child: string): BaseError | null {
    if (child === parent) {
      return new CyclicApplicationGraphError(parent, child, [parent, child]);
    }
    const lineage = this.ancestors(parent);
    const index = lineage.indexOf(child);
    if (index >= 0) {
      const path = [child, ...lineage.slice(0, index).reverse(), parent, child];
      return new CyclicApplicationGraphError(parent, child, path);
    }
    const existing = this.records.get(child);
    if (existing && existing.parent !== parent) {
      return new OwnershipConflictError(`Application/${child}`, existing.parent ?? 'root', parent);
    }
    return null;
  }

  registerChild(parent: string, spec: ApplicationSpec): RegistrationResult {
    const parentRecord = this.require(parent);
    const error = this.checkChild(parent, spec.name);
    if (error) {
      throw error;
    }
    const result = this.upsert(spec, parent);
    parentRecord.children.add(spec.name);
    return result;
  }

  private upsert(spec: ApplicationSpec, parent: string | null): RegistrationResult {
    const hash = specHash(spec);
    const existing = this.records.get(spec.name);

    if (existing) {
      if (existing.specHash === hash) {
        return { record: existing, created: false, specChanged: false };
      }
      existing.spec = spec;
      existing.specHash = hash;
      existing.pendingPlan = null;
      if (existing.phase !== ApplicationPhase.SYNCING) {
        this.transition(spec.name, ApplicationPhase.PENDING);
      }
      this.emit('specChanged', spec.name);
      return { record: existing, created: false, specChanged: true };
    }

    this.sequence += 1;
    const record: ApplicationRecord = {
      name: spec.name,
      spec,
      specHash: hash,
      parent,
      children: new Set(),
      phase: ApplicationPhase.PENDING,
      syncStatus: SyncStatus.UNKNOWN,
      revision: null,
      lastSyncedAt: null,
      lastSyncedKey: null,
      message: null,
      ownedResources: new Map(),
      pendingPlan: null,
      lastPlan: [],
      lastResults: [],
      sequence: this.sequence,
    };
    this.records.set(spec.name, record);
    this.logger.applicationRegistered(spec.name, parent ?? undefined);
    this.emit('registered', spec.name, parent);
    return { record, created: true, specChanged: false };
  }

  /**
   * Removes `name` and its subtree; returns removed names in post-order
   */
  remove(name: string): string[] {
    const record = this.require(name);
    const removed = this.subtree(name);
    for (const member of removed) {
      this.records.delete(member);
    }
    if (record.parent !== null) {
      this.records.get(record.parent)?.children.delete(name);
    }
    this.logger.applicationRemoved(name, removed);
    this.emit('removed', removed);
    return removed;
  }

  // --------------------------------------------------------------------------
  // Policy and Phase
  // --------------------------------------------------------------------------

  /**
   * Declared fields win; the rest come from the parent's effective policy,
   * and roots fall back to manual without prune or self-heal
   */
  effectivePolicy(name: string): SyncPolicy {
    const record = this.require(name);
    const inherited = record.parent !== null && this.records.has(record.parent)
      ? this.effectivePolicy(record.parent)
      : ROOT_DEFAULT_POLICY;
    const declared = record.spec.policy;
    return {
      mode: declared.mode ?? inherited.mode,
      prune: declared.prune ?? inherited.prune,
      selfHeal: declared.selfHeal ?? inherited.selfHeal,
    };
  }

  transition(name: string, to: ApplicationPhase): void {
    const record = this.require(name);
    const from = record.phase;
    record.phase = applyTransition(name, from, to);
    if (from !== to) {
      this.logger.phaseChanged(name, from, to);
      this.emit('phaseChanged', name, from, to);
    }
  }

  aggregatedPhase(name: string): ApplicationPhase {
    const record = this.require(name);
    const phases: ApplicationPhase[] = [record.phase];
    for (const child of record.children) {
      if (this.records.has(child)) {
        phases.push(this.aggregatedPhase(child));
      }
    }
    return worstPhase(phases);
  }

  phaseCounts(): Record<ApplicationPhase, number> {
    const counts: Record<ApplicationPhase, number> = {
      [ApplicationPhase.PENDING]: 0,
      [ApplicationPhase.SYNCING]: 0,
      [ApplicationPhase.SYNCED]: 0,
      [ApplicationPhase.DEGRADED]: 0,
    };
    for (const record of this.records.values()) {
      counts[record.phase] += 1;
    }
    return counts;
  }

  // --------------------------------------------------------------------------
  // Status
  // --------------------------------------------------------------------------

  status(name: string): ApplicationStatus {
    const record = this.require(name);
    return {
      name: record.name,
      parent: record.parent,
      children: [...record.children].sort(),
      phase: record.phase,
      aggregatedPhase: this.aggregatedPhase(name),
      syncStatus: record.syncStatus,
      policy: this.effectivePolicy(name),
      source: { ...record.spec.source },
      destination: { ...record.spec.destination },
      revision: record.revision,
      lastSyncedAt: record.lastSyncedAt,
      message: record.message,
      ownedResources: record.ownedResources.size,
    };
  }

  list(): ApplicationStatus[] {
    return this.names().map(name => this.status(name));
  }
}
