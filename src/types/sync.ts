/**
 * Sync Type Definitions
 * @module types/sync
 *
 * Planned operations produced by the diff engine, per-resource sync results
 * and sync run records.
 */

import type { SerializedError } from '../errors/base.js';
import type { DesiredResource, JsonValue, LiveResource, ResourceRef } from './resource.js';

// ============================================================================
// Planned Operations
// ============================================================================

export const OperationType = {
  CREATE: 'create',
  UPDATE: 'update',
  DELETE: 'delete',
  NOOP: 'noop',
} as const;

export type OperationType = typeof OperationType[keyof typeof OperationType];

export const OperationAnnotation = {
  /** Live object no longer declared, kept because prune is off */
  WOULD_PRUNE: 'would-prune',
  /** Live object differs but self-heal is off */
  DRIFT: 'drift',
  /** Unlabelled pre-existing object taken over */
  ADOPTED: 'adopted',
} as const;

export type OperationAnnotation = typeof OperationAnnotation[keyof typeof OperationAnnotation];

/**
 * One field-level difference, addressed by JSON pointer
 */
export interface FieldChange {
  op: 'set' | 'remove';
  path: string;
  value?: JsonValue;
  previous?: JsonValue;
}

interface OperationBase {
  key: string;
  ref: ResourceRef;
  annotations: OperationAnnotation[];
}

export interface CreateOperation extends OperationBase {
  type: typeof OperationType.CREATE;
  desired: DesiredResource;
}

export interface UpdateOperation extends OperationBase {
  type: typeof OperationType.UPDATE;
  desired: DesiredResource;
  live: LiveResource;
  changes: FieldChange[];
}

export interface DeleteOperation extends OperationBase {
  type: typeof OperationType.DELETE;
  live: LiveResource;
}

export interface NoopOperation extends OperationBase {
  type: typeof OperationType.NOOP;
  desired?: DesiredResource;
  live?: LiveResource;
  /** Differences left in place (drift reporting) */
  changes: FieldChange[];
}

export type PlannedOperation =
  | CreateOperation
  | UpdateOperation
  | DeleteOperation
  | NoopOperation;

export type ApplyOperation = CreateOperation | UpdateOperation;

/**
 * Manifest-free view of an operation, kept with run history
 */
export interface OperationSummary {
  type: OperationType;
  key: string;
  kind: string;
  namespace: string;
  name: string;
  annotations: OperationAnnotation[];
  changes: FieldChange[];
}

/**
 * Secret payloads never leave the process through summaries
 */
function summarizeChanges(kind: string, changes: readonly FieldChange[]): FieldChange[] {
  if (kind !== 'Secret') return [...changes];
  return changes.map(change => ({ op: change.op, path: change.path }));
}

export function summarizeOperation(operation: PlannedOperation): OperationSummary {
  return {
    type: operation.type,
    key: operation.key,
    kind: operation.ref.kind,
    namespace: operation.ref.namespace,
    name: operation.ref.name,
    annotations: [...operation.annotations],
    changes: operation.type === OperationType.UPDATE || operation.type === OperationType.NOOP
      ? summarizeChanges(operation.ref.kind, operation.changes)
      : [],
  };
}

export function hasChanges(operations: readonly PlannedOperation[]): boolean {
  return operations.some(op => op.type !== OperationType.NOOP);
}

// ============================================================================
// Sync Results
// ============================================================================

export const SyncOutcome = {
  CREATED: 'Created',
  UPDATED: 'Updated',
  DELETED: 'Deleted',
  UNCHANGED: 'Unchanged',
  FAILED: 'Failed',
} as const;

export type SyncOutcome = typeof SyncOutcome[keyof typeof SyncOutcome];

export interface SyncFailure {
  code: string;
  message: string;
  /** Key of the first failure; equals the result's own key for root failures */
  rootCause: string;
}

export interface SyncResult {
  runId: string;
  application: string;
  key: string;
  kind: string;
  namespace: string;
  name: string;
  operation: OperationType;
  outcome: SyncOutcome;
  attempts: number;
  timestamp: string;
  annotations: OperationAnnotation[];
  failure?: SyncFailure;
}

// ============================================================================
// Sync Runs
// ============================================================================

export const RunStatus = {
  SUCCEEDED: 'Succeeded',
  FAILED: 'Failed',
  CANCELLED: 'Cancelled',
  AWAITING_APPROVAL: 'AwaitingApproval',
  DRIFT_REPORTED: 'DriftReported',
  ERRORED: 'Errored',
} as const;

export type RunStatus = typeof RunStatus[keyof typeof RunStatus];

export const TriggerType = {
  POLL: 'poll',
  WEBHOOK: 'webhook',
  MANUAL: 'manual',
  CONFIRM: 'confirm',
  SELF_HEAL: 'self-heal',
  REGISTER: 'register',
  RETRY: 'retry',
} as const;

export type TriggerType = typeof TriggerType[keyof typeof TriggerType];

/**
 * Record of one reconcile cycle for one Application
 */
export interface SyncRun {
  id: string;
  application: string;
  trigger: TriggerType;
  revision: string | null;
  status: RunStatus;
  operations: OperationSummary[];
  results: SyncResult[];
  startedAt: string;
  finishedAt: string;
  error?: SerializedError;
}
