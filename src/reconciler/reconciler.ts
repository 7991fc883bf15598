/**
 * Reconciler
 * @module reconciler/reconciler
 *
 * One reconcile cycle for one Application: load the source and observe the
 * runtime concurrently, validate declared children, diff, then either store
 * the plan for approval, report drift, or execute. Children are registered
 * from successfully applied Application objects and removed (with cascade
 * prune) once their Application object is gone.
 */

import { v4 as uuidv4 } from 'uuid';
import { APPLICATION_GROUPS } from '../constants/index.js';
import { ApplicationGraph, OwnershipRegistry } from '../applications/index.js';
import { DiffEngine, reportDrift } from '../diff/index.js';
import {
  BaseError,
  MalformedResourceError,
  RetryOptions,
  isBaseError,
  withRetry,
  wrapError,
} from '../errors/index.js';
import { StructuredLogger, createModuleLogger, metrics } from '../logging/index.js';
import { LiveSnapshot, LiveStateObserver } from '../observer/index.js';
import type { ISyncHistoryRepository } from '../repositories/interfaces.js';
import type { TargetRuntime } from '../runtime/interface.js';
import type { RuntimeRegistry } from '../runtime/registry.js';
import {
  LoadResult,
  SourceTreeLoader,
  isApplicationManifest,
  parseApplicationManifest,
} from '../source/index.js';
import { SyncExecutor } from '../sync/index.js';
import {
  ApplicationPhase,
  ApplicationSpec,
  SyncMode,
  SyncStatus,
} from '../types/application.js';
import type { DesiredResource, LiveResource, ResourceRef } from '../types/resource.js';
import {
  OperationAnnotation,
  OperationType,
  PlannedOperation,
  RunStatus,
  SyncOutcome,
  SyncResult,
  SyncRun,
  TriggerType,
  hasChanges,
  summarizeOperation,
} from '../types/sync.js';

// ============================================================================
// Types
// ============================================================================

export interface ReconcilerOptions {
  graph: ApplicationGraph;
  loader: SourceTreeLoader;
  observer: LiveStateObserver;
  executor: SyncExecutor;
  runtimes: RuntimeRegistry;
  ownership: OwnershipRegistry;
  history: ISyncHistoryRepository;
  diff?: DiffEngine;
  /** Retries for source fetches and observation within one cycle */
  retry?: Partial<RetryOptions>;
  logger?: StructuredLogger;
}

export interface ReconcileOptions {
  signal?: AbortSignal;
  /** Executes a manual Application's plan */
  approved?: boolean;
}

export interface ReconcileOutcome {
  run: SyncRun;
  /** Children registered for the first time */
  registered: string[];
  /** Children whose spec changed */
  specChanged: string[];
  /** Applications removed from the graph, post-order */
  removed: string[];
}

export interface DeleteOutcome {
  removed: string[];
  results: SyncResult[];
}

interface CycleState {
  runId: string;
  name: string;
  trigger: TriggerType;
  startedAt: Date;
  results: SyncResult[];
  operations: PlannedOperation[];
  revision: string | null;
  registered: string[];
  specChanged: string[];
  removed: string[];
}

/**
 * Revision plus spec hash; identifies the desired state a sync converged to
 */
export function desiredStateKey(revision: string, specHash: string): string {
  return `${revision}@${specHash}`;
}

// ============================================================================
// Reconciler
// ============================================================================

export class Reconciler {
  private readonly graph: ApplicationGraph;
  private readonly loader: SourceTreeLoader;
  private readonly observer: LiveStateObserver;
  private readonly executor: SyncExecutor;
  private readonly runtimes: RuntimeRegistry;
  private readonly ownership: OwnershipRegistry;
  private readonly history: ISyncHistoryRepository;
  private readonly diff: DiffEngine;
  private readonly retry: Partial<RetryOptions>;
  private readonly logger: StructuredLogger;

  constructor(options: ReconcilerOptions) {
    this.graph = options.graph;
    this.loader = options.loader;
    this.observer = options.observer;
    this.executor = options.executor;
    this.runtimes = options.runtimes;
    this.ownership = options.ownership;
    this.history = options.history;
    this.diff = options.diff ?? new DiffEngine();
    this.retry = options.retry ?? {};
    this.logger = options.logger ?? createModuleLogger('reconciler');
  }

  /**
   * Runs one cycle. Failures are recorded on the run and the Application;
   * only an unknown Application name throws.
   */
  async reconcile(
    name: string,
    trigger: TriggerType,
    options: ReconcileOptions = {}
  ): Promise<ReconcileOutcome> {
    const record = this.graph.require(name);
    const state: CycleState = {
      runId: uuidv4(),
      name,
      trigger,
      startedAt: new Date(),
      results: [],
      operations: [],
      revision: null,
      registered: [],
      specChanged: [],
      removed: [],
    };

    this.logger.reconcileStarted(name, state.runId, trigger);
    const previousPhase = record.phase;
    this.graph.transition(name, ApplicationPhase.SYNCING);

    let status: RunStatus;
    let cycleError: BaseError | undefined;
    try {
      status = await this.runCycle(state, record.spec, record.specHash, previousPhase, options);
    } catch (error) {
      cycleError = isBaseError(error) ? error : wrapError(error, 'Reconcile cycle failed');
      status = RunStatus.ERRORED;
      this.logger.reconcileFailed(name, state.runId, cycleError);
      this.finishErrored(name, cycleError);
    }

    return this.complete(state, status, cycleError);
  }

  // --------------------------------------------------------------------------
  // Cycle
  // --------------------------------------------------------------------------

  private async runCycle(
    state: CycleState,
    spec: ApplicationSpec,
    specHash: string,
    previousPhase: ApplicationPhase,
    options: ReconcileOptions
  ): Promise<RunStatus> {
    const { name } = state;
    const { signal } = options;
    const record = this.graph.require(name);
    const policy = this.graph.effectivePolicy(name);
    const runtime = this.runtimes.resolve(spec.destination);

    // Load and observe have no ordering dependency; the diff joins them
    const [loaded, owned] = await Promise.all([
      this.withCycleRetry(() => this.loader.load(spec), signal),
      this.withCycleRetry(
        () => this.observer.observe({ application: name, runtime, desired: [] }),
        signal
      ),
    ]);
    state.revision = loaded.revision;

    const desiredRefs = loaded.resources.map(resource => resource.ref);
    const snapshot = await this.withCycleRetry(
      () => this.observer.extend(owned, { application: name, runtime, kinds: desiredRefs, desired: desiredRefs }),
      signal
    );

    const live = new Map(snapshot.resources);
    const desired = this.validate(state, loaded, live);
    const prune = policy.prune && loaded.errors.length === 0;
    if (policy.prune && !prune) {
      this.logger.warn(
        { application: name, errors: loaded.errors.length },
        'Prune suspended: source contains malformed documents'
      );
    }

    const claims = this.ownership.claim(name, desired.map(resource => resource.key));
    const conflicted = new Set(claims.conflicts.map(conflict => conflict.context.resource ?? ''));
    for (const conflict of claims.conflicts) {
      const key = conflict.context.resource ?? '';
      state.results.push(this.failureResult(state, key, conflict, refOf(loaded, key)));
      live.delete(key);
    }

    const plan = this.diff.plan({
      application: name,
      desired: desired.filter(resource => !conflicted.has(resource.key)),
      live,
      ignoreDifferences: spec.ignoreDifferences,
      prune,
      transferable: new Set(claims.transferred.map(transfer => transfer.key)),
    });

    const stateKey = desiredStateKey(loaded.revision, specHash);
    const changed = hasChanges(plan.operations);
    const forced = state.trigger === TriggerType.MANUAL || state.trigger === TriggerType.CONFIRM;

    // Manual mode: changes wait for confirmation
    if (policy.mode === SyncMode.MANUAL && !options.approved && changed) {
      state.operations = plan.operations;
      return this.awaitApproval(state, previousPhase, stateKey, loaded);
    }

    // Automated without self-heal: drift on an already-synced state is reported only
    const driftOnly = policy.mode === SyncMode.AUTOMATED
      && !policy.selfHeal
      && !forced
      && changed
      && record.lastSyncedKey === stateKey;

    state.operations = driftOnly ? reportDrift(plan.operations) : plan.operations;
    const execution = await this.executor.execute({
      runId: state.runId,
      application: name,
      runtime,
      operations: state.operations,
      conflicts: plan.conflicts,
      ignoreDifferences: spec.ignoreDifferences,
      signal,
    });
    state.results.push(...execution.results);

    if (driftOnly) {
      return this.reportDriftOnly(state);
    }

    await this.updateChildren(state, spec, loaded, snapshot, execution.results, signal);
    this.updateOwned(name, desired, snapshot, execution.results);

    const failed = state.results.some(result => result.outcome === SyncOutcome.FAILED);
    const current = this.graph.get(name);
    if (current) {
      current.revision = loaded.revision;
      current.lastPlan = plan.operations.map(summarizeOperation);
      current.lastResults = state.results;
      current.pendingPlan = null;
    }

    if (execution.cancelled) {
      this.finish(name, ApplicationPhase.PENDING, SyncStatus.OUT_OF_SYNC, 'Sync cancelled');
      return RunStatus.CANCELLED;
    }

    if (current) {
      current.lastSyncedKey = stateKey;
      current.lastSyncedAt = new Date().toISOString();
    }
    metrics.setDrift(name, 0);

    if (failed) {
      const count = state.results.filter(result => result.outcome === SyncOutcome.FAILED).length;
      this.finish(name, ApplicationPhase.DEGRADED, SyncStatus.OUT_OF_SYNC, `${count} resource(s) failed`);
      return RunStatus.FAILED;
    }

    this.finish(name, ApplicationPhase.SYNCED, SyncStatus.SYNCED, null);
    return RunStatus.SUCCEEDED;
  }

  private async withCycleRetry<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withRetry(() => operation(), { ...this.retry, signal });
  }

  /**
   * Drops children that would close a cycle or that belong to another
   * parent, and reports malformed documents. Returns the desired set to diff.
   */
  private validate(
    state: CycleState,
    loaded: LoadResult,
    live: Map<string, LiveResource>
  ): DesiredResource[] {
    for (const error of loaded.errors) {
      const key = error instanceof MalformedResourceError
        ? `${error.file}#${error.documentIndex}`
        : error.context.resource ?? error.code;
      state.results.push(this.failureResult(state, key, error));
    }

    const rejected = new Set<string>();
    for (const child of loaded.children) {
      const error = this.graph.checkChild(state.name, child.spec.name);
      if (error) {
        rejected.add(child.key);
        live.delete(child.key);
        this.logger.warn(
          { application: state.name, child: child.spec.name, errorCode: error.code },
          error.message
        );
        state.results.push(this.failureResult(state, child.key, error, refOf(loaded, child.key)));
      }
    }

    return loaded.resources.filter(resource => !rejected.has(resource.key));
  }

  private awaitApproval(
    state: CycleState,
    previousPhase: ApplicationPhase,
    stateKey: string,
    loaded: LoadResult
  ): RunStatus {
    const record = this.graph.require(state.name);
    record.revision = loaded.revision;
    record.lastPlan = state.operations.map(summarizeOperation);
    record.pendingPlan = {
      runId: state.runId,
      revision: loaded.revision,
      desiredStateKey: stateKey,
      operations: record.lastPlan,
      createdAt: new Date().toISOString(),
    };
    const phase = previousPhase === ApplicationPhase.SYNCING ? ApplicationPhase.PENDING : previousPhase;
    this.finish(state.name, phase, SyncStatus.OUT_OF_SYNC, 'Plan awaiting approval');
    return RunStatus.AWAITING_APPROVAL;
  }

  private reportDriftOnly(state: CycleState): RunStatus {
    const drifted = state.operations
      .filter(operation => operation.annotations.includes(OperationAnnotation.DRIFT))
      .map(operation => operation.key);
    this.logger.driftDetected(state.name, drifted);
    metrics.setDrift(state.name, drifted.length);

    const record = this.graph.require(state.name);
    record.lastPlan = state.operations.map(summarizeOperation);
    record.lastResults = state.results;
    const failed = state.results.some(result => result.outcome === SyncOutcome.FAILED);
    this.finish(
      state.name,
      failed ? ApplicationPhase.DEGRADED : ApplicationPhase.SYNCED,
      SyncStatus.OUT_OF_SYNC,
      `Drift detected in ${drifted.length} resource(s)`
    );
    return RunStatus.DRIFT_REPORTED;
  }

  // --------------------------------------------------------------------------
  // Children and ownership
  // --------------------------------------------------------------------------

  private async updateChildren(
    state: CycleState,
    spec: ApplicationSpec,
    loaded: LoadResult,
    snapshot: LiveSnapshot,
    results: SyncResult[],
    signal?: AbortSignal
  ): Promise<void> {
    const outcomes = new Map(results.map(result => [result.key, result.outcome]));
    const declared = new Set<string>();

    for (const child of loaded.children) {
      declared.add(child.spec.name);
      const outcome = outcomes.get(child.key);
      if (outcome === undefined || outcome === SyncOutcome.FAILED) continue;
      try {
        const registration = this.graph.registerChild(state.name, child.spec);
        if (registration.created) state.registered.push(child.spec.name);
        if (registration.specChanged) state.specChanged.push(child.spec.name);
      } catch (error) {
        const wrapped = isBaseError(error) ? error : wrapError(error);
        state.results.push(this.failureResult(state, child.key, wrapped, refOf(loaded, child.key)));
      }
    }

    const liveChildren = new Map<string, LiveResource>();
    for (const live of snapshot.resources.values()) {
      if (live.ref.kind === 'Application' && APPLICATION_GROUPS.has(live.ref.group) && live.owner === state.name) {
        liveChildren.set(live.ref.name, live);
      }
    }

    const record = this.graph.get(state.name);
    for (const child of [...(record?.children ?? [])].sort()) {
      if (declared.has(child)) continue;
      const live = liveChildren.get(child);
      // With prune off the Application object survives, and so does the child
      if (live !== undefined && outcomes.get(live.key) !== SyncOutcome.DELETED) continue;

      const cascade = this.graph.effectivePolicy(child).prune;
      const outcome = await this.removeApplication(child, cascade, state.runId, signal);
      state.removed.push(...outcome.removed);
      state.results.push(...outcome.results);
    }

    // Children applied before this process started were never registered
    for (const [child, live] of liveChildren) {
      if (declared.has(child) || this.graph.has(child)) continue;
      if (outcomes.get(live.key) !== SyncOutcome.DELETED) continue;
      const childSpec = this.unregisteredSpec(live, spec.source.repoURL);
      if (!childSpec) continue;

      const cascade = childSpec.policy.prune ?? this.graph.effectivePolicy(state.name).prune;
      const outcome: DeleteOutcome = cascade
        ? await this.pruneOwned(childSpec, state.runId, signal)
        : { removed: [], results: [] };
      this.ownership.releaseAll(child);
      state.removed.push(...outcome.removed, child);
      state.results.push(...outcome.results);
    }
  }

  /**
   * Owned identities after a sync: everything applied or left in place,
   * minus what was deleted
   */
  private updateOwned(
    name: string,
    desired: DesiredResource[],
    snapshot: LiveSnapshot,
    results: SyncResult[]
  ): void {
    const record = this.graph.get(name);
    if (!record) return;

    const refs = new Map<string, ResourceRef>();
    for (const live of snapshot.resources.values()) {
      if (live.owner === name) refs.set(live.key, live.ref);
    }
    for (const resource of desired) {
      refs.set(resource.key, resource.ref);
    }

    const owned = new Map<string, ResourceRef>();
    for (const result of results) {
      if (result.application !== name) continue;
      const ref = refs.get(result.key);
      if (!ref || result.outcome === SyncOutcome.DELETED) continue;
      const wasOwned = snapshot.resources.get(result.key)?.owner === name;
      if (result.outcome === SyncOutcome.FAILED && !wasOwned) continue;
      owned.set(result.key, ref);
    }
    record.ownedResources = owned;
  }

  // --------------------------------------------------------------------------
  // Deletion
  // --------------------------------------------------------------------------

  /**
   * Removes an Application and its subtree. With `cascade`, every removed
   * Application's owned resources are deleted first, leaves before parents.
   */
  async removeApplication(
    name: string,
    cascade: boolean,
    runId: string = uuidv4(),
    signal?: AbortSignal
  ): Promise<DeleteOutcome> {
    this.graph.require(name);
    const results: SyncResult[] = [];
    const unregistered: string[] = [];

    if (cascade) {
      for (const member of this.graph.subtree(name)) {
        const outcome = await this.pruneOwned(this.graph.require(member).spec, runId, signal);
        unregistered.push(...outcome.removed);
        results.push(...outcome.results);
      }
    }

    const removed = this.graph.remove(name);
    for (const member of removed) {
      this.ownership.releaseAll(member);
      metrics.setDrift(member, 0);
    }
    metrics.setApplicationPhases(this.graph.phaseCounts());
    return { removed: [...unregistered, ...removed], results };
  }

  /**
   * Deletes every object labelled as owned by `spec.name`, listed across all
   * kinds. Deleted Application objects this process never registered are
   * cascaded the same way; their names come back in `removed`, post-order.
   */
  private async pruneOwned(spec: ApplicationSpec, runId: string, signal?: AbortSignal): Promise<DeleteOutcome> {
    const { name } = spec;
    let runtime: TargetRuntime;
    try {
      runtime = this.runtimes.resolve(spec.destination);
    } catch (error) {
      const wrapped = isBaseError(error) ? error : wrapError(error);
      this.logger.warn({ application: name, errorCode: wrapped.code }, `Cascade prune skipped: ${wrapped.message}`);
      return { removed: [], results: [] };
    }

    const snapshot = await this.withCycleRetry(
      () => this.observer.observe({ application: name, runtime, desired: [] }),
      signal
    );
    const plan = this.diff.plan({ application: name, desired: [], live: snapshot.resources, prune: true });
    const execution = await this.executor.execute({
      runId,
      application: name,
      runtime,
      operations: plan.operations,
      signal,
    });

    const removed: string[] = [];
    const results = [...execution.results];
    for (const result of execution.results) {
      const live = snapshot.resources.get(result.key);
      if (!live || result.outcome !== SyncOutcome.DELETED) continue;
      if (!isApplicationManifest(live.manifest) || this.graph.has(live.ref.name)) continue;
      const childSpec = this.unregisteredSpec(live, spec.source.repoURL);
      if (!childSpec) continue;

      const nested = await this.pruneOwned(childSpec, runId, signal);
      this.ownership.releaseAll(childSpec.name);
      removed.push(...nested.removed, childSpec.name);
      results.push(...nested.results);
    }

    const deleted = execution.results.filter(result => result.outcome === SyncOutcome.DELETED).length;
    metrics.recordSyncResult(name, SyncOutcome.DELETED, deleted);
    this.logger.info({ application: name, deleted }, `Cascade pruned ${deleted} resource(s) of ${name}`);
    return { removed, results };
  }

  /**
   * Spec of a live child Application object, or null when it cannot be read
   */
  private unregisteredSpec(live: LiveResource, defaultRepoURL: string): ApplicationSpec | null {
    try {
      return parseApplicationManifest(live.manifest, { defaultRepoURL });
    } catch (error) {
      const wrapped = isBaseError(error) ? error : wrapError(error);
      this.logger.warn(
        { resource: live.key, errorCode: wrapped.code },
        `Cascade prune skipped for ${live.key}: ${wrapped.message}`
      );
      return null;
    }
  }

  // --------------------------------------------------------------------------
  // Results and status
  // --------------------------------------------------------------------------

  private failureResult(state: CycleState, key: string, error: BaseError, ref?: ResourceRef): SyncResult {
    return {
      runId: state.runId,
      application: state.name,
      key,
      kind: ref?.kind ?? '',
      namespace: ref?.namespace ?? '',
      name: ref?.name ?? '',
      operation: OperationType.NOOP,
      outcome: SyncOutcome.FAILED,
      attempts: 0,
      timestamp: new Date().toISOString(),
      annotations: [],
      failure: { code: error.code, message: error.message, rootCause: key },
    };
  }

  private finish(
    name: string,
    phase: ApplicationPhase,
    syncStatus: SyncStatus,
    message: string | null
  ): void {
    const record = this.graph.get(name);
    if (!record) return;
    record.syncStatus = syncStatus;
    record.message = message;
    if (record.phase !== phase) {
      this.graph.transition(name, phase);
    }
  }

  private finishErrored(name: string, error: BaseError): void {
    const record = this.graph.get(name);
    if (!record) return;
    record.syncStatus = SyncStatus.UNKNOWN;
    record.message = error.message;
    if (record.phase === ApplicationPhase.SYNCING) {
      this.graph.transition(name, ApplicationPhase.DEGRADED);
    }
  }

  private async complete(
    state: CycleState,
    status: RunStatus,
    cycleError?: BaseError
  ): Promise<ReconcileOutcome> {
    const finishedAt = new Date();
    const run: SyncRun = {
      id: state.runId,
      application: state.name,
      trigger: state.trigger,
      revision: state.revision,
      status,
      operations: state.operations.map(summarizeOperation),
      results: state.results,
      startedAt: state.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      ...(cycleError ? { error: cycleError.toJSON() } : {}),
    };

    try {
      await this.history.record(run);
    } catch (error) {
      this.logger.error({ err: error, application: state.name, runId: state.runId }, 'Failed to record sync run');
    }

    const durationMs = finishedAt.getTime() - state.startedAt.getTime();
    const counts = countOutcomes(state.results);
    for (const [outcome, count] of Object.entries(counts)) {
      metrics.recordSyncResult(state.name, outcome, count);
    }
    metrics.recordReconcile(state.name, status, state.trigger, durationMs / 1000);
    metrics.setApplicationPhases(this.graph.phaseCounts());
    this.logger.reconcileCompleted(state.name, state.runId, status, durationMs, counts);

    return {
      run,
      registered: state.registered,
      specChanged: state.specChanged,
      removed: state.removed,
    };
  }
}

function countOutcomes(results: readonly SyncResult[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const result of results) {
    counts[result.outcome] = (counts[result.outcome] ?? 0) + 1;
  }
  return counts;
}

function refOf(loaded: LoadResult, key: string): ResourceRef | undefined {
  return loaded.resources.find(resource => resource.key === key)?.ref;
}
