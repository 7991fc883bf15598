/**
 * Sync Executor
 * @module sync/sync-executor
 *
 * Runs planned operations against a target runtime. Applies run tier by tier
 * in ascending order, then deletes in reverse dependency order. A failure
 * skips every transitive dependent; independent resources carry on.
 */

import {
  ApplyConflictError,
  BaseError,
  DependencyFailedError,
  HttpErrorCodes,
  OwnershipConflictError,
  RetryOptions,
  SyncCancelledError,
  getErrorMessage,
  isBaseError,
  parallelWithLimit,
  withRetry,
} from '../errors/index.js';
import { computeChanges } from '../diff/diff-engine.js';
import { FieldPolicy } from '../diff/field-policy.js';
import { applyChanges } from '../diff/patch.js';
import { StructuredLogger, createModuleLogger } from '../logging/index.js';
import type { TargetRuntime } from '../runtime/interface.js';
import type { IgnoreDifference } from '../types/application.js';
import type { LiveResource } from '../types/resource.js';
import {
  ApplyOperation,
  DeleteOperation,
  FieldChange,
  OperationType,
  PlannedOperation,
  SyncFailure,
  SyncOutcome,
  SyncResult,
} from '../types/sync.js';
import { ExecutionPlan, PlanNode, buildExecutionPlan } from './dependency-graph.js';

// ============================================================================
// Types
// ============================================================================

export interface SyncExecutorOptions {
  /** Operations in flight per tier */
  concurrency?: number;
  retry?: Partial<RetryOptions>;
  logger?: StructuredLogger;
}

export interface ExecuteRequest {
  runId: string;
  application: string;
  runtime: TargetRuntime;
  operations: readonly PlannedOperation[];
  /** Ownership conflicts found while diffing, reported as failures */
  conflicts?: readonly OwnershipConflictError[];
  ignoreDifferences?: IgnoreDifference[];
  signal?: AbortSignal;
}

export interface ExecuteResult {
  /** Sorted by identity key */
  results: SyncResult[];
  applyPlan: ExecutionPlan;
  deletePlan: ExecutionPlan;
  cancelled: boolean;
}

interface OperationOutcome {
  outcome: SyncOutcome;
  attempts: number;
}

/**
 * Error raised by an operation together with the attempts it took
 */
class AttemptedError extends Error {
  constructor(readonly error: Error, readonly attempts: number) {
    super(error.message);
    this.name = 'AttemptedError';
  }
}

interface RunContext {
  request: ExecuteRequest;
  policy: FieldPolicy;
  results: Map<string, SyncResult>;
  /** Skipped key -> key of the root failure */
  blocked: Map<string, string>;
}

// ============================================================================
// Sync Executor
// ============================================================================

export class SyncExecutor {
  private readonly concurrency: number;
  private readonly retry: Partial<RetryOptions>;
  private readonly logger: StructuredLogger;

  constructor(options: SyncExecutorOptions = {}) {
    this.concurrency = options.concurrency ?? 4;
    this.retry = options.retry ?? {};
    this.logger = options.logger ?? createModuleLogger('sync-executor');
  }

  async execute(request: ExecuteRequest): Promise<ExecuteResult> {
    const ctx: RunContext = {
      request,
      policy: new FieldPolicy(request.ignoreDifferences),
      results: new Map(),
      blocked: new Map(),
    };

    for (const conflict of request.conflicts ?? []) {
      const key = conflict.context.resource ?? '';
      ctx.results.set(key, this.conflictResult(request, key, conflict));
    }

    const applies: ApplyOperation[] = [];
    const deletes: DeleteOperation[] = [];
    for (const operation of request.operations) {
      switch (operation.type) {
        case OperationType.NOOP:
          ctx.results.set(operation.key, this.result(request, operation, SyncOutcome.UNCHANGED, 0));
          break;
        case OperationType.DELETE:
          deletes.push(operation);
          break;
        default:
          applies.push(operation);
      }
    }

    const applyPlan = buildExecutionPlan(applies.map(toApplyNode));
    const deletePlan = buildExecutionPlan(deletes.map(toDeleteNode), { reverse: true });
    this.reportDroppedEdges(request.application, applyPlan);
    this.reportDroppedEdges(request.application, deletePlan);

    await this.runPlan(ctx, applyPlan, new Map(applies.map(op => [op.key, op])));
    await this.runPlan(ctx, deletePlan, new Map(deletes.map(op => [op.key, op])));

    const results = [...ctx.results.values()].sort((a, b) =>
      a.key < b.key ? -1 : a.key > b.key ? 1 : 0
    );

    return {
      results,
      applyPlan,
      deletePlan,
      cancelled: request.signal?.aborted ?? false,
    };
  }

  // --------------------------------------------------------------------------
  // Tier scheduling
  // --------------------------------------------------------------------------

  private async runPlan(
    ctx: RunContext,
    plan: ExecutionPlan,
    operations: Map<string, ApplyOperation | DeleteOperation>
  ): Promise<void> {
    for (const { tier, keys } of plan.tiers) {
      const runnable: Array<ApplyOperation | DeleteOperation> = [];

      for (const key of keys) {
        const operation = operations.get(key);
        if (!operation) continue;
        const root = ctx.blocked.get(key);
        if (root !== undefined) {
          const error = new DependencyFailedError(key, root, { application: ctx.request.application });
          ctx.results.set(key, this.failedResult(ctx.request, operation, 0, error, root));
          this.block(ctx, plan, key, root);
        } else {
          runnable.push(operation);
        }
      }

      this.logger.debug(
        { application: ctx.request.application, tier, operations: runnable.length },
        'Running sync tier'
      );

      await parallelWithLimit(
        runnable,
        operation => this.runOperation(ctx, plan, operation),
        this.concurrency
      );
    }
  }

  private async runOperation(
    ctx: RunContext,
    plan: ExecutionPlan,
    operation: ApplyOperation | DeleteOperation
  ): Promise<void> {
    const { request } = ctx;

    if (request.signal?.aborted) {
      const error = new SyncCancelledError(undefined, {
        application: request.application,
        resource: operation.key,
      });
      ctx.results.set(operation.key, this.failedResult(request, operation, 0, error, operation.key));
      return;
    }

    try {
      const { outcome, attempts } = operation.type === OperationType.DELETE
        ? await this.deleteResource(ctx, operation)
        : await this.applyResource(ctx, operation);
      ctx.results.set(operation.key, this.result(request, operation, outcome, attempts));
    } catch (caught) {
      const attempts = caught instanceof AttemptedError ? caught.attempts : 1;
      const error = caught instanceof AttemptedError ? caught.error : toError(caught);
      this.logger.operationFailed(request.application, operation.key, error, attempts);
      ctx.results.set(operation.key, this.failedResult(request, operation, attempts, error, operation.key));
      this.block(ctx, plan, operation.key, operation.key);
    }
  }

  /**
   * Marks every direct dependent of `key` as skipped because of `root`;
   * transitive dependents are reached when their tier comes up.
   */
  private block(ctx: RunContext, plan: ExecutionPlan, key: string, root: string): void {
    for (const dependent of plan.dependents.get(key) ?? []) {
      if (!ctx.blocked.has(dependent)) {
        ctx.blocked.set(dependent, root);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Operations
  // --------------------------------------------------------------------------

  private async applyResource(ctx: RunContext, operation: ApplyOperation): Promise<OperationOutcome> {
    const { request } = ctx;
    const { runtime, application } = request;
    const prepared = operation.desired.manifest;
    const ignored = ctx.policy.ignoredPaths(operation.ref);

    let live: LiveResource | null = operation.type === OperationType.UPDATE ? operation.live : null;
    let changes: FieldChange[] = operation.type === OperationType.UPDATE ? operation.changes : [];
    let created = false;

    const refresh = async (): Promise<void> => {
      const fresh = await runtime.get(operation.ref);
      if (fresh?.owner !== undefined && fresh.owner !== application) {
        throw new OwnershipConflictError(operation.key, fresh.owner, application);
      }
      live = fresh;
      changes = fresh ? computeChanges(prepared, fresh.manifest, ignored) : [];
    };

    return this.attempt(ctx, operation.key, async attempt => {
      const current = live;
      if (current === null) {
        try {
          await runtime.create(prepared);
          created = true;
          return { outcome: SyncOutcome.CREATED, attempts: attempt };
        } catch (error) {
          if (error instanceof ApplyConflictError) await refresh();
          throw error;
        }
      }

      if (changes.length === 0) {
        return { outcome: SyncOutcome.UNCHANGED, attempts: attempt };
      }

      try {
        await runtime.update(applyChanges(current.manifest, changes), current.resourceVersion);
        return { outcome: created ? SyncOutcome.CREATED : SyncOutcome.UPDATED, attempts: attempt };
      } catch (error) {
        if (error instanceof ApplyConflictError) await refresh();
        throw error;
      }
    });
  }

  private async deleteResource(ctx: RunContext, operation: DeleteOperation): Promise<OperationOutcome> {
    const { runtime } = ctx.request;
    return this.attempt(ctx, operation.key, async attempt => {
      await runtime.delete(operation.ref);
      return { outcome: SyncOutcome.DELETED, attempts: attempt };
    });
  }

  private async attempt(
    ctx: RunContext,
    key: string,
    operation: (attempt: number) => Promise<OperationOutcome>
  ): Promise<OperationOutcome> {
    const { signal, application } = ctx.request;
    let attempts = 0;
    try {
      return await withRetry(
        async attempt => {
          attempts = attempt;
          if (attempt > 1 && signal?.aborted) {
            throw new SyncCancelledError('Sync cancelled between retries', { application, resource: key });
          }
          return operation(attempt);
        },
        {
          ...this.retry,
          signal,
          onRetry: (error, attempt, delayMs) => {
            this.logger.debug(
              { application, resource: key, attempt, delayMs, errorCode: isBaseError(error) ? error.code : undefined },
              `Retrying ${key}: ${error.message}`
            );
          },
        }
      );
    } catch (error) {
      throw new AttemptedError(toError(error), attempts);
    }
  }

  // --------------------------------------------------------------------------
  // Results
  // --------------------------------------------------------------------------

  private result(
    request: ExecuteRequest,
    operation: PlannedOperation,
    outcome: SyncOutcome,
    attempts: number,
    failure?: SyncFailure
  ): SyncResult {
    return {
      runId: request.runId,
      application: request.application,
      key: operation.key,
      kind: operation.ref.kind,
      namespace: operation.ref.namespace,
      name: operation.ref.name,
      operation: operation.type,
      outcome,
      attempts,
      timestamp: new Date().toISOString(),
      annotations: [...operation.annotations],
      ...(failure ? { failure } : {}),
    };
  }

  private failedResult(
    request: ExecuteRequest,
    operation: PlannedOperation,
    attempts: number,
    error: Error,
    rootCause: string
  ): SyncResult {
    return this.result(request, operation, SyncOutcome.FAILED, attempts, {
      code: isBaseError(error) ? error.code : HttpErrorCodes.INTERNAL_ERROR,
      message: getErrorMessage(error),
      rootCause,
    });
  }

  private conflictResult(request: ExecuteRequest, key: string, conflict: BaseError): SyncResult {
    const [, kind = '', namespace = '', name = ''] = key.split('/');
    return {
      runId: request.runId,
      application: request.application,
      key,
      kind,
      namespace,
      name,
      operation: OperationType.NOOP,
      outcome: SyncOutcome.FAILED,
      attempts: 0,
      timestamp: new Date().toISOString(),
      annotations: [],
      failure: { code: conflict.code, message: conflict.message, rootCause: key },
    };
  }

  private reportDroppedEdges(application: string, plan: ExecutionPlan): void {
    if (plan.droppedEdges.length === 0) return;
    this.logger.warn(
      { application, edges: plan.droppedEdges.map(e => `${e.from} -> ${e.to} (${e.reason})`) },
      `Dropped ${plan.droppedEdges.length} cyclic dependency edge(s)`
    );
  }
}

function toApplyNode(operation: ApplyOperation): PlanNode {
  return { key: operation.key, ref: operation.ref, manifest: operation.desired.manifest };
}

function toDeleteNode(operation: DeleteOperation): PlanNode {
  return { key: operation.key, ref: operation.ref, manifest: operation.live.manifest };
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
