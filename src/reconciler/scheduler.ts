/**
 * Reconciliation Scheduler
 * @module reconciler/scheduler
 *
 * Decides when each Application reconciles. Every Application has its own
 * poll timer and a single-slot queue: while a cycle runs, further triggers
 * collapse into one follow-up cycle. Distinct Applications run concurrently.
 * A spec change cancels the in-flight cycle of that Application.
 */

import { ownershipLabels } from '../constants/index.js';
import type { ApplicationGraph } from '../applications/application-graph.js';
import {
  NoPendingPlanError,
  computeBackoffDelay,
  getErrorMessage,
  sleep,
} from '../errors/index.js';
import { StructuredLogger, createModuleLogger } from '../logging/index.js';
import { uniqueKinds } from '../observer/live-state-observer.js';
import type { RuntimeRegistry } from '../runtime/registry.js';
import { SyncMode } from '../types/application.js';
import type { KindRef } from '../types/resource.js';
import { RunStatus, TriggerType } from '../types/sync.js';
import type { Reconciler } from './reconciler.js';

// ============================================================================
// Types
// ============================================================================

export interface SchedulerOptions {
  graph: ApplicationGraph;
  reconciler: Reconciler;
  runtimes: RuntimeRegistry;
  pollIntervalMs: number;
  /** Backoff after errored cycles, capped at the poll interval */
  retry?: { delayMs?: number; backoffMultiplier?: number };
  watch?: { enabled?: boolean; restartDelayMs?: number };
  logger?: StructuredLogger;
}

interface QueuedTrigger {
  trigger: TriggerType;
  approved: boolean;
  waiters: Array<() => void>;
}

interface Schedule {
  name: string;
  timer: NodeJS.Timeout | null;
  running: Promise<void> | null;
  controller: AbortController | null;
  queued: QueuedTrigger | null;
  /** Consecutive errored cycles */
  failures: number;
  /** `kinds` identifies the owned kinds the session covers */
  watch: { controller: AbortController; task: Promise<void>; kinds: string } | null;
  removed: boolean;
  /** Set while the Application is being deleted; triggers are dropped */
  held: boolean;
}

/** Higher wins when triggers coalesce */
const TRIGGER_PRIORITY: Readonly<Record<TriggerType, number>> = {
  [TriggerType.POLL]: 0,
  [TriggerType.RETRY]: 1,
  [TriggerType.SELF_HEAL]: 2,
  [TriggerType.WEBHOOK]: 3,
  [TriggerType.REGISTER]: 4,
  [TriggerType.MANUAL]: 5,
  [TriggerType.CONFIRM]: 6,
};

function normalizeRepoURL(url: string): string {
  return url.trim().replace(/\/+$/, '').replace(/\.git$/, '');
}

// ============================================================================
// Scheduler
// ============================================================================

export class ReconciliationScheduler {
  private readonly graph: ApplicationGraph;
  private readonly reconciler: Reconciler;
  private readonly runtimes: RuntimeRegistry;
  private readonly pollIntervalMs: number;
  private readonly retryDelayMs: number;
  private readonly retryMultiplier: number;
  private readonly watchEnabled: boolean;
  private readonly watchRestartDelayMs: number;
  private readonly logger: StructuredLogger;
  private readonly schedules = new Map<string, Schedule>();
  private started = false;

  private readonly onRegistered = (name: string): void => {
    this.request(this.ensure(name), TriggerType.REGISTER);
    this.refreshWatches();
  };

  private readonly onSpecChanged = (name: string): void => {
    const schedule = this.ensure(name);
    if (schedule.controller && !schedule.controller.signal.aborted) {
      this.logger.info({ application: name }, 'Spec changed during sync; cancelling');
      schedule.controller.abort();
    }
    this.request(schedule, TriggerType.REGISTER);
    this.refreshWatches();
  };

  private readonly onRemoved = (names: string[]): void => {
    for (const name of names) {
      this.dispose(name);
    }
  };

  constructor(options: SchedulerOptions) {
    this.graph = options.graph;
    this.reconciler = options.reconciler;
    this.runtimes = options.runtimes;
    this.pollIntervalMs = options.pollIntervalMs;
    this.retryDelayMs = options.retry?.delayMs ?? 1000;
    this.retryMultiplier = options.retry?.backoffMultiplier ?? 2;
    this.watchEnabled = options.watch?.enabled ?? true;
    this.watchRestartDelayMs = options.watch?.restartDelayMs ?? 1000;
    this.logger = options.logger ?? createModuleLogger('scheduler');
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Starts polling every registered Application, and any registered later
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.graph.on('registered', this.onRegistered);
    this.graph.on('specChanged', this.onSpecChanged);
    this.graph.on('removed', this.onRemoved);

    for (const name of this.graph.names()) {
      this.request(this.ensure(name), TriggerType.POLL);
    }
    this.refreshWatches();
    this.logger.info(
      { applications: this.schedules.size, pollIntervalMs: this.pollIntervalMs },
      'Scheduler started'
    );
  }

  /**
   * Cancels in-flight cycles, stops timers and watches, and waits for
   * running work to settle
   */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    this.graph.off('registered', this.onRegistered);
    this.graph.off('specChanged', this.onSpecChanged);
    this.graph.off('removed', this.onRemoved);

    const pending: Array<Promise<void>> = [];
    for (const schedule of this.schedules.values()) {
      this.clearTimer(schedule);
      schedule.controller?.abort();
      if (schedule.running) pending.push(schedule.running);
      const watch = this.stopWatch(schedule);
      if (watch) pending.push(watch);
    }
    await Promise.all(pending);
    this.logger.info('Scheduler stopped');
  }

  get isStarted(): boolean {
    return this.started;
  }

  // --------------------------------------------------------------------------
  // Triggers
  // --------------------------------------------------------------------------

  /**
   * Queues a manual sync; resolves when a cycle covering it has finished
   */
  syncNow(name: string): Promise<void> {
    this.graph.require(name);
    return this.enqueue(name, TriggerType.MANUAL, false);
  }

  /**
   * Approves the pending plan of a manual Application
   *
   * @throws NoPendingPlanError when nothing is waiting for approval
   */
  confirm(name: string): Promise<void> {
    const record = this.graph.require(name);
    if (!record.pendingPlan) {
      throw new NoPendingPlanError(name);
    }
    return this.enqueue(name, TriggerType.CONFIRM, true);
  }

  /**
   * Cancels the in-flight cycle; returns false when none is running
   */
  cancel(name: string): boolean {
    this.graph.require(name);
    const schedule = this.schedules.get(name);
    if (!schedule?.controller || schedule.controller.signal.aborted) {
      return false;
    }
    schedule.controller.abort();
    this.logger.info({ application: name }, 'Sync cancelled by request');
    return true;
  }

  /**
   * Triggers every Application sourced from `repoURL` whose last synced
   * revision differs from `revision`. Returns the triggered names.
   */
  notifyRevision(repoURL: string, revision?: string): string[] {
    const target = normalizeRepoURL(repoURL);
    const triggered: string[] = [];

    for (const name of this.graph.names()) {
      const record = this.graph.get(name);
      if (!record || normalizeRepoURL(record.spec.source.repoURL) !== target) continue;
      if (revision !== undefined && record.revision === revision) continue;
      this.request(this.ensure(name), TriggerType.WEBHOOK);
      triggered.push(name);
    }

    this.logger.info({ repoURL, revision, triggered }, `Source change triggered ${triggered.length} application(s)`);
    return triggered;
  }

  /**
   * Stops scheduling the given Applications: cancels their in-flight cycles,
   * drops queued and future triggers, and resolves once no cycle of theirs
   * is running. Pair with `release`.
   */
  async hold(names: string[]): Promise<void> {
    const running: Array<Promise<void>> = [];
    for (const name of names) {
      const schedule = this.ensure(name);
      schedule.held = true;
      this.clearTimer(schedule);
      if (schedule.controller && !schedule.controller.signal.aborted) {
        schedule.controller.abort();
        this.logger.info({ application: name }, 'Sync cancelled for deletion');
      }
      if (schedule.running) running.push(schedule.running);
    }
    await Promise.all(running);
  }

  /**
   * Resumes scheduling held Applications that are still registered
   */
  release(names: string[]): void {
    for (const name of names) {
      const schedule = this.schedules.get(name);
      if (!schedule) continue;
      schedule.held = false;
      if (!this.graph.has(name)) {
        this.dispose(name);
      } else if (!schedule.running) {
        this.scheduleNext(schedule);
      }
    }
  }

  isRunning(name: string): boolean {
    return (this.schedules.get(name)?.running ?? null) !== null;
  }

  /**
   * Resolves once no cycle is running or queued
   */
  async idle(): Promise<void> {
    for (;;) {
      const running = [...this.schedules.values()]
        .map(schedule => schedule.running)
        .filter((task): task is Promise<void> => task !== null);
      if (running.length === 0) return;
      await Promise.all(running);
    }
  }

  // --------------------------------------------------------------------------
  // Queue
  // --------------------------------------------------------------------------

  private ensure(name: string): Schedule {
    let schedule = this.schedules.get(name);
    if (!schedule) {
      schedule = {
        name,
        timer: null,
        running: null,
        controller: null,
        queued: null,
        failures: 0,
        watch: null,
        removed: false,
        held: false,
      };
      this.schedules.set(name, schedule);
    }
    return schedule;
  }

  private enqueue(name: string, trigger: TriggerType, approved: boolean): Promise<void> {
    return new Promise(resolve => {
      this.request(this.ensure(name), trigger, approved, resolve);
    });
  }

  private request(
    schedule: Schedule,
    trigger: TriggerType,
    approved = false,
    waiter?: () => void
  ): void {
    const queued = schedule.queued;
    if (queued) {
      if (TRIGGER_PRIORITY[trigger] > TRIGGER_PRIORITY[queued.trigger]) {
        queued.trigger = trigger;
      }
      queued.approved = queued.approved || approved;
      if (waiter) queued.waiters.push(waiter);
    } else {
      schedule.queued = { trigger, approved, waiters: waiter ? [waiter] : [] };
    }
    this.drain(schedule);
  }

  private drain(schedule: Schedule): void {
    if (schedule.running || !schedule.queued) return;

    const next = schedule.queued;
    if (!this.started || schedule.removed || schedule.held || !this.graph.has(schedule.name)) {
      schedule.queued = null;
      next.waiters.forEach(resolve => resolve());
      return;
    }

    schedule.queued = null;
    this.clearTimer(schedule);
    const controller = new AbortController();
    schedule.controller = controller;

    schedule.running = this.runCycle(schedule, next, controller.signal).finally(() => {
      schedule.running = null;
      schedule.controller = null;
      next.waiters.forEach(resolve => resolve());
      this.syncWatch(schedule);
      if (schedule.queued) {
        this.drain(schedule);
      } else {
        this.scheduleNext(schedule);
      }
    });
  }

  private async runCycle(schedule: Schedule, next: QueuedTrigger, signal: AbortSignal): Promise<void> {
    try {
      const outcome = await this.reconciler.reconcile(schedule.name, next.trigger, {
        signal,
        approved: next.approved,
      });
      schedule.failures = outcome.run.status === RunStatus.ERRORED ? schedule.failures + 1 : 0;
    } catch (error) {
      schedule.failures += 1;
      this.logger.error(
        { application: schedule.name, err: error },
        `Reconcile of ${schedule.name} could not run: ${getErrorMessage(error)}`
      );
    }
  }

  private scheduleNext(schedule: Schedule): void {
    if (!this.started || schedule.removed || schedule.held || !this.graph.has(schedule.name)) return;
    this.clearTimer(schedule);

    const retrying = schedule.failures > 0;
    const delay = retrying
      ? computeBackoffDelay(schedule.failures, this.retryDelayMs, this.retryMultiplier, this.pollIntervalMs)
      : this.pollIntervalMs;

    schedule.timer = setTimeout(() => {
      schedule.timer = null;
      this.request(schedule, retrying ? TriggerType.RETRY : TriggerType.POLL);
    }, delay);
    schedule.timer.unref();
  }

  private clearTimer(schedule: Schedule): void {
    if (schedule.timer) {
      clearTimeout(schedule.timer);
      schedule.timer = null;
    }
  }

  private dispose(name: string): void {
    const schedule = this.schedules.get(name);
    if (!schedule) return;
    schedule.removed = true;
    this.clearTimer(schedule);
    schedule.controller?.abort();
    const watch = this.stopWatch(schedule);
    this.schedules.delete(name);
    if (watch) {
      watch.catch(error => this.logger.error({ application: name, err: error }, 'Watch did not stop cleanly'));
    }
  }

  // --------------------------------------------------------------------------
  // Self-heal watches
  // --------------------------------------------------------------------------

  private wantsWatch(name: string): boolean {
    if (!this.watchEnabled || !this.graph.has(name)) return false;
    const policy = this.graph.effectivePolicy(name);
    return policy.mode === SyncMode.AUTOMATED && policy.selfHeal;
  }

  /**
   * Starts or stops watches to match the current effective policies
   */
  private refreshWatches(): void {
    if (!this.started) return;
    for (const schedule of this.schedules.values()) {
      this.syncWatch(schedule);
    }
  }

  /**
   * Owned kinds of an Application; empty until its first sync
   */
  private watchedKinds(name: string): KindRef[] {
    const record = this.graph.get(name);
    return record ? uniqueKinds(record.ownedResources.values()) : [];
  }

  private syncWatch(schedule: Schedule): void {
    if (!this.started || schedule.removed) return;
    const wanted = this.wantsWatch(schedule.name);
    const kinds = this.watchedKinds(schedule.name);
    const signature = kinds.map(kind => `${kind.apiVersion}/${kind.kind}`).join(',');

    if (schedule.watch && (!wanted || schedule.watch.kinds !== signature)) {
      const task = this.stopWatch(schedule);
      task?.catch(error => this.logger.error({ application: schedule.name, err: error }, 'Watch did not stop cleanly'));
    }
    if (wanted && !schedule.watch) {
      const controller = new AbortController();
      schedule.watch = { controller, task: this.watchLoop(schedule, controller.signal), kinds: signature };
    }
  }

  private stopWatch(schedule: Schedule): Promise<void> | null {
    const watch = schedule.watch;
    if (!watch) return null;
    schedule.watch = null;
    watch.controller.abort();
    return watch.task;
  }

  /**
   * Watches the Application's objects and queues a self-heal cycle per
   * change. Sessions that end are restarted with backoff.
   */
  private async watchLoop(schedule: Schedule, signal: AbortSignal): Promise<void> {
    const { name } = schedule;
    let restarts = 0;

    while (!signal.aborted) {
      let reason = 'ended';
      try {
        const record = this.graph.require(name);
        const runtime = this.runtimes.resolve(record.spec.destination);
        const kinds = this.watchedKinds(name);
        const options = { kinds: kinds.length > 0 ? kinds : undefined, labels: ownershipLabels(name) };
        for await (const event of runtime.watch(options, signal)) {
          restarts = 0;
          this.logger.trace({ application: name, type: event.type, resource: event.resource.key }, 'Watch event');
          this.request(schedule, TriggerType.SELF_HEAL);
        }
      } catch (error) {
        reason = getErrorMessage(error);
      }

      if (signal.aborted) break;
      restarts += 1;
      const delay = computeBackoffDelay(restarts, this.watchRestartDelayMs, 2, this.pollIntervalMs);
      this.logger.watchRestarted(name, delay, reason);
      await sleep(delay, signal);
    }
  }
}
