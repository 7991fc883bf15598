/**
 * Controller Wiring
 * @module controller
 *
 * Builds the reconciler's components from configuration and owns their
 * lifecycle: root Application registration, scheduler start/stop, explicit
 * deletion and readiness.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ApplicationGraph } from './applications/application-graph.js';
import { OwnershipRegistry } from './applications/ownership.js';
import type { AppConfig } from './config/schema.js';
import { checkConnection, getPool } from './db/connection.js';
import { MIGRATIONS, runMigrations } from './db/migrations/index.js';
import { InvalidApplicationError, getErrorMessage } from './errors/index.js';
import { StructuredLogger, createModuleLogger } from './logging/index.js';
import { LiveStateObserver } from './observer/live-state-observer.js';
import { DeleteOutcome, Reconciler } from './reconciler/reconciler.js';
import { ReconciliationScheduler } from './reconciler/scheduler.js';
import {
  ISyncHistoryRepository,
  InMemorySyncHistoryRepository,
  SyncHistoryRepository,
} from './repositories/index.js';
import { InMemoryRuntime } from './runtime/in-memory-runtime.js';
import { KubernetesRuntime } from './runtime/kubernetes-runtime.js';
import { RuntimeRegistry } from './runtime/registry.js';
import { isApplicationManifest, parseApplicationManifest } from './source/application-parser.js';
import {
  CompositeSourceFetcher,
  GitSourceFetcher,
  LocalSourceFetcher,
  SourceFetcher,
} from './source/fetcher.js';
import { SourceTreeLoader } from './source/loader.js';
import { parseManifestFile } from './source/manifest-parser.js';
import { SyncExecutor } from './sync/sync-executor.js';
import type { ApplicationSpec } from './types/application.js';

// ============================================================================
// Types
// ============================================================================

export type ReadinessCheck = () => Promise<boolean>;

export interface ControllerOptions {
  config: AppConfig;
  /** Replaces the runtime built from `config.runtime` */
  runtimes?: RuntimeRegistry;
  /** Replaces the store built from `config.history` */
  history?: ISyncHistoryRepository;
  fetcher?: SourceFetcher;
  readinessChecks?: Record<string, ReadinessCheck>;
  logger?: StructuredLogger;
}

export interface ReadinessReport {
  ready: boolean;
  checks: Record<string, boolean>;
}

// ============================================================================
// Component Factories
// ============================================================================

function buildRuntimes(config: AppConfig): RuntimeRegistry {
  const { runtime, controller } = config;
  const registry = new RuntimeRegistry();
  const target = runtime.type === 'memory'
    ? new InMemoryRuntime({ name: runtime.name, namespaces: ['default', controller.namespace] })
    : KubernetesRuntime.fromKubeConfig(runtime.name, runtime.kubeconfig, runtime.context);
  registry.register(target, { server: runtime.server, default: true });
  return registry;
}

function buildFetcher(config: AppConfig): SourceFetcher {
  return new CompositeSourceFetcher([
    new LocalSourceFetcher(),
    new GitSourceFetcher({
      workDir: resolve(config.source.workDir),
      gitBinary: config.source.gitBinary,
      timeoutMs: config.source.fetchTimeoutMs,
    }),
  ]);
}

interface HistoryStore {
  history: ISyncHistoryRepository;
  checks: Record<string, ReadinessCheck>;
  migrate?: () => Promise<void>;
}

function buildHistory(config: AppConfig): HistoryStore {
  const { store, databaseUrl, maxRunsPerApplication } = config.history;
  if (store === 'memory' || !databaseUrl) {
    return { history: new InMemorySyncHistoryRepository(maxRunsPerApplication), checks: {} };
  }

  const pool = getPool({ connectionString: databaseUrl });
  return {
    history: new SyncHistoryRepository(pool, maxRunsPerApplication),
    checks: { database: () => checkConnection(pool) },
    migrate: async () => {
      await runMigrations(pool, MIGRATIONS);
    },
  };
}

// ============================================================================
// Controller
// ============================================================================

export class Controller {
  readonly config: AppConfig;
  readonly graph: ApplicationGraph;
  readonly ownership: OwnershipRegistry;
  readonly runtimes: RuntimeRegistry;
  readonly history: ISyncHistoryRepository;
  readonly reconciler: Reconciler;
  readonly scheduler: ReconciliationScheduler;
  private readonly readinessChecks: Record<string, ReadinessCheck>;
  private readonly migrate?: () => Promise<void>;
  private readonly logger: StructuredLogger;

  constructor(options: ControllerOptions) {
    const { config } = options;
    this.config = config;
    this.logger = options.logger ?? createModuleLogger('controller');

    const store: HistoryStore = options.history
      ? { history: options.history, checks: {} }
      : buildHistory(config);

    this.history = store.history;
    this.migrate = store.migrate;
    this.readinessChecks = { ...store.checks, ...options.readinessChecks };
    this.runtimes = options.runtimes ?? buildRuntimes(config);
    this.graph = new ApplicationGraph();
    this.ownership = new OwnershipRegistry(
      config.controller.ownershipPolicy,
      application => this.graph.get(application)?.sequence ?? -1
    );

    const retry = config.controller.retry;
    this.reconciler = new Reconciler({
      graph: this.graph,
      loader: new SourceTreeLoader({
        fetcher: options.fetcher ?? buildFetcher(config),
        applicationNamespace: config.controller.namespace,
      }),
      observer: new LiveStateObserver({ concurrency: config.controller.syncConcurrency }),
      executor: new SyncExecutor({ concurrency: config.controller.syncConcurrency, retry }),
      runtimes: this.runtimes,
      ownership: this.ownership,
      history: this.history,
      retry,
    });

    this.scheduler = new ReconciliationScheduler({
      graph: this.graph,
      reconciler: this.reconciler,
      runtimes: this.runtimes,
      pollIntervalMs: config.controller.pollIntervalMs,
      retry: { delayMs: retry.delayMs, backoffMultiplier: retry.backoffMultiplier },
      watch: config.controller.watch,
    });
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Runs migrations, registers configured roots and starts the scheduler
   */
  async start(): Promise<void> {
    if (this.migrate) {
      await this.migrate();
    }
    for (const path of this.config.controller.rootApplications) {
      await this.registerRootsFromFile(path);
    }
    this.scheduler.start();
    this.logger.info(
      { applications: this.graph.names().length, pollIntervalMs: this.config.controller.pollIntervalMs },
      'Controller started'
    );
  }

  async stop(): Promise<void> {
    await this.scheduler.stop();
    this.logger.info('Controller stopped');
  }

  // --------------------------------------------------------------------------
  // Root Applications
  // --------------------------------------------------------------------------

  registerRoot(spec: ApplicationSpec): void {
    this.graph.registerRoot(spec);
  }

  /**
   * Registers every Application manifest in a YAML/JSON file as a root
   *
   * @returns names of the registered roots
   */
  async registerRootsFromFile(path: string): Promise<string[]> {
    const file = resolve(path);
    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (error) {
      throw new InvalidApplicationError(`Cannot read root Application file ${file}: ${getErrorMessage(error)}`);
    }

    const parsed = parseManifestFile(content, file);
    const [firstError] = parsed.errors;
    if (firstError) {
      throw firstError;
    }

    const names: string[] = [];
    for (const document of parsed.documents) {
      if (!isApplicationManifest(document.manifest)) {
        this.logger.warn({ file, documentIndex: document.documentIndex }, 'Skipping non-Application document');
        continue;
      }
      const spec = parseApplicationManifest(document.manifest);
      this.registerRoot(spec);
      names.push(spec.name);
    }
    return names;
  }

  // --------------------------------------------------------------------------
  // Operator Commands
  // --------------------------------------------------------------------------

  /**
   * Deletes an Application and its subtree. In-flight cycles of the subtree
   * are cancelled and finish before anything is pruned.
   */
  async deleteApplication(name: string, cascade: boolean): Promise<DeleteOutcome> {
    const members = this.graph.subtree(name);
    await this.scheduler.hold(members);
    let outcome: DeleteOutcome;
    try {
      outcome = await this.reconciler.removeApplication(name, cascade);
    } finally {
      this.scheduler.release(members);
    }
    for (const removed of outcome.removed) {
      await this.history.deleteForApplication(removed);
    }
    this.logger.info({ application: name, cascade, removed: outcome.removed }, 'Application deleted');
    return outcome;
  }

  async readiness(): Promise<ReadinessReport> {
    const checks: Record<string, boolean> = { scheduler: this.scheduler.isStarted };
    for (const [name, check] of Object.entries(this.readinessChecks)) {
      checks[name] = await check();
    }
    return { ready: Object.values(checks).every(Boolean), checks };
  }
}
