/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Structured logging with Pino for the reconciler.
 * Includes domain-specific logging methods for reconcile cycles, sync
 * operations, application graph changes and source fetches.
 */

import pino from 'pino';
import type { Logger, LoggerOptions, DestinationStream, Level } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  requestId?: string;
  application?: string;
  runId?: string;
  module?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

type LogPayload = Record<string, unknown>;

// ============================================================================
// Default Configuration
// ============================================================================

const defaultConfig = (): LoggerConfig => ({
  level: process.env.LOG_LEVEL || 'info',
  pretty: process.env.LOG_PRETTY === 'true' || process.env.NODE_ENV === 'development',
  redact: [
    'password',
    'token',
    'authorization',
    'secret',
    'databaseUrl',
    'webhookSecret',
    'headers.authorization',
    'headers.cookie',
    // Secret payloads flow through diffs and sync results
    'manifest.data',
    'manifest.stringData',
  ],
  service: process.env.SERVICE_NAME || 'driftguard',
  version: process.env.SERVICE_VERSION || '0.1.0',
  environment: process.env.NODE_ENV || 'development',
});

/**
 * Expands each path so nested occurrences are redacted too
 */
function createRedactionPaths(paths: string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    expandedPaths.push(`*.${path}`);
  }

  return expandedPaths;
}

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

// ============================================================================
// Structured Logger
// ============================================================================

/**
 * Pino logger with reconciler domain events
 */
export class StructuredLogger {
  constructor(private readonly base: Logger) {}

  /** Underlying pino instance */
  get pino(): Logger {
    return this.base;
  }

  get level(): string {
    return this.base.level;
  }

  child(bindings: LogContext): StructuredLogger {
    return new StructuredLogger(this.base.child(bindings));
  }

  withContext(context: LogContext): StructuredLogger {
    return this.child(context);
  }

  fatal(payload: LogPayload | string, msg?: string): void {
    this.write('fatal', payload, msg);
  }

  error(payload: LogPayload | string, msg?: string): void {
    this.write('error', payload, msg);
  }

  warn(payload: LogPayload | string, msg?: string): void {
    this.write('warn', payload, msg);
  }

  info(payload: LogPayload | string, msg?: string): void {
    this.write('info', payload, msg);
  }

  debug(payload: LogPayload | string, msg?: string): void {
    this.write('debug', payload, msg);
  }

  trace(payload: LogPayload | string, msg?: string): void {
    this.write('trace', payload, msg);
  }

  private write(level: Level, payload: LogPayload | string, msg?: string): void {
    if (typeof payload === 'string') {
      this.base[level](payload);
    } else {
      this.base[level](payload, msg);
    }
  }

  // --------------------------------------------------------------------------
  // Reconcile lifecycle
  // --------------------------------------------------------------------------

  reconcileStarted(application: string, runId: string, trigger: string): void {
    this.info(
      { event: 'reconcile_started', application, runId, trigger },
      `Reconcile started for ${application} (${trigger})`
    );
  }

  reconcileCompleted(
    application: string,
    runId: string,
    status: string,
    duration: number,
    counts?: Record<string, number>
  ): void {
    this.info(
      { event: 'reconcile_completed', application, runId, status, durationMs: duration, ...counts },
      `Reconcile of ${application} finished ${status} in ${duration}ms`
    );
  }

  reconcileFailed(application: string, runId: string, error: Error): void {
    this.error(
      { event: 'reconcile_failed', application, runId, err: error, errorCode: errorCode(error) },
      `Reconcile of ${application} failed: ${error.message}`
    );
  }

  // --------------------------------------------------------------------------
  // Sync operations
  // --------------------------------------------------------------------------

  operationFailed(application: string, resource: string, error: Error, attempts: number): void {
    this.warn(
      {
        event: 'operation_failed',
        application,
        resource,
        attempts,
        err: error,
        errorCode: errorCode(error),
      },
      `Operation on ${resource} failed after ${attempts} attempt(s): ${error.message}`
    );
  }

  driftDetected(application: string, resources: string[]): void {
    this.warn(
      { event: 'drift_detected', application, resources, count: resources.length },
      `Drift detected in ${application}: ${resources.length} resource(s)`
    );
  }

  // --------------------------------------------------------------------------
  // Application graph
  // --------------------------------------------------------------------------

  applicationRegistered(application: string, parent?: string): void {
    this.info(
      { event: 'application_registered', application, parent },
      parent ? `Application ${application} registered under ${parent}` : `Application ${application} registered`
    );
  }

  applicationRemoved(application: string, removed: string[]): void {
    this.info(
      { event: 'application_removed', application, removed },
      `Application ${application} removed (${removed.length} in subtree)`
    );
  }

  phaseChanged(application: string, from: string, to: string): void {
    this.debug(
      { event: 'phase_changed', application, from, to },
      `Application ${application}: ${from} -> ${to}`
    );
  }

  // --------------------------------------------------------------------------
  // Source and watch
  // --------------------------------------------------------------------------

  sourceFetched(repoURL: string, revision: string, duration: number): void {
    this.debug(
      { event: 'source_fetched', repoURL, revision, durationMs: duration },
      `Fetched ${repoURL} at ${revision} in ${duration}ms`
    );
  }

  sourceFetchFailed(repoURL: string, error: Error): void {
    this.warn(
      { event: 'source_fetch_failed', repoURL, err: error, errorCode: errorCode(error) },
      `Fetching ${repoURL} failed: ${error.message}`
    );
  }

  watchRestarted(application: string, delayMs: number, reason?: string): void {
    this.debug(
      { event: 'watch_restarted', application, delayMs, reason },
      `Watch for ${application} restarting in ${delayMs}ms`
    );
  }

  performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>): void {
    this.debug(
      { event: 'performance_metric', operation, durationMs: duration, ...metadata },
      `${operation} took ${duration}ms`
    );
  }
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(
  name: string,
  baseContext?: LogContext,
  overrides: Partial<LoggerConfig> = {}
): StructuredLogger {
  const config = { ...defaultConfig(), ...overrides };

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
      },
    });
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return new StructuredLogger(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('driftguard');
  }
  return rootLogger;
}

/**
 * Initializes the root logger with the loaded configuration
 */
export function initLogger(overrides: Partial<LoggerConfig> = {}, context?: LogContext): StructuredLogger {
  rootLogger = createLogger('driftguard', context, overrides);
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().child({ module: moduleName });
}

/**
 * Wraps an async function with timing and logging
 */
export async function withLogging<T>(
  logger: StructuredLogger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();

  try {
    const result = await fn();
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'success' });
    return result;
  } catch (error) {
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'error' });
    throw error;
  }
}
