/**
 * Prometheus Metrics
 * @module logging/metrics
 *
 * Prometheus-compatible metrics for the reconciler: sync outcomes, reconcile
 * cycles, application phases and HTTP traffic.
 */

import {
  Counter,
  Histogram,
  Gauge,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';

// ============================================================================
// Registry Setup
// ============================================================================

/**
 * Dedicated metrics registry for the application
 */
export const metricsRegistry = new Registry();

metricsRegistry.setDefaultLabels({
  service: process.env.SERVICE_NAME || 'driftguard',
  environment: process.env.NODE_ENV || 'development',
});

collectDefaultMetrics({
  register: metricsRegistry,
  prefix: 'driftguard_',
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestsTotal = new Counter({
  name: 'driftguard_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status_code'],
  registers: [metricsRegistry],
});

export const httpRequestDuration = new Histogram({
  name: 'driftguard_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [metricsRegistry],
});

// ============================================================================
// Reconcile Metrics
// ============================================================================

/**
 * Reconcile cycles by final run status
 */
export const reconcileCyclesTotal = new Counter({
  name: 'driftguard_reconcile_cycles_total',
  help: 'Total number of reconcile cycles',
  labelNames: ['application', 'status', 'trigger'],
  registers: [metricsRegistry],
});

export const reconcileDuration = new Histogram({
  name: 'driftguard_reconcile_duration_seconds',
  help: 'Reconcile cycle duration in seconds',
  labelNames: ['application', 'status'],
  buckets: [0.05, 0.1, 0.5, 1, 5, 15, 30, 60, 120],
  registers: [metricsRegistry],
});

/**
 * Per-resource sync outcomes
 */
export const syncResultsTotal = new Counter({
  name: 'driftguard_sync_results_total',
  help: 'Total number of per-resource sync results by outcome',
  labelNames: ['application', 'outcome'],
  registers: [metricsRegistry],
});

export const driftedResources = new Gauge({
  name: 'driftguard_drifted_resources',
  help: 'Resources reported as drifted and left uncorrected',
  labelNames: ['application'],
  registers: [metricsRegistry],
});

export const applicationsByPhase = new Gauge({
  name: 'driftguard_applications',
  help: 'Registered applications by phase',
  labelNames: ['phase'],
  registers: [metricsRegistry],
});

// ============================================================================
// Metric Helpers
// ============================================================================

/**
 * Metrics helper with convenient recording methods
 */
export const metrics = {
  recordHttpRequest(method: string, path: string, statusCode: number, durationSeconds: number) {
    const labels = { method, path, status_code: statusCode.toString() };
    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, durationSeconds);
  },

  recordReconcile(application: string, status: string, trigger: string, durationSeconds: number) {
    reconcileCyclesTotal.inc({ application, status, trigger });
    reconcileDuration.observe({ application, status }, durationSeconds);
  },

  recordSyncResult(application: string, outcome: string, count = 1) {
    if (count > 0) {
      syncResultsTotal.inc({ application, outcome }, count);
    }
  },

  setDrift(application: string, count: number) {
    driftedResources.set({ application }, count);
  },

  setApplicationPhases(counts: Record<string, number>) {
    applicationsByPhase.reset();
    for (const [phase, count] of Object.entries(counts)) {
      applicationsByPhase.set({ phase }, count);
    }
  },
};

/**
 * Gets metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

/**
 * Gets metrics content type header
 */
export function getMetricsContentType(): string {
  return metricsRegistry.contentType;
}

/**
 * Resets all metrics (primarily for testing)
 */
export function resetMetrics(): void {
  metricsRegistry.resetMetrics();
}
