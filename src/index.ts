/**
 * driftguard
 * @module driftguard
 *
 * GitOps reconciler: loads desired state from source trees, observes live
 * state in a target runtime, and converges the two per Application, with
 * Applications composing into App-of-Apps trees.
 *
 * @example
 * ```typescript
 * import { Controller, loadConfig, buildApp } from 'driftguard';
 *
 * const controller = new Controller({ config: await loadConfig() });
 * await controller.start();
 * const app = await buildApp({ controller });
 * await app.listen({ port: 8080 });
 * ```
 */

// ============================================================================
// Types and Errors
// ============================================================================

export * from './types/index.js';
export * from './errors/index.js';
export * from './constants/index.js';

// ============================================================================
// Infrastructure
// ============================================================================

export * from './config/index.js';
export * from './logging/index.js';
export * from './repositories/index.js';
export * from './runtime/index.js';

// ============================================================================
// Reconciliation
// ============================================================================

export * from './source/index.js';
export * from './observer/index.js';
export * from './diff/index.js';
export * from './sync/index.js';
export * from './applications/index.js';
export * from './reconciler/index.js';

// ============================================================================
// Wiring and API
// ============================================================================

export { Controller } from './controller.js';
export type { ControllerOptions, ReadinessCheck, ReadinessReport } from './controller.js';
export { buildApp, buildTestApp } from './app.js';
export type { AppOptions } from './app.js';
