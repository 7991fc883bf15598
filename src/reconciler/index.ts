/**
 * Reconciliation
 * @module reconciler
 */

export * from './reconciler.js';
export * from './scheduler.js';
