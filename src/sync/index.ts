/**
 * Sync Executor
 * @module sync
 */

export * from './dependency-graph.js';
export * from './sync-executor.js';
