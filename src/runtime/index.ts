/**
 * Target Runtimes
 * @module runtime
 */

export * from './interface.js';
export * from './in-memory-runtime.js';
export * from './kubernetes-runtime.js';
export * from './registry.js';
