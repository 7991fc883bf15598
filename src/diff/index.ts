/**
 * Diff Engine
 * @module diff
 */

export * from './normalizer.js';
export * from './field-policy.js';
export * from './patch.js';
export * from './diff-engine.js';
