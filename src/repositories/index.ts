/**
 * Repositories
 * @module repositories
 */

export * from './interfaces.js';
export * from './base-repository.js';
export * from './in-memory-sync-history-repository.js';
export * from './sync-history-repository.js';
