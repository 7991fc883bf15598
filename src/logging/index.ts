/**
 * Logging Module
 * @module logging
 */

export * from './logger.js';
export * from './metrics.js';
