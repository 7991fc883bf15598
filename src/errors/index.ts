/**
 * Errors Module
 * @module errors
 */

export * from './codes.js';
export * from './base.js';
export * from './domain.js';
export * from './recovery.js';
