/**
 * Type Definitions
 * @module types
 */

export * from './resource.js';
export * from './application.js';
export * from './sync.js';
