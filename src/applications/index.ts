/**
 * Application Graph
 * @module applications
 */

export * from './state-machine.js';
export * from './ownership.js';
export * from './application-graph.js';
