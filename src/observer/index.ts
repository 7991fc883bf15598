/**
 * Live State Observation
 * @module observer
 */

export * from './live-state-observer.js';
