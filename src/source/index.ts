/**
 * Source Tree Loading
 * @module source
 */

export * from './fetcher.js';
export * from './manifest-parser.js';
export * from './application-parser.js';
export * from './loader.js';
