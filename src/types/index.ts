/**
 * Public type exports
 */

export * from './cache.js';
export * from './inference.js';
export * from './metrics.js';
export * from './pipeline.js';
