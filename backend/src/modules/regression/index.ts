/**
 * REGRESSION MODULE — Index
 */

export * from './regression.types.js';
export * from './regression.normalizer.js';
export * from './regression.gradient.js';
export * from './regression.metrics.js';
export * from './regression.trainer.js';
export * from './regression.reference.js';

console.log('[Regression] Module loaded');
