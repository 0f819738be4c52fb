/**
 * DATASET MODULE — Index
 * =======================
 *
 * CSV upload → quality report → cleaned (x, y) dataset.
 */

export * from './dataset.types.js';
export * from './dataset.loader.js';
export { DatasetStore } from './dataset.store.js';
export { registerDatasetRoutes } from './dataset.routes.js';

console.log('[Dataset] Module loaded');
