/**
 * TRAINING MODULE — Index
 * ========================
 *
 * Session lifecycle, pause/resume/stop control and message streaming
 * over the regression trainer.
 */

export * from './training.types.js';
export * from './training.pacing.js';
export * from './training.params.js';
export { TrainingControl } from './training.control.js';
export { TrainingSession, type TrainingSessionDeps } from './training.session.js';
export { TrainingService, type StartedTraining } from './training.service.js';
export { registerTrainingRoutes, formatSSE } from './training.routes.js';

console.log('[Training] Module loaded');
