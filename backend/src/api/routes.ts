import type { FastifyInstance } from 'fastify';
import { registerDatasetRoutes, type DatasetStore } from '../modules/dataset/index.js';
import { registerTrainingRoutes, type TrainingService } from '../modules/training/index.js';

export interface RouteDeps {
  datasets: DatasetStore;
  training: TrainingService;
  minTrainingRows: number;
}

/**
 * Register all API routes
 */
export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  // Health
  app.get('/api/health', async () => ({
    ok: true,
    service: 'gradient-descent-lab',
    datasetLoaded: deps.datasets.get() !== null,
    training: deps.training.currentSession?.state ?? 'idle',
    timestamp: new Date().toISOString(),
  }));

  await registerDatasetRoutes(app, { store: deps.datasets, minRows: deps.minTrainingRows });
  await registerTrainingRoutes(app, deps.training);
}
