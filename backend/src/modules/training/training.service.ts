/**
 * TRAINING — Service
 *
 * Single-session facade for the HTTP and WebSocket layers. Holds the
 * current session (at most one running) and the last session that
 * completed, which is what /api/model/* serves.
 */

import { ConflictError, NotFoundError, ValidationError } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { DatasetStore } from '../dataset/dataset.store.js';
import type { ModelSummary } from '../regression/regression.types.js';
import { TrainingSession, type TrainingSessionDeps } from './training.session.js';
import type { ControlResult, TrainingMessage, TrainingParams } from './training.types.js';

export interface StartedTraining {
  session: TrainingSession;
  messages: AsyncGenerator<TrainingMessage, void, void>;
}

export class TrainingService {
  private current: TrainingSession | null = null;
  private trained: TrainingSession | null = null;

  constructor(
    private readonly datasets: DatasetStore,
    private readonly deps: TrainingSessionDeps
  ) {}

  get logger(): Logger {
    return this.deps.logger;
  }

  get currentSession(): TrainingSession | null {
    return this.current;
  }

  start(params: TrainingParams): StartedTraining {
    const dataset = this.datasets.get();
    if (!dataset) {
      this.logger.warn({}, 'Attempted to start training without cleaned data');
      throw new ValidationError('No cleaned data available for training');
    }
    if (this.current && this.current.state !== 'inactive') {
      throw new ConflictError('A training session is already running');
    }

    const session = new TrainingSession(dataset, params, this.deps);
    this.current = session;
    return { session, messages: this.track(session) };
  }

  pause(): ControlResult {
    return this.current?.pause() ?? { status: 'NOT_ACTIVE', message: 'No active training to pause' };
  }

  resume(): ControlResult {
    return this.current?.resume() ?? { status: 'NOT_ACTIVE', message: 'No active training to resume' };
  }

  stop(): ControlResult {
    return this.current?.stop() ?? { status: 'NOT_ACTIVE', message: 'No active training to stop' };
  }

  predict(x: number[]): number[] {
    return this.requireTrained().model.predict(x);
  }

  modelSummary(): ModelSummary {
    return this.requireTrained().model.modelSummary();
  }

  private requireTrained(): TrainingSession {
    if (!this.trained) {
      throw new NotFoundError('No trained model available; run training first');
    }
    return this.trained;
  }

  private async *track(session: TrainingSession): AsyncGenerator<TrainingMessage, void, void> {
    for await (const message of session.stream()) {
      if (message.type === 'complete') {
        this.trained = session;
      }
      yield message;
    }
  }
}
