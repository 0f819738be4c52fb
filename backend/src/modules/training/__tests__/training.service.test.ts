import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConflictError, NotFoundError, ValidationError } from '../../../common/errors.js';
import type { CleanedDataset } from '../../dataset/dataset.types.js';
import { DatasetStore } from '../../dataset/dataset.store.js';
import { DEFAULT_CLEANING_OPTIONS } from '../../dataset/dataset.loader.js';
import { TrainingService } from '../training.service.js';
import type { TrainingMessage, TrainingParams } from '../training.types.js';

function makeDataset(n: number): CleanedDataset {
  const x = Array.from({ length: n }, (_, i) => i + 1);
  const y = x.map((v) => 2 * v + 1);
  return {
    filename: 'test.csv',
    xColumn: 'x',
    yColumn: 'y',
    columns: ['x', 'y'],
    x,
    y,
    summary: {
      originalRows: n,
      cleanedRows: n,
      samplesRemoved: 0,
      duplicatesRemoved: 0,
      missingValuesRemoved: 0,
      missingValuesFilled: 0,
      nonNumericRemoved: 0,
      outliersRemoved: 0,
      optionsApplied: { ...DEFAULT_CLEANING_OPTIONS },
    },
    statistics: { xMean: 0, yMean: 0, xStd: 0, yStd: 0 },
    createdAt: '2026-01-01T00:00:00.000Z',
  };
}

const params: TrainingParams = {
  learningRate: 0.1,
  maxEpochs: 3,
  tolerance: 0,
  earlyStopping: true,
  trainSplit: 0.8,
  trainingSpeed: 1.0,
};

async function drain(messages: AsyncIterable<TrainingMessage>): Promise<TrainingMessage[]> {
  const out: TrainingMessage[] = [];
  for await (const m of messages) out.push(m);
  return out;
}

describe('TrainingService', () => {
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  let store: DatasetStore;
  let service: TrainingService;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new DatasetStore();
    service = new TrainingService(store, {
      logger: mockLogger,
      sleep: async () => undefined,
      random: () => 0.5,
    });
  });

  it('should refuse to start without a dataset', () => {
    expect(() => service.start(params)).toThrow(ValidationError);
    expect(() => service.start(params)).toThrow('No cleaned data available for training');
  });

  it('should refuse a second start while a session is running', () => {
    store.set(makeDataset(12));
    service.start(params);

    expect(() => service.start(params)).toThrow(ConflictError);
  });

  it('should allow a new start once the previous session finished', async () => {
    store.set(makeDataset(12));
    await drain(service.start(params).messages);

    const { session } = service.start(params);
    expect(service.currentSession).toBe(session);
  });

  it('should answer control requests with no session', () => {
    expect(service.pause()).toEqual({ status: 'NOT_ACTIVE', message: 'No active training to pause' });
    expect(service.resume()).toEqual({ status: 'NOT_ACTIVE', message: 'No active training to resume' });
    expect(service.stop()).toEqual({ status: 'NOT_ACTIVE', message: 'No active training to stop' });
  });

  it('should forward control requests to the running session', () => {
    store.set(makeDataset(12));
    const { session } = service.start(params);

    expect(service.pause().status).toBe('PAUSED');
    expect(session.state).toBe('paused');
    expect(service.stop().status).toBe('STOP_REQUESTED');
    expect(session.state).toBe('inactive');
  });

  it('should have no model before a completed run', () => {
    expect(() => service.predict([1])).toThrow(NotFoundError);
    expect(() => service.modelSummary()).toThrow('No trained model available; run training first');
  });

  it('should predict with the last trained model', async () => {
    store.set(makeDataset(12));
    const messages = await drain(service.start(params).messages);

    expect(messages[messages.length - 1].type).toBe('complete');
    const predictions = service.predict([1, 2, 3]);
    expect(predictions).toHaveLength(3);
    expect(predictions[2]).toBeGreaterThan(predictions[0]);
    expect(service.modelSummary().trainingExamples).toBe(9);
  });
});
