/**
 * REGRESSION — Trainer
 *
 * Owns the normalized parameters and drives gradient descent one epoch
 * at a time. trainEpochByEpoch() is a generator: each next() runs exactly
 * one epoch, and the generator's return value says why the run ended.
 *
 * Stop order per epoch:
 *   1. DIVERGED       parameters went non-finite, epoch is dropped
 *   2. MAX_EPOCHS     epoch == maxEpochs, yielded then stop
 *   3. CONVERGED      costChange < tolerance with early stopping off
 *   4. EARLY_STOPPED  15th consecutive low-improvement epoch, not yielded
 */

import { ComputationError, ValidationError, errorMessage } from '../../common/errors.js';
import { CostGradientEngine } from './regression.gradient.js';
import { MetricsTracker } from './regression.metrics.js';
import { Normalizer, assertFiniteArray } from './regression.normalizer.js';
import type {
  EpochMetrics,
  EpochOptions,
  EpochResult,
  ModelSummary,
  Parameters,
  TrainTestSplit,
  TrainingOutcome,
} from './regression.types.js';

export const EARLY_STOPPING_PATIENCE = 15;

export interface TrainerOptions {
  random?: () => number;
}

interface TrainingData {
  x: number[];
  y: number[];
  normalizer: Normalizer;
  engine: CostGradientEngine;   // built over normalized x, y
}

function prepareTrainingData(x: readonly unknown[], y: readonly unknown[]): TrainingData {
  assertFiniteArray(x, 'x');
  assertFiniteArray(y, 'y');
  const normalizer = new Normalizer(x, y);
  const [xNorm, yNorm] = normalizer.normalize(x, y);
  const engine = new CostGradientEngine(xNorm, yNorm);
  return { x: [...x], y: [...y], normalizer, engine };
}

export class RegressionTrainer {
  private data: TrainingData;
  private readonly metrics = new MetricsTracker();
  private readonly random: () => number;

  private theta0 = 0;
  private theta1 = 0;

  constructor(x: readonly unknown[], y: readonly unknown[], options: TrainerOptions = {}) {
    this.random = options.random ?? Math.random;
    this.data = prepareTrainingData(x, y);
  }

  // ═══════════════════════════════════════════════════════════════
  // DATA
  // ═══════════════════════════════════════════════════════════════

  split(trainRatio: number): TrainTestSplit {
    if (!(trainRatio > 0 && trainRatio < 1)) {
      throw new ValidationError('trainRatio must be between 0 and 1 (exclusive)');
    }

    const { x, y } = this.data;
    const n = x.length;
    const nTrain = Math.floor(n * trainRatio);
    const indices = this.permutation(n);
    const trainIdx = indices.slice(0, nTrain);
    const testIdx = indices.slice(nTrain);

    return {
      xTrain: trainIdx.map((i) => x[i]),
      yTrain: trainIdx.map((i) => y[i]),
      xTest: testIdx.map((i) => x[i]),
      yTest: testIdx.map((i) => y[i]),
    };
  }

  /**
   * Replace the data and rebuild normalization and the engine.
   * Parameters are kept, so training resumes from the current θ.
   */
  setTrainingData(x: readonly unknown[], y: readonly unknown[]): void {
    this.data = prepareTrainingData(x, y);
  }

  // ═══════════════════════════════════════════════════════════════
  // TRAINING
  // ═══════════════════════════════════════════════════════════════

  *trainEpochByEpoch(options: EpochOptions): Generator<EpochResult, TrainingOutcome, void> {
    const { learningRate, maxEpochs, tolerance, earlyStopping } = options;
    let prevCost = Infinity;
    let noImprove = 0;
    let emitted = 0;
    // Snapshot: setTrainingData mid-run does not affect this run
    const { x, y, engine } = this.data;

    for (let epoch = 1; epoch <= maxEpochs; epoch++) {
      let result: EpochResult;

      try {
        const theta: Parameters = { theta0: this.theta0, theta1: this.theta1 };
        const cost = engine.cost(theta);
        const [g0, g1] = engine.gradients(theta);

        const next0 = theta.theta0 - learningRate * g0;
        const next1 = theta.theta1 - learningRate * g1;
        if (!Number.isFinite(next0) || !Number.isFinite(next1)) {
          return { status: 'DIVERGED', epochs: emitted };
        }

        const costChange = Math.abs(prevCost - cost);
        const converged = costChange < tolerance;

        if (earlyStopping && converged) {
          noImprove++;
          if (noImprove >= EARLY_STOPPING_PATIENCE && epoch < maxEpochs) {
            return { status: 'COMPLETED', reason: 'EARLY_STOPPED', epochs: emitted };
          }
        } else {
          noImprove = 0;
        }

        this.theta0 = next0;
        this.theta1 = next1;

        const metrics = this.metrics.record(y, this.predict(x), epoch);

        result = {
          epoch,
          maxEpochs,
          theta0: next0,
          theta1: next1,
          cost,
          costChange,
          converged,
          isComplete: epoch >= maxEpochs || converged,
          rmse: metrics.rmse,
          mae: metrics.mae,
          r2: metrics.r2,
        };
        prevCost = cost;
      } catch (err) {
        return { status: 'FAILED', epochs: emitted, error: errorMessage(err) };
      }

      yield Object.freeze(result);
      emitted++;

      if (epoch >= maxEpochs) {
        return { status: 'COMPLETED', reason: 'MAX_EPOCHS', epochs: emitted };
      }
      if (result.converged && !earlyStopping) {
        return { status: 'COMPLETED', reason: 'CONVERGED', epochs: emitted };
      }
    }

    // maxEpochs < 1: nothing to run
    return { status: 'COMPLETED', reason: 'MAX_EPOCHS', epochs: emitted };
  }

  // ═══════════════════════════════════════════════════════════════
  // INFERENCE & VIEWS
  // ═══════════════════════════════════════════════════════════════

  predict(x: readonly unknown[]): number[] {
    const { normalizer } = this.data;
    const xNorm = normalizer.normalizeInput(x);
    return normalizer.denormalizePredictions(
      xNorm.map((v) => this.theta0 + this.theta1 * v)
    );
  }

  parameters(): Parameters {
    return { theta0: this.theta0, theta1: this.theta1 };
  }

  originalScaleParameters(): Parameters {
    return this.data.normalizer.toOriginalScale(this.theta0, this.theta1);
  }

  latestMetrics(): EpochMetrics | null {
    return this.metrics.latest();
  }

  metricsHistory(): EpochMetrics[] {
    return this.metrics.history();
  }

  modelSummary(): ModelSummary {
    const original = this.originalScaleParameters();
    // finite θ can still overflow the cost after a FAILED run
    let finalCost: number | null;
    try {
      finalCost = this.data.engine.cost(this.parameters());
    } catch (err) {
      if (!(err instanceof ComputationError)) throw err;
      finalCost = null;
    }

    return {
      normalizedTheta0: this.theta0,
      normalizedTheta1: this.theta1,
      originalTheta0: original.theta0,
      originalTheta1: original.theta1,
      equationNormalized: `y_norm = ${this.theta0.toFixed(4)} + ${this.theta1.toFixed(4)}·x_norm`,
      equationOriginal: formatEquation(original.theta0, original.theta1),
      trainingExamples: this.data.x.length,
      finalCost,
      metricsSummary: this.metrics.summary(),
    };
  }

  get size(): number {
    return this.data.x.length;
  }

  private permutation(n: number): number[] {
    const idx = Array.from({ length: n }, (_, i) => i);
    for (let i = n - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [idx[i], idx[j]] = [idx[j], idx[i]];
    }
    return idx;
  }
}

export function formatEquation(theta0: number, theta1: number): string {
  return `y = ${theta0.toFixed(4)} + ${theta1.toFixed(4)} * x`;
}
