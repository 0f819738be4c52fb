/**
 * TRAINING — Session
 *
 * One training run over one dataset. Builds the trainer, splits the data,
 * then stream() drives the epoch generator and turns each step into a
 * TrainingMessage.
 *
 * Suspension points in stream():
 *   - yielding a message to the consumer
 *   - the pacing sleep after a non-complete epoch
 *   - waiting while paused
 * Stop is cooperative: it is seen before the next epoch starts, an epoch
 * already computed is still emitted.
 */

import { setTimeout as sleepMs } from 'node:timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { ComputationError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import {
  RegressionTrainer,
  computeRegressionMetrics,
  fitReferenceModel,
  formatEquation,
  type Dataset,
  type EpochResult,
  type ReferenceFitResult,
  type TrainTestSplit,
  type TrainingOutcome,
} from '../regression/index.js';
import { TrainingControl } from './training.control.js';
import { resolveEpochDelay } from './training.pacing.js';
import type {
  CompletionMessage,
  ControlResult,
  EpochMessage,
  ReferenceComparison,
  SessionControlFlags,
  SessionState,
  StopReason,
  TrainingMessage,
  TrainingParams,
} from './training.types.js';

export interface TrainingSessionDeps {
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  referenceFit?: (x: number[], y: number[]) => ReferenceFitResult;
}

export class TrainingSession {
  readonly id: string = uuidv4();
  readonly params: TrainingParams;

  private readonly control = new TrainingControl();
  private readonly trainer: RegressionTrainer;
  private readonly dataset: Dataset;
  private readonly split: TrainTestSplit;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly referenceFit: (x: number[], y: number[]) => ReferenceFitResult;

  private streamed = false;
  private completion: CompletionMessage | null = null;

  /**
   * Validation errors (bad split, non-numeric data) throw here,
   * before anything is streamed.
   */
  constructor(dataset: Dataset, params: TrainingParams, deps: TrainingSessionDeps) {
    this.params = params;
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? ((ms) => sleepMs(ms));
    this.referenceFit = deps.referenceFit ?? fitReferenceModel;

    this.dataset = { x: [...dataset.x], y: [...dataset.y] };
    this.trainer = new RegressionTrainer(this.dataset.x, this.dataset.y, { random: deps.random });
    this.split = this.trainer.split(params.trainSplit);
    this.trainer.setTrainingData(this.split.xTrain, this.split.yTrain);

    this.control.activate();
    this.logger.info(
      { sessionId: this.id, trainRatio: params.trainSplit, trainSize: this.split.xTrain.length },
      'Training setup complete'
    );
  }

  // ═══════════════════════════════════════════════════════════════
  // CONTROL
  // ═══════════════════════════════════════════════════════════════

  get state(): SessionState {
    return this.control.state;
  }

  get flags(): SessionControlFlags {
    return this.control.flags;
  }

  get model(): RegressionTrainer {
    return this.trainer;
  }

  get result(): CompletionMessage | null {
    return this.completion;
  }

  pause(): ControlResult {
    return this.control.pause();
  }

  resume(): ControlResult {
    return this.control.resume();
  }

  stop(): ControlResult {
    return this.control.stop();
  }

  // ═══════════════════════════════════════════════════════════════
  // DRIVE LOOP
  // ═══════════════════════════════════════════════════════════════

  async *stream(): AsyncGenerator<TrainingMessage, void, void> {
    if (this.streamed) {
      yield { type: 'error', error: true, message: 'Training stream already consumed' };
      return;
    }
    this.streamed = true;

    const { learningRate, maxEpochs, tolerance, earlyStopping, trainingSpeed } = this.params;
    const delayMs = resolveEpochDelay(trainingSpeed);
    const run = this.trainer.trainEpochByEpoch({ learningRate, maxEpochs, tolerance, earlyStopping });

    this.logger.info(
      { sessionId: this.id, maxEpochs, learningRate, earlyStopping, delayMs },
      'Training stream started'
    );

    try {
      let stopReason: StopReason = 'STOPPED';
      let epochsRun = 0;

      for (;;) {
        if (!this.control.isActive) {
          this.logger.info({ sessionId: this.id, epochsRun }, 'Training stream stopped by request');
          stopReason = 'STOPPED';
          break;
        }
        if (this.control.isPaused) {
          this.logger.info({ sessionId: this.id, epochsRun }, 'Training paused; waiting...');
          await this.control.waitWhilePaused();
          continue;
        }

        const step = run.next();
        if (step.done) {
          stopReason = this.describeOutcome(step.value);
          break;
        }

        epochsRun = step.value.epoch;
        yield this.toEpochMessage(step.value);

        if (!step.value.isComplete) {
          await this.sleep(delayMs);
        }
      }

      const completion = this.buildCompletion(stopReason, epochsRun);
      this.completion = completion;
      this.logger.info({ sessionId: this.id, stopReason, epochsRun }, 'Training stream completed');
      yield completion;
    } catch (err) {
      this.logger.error({ sessionId: this.id, err: errorMessage(err) }, 'Training stream failed');
      yield { type: 'error', error: true, message: errorMessage(err) };
    } finally {
      this.control.reset();
      this.logger.info({ sessionId: this.id }, 'Training state cleaned up');
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // MESSAGES
  // ═══════════════════════════════════════════════════════════════

  private describeOutcome(outcome: TrainingOutcome): StopReason {
    switch (outcome.status) {
      case 'COMPLETED':
        return outcome.reason;
      case 'DIVERGED':
        this.logger.warn({ sessionId: this.id, epochs: outcome.epochs }, 'Parameters diverged; last finite epoch kept');
        return 'DIVERGED';
      case 'FAILED':
        this.logger.warn({ sessionId: this.id, epochs: outcome.epochs, err: outcome.error }, 'Epoch computation failed; training ended early');
        return 'FAILED';
    }
  }

  private toEpochMessage(result: EpochResult): EpochMessage {
    const original = this.trainer.originalScaleParameters();
    return {
      type: 'epoch',
      ...result,
      originalTheta0: original.theta0,
      originalTheta1: original.theta1,
    };
  }

  private buildCompletion(stopReason: StopReason, epochsRun: number): CompletionMessage {
    const { testMse, testR2 } = this.evaluateTestSet();
    const final = this.trainer.originalScaleParameters();
    const latest = this.trainer.latestMetrics();

    return {
      type: 'complete',
      sessionId: this.id,
      trainingComplete: true,
      stopReason,
      diverged: stopReason === 'DIVERGED',
      epochsRun,
      finalTheta0: final.theta0,
      finalTheta1: final.theta1,
      equation: formatEquation(final.theta0, final.theta1),
      testMse,
      testR2,
      xRange: range(this.dataset.x),
      yRange: range(this.dataset.y),
      finalRmse: latest?.rmse ?? 0,
      finalMae: latest?.mae ?? 0,
      finalR2: latest?.r2 ?? 0,
      modelSummary: this.trainer.modelSummary(),
      referenceComparison: this.compareWithReference(),
    };
  }

  /** Both null when the parameters overflow on the held-out data. */
  private evaluateTestSet(): { testMse: number | null; testR2: number | null } {
    const { xTest, yTest } = this.split;
    if (xTest.length === 0) return { testMse: 0, testR2: 0 };

    try {
      const metrics = computeRegressionMetrics(yTest, this.trainer.predict(xTest));
      const testMse = metrics.rmse ** 2;
      if (!Number.isFinite(testMse)) return { testMse: null, testR2: null };
      return { testMse, testR2: metrics.r2 };
    } catch (err) {
      if (!(err instanceof ComputationError)) throw err;
      this.logger.warn({ sessionId: this.id, err: err.message }, 'Test-set evaluation failed');
      return { testMse: null, testR2: null };
    }
  }

  /** Runs once per completed stream; a failure here never fails the run. */
  private compareWithReference(): ReferenceComparison {
    try {
      return { status: 'success', results: this.referenceFit(this.dataset.x, this.dataset.y) };
    } catch (err) {
      this.logger.warn({ sessionId: this.id, err: errorMessage(err) }, 'Reference comparison failed');
      return { status: 'failed', error: errorMessage(err) };
    }
  }
}

function range(values: number[]): [number, number] {
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return [min, max];
}
