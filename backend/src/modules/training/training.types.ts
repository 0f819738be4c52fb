/**
 * TRAINING — Types
 *
 * Hyperparameters in, a stream of TrainingMessage out.
 * Messages are tagged by `type` so the client can switch on them.
 */

import type {
  CompletionReason,
  EpochResult,
  ModelSummary,
  ReferenceFitResult,
} from '../regression/regression.types.js';

// ═══════════════════════════════════════════════════════════════
// PARAMETERS
// ═══════════════════════════════════════════════════════════════

export type SpeedName = 'fastest' | 'fast' | 'normal' | 'slow' | 'slowest';

export interface TrainingParams {
  learningRate: number;
  maxEpochs: number;
  tolerance: number;
  earlyStopping: boolean;
  trainSplit: number;
  trainingSpeed: number;   // (0, 1], snapped to the nearest pacing step
}

// ═══════════════════════════════════════════════════════════════
// CONTROL
// ═══════════════════════════════════════════════════════════════

export interface SessionControlFlags {
  trainingActive: boolean;
  trainingPaused: boolean;
}

export type SessionState = 'idle' | 'active' | 'paused' | 'inactive';

export type ControlStatus =
  | 'PAUSED'
  | 'ALREADY_PAUSED'
  | 'RESUMED'
  | 'NOT_PAUSED'
  | 'STOP_REQUESTED'
  | 'NOT_ACTIVE';

export interface ControlResult {
  status: ControlStatus;
  message: string;
}

// ═══════════════════════════════════════════════════════════════
// STREAM MESSAGES
// ═══════════════════════════════════════════════════════════════

export type StopReason = CompletionReason | 'DIVERGED' | 'FAILED' | 'STOPPED';

export interface EpochMessage extends EpochResult {
  type: 'epoch';
  originalTheta0: number;
  originalTheta1: number;
}

export type ReferenceComparison =
  | { status: 'success'; results: ReferenceFitResult }
  | { status: 'failed'; error: string };

export interface CompletionMessage {
  type: 'complete';
  sessionId: string;
  trainingComplete: true;
  stopReason: StopReason;
  diverged: boolean;
  epochsRun: number;
  finalTheta0: number;
  finalTheta1: number;
  equation: string;
  testMse: number | null;   // null when the held-out predictions overflow
  testR2: number | null;
  xRange: [number, number];
  yRange: [number, number];
  finalRmse: number;
  finalMae: number;
  finalR2: number;
  modelSummary: ModelSummary;
  referenceComparison: ReferenceComparison;
}

export interface ErrorMessage {
  type: 'error';
  error: true;
  message: string;
}

export type TrainingMessage = EpochMessage | CompletionMessage | ErrorMessage;
