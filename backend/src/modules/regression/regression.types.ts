/**
 * REGRESSION — Types
 *
 * Univariate linear model y = θ0 + θ1·x fitted by batch gradient descent
 * in z-score space. θ values named "normalized" live in that space,
 * everything else is on the original measurement scale.
 */

// ═══════════════════════════════════════════════════════════════
// DATA
// ═══════════════════════════════════════════════════════════════

export interface Dataset {
  x: number[];
  y: number[];
}

export interface TrainTestSplit {
  xTrain: number[];
  yTrain: number[];
  xTest: number[];
  yTest: number[];
}

export interface NormalizationStats {
  xMean: number;
  xStd: number;    // never 0, constant columns get 1.0
  yMean: number;
  yStd: number;
}

// ═══════════════════════════════════════════════════════════════
// PARAMETERS
// ═══════════════════════════════════════════════════════════════

export interface Parameters {
  theta0: number;
  theta1: number;
}

export type Gradients = [g0: number, g1: number];

// ═══════════════════════════════════════════════════════════════
// METRICS
// ═══════════════════════════════════════════════════════════════

export interface RegressionMetrics {
  rmse: number;
  mae: number;
  r2: number;
}

export interface EpochMetrics extends RegressionMetrics {
  epoch: number;
}

export interface MetricStat {
  min: number;
  max: number;
  current: number;
  improvement: number;   // first - last
}

export interface MetricsSummary {
  rmse: MetricStat;
  mae: MetricStat;
  r2: MetricStat;
}

// ═══════════════════════════════════════════════════════════════
// TRAINING
// ═══════════════════════════════════════════════════════════════

export interface EpochOptions {
  learningRate: number;
  maxEpochs: number;
  tolerance: number;
  earlyStopping: boolean;
}

export interface EpochResult {
  epoch: number;           // 1-based
  maxEpochs: number;
  theta0: number;          // normalized
  theta1: number;          // normalized
  cost: number;            // normalized-space J(θ) before this epoch's update
  costChange: number;
  converged: boolean;
  isComplete: boolean;
  rmse: number;
  mae: number;
  r2: number;
}

export type CompletionReason = 'MAX_EPOCHS' | 'CONVERGED' | 'EARLY_STOPPED';

/**
 * Return value of the epoch generator. Tells the consumer why the
 * sequence ended, which the yielded results alone cannot.
 */
export type TrainingOutcome =
  | { status: 'COMPLETED'; reason: CompletionReason; epochs: number }
  | { status: 'DIVERGED'; epochs: number }
  | { status: 'FAILED'; epochs: number; error: string };

export interface ModelSummary {
  normalizedTheta0: number;
  normalizedTheta1: number;
  originalTheta0: number;
  originalTheta1: number;
  equationNormalized: string;
  equationOriginal: string;
  trainingExamples: number;
  finalCost: number | null;   // null when the cost overflows
  metricsSummary: MetricsSummary | null;
}

// ═══════════════════════════════════════════════════════════════
// REFERENCE FIT
// ═══════════════════════════════════════════════════════════════

export interface ReferenceFitResult {
  intercept: number;
  slope: number;
  predictions: number[];
  metrics: RegressionMetrics;
  equation: string;
}
