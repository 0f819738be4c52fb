/**
 * REGRESSION — Metrics Tracker
 *
 * RMSE / MAE / R² on the original scale, one history entry per epoch.
 * One tracker per trainer; a new run on a new trainer starts empty.
 */

import { ComputationError } from '../../common/errors.js';
import { assertFiniteArray, mean } from './regression.normalizer.js';
import type {
  EpochMetrics,
  MetricStat,
  MetricsSummary,
  RegressionMetrics,
} from './regression.types.js';

/**
 * R² is reported as 0 when the target is constant (SS_tot = 0).
 */
export function computeRegressionMetrics(
  yTrue: readonly unknown[],
  yPred: readonly unknown[]
): RegressionMetrics {
  assertFiniteArray(yTrue, 'yTrue');
  assertFiniteArray(yPred, 'yPred');
  if (yTrue.length !== yPred.length) {
    throw new ComputationError(`yTrue and yPred length mismatch: ${yTrue.length} vs ${yPred.length}`);
  }

  const n = yTrue.length;
  const yBar = mean(yTrue);
  let sq = 0;
  let abs = 0;
  let ssTot = 0;

  for (let i = 0; i < n; i++) {
    const err = yTrue[i] - yPred[i];
    sq += err * err;
    abs += Math.abs(err);
    ssTot += (yTrue[i] - yBar) ** 2;
  }

  return {
    rmse: Math.sqrt(sq / n),
    mae: abs / n,
    r2: ssTot === 0 ? 0 : 1 - sq / ssTot,
  };
}

const METRIC_KEYS = ['rmse', 'mae', 'r2'] as const;

export class MetricsTracker {
  private readonly entries: EpochMetrics[] = [];

  record(yTrue: readonly unknown[], yPred: readonly unknown[], epoch: number): RegressionMetrics {
    const metrics = computeRegressionMetrics(yTrue, yPred);
    this.entries.push({ ...metrics, epoch });
    return metrics;
  }

  latest(): EpochMetrics | null {
    const last = this.entries[this.entries.length - 1];
    return last ? { ...last } : null;
  }

  history(): EpochMetrics[] {
    return this.entries.map((e) => ({ ...e }));
  }

  summary(): MetricsSummary | null {
    if (this.entries.length === 0) return null;

    const stat = (key: (typeof METRIC_KEYS)[number]): MetricStat => {
      const values = this.entries.map((e) => e[key]);
      const first = values[0];
      const current = values[values.length - 1];
      return {
        min: values.reduce((a, b) => Math.min(a, b), Infinity),
        max: values.reduce((a, b) => Math.max(a, b), -Infinity),
        current,
        improvement: values.length > 1 ? first - current : 0,
      };
    };

    return { rmse: stat('rmse'), mae: stat('mae'), r2: stat('r2') };
  }
}
