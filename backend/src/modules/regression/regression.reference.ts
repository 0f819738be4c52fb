/**
 * REGRESSION — Reference Fit
 *
 * Closed-form least squares on the full dataset, used to check the
 * gradient-descent result against an independent solver.
 */

import * as mlrModule from 'ml-regression-multivariate-linear';
import { ComputationError } from '../../common/errors.js';
import { computeRegressionMetrics } from './regression.metrics.js';
import { assertFiniteArray } from './regression.normalizer.js';
import { formatEquation } from './regression.trainer.js';
import type { ReferenceFitResult } from './regression.types.js';

// CommonJS package: under NodeNext the class is the namespace's default export
const MultivariateLinearRegression = mlrModule.default;

export function fitReferenceModel(x: readonly unknown[], y: readonly unknown[]): ReferenceFitResult {
  assertFiniteArray(x, 'x');
  assertFiniteArray(y, 'y');
  if (x.length !== y.length) {
    throw new ComputationError(`x and y length mismatch: ${x.length} vs ${y.length}`);
  }

  const mlr = new MultivariateLinearRegression(
    x.map((v) => [v]),
    y.map((v) => [v]),
    { intercept: true, statistics: false }
  );

  // weights: one row per feature, intercept row last
  const slope = mlr.weights[0]?.[0];
  const intercept = mlr.weights[1]?.[0];
  if (
    slope === undefined || intercept === undefined ||
    !Number.isFinite(slope) || !Number.isFinite(intercept)
  ) {
    throw new ComputationError('Reference fit produced no finite coefficients');
  }

  const predictions = x.map((v) => intercept + slope * v);

  return {
    intercept,
    slope,
    predictions,
    metrics: computeRegressionMetrics(y, predictions),
    equation: formatEquation(intercept, slope),
  };
}
