/**
 * REGRESSION — Normalizer
 *
 * Z-score statistics for x and y, frozen at construction.
 * Training happens on normalized values; predictions and fitted
 * parameters are mapped back to original units for the caller.
 */

import { ComputationError } from '../../common/errors.js';
import type { NormalizationStats, Parameters } from './regression.types.js';

export function assertFiniteArray(values: readonly unknown[], label: string): asserts values is number[] {
  if (!Array.isArray(values) || values.length === 0) {
    throw new ComputationError(`${label} must be a non-empty array`);
  }
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      throw new ComputationError(`${label}[${i}] is not a finite number`);
    }
  }
}

export function mean(values: number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Population standard deviation (divides by n). */
export function std(values: number[], mu = mean(values)): number {
  let sq = 0;
  for (const v of values) sq += (v - mu) ** 2;
  return Math.sqrt(sq / values.length);
}

export class Normalizer {
  private readonly xMean: number;
  private readonly xStd: number;
  private readonly yMean: number;
  private readonly yStd: number;

  constructor(x: readonly unknown[], y: readonly unknown[]) {
    assertFiniteArray(x, 'x');
    assertFiniteArray(y, 'y');

    this.xMean = mean(x);
    this.yMean = mean(y);

    const xStd = std(x, this.xMean);
    const yStd = std(y, this.yMean);
    this.xStd = xStd === 0 ? 1.0 : xStd;
    this.yStd = yStd === 0 ? 1.0 : yStd;
  }

  get stats(): NormalizationStats {
    return { xMean: this.xMean, xStd: this.xStd, yMean: this.yMean, yStd: this.yStd };
  }

  normalize(x: readonly unknown[], y: readonly unknown[]): [number[], number[]] {
    return [this.normalizeInput(x), this.scale(y, this.yMean, this.yStd, 'y')];
  }

  normalizeInput(x: readonly unknown[]): number[] {
    return this.scale(x, this.xMean, this.xStd, 'x');
  }

  denormalizePredictions(yNorm: readonly unknown[]): number[] {
    assertFiniteArray(yNorm, 'predictions');
    return yNorm.map((v) => v * this.yStd + this.yMean);
  }

  /**
   * Closed-form inverse of the z-score transform for a line.
   * θ1 first: θ0 depends on the rescaled slope.
   */
  toOriginalScale(theta0Norm: number, theta1Norm: number): Parameters {
    const theta1 = theta1Norm * (this.yStd / this.xStd);
    const theta0 = theta0Norm * this.yStd + this.yMean - theta1 * this.xMean;
    return { theta0, theta1 };
  }

  private scale(values: readonly unknown[], mu: number, sigma: number, label: string): number[] {
    assertFiniteArray(values, label);
    return values.map((v) => (v - mu) / sigma);
  }
}
