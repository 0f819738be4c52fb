/**
 * REGRESSION — Cost & Gradient Engine
 *
 * h(x) = θ0 + θ1·x over an implicit design matrix [1, x].
 *   J(θ)   = (1/2m) Σ (h(x_i) − y_i)²
 *   ∂J/∂θ0 = (1/m)  Σ (h(x_i) − y_i)
 *   ∂J/∂θ1 = (1/m)  Σ (h(x_i) − y_i)·x_i
 *
 * Expects normalized data. Holds no state besides the data itself.
 */

import { ComputationError } from '../../common/errors.js';
import { assertFiniteArray } from './regression.normalizer.js';
import type { Gradients, Parameters } from './regression.types.js';

export class CostGradientEngine {
  private readonly x: number[];
  private readonly y: number[];
  private readonly m: number;

  constructor(x: readonly unknown[], y: readonly unknown[]) {
    assertFiniteArray(x, 'x');
    assertFiniteArray(y, 'y');
    if (x.length !== y.length) {
      throw new ComputationError(`x and y length mismatch: ${x.length} vs ${y.length}`);
    }
    this.x = [...x];
    this.y = [...y];
    this.m = x.length;
  }

  get size(): number {
    return this.m;
  }

  cost(theta: Parameters): number {
    assertFiniteTheta(theta);
    let sum = 0;
    for (let i = 0; i < this.m; i++) {
      const err = theta.theta0 + theta.theta1 * this.x[i] - this.y[i];
      sum += err * err;
    }
    const cost = sum / (2 * this.m);
    if (!Number.isFinite(cost)) {
      throw new ComputationError('Cost computation failed: result is not finite');
    }
    return cost;
  }

  gradients(theta: Parameters): Gradients {
    assertFiniteTheta(theta);
    let g0 = 0;
    let g1 = 0;
    for (let i = 0; i < this.m; i++) {
      const err = theta.theta0 + theta.theta1 * this.x[i] - this.y[i];
      g0 += err;
      g1 += err * this.x[i];
    }
    g0 /= this.m;
    g1 /= this.m;
    if (!Number.isFinite(g0) || !Number.isFinite(g1)) {
      throw new ComputationError('Gradient computation failed: result is not finite');
    }
    return [g0, g1];
  }
}

function assertFiniteTheta(theta: Parameters): void {
  if (!Number.isFinite(theta.theta0) || !Number.isFinite(theta.theta1)) {
    throw new ComputationError('Parameters must be finite');
  }
}
