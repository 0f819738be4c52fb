/**
 * REGRESSION — Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import { ComputationError } from '../../../common/errors.js';
import { Normalizer, mean, std } from '../regression.normalizer.js';

describe('Normalizer', () => {
  const x = [1, 2, 3, 4, 5];
  const y = [2, 4, 6, 8, 10];

  it('should compute population statistics', () => {
    const { stats } = new Normalizer(x, y);

    expect(stats.xMean).toBe(3);
    expect(stats.xStd).toBeCloseTo(Math.SQRT2, 12);
    expect(stats.yMean).toBe(6);
    expect(stats.yStd).toBeCloseTo(2 * Math.SQRT2, 12);
  });

  it('should round-trip y through normalize and denormalize', () => {
    const normalizer = new Normalizer(x, y);
    const [, yNorm] = normalizer.normalize(x, y);
    const restored = normalizer.denormalizePredictions(yNorm);

    restored.forEach((v, i) => expect(v).toBeCloseTo(y[i], 10));
  });

  it('should produce zero-mean normalized values', () => {
    const normalizer = new Normalizer(x, y);
    const [xNorm, yNorm] = normalizer.normalize(x, y);

    expect(mean(xNorm)).toBeCloseTo(0, 12);
    expect(mean(yNorm)).toBeCloseTo(0, 12);
    expect(std(xNorm)).toBeCloseTo(1, 12);
  });

  it('should treat a constant column as unit deviation', () => {
    const normalizer = new Normalizer(x, [5, 5, 5, 5, 5]);
    const [, yNorm] = normalizer.normalize(x, [5, 5, 5, 5, 5]);

    expect(normalizer.stats.yStd).toBe(1);
    expect(yNorm).toEqual([0, 0, 0, 0, 0]);
  });

  it('should map normalized parameters back to original units', () => {
    const normalizer = new Normalizer(x, y);
    const { theta0, theta1 } = normalizer.toOriginalScale(0, 1);

    expect(theta1).toBeCloseTo(2, 12);
    expect(theta0).toBeCloseTo(0, 12);
  });

  it('should agree with denormalized predictions for any parameters', () => {
    const normalizer = new Normalizer(x, y);
    const t0n = 0.3;
    const t1n = -0.7;
    const { theta0, theta1 } = normalizer.toOriginalScale(t0n, t1n);

    const viaNormalized = normalizer.denormalizePredictions(
      normalizer.normalizeInput([7]).map((v) => t0n + t1n * v)
    );
    expect(theta0 + theta1 * 7).toBeCloseTo(viaNormalized[0], 10);
  });

  it('should reject empty and non-finite input', () => {
    expect(() => new Normalizer([], [])).toThrow(ComputationError);
    expect(() => new Normalizer([1, NaN], [1, 2])).toThrow('x[1] is not a finite number');
    expect(() => new Normalizer([1, 2], [1, Infinity])).toThrow('y[1] is not a finite number');
  });
});
