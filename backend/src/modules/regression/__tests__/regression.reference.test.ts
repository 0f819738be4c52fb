import { describe, it, expect } from 'vitest';
import { ComputationError } from '../../../common/errors.js';
import { fitReferenceModel } from '../regression.reference.js';

describe('fitReferenceModel', () => {
  it('should recover slope and intercept of an exact line', () => {
    const x = [1, 2, 3, 4, 5];
    const y = x.map((v) => 3 * v + 1);

    const fit = fitReferenceModel(x, y);

    expect(fit.slope).toBeCloseTo(3, 6);
    expect(fit.intercept).toBeCloseTo(1, 6);
    expect(fit.equation).toBe('y = 1.0000 + 3.0000 * x');
    expect(fit.metrics.r2).toBeCloseTo(1, 6);
    fit.predictions.forEach((p, i) => expect(p).toBeCloseTo(y[i], 6));
  });

  it('should reject mismatched input', () => {
    expect(() => fitReferenceModel([1, 2, 3], [1, 2])).toThrow(ComputationError);
    expect(() => fitReferenceModel([], [])).toThrow('x must be a non-empty array');
  });
});
