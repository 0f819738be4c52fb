import { describe, it, expect } from 'vitest';
import { ComputationError } from '../../../common/errors.js';
import { CostGradientEngine } from '../regression.gradient.js';

describe('CostGradientEngine', () => {
  const engine = new CostGradientEngine([1, 2], [1, 3]);

  it('should compute cost and gradients at the origin', () => {
    expect(engine.cost({ theta0: 0, theta1: 0 })).toBe(2.5);
    expect(engine.gradients({ theta0: 0, theta1: 0 })).toEqual([-2, -3.5]);
  });

  it('should compute cost and gradients away from the origin', () => {
    expect(engine.cost({ theta0: 1, theta1: 1 })).toBe(0.25);
    expect(engine.gradients({ theta0: 1, theta1: 1 })).toEqual([0.5, 0.5]);
  });

  it('should be zero at the exact fit', () => {
    expect(engine.cost({ theta0: -1, theta1: 2 })).toBe(0);
    expect(engine.gradients({ theta0: -1, theta1: 2 })).toEqual([0, 0]);
  });

  it('should report its sample count', () => {
    expect(engine.size).toBe(2);
  });

  it('should reject mismatched lengths', () => {
    expect(() => new CostGradientEngine([1, 2, 3], [1, 2])).toThrow('x and y length mismatch: 3 vs 2');
  });

  it('should reject non-finite parameters', () => {
    expect(() => engine.cost({ theta0: NaN, theta1: 0 })).toThrow(ComputationError);
    expect(() => engine.gradients({ theta0: 0, theta1: Infinity })).toThrow('Parameters must be finite');
  });

  it('should fail when the cost overflows', () => {
    expect(() => engine.cost({ theta0: 0, theta1: 1e300 })).toThrow('Cost computation failed: result is not finite');
  });
});
