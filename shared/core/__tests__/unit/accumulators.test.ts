/**
 * Accumulator Unit Tests
 *
 * Sum, Mean, Variance, Min, Max and their rolling extrema.
 */

import { describe, it, expect } from '@jest/globals';

import { Sum } from '../../src/stats/sum';
import { Mean } from '../../src/stats/mean';
import { Variance } from '../../src/stats/variance';
import { Max, Min, RollingMax, RollingMin } from '../../src/stats/extrema';
import { ErrorCode, InvariantError, ValidationError } from '../../src/error-handling';

describe('Sum', () => {
  it('should add and revert', () => {
    const sum = new Sum();
    sum.update(3);
    sum.update(4.5);
    expect(sum.get()).toBe(7.5);

    expect(sum.revert(3)).toEqual({ success: true, data: undefined });
    expect(sum.get()).toBe(4.5);
  });

  it('should round-trip its state', () => {
    const sum = new Sum();
    sum.update(2);
    expect(Sum.fromState(sum.toJSON()).get()).toBe(2);
  });
});

describe('Mean', () => {
  it('should average incrementally', () => {
    const mean = new Mean();
    for (const x of [2, 4, 6]) mean.update(x);

    expect(mean.get()).toBe(4);
    expect(mean.n).toBe(3);
  });

  it('should revert to the mean of the remaining values', () => {
    const mean = new Mean();
    for (const x of [2, 4, 6]) mean.update(x);

    expect(mean.revert(2).success).toBe(true);
    expect(mean.get()).toBe(5);
    expect(mean.n).toBe(2);
  });

  it('should reset when the last value is reverted', () => {
    const mean = new Mean();
    mean.update(9);
    mean.revert(9);

    expect(mean.toJSON()).toEqual({ mean: 0, count: 0 });
  });

  it('should fail to revert when empty and keep its state', () => {
    const mean = new Mean();
    const result = mean.revert(1);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(InvariantError);
      expect(result.error.code).toBe(ErrorCode.EMPTY_WINDOW);
    }
    expect(mean.toJSON()).toEqual({ mean: 0, count: 0 });
  });
});

describe('Variance', () => {
  const data = [2, 4, 4, 4, 5, 5, 7, 9];

  it('should compute the sample variance by default', () => {
    const variance = new Variance();
    for (const x of data) variance.update(x);

    expect(variance.ddof).toBe(1);
    expect(variance.get()).toBeCloseTo(32 / 7, 10);
  });

  it('should compute the population variance with ddof 0', () => {
    const variance = new Variance(0);
    for (const x of data) variance.update(x);

    expect(variance.get()).toBeCloseTo(4, 10);
  });

  it('should read 0 until more than ddof values are seen', () => {
    const variance = new Variance(1);
    expect(variance.get()).toBe(0);
    variance.update(10);
    expect(variance.get()).toBe(0);
  });

  it('should revert to the variance of the remaining values', () => {
    const variance = new Variance();
    for (const x of data) variance.update(x);
    variance.revert(2);

    // remaining [4, 4, 4, 5, 5, 7, 9]: mean 38/7
    const expected = [4, 4, 4, 5, 5, 7, 9].reduce((acc, x) => acc + (x - 38 / 7) ** 2, 0) / 6;
    expect(variance.get()).toBeCloseTo(expected, 10);
    expect(variance.n).toBe(7);
  });

  it('should never go negative when reverting down to equal values', () => {
    const variance = new Variance();
    for (const x of [0.1, 0.1, 0.3]) variance.update(x);
    variance.revert(0.1);
    variance.revert(0.1);

    expect(variance.get()).toBe(0);
    expect(variance.toJSON().m2).toBeGreaterThanOrEqual(0);
  });

  it('should fail to revert when empty', () => {
    expect(new Variance().revert(1).success).toBe(false);
  });

  it.each([-1, 0.5])('should reject ddof %p', (ddof) => {
    expect(() => new Variance(ddof)).toThrow(ValidationError);
  });
});

describe('Min / Max', () => {
  it('should start at the extreme finite values', () => {
    expect(new Min().get()).toBe(Number.MAX_VALUE);
    expect(new Max().get()).toBe(-Number.MAX_VALUE);
  });

  it('should track extrema', () => {
    const min = new Min();
    const max = new Max();
    for (const x of [3, -2, 8, 1]) {
      min.update(x);
      max.update(x);
    }

    expect(min.get()).toBe(-2);
    expect(max.get()).toBe(8);
    expect(Min.fromState(min.toJSON()).get()).toBe(-2);
    expect(Max.fromState(max.toJSON()).get()).toBe(8);
  });
});

describe('RollingMin / RollingMax', () => {
  it('should forget values that left the window', () => {
    const min = new RollingMin(2);
    const max = new RollingMax(2);
    for (const x of [1, 9, 5, 6]) {
      min.update(x);
      max.update(x);
    }

    expect(min.get()).toBe(5);
    expect(max.get()).toBe(6);
    expect(min.windowSize).toBe(2);
  });

  it('should throw before the first observation', () => {
    expect(() => new RollingMin(3).get()).toThrow(InvariantError);
    expect(() => new RollingMax(3).get()).toThrow(InvariantError);
  });

  it('should reject window size 0', () => {
    expect(() => new RollingMin(0)).toThrow(ValidationError);
  });

  it('should round-trip its window', () => {
    const max = new RollingMax(3);
    for (const x of [4, 8, 2]) max.update(x);
    const restored = RollingMax.fromState(max.toJSON());

    restored.update(1);
    expect(restored.get()).toBe(8);
    restored.update(1);
    expect(restored.get()).toBe(2);
  });
});
