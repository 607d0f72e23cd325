/**
 * Stream Generator Unit Tests
 */

import { describe, it, expect } from '@jest/globals';

import { StreamGenerator, createSeededRandom, createStreamGenerator } from '../../src/generators';

describe('createSeededRandom', () => {
  it('should be reproducible for a seed', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);

    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it('should differ across seeds', () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
  });

  it('should stay in [0, 1)', () => {
    const random = createSeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('StreamGenerator', () => {
  it('should replay the same stream for the same seed', () => {
    expect(new StreamGenerator(5).gaussian({ count: 20 })).toEqual(
      createStreamGenerator(5).gaussian({ count: 20 })
    );
  });

  it('should centre gaussian values on the mean', () => {
    const values = new StreamGenerator(3).gaussian({ count: 4000, mean: 10, stdDev: 2 });
    const mean = values.reduce((acc, x) => acc + x, 0) / values.length;

    expect(values).toHaveLength(4000);
    expect(Math.abs(mean - 10)).toBeLessThan(0.2);
    expect(values.every(Number.isFinite)).toBe(true);
  });

  it('should keep uniform values in range', () => {
    const values = new StreamGenerator(3).uniform({ count: 500, min: -2, max: 2 });
    expect(values.every((x) => x >= -2 && x < 2)).toBe(true);
  });

  it('should draw duplicates from a small set', () => {
    const values = new StreamGenerator(9).withDuplicates({ count: 300, distinctValues: 3 });
    expect(new Set(values).size).toBeLessThanOrEqual(3);
    expect(values.every((x) => Number.isInteger(x) && x >= 0 && x < 3)).toBe(true);
  });

  it('should accumulate random walk steps', () => {
    const values = new StreamGenerator(2).randomWalk({ count: 50, start: 100, stepStdDev: 0 });
    expect(values).toEqual(new Array(50).fill(100));
  });
});
