/**
 * Seeded Observation Stream Generator
 *
 * Reproducible numeric streams for property tests:
 * - Gaussian noise (Box-Muller)
 * - Gaussian random walk
 * - Uniform values
 * - Streams drawn from a small set of values, to exercise duplicates
 *
 * Every generator is driven by a seeded PRNG so failures can be replayed.
 */

// =============================================================================
// Types
// =============================================================================

export type RandomSource = () => number;

export interface GaussianStreamConfig {
  count: number;
  mean?: number;
  stdDev?: number;
}

export interface UniformStreamConfig {
  count: number;
  min?: number;
  max?: number;
}

export interface RandomWalkConfig {
  count: number;
  start?: number;
  /** Standard deviation of each step */
  stepStdDev?: number;
}

export interface DuplicateStreamConfig {
  count: number;
  /** Number of distinct values the stream draws from */
  distinctValues: number;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * mulberry32: 32-bit seeded PRNG returning values in [0, 1).
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Normally distributed value using the Box-Muller transform.
 */
export function gaussianRandom(random: RandomSource, mean: number, stdDev: number): number {
  // 1 - u keeps the log argument in (0, 1]
  const u1 = 1 - random();
  const u2 = random();
  const z0 = Math.sqrt(-2.0 * Math.log(u1)) * Math.cos(2.0 * Math.PI * u2);
  return mean + z0 * stdDev;
}

// =============================================================================
// StreamGenerator Class
// =============================================================================

/**
 * Usage:
 * ```typescript
 * const generator = new StreamGenerator(42);
 * const noise = generator.gaussian({ count: 500, mean: 10, stdDev: 2 });
 * const ties = generator.withDuplicates({ count: 200, distinctValues: 4 });
 * ```
 */
export class StreamGenerator {
  readonly seed: number;
  private readonly random: RandomSource;

  constructor(seed = 1) {
    this.seed = seed;
    this.random = createSeededRandom(seed);
  }

  gaussian(config: GaussianStreamConfig): number[] {
    const { count, mean = 0, stdDev = 1 } = config;
    return Array.from({ length: count }, () => gaussianRandom(this.random, mean, stdDev));
  }

  uniform(config: UniformStreamConfig): number[] {
    const { count, min = 0, max = 1 } = config;
    return Array.from({ length: count }, () => min + (max - min) * this.random());
  }

  randomWalk(config: RandomWalkConfig): number[] {
    const { count, start = 0, stepStdDev = 1 } = config;
    const values: number[] = [];
    let current = start;
    for (let i = 0; i < count; i++) {
      current += gaussianRandom(this.random, 0, stepStdDev);
      values.push(current);
    }
    return values;
  }

  /**
   * Integers in [0, distinctValues).
   */
  withDuplicates(config: DuplicateStreamConfig): number[] {
    const { count, distinctValues } = config;
    return Array.from({ length: count }, () => Math.floor(this.random() * distinctValues));
  }
}

/**
 * Factory function for consistency with other test-utils.
 */
export function createStreamGenerator(seed?: number): StreamGenerator {
  return new StreamGenerator(seed);
}
