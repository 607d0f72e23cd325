/**
 * Rolling Quantile
 *
 * Quantile of the last `windowSize` observations, read by linear
 * interpolation between two order statistics of a {@link SortedWindow}.
 * O(log n) update, O(1) read.
 */

import type { RollingQuantileState, SerializableEstimator, Univariate } from '@rollstat/types';
import { RollingQuantileStateSchema } from '@rollstat/config';
import { SortedWindow } from '../data-structures/sorted-window';
import { ErrorCode, InvariantError, ValidationError } from '../error-handling';
import { assertQuantile, assertWindowSize, parseOrThrow } from '../validation/estimator-validators';

/**
 * Ranks and weight used to interpolate quantile `q` over `length` sorted values.
 */
export interface InterpolationRanks {
  lower: number;
  higher: number;
  frac: number;
}

/**
 * `higher` is clamped to the last rank, so a single-value window reads
 * rank 0 twice.
 */
export function interpolationRanks(q: number, length: number): InterpolationRanks {
  const idx = q * (length - 1);
  const lower = Math.floor(idx);
  const higher = Math.min(lower + 1, length - 1);
  return { lower, higher, frac: idx - lower };
}

export class RollingQuantile implements Univariate, SerializableEstimator<'rolling-quantile'> {
  readonly kind = 'rolling-quantile' as const;
  readonly q: number;
  readonly windowSize: number;

  private sortedWindow: SortedWindow;
  // Steady-state ranks, valid once the window is full
  private readonly steady: InterpolationRanks;

  /**
   * @throws ValidationError if q is outside [0, 1] or windowSize is not a positive integer
   */
  constructor(q: number, windowSize: number) {
    this.q = assertQuantile(q);
    this.windowSize = assertWindowSize(windowSize);
    this.sortedWindow = new SortedWindow(windowSize);
    this.steady = interpolationRanks(q, windowSize);
  }

  get length(): number {
    return this.sortedWindow.length;
  }

  /**
   * @throws InvariantError on NaN (window unchanged)
   */
  update(x: number): void {
    this.sortedWindow.pushBack(x);
  }

  /**
   * @throws InvariantError if no observation has been seen
   */
  get(): number {
    const { lower, higher, frac } = this.prepare();
    const low = this.sortedWindow.at(lower);
    return low + (this.sortedWindow.at(higher) - low) * frac;
  }

  private prepare(): InterpolationRanks {
    const length = this.sortedWindow.length;
    if (length === 0) {
      throw new InvariantError('RollingQuantile has no observations', 'RollingQuantile', {
        code: ErrorCode.EMPTY_WINDOW,
      });
    }
    return length < this.windowSize ? interpolationRanks(this.q, length) : this.steady;
  }

  toJSON(): RollingQuantileState {
    return {
      sortedWindow: this.sortedWindow.toJSON(),
      q: this.q,
      windowSize: this.windowSize,
      ...this.steady,
    };
  }

  /**
   * @throws ValidationError if the state is malformed or its cached ranks
   *   do not belong to its q and window size
   */
  static fromState(raw: unknown): RollingQuantile {
    const state = parseOrThrow(RollingQuantileStateSchema, raw, 'RollingQuantile state');
    const estimator = new RollingQuantile(state.q, state.windowSize);

    const { lower, higher, frac } = estimator.steady;
    if (state.lower !== lower || state.higher !== higher || state.frac !== frac) {
      throw new ValidationError('Invalid RollingQuantile state: interpolation ranks do not match q and windowSize', {
        code: ErrorCode.SCHEMA_MISMATCH,
        field: 'lower',
        receivedValue: { lower: state.lower, higher: state.higher, frac: state.frac },
        context: { expected: { lower, higher, frac } },
      });
    }

    estimator.sortedWindow = SortedWindow.fromState(state.sortedWindow);
    return estimator;
  }
}
