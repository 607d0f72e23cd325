/**
 * Peak-to-Peak (max - min)
 *
 * Composition of a min and a max tracker, running or rolling.
 */

import type {
  PeakToPeakState,
  RollingPeakToPeakState,
  SerializableEstimator,
  Univariate,
} from '@rollstat/types';
import { PeakToPeakStateSchema, RollingPeakToPeakStateSchema } from '@rollstat/config';
import { ErrorCode, ValidationError } from '../error-handling';
import { parseOrThrow } from '../validation/estimator-validators';
import { Max, Min, RollingMax, RollingMin } from './extrema';

/**
 * @example
 * ```typescript
 * const ptp = new PeakToPeak();
 * for (let i = 1; i < 10; i++) ptp.update(i);
 * ptp.get(); // 8
 * ```
 */
export class PeakToPeak implements Univariate, SerializableEstimator<'peak-to-peak'> {
  readonly kind = 'peak-to-peak' as const;
  private min = new Min();
  private max = new Max();

  update(x: number): void {
    this.min.update(x);
    this.max.update(x);
  }

  get(): number {
    return this.max.get() - this.min.get();
  }

  toJSON(): PeakToPeakState {
    return { min: this.min.toJSON(), max: this.max.toJSON() };
  }

  static fromState(raw: unknown): PeakToPeak {
    const state = parseOrThrow(PeakToPeakStateSchema, raw, 'PeakToPeak state');
    const estimator = new PeakToPeak();
    estimator.min = Min.fromState(state.min);
    estimator.max = Max.fromState(state.max);
    return estimator;
  }
}

/**
 * @example
 * ```typescript
 * const ptp = new RollingPeakToPeak(3);
 * for (let i = 1; i < 10; i++) ptp.update(i);
 * ptp.get(); // 2
 * ```
 */
export class RollingPeakToPeak implements Univariate, SerializableEstimator<'rolling-peak-to-peak'> {
  readonly kind = 'rolling-peak-to-peak' as const;
  private min: RollingMin;
  private max: RollingMax;

  /**
   * @throws ValidationError if windowSize is not a positive integer
   */
  constructor(windowSize: number) {
    this.min = new RollingMin(windowSize);
    this.max = new RollingMax(windowSize);
  }

  get windowSize(): number {
    return this.min.windowSize;
  }

  update(x: number): void {
    this.min.update(x);
    this.max.update(x);
  }

  /**
   * @throws InvariantError before the first observation
   */
  get(): number {
    return this.max.get() - this.min.get();
  }

  toJSON(): RollingPeakToPeakState {
    return { min: this.min.toJSON(), max: this.max.toJSON() };
  }

  static fromState(raw: unknown): RollingPeakToPeak {
    const state = parseOrThrow(RollingPeakToPeakStateSchema, raw, 'RollingPeakToPeak state');
    const min = RollingMin.fromState(state.min);
    const max = RollingMax.fromState(state.max);
    if (min.windowSize !== max.windowSize) {
      throw new ValidationError('Invalid RollingPeakToPeak state: min and max windows differ in size', {
        code: ErrorCode.SCHEMA_MISMATCH,
        field: 'max.sortedWindow.windowSize',
        receivedValue: max.windowSize,
        context: { expected: min.windowSize },
      });
    }

    const estimator = new RollingPeakToPeak(min.windowSize);
    estimator.min = min;
    estimator.max = max;
    return estimator;
  }
}
