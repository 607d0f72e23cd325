/**
 * Running Variance (Welford)
 *
 * `get()` is `m2 / (n - ddof)` once more than `ddof` observations are
 * incorporated, 0 before that. `ddof = 1` gives the sample variance.
 */

import type { Revertible, SerializableEstimator, Univariate, VarianceState } from '@rollstat/types';
import { DEFAULT_DDOF, DdofSchema, VarianceStateSchema } from '@rollstat/config';
import { ErrorCode, InvariantError, failure, success } from '../error-handling';
import type { Result } from '../error-handling';
import { parseOrThrow } from '../validation/estimator-validators';

export class Variance implements Univariate, Revertible, SerializableEstimator<'variance'> {
  readonly kind = 'variance' as const;
  readonly ddof: number;

  private mean = 0;
  private count = 0;
  private m2 = 0;

  /**
   * @param ddof - Delta degrees of freedom
   * @throws ValidationError if ddof is not a non-negative integer
   */
  constructor(ddof: number = DEFAULT_DDOF) {
    this.ddof = parseOrThrow(DdofSchema, ddof, 'ddof', ErrorCode.INVALID_ARGUMENT);
  }

  get n(): number {
    return this.count;
  }

  update(x: number): void {
    this.count += 1;
    const delta = x - this.mean;
    this.mean += delta / this.count;
    this.m2 += delta * (x - this.mean);
  }

  get(): number {
    return this.count > this.ddof ? this.m2 / (this.count - this.ddof) : 0;
  }

  /**
   * Inverse Welford step. Fails without touching state when empty.
   */
  revert(x: number): Result<void> {
    if (this.count === 0) {
      return failure(
        new InvariantError('Cannot revert from an empty Variance', 'Variance', { code: ErrorCode.EMPTY_WINDOW })
      );
    }
    if (this.count === 1) {
      this.count = 0;
      this.mean = 0;
      this.m2 = 0;
      return success(undefined);
    }

    const mean = this.mean - (x - this.mean) / (this.count - 1);
    // Rounding can push m2 slightly below zero when the window collapses to equal values
    this.m2 = Math.max(this.m2 - (x - this.mean) * (x - mean), 0);
    this.mean = mean;
    this.count -= 1;
    return success(undefined);
  }

  toJSON(): VarianceState {
    return { mean: this.mean, count: this.count, m2: this.m2, ddof: this.ddof };
  }

  static fromState(raw: unknown): Variance {
    const state = parseOrThrow(VarianceStateSchema, raw, 'Variance state');
    const estimator = new Variance(state.ddof);
    estimator.mean = state.mean;
    estimator.count = state.count;
    estimator.m2 = state.m2;
    return estimator;
  }
}
