/**
 * Running Mean
 *
 * Incremental update, so the mean of a long stream does not go through a
 * large intermediate sum.
 */

import type { MeanState, Revertible, SerializableEstimator, Univariate } from '@rollstat/types';
import { MeanStateSchema } from '@rollstat/config';
import { ErrorCode, InvariantError, failure, success } from '../error-handling';
import type { Result } from '../error-handling';
import { parseOrThrow } from '../validation/estimator-validators';

export class Mean implements Univariate, Revertible, SerializableEstimator<'mean'> {
  readonly kind = 'mean' as const;
  private mean = 0;
  private count = 0;

  /** Number of observations currently incorporated. */
  get n(): number {
    return this.count;
  }

  update(x: number): void {
    this.count += 1;
    this.mean += (x - this.mean) / this.count;
  }

  get(): number {
    return this.mean;
  }

  /**
   * Remove a previously added observation. Fails without touching state
   * when nothing has been added.
   */
  revert(x: number): Result<void> {
    if (this.count === 0) {
      return failure(
        new InvariantError('Cannot revert from an empty Mean', 'Mean', { code: ErrorCode.EMPTY_WINDOW })
      );
    }
    if (this.count === 1) {
      this.count = 0;
      this.mean = 0;
      return success(undefined);
    }
    this.mean -= (x - this.mean) / (this.count - 1);
    this.count -= 1;
    return success(undefined);
  }

  toJSON(): MeanState {
    return { mean: this.mean, count: this.count };
  }

  static fromState(raw: unknown): Mean {
    const state = parseOrThrow(MeanStateSchema, raw, 'Mean state');
    const estimator = new Mean();
    estimator.mean = state.mean;
    estimator.count = state.count;
    return estimator;
  }
}
