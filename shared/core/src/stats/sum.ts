/**
 * Running Sum
 */

import type { Revertible, SerializableEstimator, SumState, Univariate } from '@rollstat/types';
import { SumStateSchema } from '@rollstat/config';
import { success } from '../error-handling';
import type { Result } from '../error-handling';
import { parseOrThrow } from '../validation/estimator-validators';

export class Sum implements Univariate, Revertible, SerializableEstimator<'sum'> {
  readonly kind = 'sum' as const;
  private sum = 0;

  update(x: number): void {
    this.sum += x;
  }

  get(): number {
    return this.sum;
  }

  revert(x: number): Result<void> {
    this.sum -= x;
    return success(undefined);
  }

  toJSON(): SumState {
    return { sum: this.sum };
  }

  static fromState(raw: unknown): Sum {
    const state = parseOrThrow(SumStateSchema, raw, 'Sum state');
    const estimator = new Sum();
    estimator.sum = state.sum;
    return estimator;
  }
}
