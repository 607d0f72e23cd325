/**
 * Interquartile Range
 *
 * Difference between an upper and a lower quantile, running (two P²
 * estimators) or rolling (two rolling quantiles). Defaults to Q3 - Q1.
 */

import type { IQRState, RollingIQRState, SerializableEstimator, Univariate } from '@rollstat/types';
import { DEFAULT_IQR_LOWER, DEFAULT_IQR_UPPER, IQRStateSchema, RollingIQRStateSchema } from '@rollstat/config';
import { ErrorCode, ValidationError } from '../error-handling';
import { assertQuantile, parseOrThrow } from '../validation/estimator-validators';
import { Quantile } from './quantile';
import { RollingQuantile } from './rolling-quantile';

function assertQuantileOrder(qInf: number, qSup: number): void {
  assertQuantile(qInf, 'qInf');
  assertQuantile(qSup, 'qSup');
  if (qInf >= qSup) {
    throw new ValidationError(`qInf (${qInf}) must be below qSup (${qSup})`, {
      code: ErrorCode.INVALID_ARGUMENT,
      field: 'qInf',
      receivedValue: qInf,
      context: { qSup },
    });
  }
}

export class IQR implements Univariate, SerializableEstimator<'iqr'> {
  readonly kind = 'iqr' as const;
  private qInf: Quantile;
  private qSup: Quantile;

  /**
   * @throws ValidationError if either quantile is outside [0, 1] or qInf >= qSup
   */
  constructor(qInf: number = DEFAULT_IQR_LOWER, qSup: number = DEFAULT_IQR_UPPER) {
    assertQuantileOrder(qInf, qSup);
    this.qInf = new Quantile(qInf);
    this.qSup = new Quantile(qSup);
  }

  update(x: number): void {
    this.qInf.update(x);
    this.qSup.update(x);
  }

  get(): number {
    return this.qSup.get() - this.qInf.get();
  }

  toJSON(): IQRState {
    return { qInf: this.qInf.toJSON(), qSup: this.qSup.toJSON() };
  }

  static fromState(raw: unknown): IQR {
    const state = parseOrThrow(IQRStateSchema, raw, 'IQR state');
    const estimator = new IQR(state.qInf.q, state.qSup.q);
    estimator.qInf = Quantile.fromState(state.qInf);
    estimator.qSup = Quantile.fromState(state.qSup);
    return estimator;
  }
}

export class RollingIQR implements Univariate, SerializableEstimator<'rolling-iqr'> {
  readonly kind = 'rolling-iqr' as const;
  private qInf: RollingQuantile;
  private qSup: RollingQuantile;

  /**
   * @throws ValidationError on an invalid quantile pair or window size
   */
  constructor(qInf: number, qSup: number, windowSize: number) {
    assertQuantileOrder(qInf, qSup);
    this.qInf = new RollingQuantile(qInf, windowSize);
    this.qSup = new RollingQuantile(qSup, windowSize);
  }

  get windowSize(): number {
    return this.qInf.windowSize;
  }

  update(x: number): void {
    this.qInf.update(x);
    this.qSup.update(x);
  }

  get(): number {
    return this.qSup.get() - this.qInf.get();
  }

  toJSON(): RollingIQRState {
    return { qInf: this.qInf.toJSON(), qSup: this.qSup.toJSON() };
  }

  static fromState(raw: unknown): RollingIQR {
    const state = parseOrThrow(RollingIQRStateSchema, raw, 'RollingIQR state');
    if (state.qInf.windowSize !== state.qSup.windowSize) {
      throw new ValidationError('Invalid RollingIQR state: quantile windows differ in size', {
        code: ErrorCode.SCHEMA_MISMATCH,
        field: 'qSup.windowSize',
        receivedValue: state.qSup.windowSize,
        context: { expected: state.qInf.windowSize },
      });
    }
    const estimator = new RollingIQR(state.qInf.q, state.qSup.q, state.qInf.windowSize);
    estimator.qInf = RollingQuantile.fromState(state.qInf);
    estimator.qSup = RollingQuantile.fromState(state.qSup);
    return estimator;
  }
}
