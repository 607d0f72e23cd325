/**
 * Estimator Snapshots
 *
 * Captures an estimator as a tagged `{ kind, state }` record and rebuilds it.
 * A restored estimator fed the rest of a stream reads the same values as one
 * that was never captured.
 *
 * Non-finite values do not survive the JSON text form: JSON.stringify writes
 * them as null, which the state schemas then reject.
 */

import type { EstimatorKind, EstimatorSnapshot, EstimatorStateByKind, SerializableEstimator } from '@rollstat/types';
import { EstimatorSnapshotSchema } from '@rollstat/config';
import { ErrorCode, ValidationError, formatErrorForLog } from '../error-handling';
import { getLogger } from '../logging';
import type { ILogger } from '../logging';
import { parseOrThrow } from '../validation/estimator-validators';
import { Max, Min, RollingMax, RollingMin } from './extrema';
import { IQR, RollingIQR } from './iqr';
import { Mean } from './mean';
import { PeakToPeak, RollingPeakToPeak } from './peak-to-peak';
import { Quantile } from './quantile';
import { Rolling } from './rolling';
import type { RevertibleEstimator } from './rolling';
import { RollingQuantile } from './rolling-quantile';
import { Sum } from './sum';
import { Variance } from './variance';

/**
 * Every estimator that can be captured as a snapshot.
 */
export type SnapshotableEstimator =
  | Quantile
  | RollingQuantile
  | Sum
  | Mean
  | Variance
  | Min
  | Max
  | PeakToPeak
  | RollingMin
  | RollingMax
  | RollingPeakToPeak
  | IQR
  | RollingIQR
  | Rolling<RevertibleEstimator>;

export interface SnapshotOptions {
  /** Receives restore logs. Restored Rolling decorators log through it too. */
  logger?: ILogger;
}

export function snapshotEstimator<K extends EstimatorKind>(
  estimator: SerializableEstimator<K>
): { kind: K; state: EstimatorStateByKind[K] } {
  return { kind: estimator.kind, state: estimator.toJSON() };
}

function rebuild(snapshot: EstimatorSnapshot, logger: ILogger): SnapshotableEstimator {
  switch (snapshot.kind) {
    case 'quantile':
      return Quantile.fromState(snapshot.state);
    case 'rolling-quantile':
      return RollingQuantile.fromState(snapshot.state);
    case 'sum':
      return Sum.fromState(snapshot.state);
    case 'mean':
      return Mean.fromState(snapshot.state);
    case 'variance':
      return Variance.fromState(snapshot.state);
    case 'min':
      return Min.fromState(snapshot.state);
    case 'max':
      return Max.fromState(snapshot.state);
    case 'peak-to-peak':
      return PeakToPeak.fromState(snapshot.state);
    case 'rolling-min':
      return RollingMin.fromState(snapshot.state);
    case 'rolling-max':
      return RollingMax.fromState(snapshot.state);
    case 'rolling-peak-to-peak':
      return RollingPeakToPeak.fromState(snapshot.state);
    case 'iqr':
      return IQR.fromState(snapshot.state);
    case 'rolling-iqr':
      return RollingIQR.fromState(snapshot.state);
    case 'rolling':
      return Rolling.fromState(snapshot.state, { logger });
  }
}

/**
 * Validate a snapshot and rebuild its estimator.
 *
 * @throws ValidationError if the snapshot is malformed
 */
export function restoreEstimator(raw: unknown, options: SnapshotOptions = {}): SnapshotableEstimator {
  const logger = options.logger ?? getLogger('estimator-snapshot');
  try {
    const snapshot = parseOrThrow(EstimatorSnapshotSchema, raw, 'estimator snapshot');
    const estimator = rebuild(snapshot, logger);
    logger.debug('Estimator restored', { kind: snapshot.kind });
    return estimator;
  } catch (error) {
    logger.warn('Estimator restore failed', {
      error: error instanceof Error ? formatErrorForLog(error) : String(error),
    });
    throw error;
  }
}

export function serializeEstimator<K extends EstimatorKind>(estimator: SerializableEstimator<K>): string {
  return JSON.stringify(snapshotEstimator(estimator));
}

/**
 * @throws ValidationError if the text is not JSON or not a valid snapshot
 */
export function deserializeEstimator(text: string, options: SnapshotOptions = {}): SnapshotableEstimator {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError('Estimator snapshot is not valid JSON', {
      code: ErrorCode.SCHEMA_MISMATCH,
      cause: error instanceof Error ? error : undefined,
    });
  }
  return restoreEstimator(raw, options);
}
