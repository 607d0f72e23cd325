/**
 * Estimators
 */

export { Quantile } from './quantile';
export { RollingQuantile, interpolationRanks } from './rolling-quantile';
export type { InterpolationRanks } from './rolling-quantile';
export { Rolling } from './rolling';
export type { RevertibleEstimator, RollingOptions } from './rolling';

export { Sum } from './sum';
export { Mean } from './mean';
export { Variance } from './variance';
export { Min, Max, RollingMin, RollingMax } from './extrema';
export { PeakToPeak, RollingPeakToPeak } from './peak-to-peak';
export { IQR, RollingIQR } from './iqr';

export { createEstimator, tryCreateEstimator } from './estimator-factory';
export type { Estimator, EstimatorFactoryOptions } from './estimator-factory';

export {
  snapshotEstimator,
  restoreEstimator,
  serializeEstimator,
  deserializeEstimator,
} from './estimator-snapshot';
export type { SnapshotableEstimator, SnapshotOptions } from './estimator-snapshot';
