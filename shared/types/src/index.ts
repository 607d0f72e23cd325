export type {
  Univariate,
  Revertible,
  RevertResult,
  RollableUnivariate,
} from './statistics';

export type {
  QuantileState,
  SortedWindowState,
  RollingQuantileState,
  SumState,
  MeanState,
  VarianceState,
  MinState,
  MaxState,
  PeakToPeakState,
  RollingMinState,
  RollingMaxState,
  RollingPeakToPeakState,
  IQRState,
  RollingIQRState,
  RevertibleSnapshot,
  RollingState,
  EstimatorStateByKind,
  EstimatorKind,
  EstimatorSnapshot,
  SerializableEstimator,
} from './estimator-state';
