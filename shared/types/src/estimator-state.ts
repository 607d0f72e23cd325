/**
 * Serialized Estimator State
 *
 * Plain records describing the full internal state of each estimator.
 * Restoring an estimator from one of these and continuing the same stream
 * yields the same `get()` values as never having serialized it.
 */

// =============================================================================
// Core estimators
// =============================================================================

export interface QuantileState {
  q: number;
  /** Fixed per-update increments of the marker targets. */
  desiredMarkerPosition: number[];
  /** Real-valued marker targets, advanced every update. */
  markerPosition: number[];
  /** Actual integer ranks of the five markers. */
  position: number[];
  /** Marker heights; `heights[2]` is the estimate once sorted. */
  heights: number[];
  heightsSorted: boolean;
}

export interface SortedWindowState {
  /** Held values in ascending order. */
  sortedWindow: number[];
  /** Held values in insertion order, oldest first. */
  unsortedWindow: number[];
  windowSize: number;
}

export interface RollingQuantileState {
  sortedWindow: SortedWindowState;
  q: number;
  windowSize: number;
  lower: number;
  higher: number;
  frac: number;
}

// =============================================================================
// Accumulators
// =============================================================================

export interface SumState {
  sum: number;
}

export interface MeanState {
  mean: number;
  count: number;
}

export interface VarianceState {
  mean: number;
  count: number;
  /** Sum of squared deviations from the mean. */
  m2: number;
  ddof: number;
}

export interface MinState {
  min: number;
}

export interface MaxState {
  max: number;
}

export interface PeakToPeakState {
  min: MinState;
  max: MaxState;
}

export interface RollingMinState {
  sortedWindow: SortedWindowState;
}

export interface RollingMaxState {
  sortedWindow: SortedWindowState;
}

export interface RollingPeakToPeakState {
  min: RollingMinState;
  max: RollingMaxState;
}

export interface IQRState {
  qInf: QuantileState;
  qSup: QuantileState;
}

export interface RollingIQRState {
  qInf: RollingQuantileState;
  qSup: RollingQuantileState;
}

/**
 * Snapshot of a statistic the rolling decorator can wrap.
 */
export type RevertibleSnapshot =
  | { kind: 'sum'; state: SumState }
  | { kind: 'mean'; state: MeanState }
  | { kind: 'variance'; state: VarianceState };

export interface RollingState {
  windowSize: number;
  /** Raw observations in the window, oldest first. */
  observations: number[];
  /** Wrapped statistic, already fed every value in `observations`. */
  statistic: RevertibleSnapshot;
}

// =============================================================================
// Snapshots
// =============================================================================

/**
 * State record per estimator kind.
 */
export interface EstimatorStateByKind {
  'quantile': QuantileState;
  'rolling-quantile': RollingQuantileState;
  'sum': SumState;
  'mean': MeanState;
  'variance': VarianceState;
  'min': MinState;
  'max': MaxState;
  'peak-to-peak': PeakToPeakState;
  'rolling-min': RollingMinState;
  'rolling-max': RollingMaxState;
  'rolling-peak-to-peak': RollingPeakToPeakState;
  'iqr': IQRState;
  'rolling-iqr': RollingIQRState;
  'rolling': RollingState;
}

export type EstimatorKind = keyof EstimatorStateByKind;

/**
 * Tagged snapshot of one estimator.
 */
export type EstimatorSnapshot = {
  [K in EstimatorKind]: { kind: K; state: EstimatorStateByKind[K] };
}[EstimatorKind];

/**
 * An estimator that can be captured as a snapshot.
 */
export interface SerializableEstimator<K extends EstimatorKind = EstimatorKind> {
  readonly kind: K;
  toJSON(): EstimatorStateByKind[K];
}
