/**
 * Estimator Factory
 *
 * Builds estimators from declarative specs such as
 * `{ kind: 'rolling-quantile', q: 0.9, windowSize: 50 }` or
 * `{ kind: 'rolling', of: { kind: 'variance' }, windowSize: 20 }`.
 * Omitted parameters fall back to the configured defaults.
 */

import { DEFAULT_IQR_LOWER, DEFAULT_IQR_UPPER, EstimatorSpecSchema, getStatsConfig } from '@rollstat/config';
import type { EstimatorSpec, RevertibleSpec, StatsConfig } from '@rollstat/config';
import { ErrorCode, tryCatchSync } from '../error-handling';
import type { Result } from '../error-handling';
import { getLogger } from '../logging';
import type { ILogger } from '../logging';
import { parseOrThrow } from '../validation/estimator-validators';
import type { SnapshotableEstimator } from './estimator-snapshot';
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
 * Anything the factory builds. Every one of them can be snapshotted.
 */
export type Estimator = SnapshotableEstimator;

export interface EstimatorFactoryOptions {
  /** Defaults for omitted parameters. Read from the environment when absent. */
  config?: StatsConfig;
  /** Used for construction logs and handed to Rolling decorators. */
  logger?: ILogger;
}

function createRevertible(spec: RevertibleSpec): RevertibleEstimator {
  switch (spec.kind) {
    case 'sum':
      return new Sum();
    case 'mean':
      return new Mean();
    case 'variance':
      return new Variance(spec.ddof);
  }
}

function build(spec: EstimatorSpec, config: StatsConfig, logger: ILogger): Estimator {
  const windowSize = 'windowSize' in spec ? spec.windowSize ?? config.defaultWindowSize : config.defaultWindowSize;

  switch (spec.kind) {
    case 'quantile':
      return new Quantile(spec.q ?? config.defaultQuantile);
    case 'rolling-quantile':
      return new RollingQuantile(spec.q ?? config.defaultQuantile, windowSize);
    case 'sum':
    case 'mean':
    case 'variance':
      return createRevertible(spec);
    case 'min':
      return new Min();
    case 'max':
      return new Max();
    case 'peak-to-peak':
      return new PeakToPeak();
    case 'rolling-min':
      return new RollingMin(windowSize);
    case 'rolling-max':
      return new RollingMax(windowSize);
    case 'rolling-peak-to-peak':
      return new RollingPeakToPeak(windowSize);
    case 'iqr':
      return new IQR(spec.qInf ?? DEFAULT_IQR_LOWER, spec.qSup ?? DEFAULT_IQR_UPPER);
    case 'rolling-iqr':
      return new RollingIQR(spec.qInf ?? DEFAULT_IQR_LOWER, spec.qSup ?? DEFAULT_IQR_UPPER, windowSize);
    case 'rolling':
      return new Rolling(createRevertible(spec.of), windowSize, { logger });
  }
}

/**
 * Build an estimator from an untrusted spec.
 *
 * @throws ValidationError if the spec or the parameters it resolves to are invalid
 */
export function createEstimator(spec: unknown, options: EstimatorFactoryOptions = {}): Estimator {
  const logger = options.logger ?? getLogger('estimator-factory');
  const parsed = parseOrThrow(EstimatorSpecSchema, spec, 'estimator spec', ErrorCode.INVALID_CONFIG);
  const estimator = build(parsed, options.config ?? getStatsConfig(), logger);
  logger.debug('Estimator created', { spec: parsed });
  return estimator;
}

/**
 * Same as {@link createEstimator}, reporting failure as a Result.
 */
export function tryCreateEstimator(spec: unknown, options: EstimatorFactoryOptions = {}): Result<Estimator> {
  return tryCatchSync(() => createEstimator(spec, options), ErrorCode.INVALID_CONFIG);
}
