/**
 * Generic Rolling Decorator
 *
 * Turns any revertible running statistic into a windowed one. Raw
 * observations are kept in a FIFO; when it is full, the oldest value is
 * reverted from the wrapped statistic before the new one is applied.
 *
 * Invariant: the wrapped statistic's state always equals the state of a fresh
 * instance fed only the values currently in the FIFO, in order. A failed
 * revert breaks that invariant, so it is fatal.
 *
 * Only meaningful for statistics with a true algebraic inverse (Sum, Mean,
 * Variance). Min, max and quantiles have dedicated window-based variants.
 * Only those three can be snapshotted inside a decorator.
 */

import type {
  RevertibleSnapshot,
  RollableUnivariate,
  RollingState,
  SerializableEstimator,
  Univariate,
} from '@rollstat/types';
import { RollingStateSchema } from '@rollstat/config';
import { NumericCircularBuffer } from '../data-structures/circular-buffer';
import { ErrorCode, InvariantError, StatsError, formatErrorForLog } from '../error-handling';
import { getLogger } from '../logging';
import type { ILogger } from '../logging';
import { assertWindowSize, parseOrThrow } from '../validation/estimator-validators';
import { Mean } from './mean';
import { Sum } from './sum';
import { Variance } from './variance';

/**
 * Revertible statistics that survive a snapshot of their decorator.
 */
export type RevertibleEstimator = Sum | Mean | Variance;

export interface RollingOptions {
  /** Receives the fatal entry on a failed revert. Defaults to the 'rolling' logger. */
  logger?: ILogger;
}

/**
 * @example
 * ```typescript
 * const rollingSum = new Rolling(new Sum(), 2);
 * for (const x of [9, 7, 3, 2, 6, 1, 8, 5, 4]) rollingSum.update(x);
 * rollingSum.get(); // 9
 * ```
 */
export class Rolling<S extends RollableUnivariate> implements Univariate, SerializableEstimator<'rolling'> {
  readonly kind = 'rolling' as const;
  readonly statistic: S;
  readonly windowSize: number;

  private readonly window: NumericCircularBuffer;
  private readonly logger: ILogger;

  /**
   * @param statistic - Statistic to wrap. The decorator owns it from here on;
   *   updating it directly breaks the window invariant.
   * @throws ValidationError if windowSize is not a positive integer
   */
  constructor(statistic: S, windowSize: number, options: RollingOptions = {}) {
    this.windowSize = assertWindowSize(windowSize);
    this.statistic = statistic;
    this.window = new NumericCircularBuffer(windowSize);
    this.logger = options.logger ?? getLogger('rolling');
  }

  /** Number of observations currently in the window. */
  get size(): number {
    return this.window.length;
  }

  /**
   * @throws InvariantError if reverting the evicted value fails
   */
  update(x: number): void {
    if (this.window.isFull) {
      this.evictOldest();
    }
    this.window.push(x);
    this.statistic.update(x);
  }

  get(): number {
    return this.statistic.get();
  }

  /**
   * Raw observations in the window, oldest first.
   */
  observations(): number[] {
    return this.window.toArray();
  }

  private evictOldest(): void {
    const oldest = this.window.peek();
    if (oldest === undefined) {
      throw new InvariantError('Observation window is full but has no oldest value', 'Rolling', {
        code: ErrorCode.CORRUPTED_WINDOW,
        context: { windowSize: this.windowSize, size: this.window.length },
      });
    }

    const result = this.statistic.revert(oldest);
    if (!result.success) {
      this.logger.fatal('Revert failed; rolling window no longer matches its statistic', {
        evicted: oldest,
        windowSize: this.windowSize,
        error: formatErrorForLog(result.error),
      });
      throw new InvariantError(`Failed to revert evicted value ${oldest}`, 'Rolling', {
        code: ErrorCode.REVERT_FAILED,
        cause: result.error,
        context: { evicted: oldest, windowSize: this.windowSize },
      });
    }
    this.window.shift();
  }

  /**
   * @throws StatsError (NOT_SERIALIZABLE) if the wrapped statistic is not a Sum, Mean or Variance
   */
  toJSON(): RollingState {
    return {
      windowSize: this.windowSize,
      observations: this.observations(),
      statistic: snapshotStatistic(this.statistic),
    };
  }

  /**
   * @throws ValidationError if the state is malformed, holds more observations
   *   than its window, or its statistic count disagrees with the window
   */
  static fromState(raw: unknown, options: RollingOptions = {}): Rolling<RevertibleEstimator> {
    const state = parseOrThrow(RollingStateSchema, raw, 'Rolling state');
    const rolling = new Rolling(restoreStatistic(state.statistic), state.windowSize, options);
    // The restored statistic already includes these values
    for (const x of state.observations) {
      rolling.window.push(x);
    }
    return rolling;
  }
}

function snapshotStatistic(statistic: RollableUnivariate): RevertibleSnapshot {
  if (statistic instanceof Sum) return { kind: 'sum', state: statistic.toJSON() };
  if (statistic instanceof Mean) return { kind: 'mean', state: statistic.toJSON() };
  if (statistic instanceof Variance) return { kind: 'variance', state: statistic.toJSON() };
  throw new StatsError('Only Sum, Mean and Variance can be serialized inside Rolling', ErrorCode.NOT_SERIALIZABLE, {
    context: { statistic: statistic.constructor.name },
  });
}

function restoreStatistic(snapshot: RevertibleSnapshot): RevertibleEstimator {
  switch (snapshot.kind) {
    case 'sum':
      return Sum.fromState(snapshot.state);
    case 'mean':
      return Mean.fromState(snapshot.state);
    case 'variance':
      return Variance.fromState(snapshot.state);
  }
}
