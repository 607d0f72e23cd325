/**
 * Running and Rolling Extrema
 *
 * Min/Max keep a single value. RollingMin/RollingMax read the ends of a
 * sorted window, since extrema have no algebraic inverse.
 */

import type {
  MaxState,
  MinState,
  RollingMaxState,
  RollingMinState,
  SerializableEstimator,
  Univariate,
} from '@rollstat/types';
import {
  MaxStateSchema,
  MinStateSchema,
  RollingMaxStateSchema,
  RollingMinStateSchema,
} from '@rollstat/config';
import { SortedWindow } from '../data-structures/sorted-window';
import { assertWindowSize, parseOrThrow } from '../validation/estimator-validators';

// =============================================================================
// Running
// =============================================================================

/**
 * Running minimum. Reads `Number.MAX_VALUE` before the first observation.
 */
export class Min implements Univariate, SerializableEstimator<'min'> {
  readonly kind = 'min' as const;
  private min = Number.MAX_VALUE;

  update(x: number): void {
    if (x < this.min) {
      this.min = x;
    }
  }

  get(): number {
    return this.min;
  }

  toJSON(): MinState {
    return { min: this.min };
  }

  static fromState(raw: unknown): Min {
    const state = parseOrThrow(MinStateSchema, raw, 'Min state');
    const estimator = new Min();
    estimator.min = state.min;
    return estimator;
  }
}

/**
 * Running maximum. Reads `-Number.MAX_VALUE` before the first observation.
 */
export class Max implements Univariate, SerializableEstimator<'max'> {
  readonly kind = 'max' as const;
  private max = -Number.MAX_VALUE;

  update(x: number): void {
    if (x > this.max) {
      this.max = x;
    }
  }

  get(): number {
    return this.max;
  }

  toJSON(): MaxState {
    return { max: this.max };
  }

  static fromState(raw: unknown): Max {
    const state = parseOrThrow(MaxStateSchema, raw, 'Max state');
    const estimator = new Max();
    estimator.max = state.max;
    return estimator;
  }
}

// =============================================================================
// Rolling
// =============================================================================

/**
 * Minimum of the last `windowSize` observations.
 * `get()` throws InvariantError before the first observation.
 */
export class RollingMin implements Univariate, SerializableEstimator<'rolling-min'> {
  readonly kind = 'rolling-min' as const;
  private sortedWindow: SortedWindow;

  constructor(windowSize: number) {
    this.sortedWindow = new SortedWindow(assertWindowSize(windowSize));
  }

  get windowSize(): number {
    return this.sortedWindow.capacity;
  }

  update(x: number): void {
    this.sortedWindow.pushBack(x);
  }

  get(): number {
    return this.sortedWindow.front();
  }

  toJSON(): RollingMinState {
    return { sortedWindow: this.sortedWindow.toJSON() };
  }

  static fromState(raw: unknown): RollingMin {
    const state = parseOrThrow(RollingMinStateSchema, raw, 'RollingMin state');
    const estimator = new RollingMin(state.sortedWindow.windowSize);
    estimator.sortedWindow = SortedWindow.fromState(state.sortedWindow);
    return estimator;
  }
}

/**
 * Maximum of the last `windowSize` observations.
 * `get()` throws InvariantError before the first observation.
 */
export class RollingMax implements Univariate, SerializableEstimator<'rolling-max'> {
  readonly kind = 'rolling-max' as const;
  private sortedWindow: SortedWindow;

  constructor(windowSize: number) {
    this.sortedWindow = new SortedWindow(assertWindowSize(windowSize));
  }

  get windowSize(): number {
    return this.sortedWindow.capacity;
  }

  update(x: number): void {
    this.sortedWindow.pushBack(x);
  }

  get(): number {
    return this.sortedWindow.back();
  }

  toJSON(): RollingMaxState {
    return { sortedWindow: this.sortedWindow.toJSON() };
  }

  static fromState(raw: unknown): RollingMax {
    const state = parseOrThrow(RollingMaxStateSchema, raw, 'RollingMax state');
    const estimator = new RollingMax(state.sortedWindow.windowSize);
    estimator.sortedWindow = SortedWindow.fromState(state.sortedWindow);
    return estimator;
  }
}
