/**
 * P² Running Quantile Estimator
 *
 * Estimates a single quantile of an unbounded stream from five markers,
 * without storing observations. O(1) update and read.
 *
 * Lifecycle:
 * 1. First five updates append raw values (kept sorted); reads return an
 *    order-statistic approximation of the partial sample.
 * 2. Sixth update sorts the five values into marker heights and starts the
 *    find-cell / bump-positions / adjust cycle, run on every later update.
 * 3. Once markers are initialized, `get()` returns the middle marker height.
 *
 * Marker heights stay non-decreasing: the parabolic step is accepted only if
 * it lands strictly between its neighbours, otherwise a linear step is used.
 *
 * @see https://www.cse.wustl.edu/~jain/papers/ftp/psqr.pdf
 */

import type { QuantileState, SerializableEstimator, Univariate } from '@rollstat/types';
import { DEFAULT_QUANTILE, P2_MARKER_COUNT, QuantileStateSchema } from '@rollstat/config';
import { ErrorCode, InvariantError } from '../error-handling';
import { assertQuantile, parseOrThrow } from '../validation/estimator-validators';

const STRUCTURE = 'Quantile';

const ascending = (a: number, b: number): number => a - b;

/**
 * Parabolic (P²) prediction of a marker height moved by `d` positions.
 */
function parabolic(qp1: number, q: number, qm1: number, d: number, np1: number, n: number, nm1: number): number {
  const outer = d / (np1 - nm1);
  const innerLeft = (n - nm1 + d) * (qp1 - q) / (np1 - n);
  const innerRight = (np1 - n - d) * (q - qm1) / (n - nm1);
  return q + outer * (innerLeft + innerRight);
}

/**
 * Running quantile.
 *
 * @example
 * ```typescript
 * const median = new Quantile(0.5);
 * for (const x of [9, 7, 3, 2, 6, 1, 8, 5, 4]) median.update(x);
 * median.get(); // 5
 * ```
 */
export class Quantile implements Univariate, SerializableEstimator<'quantile'> {
  readonly kind = 'quantile' as const;
  readonly q: number;

  private desiredMarkerPosition: number[];
  private markerPosition: number[];
  private position: number[];
  private heights: number[] = [];
  private heightsSorted = false;

  /**
   * @param q - Target quantile in [0, 1]
   * @throws ValidationError if q is outside [0, 1] or NaN
   */
  constructor(q: number = DEFAULT_QUANTILE) {
    this.q = assertQuantile(q);
    this.desiredMarkerPosition = [0, q / 2, q, (1 + q) / 2, 1];
    this.markerPosition = [1, 1 + 2 * q, 1 + 4 * q, 3 + 2 * q, 5];
    this.position = [1, 2, 3, 4, 5];
  }

  /**
   * @throws InvariantError on NaN (state unchanged)
   */
  update(x: number): void {
    if (Number.isNaN(x)) {
      throw new InvariantError('Cannot update Quantile with NaN', STRUCTURE, {
        code: ErrorCode.NAN_OBSERVATION,
      });
    }

    if (this.heights.length !== P2_MARKER_COUNT) {
      this.heights.push(x);
    } else {
      if (!this.heightsSorted) {
        this.heights.sort(ascending);
        this.heightsSorted = true;
      }

      const k = this.findCell(x);
      for (let i = k; i < P2_MARKER_COUNT; i++) {
        this.position[i] += 1;
      }
      for (let i = 0; i < P2_MARKER_COUNT; i++) {
        this.markerPosition[i] += this.desiredMarkerPosition[i];
      }
      this.adjust();
    }

    this.heights.sort(ascending);
  }

  /**
   * @throws InvariantError if no observation has been seen
   */
  get(): number {
    if (this.heightsSorted) {
      return this.heights[2];
    }

    const length = this.heights.length;
    if (length === 0) {
      throw new InvariantError('Quantile has no observations', STRUCTURE, {
        code: ErrorCode.EMPTY_WINDOW,
      });
    }
    const index = Math.floor(Math.min(Math.max(length - 1, 0), length * this.q));
    return this.heights[index];
  }

  // ===========================================================================
  // Marker maintenance
  // ===========================================================================

  /**
   * Index k of the first marker to the right of x, stretching the extreme
   * markers when x falls outside them.
   */
  private findCell(x: number): number {
    const h = this.heights;
    if (x < h[0]) {
      h[0] = x;
      return 1;
    }
    for (let i = 1; i < P2_MARKER_COUNT; i++) {
      if (h[i - 1] <= x && x < h[i]) {
        return i;
      }
    }
    if (h[4] < x) {
      h[4] = x;
    }
    return 4;
  }

  private adjust(): void {
    const h = this.heights;
    const pos = this.position;

    for (let i = 1; i < 4; i++) {
      const n = pos[i];
      const q = h[i];
      let d = this.markerPosition[i] - n;

      if ((d >= 1 && pos[i + 1] - n > 1) || (d <= -1 && pos[i - 1] - n < -1)) {
        d = Math.sign(d);
        const qn = parabolic(h[i + 1], q, h[i - 1], d, pos[i + 1], n, pos[i - 1]);

        if (h[i - 1] < qn && qn < h[i + 1]) {
          h[i] = qn;
        } else {
          const j = i + d;
          h[i] = q + d * (h[j] - q) / (pos[j] - n);
        }
        pos[i] = n + d;
      }
    }
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  toJSON(): QuantileState {
    return {
      q: this.q,
      desiredMarkerPosition: [...this.desiredMarkerPosition],
      markerPosition: [...this.markerPosition],
      position: [...this.position],
      heights: [...this.heights],
      heightsSorted: this.heightsSorted,
    };
  }

  /**
   * @throws ValidationError if the state is malformed
   */
  static fromState(raw: unknown): Quantile {
    const state = parseOrThrow(QuantileStateSchema, raw, 'Quantile state');
    const estimator = new Quantile(state.q);
    estimator.desiredMarkerPosition = [...state.desiredMarkerPosition];
    estimator.markerPosition = [...state.markerPosition];
    estimator.position = [...state.position];
    estimator.heights = [...state.heights];
    estimator.heightsSorted = state.heightsSorted;
    return estimator;
  }
}

