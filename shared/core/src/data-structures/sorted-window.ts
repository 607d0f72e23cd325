/**
 * Sorted Sliding Window
 *
 * Holds the last `windowSize` pushed values in two views:
 * - insertion order (FIFO), to know which value to evict next
 * - ascending value order, for O(1) access by rank
 *
 * Push is O(log n) search plus O(n) array shift. Both views always hold the
 * same multiset. Duplicates are fungible: eviction removes any element equal
 * to the oldest value, not a particular physical occurrence.
 *
 * Used by:
 * - RollingQuantile (order statistics for interpolation)
 * - RollingMin / RollingMax (front / back)
 */

import type { SortedWindowState } from '@rollstat/types';
import { SortedWindowStateSchema } from '@rollstat/config';
import { ErrorCode, InvariantError } from '../error-handling';
import { assertCapacity, parseOrThrow } from '../validation/estimator-validators';
import { NumericCircularBuffer } from './circular-buffer';

const STRUCTURE = 'SortedWindow';

// =============================================================================
// Binary search
// =============================================================================

/**
 * Index of the first element not less than `value`.
 */
export function lowerBound(sorted: ArrayLike<number>, value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < value) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Index of some element equal to `value`, or -1.
 */
export function binarySearch(sorted: ArrayLike<number>, value: number): number {
  const index = lowerBound(sorted, value);
  return index < sorted.length && sorted[index] === value ? index : -1;
}

// =============================================================================
// Implementation
// =============================================================================

export class SortedWindow {
  private readonly sorted: number[] = [];
  private readonly insertion: NumericCircularBuffer;
  private readonly windowSize: number;

  /**
   * @param windowSize - Maximum number of values held. Zero is accepted but
   *   every push into such a window throws.
   * @throws ValidationError if windowSize is not a non-negative integer
   */
  constructor(windowSize: number) {
    this.windowSize = assertCapacity(windowSize, 'windowSize');
    // A zero-capacity window never stores anything; pushBack rejects it first.
    this.insertion = new NumericCircularBuffer(Math.max(windowSize, 1));
  }

  get capacity(): number {
    return this.windowSize;
  }

  get length(): number {
    return this.sorted.length;
  }

  get isEmpty(): boolean {
    return this.sorted.length === 0;
  }

  get isFull(): boolean {
    return this.sorted.length === this.windowSize;
  }

  /**
   * Smallest held value.
   * @throws InvariantError if the window is empty
   */
  front(): number {
    if (this.sorted.length === 0) {
      throw new InvariantError('Window is empty', STRUCTURE, { code: ErrorCode.EMPTY_WINDOW });
    }
    return this.sorted[0];
  }

  /**
   * Largest held value.
   * @throws InvariantError if the window is empty
   */
  back(): number {
    if (this.sorted.length === 0) {
      throw new InvariantError('Window is empty', STRUCTURE, { code: ErrorCode.EMPTY_WINDOW });
    }
    return this.sorted[this.sorted.length - 1];
  }

  /**
   * The `rank`-th smallest held value (0-based).
   * @throws InvariantError if rank is not an integer in [0, length)
   */
  at(rank: number): number {
    if (!Number.isInteger(rank) || rank < 0 || rank >= this.sorted.length) {
      throw new InvariantError(
        `Rank ${rank} is out of bounds for a window of length ${this.sorted.length}`,
        STRUCTURE,
        { code: ErrorCode.INDEX_OUT_OF_RANGE, context: { rank, length: this.sorted.length } }
      );
    }
    return this.sorted[rank];
  }

  /**
   * Push a value, evicting the oldest insertion first when full.
   *
   * @throws InvariantError on NaN (window unchanged) or on a zero-capacity window
   */
  pushBack(value: number): void {
    if (Number.isNaN(value)) {
      throw new InvariantError('Cannot push a NaN value into SortedWindow', STRUCTURE, {
        code: ErrorCode.NAN_OBSERVATION,
      });
    }
    if (this.windowSize === 0) {
      throw new InvariantError('Cannot push into a SortedWindow of capacity 0', STRUCTURE, {
        code: ErrorCode.EMPTY_CAPACITY,
      });
    }

    if (this.sorted.length === this.windowSize) {
      this.evictOldest();
    }

    this.insertion.push(value);
    this.sorted.splice(lowerBound(this.sorted, value), 0, value);
  }

  private evictOldest(): void {
    const oldest = this.insertion.shift();
    if (oldest === undefined) {
      throw new InvariantError('Insertion order is empty while the sorted view is full', STRUCTURE, {
        code: ErrorCode.CORRUPTED_WINDOW,
      });
    }

    const position = binarySearch(this.sorted, oldest);
    if (position < 0) {
      throw new InvariantError(`Evicted value ${oldest} is missing from the sorted view`, STRUCTURE, {
        code: ErrorCode.CORRUPTED_WINDOW,
      });
    }
    this.sorted.splice(position, 1);
  }

  /**
   * Held values in ascending order.
   */
  toArray(): number[] {
    return [...this.sorted];
  }

  /**
   * Held values in insertion order, oldest first.
   */
  insertionOrder(): number[] {
    return this.insertion.toArray();
  }

  toJSON(): SortedWindowState {
    return {
      sortedWindow: this.toArray(),
      unsortedWindow: this.insertionOrder(),
      windowSize: this.windowSize,
    };
  }

  /**
   * Rebuild a window from a serialized state.
   * @throws ValidationError if the state is malformed or its views disagree
   */
  static fromState(raw: unknown): SortedWindow {
    const state = parseOrThrow(SortedWindowStateSchema, raw, 'SortedWindow state');
    const window = new SortedWindow(state.windowSize);
    window.sorted.push(...state.sortedWindow);
    for (const value of state.unsortedWindow) {
      window.insertion.push(value);
    }
    return window;
  }
}
