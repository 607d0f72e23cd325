/**
 * Numeric Circular Buffer - O(1) FIFO Operations
 *
 * Fixed-capacity FIFO of numbers backed by a Float64Array:
 * - O(1) push, shift and peek
 * - Contiguous memory, no array resizing
 *
 * Used by:
 * - SortedWindow (insertion-ordered view of the window)
 * - Rolling (raw observations awaiting eviction)
 */

import { ErrorCode, ValidationError } from '../error-handling';

// =============================================================================
// Implementation
// =============================================================================

/**
 * Circular buffer of numbers: push() adds to the tail, shift() removes from
 * the head.
 */
export class NumericCircularBuffer {
  private readonly buffer: Float64Array;
  private head = 0; // Next read position
  private tail = 0; // Next write position
  private count = 0;

  /**
   * @param capacity - Maximum number of values (must be a positive integer)
   * @throws ValidationError if capacity is not a positive integer
   */
  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ValidationError('NumericCircularBuffer capacity must be a positive integer', {
        code: ErrorCode.INVALID_ARGUMENT,
        field: 'capacity',
        receivedValue: capacity,
      });
    }
    this.buffer = new Float64Array(capacity);
  }

  get length(): number {
    return this.count;
  }

  get isFull(): boolean {
    return this.count >= this.buffer.length;
  }

  // ===========================================================================
  // FIFO Queue Operations
  // ===========================================================================

  /**
   * Add a value to the end of the buffer. O(1)
   *
   * @returns true if added, false if buffer is full
   */
  push(value: number): boolean {
    if (this.count >= this.buffer.length) {
      return false;
    }

    this.buffer[this.tail] = value;
    this.tail = (this.tail + 1) % this.buffer.length;
    this.count++;
    return true;
  }

  /**
   * Remove and return the oldest value. O(1)
   */
  shift(): number | undefined {
    if (this.count === 0) {
      return undefined;
    }

    const value = this.buffer[this.head];
    this.head = (this.head + 1) % this.buffer.length;
    this.count--;

    return value;
  }

  /**
   * Oldest value without removing it. O(1)
   */
  peek(): number | undefined {
    if (this.count === 0) {
      return undefined;
    }
    return this.buffer[this.head];
  }

  /**
   * All values from oldest to newest. O(n)
   */
  toArray(): number[] {
    const result: number[] = new Array(this.count);
    for (let i = 0; i < this.count; i++) {
      result[i] = this.buffer[(this.head + i) % this.buffer.length];
    }
    return result;
  }
}
