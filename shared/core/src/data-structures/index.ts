/**
 * Data Structures Module
 *
 * - NumericCircularBuffer: O(1) FIFO of numbers on a Float64Array
 * - SortedWindow: last N values in both insertion and value order
 */

export { NumericCircularBuffer } from './circular-buffer';

export { SortedWindow, binarySearch, lowerBound } from './sorted-window';
