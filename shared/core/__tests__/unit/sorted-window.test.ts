/**
 * SortedWindow Unit Tests
 */

import { describe, it, expect } from '@jest/globals';

import { StreamGenerator, lastN, sortedCopy } from '@rollstat/test-utils';
import { SortedWindow, binarySearch, lowerBound } from '../../src/data-structures/sorted-window';
import { ErrorCode, InvariantError, StatsError, ValidationError } from '../../src/error-handling';

function codeOf(fn: () => unknown): ErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof StatsError ? error.code : undefined;
  }
  return undefined;
}

describe('binary search helpers', () => {
  it('lowerBound should return the first index not less than the value', () => {
    const sorted = [1, 3, 3, 5];
    expect(lowerBound(sorted, 0)).toBe(0);
    expect(lowerBound(sorted, 3)).toBe(1);
    expect(lowerBound(sorted, 4)).toBe(3);
    expect(lowerBound(sorted, 6)).toBe(4);
  });

  it('binarySearch should find a matching index or -1', () => {
    const sorted = [1, 3, 3, 5];
    expect(binarySearch(sorted, 3)).toBe(1);
    expect(binarySearch(sorted, 5)).toBe(3);
    expect(binarySearch(sorted, 2)).toBe(-1);
    expect(binarySearch([], 2)).toBe(-1);
  });
});

describe('SortedWindow', () => {
  describe('constructor', () => {
    it.each([-1, 1.5, NaN])('should reject capacity %p', (capacity) => {
      expect(() => new SortedWindow(capacity)).toThrow(ValidationError);
    });

    it('should accept capacity 0 but refuse every push', () => {
      const window = new SortedWindow(0);

      expect(window.capacity).toBe(0);
      expect(codeOf(() => window.pushBack(1))).toBe(ErrorCode.EMPTY_CAPACITY);
      expect(window.length).toBe(0);
    });
  });

  describe('pushBack', () => {
    it('should evict by insertion order', () => {
      const window = new SortedWindow(3);
      window.pushBack(10);
      window.pushBack(20);
      window.pushBack(5);
      window.pushBack(15);

      expect(window.toArray()).toEqual([5, 15, 20]);

      window.pushBack(2);

      expect(window.toArray()).toEqual([2, 5, 15]);
      expect(window.insertionOrder()).toEqual([5, 15, 2]);
    });

    it('should reject NaN without touching the window', () => {
      const window = new SortedWindow(3);
      window.pushBack(1);
      window.pushBack(2);
      const before = window.toJSON();

      expect(() => window.pushBack(NaN)).toThrow(InvariantError);
      expect(codeOf(() => window.pushBack(NaN))).toBe(ErrorCode.NAN_OBSERVATION);
      expect(window.toJSON()).toEqual(before);
    });

    it('should treat duplicates as interchangeable', () => {
      const window = new SortedWindow(2);
      window.pushBack(7);
      window.pushBack(7);
      window.pushBack(1);

      expect(window.toArray()).toEqual([1, 7]);
      expect(window.insertionOrder()).toEqual([7, 1]);
    });

    it('should accept infinities', () => {
      const window = new SortedWindow(3);
      window.pushBack(Infinity);
      window.pushBack(-Infinity);
      window.pushBack(0);

      expect(window.toArray()).toEqual([-Infinity, 0, Infinity]);
    });
  });

  describe('rank access', () => {
    it('should expose front, back and ranks', () => {
      const window = new SortedWindow(4);
      for (const x of [4, 1, 3]) window.pushBack(x);

      expect(window.front()).toBe(1);
      expect(window.back()).toBe(4);
      expect(window.at(1)).toBe(3);
      expect(window.isFull).toBe(false);
    });

    it('should fail on an empty window', () => {
      const window = new SortedWindow(2);

      expect(window.isEmpty).toBe(true);
      expect(codeOf(() => window.front())).toBe(ErrorCode.EMPTY_WINDOW);
      expect(codeOf(() => window.back())).toBe(ErrorCode.EMPTY_WINDOW);
    });

    it.each([-1, 2, 0.5])('should fail on rank %p', (rank) => {
      const window = new SortedWindow(3);
      window.pushBack(1);
      window.pushBack(2);

      expect(codeOf(() => window.at(rank))).toBe(ErrorCode.INDEX_OUT_OF_RANGE);
    });
  });

  describe('properties', () => {
    it.each([1, 2, 7, 32])('should always hold the sorted last N values (N=%p)', (size) => {
      const values = new StreamGenerator(size).withDuplicates({ count: 150, distinctValues: 9 });
      const window = new SortedWindow(size);

      values.forEach((x, i) => {
        window.pushBack(x);
        const seen = values.slice(0, i + 1);
        expect(window.toArray()).toEqual(sortedCopy(lastN(seen, size)));
        expect(window.insertionOrder()).toEqual(lastN(seen, size));
      });
    });
  });

  describe('serialization', () => {
    it('should round-trip and keep evicting in the same order', () => {
      const original = new SortedWindow(3);
      for (const x of [10, 20, 5]) original.pushBack(x);

      const restored = SortedWindow.fromState(JSON.parse(JSON.stringify(original.toJSON())));
      original.pushBack(15);
      restored.pushBack(15);

      expect(restored.toArray()).toEqual([5, 15, 20]);
      expect(restored.toJSON()).toEqual(original.toJSON());
    });

    it('should reject views that disagree', () => {
      const state = { sortedWindow: [1, 2], unsortedWindow: [2, 3], windowSize: 3 };
      expect(codeOf(() => SortedWindow.fromState(state))).toBe(ErrorCode.SCHEMA_MISMATCH);
    });

    it('should reject an unsorted value view', () => {
      const state = { sortedWindow: [2, 1], unsortedWindow: [2, 1], windowSize: 2 };
      expect(() => SortedWindow.fromState(state)).toThrow(ValidationError);
    });

    it('should reject more values than capacity', () => {
      const state = { sortedWindow: [1, 2], unsortedWindow: [1, 2], windowSize: 1 };
      expect(() => SortedWindow.fromState(state)).toThrow(ValidationError);
    });
  });
});
