/**
 * Statistics Defaults Unit Tests
 */

import { describe, it, expect, afterEach, jest } from '@jest/globals';

import { DEFAULT_QUANTILE, DEFAULT_WINDOW_SIZE, getStatsConfig } from '../../src/stats-config';
import {
  safeParseFloat,
  safeParseFloatBounded,
  safeParseInt,
  safeParseIntBounded,
} from '../../src/utils/env-parsing';

function silenceWarnings() {
  return jest.spyOn(console, 'warn').mockImplementation(() => undefined);
}

afterEach(() => {
  jest.restoreAllMocks();
});

describe('getStatsConfig', () => {
  it('should use the defaults for an empty environment', () => {
    const warn = silenceWarnings();
    expect(getStatsConfig({})).toEqual({
      defaultQuantile: DEFAULT_QUANTILE,
      defaultWindowSize: DEFAULT_WINDOW_SIZE,
    });
    expect(warn).not.toHaveBeenCalled();
  });

  it('should read overrides', () => {
    expect(getStatsConfig({ STATS_DEFAULT_QUANTILE: '0.95', STATS_DEFAULT_WINDOW_SIZE: '250' })).toEqual({
      defaultQuantile: 0.95,
      defaultWindowSize: 250,
    });
  });

  it('should fall back to the default quantile when out of range', () => {
    const warn = silenceWarnings();
    expect(getStatsConfig({ STATS_DEFAULT_QUANTILE: '1.5' }).defaultQuantile).toBe(0.5);
    expect(warn).toHaveBeenCalledWith(
      '[CONFIG] Value for STATS_DEFAULT_QUANTILE (1.5) out of range [0, 1] - using default'
    );
  });

  it('should clamp a window size below 1 to 1', () => {
    silenceWarnings();
    expect(getStatsConfig({ STATS_DEFAULT_WINDOW_SIZE: '0' }).defaultWindowSize).toBe(1);
  });

  it('should ignore unparseable values', () => {
    silenceWarnings();
    expect(getStatsConfig({ STATS_DEFAULT_WINDOW_SIZE: 'wide' }).defaultWindowSize).toBe(100);
  });
});

describe('env parsing', () => {
  it('safeParseInt should fall back on empty or invalid input', () => {
    expect(safeParseInt(undefined, 3)).toBe(3);
    expect(safeParseInt('', 3)).toBe(3);
    expect(safeParseInt('abc', 3)).toBe(3);
    expect(safeParseInt('12', 3)).toBe(12);
  });

  it('safeParseFloat should parse decimals', () => {
    expect(safeParseFloat('0.25', 1)).toBe(0.25);
    expect(safeParseFloat('x', 1)).toBe(1);
  });

  it('bounded parsers should not warn without a label', () => {
    const warn = silenceWarnings();

    expect(safeParseFloatBounded('7', 0.5, 0, 1)).toBe(0.5);
    expect(safeParseIntBounded('-4', 10, 2)).toBe(2);
    expect(warn).not.toHaveBeenCalled();
  });
});
