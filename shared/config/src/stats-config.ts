/**
 * Statistics Defaults
 *
 * Defaults applied when an estimator spec omits a parameter. Each can be
 * overridden through the environment:
 * - STATS_DEFAULT_QUANTILE: target quantile in [0, 1] (default 0.5)
 * - STATS_DEFAULT_WINDOW_SIZE: rolling window size, positive integer (default 100)
 */

import { QuantileSchema, WindowSizeSchema, validateOrThrow, z } from './schemas';
import { safeParseFloatBounded, safeParseIntBounded } from './utils/env-parsing';

// =============================================================================
// Constants
// =============================================================================

/** Number of markers tracked by the P2 estimator. */
export const P2_MARKER_COUNT = 5;

export const DEFAULT_QUANTILE = 0.5;
export const DEFAULT_WINDOW_SIZE = 100;

/** Quartiles bracketing the interquartile range. */
export const DEFAULT_IQR_LOWER = 0.25;
export const DEFAULT_IQR_UPPER = 0.75;

/** Sample variance by default. */
export const DEFAULT_DDOF = 1;

// =============================================================================
// Runtime config
// =============================================================================

export const StatsConfigSchema = z.object({
  defaultQuantile: QuantileSchema,
  defaultWindowSize: WindowSizeSchema,
});

export type StatsConfig = z.infer<typeof StatsConfigSchema>;

/**
 * Resolve the statistics defaults from an environment record.
 *
 * @param env - Environment to read (defaults to process.env)
 */
export function getStatsConfig(env: NodeJS.ProcessEnv = process.env): StatsConfig {
  return validateOrThrow(
    StatsConfigSchema,
    {
      defaultQuantile: safeParseFloatBounded(
        env.STATS_DEFAULT_QUANTILE,
        DEFAULT_QUANTILE,
        0,
        1,
        'STATS_DEFAULT_QUANTILE'
      ),
      defaultWindowSize: safeParseIntBounded(
        env.STATS_DEFAULT_WINDOW_SIZE,
        DEFAULT_WINDOW_SIZE,
        1,
        'STATS_DEFAULT_WINDOW_SIZE'
      ),
    },
    'StatsConfig'
  );
}
