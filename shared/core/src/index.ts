/**
 * @rollstat/core - Core Library
 *
 * Running and rolling univariate statistics:
 *
 * ```typescript
 * import { Quantile, Rolling, Variance } from '@rollstat/core';
 *
 * const p90 = new Quantile(0.9);
 * const rollingVariance = new Rolling(new Variance(), 50);
 * ```
 *
 * @module @rollstat/core
 */

// =============================================================================
// Error Handling
// =============================================================================

export {
  ErrorCode,
  ErrorSeverity,
  StatsError,
  ValidationError,
  InvariantError,
  success,
  failure,
  tryCatchSync,
  formatErrorForLog,
} from './error-handling';
export type { Result } from './error-handling';

// =============================================================================
// Logging
// =============================================================================

export {
  createPinoLogger,
  getLogger,
  resetLoggerCache,
  resolveLogLevel,
  RecordingLogger,
} from './logging';
export type { ILogger, LoggerConfig, LogLevel, LogMeta, LogEntry } from './logging';

// =============================================================================
// Validation
// =============================================================================

export { parseOrThrow, assertQuantile, assertWindowSize, assertCapacity } from './validation';

// =============================================================================
// Data Structures
// =============================================================================

export * from './data-structures';

// =============================================================================
// Estimators
// =============================================================================

export * from './stats';
