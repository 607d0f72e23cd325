/**
 * Shared Configuration
 *
 * - schemas/: zod schemas for parameters, estimator specs and serialized state
 * - stats-config.ts: defaults and their environment overrides
 * - utils/env-parsing.ts: safe env value parsing
 */

export * from './schemas';
export * from './stats-config';
export {
  safeParseInt,
  safeParseFloat,
  safeParseFloatBounded,
  safeParseIntBounded,
} from './utils/env-parsing';
