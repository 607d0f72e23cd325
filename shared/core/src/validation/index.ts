/**
 * Validation Module
 *
 * Parameter and snapshot validation for estimators.
 *
 * @module validation
 */

export {
  parseOrThrow,
  assertQuantile,
  assertWindowSize,
  assertCapacity,
} from './estimator-validators';
