/**
 * Estimator Parameter and State Validators
 *
 * Bridges the zod schemas in @rollstat/config to the ValidationError type so
 * that every construction or restore failure carries the same structure.
 */

import {
  CapacitySchema,
  QuantileSchema,
  WindowSizeSchema,
  validateWithDetails,
  z,
} from '@rollstat/config';
import { ErrorCode, ValidationError } from '../error-handling';

/**
 * Parse untrusted input against a schema.
 *
 * @param context - Name of the thing being parsed, used in the error message
 * @throws ValidationError listing every failed path
 */
export function parseOrThrow<T>(
  schema: z.ZodSchema<T>,
  raw: unknown,
  context: string,
  code: ErrorCode = ErrorCode.SCHEMA_MISMATCH
): T {
  const result = validateWithDetails(schema, raw);
  if (result.success) {
    return result.data;
  }

  const issues = result.errors.map((e) => `${e.path || '(root)'}: ${e.message}`);
  throw new ValidationError(`Invalid ${context}: ${issues.join('; ')}`, {
    code,
    issues,
    context: { target: context },
  });
}

function assertParameter<T>(schema: z.ZodSchema<T>, value: unknown, field: string): T {
  const result = validateWithDetails(schema, value);
  if (result.success) {
    return result.data;
  }

  const issues = result.errors.map((e) => e.message);
  throw new ValidationError(`Invalid ${field} ${String(value)}: ${issues.join('; ')}`, {
    code: ErrorCode.INVALID_ARGUMENT,
    field,
    receivedValue: value,
    issues,
  });
}

/**
 * Reject a quantile target outside [0, 1] (including NaN).
 */
export function assertQuantile(q: number, field = 'q'): number {
  return assertParameter(QuantileSchema, q, field);
}

/**
 * Reject a rolling window size that is not a positive integer.
 */
export function assertWindowSize(windowSize: number, field = 'windowSize'): number {
  return assertParameter(WindowSizeSchema, windowSize, field);
}

/**
 * Reject a sorted-window capacity that is not a non-negative integer.
 */
export function assertCapacity(capacity: number, field = 'capacity'): number {
  return assertParameter(CapacitySchema, capacity, field);
}
