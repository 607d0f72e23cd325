/**
 * Zod Schemas for Estimator Parameters and State
 *
 * Runtime validation for everything that crosses a trust boundary:
 * - Construction parameters (quantile targets, window sizes)
 * - Estimator specs handed to the factory
 * - Serialized estimator state being restored
 *
 * ## Hot-Path Safety
 * Validation runs at construction and restore time only. Once an estimator
 * exists, `update`/`get` never touch these schemas.
 */

import { z } from 'zod';
import type {
  EstimatorSnapshot,
  IQRState,
  MaxState,
  MeanState,
  MinState,
  PeakToPeakState,
  QuantileState,
  RollingIQRState,
  RollingMaxState,
  RollingMinState,
  RollingPeakToPeakState,
  RevertibleSnapshot,
  RollingQuantileState,
  RollingState,
  SortedWindowState,
  SumState,
  VarianceState,
} from '@rollstat/types';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Target quantile in [0, 1]. NaN is rejected by `z.number()` itself.
 */
export const QuantileSchema = z
  .number()
  .min(0, 'Quantile cannot be negative')
  .max(1, 'Quantile cannot exceed 1');

/**
 * Window size of a rolling estimator.
 */
export const WindowSizeSchema = z
  .number()
  .int('Window size must be an integer')
  .positive('Window size must be a positive integer');

/**
 * Capacity of a sorted window. Zero is accepted here; pushing into a
 * zero-capacity window fails at use time.
 */
export const CapacitySchema = z
  .number()
  .int('Capacity must be an integer')
  .min(0, 'Capacity cannot be negative');

/**
 * Delta degrees of freedom for variance.
 */
export const DdofSchema = z
  .number()
  .int('ddof must be an integer')
  .min(0, 'ddof cannot be negative');

/**
 * Non-negative integer count.
 */
export const CountSchema = z
  .number()
  .int()
  .min(0, 'Count cannot be negative');

// =============================================================================
// Estimator State Schemas
// =============================================================================

const MarkerArraySchema = z.array(z.number()).length(5, 'Expected exactly 5 markers');

/**
 * P2 quantile state.
 * @see shared/types/src/estimator-state.ts - QuantileState
 */
export const QuantileStateSchema: z.ZodType<QuantileState> = z
  .object({
    q: QuantileSchema,
    desiredMarkerPosition: MarkerArraySchema,
    markerPosition: MarkerArraySchema,
    position: MarkerArraySchema,
    heights: z.array(z.number()).max(5, 'At most 5 heights are tracked'),
    heightsSorted: z.boolean(),
  })
  .superRefine((state, ctx) => {
    if (state.heightsSorted && state.heights.length !== 5) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['heights'],
        message: 'Sorted markers require exactly 5 heights',
      });
    }
    if (!isNonDecreasing(state.position)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['position'],
        message: 'Marker positions must be non-decreasing',
      });
    }
    // Heights are re-sorted after every update, warm-up included
    if (!isNonDecreasing(state.heights)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['heights'],
        message: 'Marker heights must be non-decreasing',
      });
    }
    const { q } = state;
    const desired = [0, q / 2, q, (1 + q) / 2, 1];
    if (state.desiredMarkerPosition.some((value, i) => value !== desired[i])) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['desiredMarkerPosition'],
        message: `Desired marker increments must be [${desired.join(', ')}] for q=${q}`,
      });
    }
  });

/**
 * Sorted sliding window state.
 * @see shared/types/src/estimator-state.ts - SortedWindowState
 */
export const SortedWindowStateSchema: z.ZodType<SortedWindowState> = z
  .object({
    sortedWindow: z.array(z.number()),
    unsortedWindow: z.array(z.number()),
    windowSize: CapacitySchema,
  })
  .superRefine((state, ctx) => {
    if (state.sortedWindow.length !== state.unsortedWindow.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['unsortedWindow'],
        message: 'Sorted and insertion-ordered views must hold the same number of values',
      });
      return;
    }
    if (state.sortedWindow.length > state.windowSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sortedWindow'],
        message: `Window holds ${state.sortedWindow.length} values but capacity is ${state.windowSize}`,
      });
    }
    if (!isNonDecreasing(state.sortedWindow)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sortedWindow'],
        message: 'Sorted view must be ascending',
      });
      return;
    }
    const resorted = [...state.unsortedWindow].sort((a, b) => a - b);
    if (resorted.some((value, i) => value !== state.sortedWindow[i])) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['unsortedWindow'],
        message: 'Sorted and insertion-ordered views must hold the same values',
      });
    }
  });

/**
 * Rolling quantile state.
 * @see shared/types/src/estimator-state.ts - RollingQuantileState
 */
export const RollingQuantileStateSchema: z.ZodType<RollingQuantileState> = z
  .object({
    sortedWindow: SortedWindowStateSchema,
    q: QuantileSchema,
    windowSize: WindowSizeSchema,
    lower: CountSchema,
    higher: CountSchema,
    frac: z.number().min(0).max(1),
  })
  .superRefine((state, ctx) => {
    if (state.sortedWindow.windowSize !== state.windowSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sortedWindow', 'windowSize'],
        message: 'Sorted window capacity must match the rolling window size',
      });
    }
    if (state.lower >= state.windowSize || state.higher >= state.windowSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lower'],
        message: 'Interpolation ranks must lie inside the window',
      });
    }
  });

export const SumStateSchema: z.ZodType<SumState> = z.object({
  sum: z.number(),
});

export const MeanStateSchema: z.ZodType<MeanState> = z.object({
  mean: z.number(),
  count: CountSchema,
});

export const VarianceStateSchema: z.ZodType<VarianceState> = z.object({
  mean: z.number(),
  count: CountSchema,
  m2: z.number().min(0, 'Sum of squared deviations cannot be negative'),
  ddof: DdofSchema,
});

export const MinStateSchema: z.ZodType<MinState> = z.object({
  min: z.number(),
});

export const MaxStateSchema: z.ZodType<MaxState> = z.object({
  max: z.number(),
});

export const PeakToPeakStateSchema: z.ZodType<PeakToPeakState> = z.object({
  min: MinStateSchema,
  max: MaxStateSchema,
});

export const RollingMinStateSchema: z.ZodType<RollingMinState> = z.object({
  sortedWindow: SortedWindowStateSchema,
});

export const RollingMaxStateSchema: z.ZodType<RollingMaxState> = z.object({
  sortedWindow: SortedWindowStateSchema,
});

export const RollingPeakToPeakStateSchema: z.ZodType<RollingPeakToPeakState> = z.object({
  min: RollingMinStateSchema,
  max: RollingMaxStateSchema,
});

export const IQRStateSchema: z.ZodType<IQRState> = z
  .object({
    qInf: QuantileStateSchema,
    qSup: QuantileStateSchema,
  })
  .refine((state) => state.qInf.q < state.qSup.q, {
    message: 'Lower quantile must be below upper quantile',
    path: ['qInf', 'q'],
  });

export const RollingIQRStateSchema: z.ZodType<RollingIQRState> = z
  .object({
    qInf: RollingQuantileStateSchema,
    qSup: RollingQuantileStateSchema,
  })
  .refine((state) => state.qInf.q < state.qSup.q, {
    message: 'Lower quantile must be below upper quantile',
    path: ['qInf', 'q'],
  });

export const RevertibleSnapshotSchema: z.ZodType<RevertibleSnapshot> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('sum'), state: SumStateSchema }),
  z.object({ kind: z.literal('mean'), state: MeanStateSchema }),
  z.object({ kind: z.literal('variance'), state: VarianceStateSchema }),
]);

/**
 * Rolling decorator state.
 * @see shared/types/src/estimator-state.ts - RollingState
 */
export const RollingStateSchema: z.ZodType<RollingState> = z
  .object({
    windowSize: WindowSizeSchema,
    observations: z.array(z.number()),
    statistic: RevertibleSnapshotSchema,
  })
  .superRefine((state, ctx) => {
    if (state.observations.length > state.windowSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['observations'],
        message: `Window holds ${state.observations.length} observations but its size is ${state.windowSize}`,
      });
    }
    const { statistic } = state;
    if (statistic.kind !== 'sum' && statistic.state.count !== state.observations.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['statistic', 'state', 'count'],
        message: 'Statistic count must equal the number of observations in the window',
      });
    }
  });

/**
 * Tagged estimator snapshot.
 * @see shared/types/src/estimator-state.ts - EstimatorSnapshot
 */
export const EstimatorSnapshotSchema: z.ZodType<EstimatorSnapshot> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('quantile'), state: QuantileStateSchema }),
  z.object({ kind: z.literal('rolling-quantile'), state: RollingQuantileStateSchema }),
  z.object({ kind: z.literal('sum'), state: SumStateSchema }),
  z.object({ kind: z.literal('mean'), state: MeanStateSchema }),
  z.object({ kind: z.literal('variance'), state: VarianceStateSchema }),
  z.object({ kind: z.literal('min'), state: MinStateSchema }),
  z.object({ kind: z.literal('max'), state: MaxStateSchema }),
  z.object({ kind: z.literal('peak-to-peak'), state: PeakToPeakStateSchema }),
  z.object({ kind: z.literal('rolling-min'), state: RollingMinStateSchema }),
  z.object({ kind: z.literal('rolling-max'), state: RollingMaxStateSchema }),
  z.object({ kind: z.literal('rolling-peak-to-peak'), state: RollingPeakToPeakStateSchema }),
  z.object({ kind: z.literal('iqr'), state: IQRStateSchema }),
  z.object({ kind: z.literal('rolling-iqr'), state: RollingIQRStateSchema }),
  z.object({ kind: z.literal('rolling'), state: RollingStateSchema }),
]);

// =============================================================================
// Estimator Spec Schemas (factory input)
// =============================================================================

/**
 * Revertible accumulators the rolling decorator can wrap.
 */
export const RevertibleSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('sum') }),
  z.object({ kind: z.literal('mean') }),
  z.object({ kind: z.literal('variance'), ddof: DdofSchema.optional() }),
]);

/**
 * Declarative description of an estimator. Omitted parameters fall back
 * to the configured defaults.
 */
export const EstimatorSpecSchema = z
  .discriminatedUnion('kind', [
    z.object({ kind: z.literal('quantile'), q: QuantileSchema.optional() }),
    z.object({
      kind: z.literal('rolling-quantile'),
      q: QuantileSchema.optional(),
      windowSize: WindowSizeSchema.optional(),
    }),
    z.object({ kind: z.literal('sum') }),
    z.object({ kind: z.literal('mean') }),
    z.object({ kind: z.literal('variance'), ddof: DdofSchema.optional() }),
    z.object({ kind: z.literal('min') }),
    z.object({ kind: z.literal('max') }),
    z.object({ kind: z.literal('peak-to-peak') }),
    z.object({ kind: z.literal('rolling-min'), windowSize: WindowSizeSchema.optional() }),
    z.object({ kind: z.literal('rolling-max'), windowSize: WindowSizeSchema.optional() }),
    z.object({ kind: z.literal('rolling-peak-to-peak'), windowSize: WindowSizeSchema.optional() }),
    z.object({
      kind: z.literal('iqr'),
      qInf: QuantileSchema.optional(),
      qSup: QuantileSchema.optional(),
    }),
    z.object({
      kind: z.literal('rolling-iqr'),
      qInf: QuantileSchema.optional(),
      qSup: QuantileSchema.optional(),
      windowSize: WindowSizeSchema.optional(),
    }),
    z.object({
      kind: z.literal('rolling'),
      of: RevertibleSpecSchema,
      windowSize: WindowSizeSchema.optional(),
    }),
  ])
  .superRefine((spec, ctx) => {
    if (spec.kind !== 'iqr' && spec.kind !== 'rolling-iqr') return;
    if (spec.qInf !== undefined && spec.qSup !== undefined && spec.qInf >= spec.qSup) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['qInf'],
        message: 'Lower quantile must be below upper quantile',
      });
    }
  });

export type RevertibleSpec = z.infer<typeof RevertibleSpecSchema>;
export type EstimatorSpec = z.infer<typeof EstimatorSpecSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Validation result with detailed errors.
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: Array<{ path: string; message: string }> };

/**
 * Validate data against a schema and return detailed result.
 * Does NOT throw - returns result object for handling.
 */
export function validateWithDetails<T>(
  schema: z.ZodSchema<T>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}

/**
 * Validate data and throw on failure.
 * Use at construction/load time, not in hot paths.
 *
 * @throws Error with detailed validation failures
 */
export function validateOrThrow<T>(
  schema: z.ZodSchema<T>,
  data: unknown,
  context: string
): T {
  const result = validateWithDetails(schema, data);

  if (result.success) {
    return result.data;
  }

  const errorDetails = result.errors
    .map((e) => `  - ${e.path || '(root)'}: ${e.message}`)
    .join('\n');

  throw new Error(
    `Config validation failed for ${context}:\n${errorDetails}`
  );
}

/**
 * Create a validator function for a specific schema.
 * Useful for repeated validation of the same type.
 */
export function createValidator<T>(
  schema: z.ZodSchema<T>,
  context: string
): (data: unknown) => T {
  return (data: unknown) => validateOrThrow(schema, data, context);
}

function isNonDecreasing(values: readonly number[]): boolean {
  for (let i = 1; i < values.length; i++) {
    if (values[i] < values[i - 1]) return false;
  }
  return true;
}

// =============================================================================
// Exports
// =============================================================================

export { z } from 'zod';
