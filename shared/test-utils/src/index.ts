/**
 * Test Utilities
 *
 * Seeded stream generators and brute-force reference statistics.
 *
 * ```typescript
 * import { StreamGenerator, lastN, naiveQuantile } from '@rollstat/test-utils';
 *
 * const values = new StreamGenerator(7).gaussian({ count: 300 });
 * const expected = naiveQuantile(lastN(values, 50), 0.9);
 * ```
 */

export * from './generators';
export * from './reference';
