/**
 * Statistic Contracts
 *
 * Every running statistic in the workspace implements {@link Univariate}.
 * Statistics with an algebraic inverse (sum, mean, variance) also implement
 * {@link Revertible}, which is the only contract the generic rolling
 * decorator depends on.
 */

/**
 * Minimal running statistic: feed observations one at a time, read the
 * current value at any point.
 */
export interface Univariate {
  /** Incorporate one observation. */
  update(x: number): void;
  /** Current statistic value. Never mutates state. */
  get(): number;
}

/**
 * Outcome of a revert. Kept structural so that the `Result<void>` produced by
 * `@rollstat/core` error handling satisfies it without a dependency cycle.
 */
export type RevertResult =
  | { success: true }
  | { success: false; error: Error };

/**
 * A statistic that can undo a previously applied `update(x)`.
 */
export interface Revertible {
  revert(x: number): RevertResult;
}

/**
 * A statistic the rolling decorator can wrap.
 */
export type RollableUnivariate = Univariate & Revertible;
