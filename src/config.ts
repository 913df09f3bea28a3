import type { PolicyName } from './methods/policy';

/**
 * Global gridwalk configuration contract & default instance.
 *
 * A central `config` object gives end-users (and tests) one documented place to tweak
 * library behaviour without digging through scattered constants.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'gridwalk';
 *   config.warnings = true;           // enable runtime warnings
 *   config.maxResampleAttempts = 64;  // cap redraws per accepted move
 *
 * Adjust BEFORE constructing simulators; options are resolved at construction time.
 *
 * DESIGN NOTES
 * ------------
 * - Plain serializable object, no setters / proxies.
 * - Optional flags default to the classic behaviour (uncapped rejection sampling).
 */
export interface GridwalkConfig {
  /**
   * Emit guidance & safety warnings through `console.warn`.
   * Default: false
   */
  warnings: boolean;

  /**
   * Iteration count used by the CLI (and `simulate`) when the caller supplies none.
   * Default: 100_000_000
   */
  defaultIterations: number;

  /**
   * Upper bound on random draws spent on a single accepted move. `undefined` = no cap.
   * At least two of four directions are legal everywhere on the 2×3 grid, so the cap
   * never changes observed statistics for sane values; exceeding it raises
   * `ResampleLimitError`.
   */
  maxResampleAttempts?: number;

  /**
   * Runs longer than this many iterations log a one-time warning (when `warnings` is on).
   */
  largeRunWarningThreshold: number;

  /**
   * Move-selection policy used when a simulator is built without an explicit `policy`.
   * Default: 'REJECTION'
   */
  defaultPolicy: PolicyName;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: GridwalkConfig = {
  warnings: false, // emit runtime guidance
  defaultIterations: 100_000_000, // reference run length
  largeRunWarningThreshold: 10_000_000,
  defaultPolicy: 'REJECTION',
  // maxResampleAttempts: 64, // example safety cap
};
