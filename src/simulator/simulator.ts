import GridState from '../grid/grid';
import { SimulationConfigError } from '../grid/grid.errors';
import { config } from '../config';
import { policy, type MoveStep, type PolicyName } from '../methods/policy';
import {
  DeterministicRandom,
  entropySeed,
  isValidSeed,
  type RNGSnapshot,
} from './simulator.deterministic';
import { OccupancyTally, type OccupancyPercentages } from './simulator.tally';
import { onceWarn } from '../utils/warnings';

/**
 * Construction options for {@link OccupancySimulator}.
 *
 * Example:
 * const sim = new OccupancySimulator({ seed: 42, policy: 'FILTERED' });
 */
export interface SimulatorOptions {
  /** Uniform source in [0,1). Takes precedence over `seed`; intended for deterministic tests. */
  rng?: () => number;
  /** Seed for the built-in PRNG. Omit to seed from the OS entropy pool. */
  seed?: number;
  /** Move-selection policy. Default: `config.defaultPolicy`. */
  policy?: PolicyName;
  /** Cap on draws per accepted move. Default: `config.maxResampleAttempts` (uncapped). */
  maxResampleAttempts?: number;
}

/** Counters describing the most recent run. */
export interface RunStats {
  /** Accepted moves performed. */
  iterations: number;
  /** Random values consumed by move selection. */
  draws: number;
  /** Draws discarded because they pointed off the board. */
  rejected: number;
}

/**
 * Monte Carlo driver estimating where the empty slot spends its time on the 2×3 board.
 *
 * Each iteration performs exactly one accepted move (possibly after several discarded
 * draws) and then tallies the empty slot's position. The generator belongs to the
 * simulator instance; two simulators built with the same seed produce identical tallies.
 *
 * @example
 * const sim = new OccupancySimulator({ seed: 7 });
 * const pct = sim.run(0, 0, 1_000_000);
 * pct.four; // ≈ 3/14
 */
export default class OccupancySimulator {
  readonly policy: PolicyName;
  readonly maxResampleAttempts?: number;
  /** Built-in generator; undefined while a caller supplied `rng` is installed. */
  private _random?: DeterministicRandom;
  private _rng: () => number;
  private _lastStats: RunStats = { iterations: 0, draws: 0, rejected: 0 };
  private _lastGrid?: GridState;

  constructor(options: SimulatorOptions = {}) {
    const policyName = options.policy ?? config.defaultPolicy;
    if (!Object.prototype.hasOwnProperty.call(policy, policyName)) {
      throw new SimulationConfigError(`Unknown policy '${policyName}'`);
    }
    this.policy = policyName;

    const cap = options.maxResampleAttempts ?? config.maxResampleAttempts;
    if (cap !== undefined && (!Number.isSafeInteger(cap) || cap < 1)) {
      throw new SimulationConfigError(
        `maxResampleAttempts must be a positive integer, got ${cap}`
      );
    }
    this.maxResampleAttempts = cap;

    if (typeof options.rng === 'function') {
      this._rng = options.rng;
    } else {
      if (options.seed !== undefined && !isValidSeed(options.seed)) {
        throw new SimulationConfigError(
          `seed must be a non-negative integer, got ${options.seed}`
        );
      }
      this._random = new DeterministicRandom(options.seed ?? entropySeed());
      this._rng = this._random.next;
    }
  }

  /**
   * Run `n` accepted-move iterations from `(startX, startY)` and return the share of
   * iterations that ended on each position.
   *
   * @throws GridConfigError for a start outside the board.
   * @throws SimulationConfigError when `n` is not a positive integer.
   */
  run(startX: number, startY: number, n: number): OccupancyPercentages {
    return this.runTally(startX, startY, n).toPercentages();
  }

  /**
   * Same as {@link run} but returns the raw counters.
   */
  runTally(startX: number, startY: number, n: number): OccupancyTally {
    if (!Number.isSafeInteger(n) || n < 1) {
      throw new SimulationConfigError(
        `iteration count must be a positive integer, got ${n}`
      );
    }
    const grid = new GridState(startX, startY);
    const tally = new OccupancyTally(n);
    if (n > config.largeRunWarningThreshold) {
      onceWarn(
        'large-run',
        `[gridwalk] running ${n} iterations; expect run time proportional to n`
      );
    }

    const step: MoveStep = policy[this.policy].step;
    const rng = this._rng;
    const cap = this.maxResampleAttempts;
    let draws = 0;
    let rejected = 0;
    for (let i = 0; i < n; i++) {
      const outcome = step(grid, rng, cap);
      draws += outcome.draws;
      rejected += outcome.rejected;
      tally.record(grid.currentPosition());
    }
    this._lastStats = { iterations: n, draws, rejected };
    this._lastGrid = grid;
    return tally;
  }

  /** Counters from the most recent {@link runTally} / {@link run} call. */
  lastRunStats(): RunStats {
    return { ...this._lastStats };
  }

  /** Board as it stood at the end of the most recent run. */
  lastGrid(): GridState | undefined {
    return this._lastGrid;
  }

  /** Produce `count` random samples from the simulator's generator. */
  sampleRandom(count: number): number[] {
    const arr: number[] = [];
    for (let i = 0; i < count; i++) arr.push(this._rng());
    return arr;
  }

  /**
   * Snapshot of the built-in generator, or undefined when a caller supplied `rng`
   * is in use.
   */
  snapshotRNGState(): RNGSnapshot | undefined {
    return this._random?.snapshot();
  }

  /**
   * Resume the built-in generator from a snapshot. Replaces any caller supplied `rng`.
   */
  restoreRNGState(snapshot: RNGSnapshot): void {
    if (!this._random) {
      this._random = new DeterministicRandom(snapshot.state);
      this._rng = this._random.next;
    }
    this._random.restore(snapshot);
  }
}
