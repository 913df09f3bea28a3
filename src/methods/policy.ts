import type GridState from '../grid/grid';
import {
  IllegalMoveError,
  ResampleLimitError,
  SimulationConfigError,
} from '../grid/grid.errors';
import { directionFromSample } from './direction';

/** Bookkeeping for one accepted move. */
export interface MoveOutcome {
  /** Random values consumed. */
  draws: number;
  /** Draws whose direction was illegal and got discarded. */
  rejected: number;
}

/**
 * Advance `grid` by exactly one accepted move.
 *
 * @param grid - Board to mutate.
 * @param rng - Uniform source in [0,1).
 * @param maxAttempts - Optional cap on draws for this move.
 */
export type MoveStep = (
  grid: GridState,
  rng: () => number,
  maxAttempts?: number
) => MoveOutcome;

/**
 * Classic rejection sampling: pick one of four directions uniformly, attempt it and
 * redraw on an illegal move until one succeeds.
 */
function rejectionStep(
  grid: GridState,
  rng: () => number,
  maxAttempts?: number
): MoveOutcome {
  let draws = 0;
  for (;;) {
    if (maxAttempts !== undefined && draws >= maxAttempts) {
      throw new ResampleLimitError(draws, grid.currentPosition());
    }
    draws++;
    try {
      grid.move(directionFromSample(rng()));
      return { draws, rejected: draws - 1 };
    } catch (err) {
      if (!(err instanceof IllegalMoveError)) throw err;
      // illegal at this boundary: discard and redraw
    }
  }
}

/**
 * One draw mapped uniformly over the directions legal at the current position.
 * Same acceptance distribution as rejection sampling, never rejects.
 *
 * @throws SimulationConfigError when `rng` yields a value outside [0,1).
 */
function filteredStep(grid: GridState, rng: () => number): MoveOutcome {
  const legal = grid.legalDirections();
  const v = rng();
  if (!(v >= 0 && v < 1)) {
    throw new SimulationConfigError(`rng must return a value in [0, 1), got ${v}`);
  }
  const index = Math.floor(v * legal.length);
  grid.move(legal[index]);
  return { draws: 1, rejected: 0 };
}

/**
 * Move-selection policies understood by {@link OccupancySimulator}.
 */
export const policy = {
  /** Uniform over four directions; illegal draws are discarded and redrawn. */
  REJECTION: {
    name: 'REJECTION',
    step: rejectionStep,
  },

  /** Uniform over the legal directions only; one draw per move. */
  FILTERED: {
    name: 'FILTERED',
    step: filteredStep,
  },
} as const satisfies Record<string, { name: string; step: MoveStep }>;

export type PolicyName = keyof typeof policy;

/** Narrow an arbitrary string (case-insensitive) to a policy name. */
export function parsePolicyName(value: string): PolicyName | undefined {
  const upper = value.toUpperCase();
  return upper === 'REJECTION' || upper === 'FILTERED' ? upper : undefined;
}
