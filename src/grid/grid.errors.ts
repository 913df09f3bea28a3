import type { Coordinate } from './grid.constants';

/**
 * Base class for every error raised by gridwalk. Lets callers catch library
 * failures with a single `instanceof` check.
 */
export class GridwalkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GridwalkError';
  }
}

/**
 * A directional move would push the empty slot off the board.
 *
 * Recoverable: the simulator discards the attempt and redraws a direction.
 */
export class IllegalMoveError extends GridwalkError {
  /** Empty-slot coordinate when the move was attempted. */
  readonly from: Coordinate;
  /** Destination that falls outside the board (may hold -1, 2 or 3). */
  readonly to: Coordinate;

  constructor(from: Coordinate, to: Coordinate) {
    super(
      `Move not possible: (${from[0]}, ${from[1]}) -> (${to[0]}, ${to[1]})`
    );
    this.name = 'IllegalMoveError';
    this.from = from;
    this.to = to;
  }
}

/** Starting coordinate outside the fixed 2×3 board. */
export class GridConfigError extends GridwalkError {
  constructor(message: string) {
    super(message);
    this.name = 'GridConfigError';
  }
}

/** Invalid iteration count, seed, policy or tally conversion request. */
export class SimulationConfigError extends GridwalkError {
  constructor(message: string) {
    super(message);
    this.name = 'SimulationConfigError';
  }
}

/**
 * A legal move produced a coordinate outside the six canonical positions.
 * Unrecoverable; aborts the run.
 */
export class OccupancyInvariantError extends GridwalkError {
  readonly position: Coordinate;

  constructor(position: Coordinate) {
    super(
      `Empty slot reached unknown position (${position[0]}, ${position[1]})`
    );
    this.name = 'OccupancyInvariantError';
    this.position = position;
  }
}

/** Optional per-iteration redraw cap (`maxResampleAttempts`) was exceeded. */
export class ResampleLimitError extends GridwalkError {
  readonly attempts: number;
  readonly position: Coordinate;

  constructor(attempts: number, position: Coordinate) {
    super(
      `No legal move accepted after ${attempts} draws at (${position[0]}, ${position[1]})`
    );
    this.name = 'ResampleLimitError';
    this.attempts = attempts;
    this.position = position;
  }
}
