import {
  GRID_COLUMNS,
  GRID_ROWS,
  POSITION_LABELS,
  type Coordinate,
  type PositionLabel,
} from '../grid/grid.constants';
import {
  OccupancyInvariantError,
  SimulationConfigError,
} from '../grid/grid.errors';

/** Per-position counters keyed by label. */
export type OccupancyCounts = Record<PositionLabel, number>;

/** Relative frequency per position; every value in [0,1]. */
export type OccupancyPercentages = Record<PositionLabel, number>;

/**
 * Map a coordinate to its row-major label.
 *
 * @throws OccupancyInvariantError for anything outside the six canonical positions.
 */
export function labelFor(position: Coordinate): PositionLabel {
  const [x, y] = position;
  if (
    !Number.isInteger(x) ||
    !Number.isInteger(y) ||
    x < 0 ||
    x >= GRID_COLUMNS ||
    y < 0 ||
    y >= GRID_ROWS
  ) {
    throw new OccupancyInvariantError(position);
  }
  return POSITION_LABELS[y * GRID_COLUMNS + x];
}

/** Inverse of {@link labelFor}. */
export function coordinateOf(label: PositionLabel): Coordinate {
  const index = POSITION_LABELS.indexOf(label);
  return [index % GRID_COLUMNS, Math.floor(index / GRID_COLUMNS)];
}

function zeroCounts(): OccupancyCounts {
  return { zero: 0, one: 0, two: 0, three: 0, four: 0, five: 0 };
}

/**
 * Frequency tally of where the empty slot sits after each accepted move.
 *
 * `iterations` is the planned run length; `recorded` grows by one per {@link record}
 * call and always equals the sum of the six counters.
 */
export class OccupancyTally {
  readonly iterations: number;
  private readonly _counts: OccupancyCounts = zeroCounts();
  private _recorded = 0;

  constructor(iterations: number) {
    if (!Number.isSafeInteger(iterations) || iterations < 0) {
      throw new SimulationConfigError(
        `iterations must be a non-negative integer, got ${iterations}`
      );
    }
    this.iterations = iterations;
  }

  /** Number of positions recorded so far. */
  get recorded(): number {
    return this._recorded;
  }

  /** Count one visit to `position`. */
  record(position: Coordinate): void {
    this._counts[labelFor(position)]++;
    this._recorded++;
  }

  /** Copy of the six counters. */
  counts(): OccupancyCounts {
    return { ...this._counts };
  }

  countOf(label: PositionLabel): number {
    return this._counts[label];
  }

  /**
   * Divide every counter by `iterations`.
   *
   * @throws SimulationConfigError when `iterations` is 0 (percentages are undefined).
   */
  toPercentages(): OccupancyPercentages {
    if (this.iterations === 0) {
      throw new SimulationConfigError(
        'percentages are undefined for a tally with zero iterations'
      );
    }
    const out = zeroCounts();
    for (const label of POSITION_LABELS) {
      out[label] = this._counts[label] / this.iterations;
    }
    return out;
  }

  /**
   * Combine two finished tallies into a new one by summing counters and iterations.
   * Percentages are never averaged; they are derived again from the merged counts.
   */
  merge(other: OccupancyTally): OccupancyTally {
    const merged = new OccupancyTally(this.iterations + other.iterations);
    for (const label of POSITION_LABELS) {
      merged._counts[label] = this._counts[label] + other._counts[label];
    }
    merged._recorded = this._recorded + other._recorded;
    return merged;
  }
}
