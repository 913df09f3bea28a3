import { config } from './config';
import type GridState from './grid/grid';
import OccupancySimulator, {
  type RunStats,
  type SimulatorOptions,
} from './simulator/simulator';
import type {
  OccupancyPercentages,
  OccupancyTally,
} from './simulator/simulator.tally';
import { timed } from './utils/timing';

/** Everything a caller may want from one simulation. */
export interface SimulationResult {
  percentages: OccupancyPercentages;
  tally: OccupancyTally;
  stats: RunStats;
  /** Board at the end of the run. */
  grid: GridState;
  /** Wall-clock duration of the run itself (simulator construction excluded). */
  elapsedMs: number;
}

/**
 * Estimate the long-run occupancy of the 2×3 board starting with the empty slot at
 * `(startX, startY)`.
 *
 * @param n - Accepted-move iterations. Default: `config.defaultIterations`.
 * @example
 * const { percentages } = simulate(0, 0, 100_000, { seed: 1 });
 */
export function simulate(
  startX: number,
  startY: number,
  n: number = config.defaultIterations,
  options: SimulatorOptions = {}
): SimulationResult {
  const simulator = new OccupancySimulator(options);
  const { result: tally, elapsedMs } = timed(() =>
    simulator.runTally(startX, startY, n)
  );
  const grid = simulator.lastGrid();
  if (!grid) throw new Error('simulator finished without a board');
  return {
    percentages: tally.toPercentages(),
    tally,
    stats: simulator.lastRunStats(),
    grid,
    elapsedMs,
  };
}
