/**
 * Public surface of the gridwalk library.
 */
export { config } from './config';
export type { GridwalkConfig } from './config';
export { default as GridState } from './grid/grid';
export {
  GRID_COLUMNS,
  GRID_ROWS,
  POSITION_LABELS,
} from './grid/grid.constants';
export type { Cell, Coordinate, PositionLabel } from './grid/grid.constants';
export {
  GridwalkError,
  IllegalMoveError,
  GridConfigError,
  SimulationConfigError,
  OccupancyInvariantError,
  ResampleLimitError,
} from './grid/grid.errors';
export { renderBoard } from './grid/grid.render';
export type { RenderOptions } from './grid/grid.render';
export {
  direction,
  DIRECTION_ORDER,
  directionFromSample,
} from './methods/direction';
export type { DirectionName } from './methods/direction';
export { policy, parsePolicyName } from './methods/policy';
export type { PolicyName, MoveOutcome, MoveStep } from './methods/policy';
export { default as OccupancySimulator } from './simulator/simulator';
export type { SimulatorOptions, RunStats } from './simulator/simulator';
export {
  OccupancyTally,
  labelFor,
  coordinateOf,
} from './simulator/simulator.tally';
export type {
  OccupancyCounts,
  OccupancyPercentages,
} from './simulator/simulator.tally';
export {
  DeterministicRandom,
  entropySeed,
} from './simulator/simulator.deterministic';
export type { RNGSnapshot } from './simulator/simulator.deterministic';
export {
  formatPercentages,
  exportTallyCSV,
  exportTallyJSONL,
  tallyRows,
} from './simulator/simulator.report';
export type { TallyRow } from './simulator/simulator.report';
export { simulate } from './simulate';
export type { SimulationResult } from './simulate';
export { timed, formatDuration } from './utils/timing';
export { onceWarn } from './utils/warnings';
