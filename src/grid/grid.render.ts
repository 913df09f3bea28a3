import type GridState from './grid';
import { colors } from './grid.colors';

/** Options for {@link renderBoard}. */
export interface RenderOptions {
  /** Highlight the empty cell with ANSI colour codes. Default: false. */
  color?: boolean;
}

const EMPTY_CELL = '[ ]';
const PARTICLE_CELL = '[.]';

/**
 * Draw the board as text, one row per line, followed by the empty-slot coordinate.
 *
 * @example
 * renderBoard(new GridState(1, 0));
 * // [.][ ][.]
 * // [.][.][.]
 * // Empty spot position: (1, 0)
 */
export function renderBoard(grid: GridState, options: RenderOptions = {}): string {
  const empty = options.color
    ? `${colors.bright}${colors.neonAqua}${EMPTY_CELL}${colors.reset}`
    : EMPTY_CELL;
  let board = '';
  for (const row of grid.rows()) {
    for (const cell of row) board += cell === 'empty' ? empty : PARTICLE_CELL;
    board += '\n';
  }
  board += `Empty spot position: (${grid.emptyX}, ${grid.emptyY})`;
  return board;
}
