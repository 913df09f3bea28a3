/**
 * Fixed geometry of the simulated board.
 *
 * The board is always 2 rows × 3 columns; positions are labelled row-major:
 *
 *   [zero ][one  ][two  ]
 *   [three][four ][five ]
 */

/** Number of columns (valid x: 0..2). */
export const GRID_COLUMNS = 3;

/** Number of rows (valid y: 0..1). */
export const GRID_ROWS = 2;

/** Position labels in row-major order; index = y * GRID_COLUMNS + x. */
export const POSITION_LABELS = [
  'zero',
  'one',
  'two',
  'three',
  'four',
  'five',
] as const;

export type PositionLabel = (typeof POSITION_LABELS)[number];

/** Read-only `[x, y]` coordinate pair. */
export type Coordinate = readonly [x: number, y: number];

/** Contents of a single cell. */
export type Cell = 'empty' | 'particle';
