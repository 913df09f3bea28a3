/**
 * The four directions the empty slot can be asked to move, in sampling order.
 *
 * A uniform draw `v ∈ [0,1)` is split into equal quarters following this order:
 * `v < 0.25` → UP, `v < 0.5` → DOWN, `v < 0.75` → LEFT, otherwise RIGHT.
 *
 * `dx` / `dy` describe where the empty slot travels; y grows downward (row 0 is the top row).
 */
export const direction = {
  /** Towards row 0. */
  UP: {
    name: 'UP',
    dx: 0,
    dy: -1,
  },

  /** Towards row 1. */
  DOWN: {
    name: 'DOWN',
    dx: 0,
    dy: 1,
  },

  /** Towards column 0. */
  LEFT: {
    name: 'LEFT',
    dx: -1,
    dy: 0,
  },

  /** Towards column 2. */
  RIGHT: {
    name: 'RIGHT',
    dx: 1,
    dy: 0,
  },
} as const;

export type DirectionName = keyof typeof direction;

/** Sampling order; index i owns the quarter [i/4, (i+1)/4). */
export const DIRECTION_ORDER: readonly DirectionName[] = [
  'UP',
  'DOWN',
  'LEFT',
  'RIGHT',
];

/**
 * Map a uniform draw onto a direction using the fixed quarter partition.
 *
 * Values at or above 0.75 (including any out-of-contract value ≥ 1) select RIGHT.
 *
 * @example
 * directionFromSample(0.1);  // 'UP'
 * directionFromSample(0.5);  // 'LEFT'
 */
export function directionFromSample(value: number): DirectionName {
  if (value < 0.25) return 'UP';
  if (value < 0.5) return 'DOWN';
  if (value < 0.75) return 'LEFT';
  return 'RIGHT';
}
