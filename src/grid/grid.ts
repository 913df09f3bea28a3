import {
  GRID_COLUMNS,
  GRID_ROWS,
  type Cell,
  type Coordinate,
} from './grid.constants';
import { GridConfigError, IllegalMoveError } from './grid.errors';
import { direction, type DirectionName } from '../methods/direction';

/**
 * The 2×3 board seen from its single empty slot.
 *
 * Every cell but one holds an identical particle. Moving the empty slot in a direction
 * is the same as the neighbouring particle sliding the opposite way, so tracking the
 * empty coordinate is enough to describe the whole state. Cell contents are kept only
 * so the board can be rendered.
 *
 * With just two rows, UP and DOWN are plain row flips: UP is legal only from row 1 and
 * DOWN only from row 0.
 *
 * @example
 * const grid = new GridState(0, 0);
 * grid.moveRight();
 * grid.currentPosition(); // [1, 0]
 */
export default class GridState {
  private _emptyX: number;
  private _emptyY: number;
  /** Row-major cell contents, `cells[y][x]`. */
  private readonly _cells: Cell[][];

  /**
   * @param startX - Column of the empty slot, 0..2.
   * @param startY - Row of the empty slot, 0..1.
   * @throws GridConfigError when either coordinate is outside the board.
   */
  constructor(startX: number, startY: number) {
    if (!Number.isInteger(startX) || startX < 0 || startX >= GRID_COLUMNS) {
      throw new GridConfigError(
        `startX must be an integer in [0, ${GRID_COLUMNS - 1}], got ${startX}`
      );
    }
    if (!Number.isInteger(startY) || startY < 0 || startY >= GRID_ROWS) {
      throw new GridConfigError(
        `startY must be an integer in [0, ${GRID_ROWS - 1}], got ${startY}`
      );
    }
    this._emptyX = startX;
    this._emptyY = startY;
    this._cells = Array.from({ length: GRID_ROWS }, () =>
      Array.from({ length: GRID_COLUMNS }, (): Cell => 'particle')
    );
    this._cells[startY][startX] = 'empty';
  }

  /** Column of the empty slot. */
  get emptyX(): number {
    return this._emptyX;
  }

  /** Row of the empty slot. */
  get emptyY(): number {
    return this._emptyY;
  }

  /** Read-only snapshot of the empty-slot coordinate. */
  currentPosition(): Coordinate {
    return Object.freeze([this._emptyX, this._emptyY] as const);
  }

  /** Copy of the cell contents, `rows()[y][x]`. */
  rows(): Cell[][] {
    return this._cells.map((row) => row.slice());
  }

  /** @throws IllegalMoveError when the empty slot is already in the top row. */
  moveUp(): void {
    if (this._emptyY === 0) throw this._illegal('UP');
    this._swapRows();
    this._emptyY = 0;
  }

  /** @throws IllegalMoveError when the empty slot is already in the bottom row. */
  moveDown(): void {
    if (this._emptyY === 1) throw this._illegal('DOWN');
    this._swapRows();
    this._emptyY = 1;
  }

  /** @throws IllegalMoveError when the empty slot is in the leftmost column. */
  moveLeft(): void {
    if (this._emptyX === 0) throw this._illegal('LEFT');
    this._swapCells(this._emptyX - 1);
    this._emptyX -= 1;
  }

  /** @throws IllegalMoveError when the empty slot is in the rightmost column. */
  moveRight(): void {
    if (this._emptyX === GRID_COLUMNS - 1) throw this._illegal('RIGHT');
    this._swapCells(this._emptyX + 1);
    this._emptyX += 1;
  }

  /** Dispatch to the directional move matching `name`. */
  move(name: DirectionName): void {
    switch (name) {
      case 'UP':
        return this.moveUp();
      case 'DOWN':
        return this.moveDown();
      case 'LEFT':
        return this.moveLeft();
      case 'RIGHT':
        return this.moveRight();
      default:
        throw new GridConfigError(`Unknown direction '${String(name)}'`);
    }
  }

  /** Whether moving in `name` keeps the empty slot on the board. */
  canMove(name: DirectionName): boolean {
    const [x, y] = this._target(name);
    return x >= 0 && x < GRID_COLUMNS && y >= 0 && y < GRID_ROWS;
  }

  /** Legal directions from the current position, in sampling order. */
  legalDirections(): DirectionName[] {
    const legal: DirectionName[] = [];
    if (this.canMove('UP')) legal.push('UP');
    if (this.canMove('DOWN')) legal.push('DOWN');
    if (this.canMove('LEFT')) legal.push('LEFT');
    if (this.canMove('RIGHT')) legal.push('RIGHT');
    return legal;
  }

  private _target(name: DirectionName): Coordinate {
    const { dx, dy } = direction[name];
    return [this._emptyX + dx, this._emptyY + dy];
  }

  private _illegal(name: DirectionName): IllegalMoveError {
    return new IllegalMoveError(this.currentPosition(), this._target(name));
  }

  // Vertical moves trade whole rows: the empty cell keeps its column.
  private _swapRows(): void {
    const top = this._cells[0];
    this._cells[0] = this._cells[1];
    this._cells[1] = top;
  }

  private _swapCells(toX: number): void {
    const row = this._cells[this._emptyY];
    const held = row[toX];
    row[toX] = row[this._emptyX];
    row[this._emptyX] = held;
  }
}
