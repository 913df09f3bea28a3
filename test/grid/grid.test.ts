import GridState from '../../src/grid/grid';
import { GridConfigError, IllegalMoveError } from '../../src/grid/grid.errors';
import type { Coordinate } from '../../src/grid/grid.constants';
import { DIRECTION_ORDER } from '../../src/methods/direction';
import { seededRng } from '../utils/test-helpers';

const ALL_POSITIONS: Coordinate[] = [
  [0, 0],
  [1, 0],
  [2, 0],
  [0, 1],
  [1, 1],
  [2, 1],
];

/** Run `fn` and return the IllegalMoveError it throws. */
function captureIllegal(fn: () => void): IllegalMoveError {
  try {
    fn();
  } catch (err) {
    if (err instanceof IllegalMoveError) return err;
    throw err;
  }
  throw new Error('expected an IllegalMoveError');
}

describe('GridState', () => {
  describe('construction', () => {
    it.each(ALL_POSITIONS)('accepts start (%i, %i)', (x, y) => {
      // Arrange / Act
      const grid = new GridState(x, y);
      // Assert
      expect(grid.currentPosition()).toEqual([x, y]);
    });

    it('rejects a column past the right edge', () => {
      expect(() => new GridState(3, 0)).toThrow(
        new GridConfigError('startX must be an integer in [0, 2], got 3')
      );
    });

    it('rejects a row past the bottom edge', () => {
      expect(() => new GridState(0, 2)).toThrow(
        new GridConfigError('startY must be an integer in [0, 1], got 2')
      );
    });

    it.each([
      [-1, 0],
      [0, -1],
      [0.5, 0],
      [Number.NaN, 1],
    ])('rejects (%p, %p) with GridConfigError', (x, y) => {
      expect(() => new GridState(x, y)).toThrow(GridConfigError);
    });

    it('starts with exactly one empty cell at the start coordinate', () => {
      // Arrange
      const grid = new GridState(1, 1);
      // Act
      const rows = grid.rows();
      // Assert
      expect(rows).toEqual([
        ['particle', 'particle', 'particle'],
        ['particle', 'empty', 'particle'],
      ]);
    });
  });

  describe('moves from (0, 0)', () => {
    it('moveUp fails with destination y = -1', () => {
      // Arrange
      const grid = new GridState(0, 0);
      // Act
      const err = captureIllegal(() => grid.moveUp());
      // Assert
      expect(err.from).toEqual([0, 0]);
      expect(err.to).toEqual([0, -1]);
      expect(err.message).toBe('Move not possible: (0, 0) -> (0, -1)');
    });

    it('moveDown succeeds to (0, 1)', () => {
      const grid = new GridState(0, 0);
      grid.moveDown();
      expect(grid.currentPosition()).toEqual([0, 1]);
    });

    it('moveLeft fails with destination x = -1', () => {
      const grid = new GridState(0, 0);
      const err = captureIllegal(() => grid.moveLeft());
      expect(err.to).toEqual([-1, 0]);
    });

    it('moveRight succeeds to (1, 0)', () => {
      const grid = new GridState(0, 0);
      grid.moveRight();
      expect(grid.currentPosition()).toEqual([1, 0]);
    });
  });

  describe('moves from (2, 1)', () => {
    it('moveDown fails with destination y = 2', () => {
      const grid = new GridState(2, 1);
      const err = captureIllegal(() => grid.moveDown());
      expect(err.to).toEqual([2, 2]);
    });

    it('moveRight fails with destination x = 3', () => {
      const grid = new GridState(2, 1);
      const err = captureIllegal(() => grid.moveRight());
      expect(err.to).toEqual([3, 1]);
    });
  });

  describe('failed moves', () => {
    it('leave position and cells untouched', () => {
      // Arrange
      const grid = new GridState(0, 0);
      const before = grid.rows();
      // Act
      captureIllegal(() => grid.moveUp());
      captureIllegal(() => grid.moveLeft());
      // Assert
      expect(grid.currentPosition()).toEqual([0, 0]);
      expect(grid.rows()).toEqual(before);
    });
  });

  describe('opposite moves', () => {
    it('moveDown then moveUp returns to the top row', () => {
      const grid = new GridState(1, 0);
      grid.moveDown();
      grid.moveUp();
      expect(grid.currentPosition()).toEqual([1, 0]);
    });

    it('moveLeft then moveRight returns to the same column', () => {
      const grid = new GridState(1, 1);
      grid.moveLeft();
      grid.moveRight();
      expect(grid.currentPosition()).toEqual([1, 1]);
    });

    it('moveRight then moveLeft returns to the same column', () => {
      const grid = new GridState(1, 0);
      grid.moveRight();
      grid.moveLeft();
      expect(grid.currentPosition()).toEqual([1, 0]);
    });
  });

  describe('cell contents', () => {
    it('moveUp swaps the rows so the empty cell keeps its column', () => {
      // Arrange
      const grid = new GridState(1, 1);
      // Act
      grid.moveUp();
      // Assert
      expect(grid.rows()).toEqual([
        ['particle', 'empty', 'particle'],
        ['particle', 'particle', 'particle'],
      ]);
    });

    it('moveRight slides the empty cell along its row', () => {
      const grid = new GridState(0, 1);
      grid.moveRight();
      expect(grid.rows()).toEqual([
        ['particle', 'particle', 'particle'],
        ['particle', 'empty', 'particle'],
      ]);
    });
  });

  describe('legality', () => {
    it.each<[Coordinate, string[]]>([
      [[0, 0], ['DOWN', 'RIGHT']],
      [[1, 0], ['DOWN', 'LEFT', 'RIGHT']],
      [[2, 0], ['DOWN', 'LEFT']],
      [[0, 1], ['UP', 'RIGHT']],
      [[1, 1], ['UP', 'LEFT', 'RIGHT']],
      [[2, 1], ['UP', 'LEFT']],
    ])('legal directions from %p are %p', ([x, y], expected) => {
      expect(new GridState(x, y).legalDirections()).toEqual(expected);
    });

    it('corners block exactly two directions, edge centres one', () => {
      // Arrange
      const illegalCounts = ALL_POSITIONS.map(
        ([x, y]) =>
          DIRECTION_ORDER.filter((d) => !new GridState(x, y).canMove(d)).length
      );
      // Assert
      expect(illegalCounts).toEqual([2, 1, 2, 2, 1, 2]);
    });

    it('never blocks both directions of the same axis', () => {
      for (const [x, y] of ALL_POSITIONS) {
        const grid = new GridState(x, y);
        expect(grid.canMove('UP') || grid.canMove('DOWN')).toBe(true);
        expect(grid.canMove('LEFT') || grid.canMove('RIGHT')).toBe(true);
      }
    });

    it('canMove agrees with whether move throws', () => {
      for (const [x, y] of ALL_POSITIONS) {
        for (const d of DIRECTION_ORDER) {
          const grid = new GridState(x, y);
          const legal = grid.canMove(d);
          if (legal) expect(() => grid.move(d)).not.toThrow();
          else expect(() => grid.move(d)).toThrow(IllegalMoveError);
        }
      }
    });
  });

  describe('random move sequences', () => {
    it('stay inside the board with a single empty cell', () => {
      // Arrange
      const rng = seededRng('grid-bounds');
      const grid = new GridState(2, 0);
      // Act / Assert
      for (let i = 0; i < 500; i++) {
        const d = DIRECTION_ORDER[Math.floor(rng() * 4)];
        try {
          grid.move(d);
        } catch (err) {
          expect(err).toBeInstanceOf(IllegalMoveError);
        }
        const [x, y] = grid.currentPosition();
        expect(x >= 0 && x <= 2 && y >= 0 && y <= 1).toBe(true);
        const empties = grid.rows().flat().filter((c) => c === 'empty');
        expect(empties).toHaveLength(1);
        expect(grid.rows()[y][x]).toBe('empty');
      }
    });
  });

  it('currentPosition returns a frozen snapshot', () => {
    const grid = new GridState(0, 1);
    const position = grid.currentPosition();
    grid.moveRight();
    expect(Object.isFrozen(position)).toBe(true);
    expect(position).toEqual([0, 1]);
  });

  it('emptyX and emptyY follow the empty slot', () => {
    const grid = new GridState(2, 0);
    grid.moveLeft();
    grid.moveDown();
    expect([grid.emptyX, grid.emptyY]).toEqual([1, 1]);
  });
});
