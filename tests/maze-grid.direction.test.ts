import { describe, expect, it } from 'vitest';

import {
  ALL_WALLS,
  DIRECTIONS,
  Direction,
  between,
  directionName,
  neighbour,
  nextDirection,
  oppositeDirection,
  prevDirection,
  rowAndCol,
  taxicabDistance,
  type MazeDimensions,
} from '../src/domain/MazeGrid';

const GRID_3X3: MazeDimensions = { width: 3, height: 3 };
const GRID_4X3: MazeDimensions = { width: 4, height: 3 };

describe('maze grid directions', () => {
  it('rotates clockwise and anticlockwise', () => {
    expect(DIRECTIONS.map(nextDirection)).toEqual([
      Direction.East,
      Direction.South,
      Direction.West,
      Direction.North,
    ]);
    expect(DIRECTIONS.map(prevDirection)).toEqual([
      Direction.West,
      Direction.North,
      Direction.East,
      Direction.South,
    ]);

    for (const direction of DIRECTIONS) {
      expect(prevDirection(nextDirection(direction))).toBe(direction);
      expect(oppositeDirection(oppositeDirection(direction))).toBe(direction);
    }

    expect(oppositeDirection(Direction.North)).toBe(Direction.South);
    expect(oppositeDirection(Direction.East)).toBe(Direction.West);
    expect(directionName(Direction.West)).toBe('west');
    expect(ALL_WALLS).toBe(15);
  });

  it('returns null outside the grid at the corners', () => {
    expect(neighbour(GRID_3X3, 0, Direction.North)).toBeNull();
    expect(neighbour(GRID_3X3, 0, Direction.West)).toBeNull();
    expect(neighbour(GRID_3X3, 0, Direction.East)).toBe(1);
    expect(neighbour(GRID_3X3, 0, Direction.South)).toBe(3);

    expect(neighbour(GRID_3X3, 2, Direction.North)).toBeNull();
    expect(neighbour(GRID_3X3, 2, Direction.East)).toBeNull();
    expect(neighbour(GRID_3X3, 6, Direction.South)).toBeNull();
    expect(neighbour(GRID_3X3, 6, Direction.West)).toBeNull();

    expect(neighbour(GRID_3X3, 8, Direction.East)).toBeNull();
    expect(neighbour(GRID_3X3, 8, Direction.South)).toBeNull();
    expect(neighbour(GRID_3X3, 8, Direction.North)).toBe(5);
    expect(neighbour(GRID_3X3, 8, Direction.West)).toBe(7);
  });

  it('does not wrap across row boundaries', () => {
    expect(neighbour(GRID_4X3, 3, Direction.East)).toBeNull();
    expect(neighbour(GRID_4X3, 4, Direction.West)).toBeNull();
    expect(neighbour(GRID_4X3, 7, Direction.East)).toBeNull();
    expect(between(GRID_4X3, 3, 4)).toBeNull();
    expect(between(GRID_4X3, 4, 3)).toBeNull();
  });

  it('keeps neighbour and between inverse to each other', () => {
    const total = GRID_4X3.width * GRID_4X3.height;

    for (let cell = 0; cell < total; cell += 1) {
      for (const direction of DIRECTIONS) {
        const adjacent = neighbour(GRID_4X3, cell, direction);
        if (adjacent === null) {
          continue;
        }

        expect(between(GRID_4X3, cell, adjacent)).toBe(direction);
        expect(between(GRID_4X3, adjacent, cell)).toBe(oppositeDirection(direction));
      }
    }
  });

  it('reports no direction for distant or identical cells', () => {
    expect(between(GRID_3X3, 0, 4)).toBeNull();
    expect(between(GRID_3X3, 0, 2)).toBeNull();
    expect(between(GRID_3X3, 4, 4)).toBeNull();
  });

  it('converts indexes to positions and measures taxicab distance', () => {
    expect(rowAndCol(GRID_4X3, 7)).toEqual({ row: 1, col: 3 });
    expect(rowAndCol(GRID_4X3, 8)).toEqual({ row: 2, col: 0 });
    expect(taxicabDistance(GRID_4X3, 0, 11)).toBe(5);
    expect(taxicabDistance(GRID_4X3, 11, 0)).toBe(5);
    expect(taxicabDistance(GRID_4X3, 5, 5)).toBe(0);
  });
});
