import { describe, expect, it } from 'vitest';

import {
  ALL_WALLS,
  Direction,
  MazeInvariantError,
  carvePassage,
  clearSolutions,
  countPassages,
  createCellSolution,
  createMazeCells,
  isPerfectMaze,
  markEndpoints,
  markResultPath,
  openNeighbours,
  removeWall,
  requireCell,
  type MazeDimensions,
} from '../src/domain/MazeGrid';

const GRID_2X2: MazeDimensions = { width: 2, height: 2 };
const GRID_2X3: MazeDimensions = { width: 2, height: 3 };

function captureInvariantCode(action: () => unknown): string | null {
  try {
    action();
  } catch (error: unknown) {
    if (error instanceof MazeInvariantError) {
      return error.code;
    }

    throw error;
  }

  return null;
}

describe('maze grid cells', () => {
  it('starts fully walled with empty metadata', () => {
    const cells = createMazeCells(GRID_2X3);

    expect(cells).toHaveLength(6);
    for (const cell of cells) {
      expect(cell).toEqual({ walls: ALL_WALLS, walk: null, solution: createCellSolution() });
    }
  });

  it('carves passages on both sides of the shared wall', () => {
    const cells = createMazeCells(GRID_2X2);

    carvePassage(GRID_2X2, cells, 0, 1);
    expect(cells[0]?.walls).toBe(13);
    expect(cells[1]?.walls).toBe(7);

    carvePassage(GRID_2X2, cells, 3, 1);
    expect(cells[1]?.walls).toBe(3);
    expect(cells[3]?.walls).toBe(14);

    expect(openNeighbours(GRID_2X2, cells, 1)).toEqual([3, 0]);
    expect(openNeighbours(GRID_2X2, cells, 2)).toEqual([]);
    expect(countPassages(GRID_2X2, cells)).toBe(2);
  });

  it('rejects carving between cells that are not adjacent', () => {
    const cells = createMazeCells(GRID_2X2);

    expect(captureInvariantCode(() => carvePassage(GRID_2X2, cells, 0, 3))).toBe(
      'passage.not-adjacent',
    );
    expect(captureInvariantCode(() => requireCell(cells, 4))).toBe('cell.out-of-range');
  });

  it('detects walls that only one side removed', () => {
    const cells = createMazeCells(GRID_2X2);
    removeWall(requireCell(cells, 0), Direction.East);

    expect(captureInvariantCode(() => countPassages(GRID_2X2, cells))).toBe('walls.asymmetric');
  });

  it('recognises spanning trees only', () => {
    const tree = createMazeCells(GRID_2X2);
    carvePassage(GRID_2X2, tree, 0, 1);
    carvePassage(GRID_2X2, tree, 1, 3);
    carvePassage(GRID_2X2, tree, 3, 2);
    expect(isPerfectMaze(GRID_2X2, tree)).toBe(true);

    carvePassage(GRID_2X2, tree, 0, 2);
    expect(isPerfectMaze(GRID_2X2, tree)).toBe(false);

    // a loop plus a detached pair: right passage count, but disconnected
    const split = createMazeCells(GRID_2X3);
    carvePassage(GRID_2X3, split, 0, 1);
    carvePassage(GRID_2X3, split, 1, 3);
    carvePassage(GRID_2X3, split, 3, 2);
    carvePassage(GRID_2X3, split, 2, 0);
    carvePassage(GRID_2X3, split, 4, 5);
    expect(countPassages(GRID_2X3, split)).toBe(5);
    expect(isPerfectMaze(GRID_2X3, split)).toBe(false);
  });

  it('marks the result path from the destination back to the origin', () => {
    const cells = createMazeCells(GRID_2X2);
    markEndpoints(cells, 0, 2);
    requireCell(cells, 1).solution.previous = 0;
    requireCell(cells, 3).solution.previous = 1;
    requireCell(cells, 2).solution.previous = 3;

    expect(markResultPath(cells, 0, 2)).toEqual([2, 3, 1]);
    expect(cells.map((cell) => cell.solution.result)).toEqual([false, true, true, true]);
    expect(cells[0]?.solution.from).toBe(true);
    expect(cells[2]?.solution.to).toBe(true);

    clearSolutions(cells);
    expect(cells.map((cell) => cell.solution)).toEqual([
      createCellSolution(),
      createCellSolution(),
      createCellSolution(),
      createCellSolution(),
    ]);
  });

  it('fails on broken or cyclic back-pointers', () => {
    const broken = createMazeCells(GRID_2X2);
    requireCell(broken, 3).solution.previous = 1;
    expect(captureInvariantCode(() => markResultPath(broken, 0, 3))).toBe(
      'path.missing-back-pointer',
    );

    const cyclic = createMazeCells(GRID_2X2);
    requireCell(cyclic, 3).solution.previous = 1;
    requireCell(cyclic, 1).solution.previous = 3;
    expect(captureInvariantCode(() => markResultPath(cyclic, 0, 3))).toBe(
      'path.cyclic-back-pointers',
    );
  });
});
