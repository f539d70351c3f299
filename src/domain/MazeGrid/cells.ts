import {
  ALL_WALLS,
  DIRECTIONS,
  Direction,
  between,
  neighbour,
  oppositeDirection,
} from './direction';
import { cellCount, type MazeDimensions } from './geometry';
import { MazeInvariantError } from './invariant-error';

export interface CellSolution {
  from: boolean;
  to: boolean;
  // back-pointer to the preceding cell on the explored path
  previous: number | null;
  result: boolean;
}

export interface MazeCell {
  // bit set = wall present
  walls: number;
  // generation-time walk/tree tag
  walk: number | null;
  solution: CellSolution;
}

export function createCellSolution(): CellSolution {
  return {
    from: false,
    to: false,
    previous: null,
    result: false,
  };
}

export function createMazeCell(): MazeCell {
  return {
    walls: ALL_WALLS,
    walk: null,
    solution: createCellSolution(),
  };
}

/** A fully walled grid in row-major order. */
export function createMazeCells(dimensions: MazeDimensions): MazeCell[] {
  return Array.from({ length: cellCount(dimensions) }, () => createMazeCell());
}

export function cloneMazeCell(cell: MazeCell): MazeCell {
  return {
    walls: cell.walls,
    walk: cell.walk,
    solution: { ...cell.solution },
  };
}

export function requireCell(cells: readonly MazeCell[], index: number): MazeCell {
  const cell = cells[index];

  if (!cell) {
    throw new MazeInvariantError('cell.out-of-range', 'Cell index is outside of the grid.', {
      index,
      cellCount: cells.length,
    });
  }

  return cell;
}

export function hasWall(cell: MazeCell, direction: Direction): boolean {
  return (cell.walls & direction) !== 0;
}

export function removeWall(cell: MazeCell, direction: Direction): void {
  cell.walls &= ~direction;
}

/** Removes the wall shared by two adjacent cells, on both sides. */
export function carvePassage(
  dimensions: MazeDimensions,
  cells: MazeCell[],
  from: number,
  to: number,
): void {
  const direction = between(dimensions, from, to);

  if (direction === null) {
    throw new MazeInvariantError('passage.not-adjacent', 'Cannot carve between distant cells.', {
      from,
      to,
    });
  }

  removeWall(requireCell(cells, from), direction);
  removeWall(requireCell(cells, to), oppositeDirection(direction));
}

/** Neighbours reachable from `cell` through an absent wall, in clockwise order. */
export function openNeighbours(
  dimensions: MazeDimensions,
  cells: readonly MazeCell[],
  cell: number,
): number[] {
  const current = requireCell(cells, cell);
  const result: number[] = [];

  for (const direction of DIRECTIONS) {
    if (hasWall(current, direction)) {
      continue;
    }

    const adjacent = neighbour(dimensions, cell, direction);
    if (adjacent !== null) {
      result.push(adjacent);
    }
  }

  return result;
}

export function clearSolutions(cells: MazeCell[]): void {
  for (const cell of cells) {
    cell.solution = createCellSolution();
  }
}

export function markEndpoints(cells: MazeCell[], from: number, to: number): void {
  requireCell(cells, from).solution.from = true;
  requireCell(cells, to).solution.to = true;
}

/**
 * Follows back-pointers from `to` until `from`, flagging every cell on the way except `from`.
 * Returns the flagged cells, destination first.
 */
export function markResultPath(cells: MazeCell[], from: number, to: number): number[] {
  const path: number[] = [];
  let cell = to;

  while (cell !== from) {
    const current = requireCell(cells, cell);
    const previous = current.solution.previous;

    if (previous === null) {
      throw new MazeInvariantError('path.missing-back-pointer', 'Path is broken.', {
        cell,
        from,
        to,
      });
    }

    if (path.length >= cells.length) {
      throw new MazeInvariantError('path.cyclic-back-pointers', 'Path never reaches origin.', {
        from,
        to,
      });
    }

    current.solution.result = true;
    path.push(cell);
    cell = previous;
  }

  return path;
}

/**
 * Number of passages, counting each shared edge once. Throws when the two sides of an edge
 * disagree about the wall.
 */
export function countPassages(dimensions: MazeDimensions, cells: readonly MazeCell[]): number {
  let passages = 0;

  for (let index = 0; index < cells.length; index += 1) {
    const cell = requireCell(cells, index);

    for (const direction of [Direction.East, Direction.South] as const) {
      const adjacent = neighbour(dimensions, index, direction);
      if (adjacent === null) {
        continue;
      }

      const open = !hasWall(cell, direction);
      const openFromAdjacent = !hasWall(requireCell(cells, adjacent), oppositeDirection(direction));

      if (open !== openFromAdjacent) {
        throw new MazeInvariantError('walls.asymmetric', 'Adjacent cells disagree on a wall.', {
          cell: index,
          adjacent,
        });
      }

      if (open) {
        passages += 1;
      }
    }
  }

  return passages;
}

/** Whether the passages form a spanning tree: connected with exactly one edge fewer than cells. */
export function isPerfectMaze(dimensions: MazeDimensions, cells: readonly MazeCell[]): boolean {
  const total = cellCount(dimensions);

  if (cells.length !== total || countPassages(dimensions, cells) !== total - 1) {
    return false;
  }

  const reached = new Set<number>([0]);
  const queue: number[] = [0];

  for (let head = 0; head < queue.length; head += 1) {
    const cell = queue[head];
    if (cell === undefined) {
      continue;
    }

    for (const adjacent of openNeighbours(dimensions, cells, cell)) {
      if (!reached.has(adjacent)) {
        reached.add(adjacent);
        queue.push(adjacent);
      }
    }
  }

  return reached.size === total;
}
