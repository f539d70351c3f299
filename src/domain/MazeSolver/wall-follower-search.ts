import {
  DIRECTIONS,
  Direction,
  MazeInvariantError,
  hasWall,
  markResultPath,
  neighbour,
  nextDirection,
  prevDirection,
  requireCell,
} from '../MazeGrid';
import type { MazeSolver, MazeSolverOptions } from './contract';

export const WALL_FOLLOWER_LEFT_SOLVER = 'Wall follower (left turn)';
export const WALL_FOLLOWER_RIGHT_SOLVER = 'Wall follower (right turn)';

/** Which way the walker turns first, and how it keeps scanning when that way is walled. */
export interface TurnStrategy {
  readonly initial: (direction: Direction) => Direction;
  readonly subsequent: (direction: Direction) => Direction;
}

export const rightTurn: TurnStrategy = {
  initial: nextDirection,
  subsequent: prevDirection,
};

export const leftTurn: TurnStrategy = {
  initial: prevDirection,
  subsequent: nextDirection,
};

export interface WallFollowerSearchOptions extends MazeSolverOptions {
  readonly turn: TurnStrategy;
  readonly algorithm?: string;
}

interface WalkerPosition {
  readonly cell: number;
  readonly facing: Direction;
}

const INITIAL_FACING = Direction.North;
// a tree is fully traversed in 2·(n − 1) moves
const MOVES_PER_CELL_LIMIT = 4;

export function createWallFollowerSearchSolver(options: WallFollowerSearchOptions): MazeSolver {
  const algorithm = options.algorithm ?? WALL_FOLLOWER_RIGHT_SOLVER;
  const { turn } = options;
  let position: WalkerPosition | null = null;
  let moves = 0;

  const reset = (): void => {
    position = null;
    moves = 0;
  };

  return {
    algorithm,
    step: (dimensions, cells, from, to) => {
      if (position === null) {
        position = { cell: from, facing: INITIAL_FACING };
        options.onProgress?.({ type: 'started', algorithm, from, to });
        return true;
      }

      let walker: WalkerPosition = position;

      // moves through already visited cells happen within a single step
      for (;;) {
        if (walker.cell === to) {
          const path = markResultPath(cells, from, to);
          reset();
          options.onProgress?.({ type: 'complete', algorithm, pathLength: path.length });
          return false;
        }

        if (moves > MOVES_PER_CELL_LIMIT * cells.length) {
          reset();
          throw new MazeInvariantError('walker.endless', 'Wall follower is circling.', {
            algorithm,
            from,
            to,
          });
        }

        const current = requireCell(cells, walker.cell);
        let facing = turn.initial(walker.facing);
        let turns = 1;

        while (hasWall(current, facing)) {
          if (turns >= DIRECTIONS.length) {
            reset();
            throw new MazeInvariantError('walker.enclosed', 'Cell has no openings.', {
              cell: walker.cell,
            });
          }

          facing = turn.subsequent(facing);
          turns += 1;
        }

        const origin = walker.cell;
        const next = neighbour(dimensions, origin, facing);
        if (next === null) {
          reset();
          throw new MazeInvariantError('walker.open-boundary', 'Opening leads off the grid.', {
            cell: origin,
            facing,
          });
        }

        moves += 1;
        walker = { cell: next, facing };
        position = walker;

        // first visit records the way back; revisits are backtracking and keep walking
        const nextCell = requireCell(cells, next);
        if (next !== from && nextCell.solution.previous === null) {
          nextCell.solution.previous = origin;
          return true;
        }
      }
    },
  };
}
