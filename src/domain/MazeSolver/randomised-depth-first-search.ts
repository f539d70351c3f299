import { pickRandom } from '../../shared/random';
import { MazeInvariantError, markResultPath, openNeighbours, requireCell } from '../MazeGrid';
import type { MazeSolver, MazeSolverOptions } from './contract';

export const RANDOMISED_DEPTH_FIRST_SEARCH_SOLVER = 'Randomised depth first search algorithm';

export function createRandomisedDepthFirstSearchSolver(options: MazeSolverOptions): MazeSolver {
  const algorithm = RANDOMISED_DEPTH_FIRST_SEARCH_SOLVER;
  const stack: number[] = [];
  let initialised = false;
  let seeded = false;

  const reset = (): void => {
    initialised = false;
    seeded = false;
    stack.length = 0;
  };

  return {
    algorithm,
    step: (dimensions, cells, from, to) => {
      if (!initialised) {
        initialised = true;
        options.onProgress?.({ type: 'started', algorithm, from, to });
        return true;
      }

      if (!seeded) {
        stack.push(from);
        seeded = true;
      }

      for (let cell = stack.pop(); cell !== undefined; cell = stack.pop()) {
        if (cell === to) {
          const path = markResultPath(cells, from, to);
          reset();
          options.onProgress?.({ type: 'complete', algorithm, pathLength: path.length });
          return false;
        }

        const candidates = openNeighbours(dimensions, cells, cell).filter((adjacent) => {
          return adjacent !== from && requireCell(cells, adjacent).solution.previous === null;
        });
        const next = pickRandom(options.random, candidates);
        if (next === undefined) {
          continue;
        }

        requireCell(cells, next).solution.previous = cell;
        stack.push(cell, next);
        return true;
      }

      reset();
      throw new MazeInvariantError('stack.exhausted', 'Destination is unreachable.', {
        algorithm,
        from,
        to,
      });
    },
  };
}
