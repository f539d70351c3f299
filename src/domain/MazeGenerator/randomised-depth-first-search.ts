import { pickRandom } from '../../shared/random';
import {
  DIRECTIONS,
  carvePassage,
  neighbour,
  requireCell,
  type MazeCell,
  type MazeDimensions,
} from '../MazeGrid';
import type { MazeGenerator, MazeGeneratorOptions } from './contract';

export const RANDOMISED_DEPTH_FIRST_SEARCH_GENERATOR = 'Randomised depth first search algorithm';

// every visited cell belongs to the same tree
const WALK = 0;

function unvisitedNeighbours(
  dimensions: MazeDimensions,
  cells: readonly MazeCell[],
  cell: number,
): number[] {
  const result: number[] = [];

  for (const direction of DIRECTIONS) {
    const adjacent = neighbour(dimensions, cell, direction);
    if (adjacent !== null && requireCell(cells, adjacent).walk === null) {
      result.push(adjacent);
    }
  }

  return result;
}

/** Recursive backtracker with the call stack replaced by an explicit stack of cell indexes. */
export function createRandomisedDepthFirstSearchGenerator(
  options: MazeGeneratorOptions,
): MazeGenerator {
  const algorithm = RANDOMISED_DEPTH_FIRST_SEARCH_GENERATOR;
  const stack: number[] = [];
  let initialised = false;

  const reset = (): void => {
    initialised = false;
    stack.length = 0;
  };

  return {
    algorithm,
    step: (dimensions, cells) => {
      if (!initialised) {
        const startCell = options.random.nextIndex(cells.length);
        requireCell(cells, startCell).walk = WALK;
        stack.push(startCell);
        initialised = true;
        options.onProgress?.({ type: 'started', algorithm, startCell });
        return true;
      }

      // backtracking to the next cell with unvisited neighbours happens within a single step
      for (let cell = stack.pop(); cell !== undefined; cell = stack.pop()) {
        const next = pickRandom(options.random, unvisitedNeighbours(dimensions, cells, cell));
        if (next === undefined) {
          continue;
        }

        requireCell(cells, next).walk = WALK;
        carvePassage(dimensions, cells, cell, next);
        stack.push(cell, next);
        return true;
      }

      reset();
      options.onProgress?.({ type: 'complete', algorithm });
      return false;
    },
  };
}
