import { pickRandom } from '../../shared/random';
import {
  DIRECTIONS,
  MazeInvariantError,
  carvePassage,
  neighbour,
  requireCell,
  type MazeDimensions,
} from '../MazeGrid';
import type { MazeGenerator, MazeGeneratorOptions } from './contract';

export const WILSON_GENERATOR = "Wilson's algorithm";

function gridNeighbours(dimensions: MazeDimensions, cell: number): number[] {
  const result: number[] = [];

  for (const direction of DIRECTIONS) {
    const adjacent = neighbour(dimensions, cell, direction);
    if (adjacent !== null) {
      result.push(adjacent);
    }
  }

  return result;
}

/**
 * Loop-erased random walks. Each walk wanders until it hits a cell of an earlier walk and is then
 * carved into the maze; revisiting its own cells erases the loop. Produces a uniform spanning tree.
 */
export function createWilsonGenerator(options: MazeGeneratorOptions): MazeGenerator {
  const algorithm = WILSON_GENERATOR;
  // cells of the walk in progress; empty between walks
  const stack: number[] = [];
  // id of the walk in progress; null before the first step
  let walk: number | null = null;

  const reset = (): void => {
    walk = null;
    stack.length = 0;
  };

  return {
    algorithm,
    step: (dimensions, cells) => {
      if (walk === null) {
        // the first tree is a single random cell
        const startCell = options.random.nextIndex(cells.length);
        requireCell(cells, startCell).walk = 0;
        walk = 1;
        options.onProgress?.({ type: 'started', algorithm, startCell });
        return true;
      }

      const head = stack[stack.length - 1];

      if (head === undefined) {
        const untagged = cells.findIndex((cell) => cell.walk === null);

        if (untagged === -1) {
          reset();
          options.onProgress?.({ type: 'complete', algorithm });
          return false;
        }

        requireCell(cells, untagged).walk = walk;
        stack.push(untagged);
        return true;
      }

      const next = pickRandom(options.random, gridNeighbours(dimensions, head));
      if (next === undefined) {
        throw new MazeInvariantError('walk.stranded', 'Walk head has no neighbours.', {
          head,
          walk,
        });
      }

      const nextCell = requireCell(cells, next);

      if (nextCell.walk === null) {
        nextCell.walk = walk;
        stack.push(next);
        return true;
      }

      if (nextCell.walk === walk) {
        // loop erasure
        while (stack[stack.length - 1] !== next) {
          const erased = stack.pop();
          if (erased === undefined) {
            throw new MazeInvariantError('walk.loop-unterminated', 'Loop start left the walk.', {
              next,
              walk,
            });
          }

          requireCell(cells, erased).walk = null;
        }

        return true;
      }

      // hit an earlier walk; commit this one from the contact point back to its start
      const length = stack.length;
      let contact = next;

      for (let cell = stack.pop(); cell !== undefined; cell = stack.pop()) {
        carvePassage(dimensions, cells, cell, contact);
        contact = cell;
      }

      options.onProgress?.({ type: 'walk-complete', algorithm, walk, length });
      walk += 1;
      return true;
    },
  };
}
