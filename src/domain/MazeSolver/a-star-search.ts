import {
  MazeInvariantError,
  markResultPath,
  openNeighbours,
  requireCell,
  taxicabDistance,
  type MazeDimensions,
} from '../MazeGrid';
import type { MazeSolver, MazeSolverOptions } from './contract';
import { Fringe } from './fringe';

export const A_STAR_TAXICAB_SOLVER = 'A* algorithm (using Taxicab distance heuristic)';
export const DIJKSTRA_SOLVER = "Dijkstra's algorithm (A* algorithm without heuristic)";

/** Estimate of the remaining distance; must never overestimate. */
export type AStarHeuristic = (dimensions: MazeDimensions, cell: number, goal: number) => number;

/** Turns A* into Dijkstra's algorithm. */
export const zeroHeuristic: AStarHeuristic = () => 0;

export const taxicabHeuristic: AStarHeuristic = taxicabDistance;

export interface AStarSearchOptions extends MazeSolverOptions {
  readonly heuristic: AStarHeuristic;
  readonly algorithm?: string;
}

interface FringeEntry {
  readonly cell: number;
  // distance so far plus heuristic estimate
  readonly priority: number;
}

function compareFringeEntries(left: FringeEntry, right: FringeEntry): number {
  return left.priority - right.priority || left.cell - right.cell;
}

export function createAStarSearchSolver(options: AStarSearchOptions): MazeSolver {
  const algorithm = options.algorithm ?? A_STAR_TAXICAB_SOLVER;
  const { heuristic } = options;
  const fringe = new Fringe<FringeEntry>(compareFringeEntries);
  const finalised = new Set<number>();
  let distances: Array<number | null> = [];
  let initialised = false;

  const reset = (): void => {
    initialised = false;
    distances = [];
    finalised.clear();
    fringe.clear();
  };

  return {
    algorithm,
    step: (dimensions, cells, from, to) => {
      if (!initialised) {
        distances = new Array<number | null>(cells.length).fill(null);
        distances[from] = 0;
        fringe.push({ cell: from, priority: heuristic(dimensions, from, to) });
        initialised = true;
        options.onProgress?.({ type: 'started', algorithm, from, to });
        return true;
      }

      const entry = fringe.pop();

      if (entry === undefined) {
        reset();
        throw new MazeInvariantError('fringe.exhausted', 'Destination is unreachable.', {
          algorithm,
          from,
          to,
        });
      }

      if (entry.cell === to) {
        const path = markResultPath(cells, from, to);
        reset();
        options.onProgress?.({ type: 'complete', algorithm, pathLength: path.length });
        return false;
      }

      // stale duplicates of this cell carry worse priorities
      fringe.retain((candidate) => candidate.cell !== entry.cell);
      finalised.add(entry.cell);

      const distanceSoFar = distances[entry.cell];
      if (distanceSoFar === null || distanceSoFar === undefined) {
        throw new MazeInvariantError('fringe.unscored-cell', 'Fringe cell has no distance.', {
          cell: entry.cell,
        });
      }

      const distance = distanceSoFar + 1;

      for (const adjacent of openNeighbours(dimensions, cells, entry.cell)) {
        if (adjacent === from || finalised.has(adjacent)) {
          continue;
        }

        const known = distances[adjacent];
        if (known !== null && known !== undefined && known <= distance) {
          continue;
        }

        distances[adjacent] = distance;
        requireCell(cells, adjacent).solution.previous = entry.cell;
        fringe.push({ cell: adjacent, priority: distance + heuristic(dimensions, adjacent, to) });
      }

      return true;
    },
  };
}
