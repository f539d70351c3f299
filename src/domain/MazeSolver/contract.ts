import type { RandomSource } from '../../shared/random';
import type { MazeCell, MazeDimensions } from '../MazeGrid';

export type MazeSolverProgress =
  | {
      readonly type: 'started';
      readonly algorithm: string;
      readonly from: number;
      readonly to: number;
    }
  | {
      readonly type: 'complete';
      readonly algorithm: string;
      readonly pathLength: number;
    };

export type MazeSolverProgressListener = (progress: MazeSolverProgress) => void;

export interface MazeSolverOptions {
  readonly random: RandomSource;
  readonly onProgress?: MazeSolverProgressListener;
}

/**
 * Searches for a path one step at a time, with the same lifecycle as `MazeGenerator`. Walls are
 * read-only; only `solution.previous` and `solution.result` change. The completing call flags
 * the path from `to` back to `from`.
 */
export interface MazeSolver {
  readonly algorithm: string;
  step: (dimensions: MazeDimensions, cells: MazeCell[], from: number, to: number) => boolean;
}
