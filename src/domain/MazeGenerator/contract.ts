import type { RandomSource } from '../../shared/random';
import type { MazeCell, MazeDimensions } from '../MazeGrid';

export type MazeGeneratorProgress =
  | {
      readonly type: 'started';
      readonly algorithm: string;
      readonly startCell: number;
    }
  | {
      readonly type: 'walk-complete';
      readonly algorithm: string;
      readonly walk: number;
      readonly length: number;
    }
  | {
      readonly type: 'complete';
      readonly algorithm: string;
    };

export type MazeGeneratorProgressListener = (progress: MazeGeneratorProgress) => void;

export interface MazeGeneratorOptions {
  readonly random: RandomSource;
  readonly onProgress?: MazeGeneratorProgressListener;
}

/**
 * Builds a maze one step at a time. `step` returns `true` while work remains; the call that
 * completes the maze returns `false` and resets the generator, so the next call starts a new run.
 * Only wall bits and walk tags are touched.
 */
export interface MazeGenerator {
  readonly algorithm: string;
  step: (dimensions: MazeDimensions, cells: MazeCell[]) => boolean;
}
