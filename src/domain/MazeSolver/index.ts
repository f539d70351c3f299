import {
  A_STAR_TAXICAB_SOLVER,
  DIJKSTRA_SOLVER,
  createAStarSearchSolver,
  taxicabHeuristic,
  zeroHeuristic,
} from './a-star-search';
import type { MazeSolver, MazeSolverOptions } from './contract';
import {
  RANDOMISED_DEPTH_FIRST_SEARCH_SOLVER,
  createRandomisedDepthFirstSearchSolver,
} from './randomised-depth-first-search';
import {
  WALL_FOLLOWER_LEFT_SOLVER,
  WALL_FOLLOWER_RIGHT_SOLVER,
  createWallFollowerSearchSolver,
  leftTurn,
  rightTurn,
} from './wall-follower-search';

export type MazeSolverFactory = (options: MazeSolverOptions) => MazeSolver;

export const SOLVER_REGISTRY: ReadonlyMap<string, MazeSolverFactory> = new Map<
  string,
  MazeSolverFactory
>([
  [
    A_STAR_TAXICAB_SOLVER,
    (options) =>
      createAStarSearchSolver({
        ...options,
        heuristic: taxicabHeuristic,
        algorithm: A_STAR_TAXICAB_SOLVER,
      }),
  ],
  [
    DIJKSTRA_SOLVER,
    (options) =>
      createAStarSearchSolver({ ...options, heuristic: zeroHeuristic, algorithm: DIJKSTRA_SOLVER }),
  ],
  [RANDOMISED_DEPTH_FIRST_SEARCH_SOLVER, createRandomisedDepthFirstSearchSolver],
  [
    WALL_FOLLOWER_LEFT_SOLVER,
    (options) =>
      createWallFollowerSearchSolver({
        ...options,
        turn: leftTurn,
        algorithm: WALL_FOLLOWER_LEFT_SOLVER,
      }),
  ],
  [
    WALL_FOLLOWER_RIGHT_SOLVER,
    (options) =>
      createWallFollowerSearchSolver({
        ...options,
        turn: rightTurn,
        algorithm: WALL_FOLLOWER_RIGHT_SOLVER,
      }),
  ],
]);

export const SOLVER_NAMES: readonly string[] = [...SOLVER_REGISTRY.keys()].sort();

export function isMazeSolverName(name: string): boolean {
  return SOLVER_REGISTRY.has(name);
}

export function createMazeSolver(name: string, options: MazeSolverOptions): MazeSolver | null {
  const factory = SOLVER_REGISTRY.get(name);
  return factory ? factory(options) : null;
}

export {
  A_STAR_TAXICAB_SOLVER,
  DIJKSTRA_SOLVER,
  RANDOMISED_DEPTH_FIRST_SEARCH_SOLVER,
  WALL_FOLLOWER_LEFT_SOLVER,
  WALL_FOLLOWER_RIGHT_SOLVER,
  createAStarSearchSolver,
  createRandomisedDepthFirstSearchSolver,
  createWallFollowerSearchSolver,
  leftTurn,
  rightTurn,
  taxicabHeuristic,
  zeroHeuristic,
};
export type { AStarHeuristic, AStarSearchOptions } from './a-star-search';
export type {
  MazeSolver,
  MazeSolverOptions,
  MazeSolverProgress,
  MazeSolverProgressListener,
} from './contract';
export type { TurnStrategy, WallFollowerSearchOptions } from './wall-follower-search';
