import type { MazeGenerator, MazeGeneratorOptions } from './contract';
import {
  RANDOMISED_DEPTH_FIRST_SEARCH_GENERATOR,
  createRandomisedDepthFirstSearchGenerator,
} from './randomised-depth-first-search';
import { WILSON_GENERATOR, createWilsonGenerator } from './wilson';

export type MazeGeneratorFactory = (options: MazeGeneratorOptions) => MazeGenerator;

// display name → constructor, listed by name
export const GENERATOR_REGISTRY: ReadonlyMap<string, MazeGeneratorFactory> = new Map<
  string,
  MazeGeneratorFactory
>([
  [RANDOMISED_DEPTH_FIRST_SEARCH_GENERATOR, createRandomisedDepthFirstSearchGenerator],
  [WILSON_GENERATOR, createWilsonGenerator],
]);

export const GENERATOR_NAMES: readonly string[] = [...GENERATOR_REGISTRY.keys()].sort();

export function isMazeGeneratorName(name: string): boolean {
  return GENERATOR_REGISTRY.has(name);
}

export function createMazeGenerator(
  name: string,
  options: MazeGeneratorOptions,
): MazeGenerator | null {
  const factory = GENERATOR_REGISTRY.get(name);
  return factory ? factory(options) : null;
}

export {
  RANDOMISED_DEPTH_FIRST_SEARCH_GENERATOR,
  WILSON_GENERATOR,
  createRandomisedDepthFirstSearchGenerator,
  createWilsonGenerator,
};
export type {
  MazeGenerator,
  MazeGeneratorOptions,
  MazeGeneratorProgress,
  MazeGeneratorProgressListener,
} from './contract';
