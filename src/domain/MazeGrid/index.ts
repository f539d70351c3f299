export {
  ALL_WALLS,
  DIRECTIONS,
  Direction,
  between,
  directionName,
  neighbour,
  nextDirection,
  oppositeDirection,
  prevDirection,
} from './direction';
export {
  cellCount,
  rowAndCol,
  taxicabDistance,
  type MazeCellPosition,
  type MazeDimensions,
} from './geometry';
export {
  carvePassage,
  clearSolutions,
  cloneMazeCell,
  countPassages,
  createCellSolution,
  createMazeCell,
  createMazeCells,
  hasWall,
  isPerfectMaze,
  markEndpoints,
  markResultPath,
  openNeighbours,
  removeWall,
  requireCell,
  type CellSolution,
  type MazeCell,
} from './cells';
export { MazeInvariantError } from './invariant-error';
