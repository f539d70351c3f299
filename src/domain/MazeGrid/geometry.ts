export interface MazeDimensions {
  readonly width: number;
  readonly height: number;
}

export interface MazeCellPosition {
  readonly row: number;
  readonly col: number;
}

export function cellCount(dimensions: MazeDimensions): number {
  return dimensions.width * dimensions.height;
}

export function rowAndCol(dimensions: MazeDimensions, index: number): MazeCellPosition {
  return {
    row: Math.floor(index / dimensions.width),
    col: index % dimensions.width,
  };
}

/** Manhattan distance between two cells. */
export function taxicabDistance(dimensions: MazeDimensions, from: number, to: number): number {
  const first = rowAndCol(dimensions, from);
  const second = rowAndCol(dimensions, to);

  return Math.abs(first.row - second.row) + Math.abs(first.col - second.col);
}
