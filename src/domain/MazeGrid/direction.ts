import type { MazeDimensions } from './geometry';

/** One bit per cell edge so the four walls of a cell pack into a single mask. */
export const Direction = Object.freeze({
  North: 0b0001,
  East: 0b0010,
  South: 0b0100,
  West: 0b1000,
} as const);

export type Direction = (typeof Direction)[keyof typeof Direction];

/** Clockwise order. */
export const DIRECTIONS: readonly Direction[] = [
  Direction.North,
  Direction.East,
  Direction.South,
  Direction.West,
];

// Lookup order used by `between`; only one relation can ever match.
const BETWEEN_ORDER: readonly Direction[] = [
  Direction.North,
  Direction.South,
  Direction.East,
  Direction.West,
];

export const ALL_WALLS = DIRECTIONS.reduce<number>((mask, direction) => mask | direction, 0);

function unsupportedDirection(value: never): never {
  throw new Error(`[maze-grid] Unsupported direction: ${JSON.stringify(value)}`);
}

export function nextDirection(direction: Direction): Direction {
  switch (direction) {
    case Direction.North:
      return Direction.East;
    case Direction.East:
      return Direction.South;
    case Direction.South:
      return Direction.West;
    case Direction.West:
      return Direction.North;
    default:
      return unsupportedDirection(direction);
  }
}

export function prevDirection(direction: Direction): Direction {
  switch (direction) {
    case Direction.North:
      return Direction.West;
    case Direction.East:
      return Direction.North;
    case Direction.South:
      return Direction.East;
    case Direction.West:
      return Direction.South;
    default:
      return unsupportedDirection(direction);
  }
}

export function oppositeDirection(direction: Direction): Direction {
  return nextDirection(nextDirection(direction));
}

export function directionName(direction: Direction): string {
  switch (direction) {
    case Direction.North:
      return 'north';
    case Direction.East:
      return 'east';
    case Direction.South:
      return 'south';
    case Direction.West:
      return 'west';
    default:
      return unsupportedDirection(direction);
  }
}

/** Adjacent cell index in `direction`, or `null` at the grid boundary. */
export function neighbour(
  dimensions: MazeDimensions,
  cell: number,
  direction: Direction,
): number | null {
  const { width, height } = dimensions;

  switch (direction) {
    case Direction.North:
      return cell >= width ? cell - width : null;
    case Direction.East:
      return (cell + 1) % width !== 0 ? cell + 1 : null;
    case Direction.South:
      return cell + width < width * height ? cell + width : null;
    case Direction.West:
      return cell % width !== 0 ? cell - 1 : null;
    default:
      return unsupportedDirection(direction);
  }
}

/** Direction leading from `from` to `to`, or `null` when they are not 4-adjacent. */
export function between(dimensions: MazeDimensions, from: number, to: number): Direction | null {
  for (const direction of BETWEEN_ORDER) {
    if (neighbour(dimensions, from, direction) === to) {
      return direction;
    }
  }

  return null;
}
