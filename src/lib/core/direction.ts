import { InvalidArgumentError } from './errors.js';

/**
 * Cardinal directions for grid traversal.
 */
export enum Direction {
  N = 'N', // Up (decreasing row)
  E = 'E', // Right (increasing col)
  S = 'S', // Down (increasing row)
  W = 'W', // Left (decreasing col)
}

/**
 * Directions in clockwise order, which is also the canonical alphabet order
 * used to compare plans (N < E < S < W).
 */
export const DIRECTIONS: ReadonlyArray<Direction> = Object.freeze([
  Direction.N,
  Direction.E,
  Direction.S,
  Direction.W,
]);

/**
 * Row/col deltas for a single step in each direction.
 */
export const DIRECTION_DELTAS: Readonly<Record<Direction, readonly [number, number]>> = {
  [Direction.N]: [-1, 0],
  [Direction.E]: [0, 1],
  [Direction.S]: [1, 0],
  [Direction.W]: [0, -1],
};

/**
 * Index of a direction in the canonical order.
 */
export function directionIndex(dir: Direction): number {
  switch (dir) {
    case Direction.N:
      return 0;
    case Direction.E:
      return 1;
    case Direction.S:
      return 2;
    case Direction.W:
      return 3;
  }
}

/**
 * Direction at the given index, wrapping modulo 4 (negative indices included).
 *
 * @throws InvalidArgumentError if the index is not an integer
 */
export function directionAt(index: number): Direction {
  if (!Number.isInteger(index)) {
    throw new InvalidArgumentError(`Direction index must be an integer, got ${index}`, { index });
  }
  return DIRECTIONS[((index % 4) + 4) % 4];
}

/**
 * Rotate a direction clockwise by the given number of quarter turns.
 * Negative values rotate counterclockwise.
 *
 * @throws InvalidArgumentError if quarterTurns is not an integer
 */
export function rotateDirection(dir: Direction, quarterTurns: number): Direction {
  if (!Number.isInteger(quarterTurns)) {
    throw new InvalidArgumentError(`Quarter turns must be an integer, got ${quarterTurns}`, {
      quarterTurns,
    });
  }
  return directionAt(directionIndex(dir) + quarterTurns);
}

/**
 * Mirror a direction across the vertical axis (E <-> W, N and S fixed).
 */
export function reflectDirection(dir: Direction): Direction {
  switch (dir) {
    case Direction.E:
      return Direction.W;
    case Direction.W:
      return Direction.E;
    default:
      return dir;
  }
}

/**
 * Get the opposite direction.
 */
export function flipDirection(dir: Direction): Direction {
  switch (dir) {
    case Direction.N:
      return Direction.S;
    case Direction.S:
      return Direction.N;
    case Direction.E:
      return Direction.W;
    case Direction.W:
      return Direction.E;
  }
}

/**
 * Parse a single direction letter (case-insensitive).
 *
 * @returns The direction, or undefined if the letter is not one of N/E/S/W
 */
export function parseDirection(letter: string): Direction | undefined {
  switch (letter.toUpperCase()) {
    case 'N':
      return Direction.N;
    case 'E':
      return Direction.E;
    case 'S':
      return Direction.S;
    case 'W':
      return Direction.W;
    default:
      return undefined;
  }
}
