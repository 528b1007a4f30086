import type { Direction } from './direction.js';
import { DIRECTION_DELTAS } from './direction.js';

/**
 * Represents a cell coordinate on a board.
 */
export class Position {
  constructor(
    public readonly row: number,
    public readonly col: number
  ) {}

  /**
   * Create a string key for use in Sets or Maps.
   */
  toKey(): string {
    return `${this.row},${this.col}`;
  }

  /**
   * Check equality with another position.
   */
  equals(other: Position): boolean {
    return this.row === other.row && this.col === other.col;
  }

  /**
   * The neighbouring position one step in the given direction.
   * No bounds checking - the result may lie outside any board.
   */
  step(direction: Direction): Position {
    const [dr, dc] = DIRECTION_DELTAS[direction];
    return new Position(this.row + dr, this.col + dc);
  }

  toString(): string {
    return `Position(${this.row}, ${this.col})`;
  }
}
