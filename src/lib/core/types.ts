/**
 * Core data structures for loopgrid boards.
 */

import type { Position } from './position.js';
import { InvalidBoardError } from './errors.js';

// =============================================================================
// Tile Types
// =============================================================================

/**
 * Open ground.
 */
export interface Empty {
  readonly type: 'empty';
}

/**
 * Blocks movement. Moving into a wall is a no-op.
 */
export interface Wall {
  readonly type: 'wall';
}

/**
 * An agent entering ice keeps sliding in the same direction until it
 * reaches a non-ice cell or is blocked.
 */
export interface Ice {
  readonly type: 'ice';
}

/**
 * Sense in which a rotator turns an agent's view of the plan.
 */
export type Rotation = 'cw' | 'ccw';

/**
 * An agent arriving on a rotator spends its next step turning instead of moving.
 */
export interface Rotator {
  readonly type: 'rotator';
  readonly rotation: Rotation;
}

/**
 * Goal tile. A board is solved when every agent stands on one at once.
 */
export interface Finish {
  readonly type: 'finish';
}

/**
 * Union type for all tile variants.
 */
export type Tile = Empty | Wall | Ice | Rotator | Finish;

export type TileType = Tile['type'];

// =============================================================================
// Factory Functions
// =============================================================================

export function Empty(): Empty {
  return Object.freeze({ type: 'empty' });
}

export function Wall(): Wall {
  return Object.freeze({ type: 'wall' });
}

export function Ice(): Ice {
  return Object.freeze({ type: 'ice' });
}

/**
 * Create a Rotator turning clockwise ('cw') or counterclockwise ('ccw').
 */
export function Rotator(rotation: Rotation): Rotator {
  return Object.freeze({ type: 'rotator', rotation });
}

export function Finish(): Finish {
  return Object.freeze({ type: 'finish' });
}

// =============================================================================
// Type Guards
// =============================================================================

export function isEmpty(tile: Tile): tile is Empty {
  return tile.type === 'empty';
}

export function isWall(tile: Tile): tile is Wall {
  return tile.type === 'wall';
}

export function isIce(tile: Tile): tile is Ice {
  return tile.type === 'ice';
}

export function isRotator(tile: Tile): tile is Rotator {
  return tile.type === 'rotator';
}

export function isFinish(tile: Tile): tile is Finish {
  return tile.type === 'finish';
}

/**
 * Check that an arbitrary value is one of the known tile variants.
 * Used when validating boards assembled outside the factories.
 */
export function isTile(value: unknown): value is Tile {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false;
  }
  switch (value.type) {
    case 'empty':
    case 'wall':
    case 'ice':
    case 'finish':
      return true;
    case 'rotator':
      return 'rotation' in value && (value.rotation === 'cw' || value.rotation === 'ccw');
    default:
      return false;
  }
}

// =============================================================================
// Board Structure
// =============================================================================

/**
 * A rectangular grid of tiles with the agents' start positions.
 * Boards are immutable - tiles, agents and the structure itself are readonly.
 */
export interface Board {
  readonly tiles: ReadonlyArray<ReadonlyArray<Tile>>;
  readonly rows: number;
  readonly cols: number;
  readonly agents: ReadonlyArray<Position>;
}

/**
 * Create a new Board from a 2D array of tiles and agent start positions.
 *
 * @param tiles - 2D array of tiles (must be rectangular, at least 1x1)
 * @param agents - Start position of each agent, at least one
 * @returns Frozen Board object
 * @throws InvalidBoardError if the grid or any agent is invalid
 */
export function createBoard(
  tiles: ReadonlyArray<ReadonlyArray<Tile>>,
  agents: ReadonlyArray<Position>
): Board {
  const board: Board = {
    tiles: Object.freeze(tiles.map(row => Object.freeze([...row]))),
    rows: tiles.length,
    cols: tiles.length > 0 ? tiles[0].length : 0,
    agents: Object.freeze([...agents]),
  };
  validateBoard(board);
  return Object.freeze(board);
}

/**
 * Check a board's structure.
 *
 * Boards built by createBoard are already valid; this exists for boards
 * assembled by hand (e.g. as object literals) before they reach the simulator.
 *
 * @throws InvalidBoardError describing the first problem found
 */
export function validateBoard(board: Board): void {
  if (board.rows === 0 || board.tiles.length === 0) {
    throw new InvalidBoardError('Board must have at least one row');
  }
  if (board.tiles.length !== board.rows) {
    throw new InvalidBoardError(
      `Board declares ${board.rows} rows but has ${board.tiles.length}`,
      { rows: board.rows, actual: board.tiles.length }
    );
  }
  if (board.cols === 0) {
    throw new InvalidBoardError('Board must have at least one column');
  }

  for (let r = 0; r < board.rows; r++) {
    const row = board.tiles[r];
    if (row.length !== board.cols) {
      throw new InvalidBoardError(
        `Inconsistent row length at row ${r}: expected ${board.cols}, got ${row.length}`,
        { row: r, expected: board.cols, actual: row.length }
      );
    }
    for (let c = 0; c < board.cols; c++) {
      if (!isTile(row[c])) {
        throw new InvalidBoardError(`Unknown tile at row ${r}, column ${c}`, { row: r, col: c });
      }
    }
  }

  if (board.agents.length === 0) {
    throw new InvalidBoardError('Board must have at least one agent');
  }

  board.agents.forEach((agent, index) => {
    const tile = getTile(board, agent);
    if (tile === undefined) {
      throw new InvalidBoardError(
        `Agent ${index} starts outside the board at ${agent} (board is ${board.rows}x${board.cols})`,
        { agent: index, row: agent.row, col: agent.col }
      );
    }
    if (isWall(tile)) {
      throw new InvalidBoardError(`Agent ${index} starts on a wall at ${agent}`, {
        agent: index,
        row: agent.row,
        col: agent.col,
      });
    }
  });
}

/**
 * Get the tile at the given position.
 *
 * @returns The tile, or undefined if position is out of bounds or not on a cell
 */
export function getTile(board: Board, pos: Position): Tile | undefined {
  if (!Number.isInteger(pos.row) || !Number.isInteger(pos.col)) {
    return undefined;
  }
  if (pos.row < 0 || pos.row >= board.rows || pos.col < 0 || pos.col >= board.cols) {
    return undefined;
  }
  return board.tiles[pos.row][pos.col];
}

/**
 * True if a move onto this position is impossible (wall or off the board).
 */
export function isBlocked(board: Board, pos: Position): boolean {
  const tile = getTile(board, pos);
  return tile === undefined || isWall(tile);
}
