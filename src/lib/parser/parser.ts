/**
 * Parse boards from compact string format.
 */

import { InvalidArgumentError, InvalidBoardError } from '../core/errors.js';
import { Position } from '../core/position.js';
import type { Board, Tile } from '../core/types.js';
import { Empty, Finish, Ice, Rotator, Wall, createBoard, isEmpty, isFinish } from '../core/types.js';

/**
 * Character for each tile, as written by exportBoard.
 */
export function tileChar(tile: Tile): string {
  switch (tile.type) {
    case 'empty':
      return '_';
    case 'wall':
      return '#';
    case 'ice':
      return '~';
    case 'rotator':
      return tile.rotation === 'cw' ? '>' : '<';
    case 'finish':
      return 'F';
  }
}

/**
 * Agent markers, by the tile underneath.
 */
export const AGENT_ON_EMPTY = '@';
export const AGENT_ON_FINISH = '%';

/**
 * Split a definition into row strings. Rows are separated by '|' or newlines;
 * surrounding whitespace and blank lines are dropped, so indented template
 * literals work.
 */
function splitRows(definition: string): string[] {
  return definition
    .split(/[|\n]/)
    .map(row => row.trim())
    .filter(row => row.length > 0);
}

/**
 * Parse a board from a compact string format.
 *
 * Format:
 * - Rows separated by | (or newlines)
 * - One character per cell:
 *   * '_' or '.': Empty
 *   * '#': Wall
 *   * '~': Ice
 *   * '>': Rotator turning clockwise
 *   * '<': Rotator turning counterclockwise
 *   * 'F': Finish
 *   * '@': Agent standing on Empty
 *   * '%': Agent standing on Finish
 *
 * Agents are numbered in row-major order.
 *
 * Example:
 *     parseBoard('@_~_F|##_##')
 *     Creates a 2x5 board with one agent at (0, 0) and a finish at (0, 4).
 *
 * @param definition - Board definition string
 * @returns Frozen Board
 * @throws InvalidBoardError if parsing fails, with detailed diagnostic information
 */
export function parseBoard(definition: string): Board {
  const rowStrings = splitRows(definition);
  const tiles: Tile[][] = [];
  const agents: Position[] = [];

  if (rowStrings.length === 0) {
    throw new InvalidBoardError(`Board definition is empty: "${definition}"`);
  }

  for (let rowIdx = 0; rowIdx < rowStrings.length; rowIdx++) {
    const rowStr = rowStrings[rowIdx];
    const row: Tile[] = [];

    for (let colIdx = 0; colIdx < rowStr.length; colIdx++) {
      const ch = rowStr[colIdx];

      switch (ch) {
        case '_':
        case '.':
          row.push(Empty());
          break;
        case '#':
          row.push(Wall());
          break;
        case '~':
          row.push(Ice());
          break;
        case '>':
          row.push(Rotator('cw'));
          break;
        case '<':
          row.push(Rotator('ccw'));
          break;
        case 'F':
          row.push(Finish());
          break;
        case AGENT_ON_EMPTY:
          row.push(Empty());
          agents.push(new Position(rowIdx, colIdx));
          break;
        case AGENT_ON_FINISH:
          row.push(Finish());
          agents.push(new Position(rowIdx, colIdx));
          break;
        default: {
          const errorMsg =
            `Invalid tile character: '${ch}'\n` +
            `  Row ${rowIdx}: "${rowStr}"\n` +
            `  Position: column ${colIdx}\n` +
            `  Valid characters:\n` +
            `    - '_' or '.': Empty\n` +
            `    - '#': Wall\n` +
            `    - '~': Ice\n` +
            `    - '>' / '<': Rotator (clockwise / counterclockwise)\n` +
            `    - 'F': Finish\n` +
            `    - '@': Agent on Empty\n` +
            `    - '%': Agent on Finish`;
          throw new InvalidBoardError(errorMsg, { row: rowIdx, col: colIdx, char: ch });
        }
      }
    }

    tiles.push(row);
  }

  // Validate all rows have same length
  const cols = tiles[0].length;
  const mismatched: [number, number][] = [];

  for (let i = 0; i < tiles.length; i++) {
    if (tiles[i].length !== cols) {
      mismatched.push([i, tiles[i].length]);
    }
  }

  if (mismatched.length > 0) {
    let errorMsg =
      `Inconsistent row lengths\n` +
      `  Expected: ${cols} columns (from row 0)\n` +
      `  Mismatched rows:\n`;

    for (const [rowIdx, actualCols] of mismatched) {
      errorMsg += `    Row ${rowIdx}: ${actualCols} columns - "${rowStrings[rowIdx]}"\n`;
    }
    errorMsg += `  All rows must have the same number of cells`;
    throw new InvalidBoardError(errorMsg);
  }

  return createBoard(tiles, agents);
}

/**
 * Export a board to the compact string format (inverse of parseBoard).
 *
 * @example
 * exportBoard(parseBoard('@.F|#~#')) // '@_F|#~#'
 *
 * @throws InvalidArgumentError if an agent stands on a tile other than Empty
 *         or Finish, or two agents share a cell - neither has a character
 */
export function exportBoard(board: Board): string {
  const agentCells = new Set<string>();
  for (const agent of board.agents) {
    const key = agent.toKey();
    if (agentCells.has(key)) {
      throw new InvalidArgumentError(`Cannot export two agents on the same cell ${agent}`);
    }
    agentCells.add(key);
  }

  const rowStrings: string[] = [];

  for (let rowIdx = 0; rowIdx < board.rows; rowIdx++) {
    let rowStr = '';

    for (let colIdx = 0; colIdx < board.cols; colIdx++) {
      const tile = board.tiles[rowIdx][colIdx];

      if (!agentCells.has(new Position(rowIdx, colIdx).toKey())) {
        rowStr += tileChar(tile);
      } else if (isEmpty(tile)) {
        rowStr += AGENT_ON_EMPTY;
      } else if (isFinish(tile)) {
        rowStr += AGENT_ON_FINISH;
      } else {
        throw new InvalidArgumentError(
          `Cannot export agent standing on ${tile.type} at row ${rowIdx}, column ${colIdx}`
        );
      }
    }

    rowStrings.push(rowStr);
  }

  return rowStrings.join('|');
}
