/**
 * Text rendering of simulation snapshots, for replay and debugging.
 */

import { InvalidArgumentError } from '../core/errors.js';
import type { Board } from '../core/types.js';
import { isFinish } from '../core/types.js';
import { AGENT_ON_EMPTY, AGENT_ON_FINISH, tileChar } from '../parser/parser.js';
import type { Snapshot, Trace } from './types.js';

/**
 * Render a snapshot in the board text format.
 *
 * Agents are drawn as '%' on a finish tile and '@' on anything else, so the
 * tile under an agent on ice or a rotator is not shown.
 */
export function formatSnapshot(board: Board, snapshot: Snapshot): string {
  const occupied = new Set(snapshot.map(pos => pos.toKey()));
  const rows: string[] = [];

  for (let r = 0; r < board.rows; r++) {
    let row = '';
    for (let c = 0; c < board.cols; c++) {
      const tile = board.tiles[r][c];
      if (occupied.has(`${r},${c}`)) {
        row += isFinish(tile) ? AGENT_ON_FINISH : AGENT_ON_EMPTY;
      } else {
        row += tileChar(tile);
      }
    }
    rows.push(row);
  }

  return rows.join('|');
}

/**
 * Render the snapshot at a given step of a trace.
 *
 * @throws InvalidArgumentError if the step is not in the trace
 */
export function formatTrace(board: Board, trace: Trace, step: number): string {
  if (!Number.isInteger(step) || step < 0 || step >= trace.length) {
    throw new InvalidArgumentError(
      `Step ${step} is outside the trace (0..${trace.length - 1})`,
      { step, length: trace.length }
    );
  }
  return formatSnapshot(board, trace[step]);
}
