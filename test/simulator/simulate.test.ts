/**
 * Tests for plan simulation: walls, ice, plan cursor and argument checks.
 */

import { describe, it, expect } from 'vitest';
import { simulate } from '../../src/lib/simulator/simulate.js';
import { createSimulationRules } from '../../src/lib/simulator/rules.js';
import type { Trace } from '../../src/lib/simulator/types.js';
import { parseBoard } from '../../src/lib/parser/parser.js';
import { parsePlan } from '../../src/lib/plan/plan.js';
import { Empty, Ice, Wall, createBoard, type Board } from '../../src/lib/core/types.js';
import { Position } from '../../src/lib/core/position.js';
import { InvalidArgumentError, InvalidBoardError } from '../../src/lib/core/errors.js';

/**
 * Positions of one agent across a trace, as [row, col] pairs.
 */
function path(trace: Trace, agent = 0): Array<[number, number]> {
  return trace.map((snapshot): [number, number] => [snapshot[agent].row, snapshot[agent].col]);
}

describe('TestWalls', () => {
  it('test_walled_cell_never_moves', () => {
    const board = parseBoard('###|#@#|###');
    const result = simulate(board, parsePlan('N'), 5);

    expect(result.verdict).toBe('UNSOLVED');
    expect(result.steps).toBe(5);
    expect(path(result.trace)).toEqual([
      [1, 1],
      [1, 1],
      [1, 1],
      [1, 1],
      [1, 1],
      [1, 1],
    ]);
  });

  it('test_board_edge_acts_as_wall', () => {
    const result = simulate(parseBoard('@'), parsePlan('NESW'), 4);

    expect(result.verdict).toBe('UNSOLVED');
    expect(path(result.trace)).toEqual([
      [0, 0],
      [0, 0],
      [0, 0],
      [0, 0],
      [0, 0],
    ]);
  });

  it('test_walled_finish_is_solved_after_first_step', () => {
    const result = simulate(parseBoard('###|#%#|###'), parsePlan('N'), 5);

    expect(result.verdict).toBe('SOLVED');
    expect(result.solvedAt).toBe(1);
    expect(result.trace).toHaveLength(2);
  });

  it('test_blocked_move_still_advances_plan_cursor', () => {
    const result = simulate(parseBoard('@_'), parsePlan('NE'), 2);

    expect(path(result.trace)).toEqual([
      [0, 0],
      [0, 0],
      [0, 1],
    ]);
  });
});

describe('TestPlanExecution', () => {
  it('test_single_move_repeats', () => {
    const result = simulate(parseBoard('@__F'), parsePlan('E'), 10);

    expect(result.verdict).toBe('SOLVED');
    expect(result.solvedAt).toBe(3);
    expect(result.steps).toBe(3);
  });

  it('test_plan_cycles_through_moves', () => {
    const result = simulate(parseBoard('@_#|_F_'), parsePlan('ES'), 10);

    expect(result.verdict).toBe('SOLVED');
    expect(path(result.trace)).toEqual([
      [0, 0],
      [0, 1],
      [1, 1],
    ]);
  });

  it('test_unreachable_finish_is_unsolved', () => {
    const result = simulate(parseBoard('@#F'), parsePlan('E'), 7);

    expect(result.verdict).toBe('UNSOLVED');
    expect(result.steps).toBe(7);
    expect(result.trace).toHaveLength(8);
    expect(result.solvedAt).toBeUndefined();
  });
});

describe('TestIce', () => {
  it('test_ice_run_covers_three_cells_in_one_step', () => {
    const result = simulate(parseBoard('@~~_'), parsePlan('E'), 1);

    expect(result.steps).toBe(1);
    expect(path(result.trace)).toEqual([
      [0, 0],
      [0, 3],
    ]);
  });

  it('test_slide_stops_before_wall', () => {
    const result = simulate(parseBoard('@~~#'), parsePlan('E'), 1);

    expect(path(result.trace)[1]).toEqual([0, 2]);
  });

  it('test_slide_stops_at_board_edge', () => {
    const result = simulate(parseBoard('@~~'), parsePlan('E'), 1);

    expect(path(result.trace)[1]).toEqual([0, 2]);
  });

  it('test_slide_onto_finish', () => {
    const result = simulate(parseBoard('@~F'), parsePlan('E'), 5);

    expect(result.verdict).toBe('SOLVED');
    expect(result.solvedAt).toBe(1);
  });

  it('test_starting_on_ice_does_not_slide', () => {
    const board = createBoard([[Ice(), Empty(), Empty()]], [new Position(0, 0)]);
    const result = simulate(board, parsePlan('E'), 1);

    expect(path(result.trace)[1]).toEqual([0, 1]);
  });

  it('test_vertical_slide', () => {
    const result = simulate(parseBoard('@|~|~|~|_'), parsePlan('S'), 1);

    expect(path(result.trace)[1]).toEqual([4, 0]);
  });
});

describe('TestSimulateArguments', () => {
  const board = parseBoard('@F');

  it('test_empty_plan_raises_error', () => {
    expect(() => simulate(board, [], 5)).toThrow(InvalidArgumentError);
  });

  it('test_non_positive_max_steps_raises_error', () => {
    expect(() => simulate(board, parsePlan('E'), 0)).toThrow(
      'maxSteps must be a positive integer, got 0'
    );
    expect(() => simulate(board, parsePlan('E'), 2.5)).toThrow(InvalidArgumentError);
  });

  it('test_invalid_rotation_limit_raises_error', () => {
    expect(() => createSimulationRules(0)).toThrow(
      'maxRotations must be a positive integer, got 0'
    );
    expect(() => simulate(board, parsePlan('E'), 5, { maxRotations: -1 })).toThrow(
      InvalidArgumentError
    );
  });

  it('test_malformed_board_raises_error_before_running', () => {
    const outside: Board = {
      tiles: [[Empty(), Wall()]],
      rows: 1,
      cols: 2,
      agents: [new Position(0, 5)],
    };
    expect(() => simulate(outside, parsePlan('E'), 5)).toThrow(InvalidBoardError);

    const noAgents: Board = { tiles: [[Empty()]], rows: 1, cols: 1, agents: [] };
    expect(() => simulate(noAgents, parsePlan('E'), 5)).toThrow(InvalidBoardError);
  });
});
