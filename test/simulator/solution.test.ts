/**
 * Tests for solution checking and trace rendering.
 */

import { describe, it, expect } from 'vitest';
import { checkSolution } from '../../src/lib/simulator/solution.js';
import { simulate } from '../../src/lib/simulator/simulate.js';
import { formatTrace } from '../../src/lib/simulator/trace.js';
import { parseBoard } from '../../src/lib/parser/parser.js';
import { parsePlan } from '../../src/lib/plan/plan.js';
import { InvalidArgumentError } from '../../src/lib/core/errors.js';

describe('TestCheckSolution', () => {
  const board = parseBoard('@_F');

  it('test_primitive_solution_is_minimal', () => {
    expect(checkSolution(board, parsePlan('E'), 10)).toEqual({
      verdict: 'SOLVED',
      steps: 2,
      primitive: true,
      minimal: true,
    });
  });

  it('test_repeated_cycle_is_not_minimal', () => {
    expect(checkSolution(board, parsePlan('EE'), 10)).toEqual({
      verdict: 'SOLVED',
      steps: 2,
      primitive: false,
      minimal: false,
    });
  });

  it('test_failed_plan_is_not_minimal', () => {
    expect(checkSolution(board, parsePlan('W'), 10)).toEqual({
      verdict: 'UNSOLVED',
      steps: 10,
      primitive: true,
      minimal: false,
    });
  });
});

describe('TestFormatTrace', () => {
  const board = parseBoard('@~_F');
  const { trace } = simulate(board, parsePlan('E'), 10);

  it('test_renders_each_step', () => {
    expect(formatTrace(board, trace, 0)).toBe('@~_F');
    expect(formatTrace(board, trace, 1)).toBe('_~@F');
    expect(formatTrace(board, trace, 2)).toBe('_~_%');
  });

  it('test_step_outside_trace_raises_error', () => {
    expect(() => formatTrace(board, trace, 3)).toThrow(InvalidArgumentError);
    expect(() => formatTrace(board, trace, 3)).toThrow('Step 3 is outside the trace (0..2)');
  });
});
