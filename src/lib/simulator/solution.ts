/**
 * Solution checking for puzzle validation.
 */

import type { Board } from '../core/types.js';
import type { Plan } from '../plan/plan.js';
import { isReducible } from '../plan/plan.js';
import type { SimulationRules } from './rules.js';
import { createSimulationRules } from './rules.js';
import { simulate } from './simulate.js';
import type { Verdict } from './types.js';

export interface SolutionCheck {
  readonly verdict: Verdict;
  /** Steps executed before the run ended */
  readonly steps: number;
  /** The plan is not a shorter cycle repeated */
  readonly primitive: boolean;
  /**
   * Solved by a primitive plan. A reducible plan is never minimal: its
   * primitive period executes the same moves.
   */
  readonly minimal: boolean;
}

/**
 * Simulate a candidate solution and classify it.
 *
 * @throws InvalidBoardError / InvalidArgumentError as simulate does
 */
export function checkSolution(
  board: Board,
  plan: Plan,
  maxSteps: number,
  rules: SimulationRules = createSimulationRules()
): SolutionCheck {
  const result = simulate(board, plan, maxSteps, rules);
  const primitive = !isReducible(plan);

  return Object.freeze({
    verdict: result.verdict,
    steps: result.steps,
    primitive,
    minimal: result.verdict === 'SOLVED' && primitive,
  });
}
