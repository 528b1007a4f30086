/**
 * Execution of a cyclic plan against a board.
 *
 * All agents share one step counter and read the same plan entry each step.
 * Each agent keeps its own orientation: the number of quarter turns rotators
 * have applied to its view of the plan.
 */

import type { Direction } from '../core/direction.js';
import { rotateDirection } from '../core/direction.js';
import { InvalidArgumentError } from '../core/errors.js';
import type { Position } from '../core/position.js';
import type { Board, Rotation } from '../core/types.js';
import { getTile, isBlocked, isFinish, isIce, isRotator, validateBoard } from '../core/types.js';
import type { Plan } from '../plan/plan.js';
import { assertPlan } from '../plan/plan.js';
import type { SimulationRules } from './rules.js';
import { assertSimulationRules, createSimulationRules } from './rules.js';
import type { SimulationResult, Snapshot } from './types.js';

/**
 * Working state of one agent during a run.
 */
interface AgentState {
  position: Position;
  /** Quarter turns applied by rotators, in [0, 4) */
  orientation: number;
  /** Set while the agent stands on a rotator it has not yet left */
  pendingRotation: Rotation | null;
  /** Rotations on the current rotator that left the next move blocked */
  rotationAttempts: number;
}

/**
 * Direction an agent reads for global step `step`.
 */
function readMove(plan: Plan, step: number, orientation: number): Direction {
  return rotateDirection(plan[step % plan.length], orientation);
}

function rotationAt(board: Board, pos: Position): Rotation | null {
  const tile = getTile(board, pos);
  return tile !== undefined && isRotator(tile) ? tile.rotation : null;
}

function isOnFinish(board: Board, pos: Position): boolean {
  const tile = getTile(board, pos);
  return tile !== undefined && isFinish(tile);
}

/**
 * Advance one agent by one step.
 *
 * @returns true if the agent is stuck on a rotator
 */
function stepAgent(
  board: Board,
  plan: Plan,
  step: number,
  agent: AgentState,
  rules: SimulationRules
): boolean {
  // Turning on a rotator replaces the move for this step
  if (agent.pendingRotation !== null) {
    agent.orientation = (agent.orientation + (agent.pendingRotation === 'cw' ? 1 : 3)) % 4;

    const next = readMove(plan, step + 1, agent.orientation);
    if (isBlocked(board, agent.position.step(next))) {
      agent.rotationAttempts++;
      return agent.rotationAttempts >= rules.maxRotations;
    }

    agent.pendingRotation = null;
    agent.rotationAttempts = 0;
    return false;
  }

  const direction = readMove(plan, step, agent.orientation);
  let position = agent.position.step(direction);

  // Wall or edge: the step is spent without moving
  if (isBlocked(board, position)) {
    return false;
  }

  // Slide across ice; a blocked slide ends on the last ice cell
  for (;;) {
    const tile = getTile(board, position);
    if (tile === undefined || !isIce(tile)) {
      break;
    }
    const beyond = position.step(direction);
    if (isBlocked(board, beyond)) {
      break;
    }
    position = beyond;
  }

  agent.position = position;
  agent.pendingRotation = rotationAt(board, position);
  return false;
}

/**
 * Run a plan against a board for at most `maxSteps` steps.
 *
 * The run ends at the first step where every agent stands on a finish tile
 * (SOLVED), when an agent is stuck on a rotator (STUCK), or after `maxSteps`
 * steps (UNSOLVED). The board is never modified.
 *
 * @param board - Board to run on
 * @param plan - Moves, repeated cyclically
 * @param maxSteps - Upper bound on executed steps
 * @param rules - Simulation rules (rotator limit)
 * @throws InvalidBoardError if the board is malformed
 * @throws InvalidArgumentError if the plan is empty or maxSteps is not a positive integer
 */
export function simulate(
  board: Board,
  plan: Plan,
  maxSteps: number,
  rules: SimulationRules = createSimulationRules()
): SimulationResult {
  validateBoard(board);
  assertPlan(plan);
  if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
    throw new InvalidArgumentError(`maxSteps must be a positive integer, got ${maxSteps}`, {
      maxSteps,
    });
  }
  assertSimulationRules(rules);

  const agents: AgentState[] = board.agents.map(start => ({
    position: start,
    orientation: 0,
    pendingRotation: rotationAt(board, start),
    rotationAttempts: 0,
  }));
  const snapshot = (): Snapshot => Object.freeze(agents.map(agent => agent.position));
  const trace: Snapshot[] = [snapshot()];

  for (let step = 0; step < maxSteps; step++) {
    let stuckAgent: number | undefined;

    for (let i = 0; i < agents.length; i++) {
      if (stepAgent(board, plan, step, agents[i], rules) && stuckAgent === undefined) {
        stuckAgent = i;
      }
    }
    trace.push(snapshot());

    if (stuckAgent !== undefined) {
      return { verdict: 'STUCK', trace, steps: step + 1, stuckAgent };
    }
    if (agents.every(agent => isOnFinish(board, agent.position))) {
      return { verdict: 'SOLVED', trace, steps: step + 1, solvedAt: step + 1 };
    }
  }

  return { verdict: 'UNSOLVED', trace, steps: maxSteps };
}
