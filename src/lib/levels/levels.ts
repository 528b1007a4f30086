/**
 * Level packs: named boards with a step bound and optional reference solution,
 * written as JSON5 so they can carry comments and unquoted keys.
 *
 * ```json5
 * {
 *   // two agents, one shared plan
 *   twins: { board: '@_F|@_F', maxSteps: 10, solution: 'E' },
 * }
 * ```
 */

import JSON5 from 'json5';
import { InvalidArgumentError, isLoopgridError } from '../core/errors.js';
import type { Board } from '../core/types.js';
import { parseBoard } from '../parser/parser.js';
import type { Plan } from '../plan/plan.js';
import { parsePlan } from '../plan/plan.js';
import type { SimulationRules } from '../simulator/rules.js';
import { createSimulationRules } from '../simulator/rules.js';
import type { SolutionCheck } from '../simulator/solution.js';
import { checkSolution } from '../simulator/solution.js';

export const DEFAULT_LEVEL_MAX_STEPS = 100;

export interface Level {
  readonly name: string;
  readonly board: Board;
  readonly maxSteps: number;
  readonly solution?: Plan;
}

export type LevelPack = ReadonlyArray<Level>;

export interface LevelReport {
  readonly name: string;
  /** null when the level has no reference solution */
  readonly check: SolutionCheck | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLevel(name: string, entry: unknown): Level {
  if (!isRecord(entry)) {
    throw new InvalidArgumentError(`Level '${name}': expected an object`, { level: name });
  }

  const { board, maxSteps, solution } = entry;

  if (typeof board !== 'string') {
    throw new InvalidArgumentError(`Level '${name}': 'board' must be a string`, { level: name });
  }
  let steps = DEFAULT_LEVEL_MAX_STEPS;
  if (maxSteps !== undefined) {
    if (typeof maxSteps !== 'number' || !Number.isInteger(maxSteps) || maxSteps <= 0) {
      throw new InvalidArgumentError(`Level '${name}': 'maxSteps' must be a positive integer`, {
        level: name,
      });
    }
    steps = maxSteps;
  }
  let moves: string | undefined;
  if (solution !== undefined) {
    if (typeof solution !== 'string') {
      throw new InvalidArgumentError(`Level '${name}': 'solution' must be a string`, {
        level: name,
      });
    }
    moves = solution;
  }

  try {
    return Object.freeze({
      name,
      board: parseBoard(board),
      maxSteps: steps,
      ...(moves !== undefined ? { solution: parsePlan(moves) } : {}),
    });
  } catch (e) {
    if (isLoopgridError(e)) {
      throw new InvalidArgumentError(`Level '${name}': ${e.message}`, {
        level: name,
        cause: e.code,
      });
    }
    throw e;
  }
}

/**
 * Parse a level pack from JSON5 text.
 *
 * @param text - JSON5 object mapping level names to { board, maxSteps?, solution? }
 * @returns Levels in document order
 * @throws InvalidArgumentError if the text or any level is malformed
 */
export function parseLevelPack(text: string): LevelPack {
  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (e) {
    throw new InvalidArgumentError(`Invalid JSON5: ${e instanceof Error ? e.message : String(e)}`);
  }

  if (!isRecord(raw)) {
    throw new InvalidArgumentError('Expected a JSON object mapping level names to levels');
  }

  return Object.freeze(Object.entries(raw).map(([name, entry]) => parseLevel(name, entry)));
}

/**
 * Check every level's reference solution.
 *
 * Levels without a solution are reported with a null check and a warning.
 */
export function verifyLevelPack(
  pack: LevelPack,
  rules: SimulationRules = createSimulationRules()
): LevelReport[] {
  return pack.map(level => {
    if (level.solution === undefined) {
      console.warn(`Warning: level '${level.name}' has no solution to verify`);
      return { name: level.name, check: null };
    }
    return {
      name: level.name,
      check: checkSolution(level.board, level.solution, level.maxSteps, rules),
    };
  });
}
