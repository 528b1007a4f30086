/**
 * Plans: fixed-length move sequences executed as an endless cycle.
 */

import {
  Direction,
  directionIndex,
  parseDirection,
  reflectDirection,
  rotateDirection,
} from '../core/direction.js';
import { InvalidArgumentError } from '../core/errors.js';

/**
 * An ordered, non-empty sequence of moves. After the last move the plan
 * restarts from its first.
 */
export type Plan = ReadonlyArray<Direction>;

/**
 * Create a frozen plan from a list of directions.
 *
 * @throws InvalidArgumentError if the list is empty
 */
export function createPlan(directions: ReadonlyArray<Direction>): Plan {
  assertPlan(directions);
  return Object.freeze([...directions]);
}

/**
 * @throws InvalidArgumentError if the plan is empty
 */
export function assertPlan(plan: Plan): void {
  if (plan.length === 0) {
    throw new InvalidArgumentError('Plan must contain at least one move');
  }
}

/**
 * Parse a plan from its letter form, e.g. "NESW". Case-insensitive;
 * whitespace is ignored.
 *
 * @throws InvalidArgumentError on an unknown letter or an empty plan
 */
export function parsePlan(text: string): Plan {
  const letters = text.replace(/\s+/g, '');
  const moves: Direction[] = [];

  for (let i = 0; i < letters.length; i++) {
    const dir = parseDirection(letters[i]);
    if (dir === undefined) {
      throw new InvalidArgumentError(
        `Invalid move '${letters[i]}' at position ${i} in plan "${text}"\n` +
          `  Valid moves: N, E, S, W`,
        { text, position: i }
      );
    }
    moves.push(dir);
  }

  return createPlan(moves);
}

/**
 * Letter form of a plan (inverse of parsePlan).
 */
export function formatPlan(plan: Plan): string {
  return plan.join('');
}

/**
 * Total order over plans: shorter first, then lexicographic with N < E < S < W.
 *
 * @returns Negative if a < b, positive if a > b, 0 if equal
 */
export function comparePlans(a: Plan, b: Plan): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  for (let i = 0; i < a.length; i++) {
    const diff = directionIndex(a[i]) - directionIndex(b[i]);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

export function plansEqual(a: Plan, b: Plan): boolean {
  return comparePlans(a, b) === 0;
}

// =============================================================================
// Symmetry operations
// =============================================================================

/**
 * Rotate every move clockwise by the given number of quarter turns.
 */
export function rotatePlan(plan: Plan, quarterTurns: number): Plan {
  return Object.freeze(plan.map(dir => rotateDirection(dir, quarterTurns)));
}

/**
 * Mirror every move across the vertical axis (E <-> W).
 */
export function reflectPlan(plan: Plan): Plan {
  return Object.freeze(plan.map(reflectDirection));
}

/**
 * Start the cycle `offset` moves later: shiftPlan([N, E, S], 1) is [E, S, N].
 * Negative offsets shift the other way.
 */
export function shiftPlan(plan: Plan, offset: number): Plan {
  const n = plan.length;
  const k = ((offset % n) + n) % n;
  return Object.freeze([...plan.slice(k), ...plan.slice(0, k)]);
}

// =============================================================================
// Cycle reduction
// =============================================================================

/**
 * The shortest prefix whose repetition reconstructs the plan.
 *
 * Checks divisors in ascending order, so the first match is the primitive
 * period (any repeated cycle's own period divides the plan length too).
 */
export function primitivePeriod(plan: Plan): Plan {
  assertPlan(plan);
  const n = plan.length;

  for (let d = 1; d < n; d++) {
    if (n % d !== 0) {
      continue;
    }
    let repeats = true;
    for (let i = d; i < n; i++) {
      if (plan[i] !== plan[i - d]) {
        repeats = false;
        break;
      }
    }
    if (repeats) {
      return Object.freeze(plan.slice(0, d));
    }
  }

  return plan;
}

/**
 * True if the plan is a shorter cycle repeated, e.g. [N, E, N, E].
 */
export function isReducible(plan: Plan): boolean {
  return primitivePeriod(plan).length < plan.length;
}

// =============================================================================
// Index encoding
// =============================================================================

/**
 * Decode a plan from its base-4 index (most significant move first).
 * Index 0 is all-N; 4^length - 1 is all-W.
 */
export function planFromIndex(index: number, length: number): Plan {
  const moves = new Array<Direction>(length);
  let rest = index;
  for (let i = length - 1; i >= 0; i--) {
    moves[i] = rotateDirection(Direction.N, rest % 4);
    rest = Math.floor(rest / 4);
  }
  return Object.freeze(moves);
}
