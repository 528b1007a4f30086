/**
 * Canonical representatives of plan orbits.
 *
 * The symmetry group is small and finite (4 rotations x 2 reflections x
 * L phase shifts), so the orbit is enumerated explicitly and its minimum
 * taken under comparePlans.
 */

import type { Plan } from './plan.js';
import {
  assertPlan,
  comparePlans,
  formatPlan,
  primitivePeriod,
  reflectPlan,
  rotatePlan,
  shiftPlan,
} from './plan.js';
import type { SymmetryRules } from './rules.js';
import { SymmetryPreset } from './rules.js';

/**
 * Images of a plan under each group element, duplicates included.
 */
function* symmetryImages(plan: Plan, rules: SymmetryRules): Generator<Plan> {
  assertPlan(plan);
  const base = rules.reduceCycles ? primitivePeriod(plan) : plan;
  const shifts = rules.phaseShift ? base.length : 1;

  for (const reflected of [base, reflectPlan(base)]) {
    for (let turns = 0; turns < 4; turns++) {
      const rotated = rotatePlan(reflected, turns);
      for (let offset = 0; offset < shifts; offset++) {
        yield shiftPlan(rotated, offset);
      }
    }
  }
}

/**
 * Every plan the symmetry group produces from the given plan, including the
 * plan itself (after cycle reduction, when enabled).
 *
 * Distinct and sorted ascending, so the first element is the canonical form.
 *
 * @throws InvalidArgumentError if the plan is empty
 */
export function orbit(plan: Plan, rules: SymmetryRules = SymmetryPreset.FULL): Plan[] {
  const seen = new Map<string, Plan>();
  for (const candidate of symmetryImages(plan, rules)) {
    seen.set(formatPlan(candidate), candidate);
  }
  return [...seen.values()].sort(comparePlans);
}

/**
 * Canonical representative of the plan's orbit: the minimum under
 * comparePlans. Plans in the same orbit map to the same result.
 *
 * @throws InvalidArgumentError if the plan is empty
 */
export function canonicalize(plan: Plan, rules: SymmetryRules = SymmetryPreset.FULL): Plan {
  let best: Plan | undefined;
  for (const candidate of symmetryImages(plan, rules)) {
    if (best === undefined || comparePlans(candidate, best) < 0) {
      best = candidate;
    }
  }
  // The identity image is always yielded
  return best ?? plan;
}

/**
 * True if the plan is its own canonical representative.
 */
export function isCanonical(plan: Plan, rules: SymmetryRules = SymmetryPreset.FULL): boolean {
  return comparePlans(canonicalize(plan, rules), plan) === 0;
}
