/**
 * Enumeration of canonical plans by length.
 */

import { InvalidArgumentError } from '../core/errors.js';
import type { Plan } from './plan.js';
import { comparePlans, formatPlan, planFromIndex } from './plan.js';
import { isCanonical } from './canonicalize.js';
import type { SymmetryRules } from './rules.js';
import { SymmetryPreset } from './rules.js';

/**
 * Lengths above this scan 4^L > 16M plans; allowed, but reported.
 */
export const ENUMERATION_WARN_LENGTH = 12;

/**
 * One slice of the plan space, for splitting an enumeration across workers.
 * A shard covers the plan indices congruent to `index` modulo `count`.
 */
export interface Shard {
  readonly index: number;
  readonly count: number;
}

export interface EnumerateOptions {
  readonly rules?: SymmetryRules;
  readonly shard?: Shard;
}

/**
 * Every plan of exactly `length` moves that is its own canonical
 * representative: one plan per orbit, in ascending order.
 *
 * With cycle reduction enabled, orbits of repeated cycles belong to the
 * shorter length and are left out.
 *
 * @throws InvalidArgumentError if length is not a positive integer or the
 *         shard is malformed
 */
export function enumerateCanonical(length: number, options: EnumerateOptions = {}): Plan[] {
  if (!Number.isInteger(length) || length <= 0) {
    throw new InvalidArgumentError(`Plan length must be a positive integer, got ${length}`, {
      length,
    });
  }
  const rules = options.rules ?? SymmetryPreset.FULL;
  const shard = options.shard ?? { index: 0, count: 1 };
  validateShard(shard);

  if (length > ENUMERATION_WARN_LENGTH) {
    console.warn(
      `Warning: enumerating canonical plans of length ${length} scans 4^${length} plans`
    );
  }

  const total = 4 ** length;
  const result: Plan[] = [];

  for (let index = shard.index; index < total; index += shard.count) {
    const plan = planFromIndex(index, length);
    if (isCanonical(plan, rules)) {
      result.push(plan);
    }
  }

  return result;
}

/**
 * Number of orbits of plans of exactly `length` moves.
 */
export function countCanonical(length: number, rules: SymmetryRules = SymmetryPreset.FULL): number {
  return enumerateCanonical(length, { rules }).length;
}

/**
 * Union of shard results, distinct and sorted ascending.
 */
export function mergeCanonical(...shards: ReadonlyArray<ReadonlyArray<Plan>>): Plan[] {
  const merged = new Map<string, Plan>();
  for (const plans of shards) {
    for (const plan of plans) {
      merged.set(formatPlan(plan), plan);
    }
  }
  return [...merged.values()].sort(comparePlans);
}

function validateShard(shard: Shard): void {
  if (!Number.isInteger(shard.count) || shard.count <= 0) {
    throw new InvalidArgumentError(`Shard count must be a positive integer, got ${shard.count}`, {
      shard,
    });
  }
  if (!Number.isInteger(shard.index) || shard.index < 0 || shard.index >= shard.count) {
    throw new InvalidArgumentError(
      `Shard index must be in [0, ${shard.count}), got ${shard.index}`,
      { shard }
    );
  }
}
