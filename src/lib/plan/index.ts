/**
 * Plan representation and symmetry canonicalization.
 */

export type { Plan } from './plan.js';
export {
  createPlan,
  parsePlan,
  formatPlan,
  comparePlans,
  plansEqual,
  rotatePlan,
  reflectPlan,
  shiftPlan,
  primitivePeriod,
  isReducible,
  planFromIndex,
} from './plan.js';
export type { SymmetryRules } from './rules.js';
export { SymmetryPreset, createSymmetryRules } from './rules.js';
export { canonicalize, orbit, isCanonical } from './canonicalize.js';
export type { Shard, EnumerateOptions } from './enumerate.js';
export {
  enumerateCanonical,
  countCanonical,
  mergeCanonical,
  ENUMERATION_WARN_LENGTH,
} from './enumerate.js';
