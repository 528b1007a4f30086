/**
 * Symmetry group configuration for plan canonicalization.
 */

/**
 * Which symmetries beyond rotation and reflection identify two plans.
 *
 * Rotation (4 quarter turns) and reflection (E <-> W mirror) always apply.
 */
export interface SymmetryRules {
  /** Plans differing only in where the cycle starts are equivalent */
  readonly phaseShift: boolean;
  /** A repeated cycle is equivalent to its primitive period */
  readonly reduceCycles: boolean;
}

/**
 * Common symmetry configurations.
 */
export class SymmetryPreset {
  /**
   * Default: full group. Suitable when walls make any start phase reachable.
   */
  static readonly FULL: SymmetryRules = Object.freeze({
    phaseShift: true,
    reduceCycles: true,
  });

  /**
   * Start phase matters (boards where the opening move is significant).
   */
  static readonly PHASE_SENSITIVE: SymmetryRules = Object.freeze({
    phaseShift: false,
    reduceCycles: true,
  });

  /**
   * Rotation and reflection only.
   */
  static readonly STRICT: SymmetryRules = Object.freeze({
    phaseShift: false,
    reduceCycles: false,
  });
}

/**
 * Create SymmetryRules, filling unspecified fields from the full group.
 */
export function createSymmetryRules(options: Partial<SymmetryRules> = {}): SymmetryRules {
  return Object.freeze({ ...SymmetryPreset.FULL, ...options });
}
