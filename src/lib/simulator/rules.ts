/**
 * Rules governing simulation behavior.
 */

import { InvalidArgumentError } from '../core/errors.js';

export interface SimulationRules {
  /**
   * Limit on consecutive rotations on one rotator that leave the agent facing
   * a blocked move. The run is stuck as soon as the count reaches this limit.
   */
  readonly maxRotations: number;
}

export const DEFAULT_MAX_ROTATIONS = 4;

/**
 * Create SimulationRules with default settings.
 *
 * @throws InvalidArgumentError if maxRotations is not a positive integer
 */
export function createSimulationRules(
  maxRotations: number = DEFAULT_MAX_ROTATIONS
): SimulationRules {
  assertSimulationRules({ maxRotations });
  return Object.freeze({ maxRotations });
}

export function assertSimulationRules(rules: SimulationRules): void {
  if (!Number.isInteger(rules.maxRotations) || rules.maxRotations <= 0) {
    throw new InvalidArgumentError(
      `maxRotations must be a positive integer, got ${rules.maxRotations}`,
      { maxRotations: rules.maxRotations }
    );
  }
}
