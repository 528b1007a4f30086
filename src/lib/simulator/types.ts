/**
 * Simulation results.
 */

import type { Position } from '../core/position.js';

/**
 * Terminal classification of a simulation run.
 *
 * - SOLVED: every agent stood on a finish tile at the same step
 * - UNSOLVED: the step bound was reached first
 * - STUCK: an agent kept turning on a rotator without finding an open move
 */
export type Verdict = 'SOLVED' | 'UNSOLVED' | 'STUCK';

/**
 * Agent positions at one step, indexed like Board.agents.
 */
export type Snapshot = ReadonlyArray<Position>;

/**
 * trace[0] holds the start positions; trace[i] the positions after step i.
 */
export type Trace = ReadonlyArray<Snapshot>;

export interface SimulationResult {
  readonly verdict: Verdict;
  readonly trace: Trace;
  /** Number of steps executed */
  readonly steps: number;
  /** Step at which the board was solved (SOLVED only) */
  readonly solvedAt?: number;
  /** Index of the first agent that got stuck (STUCK only) */
  readonly stuckAgent?: number;
}
