/**
 * Grid simulator - runs cyclic plans against boards.
 */

export { simulate } from './simulate.js';
export { checkSolution } from './solution.js';
export type { SolutionCheck } from './solution.js';
export { formatSnapshot, formatTrace } from './trace.js';
export type { SimulationRules } from './rules.js';
export { createSimulationRules, DEFAULT_MAX_ROTATIONS } from './rules.js';
export type { Verdict, Snapshot, Trace, SimulationResult } from './types.js';
