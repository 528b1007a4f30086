/**
 * Example: validate every short plan against a small board.
 *
 * This shows how to:
 * 1. Enumerate one canonical plan per orbit
 * 2. Expand a canonical plan back into its orbit
 * 3. Simulate each candidate and report the ones that solve the board
 *
 * Canonical plans fix the first move as N, so the whole orbit is tried:
 * the board is not symmetric even when the plans are.
 */

import {
  enumerateCanonical,
  formatPlan,
  formatTrace,
  orbit,
  parseBoard,
  simulate,
} from '../src/lib/index.js';

const board = parseBoard(`
  @_#F
  _~__
  #_>_
`);

for (let length = 1; length <= 3; length++) {
  console.log(`=== Plans of length ${length} ===`);

  for (const canonical of enumerateCanonical(length)) {
    const solutions = orbit(canonical).filter(
      plan => simulate(board, plan, 30).verdict === 'SOLVED'
    );
    console.log(
      `${formatPlan(canonical)}: ${solutions.length > 0 ? solutions.map(formatPlan).join(', ') : '-'}`
    );
  }
}

const result = simulate(board, orbit(enumerateCanonical(2)[0])[3], 30);
console.log(`\nReplay (${result.verdict} after ${result.steps} steps):`);
result.trace.forEach((_, step) => console.log(formatTrace(board, result.trace, step)));
