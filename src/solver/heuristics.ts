/**
 * Heuristic estimators for informed search
 *
 * The default estimate is a mismatch count: the number of positions whose
 * cell differs from a stored goal configuration. It is not proven admissible
 * for arbitrary swap moves, so A* driven by it is best-first search rather
 * than an optimal search.
 */

import { ProblemContractError } from '../model/errors';
import { HeuristicFn, SearchProblem } from '../model/types';

export const zeroHeuristic = (): number => 0;

/**
 * Build a mismatch-count heuristic against `goal`.
 *
 * @param cellsOf - flattens a state into its cells in a fixed order
 * @param cellKey - structural key of a single cell
 */
export function createMismatchHeuristic<S, C>(
  goal: S,
  cellsOf: (state: S) => ReadonlyArray<C>,
  cellKey: (cell: C) => string
): HeuristicFn<S> {
  const goalKeys = cellsOf(goal).map(cellKey);
  return (state: S) => {
    const cells = cellsOf(state);
    let mismatches = Math.abs(cells.length - goalKeys.length);
    const n = Math.min(cells.length, goalKeys.length);
    for (let i = 0; i < n; i++) {
      if (cellKey(cells[i]) !== goalKeys[i]) {
        mismatches++;
      }
    }
    return mismatches;
  };
}

/**
 * Pick the heuristic A* should use: explicit override, then the problem's
 * own estimate, then zero (uniform-cost ordering).
 */
export function resolveHeuristic<S, A>(
  problem: SearchProblem<S, A>,
  override?: HeuristicFn<S>
): HeuristicFn<S> {
  if (override) return override;
  if (problem.heuristic) {
    return problem.heuristic.bind(problem);
  }
  return zeroHeuristic;
}

/**
 * Evaluate a heuristic and reject values outside its contract.
 */
export function checkedEstimate<S>(heuristic: HeuristicFn<S>, state: S): number {
  const h = heuristic(state);
  if (Number.isNaN(h) || h < 0) {
    throw new ProblemContractError('heuristic', h);
  }
  return h;
}

/**
 * Cost of one transition; unit cost unless the problem supplies its own.
 */
export function checkedStepCost<S, A>(
  problem: SearchProblem<S, A>,
  from: S,
  action: A,
  to: S
): number {
  const cost = problem.stepCost ? problem.stepCost(from, action, to) : 1;
  if (Number.isNaN(cost) || cost < 0) {
    throw new ProblemContractError('stepCost', cost);
  }
  return cost;
}
