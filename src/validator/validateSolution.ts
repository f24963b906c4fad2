/**
 * Validate solutions by replaying them against the problem
 */

import { SearchProblem, ValidationResult } from '../model/types';

/**
 * Replay `actions` from `start`. Each action must be one of the successors of
 * the state before it, and the final state must pass the goal test.
 *
 * @param actionKey - structural key used to match an action among successors
 */
export function validateSolution<S, A>(
  problem: SearchProblem<S, A>,
  start: S,
  actions: ReadonlyArray<A>,
  actionKey: (action: A) => string
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  let state = start;
  const seen = new Set<string>([problem.keyOf(start)]);
  for (let i = 0; i < actions.length; i++) {
    const wanted = actionKey(actions[i]);
    const match = problem.successor(state).find(s => actionKey(s.action) === wanted);
    if (!match) {
      errors.push(`Action ${i} (${wanted}) is not available from the preceding state`);
      return { valid: false, errors, warnings };
    }
    state = match.state;
    const key = problem.keyOf(state);
    if (seen.has(key)) {
      warnings.push(`Action ${i} (${wanted}) revisits an earlier state`);
    }
    seen.add(key);
  }

  if (!problem.goalTest(state)) {
    errors.push(`Final state after ${actions.length} action(s) is not a goal`);
  }

  return { valid: errors.length === 0, errors, warnings };
}
