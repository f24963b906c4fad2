/**
 * Generate human-readable explanations for search results
 */

import { AStarResult, DeepeningResult, Explanation } from '../model/types';

/**
 * Explain an A* result
 */
export function explainAStar<A>(result: AStarResult<A>): Explanation {
  if (result.actions !== null) {
    return {
      type: 'success',
      message: `Solved in ${result.actions.length} move(s) at cost ${result.cost}`,
      details: [`${result.expanded} state(s) expanded`],
    };
  }
  return {
    type: 'unsat',
    message: 'No solution found',
    details: [
      `${result.expanded} state(s) expanded before the search stopped`,
      'The frontier emptied or the expansion cap was reached',
    ],
  };
}

/**
 * Explain an iterative deepening result, naming the cutoff that stopped it
 */
export function explainDeepening<A>(result: DeepeningResult<A>): Explanation {
  const lastLimit = result.expansionsByLimit.length - 1;
  const perLimit = result.expansionsByLimit.map((count, limit) => `limit ${limit}: ${count} expansion(s)`);

  switch (result.stopReason) {
    case 'solved':
      return {
        type: 'success',
        message: `Solved in ${result.actions?.length ?? 0} move(s) at depth limit ${lastLimit}`,
        details: [`${result.expanded} state(s) expanded in total`, ...perLimit],
      };
    case 'stagnated':
      return {
        type: 'unsat',
        message: 'No solution exists within reach of the start state',
        details: [
          `Limit ${lastLimit} expanded as many states as limit ${lastLimit - 1}`,
          ...perLimit,
        ],
      };
    case 'max-limit':
      return {
        type: 'cutoff',
        message: `No solution up to depth limit ${lastLimit}`,
        details: [`${result.expanded} state(s) expanded in total`, ...perLimit],
      };
    case 'max-expansions':
      return {
        type: 'cutoff',
        message: `Expansion budget exhausted after ${result.expanded} state(s)`,
        details: perLimit,
      };
  }
}
