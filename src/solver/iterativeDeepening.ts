/**
 * Iterative deepening driver
 * Re-runs depth-limited search with limits 0, 1, 2, ... until a goal is
 * found, the per-call expansion count repeats, or a configured ceiling is hit.
 */

import { resolveDeepeningConfig } from '../config/search';
import { DeepeningOptions, DeepeningResult, SearchProblem } from '../model/types';
import { depthLimitedSearch } from './depthLimited';

export function iterativeDeepeningSearch<S, A>(
  problem: SearchProblem<S, A>,
  start: S,
  options: DeepeningOptions<S> = {}
): DeepeningResult<A> {
  const config = resolveDeepeningConfig(options);
  const { maxLimit, maxTotalExpansions, debugLevel } = config;

  let totalExpanded = 0;
  let lastExpanded = -1;
  const expansionsByLimit: number[] = [];

  for (let limit = 0; limit <= maxLimit; limit++) {
    if (totalExpanded >= maxTotalExpansions) {
      if (debugLevel >= 1) {
        console.log(`[IDDFS] Budget of ${maxTotalExpansions} expansions reached before limit ${limit}`);
      }
      return { actions: null, expanded: totalExpanded, stopReason: 'max-expansions', expansionsByLimit };
    }

    // Each call starts from a fresh stack and path and runs to completion;
    // the budget is only consulted between limits
    const result = depthLimitedSearch(problem, start, limit, {
      debugLevel,
      onExpand: options.onExpand,
    });
    expansionsByLimit.push(result.expanded);

    if (result.actions !== null) {
      totalExpanded += result.expanded;
      if (debugLevel >= 1) {
        console.log(`[IDDFS] Solved at limit ${limit}, ${totalExpanded} expansions in total`);
      }
      return { actions: result.actions, expanded: totalExpanded, stopReason: 'solved', expansionsByLimit };
    }

    if (result.expanded === lastExpanded) {
      if (debugLevel >= 1) {
        console.log(`[IDDFS] Expansion count repeated at limit ${limit}; state space exhausted`);
      }
      return { actions: null, expanded: totalExpanded, stopReason: 'stagnated', expansionsByLimit };
    }

    lastExpanded = result.expanded;
    totalExpanded += result.expanded;
  }

  if (debugLevel >= 1) {
    console.log(`[IDDFS] Gave up after limit ${maxLimit}`);
  }
  return { actions: null, expanded: totalExpanded, stopReason: 'max-limit', expansionsByLimit };
}
