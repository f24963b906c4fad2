/**
 * Depth-limited depth-first search with an explicit stack
 *
 * Cycle detection is path-local: a popped state is discarded when it sits on
 * the current path. Accepting an entry first trims the path (and the visited
 * set with it) back to that entry's depth, so a state left behind on an
 * abandoned branch can be expanded again through another one.
 */

import { ExpansionCapSchema, LimitSchema, parseArgument } from '../config/search';
import { DepthLimitedOptions, DepthLimitedResult, SearchProblem, StackEntry } from '../model/types';

export function depthLimitedSearch<S, A>(
  problem: SearchProblem<S, A>,
  start: S,
  limit: number,
  options: DepthLimitedOptions<S> = {}
): DepthLimitedResult<A> {
  parseArgument(LimitSchema, limit, 'limit');
  const maxExpansions = parseArgument(
    ExpansionCapSchema,
    options.maxExpansions ?? Infinity,
    'maxExpansions'
  );
  const debugLevel = options.debugLevel ?? 0;

  let expanded = 0;
  // pathKeys[0] is the root; pathActions[k] leads from pathKeys[k] to pathKeys[k + 1]
  const pathKeys: string[] = [];
  const pathActions: A[] = [];
  const onPath = new Set<string>();

  const stack: StackEntry<S, A>[] = [{ state: start, depth: 0, via: null }];
  let entry = stack.pop();
  while (entry !== undefined) {
    const { state, depth, via } = entry;
    if (depth > limit) {
      entry = stack.pop();
      continue;
    }

    const key = problem.keyOf(state);
    if (onPath.has(key)) {
      entry = stack.pop();
      continue;
    }

    // Backtrack: only the ancestors of this entry stay on the path
    while (pathKeys.length > depth) {
      const abandoned = pathKeys.pop();
      if (abandoned !== undefined) {
        onPath.delete(abandoned);
      }
      if (pathKeys.length > 0) {
        pathActions.pop();
      }
    }

    if (expanded >= maxExpansions) {
      if (debugLevel >= 1) {
        console.log(`[DLS] Expansion cap ${maxExpansions} reached at limit ${limit}`);
      }
      return { actions: null, expanded, truncated: true };
    }

    expanded++;
    onPath.add(key);
    pathKeys.push(key);
    if (via !== null) {
      pathActions.push(via.action);
    }
    options.onExpand?.(state, depth);

    if (debugLevel >= 2) {
      console.log(`[DLS] Expanding depth=${depth} stack=${stack.length}`);
    }

    if (problem.goalTest(state)) {
      if (debugLevel >= 1) {
        console.log(`[DLS] Goal found at depth ${depth} after ${expanded} expansions`);
      }
      return { actions: [...pathActions], expanded, truncated: false };
    }

    for (const { action, state: child } of problem.successor(state)) {
      stack.push({ state: child, depth: depth + 1, via: { action } });
    }

    entry = stack.pop();
  }

  if (debugLevel >= 1) {
    console.log(`[DLS] Stack exhausted at limit ${limit} after ${expanded} expansions`);
  }
  return { actions: null, expanded, truncated: false };
}
