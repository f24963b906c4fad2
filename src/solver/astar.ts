/**
 * Best-first (A*) search over a SearchProblem
 *
 * The frontier is ordered by f = g + h with ties resolved in insertion order.
 * The visited set is global: a state is expanded at most once per run, even
 * when a cheaper edge to it is discovered later. Goals are tested when a node
 * is expanded, not when it is generated.
 */

import { ExpansionCapSchema, parseArgument } from '../config/search';
import {
  AStarOptions,
  AStarResult,
  FrontierEntry,
  SearchNode,
  SearchProblem,
} from '../model/types';
import { PriorityQueue } from './frontier';
import { checkedEstimate, checkedStepCost, resolveHeuristic } from './heuristics';

/**
 * Walk parent indexes from `goal` back to the root and return the actions in
 * execution order.
 */
export function reconstructActions<S, A>(nodes: ReadonlyArray<SearchNode<S, A>>, goal: number): A[] {
  const actions: A[] = [];
  let node = nodes[goal];
  while (node.parent !== null) {
    if (node.action !== null) {
      actions.push(node.action);
    }
    node = nodes[node.parent];
  }
  return actions.reverse();
}

/**
 * Run A* from `start`.
 */
export function aStarSearch<S, A>(
  problem: SearchProblem<S, A>,
  start: S,
  options: AStarOptions<S> = {}
): AStarResult<A> {
  const heuristic = resolveHeuristic(problem, options.heuristic);
  const maxExpansions = parseArgument(
    ExpansionCapSchema,
    options.maxExpansions ?? Infinity,
    'maxExpansions'
  );
  const debugLevel = options.debugLevel ?? 0;

  const nodes: SearchNode<S, A>[] = [];
  const visited = new Set<string>();
  const depths: number[] = [];
  const frontier = new PriorityQueue<FrontierEntry<S, A>>();

  // The root is alone in the frontier, so its seed priority never competes
  frontier.push(Infinity, {
    priority: Infinity,
    pathCost: 0,
    state: start,
    parent: null,
    action: null,
  });

  let entry = frontier.pop();
  while (entry !== undefined) {
    const key = problem.keyOf(entry.state);
    if (visited.has(key)) {
      entry = frontier.pop();
      continue;
    }

    if (nodes.length >= maxExpansions) {
      if (debugLevel >= 1) {
        console.log(`[AStar] Expansion cap ${maxExpansions} reached`);
      }
      return { actions: null, cost: Infinity, expanded: nodes.length };
    }

    const index = nodes.length;
    const depth = entry.parent === null ? 0 : depths[entry.parent] + 1;
    visited.add(key);
    nodes.push({
      state: entry.state,
      parent: entry.parent,
      action: entry.action,
      pathCost: entry.pathCost,
      index,
    });
    depths.push(depth);
    options.onExpand?.(entry.state, depth);

    if (debugLevel >= 2) {
      console.log(`[AStar] Expanding #${index} depth=${depth} g=${entry.pathCost} f=${entry.priority}`);
    }

    if (problem.goalTest(entry.state)) {
      const actions = reconstructActions(nodes, index);
      if (debugLevel >= 1) {
        console.log(`[AStar] Goal found after ${nodes.length} expansions, cost ${entry.pathCost}`);
      }
      return { actions, cost: entry.pathCost, expanded: nodes.length };
    }

    for (const { action, state: child } of problem.successor(entry.state)) {
      const g = entry.pathCost + checkedStepCost(problem, entry.state, action, child);
      const f = g + checkedEstimate(heuristic, child);
      frontier.push(f, { priority: f, pathCost: g, state: child, parent: index, action });
    }

    entry = frontier.pop();
  }

  if (debugLevel >= 1) {
    console.log(`[AStar] Frontier exhausted after ${nodes.length} expansions`);
  }
  return { actions: null, cost: Infinity, expanded: nodes.length };
}
