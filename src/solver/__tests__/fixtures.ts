/**
 * Shared test fixtures: a labelled graph problem and hand-built domino boards.
 */

import { SearchProblem, Successor } from '../../model/types';
import { Domino } from '../../puzzle/domino';
import { Board } from '../../puzzle/types';

export interface GraphSpec {
  /** node -> [neighbour, cost][] in successor order */
  edges: Record<string, Array<[string, number]>>;
  goals: string[];
  h?: Record<string, number>;
}

/**
 * Directed graph whose states are node names and whose actions are
 * "from>to" labels.
 */
export class GraphProblem implements SearchProblem<string, string> {
  successorCalls = 0;

  constructor(private readonly graph: GraphSpec) {}

  successor(state: string): Successor<string, string>[] {
    this.successorCalls++;
    return (this.graph.edges[state] ?? []).map(([to]) => ({ action: `${state}>${to}`, state: to }));
  }

  goalTest(state: string): boolean {
    return this.graph.goals.includes(state);
  }

  keyOf(state: string): string {
    return state;
  }

  heuristic(state: string): number {
    return this.graph.h?.[state] ?? 0;
  }

  stepCost(from: string, _action: string, to: string): number {
    const edge = (this.graph.edges[from] ?? []).find(([target]) => target === to);
    return edge ? edge[1] : 1;
  }
}

// Solved 2x2 arrangement; no other arrangement of these four tiles is solved.
export const A = new Domino(1, 2, 3, 4);
export const B = new Domino(5, 6, 7, 2);
export const C = new Domino(3, 8, 9, 1);
export const D = new Domino(7, 4, 6, 8);

export const SOLVED: Board = [
  [A, B],
  [C, D],
];

/** SOLVED with (0,0) and (1,1) swapped */
export const ONE_SWAP: Board = [
  [D, B],
  [C, A],
];

/** SOLVED with (0,0)<->(0,1) and (1,0)<->(1,1) swapped */
export const TWO_SWAPS: Board = [
  [B, A],
  [D, C],
];

/** Four copies of one tile whose left and right edges differ */
const SAME = new Domino(1, 2, 3, 4);
export const IDENTICAL_UNSOLVABLE: Board = [
  [SAME, SAME],
  [SAME, SAME],
];

/** Four distinct tiles; no right edge equals any left edge */
export const DISTINCT_UNSOLVABLE: Board = [
  [new Domino(1, 2, 3, 4), new Domino(5, 6, 7, 8)],
  [new Domino(9, 10, 11, 12), new Domino(13, 14, 15, 16)],
];
