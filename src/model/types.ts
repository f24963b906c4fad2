/**
 * Core type definitions for the tile search engines
 */

// ===== Problem Contract =====

/**
 * One transition produced by a problem's successor function.
 */
export interface Successor<S, A> {
  action: A;
  state: S;
}

/**
 * Contract every searchable problem implements.
 *
 * States and actions are opaque to the engines. Visited-set membership is
 * decided by `keyOf`, so two states with identical content must map to the
 * same key.
 */
export interface SearchProblem<S, A> {
  /** Every state reachable from `state` with a single action. Must not mutate `state`. */
  successor(state: S): ReadonlyArray<Successor<S, A>>;
  goalTest(state: S): boolean;
  /** Structural key used for duplicate and cycle detection */
  keyOf(state: S): string;
  /** Estimated cost remaining to a goal. Only A* consults it. */
  heuristic?(state: S): number;
  /** Cost of a single transition. Defaults to 1. */
  stepCost?(from: S, action: A, to: S): number;
}

export type HeuristicFn<S> = (state: S) => number;

export type DebugLevel = 0 | 1 | 2; // 0=off, 1=basic, 2=verbose

// ===== Engine Records =====

/**
 * A node of the search tree. `parent` is the index of the parent node in the
 * engine's node list, or null for the root.
 */
export interface SearchNode<S, A> {
  state: S;
  parent: number | null;
  action: A | null;
  pathCost: number;
  index: number;
}

/**
 * A* frontier entry. Entries are never modified once pushed.
 */
export interface FrontierEntry<S, A> {
  readonly priority: number;
  readonly pathCost: number;
  readonly state: S;
  readonly parent: number | null;
  readonly action: A | null;
}

/**
 * Depth-limited search stack entry. `via` holds the action that generated
 * the entry and is null only for the root.
 */
export interface StackEntry<S, A> {
  readonly state: S;
  readonly depth: number;
  readonly via: { readonly action: A } | null;
}

// ===== Options =====

export interface AStarOptions<S> {
  /** Overrides `problem.heuristic` */
  heuristic?: HeuristicFn<S>;
  /** Stop after this many expansions and report no solution */
  maxExpansions?: number;
  debugLevel?: DebugLevel;
  /** Called once per accepted expansion */
  onExpand?: (state: S, depth: number) => void;
}

export interface DepthLimitedOptions<S> {
  /** Stop after this many expansions and report the call as truncated */
  maxExpansions?: number;
  debugLevel?: DebugLevel;
  onExpand?: (state: S, depth: number) => void;
}

export interface DeepeningConfig {
  /** Largest depth limit tried */
  maxLimit: number;
  /** Cumulative expansion budget across every limit */
  maxTotalExpansions: number;
  debugLevel: DebugLevel;
}

export interface DeepeningOptions<S> extends Partial<DeepeningConfig> {
  onExpand?: (state: S, depth: number) => void;
}

// ===== Results =====

export interface AStarResult<A> {
  /** null when no goal was reached */
  actions: A[] | null;
  /** Infinity when no goal was reached */
  cost: number;
  expanded: number;
}

export interface DepthLimitedResult<A> {
  actions: A[] | null;
  expanded: number;
  /** True when `maxExpansions` stopped the call before the stack emptied */
  truncated: boolean;
}

export type DeepeningStopReason =
  | 'solved'
  | 'stagnated'
  | 'max-limit'
  | 'max-expansions';

export interface DeepeningResult<A> {
  actions: A[] | null;
  /** Cumulative expansions across every limit tried */
  expanded: number;
  stopReason: DeepeningStopReason;
  /** expansionsByLimit[k] is the count reported by the call with limit k */
  expansionsByLimit: number[];
}

// ===== Validation Types =====

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ===== Explanation Types =====

export interface Explanation {
  type: 'success' | 'unsat' | 'cutoff';
  message: string;
  details: string[];
}
