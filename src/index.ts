/**
 * tile-search - state-space search engines
 *
 * Components:
 * - aStarSearch: best-first search with a global visited set
 * - depthLimitedSearch: explicit-stack DFS with path-local cycle detection
 * - iterativeDeepeningSearch: depth-limited search under growing limits
 * - FourDominoes: reference problem (four-sided domino swapping puzzle)
 */

// Core types and errors
export type {
  SearchProblem,
  Successor,
  SearchNode,
  FrontierEntry,
  StackEntry,
  HeuristicFn,
  DebugLevel,
  AStarOptions,
  AStarResult,
  DepthLimitedOptions,
  DepthLimitedResult,
  DeepeningConfig,
  DeepeningOptions,
  DeepeningResult,
  DeepeningStopReason,
  ValidationResult,
  Explanation,
} from './model/types';
export { SearchInputError, ProblemContractError } from './model/errors';

// Search engines
export { aStarSearch, reconstructActions } from './solver/astar';
export { depthLimitedSearch } from './solver/depthLimited';
export { iterativeDeepeningSearch } from './solver/iterativeDeepening';
export { PriorityQueue } from './solver/frontier';
export { createMismatchHeuristic, resolveHeuristic, zeroHeuristic } from './solver/heuristics';
export { explainAStar, explainDeepening } from './solver/explain';

// Configuration
export {
  DEFAULT_DEEPENING_CONFIG,
  DEFAULT_EXPERIMENT_OPTIONS,
  resolveDeepeningConfig,
  resolveExperimentOptions,
  type ExperimentOptions,
  type SearchStrategy,
} from './config/search';

// Reference puzzle
export { Domino, type DominoSide } from './puzzle/domino';
export {
  FourDominoes,
  applySwap,
  boardKey,
  countViolatedSeams,
  flattenBoard,
  isSolved,
  type FourDominoesOptions,
} from './puzzle/fourDominoes';
export { generateInstance, rngLCG } from './puzzle/generator';
export { renderBoard } from './puzzle/render';
export { actionKey, cellKey, type Board, type Cell, type PuzzleInstance, type SwapAction } from './puzzle/types';
export { parsePuzzle, serializePuzzle, type ParseResult } from './model/parser';

// Validation
export { validateInstance } from './validator/validateSpec';
export { validateSolution } from './validator/validateSolution';

// Experiments
export { runExperiments, formatReportTable, toCsv, type ExperimentRow } from './bench/experiments';
