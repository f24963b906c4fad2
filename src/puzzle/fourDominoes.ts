/**
 * Four-sided domino puzzle as a SearchProblem
 *
 * An N×N grid of tiles is solved when every pair of neighbouring tiles shows
 * the same value on the edges that touch. A move swaps any two tiles.
 */

import { SearchInputError } from '../model/errors';
import { HeuristicFn, SearchProblem, Successor } from '../model/types';
import { createMismatchHeuristic } from '../solver/heuristics';
import { Domino } from './domino';
import { Board, Cell, MAX_SIZE, MIN_SIZE, SwapAction, cellKey } from './types';

export function flattenBoard(board: Board): Domino[] {
  return board.flatMap(row => [...row]);
}

export function boardKey(board: Board): string {
  return board.map(row => row.map(tile => tile.key()).join(',')).join('|');
}

/**
 * Number of neighbouring tile pairs whose touching edges differ.
 */
export function countViolatedSeams(board: Board): number {
  let violations = 0;
  for (let row = 0; row < board.length; row++) {
    for (let col = 0; col < board[row].length; col++) {
      const tile = board[row][col];
      if (row > 0 && !tile.isUnder(board[row - 1][col])) violations++;
      if (col > 0 && !tile.isOnTheRightOf(board[row][col - 1])) violations++;
    }
  }
  return violations;
}

export function isSolved(board: Board): boolean {
  return countViolatedSeams(board) === 0;
}

function checkCell(size: number, cell: Cell, name: string): void {
  for (const coord of [cell.row, cell.col]) {
    if (!Number.isInteger(coord) || coord < 0 || coord >= size) {
      throw new SearchInputError(name, `(${cell.row},${cell.col}) is outside a ${size}x${size} board`);
    }
  }
}

/**
 * Return a new board with the two cells of `action` swapped.
 * The input board is left untouched.
 */
export function applySwap(board: Board, action: SwapAction): Board {
  const size = board.length;
  checkCell(size, action.cell1, 'swap cell1');
  checkCell(size, action.cell2, 'swap cell2');
  if (cellKey(action.cell1) === cellKey(action.cell2)) {
    throw new SearchInputError('swap', `cells must differ, both are (${cellKey(action.cell1)})`);
  }
  const next = board.map(row => [...row]);
  const { cell1, cell2 } = action;
  next[cell1.row][cell1.col] = board[cell2.row][cell2.col];
  next[cell2.row][cell2.col] = board[cell1.row][cell1.col];
  return next;
}

/**
 * Check that `board` is a square grid of an allowed size.
 */
export function assertBoard(board: Board, name = 'board'): number {
  const size = board.length;
  if (size < MIN_SIZE || size > MAX_SIZE) {
    throw new SearchInputError(name, `size must be between ${MIN_SIZE} and ${MAX_SIZE}, got ${size}`);
  }
  board.forEach((row, r) => {
    if (row.length !== size) {
      throw new SearchInputError(name, `row ${r} has ${row.length} tiles, expected ${size}`);
    }
    row.forEach((tile, c) => {
      if (!(tile instanceof Domino)) {
        throw new SearchInputError(name, `cell (${r},${c}) is not a domino`);
      }
    });
  });
  return size;
}

export interface FourDominoesOptions {
  /**
   * Solved arrangement to measure mismatches against. Without it the
   * heuristic counts violated seams instead.
   */
  goal?: Board;
}

export class FourDominoes implements SearchProblem<Board, SwapAction> {
  readonly size: number;
  readonly goal?: Board;
  private readonly estimate: HeuristicFn<Board>;

  constructor(size: number, options: FourDominoesOptions = {}) {
    if (!Number.isInteger(size) || size < MIN_SIZE || size > MAX_SIZE) {
      throw new SearchInputError('size', `must be an integer between ${MIN_SIZE} and ${MAX_SIZE}, got ${size}`);
    }
    this.size = size;
    if (options.goal) {
      if (assertBoard(options.goal, 'goal') !== size) {
        throw new SearchInputError('goal', `expected a ${size}x${size} board`);
      }
      this.goal = options.goal;
      this.estimate = createMismatchHeuristic(options.goal, flattenBoard, tile => tile.key());
    } else {
      this.estimate = countViolatedSeams;
    }
  }

  /**
   * Every pair of positions (i < j, row-major) yields one swap.
   */
  successor(board: Board): Successor<Board, SwapAction>[] {
    this.checkState(board);
    const successors: Successor<Board, SwapAction>[] = [];
    const cells = this.size * this.size;
    for (let i = 0; i < cells; i++) {
      const cell1: Cell = { row: Math.floor(i / this.size), col: i % this.size };
      for (let j = i + 1; j < cells; j++) {
        const cell2: Cell = { row: Math.floor(j / this.size), col: j % this.size };
        const action: SwapAction = { cell1, cell2 };
        successors.push({ action, state: applySwap(board, action) });
      }
    }
    return successors;
  }

  goalTest(board: Board): boolean {
    this.checkState(board);
    return isSolved(board);
  }

  heuristic(board: Board): number {
    return this.estimate(board);
  }

  keyOf(board: Board): string {
    return boardKey(board);
  }

  private checkState(board: Board): void {
    const size = assertBoard(board, 'state');
    if (size !== this.size) {
      throw new SearchInputError('state', `expected a ${this.size}x${this.size} board, got ${size}x${size}`);
    }
  }
}
