/**
 * Four-sided domino puzzle types
 */

import type { Domino } from './domino';

export interface Cell {
  row: number;
  col: number;
}

/** Swap the tiles at two cells */
export interface SwapAction {
  cell1: Cell;
  cell2: Cell;
}

/** board[row][col]; always square */
export type Board = ReadonlyArray<ReadonlyArray<Domino>>;

export interface PuzzleInstance {
  name?: string;
  size: number;
  start: Board;
  /** Solved arrangement the start board was shuffled from, when known */
  goal?: Board;
}

export const MIN_SIZE = 2;
export const MAX_SIZE = 4;

export function cellKey(cell: Cell): string {
  return `${cell.row},${cell.col}`;
}

export function actionKey(action: SwapAction): string {
  return `${cellKey(action.cell1)}<->${cellKey(action.cell2)}`;
}
