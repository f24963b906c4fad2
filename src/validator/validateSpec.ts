/**
 * Validate puzzle instances
 */

import { ValidationResult } from '../model/types';
import { Domino } from '../puzzle/domino';
import { flattenBoard, isSolved } from '../puzzle/fourDominoes';
import { Board, MAX_SIZE, MIN_SIZE, PuzzleInstance } from '../puzzle/types';

function checkBoardShape(board: Board, size: number, field: string, errors: string[]): boolean {
  if (board.length !== size) {
    errors.push(`${field} must have ${size} rows, has ${board.length}`);
    return false;
  }
  let ok = true;
  for (let r = 0; r < board.length; r++) {
    if (board[r].length !== size) {
      errors.push(`${field}[${r}] must have ${size} tiles, has ${board[r].length}`);
      ok = false;
    }
  }
  return ok;
}

function tileCounts(board: Board): Map<string, number> {
  const counts = new Map<string, number>();
  for (const tile of flattenBoard(board)) {
    counts.set(tile.key(), (counts.get(tile.key()) || 0) + 1);
  }
  return counts;
}

function sameTiles(a: Board, b: Board): boolean {
  const countsA = tileCounts(a);
  const countsB = tileCounts(b);
  if (countsA.size !== countsB.size) return false;
  for (const [key, count] of countsA) {
    if (countsB.get(key) !== count) return false;
  }
  return true;
}

/**
 * Validate a puzzle instance for consistency
 */
export function validateInstance(instance: PuzzleInstance): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(instance.size) || instance.size < MIN_SIZE || instance.size > MAX_SIZE) {
    errors.push(`size must be an integer between ${MIN_SIZE} and ${MAX_SIZE}, got ${instance.size}`);
    return { valid: false, errors, warnings };
  }

  const startOk = checkBoardShape(instance.start, instance.size, 'start', errors);
  const goalOk = instance.goal
    ? checkBoardShape(instance.goal, instance.size, 'goal', errors)
    : true;

  for (const [field, board] of [['start', instance.start], ['goal', instance.goal]] as const) {
    board?.forEach((row, r) =>
      row.forEach((tile, c) => {
        if (!(tile instanceof Domino)) {
          errors.push(`${field} cell (${r},${c}) is not a domino`);
        }
      })
    );
  }

  if (errors.length === 0 && startOk && goalOk) {
    if (isSolved(instance.start)) {
      warnings.push('start board is already solved');
    }
    if (instance.goal) {
      if (!sameTiles(instance.start, instance.goal)) {
        warnings.push('goal is not a rearrangement of the start tiles');
      }
      if (!isSolved(instance.goal)) {
        warnings.push('goal board does not satisfy every seam');
      }
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}
