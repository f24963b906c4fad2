/**
 * Box-drawing text rendering of a board. Each tile becomes a 3-line block:
 *
 *   ╲t╱
 *   l╳r
 *   ╱b╲
 */

import { Board } from './types';

export function renderBoard(board: Board): string {
  const n = board.length;
  const lines: string[] = [];
  lines.push('╔' + Array(n).fill('═══').join('╦') + '╗');
  board.forEach((row, r) => {
    lines.push('║' + row.map(tile => `╲${tile.top}╱║`).join(''));
    lines.push('║' + row.map(tile => `${tile.left}╳${tile.right}║`).join(''));
    lines.push('║' + row.map(tile => `╱${tile.bottom}╲║`).join(''));
    if (r < n - 1) {
      lines.push('╠' + Array(n).fill('═══').join('╬') + '╣');
    } else {
      lines.push('╚' + Array(n).fill('═══').join('╩') + '╝');
    }
  });
  return lines.join('\n');
}
