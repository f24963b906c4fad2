/**
 * Seeded random instance generation
 */

import { SearchInputError } from '../model/errors';
import { Domino } from './domino';
import { Board, MAX_SIZE, MIN_SIZE, PuzzleInstance } from './types';

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

function nextRandom(rng: Generator<number, never, void>): number {
  return rng.next().value;
}

/** Integer in [min, max] */
function randomInt(rng: Generator<number, never, void>, min: number, max: number): number {
  return min + Math.floor(nextRandom(rng) * (max - min + 1));
}

function toBoard(tiles: Domino[], size: number): Board {
  return Array.from({ length: size }, (_, r) => tiles.slice(r * size, (r + 1) * size));
}

/**
 * Build a solved board whose tile values are drawn from 1..9, then shuffle
 * its tiles (Fisher-Yates) into the start board.
 */
export function generateInstance(size: number, seed: number): PuzzleInstance {
  if (!Number.isInteger(size) || size < MIN_SIZE || size > MAX_SIZE) {
    throw new SearchInputError('size', `must be an integer between ${MIN_SIZE} and ${MAX_SIZE}, got ${size}`);
  }
  const rng = rngLCG(seed);

  const solved: Domino[] = [];
  for (let r = 0; r < size; r++) {
    for (let c = 0; c < size; c++) {
      const top = r === 0 ? randomInt(rng, 1, 9) : solved[(r - 1) * size + c].bottom;
      const right = randomInt(rng, 1, 9);
      const bottom = randomInt(rng, 1, 9);
      const left = c === 0 ? randomInt(rng, 1, 9) : solved[r * size + c - 1].right;
      solved.push(new Domino(top, right, bottom, left));
    }
  }

  const shuffled = [...solved];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = randomInt(rng, 0, i);
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }

  return {
    name: `random-${size}x${size}-${seed}`,
    size,
    start: toBoard(shuffled, size),
    goal: toBoard(solved, size),
  };
}
