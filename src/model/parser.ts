/**
 * Parser for YAML/JSON puzzle instances
 *
 * size: 2
 * start:
 *   - [[1, 2, 3, 4], [5, 6, 7, 2]]
 *   - [[3, 8, 1, 9], { top: 7, right: 4, bottom: 6, left: 8 }]
 * goal: ...   # optional, same shape as start
 *
 * Tiles are [top, right, bottom, left] or an object with those keys.
 */

import YAML from 'yaml';
import { z } from 'zod';
import { Domino } from '../puzzle/domino';
import { Board, MAX_SIZE, MIN_SIZE, PuzzleInstance } from '../puzzle/types';

const TileValue = z.number().int();

const TileSchema = z.union([
  z.tuple([TileValue, TileValue, TileValue, TileValue]),
  z.object({ top: TileValue, right: TileValue, bottom: TileValue, left: TileValue }),
]);

const BoardSchema = z.array(z.array(TileSchema).min(1)).min(1);

export const PuzzleFileSchema = z.object({
  name: z.string().optional(),
  size: z.number().int().min(MIN_SIZE).max(MAX_SIZE),
  start: BoardSchema,
  goal: BoardSchema.optional(),
});

export type PuzzleFile = z.infer<typeof PuzzleFileSchema>;
type TileInput = z.infer<typeof TileSchema>;

export interface ParseResult {
  success: boolean;
  instance?: PuzzleInstance;
  error?: string;
}

function toDomino(tile: TileInput): Domino {
  if (Array.isArray(tile)) {
    const [top, right, bottom, left] = tile;
    return new Domino(top, right, bottom, left);
  }
  return new Domino(tile.top, tile.right, tile.bottom, tile.left);
}

function toBoard(rows: TileInput[][]): Board {
  return rows.map(row => row.map(toDomino));
}

function checkShape(rows: TileInput[][], size: number, field: string): string | null {
  if (rows.length !== size) {
    return `"${field}" must have ${size} rows, has ${rows.length}`;
  }
  for (let r = 0; r < rows.length; r++) {
    if (rows[r].length !== size) {
      return `"${field}" row ${r} must have ${size} tiles, has ${rows[r].length}`;
    }
  }
  return null;
}

/**
 * Parse a YAML or JSON string into a PuzzleInstance
 */
export function parsePuzzle(input: string): ParseResult {
  let data: unknown;
  try {
    // Try parsing as JSON first
    try {
      data = JSON.parse(input);
    } catch {
      // If JSON fails, try YAML
      data = YAML.parse(input);
    }
  } catch (error) {
    return {
      success: false,
      error: `Failed to parse puzzle: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (data === null || data === undefined) {
    return { success: false, error: 'Empty puzzle file' };
  }

  const parsed = PuzzleFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      success: false,
      error: `Invalid "${issue.path.join('.') || 'puzzle'}" field: ${issue.message}`,
    };
  }

  const file = parsed.data;
  const startShape = checkShape(file.start, file.size, 'start');
  if (startShape) {
    return { success: false, error: startShape };
  }
  if (file.goal) {
    const goalShape = checkShape(file.goal, file.size, 'goal');
    if (goalShape) {
      return { success: false, error: goalShape };
    }
  }

  return {
    success: true,
    instance: {
      name: file.name,
      size: file.size,
      start: toBoard(file.start),
      goal: file.goal ? toBoard(file.goal) : undefined,
    },
  };
}

/**
 * Serialize an instance to YAML with tiles written as 4-tuples
 */
export function serializePuzzle(instance: PuzzleInstance): string {
  const file: PuzzleFile = {
    ...(instance.name !== undefined ? { name: instance.name } : {}),
    size: instance.size,
    start: instance.start.map(row => row.map(tile => tile.toTuple())),
    ...(instance.goal ? { goal: instance.goal.map(row => row.map(tile => tile.toTuple())) } : {}),
  };
  return YAML.stringify(file);
}
