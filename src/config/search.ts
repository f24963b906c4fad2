/**
 * Search Configuration
 * Defaults and option schemas for the search drivers
 */

import { z } from 'zod';
import { SearchInputError } from '../model/errors';
import { DeepeningConfig } from '../model/types';

// ════════════════════════════════════════════════════════════════════════════
// Iterative Deepening
// ════════════════════════════════════════════════════════════════════════════

/**
 * Iterative deepening stops after depth limit 3 or once 50 000 states have
 * been expanded across every limit, whichever comes first.
 */
export const DEFAULT_DEEPENING_CONFIG: DeepeningConfig = {
  maxLimit: 3,
  maxTotalExpansions: 50000,
  debugLevel: 0,
};

const DebugLevelSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const DeepeningConfigSchema = z.object({
  maxLimit: z.number().int().min(0),
  maxTotalExpansions: z.number().int().positive(),
  debugLevel: DebugLevelSchema,
});

export const LimitSchema = z.number().int().min(0);

/** Optional per-call expansion cap; Infinity means unbounded */
export const ExpansionCapSchema = z.union([
  z.number().int().positive(),
  z.literal(Infinity),
]);

// ════════════════════════════════════════════════════════════════════════════
// Experiments
// ════════════════════════════════════════════════════════════════════════════

export type SearchStrategy = 'astar' | 'iddfs';

export interface ExperimentOptions {
  /** Board sizes to run (2..4) */
  sizes: number[];
  strategies: SearchStrategy[];
  /** Random instances per (size, strategy) */
  trials: number;
  /** Seed of the first trial; trial k uses seed + k */
  seed: number;
  deepening: DeepeningConfig;
  /** Expansion cap for each A* run */
  astarMaxExpansions: number;
}

export const DEFAULT_EXPERIMENT_OPTIONS: ExperimentOptions = {
  sizes: [2, 3, 4],
  strategies: ['astar', 'iddfs'],
  trials: 10,
  seed: 1,
  deepening: DEFAULT_DEEPENING_CONFIG,
  astarMaxExpansions: 50000,
};

export const ExperimentOptionsSchema = z.object({
  sizes: z.array(z.number().int().min(2).max(4)).min(1),
  strategies: z.array(z.enum(['astar', 'iddfs'])).min(1),
  trials: z.number().int().positive(),
  seed: z.number().int(),
  deepening: DeepeningConfigSchema,
  astarMaxExpansions: z.number().int().positive(),
});

// ════════════════════════════════════════════════════════════════════════════
// Resolution
// ════════════════════════════════════════════════════════════════════════════

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || 'value'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse `value` with `schema`, raising a SearchInputError naming `argument`
 * on failure.
 */
export function parseArgument<T>(schema: z.ZodType<T>, value: unknown, argument: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new SearchInputError(argument, describeIssues(result.error));
  }
  return result.data;
}

/**
 * Merge a partial iterative deepening configuration over the defaults and
 * validate the result.
 */
export function resolveDeepeningConfig(partial: Partial<DeepeningConfig> = {}): DeepeningConfig {
  const merged = {
    maxLimit: partial.maxLimit ?? DEFAULT_DEEPENING_CONFIG.maxLimit,
    maxTotalExpansions: partial.maxTotalExpansions ?? DEFAULT_DEEPENING_CONFIG.maxTotalExpansions,
    debugLevel: partial.debugLevel ?? DEFAULT_DEEPENING_CONFIG.debugLevel,
  };
  return parseArgument(DeepeningConfigSchema, merged, 'iterative deepening config');
}

export function resolveExperimentOptions(partial: Partial<ExperimentOptions> = {}): ExperimentOptions {
  const merged = { ...DEFAULT_EXPERIMENT_OPTIONS, ...partial };
  return parseArgument(ExperimentOptionsSchema, merged, 'experiment options');
}
