/**
 * Experiment driver
 * Runs both search strategies over seeded random instances and aggregates
 * expansion counts, outcomes and timings per (size, strategy).
 */

import { performance } from 'perf_hooks';
import { ExperimentOptions, SearchStrategy, resolveExperimentOptions } from '../config/search';
import { FourDominoes } from '../puzzle/fourDominoes';
import { generateInstance } from '../puzzle/generator';
import { aStarSearch } from '../solver/astar';
import { iterativeDeepeningSearch } from '../solver/iterativeDeepening';

export interface TrialResult {
  solved: boolean;
  expanded: number;
  hitBudget: boolean;
  timeMs: number;
}

export interface ExperimentRow {
  size: number;
  strategy: SearchStrategy;
  trials: number;
  avgExpanded: number;
  solved: number;
  failed: number;
  /** Failures that stopped on the expansion budget */
  reachedBudget: number;
  avgTimeMs: number;
}

export function runTrial(
  size: number,
  seed: number,
  strategy: SearchStrategy,
  options: ExperimentOptions
): TrialResult {
  const instance = generateInstance(size, seed);
  const problem = new FourDominoes(size, { goal: instance.goal });
  const begin = performance.now();

  if (strategy === 'astar') {
    const result = aStarSearch(problem, instance.start, {
      maxExpansions: options.astarMaxExpansions,
    });
    return {
      solved: result.actions !== null,
      expanded: result.expanded,
      hitBudget: result.actions === null && result.expanded >= options.astarMaxExpansions,
      timeMs: performance.now() - begin,
    };
  }

  const result = iterativeDeepeningSearch(problem, instance.start, options.deepening);
  return {
    solved: result.actions !== null,
    expanded: result.expanded,
    hitBudget: result.stopReason === 'max-expansions',
    timeMs: performance.now() - begin,
  };
}

export function summarize(size: number, strategy: SearchStrategy, trials: TrialResult[]): ExperimentRow {
  const n = trials.length;
  const solved = trials.filter(t => t.solved).length;
  const sum = (pick: (t: TrialResult) => number) => trials.reduce((acc, t) => acc + pick(t), 0);
  return {
    size,
    strategy,
    trials: n,
    avgExpanded: n ? sum(t => t.expanded) / n : 0,
    solved,
    failed: n - solved,
    reachedBudget: trials.filter(t => !t.solved && t.hitBudget).length,
    avgTimeMs: n ? sum(t => t.timeMs) / n : 0,
  };
}

export function runExperiments(partial: Partial<ExperimentOptions> = {}): ExperimentRow[] {
  const options = resolveExperimentOptions(partial);
  const rows: ExperimentRow[] = [];
  for (const size of options.sizes) {
    for (const strategy of options.strategies) {
      const trials: TrialResult[] = [];
      for (let k = 0; k < options.trials; k++) {
        trials.push(runTrial(size, options.seed + k, strategy, options));
      }
      rows.push(summarize(size, strategy, trials));
    }
  }
  return rows;
}

// ---------- Report formatting ----------

const STRATEGY_LABEL: Record<SearchStrategy, string> = {
  astar: 'A*',
  iddfs: 'Iterative deepening',
};

export function formatReportTable(rows: ExperimentRow[]): string {
  const lines = [
    '| Puzzle size | Strategy | Avg expanded | Solved | Failed | Hit budget | Avg time (ms) |',
    '|---|---|---|---|---|---|---|',
  ];
  for (const row of rows) {
    lines.push(
      `| ${row.size}x${row.size} | ${STRATEGY_LABEL[row.strategy]} | ${Math.round(row.avgExpanded)} | ` +
        `${row.solved} | ${row.failed} | ${row.reachedBudget} | ${row.avgTimeMs.toFixed(2)} |`
    );
  }
  return lines.join('\n');
}

export function toCsv(rows: ExperimentRow[]): string {
  const header = 'size,strategy,trials,avgExpanded,solved,failed,reachedBudget,avgTimeMs';
  const body = rows.map(r =>
    [r.size, r.strategy, r.trials, r.avgExpanded.toFixed(2), r.solved, r.failed, r.reachedBudget, r.avgTimeMs.toFixed(3)].join(',')
  );
  return [header, ...body].join('\n') + '\n';
}
