// experiments/experiment-runner.ts
//
// Offline experiments for the search engines.
// Runs A* and iterative deepening on seeded random domino boards of each size
// and writes a CSV file with average expansions, outcomes and timings.
//
// Run with:
//   npm run experiments
//
// CSV output: experiments/results.csv

import { writeFileSync } from 'fs';
import { formatReportTable, runExperiments, toCsv } from '../src/bench/experiments';

// ---------- Experiment parameters ----------
const OUTPUT_CSV = 'experiments/results.csv';

// how many seeds per configuration
const NUM_TRIALS = 10;

// board sizes to test
const SIZES = [2, 3, 4];

const rows = runExperiments({ sizes: SIZES, trials: NUM_TRIALS, seed: 1 });

console.log(formatReportTable(rows));
writeFileSync(OUTPUT_CSV, toCsv(rows));
console.log(`\nWrote ${rows.length} rows to ${OUTPUT_CSV}`);
