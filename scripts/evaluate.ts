/**
 * Accuracy of a results file.
 *
 * Usage:
 *   npm run eval -- --results ~/medagents-results/gpt-4o-mini-s0-e5-20250101_120000.jsonl
 */

import { evaluateResults, formatEvaluation } from '../src/evaluation.js';
import { loadResults } from '../src/storage/results-store.js';
import { requireArg } from './cli-args.js';

async function main() {
  const lines = await loadResults(requireArg('--results'));
  console.log(formatEvaluation(evaluateResults(lines)));
}

main().catch((error) => {
  console.error('[Eval] Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
