/**
 * Check that an evidence cache lines up with its dataset, index by index.
 * Exits 2 when any check fails.
 *
 * Usage:
 *   npm run verify:alignment -- --dataset data/MedQA/test.jsonl --evidence data/evidence.json --check-question-text
 */

import { verifyEvidenceAlignment } from '../src/audit.js';
import { loadDataset } from '../src/datasets.js';
import { loadEvidenceJson } from '../src/evidence.js';
import { getFloatArg, getIntArg, hasFlag, requireArg } from './cli-args.js';

async function main() {
  const datasetPath = requireArg('--dataset');
  const evidencePath = requireArg('--evidence');
  const summary = verifyEvidenceAlignment(await loadDataset(datasetPath), await loadEvidenceJson(evidencePath), {
    limit: getIntArg('--limit', -1),
    requireNonemptyEvidence: hasFlag('--require-nonempty-evidence'),
    checkQuestionText: hasFlag('--check-question-text'),
    minQuestionRatio: getFloatArg('--min-question-ratio', 0.92),
    reportTop: getIntArg('--report-top', 10),
  });

  console.log(JSON.stringify({ dataset: datasetPath, evidence: evidencePath, ...summary }, null, 2));
  if (!summary.ok) process.exitCode = 2;
}

main().catch((error) => {
  console.error('[Align] Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
