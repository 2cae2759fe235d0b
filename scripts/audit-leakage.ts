/**
 * Leakage audit of an evidence cache against its dataset.
 *
 * Usage:
 *   npm run audit:leakage -- --dataset data/MedQA/test.jsonl --evidence data/evidence.json
 *   npm run audit:leakage -- --dataset data/MedQA/test.jsonl --evidence data/evidence.json --results out.jsonl
 */

import { auditEvidenceLeakage, formatAuditReport } from '../src/audit.js';
import { loadDataset } from '../src/datasets.js';
import { loadEvidenceJson } from '../src/evidence.js';
import { indicesFromResults } from '../src/tools.js';
import { getArgValue, getIntArg, requireArg } from './cli-args.js';

async function main() {
  const dataset = await loadDataset(requireArg('--dataset'));
  const evidence = await loadEvidenceJson(requireArg('--evidence'));

  const resultsPath = getArgValue('--results');
  const indices = resultsPath ? await indicesFromResults(resultsPath) : undefined;
  if (indices) {
    console.log(`[scope] auditing n=${new Set(indices).size} indices from ${resultsPath}`);
  }

  const report = auditEvidenceLeakage(dataset, evidence, {
    topk: getIntArg('--topk', 5),
    indices,
    maxExamples: getIntArg('--max-examples', 5),
  });
  console.log(formatAuditReport(report));
}

main().catch((error) => {
  console.error('[Audit] Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
