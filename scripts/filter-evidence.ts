/**
 * Write a leakage-filtered copy of an evidence cache.
 *
 * Usage:
 *   npm run filter:evidence -- --dataset data/MedQA/test.jsonl --evidence data/evidence.json --out data/evidence.filtered.json
 *   npm run filter:evidence -- ... --mode strict --topk 5 --overwrite
 */

import { existsSync } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { filterEvidenceLeakage } from '../src/audit.js';
import { loadDataset } from '../src/datasets.js';
import { loadEvidenceJson } from '../src/evidence.js';
import { getChoiceArg, getIntArg, hasFlag, requireArg } from './cli-args.js';

async function main() {
  const outPath = requireArg('--out');
  if (existsSync(outPath) && !hasFlag('--overwrite')) {
    throw new Error(`Refusing to overwrite existing ${outPath}. Pass --overwrite.`);
  }

  const dataset = await loadDataset(requireArg('--dataset'));
  const evidence = await loadEvidenceJson(requireArg('--evidence'));
  const disableFilter = hasFlag('--disable-filter');
  const mode = getChoiceArg('--mode', ['artifact_only', 'strict'] as const, 'artifact_only');

  const result = filterEvidenceLeakage(dataset, evidence, {
    mode,
    minSnipChars: getIntArg('--min-snip-chars', 80),
    topk: getIntArg('--topk', -1),
    disableFilter,
  });
  result.warnings.forEach(w => console.log(`[warn] ${w}`));

  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, JSON.stringify(result.evidence, null, 2), 'utf-8');

  console.log(`[done] wrote ${outPath}`);
  console.log(`[mode] filter=${disableFilter ? 'disabled' : mode}`);
  console.log(`[stats] kept_snips=${result.kept} dropped_snips=${result.dropped}`);
  const reasons = Object.entries(result.reasons);
  if (reasons.length > 0) {
    console.log('[drop_reasons]');
    reasons.forEach(([reason, count]) => console.log(`  - ${reason}: ${count}`));
  }
}

main().catch((error) => {
  console.error('[Filter] Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
