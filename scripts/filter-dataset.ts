/**
 * Keep only dataset rows with a given meta_info (USMLE step2&3 by default).
 *
 * Usage:
 *   npm run filter:dataset -- --in data/MedQA/test.jsonl              (writes test.step2_3.jsonl beside it)
 *   npm run filter:dataset -- --in data/MedQA/test.jsonl --out other.jsonl --meta step1
 *   npm run filter:dataset -- --in data/MedQA/test.jsonl --dry-run    (counts only)
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { filterDatasetByMeta } from '../src/datasets.js';
import { getArgValue, hasFlag, requireArg } from './cli-args.js';

// test.jsonl → test.step2_3.jsonl
function defaultOutputPath(inPath: string): string {
  const name = basename(inPath);
  const stem = name.endsWith('.jsonl') ? name.slice(0, -'.jsonl'.length) : name;
  return join(dirname(inPath), `${stem}.step2_3.jsonl`);
}

async function main() {
  const inPath = requireArg('--in');
  const outPath = getArgValue('--out') ?? defaultOutputPath(inPath);
  const metaValue = getArgValue('--meta') ?? 'step2&3';

  const { kept, total, bad } = filterDatasetByMeta(await readFile(inPath, 'utf-8'), metaValue);

  if (!hasFlag('--dry-run')) {
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, kept.map(row => JSON.stringify(row)).join('\n') + (kept.length > 0 ? '\n' : ''), 'utf-8');
    console.log(`[done] wrote ${outPath}`);
  }
  console.log(`[stats] total=${total} kept=${kept.length} bad_lines=${bad} meta_info=${metaValue}`);
}

main().catch((error) => {
  console.error('[Dataset] Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
