/**
 * Batch deliberation over a dataset slice.
 *
 * Usage:
 *   npm run run:batch -- --dataset data/MedQA/test.jsonl --dataset-name MedQA --start 0 --end 5
 *   npm run run:batch -- --dataset data/MedQA/test.jsonl --evidence data/evidence.json --log-evidence --run-tag rag
 *   npm run run:batch -- --dataset data/MedQA/test.jsonl --dry-run
 */

import { runBatch } from '../src/batch.js';
import { LLMGenerationService } from '../src/clients/llm.js';
import { loadConfig, requireLLMConfig } from '../src/config.js';
import { DATASET_NAMES } from '../src/datasets.js';
import { getArgValue, getChoiceArg, getIntArg, hasFlag, requireArg } from './cli-args.js';

async function main() {
  const config = loadConfig();
  const dryRun = hasFlag('--dry-run');
  const llm = dryRun ? config.llm : requireLLMConfig(config);
  const maxAttemptVote = getIntArg('--max-attempt-vote', config.maxAttemptVote);
  if (maxAttemptVote < 0) {
    throw new Error(`--max-attempt-vote must be 0 or more, got ${maxAttemptVote}`);
  }

  const result = await runBatch(
    {
      datasetPath: requireArg('--dataset'),
      datasetName: getChoiceArg('--dataset-name', DATASET_NAMES, 'MedQA'),
      modelName: getArgValue('--model-name') ?? llm?.model ?? 'dry-run',
      runTag: getArgValue('--run-tag'),
      startPos: getIntArg('--start', 0),
      endPos: getIntArg('--end', 5),
      outputDir: getArgValue('--output-dir') ?? config.resultsDir,
      maxAttemptVote,
      domainConcurrency: config.domainConcurrency,
      questionConcurrency: config.questionConcurrency,
      dryRun,
      evidencePath: getArgValue('--evidence'),
      evidenceConfig: {
        topk: getIntArg('--evidence-topk', config.evidence.topk),
        maxChars: getIntArg('--evidence-max-chars', config.evidence.maxChars),
        minSnipChars: getIntArg('--evidence-min-snip-chars', config.evidence.minSnipChars),
        filterMode: getChoiceArg('--evidence-filter-mode', ['off', 'artifact_only'] as const, config.evidence.filterMode),
      },
      logEvidence: hasFlag('--log-evidence'),
      logCalls: !hasFlag('--no-call-log'),
      onProgress: (completed, total) => console.error(`[Batch] ${completed}/${total}`),
    },
    dryRun || !llm ? undefined : options => new LLMGenerationService(llm, options)
  );

  if (result.logPath) console.log(`[log] ${result.logPath}`);
  console.log(`[done] wrote ${result.outputPath} (${result.total} records, ${result.failed} failed)`);
}

main().catch((error) => {
  console.error('[Batch] Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
