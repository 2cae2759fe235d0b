/**
 * Batch runner: deliberates over a slice of a dataset and appends one JSONL
 * line per question, in question order.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { CallLogEntry, GenerationService, GenerationServiceOptions, UsageSummary } from './clients/llm.js';
import { DEFAULT_EVIDENCE_CONFIG } from './config.js';
import { DeliberationController } from './controller.js';
import { DatasetName, loadDataset, toQuestion } from './datasets.js';
import { formatEvidenceContext, getEvidenceRecord, loadEvidenceJson } from './evidence.js';
import { mapInOrder } from './pool.js';
import { BatchLine, EvidenceAnnotations, OrderedJsonlWriter, serializeBatchLine } from './storage/results-store.js';
import { EvidenceFormatConfig, EvidenceRecord, Question } from './types/index.js';

export interface BatchOptions {
  datasetPath: string;
  datasetName: DatasetName;
  /** Run label for the output file name; need not match the provider model id */
  modelName: string;
  runTag?: string;
  startPos?: number;
  /** Exclusive; -1 runs to the end of the dataset */
  endPos?: number;
  outputDir: string;
  maxAttemptVote?: number;
  domainConcurrency?: number;
  questionConcurrency?: number;
  /** Write stub records without any generation calls */
  dryRun?: boolean;
  evidencePath?: string;
  evidenceConfig?: EvidenceFormatConfig;
  /** Store the candidate and injected evidence blocks in each record */
  logEvidence?: boolean;
  /** Append every call's prompt and output to a .log file beside the results */
  logCalls?: boolean;
  onProgress?: (completed: number, total: number) => void;
  /** Run timestamp for the file name (default: now) */
  now?: Date;
}

/** Builds the generation service, given the hooks the batch wants installed. */
export type ServiceFactory = (options: GenerationServiceOptions) => GenerationService;

export interface BatchResult {
  outputPath: string;
  logPath?: string;
  total: number;
  failed: number;
  usage?: UsageSummary;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS */
export function runTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function sanitizeRunTag(tag: string): string {
  return tag.trim().replace(/[^A-Za-z0-9_-]/g, '').slice(0, 40);
}

/**
 * `<model>[-<tag>]-s<start>-e<end|all>-<YYYYMMDD_HHMMSS>.jsonl`
 */
export function batchOutputFilename(modelName: string, startPos: number, endPos: number, date: Date, runTag = ''): string {
  const tag = sanitizeRunTag(runTag);
  const tagPart = tag ? `-${tag}` : '';
  const endLabel = endPos === -1 ? 'all' : String(endPos);
  return `${modelName}${tagPart}-s${startPos}-e${endLabel}-${runTimestamp(date)}.jsonl`;
}

interface EvidenceSetup {
  cache: EvidenceRecord[];
  config: EvidenceFormatConfig;
  path: string;
}

function annotate(setup: EvidenceSetup, candidate: string, logEvidence: boolean): EvidenceAnnotations {
  return {
    evidenceEnabled: true,
    evidenceInjected: candidate.length > 0,
    ...(logEvidence
      ? {
          evidenceJson: setup.path,
          evidenceParams: setup.config,
          evidenceCandidateContext: candidate,
          evidenceUsedContext: candidate,
        }
      : {}),
  };
}

export async function runBatch(options: BatchOptions, createService?: ServiceFactory): Promise<BatchResult> {
  const startPos = options.startPos ?? 0;
  const endPos = options.endPos ?? -1;
  const outputPath = join(
    options.outputDir,
    batchOutputFilename(options.modelName, startPos, endPos, options.now ?? new Date(), options.runTag)
  );
  mkdirSync(options.outputDir, { recursive: true });

  const rows = await loadDataset(options.datasetPath);
  const end = endPos === -1 ? rows.length : Math.min(endPos, rows.length);
  const indices: number[] = [];
  for (let idx = Math.max(0, startPos); idx < end; idx++) indices.push(idx);
  const questions: Question[] = indices.map(idx => toQuestion(rows[idx], options.datasetName));

  console.error(`[Batch] ${options.datasetName} ${startPos} ~ ${end} (${indices.length} questions) → ${outputPath}`);

  const writer = new OrderedJsonlWriter(outputPath);
  let completed = 0;
  const finish = async (position: number, line: BatchLine) => {
    await writer.write(position, serializeBatchLine(line));
    completed++;
    options.onProgress?.(completed, indices.length);
  };

  if (options.dryRun) {
    for (const [position, idx] of indices.entries()) {
      await finish(position, { kind: 'dry_run', idx, question: questions[position] });
    }
    console.error(`[Batch] Dry run wrote ${indices.length} stub records`);
    return { outputPath, total: indices.length, failed: 0 };
  }

  if (!createService) {
    throw new Error('runBatch needs a generation service unless dryRun is set');
  }

  const logPath = options.logCalls ? outputPath.replace(/\.jsonl$/, '.log') : undefined;
  const service = createService({
    onCall: logPath
      ? (entry: CallLogEntry) => appendFileSync(logPath, `${JSON.stringify({ time: new Date().toISOString(), ...entry })}\n`, 'utf-8')
      : undefined,
  });
  if (logPath) console.error(`[Batch] Call log: ${logPath}`);

  let evidence: EvidenceSetup | undefined;
  if (options.evidencePath) {
    evidence = {
      cache: await loadEvidenceJson(options.evidencePath),
      config: options.evidenceConfig ?? DEFAULT_EVIDENCE_CONFIG,
      path: options.evidencePath,
    };
    console.error(`[Batch] Evidence cache: ${evidence.cache.length} records from ${evidence.path}`);
  }

  const controller = new DeliberationController(service, {
    maxAttemptVote: options.maxAttemptVote,
    domainConcurrency: options.domainConcurrency,
  });

  let failed = 0;
  await mapInOrder(indices, options.questionConcurrency ?? 1, async (idx, position) => {
    const question = questions[position];
    const candidate = evidence
      ? formatEvidenceContext(getEvidenceRecord(evidence.cache, idx), evidence.config)
      : '';
    const annotations = evidence ? annotate(evidence, candidate, options.logEvidence ?? false) : undefined;

    let line: BatchLine;
    try {
      const record = await controller.answer(question, { evidenceContext: candidate, meta: { idx } });
      line = { kind: 'result', idx, record, evidence: annotations };
    } catch (error) {
      failed++;
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Batch] Question ${idx} failed: ${message}`);
      line = { kind: 'failed', idx, question, error: message, evidence: annotations };
    }
    await finish(position, line);
  });

  const usage = service.summary?.();
  if (usage) {
    console.error(
      `[Batch] Run summary: calls=${usage.calls} tokens(prompt=${usage.promptTokens},completion=${usage.completionTokens},total=${usage.totalTokens}) ` +
      `wall_s=${usage.wallSeconds.toFixed(2)}`
    );
  }
  console.error(`[Batch] Done: ${indices.length} written, ${failed} failed → ${outputPath}`);

  return { outputPath, logPath, total: indices.length, failed, usage };
}
