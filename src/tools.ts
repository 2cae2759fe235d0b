/**
 * MCP tool handlers. Each takes validated tool arguments and returns a plain
 * JSON-able payload; index.ts wraps them into MCP text content.
 */

import { auditEvidenceLeakage, AuditReport } from './audit.js';
import { ServiceFactory } from './batch.js';
import { GenerationService } from './clients/llm.js';
import { AppConfig } from './config.js';
import { DeliberationController } from './controller.js';
import { DatasetName, loadDataset, normalizeQuestionText } from './datasets.js';
import { evaluateResults, EvaluationSummary } from './evaluation.js';
import { formatEvidenceContext, loadEvidenceJson } from './evidence.js';
import { startBatchJob } from './job-orchestrator.js';
import { BatchJob, findJob, generateJobId, jobs, saveJob } from './jobs.js';
import { loadResults, serializeResultRecord } from './storage/results-store.js';
import { EvidenceFilterMode, EvidenceFormatConfig } from './types/index.js';

export interface EvidenceArgs {
  evidence_topk?: number;
  evidence_max_chars?: number;
  evidence_min_snip_chars?: number;
  evidence_filter_mode?: EvidenceFilterMode;
}

export function evidenceConfigFrom(config: AppConfig, args: EvidenceArgs): EvidenceFormatConfig {
  return {
    topk: args.evidence_topk ?? config.evidence.topk,
    maxChars: args.evidence_max_chars ?? config.evidence.maxChars,
    minSnipChars: args.evidence_min_snip_chars ?? config.evidence.minSnipChars,
    filterMode: args.evidence_filter_mode ?? config.evidence.filterMode,
  };
}

export interface AnswerQuestionArgs extends EvidenceArgs {
  question: string;
  options?: Record<string, string>;
  gold_answer?: string;
  evidence?: string[];
  max_attempt_vote?: number;
}

export async function answerQuestion(
  args: AnswerQuestionArgs,
  config: AppConfig,
  service: GenerationService
): Promise<Record<string, unknown>> {
  const evidenceContext = args.evidence
    ? formatEvidenceContext({ evidence: args.evidence }, evidenceConfigFrom(config, args))
    : '';

  const controller = new DeliberationController(service, {
    maxAttemptVote: args.max_attempt_vote ?? config.maxAttemptVote,
    domainConcurrency: config.domainConcurrency,
  });
  const record = await controller.answer(
    {
      text: normalizeQuestionText(args.question),
      options: args.options ?? {},
      goldAnswer: args.gold_answer ?? '',
    },
    { evidenceContext }
  );

  return {
    ...serializeResultRecord(record),
    evidence_injected: evidenceContext.length > 0,
  };
}

export interface FormatEvidenceArgs extends EvidenceArgs {
  snippets: string[];
}

export function formatEvidence(args: FormatEvidenceArgs, config: AppConfig): { context: string; injected: boolean } {
  const context = formatEvidenceContext({ evidence: args.snippets }, evidenceConfigFrom(config, args));
  return { context, injected: context.length > 0 };
}

export interface StartBatchArgs extends EvidenceArgs {
  dataset_path: string;
  dataset_name: DatasetName;
  model_name?: string;
  run_tag?: string;
  start_pos?: number;
  end_pos?: number;
  output_dir?: string;
  dry_run?: boolean;
  evidence_json?: string;
  log_evidence?: boolean;
  log_calls?: boolean;
}

export async function startBatchRun(
  args: StartBatchArgs,
  config: AppConfig,
  createService: ServiceFactory | undefined,
  jobsDir?: string
): Promise<Record<string, unknown>> {
  const job: BatchJob = {
    id: generateJobId(),
    status: 'pending',
    datasetPath: args.dataset_path,
    createdAt: Date.now(),
  };
  jobs.set(job.id, job);
  await saveJob(job, jobsDir);
  console.error(`[Jobs] Created job ${job.id} for ${args.dataset_path}`);

  const { jobId, estimatedSeconds } = await startBatchJob(
    job,
    {
      datasetPath: args.dataset_path,
      datasetName: args.dataset_name,
      modelName: args.model_name ?? config.llm?.model ?? 'model',
      runTag: args.run_tag,
      startPos: args.start_pos,
      endPos: args.end_pos,
      outputDir: args.output_dir ?? config.resultsDir,
      maxAttemptVote: config.maxAttemptVote,
      domainConcurrency: config.domainConcurrency,
      questionConcurrency: config.questionConcurrency,
      dryRun: args.dry_run,
      evidencePath: args.evidence_json,
      evidenceConfig: evidenceConfigFrom(config, args),
      logEvidence: args.log_evidence,
      logCalls: args.log_calls,
    },
    createService,
    jobsDir
  );

  return {
    job_id: jobId,
    status: 'running',
    message: `Batch job started. Wait about ${estimatedSeconds} seconds before calling check_batch_status.`,
    estimated_duration_seconds: estimatedSeconds,
  };
}

export async function checkBatchStatus(jobId: string, jobsDir?: string): Promise<Record<string, unknown> | null> {
  const job = await findJob(jobId, jobsDir);
  if (!job) return null;

  const response: Record<string, unknown> = {
    job_id: job.id,
    status: job.status,
    dataset_path: job.datasetPath,
    created_at: new Date(job.createdAt).toISOString(),
  };
  if (job.progress) response.progress = job.progress;
  if (job.completedAt) {
    response.completed_at = new Date(job.completedAt).toISOString();
    response.duration_seconds = Math.round((job.completedAt - job.createdAt) / 1000);
  }
  if (job.outputPath) response.output_path = job.outputPath;
  if (job.logPath) response.log_path = job.logPath;
  if (job.failedQuestions !== undefined) response.failed_questions = job.failedQuestions;
  if (job.error) response.error = job.error;
  return response;
}

export async function evaluateResultsFile(resultsPath: string): Promise<EvaluationSummary> {
  return evaluateResults(await loadResults(resultsPath));
}

export interface AuditArgs {
  dataset_path: string;
  evidence_json: string;
  topk?: number;
  results_path?: string;
  max_examples?: number;
}

/**
 * Indices named by a results file's `idx` fields; an error when there are none.
 */
export async function indicesFromResults(resultsPath: string): Promise<number[]> {
  const indices = (await loadResults(resultsPath))
    .map(line => line.idx)
    .filter((idx): idx is number => idx !== undefined);
  if (indices.length === 0) {
    throw new Error(`No integer 'idx' found in ${resultsPath}`);
  }
  return indices;
}

export async function auditEvidence(args: AuditArgs): Promise<AuditReport> {
  const dataset = await loadDataset(args.dataset_path);
  const evidence = await loadEvidenceJson(args.evidence_json);
  const indices = args.results_path ? await indicesFromResults(args.results_path) : undefined;
  return auditEvidenceLeakage(dataset, evidence, {
    topk: args.topk,
    indices,
    maxExamples: args.max_examples,
  });
}
