import { appendFile, mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { DatasetError, parseJsonl } from '../datasets.js';
import { EvidenceFormatConfig, Question, ResultRecord } from '../types/index.js';

/**
 * Per-question evidence bookkeeping, present when the batch has an evidence
 * cache. The `evidence*` context fields are only set when evidence logging is on.
 */
export interface EvidenceAnnotations {
  evidenceEnabled: boolean;
  evidenceInjected: boolean;
  evidenceJson?: string;
  evidenceParams?: EvidenceFormatConfig;
  evidenceCandidateContext?: string;
  evidenceUsedContext?: string;
}

/** One line of a results file. */
export type BatchLine =
  | { kind: 'result'; idx: number; record: ResultRecord; evidence?: EvidenceAnnotations }
  | { kind: 'failed'; idx: number; question: Question; error: string; evidence?: EvidenceAnnotations }
  | { kind: 'dry_run'; idx: number; question: Question };

export const DRY_RUN_OUTPUT = 'DRY_RUN';

function serializeEvidence(evidence: EvidenceAnnotations | undefined): Record<string, unknown> {
  if (!evidence) return {};
  return {
    evidence_enabled: evidence.evidenceEnabled,
    evidence_injected: evidence.evidenceInjected,
    ...(evidence.evidenceJson !== undefined ? { evidence_json: evidence.evidenceJson } : {}),
    ...(evidence.evidenceParams
      ? {
          evidence_params: {
            topk: evidence.evidenceParams.topk,
            max_chars: evidence.evidenceParams.maxChars,
            min_snip_chars: evidence.evidenceParams.minSnipChars,
            filter_mode: evidence.evidenceParams.filterMode,
          },
        }
      : {}),
    ...(evidence.evidenceCandidateContext !== undefined ? { evidence_candidate_context: evidence.evidenceCandidateContext } : {}),
    ...(evidence.evidenceUsedContext !== undefined ? { evidence_used_context: evidence.evidenceUsedContext } : {}),
  };
}

/**
 * ResultRecord → the snake_case object written to results files.
 */
export function serializeResultRecord(record: ResultRecord): Record<string, unknown> {
  return {
    question: record.question,
    options: record.options,
    pred_answer: record.predAnswer,
    gold_answer: record.goldAnswer,
    meta_info: record.metaInfo ?? null,
    question_domains: record.questionDomains,
    option_domains: record.optionDomains,
    question_analyses: record.questionAnalyses,
    option_analyses: record.optionAnalyses,
    syn_report: record.synReport,
    vote_history: record.voteHistory,
    revision_history: record.revisionHistory,
    syn_repo_history: record.reportHistory,
    raw_output: record.rawOutput,
    decision_status: record.decisionStatus,
    consensus_state: record.consensusState,
    consensus_rounds: record.consensusRounds,
  };
}

function questionFields(question: Question): Record<string, unknown> {
  return {
    question: question.text,
    options: question.options,
    pred_answer: '',
    gold_answer: question.goldAnswer,
    meta_info: question.metaInfo ?? null,
  };
}

export function serializeBatchLine(line: BatchLine): Record<string, unknown> {
  switch (line.kind) {
    case 'result':
      return { idx: line.idx, ...serializeResultRecord(line.record), ...serializeEvidence(line.evidence) };
    case 'failed':
      return { idx: line.idx, ...questionFields(line.question), error: line.error, ...serializeEvidence(line.evidence) };
    case 'dry_run':
      return { idx: line.idx, ...questionFields(line.question), raw_output: DRY_RUN_OUTPUT };
  }
}

export async function appendJsonl(path: string, objects: readonly unknown[]): Promise<void> {
  if (objects.length === 0) return;
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, objects.map(o => JSON.stringify(o)).join('\n') + '\n', 'utf-8');
}

/**
 * Appends lines in index order even when they complete out of order.
 * Lines wait in memory until every earlier index has been written.
 */
export class OrderedJsonlWriter {
  private next: number;
  private readonly pending = new Map<number, unknown>();
  private chain: Promise<void> = Promise.resolve();

  constructor(private readonly path: string, firstIndex = 0) {
    this.next = firstIndex;
  }

  /** Queue the object for position `index`; resolves once whatever became writable is on disk. */
  write(index: number, object: unknown): Promise<void> {
    this.pending.set(index, object);
    const ready: unknown[] = [];
    while (this.pending.has(this.next)) {
      ready.push(this.pending.get(this.next));
      this.pending.delete(this.next);
      this.next++;
    }
    this.chain = this.chain.then(() => appendJsonl(this.path, ready));
    return this.chain;
  }
}

/** The fields evaluation reads; everything else passes through. */
export const resultLineSchema = z.object({
  idx: z.number().int().optional(),
  pred_answer: z.string().nullable().optional().transform(v => v ?? ''),
  gold_answer: z.string().nullable().optional().transform(v => v ?? ''),
  meta_info: z.string().nullable().optional(),
  error: z.string().optional(),
}).passthrough();

export type ResultLine = z.infer<typeof resultLineSchema>;

export async function loadResults(path: string): Promise<ResultLine[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new DatasetError(`Cannot read results ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseJsonl(text, path).map((row, i) => {
    const parsed = resultLineSchema.safeParse(row);
    if (!parsed.success) {
      throw new DatasetError(`Result line ${i + 1} in ${path} is not a result record: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  });
}
