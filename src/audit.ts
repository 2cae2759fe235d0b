/**
 * Offline checks over a dataset and its evidence cache: leakage audit,
 * leakage filter and index alignment. None of these make generation calls.
 */

import { DatasetRow } from './datasets.js';
import { evidenceSnippets } from './evidence.js';
import {
  artifactHitNames,
  extractQuestionSection,
  normalizeForComparison,
  normalizeWhitespace,
  similarityRatio,
} from './text-patterns.js';
import { EvidenceRecord } from './types/index.js';

/** Answer and option texts shorter than this are too generic to count as leaks. */
export const MIN_LEAK_TEXT_CHARS = 8;

function goldAnswerText(row: DatasetRow): string {
  const answer = row.answer ? normalizeWhitespace(row.answer) : '';
  return answer.length >= MIN_LEAK_TEXT_CHARS ? answer.toLowerCase() : '';
}

function optionTexts(row: DatasetRow): string[] {
  return Object.values(row.options ?? {})
    .map(normalizeWhitespace)
    .filter(text => text.length >= MIN_LEAK_TEXT_CHARS)
    .map(text => text.toLowerCase());
}

function instanceInput(record: EvidenceRecord | undefined): string {
  const instances = record?.instances;
  if (instances && typeof instances === 'object' && 'input' in instances && typeof instances.input === 'string') {
    return instances.input;
  }
  return '';
}

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

export type LeakKind = 'artifact' | 'goldAnswerText' | 'anyOptionText';

export interface LeakSignals {
  artifact: boolean;
  goldAnswerText: boolean;
  anyOptionText: boolean;
}

export function leakSignals(snippets: readonly string[], row: DatasetRow): LeakSignals {
  const gold = goldAnswerText(row);
  const opts = optionTexts(row);
  const signals: LeakSignals = { artifact: false, goldAnswerText: false, anyOptionText: false };

  for (const snippet of snippets) {
    const lower = snippet.toLowerCase();
    if (artifactHitNames(snippet).length > 0) signals.artifact = true;
    if (gold && lower.includes(gold)) signals.goldAnswerText = true;
    if (!signals.anyOptionText && opts.some(opt => lower.includes(opt))) signals.anyOptionText = true;
  }
  return signals;
}

export interface AuditOptions {
  /** Only the first `topk` snippets per record are inspected */
  topk?: number;
  /** Restrict to these dataset indices (e.g. the `idx` values of a results file) */
  indices?: readonly number[];
  maxExamples?: number;
}

export interface AuditReport {
  n: number;
  topk: number;
  scope: 'indices' | 'overlap';
  counts: Record<LeakKind, number>;
  rates: Record<LeakKind, number>;
  examples: Record<LeakKind, number[]>;
  warnings: string[];
  /** Artifact patterns found in `instances.input` of the first audited record */
  instanceInputHits: string[];
}

const LEAK_KINDS: readonly LeakKind[] = ['artifact', 'goldAnswerText', 'anyOptionText'];

export function auditEvidenceLeakage(
  dataset: readonly DatasetRow[],
  evidence: readonly EvidenceRecord[],
  options: AuditOptions = {}
): AuditReport {
  const topk = options.topk ?? 5;
  const maxExamples = options.maxExamples ?? 5;
  const warnings: string[] = [];

  if (dataset.length !== evidence.length) {
    warnings.push(`length mismatch: dataset=${dataset.length} evidence=${evidence.length} (audit will use min length)`);
  }

  const scope = options.indices ? 'indices' : 'overlap';
  const indices = options.indices
    ? [...new Set(options.indices)].sort((a, b) => a - b)
    : Array.from({ length: Math.min(dataset.length, evidence.length) }, (_, i) => i);

  const counts: Record<LeakKind, number> = { artifact: 0, goldAnswerText: 0, anyOptionText: 0 };
  const examples: Record<LeakKind, number[]> = { artifact: [], goldAnswerText: [], anyOptionText: [] };
  let n = 0;

  for (const idx of indices) {
    if (idx < 0 || idx >= dataset.length || idx >= evidence.length) continue;
    const snippets = evidenceSnippets({ evidence: sliceEvidence(evidence[idx], topk) });
    const signals = leakSignals(snippets, dataset[idx]);
    n++;
    for (const kind of LEAK_KINDS) {
      if (!signals[kind]) continue;
      counts[kind]++;
      if (examples[kind].length < maxExamples) examples[kind].push(idx);
    }
  }

  const rates: Record<LeakKind, number> = {
    artifact: n > 0 ? counts.artifact / n : 0,
    goldAnswerText: n > 0 ? counts.goldAnswerText / n : 0,
    anyOptionText: n > 0 ? counts.anyOptionText / n : 0,
  };

  const firstInput = indices.length > 0 ? instanceInput(evidence[indices[0]]) : '';
  const instanceInputHits = firstInput ? [...new Set(artifactHitNames(firstInput))].sort() : [];
  if (instanceInputHits.length > 0) {
    warnings.push('evidence.instances.input contains QA artifacts; only evidence[] may reach prompts');
  }

  return { n, topk, scope, counts, rates, examples, warnings, instanceInputHits };
}

function sliceEvidence(record: EvidenceRecord | undefined, topk: number): unknown[] {
  const raw = record?.evidence;
  if (!Array.isArray(raw)) return [];
  return topk > 0 ? raw.slice(0, topk) : raw;
}

export function formatAuditReport(report: AuditReport): string {
  if (report.n === 0) return '[done] nothing to audit';
  const line = (kind: LeakKind, label: string) =>
    `  ${label}_rate=${report.rates[kind].toFixed(4)} (${report.counts[kind]}/${report.n})`;
  return [
    '[summary]',
    `  n=${report.n} topk=${report.topk}`,
    line('artifact', 'artifact'),
    line('goldAnswerText', 'gold_answer_text'),
    line('anyOptionText', 'any_option_text'),
    '[examples]',
    `  artifact: [${report.examples.artifact.join(', ')}]`,
    `  gold_answer_text: [${report.examples.goldAnswerText.join(', ')}]`,
    `  any_option_text: [${report.examples.anyOptionText.join(', ')}]`,
    ...report.warnings.map(w => `[warn] ${w}`),
    ...(report.instanceInputHits.length > 0 ? [`       example_hits=[${report.instanceInputHits.join(', ')}]`] : []),
  ].join('\n');
}

// ---------------------------------------------------------------------------
// Filter
// ---------------------------------------------------------------------------

export type LeakFilterMode = 'artifact_only' | 'strict';

export interface FilterOptions {
  /** strict also drops snippets containing the gold answer or any option text */
  mode?: LeakFilterMode;
  minSnipChars?: number;
  /** > 0 keeps only the first K snippets before filtering */
  topk?: number;
  /** Copy snippets through unfiltered (topk still applies) */
  disableFilter?: boolean;
}

export interface FilterResult {
  evidence: EvidenceRecord[];
  kept: number;
  dropped: number;
  /** Drop reason → snippet count, most frequent first */
  reasons: Record<string, number>;
  warnings: string[];
}

/**
 * Every reason a snippet should not be injected; empty means keep.
 */
export function leakReasons(snippet: string, row: DatasetRow, mode: LeakFilterMode, minSnipChars: number): string[] {
  const reasons = artifactHitNames(snippet);

  if (mode === 'strict') {
    const lower = snippet.toLowerCase();
    const gold = goldAnswerText(row);
    if (gold && lower.includes(gold)) reasons.push('contains_gold_answer_text');
    if (optionTexts(row).some(opt => lower.includes(opt))) reasons.push('contains_option_text');
  }

  if (normalizeWhitespace(snippet).length < minSnipChars) reasons.push('too_short');
  return reasons;
}

export function filterEvidenceLeakage(
  dataset: readonly DatasetRow[],
  evidence: readonly EvidenceRecord[],
  options: FilterOptions = {}
): FilterResult {
  const mode = options.mode ?? 'artifact_only';
  const minSnipChars = options.minSnipChars ?? 80;
  const topk = options.topk ?? -1;
  const warnings: string[] = [];

  if (dataset.length !== evidence.length) {
    warnings.push(`length mismatch: dataset=${dataset.length} evidence=${evidence.length} (filter will use min length)`);
  }

  const reasonCounts = new Map<string, number>();
  let kept = 0;
  let dropped = 0;
  const out: EvidenceRecord[] = [];

  const n = Math.min(dataset.length, evidence.length);
  for (let i = 0; i < n; i++) {
    let snippets = evidenceSnippets(evidence[i]);
    if (topk > 0) snippets = snippets.slice(0, topk);

    const keep = options.disableFilter
      ? snippets
      : snippets.filter(snippet => {
          const reasons = leakReasons(snippet, dataset[i], mode, minSnipChars);
          if (reasons.length === 0) return true;
          dropped++;
          for (const reason of new Set(reasons)) {
            reasonCounts.set(reason, (reasonCounts.get(reason) ?? 0) + 1);
          }
          return false;
        });

    kept += keep.length;
    out.push({ ...evidence[i], evidence: keep });
  }

  const reasons: Record<string, number> = {};
  for (const [reason, count] of [...reasonCounts.entries()].sort((a, b) => b[1] - a[1])) {
    reasons[reason] = count;
  }

  return { evidence: out, kept, dropped, reasons, warnings };
}

// ---------------------------------------------------------------------------
// Alignment
// ---------------------------------------------------------------------------

export interface AlignmentOptions {
  /** Rows to check; -1 means all */
  limit?: number;
  requireNonemptyEvidence?: boolean;
  /** Compare dataset questions with the QUESTION: text in instances.input */
  checkQuestionText?: boolean;
  minQuestionRatio?: number;
  reportTop?: number;
}

export interface QuestionMismatch {
  idx: number;
  ratio: number;
  datasetQuestion: string;
  evidenceQuestion: string;
}

export interface AlignmentSummary {
  datasetN: number;
  evidenceN: number;
  checkedN: number;
  lengthMatch: boolean;
  missingRecordCount: number;
  emptyEvidenceCount: number;
  /** Question-text fields are null unless the question check ran */
  missingQuestionTextCount: number | null;
  questionMismatchCount: number | null;
  questionMismatchMinRatio: number | null;
  questionMismatchSamples: QuestionMismatch[] | null;
  ok: boolean;
}

export function verifyEvidenceAlignment(
  dataset: readonly DatasetRow[],
  evidence: readonly EvidenceRecord[],
  options: AlignmentOptions = {}
): AlignmentSummary {
  const limit = options.limit === undefined || options.limit === -1
    ? dataset.length
    : Math.min(options.limit, dataset.length);
  const checkQuestions = options.checkQuestionText ?? false;
  const minRatio = options.minQuestionRatio ?? 0.92;

  let missingRecord = 0;
  let emptyEvidence = 0;
  let missingQuestion = 0;
  const mismatches: QuestionMismatch[] = [];

  for (let idx = 0; idx < limit; idx++) {
    const record = idx < evidence.length ? evidence[idx] : undefined;
    if (!record || Object.keys(record).length === 0) {
      missingRecord++;
      continue;
    }

    if (evidenceSnippets(record).filter(s => s.trim()).length === 0) {
      emptyEvidence++;
    }

    if (checkQuestions) {
      const datasetQuestion = dataset[idx].question;
      const evidenceQuestion = extractQuestionSection(instanceInput(record));
      if (!datasetQuestion.trim() || !evidenceQuestion.trim()) {
        missingQuestion++;
        continue;
      }
      const a = normalizeForComparison(datasetQuestion);
      const b = normalizeForComparison(evidenceQuestion);
      const ratio = a && b ? similarityRatio(a, b) : 0;
      if (ratio < minRatio) {
        mismatches.push({ idx, ratio, datasetQuestion, evidenceQuestion });
      }
    }
  }

  mismatches.sort((x, y) => x.ratio - y.ratio);
  const top = mismatches.slice(0, Math.max(0, options.reportTop ?? 10));

  const lengthMatch = dataset.length === evidence.length;
  const evidenceOk = options.requireNonemptyEvidence ? emptyEvidence === 0 : true;
  const questionsOk = checkQuestions ? mismatches.length === 0 && missingQuestion === 0 : true;

  return {
    datasetN: dataset.length,
    evidenceN: evidence.length,
    checkedN: limit,
    lengthMatch,
    missingRecordCount: missingRecord,
    emptyEvidenceCount: emptyEvidence,
    missingQuestionTextCount: checkQuestions ? missingQuestion : null,
    questionMismatchCount: checkQuestions ? mismatches.length : null,
    questionMismatchMinRatio: checkQuestions ? top[0]?.ratio ?? null : null,
    questionMismatchSamples: checkQuestions
      ? top.map(m => ({ ...m, ratio: Math.round(m.ratio * 10000) / 10000 }))
      : null,
    ok: lengthMatch && missingRecord === 0 && evidenceOk && questionsOk,
  };
}
