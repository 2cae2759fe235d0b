/**
 * Accuracy over a results file, overall and per meta_info bucket.
 */

import { ResultLine } from './storage/results-store.js';

export interface AccuracyBucket {
  n: number;
  correct: number;
  accuracy: number;
}

export interface EvaluationSummary {
  overall: AccuracyBucket;
  /** Keyed by meta_info; records without one land in 'all'. Keys sorted. */
  byMeta: Record<string, AccuracyBucket>;
}

export function isCorrect(pred: string, gold: string): boolean {
  const p = pred.trim();
  const g = gold.trim();
  return p.length > 0 && (p === g || p.includes(g));
}

function bucket(n: number, correct: number): AccuracyBucket {
  return { n, correct, accuracy: n > 0 ? correct / n : 0 };
}

export function evaluateResults(lines: readonly ResultLine[]): EvaluationSummary {
  let correct = 0;
  const totals = new Map<string, { n: number; correct: number }>();

  for (const line of lines) {
    const key = typeof line.meta_info === 'string' ? line.meta_info : 'all';
    const entry = totals.get(key) ?? { n: 0, correct: 0 };
    entry.n++;
    if (isCorrect(line.pred_answer, line.gold_answer)) {
      entry.correct++;
      correct++;
    }
    totals.set(key, entry);
  }

  const byMeta: Record<string, AccuracyBucket> = {};
  for (const key of [...totals.keys()].sort()) {
    const entry = totals.get(key);
    if (entry) byMeta[key] = bucket(entry.n, entry.correct);
  }

  return { overall: bucket(lines.length, correct), byMeta };
}

/** `[overall] n=.. acc=..` followed by one line per bucket. */
export function formatEvaluation(summary: EvaluationSummary): string {
  const lines = [`[overall] n=${summary.overall.n} acc=${summary.overall.accuracy.toFixed(4)}`];
  for (const [key, b] of Object.entries(summary.byMeta)) {
    lines.push(`[${key}] n=${b.n} acc=${b.accuracy.toFixed(4)}`);
  }
  return lines.join('\n');
}
