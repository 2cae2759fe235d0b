import { readFile } from 'fs/promises';
import { z } from 'zod';
import { OptionMap, Question } from './types/index.js';

export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatasetError';
  }
}

export const DATASET_NAMES = ['MedQA', 'PubMedQA', 'MedMCQA', 'MedicationQA'] as const;
export type DatasetName = typeof DATASET_NAMES[number];

/**
 * Raw dataset row. Only the fields the pipeline reads are typed; everything
 * else passes through untouched for the audit tools.
 */
export const datasetRowSchema = z.object({
  question: z.string(),
  options: z.record(z.string()).optional(),
  answer_idx: z.string().optional(),
  answer: z.string().optional(),
  context: z.union([z.string(), z.array(z.string())]).optional(),
  meta_info: z.string().optional(),
}).passthrough();

export type DatasetRow = z.infer<typeof datasetRowSchema>;

/**
 * Parse JSONL text into objects. Blank lines are skipped; a malformed line is
 * an error naming its line number.
 */
export function parseJsonl(text: string, source = '<jsonl>'): unknown[] {
  const rows: unknown[] = [];
  text.split(/\r?\n/).forEach((line, i) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    try {
      rows.push(JSON.parse(trimmed));
    } catch (error) {
      throw new DatasetError(`Invalid JSONL at ${source}:${i + 1}: ${error instanceof Error ? error.message : String(error)}`);
    }
  });
  return rows;
}

export async function loadJsonl(path: string): Promise<unknown[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new DatasetError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseJsonl(text, path);
}

export async function loadDataset(path: string): Promise<DatasetRow[]> {
  const rows = await loadJsonl(path);
  return rows.map((row, i) => {
    const parsed = datasetRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new DatasetError(`Dataset row ${i} in ${path} is not a question record: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  });
}

const PUNCTUATION = new Set('!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~');

/** Questions that do not end in punctuation get a trailing '?'. */
export function normalizeQuestionText(raw: string): string {
  if (raw && PUNCTUATION.has(raw[raw.length - 1])) return raw;
  return `${raw}?`;
}

/**
 * Build the pipeline's Question from a dataset row, per dataset conventions:
 * PubMedQA prepends its abstract context; MedicationQA is free-text (no options).
 */
export function toQuestion(row: DatasetRow, datasetName: DatasetName): Question {
  let text = normalizeQuestionText(row.question);
  let options: OptionMap = row.options ?? {};

  if (datasetName === 'PubMedQA') {
    const context = Array.isArray(row.context) ? row.context.join(' ') : row.context ?? '';
    text = context ? `${context} ${text}` : text;
  } else if (datasetName === 'MedicationQA') {
    options = {};
  }

  return {
    text,
    options,
    goldAnswer: row.answer_idx ?? '',
    metaInfo: row.meta_info,
  };
}

/**
 * Keep only JSONL rows whose meta_info equals the given value (e.g. USMLE "step2&3").
 * Unparseable lines are counted and skipped.
 */
export function filterDatasetByMeta(
  text: string,
  metaValue = 'step2&3'
): { kept: unknown[]; total: number; bad: number } {
  const kept: unknown[] = [];
  let total = 0;
  let bad = 0;

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    total++;
    let row: unknown;
    try {
      row = JSON.parse(trimmed);
    } catch {
      bad++;
      continue;
    }
    if (row && typeof row === 'object' && 'meta_info' in row && row.meta_info === metaValue) {
      kept.push(row);
    }
  }

  return { kept, total, bad };
}
