/**
 * Evidence gate: turns a cached evidence record into the bounded `[E<n>]` block
 * that analysis prompts may cite.
 */

import { readFile } from 'fs/promises';
import { DEFAULT_EVIDENCE_CONFIG } from './config.js';
import { DatasetError } from './datasets.js';
import { hasArtifact, normalizeWhitespace } from './text-patterns.js';
import { EvidenceFormatConfig, EvidenceRecord } from './types/index.js';

/**
 * Load an evidence cache: a JSON array whose element i belongs to dataset index i.
 * Non-object elements keep their slot as an empty record so indexes stay aligned.
 */
export async function loadEvidenceJson(path: string): Promise<EvidenceRecord[]> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new DatasetError(`Cannot read evidence cache ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!Array.isArray(data)) {
    throw new DatasetError(`Evidence JSON must be a list; got ${data === null ? 'null' : typeof data}`);
  }
  return data.map(toEvidenceRecord);
}

export function toEvidenceRecord(value: unknown): EvidenceRecord {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

/**
 * Record for a dataset index, or undefined when the cache does not reach it.
 */
export function getEvidenceRecord(cache: readonly EvidenceRecord[] | undefined, idx: number): EvidenceRecord | undefined {
  if (!cache || !Number.isInteger(idx) || idx < 0 || idx >= cache.length) return undefined;
  return cache[idx];
}

/** String snippets of a record, in order; anything else is ignored. */
export function evidenceSnippets(record: EvidenceRecord | undefined): string[] {
  const snips = record?.evidence;
  if (!Array.isArray(snips)) return [];
  return snips.filter((s): s is string => typeof s === 'string');
}

function shouldDrop(snippet: string, cfg: EvidenceFormatConfig): boolean {
  if (normalizeWhitespace(snippet).length < cfg.minSnipChars) return true;
  if (cfg.filterMode === 'off') return false;
  return hasArtifact(snippet);
}

/**
 * Format a record as prompt-ready evidence:
 *
 *   [E1] first kept snippet
 *   [E2] second kept snippet
 *
 * Lines are added while the running length (newline included) stays within
 * `maxChars`; a line that would cross it ends the block. Returns '' when no
 * snippet survives, which callers read as "no grounding available".
 */
export function formatEvidenceContext(
  record: EvidenceRecord | undefined,
  cfg: EvidenceFormatConfig = DEFAULT_EVIDENCE_CONFIG
): string {
  let snips = evidenceSnippets(record);
  if (cfg.topk > 0) {
    snips = snips.slice(0, cfg.topk);
  }

  const kept = snips.filter(s => !shouldDrop(s, cfg)).map(normalizeWhitespace);
  if (kept.length === 0) return '';

  const lines: string[] = [];
  let total = 0;
  for (const [i, snippet] of kept.entries()) {
    const line = `[E${i + 1}] ${snippet}`;
    if (total + line.length + 1 > cfg.maxChars) break;
    lines.push(line);
    total += line.length + 1;
  }

  return lines.join('\n').trim();
}
