/**
 * Stage 5: final answer from the agreed (or last) report.
 */

import { GENERATION_FAILURE, GenerationService } from './clients/llm.js';
import { finalDecisionPrompt, STAGE_MAX_TOKENS } from './prompts.js';
import { FinalDecision, OptionMap } from './types/index.js';

export const DEFAULT_LABELS: readonly string[] = ['A', 'B', 'C', 'D', 'E'];

const ANSWER_MARKER = /answer\s*:/gi;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Split a reply at its last "answer:" marker. Without one, the text after the
 * last ':' (or the whole text) is the answer segment.
 */
function splitAnswer(text: string): { rationale: string; segment: string; marked: boolean } {
  let lastMarker: RegExpExecArray | undefined;
  for (const match of text.matchAll(ANSWER_MARKER)) {
    lastMarker = match;
  }
  if (lastMarker?.index !== undefined) {
    return {
      rationale: text.slice(0, lastMarker.index).trim(),
      segment: text.slice(lastMarker.index + lastMarker[0].length).trim(),
      marked: true,
    };
  }
  return {
    rationale: text,
    segment: text.slice(text.lastIndexOf(':') + 1).trim(),
    marked: false,
  };
}

/**
 * First allowed label standing on its own in the segment. A bare lowercase
 * reply such as "b" is accepted when it is the whole segment.
 */
export function findLabel(segment: string, labels: readonly string[]): string | undefined {
  if (labels.length === 0) return undefined;

  const alternatives = [...labels].sort((a, b) => b.length - a.length).map(escapeRegExp).join('|');
  const match = new RegExp(`(?:^|[^A-Za-z0-9])(${alternatives})(?![A-Za-z0-9])`).exec(segment);
  if (match) return match[1];

  const bare = segment.replace(/^[\s("'*]+|[\s)"'.*]+$/g, '');
  return labels.find(label => label.toLowerCase() === bare.toLowerCase());
}

export function labelsFor(options: Readonly<OptionMap>): readonly string[] {
  const keys = Object.keys(options);
  return keys.length > 0 ? keys : DEFAULT_LABELS;
}

/**
 * Parse a final-decision reply. Multiple-choice questions resolve to one of
 * `labels`; free-text questions (`freeText`) take the answer segment as is.
 */
export function parseFinalDecision(raw: string, labels: readonly string[], freeText = false): FinalDecision {
  const text = raw.trim();
  if (raw === GENERATION_FAILURE || !text) {
    return { answer: '', rationale: '', status: 'ambiguous', rawOutput: raw };
  }

  const { rationale, segment, marked } = splitAnswer(text);
  const cleanRationale = rationale.replace(/^rationale\s*:\s*/i, '').trim();

  if (freeText) {
    const answer = marked ? segment : text;
    return answer
      ? { answer, rationale: cleanRationale, status: 'parsed', rawOutput: raw }
      : { answer: '', rationale: cleanRationale, status: 'ambiguous', rawOutput: raw };
  }

  const label = findLabel(segment, labels);
  if (!label) {
    console.error(`[Decision] No answer label in final output: ${text.slice(0, 80)}`);
    return { answer: '', rationale: cleanRationale, status: 'ambiguous', rawOutput: raw };
  }
  return { answer: label, rationale: cleanRationale, status: 'parsed', rawOutput: raw };
}

export async function extractFinalDecision(
  service: GenerationService,
  report: string,
  options: Readonly<OptionMap>,
  meta?: Record<string, string | number>
): Promise<FinalDecision> {
  const freeText = Object.keys(options).length === 0;
  const labels = freeText ? [] : labelsFor(options);
  const raw = await service.call({
    stage: 'S5_final',
    ...finalDecisionPrompt(report, labels),
    maxTokens: STAGE_MAX_TOKENS.S5_final,
    temperature: 0,
    meta,
  });
  return parseFinalDecision(raw, labels, freeText);
}
