/**
 * Synthesized report parsing.
 *
 * Synthesis and revision calls are asked for a "Key Knowledge:" section and a
 * "Total Analysis:" section, but models drift; every path here degrades to the
 * raw text instead of failing.
 */

import { GENERATION_FAILURE } from './clients/llm.js';
import { OptionMap } from './types/index.js';

export const NO_REPORT_TEXT = 'There is no synthesized report.';

export interface ParsedReport {
  keyKnowledge: string;
  totalAnalysis: string;
}

const KEY_KNOWLEDGE_PATTERN = /key\s*knowledge\s*:\s*([\s\S]*?)(?:\n\s*total\s*analysis\s*:|$)/i;
const TOTAL_ANALYSIS_PATTERN = /total\s*analysis\s*:\s*([\s\S]*)$/i;

export function parseSynthesizedReport(raw: string): ParsedReport {
  const text = raw || '';
  if (text === GENERATION_FAILURE) {
    return { keyKnowledge: '', totalAnalysis: NO_REPORT_TEXT };
  }

  const keyMatch = KEY_KNOWLEDGE_PATTERN.exec(text);
  const totalMatch = TOTAL_ANALYSIS_PATTERN.exec(text);

  return {
    keyKnowledge: keyMatch ? keyMatch[1].trim() : '',
    // No header: the whole reply is the analysis
    totalAnalysis: totalMatch ? totalMatch[1].trim() : text.trim(),
  };
}

/** Options as they are restated in reports and prompts. Empty map → ''. */
export function formatOptions(options: Readonly<OptionMap>): string {
  return Object.keys(options).length > 0 ? JSON.stringify(options) : '';
}

/**
 * Compose the report string the consensus loop votes on: question and options
 * verbatim, then key knowledge (when present), then the total analysis.
 */
export function composeSynthesizedReport(
  question: string,
  options: Readonly<OptionMap>,
  parsed: ParsedReport
): string {
  const lines = [
    `Question: ${question} `,
    `Options: ${formatOptions(options)} `,
  ];
  if (parsed.keyKnowledge) {
    lines.push(`Key Knowledge: ${parsed.keyKnowledge} `);
  }
  lines.push(`Total Analysis: ${parsed.totalAnalysis} `);
  return lines.join('\n') + '\n';
}

/** Parse a raw synthesis/revision reply and compose the next report version. */
export function buildReport(question: string, options: Readonly<OptionMap>, raw: string): string {
  return composeSynthesizedReport(question, options, parseSynthesizedReport(raw));
}
