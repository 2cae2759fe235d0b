/**
 * Stage 2: one analysis per domain, for the question and then for the options.
 */

import { GENERATION_FAILURE, GenerationService } from './clients/llm.js';
import { mapInOrder } from './pool.js';
import { optionsAnalysisPrompt, questionAnalysisPrompt, STAGE_MAX_TOKENS } from './prompts.js';
import { AnalysisMap, DomainSet, Question } from './types/index.js';

export const NO_ANALYSIS_MARKER = 'No analysis available from this domain.';

export interface AnalysisOptions {
  /** Formatted `[E<n>]` block; '' means the prompts carry no evidence. */
  evidenceContext?: string;
  concurrency?: number;
  meta?: Record<string, string | number>;
}

function cleanAnalysis(raw: string): string {
  const text = raw.trim();
  return raw === GENERATION_FAILURE || !text ? NO_ANALYSIS_MARKER : text;
}

export async function analyzeQuestion(
  service: GenerationService,
  question: Question,
  domains: DomainSet,
  options: AnalysisOptions = {}
): Promise<AnalysisMap> {
  const evidence = options.evidenceContext ?? '';
  return mapInOrder(domains, options.concurrency ?? 1, async domain => {
    const raw = await service.call({
      stage: 'S2_question_analysis',
      ...questionAnalysisPrompt(question.text, domain, evidence),
      maxTokens: STAGE_MAX_TOKENS.S2_question_analysis,
      temperature: 0,
      meta: { ...options.meta, domain },
    });
    return { domain, analysis: cleanAnalysis(raw) };
  });
}

/** Option analyses see every question analysis. */
export async function analyzeOptions(
  service: GenerationService,
  question: Question,
  domains: DomainSet,
  questionAnalyses: AnalysisMap,
  options: AnalysisOptions = {}
): Promise<AnalysisMap> {
  const evidence = options.evidenceContext ?? '';
  return mapInOrder(domains, options.concurrency ?? 1, async domain => {
    const raw = await service.call({
      stage: 'S2_options_analysis',
      ...optionsAnalysisPrompt(question.text, question.options, domain, questionAnalyses, evidence),
      maxTokens: STAGE_MAX_TOKENS.S2_options_analysis,
      temperature: 0,
      meta: { ...options.meta, domain },
    });
    return { domain, analysis: cleanAnalysis(raw) };
  });
}
