/**
 * Stage 3: fold both analysis maps into report version 0.
 */

import { GenerationService } from './clients/llm.js';
import { STAGE_MAX_TOKENS, synthesisPrompt } from './prompts.js';
import { buildReport } from './report-parser.js';
import { AnalysisMap, Question } from './types/index.js';

export async function synthesizeReport(
  service: GenerationService,
  question: Question,
  questionAnalyses: AnalysisMap,
  optionAnalyses: AnalysisMap,
  meta?: Record<string, string | number>
): Promise<string> {
  const raw = await service.call({
    stage: 'S3_synth_report',
    ...synthesisPrompt(question.text, question.options, questionAnalyses, optionAnalyses),
    maxTokens: STAGE_MAX_TOKENS.S3_synth_report,
    temperature: 0,
    meta,
  });
  return buildReport(question.text, question.options, raw);
}
