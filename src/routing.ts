/**
 * Stage 1: domain routing. Picks the specialties that will analyse the
 * question and, separately, the options.
 */

import { GENERATION_FAILURE, GenerationService } from './clients/llm.js';
import { optionsDomainPrompt, questionDomainPrompt, STAGE_MAX_TOKENS } from './prompts.js';
import { DomainSet, Question } from './types/index.js';

export const DEFAULT_DOMAIN = 'General Medicine';
export const DEFAULT_QUESTION_DOMAIN_COUNT = 5;
export const DEFAULT_OPTION_DOMAIN_COUNT = 2;

export interface RoutingOptions {
  questionDomainCount?: number;
  optionDomainCount?: number;
  meta?: Record<string, string | number>;
}

export interface DomainRouting {
  questionDomains: DomainSet;
  optionDomains: DomainSet;
}

/**
 * "Medical Field: Cardiology | Endocrinology" → ['Cardiology', 'Endocrinology'].
 * Everything up to the last ':' is header; names are '|'-separated. Order and
 * duplicates are kept.
 */
export function parseDomainList(raw: string): DomainSet {
  const body = raw.slice(raw.lastIndexOf(':') + 1);
  return body
    .split('|')
    .map(name => name.trim())
    .filter(name => name.length > 0);
}

export function defaultDomains(count: number): DomainSet {
  return Array.from({ length: count }, () => DEFAULT_DOMAIN);
}

function toDomainSet(raw: string, count: number, label: string): DomainSet {
  if (raw === GENERATION_FAILURE) {
    console.error(`[Router] ${label} routing failed, using ${count} x ${DEFAULT_DOMAIN}`);
    return defaultDomains(count);
  }
  const domains = parseDomainList(raw);
  if (domains.length === 0) {
    console.error(`[Router] ${label} routing returned no domains, using ${count} x ${DEFAULT_DOMAIN}`);
    return defaultDomains(count);
  }
  return domains;
}

export async function routeDomains(
  service: GenerationService,
  question: Question,
  options: RoutingOptions = {}
): Promise<DomainRouting> {
  const questionCount = options.questionDomainCount ?? DEFAULT_QUESTION_DOMAIN_COUNT;
  const optionCount = options.optionDomainCount ?? DEFAULT_OPTION_DOMAIN_COUNT;

  const qPrompt = questionDomainPrompt(question.text, questionCount);
  const rawQuestion = await service.call({
    stage: 'S1_question_domain',
    ...qPrompt,
    maxTokens: STAGE_MAX_TOKENS.S1_question_domain,
    temperature: 0,
    meta: options.meta,
  });

  const oPrompt = optionsDomainPrompt(question.text, question.options, optionCount);
  const rawOptions = await service.call({
    stage: 'S1_options_domain',
    ...oPrompt,
    maxTokens: STAGE_MAX_TOKENS.S1_options_domain,
    temperature: 0,
    meta: options.meta,
  });

  const routing = {
    questionDomains: toDomainSet(rawQuestion, questionCount, 'Question'),
    optionDomains: toDomainSet(rawOptions, optionCount, 'Options'),
  };
  console.error(`[Router] question=[${routing.questionDomains.join(', ')}] options=[${routing.optionDomains.join(', ')}]`);
  return routing;
}
