/**
 * Deliberation Controller - runs the five stages for one question
 * Flow: Route domains → Analyse (question, then options) → Synthesize report → Consensus loop → Final decision
 */

import { GenerationRequest, GenerationService } from './clients/llm.js';
import { DEFAULT_OPTION_DOMAIN_COUNT, DEFAULT_QUESTION_DOMAIN_COUNT, routeDomains } from './routing.js';
import { analyzeOptions, analyzeQuestion } from './analysis.js';
import { synthesizeReport } from './synthesis.js';
import { runConsensus, DEFAULT_MAX_ATTEMPT_VOTE } from './consensus.js';
import { extractFinalDecision } from './decision.js';
import { Question, ResultRecord, StageName } from './types/index.js';

export interface StageEvent {
  stage: StageName;
  meta: Record<string, string | number>;
}

// Called before every generation call, with the call's stage and labels
export type OnStageCallback = (event: StageEvent) => void;

export interface ControllerSettings {
  maxAttemptVote?: number;
  domainConcurrency?: number;
  questionDomainCount?: number;
  optionDomainCount?: number;
}

export interface AnswerOptions {
  /** Formatted evidence block; omitted or '' runs without grounding */
  evidenceContext?: string;
  /** Labels attached to every call of this question (e.g. { idx: 12 }) */
  meta?: Record<string, string | number>;
  onStage?: OnStageCallback;
}

/**
 * Wrap a service so each call is announced before it is made.
 */
export function withStageEvents(service: GenerationService, onStage: OnStageCallback): GenerationService {
  return {
    call(request: GenerationRequest): Promise<string> {
      onStage({ stage: request.stage, meta: request.meta ?? {} });
      return service.call(request);
    },
  };
}

export class DeliberationController {
  private readonly settings: Required<ControllerSettings>;

  constructor(
    private readonly service: GenerationService,
    settings: ControllerSettings = {}
  ) {
    this.settings = {
      maxAttemptVote: settings.maxAttemptVote ?? DEFAULT_MAX_ATTEMPT_VOTE,
      domainConcurrency: settings.domainConcurrency ?? 1,
      questionDomainCount: settings.questionDomainCount ?? DEFAULT_QUESTION_DOMAIN_COUNT,
      optionDomainCount: settings.optionDomainCount ?? DEFAULT_OPTION_DOMAIN_COUNT,
    };
  }

  async answer(question: Question, options: AnswerOptions = {}): Promise<ResultRecord> {
    const service = options.onStage ? withStageEvents(this.service, options.onStage) : this.service;
    const meta = options.meta ?? {};
    const evidenceContext = options.evidenceContext ?? '';
    const concurrency = this.settings.domainConcurrency;

    // Stage 1: Domain routing
    const { questionDomains, optionDomains } = await routeDomains(service, question, {
      questionDomainCount: this.settings.questionDomainCount,
      optionDomainCount: this.settings.optionDomainCount,
      meta,
    });

    // Stage 2: Analyses (evidence goes in here and nowhere else)
    if (evidenceContext) {
      console.error(`[Controller] Injecting evidence (${evidenceContext.length} chars)`);
    }
    const questionAnalyses = await analyzeQuestion(service, question, questionDomains, { evidenceContext, concurrency, meta });
    const optionAnalyses = await analyzeOptions(service, question, optionDomains, questionAnalyses, { evidenceContext, concurrency, meta });

    // Stage 3: Report synthesis
    const initialReport = await synthesizeReport(service, question, questionAnalyses, optionAnalyses, meta);

    // Stage 4: Consensus loop
    const consensus = await runConsensus(service, {
      question,
      report: initialReport,
      domains: [...questionDomains, ...optionDomains],
      maxAttemptVote: this.settings.maxAttemptVote,
      concurrency,
      meta,
    });

    // Stage 5: Final decision
    const decision = await extractFinalDecision(service, consensus.report, question.options, meta);
    console.error(`[Controller] Answer=${decision.answer || '(ambiguous)'} consensus=${consensus.state} rounds=${consensus.rounds}`);

    return {
      question: question.text,
      options: question.options,
      predAnswer: decision.answer,
      goldAnswer: question.goldAnswer,
      metaInfo: question.metaInfo,
      questionDomains,
      optionDomains,
      questionAnalyses,
      optionAnalyses,
      synReport: consensus.report,
      voteHistory: consensus.voteHistory,
      revisionHistory: consensus.revisionHistory,
      reportHistory: consensus.reportHistory,
      rawOutput: decision.rawOutput,
      decisionStatus: decision.status,
      consensusState: consensus.state,
      consensusRounds: consensus.rounds,
    };
  }
}
