/**
 * Stage 4: collaborative consultation.
 *
 * Every routed domain votes on the current report. Any dissent collects
 * advice from the dissenting domains and produces one revised report; the
 * loop then votes again until everyone agrees or the round budget runs out.
 *
 *   VOTING ──all yes──▶ CONVERGED
 *     │
 *   any no
 *     ▼
 *   REVISING ──rounds left──▶ VOTING
 *     │
 *   budget spent
 *     ▼
 *   EXHAUSTED
 */

import { GenerationService } from './clients/llm.js';
import { mapInOrder } from './pool.js';
import { advicePrompt, revisionPrompt, STAGE_MAX_TOKENS, votePrompt } from './prompts.js';
import { buildReport } from './report-parser.js';
import {
  ConsensusOutcome,
  DomainSet,
  Opinion,
  Question,
  RevisionAdvice,
  TerminalConsensusState,
  VoteRecord,
} from './types/index.js';

export const DEFAULT_MAX_ATTEMPT_VOTE = 3;

export interface ConsensusOptions {
  question: Question;
  /** Report version 0 */
  report: string;
  /** Question domains followed by option domains, duplicates kept */
  domains: DomainSet;
  /** Voting rounds allowed; 0 skips consultation and leaves report version 0 */
  maxAttemptVote?: number;
  concurrency?: number;
  meta?: Record<string, string | number>;
}

/**
 * First standalone yes/no in the reply decides; a reply with neither
 * (including a failed call) counts as agreement.
 */
export function classifyVote(raw: string): Opinion {
  const match = /\b(yes|no)\b/.exec(raw.toLowerCase());
  return match?.[1] === 'no' ? 'no' : 'yes';
}

export async function runConsensus(
  service: GenerationService,
  options: ConsensusOptions
): Promise<ConsensusOutcome> {
  const { question, domains } = options;
  const maxRounds = Math.max(0, options.maxAttemptVote ?? DEFAULT_MAX_ATTEMPT_VOTE);
  const concurrency = options.concurrency ?? 1;

  let report = options.report;
  const voteHistory: VoteRecord[] = [];
  const revisionHistory: RevisionAdvice[] = [];
  const reportHistory: string[] = [report];

  if (maxRounds === 0) {
    console.error('[Consensus] Vote budget is 0; skipping consultation');
    return { state: 'EXHAUSTED', rounds: 0, report, voteHistory, revisionHistory, reportHistory };
  }

  if (domains.length === 0) {
    console.error('[Consensus] No domains to vote; converged');
    return { state: 'CONVERGED', rounds: 1, report, voteHistory: [{}], revisionHistory, reportHistory };
  }

  let state: TerminalConsensusState = 'EXHAUSTED';
  let round = 0;

  while (round < maxRounds) {
    round++;
    const currentReport = report;

    // VOTING
    const opinions = await mapInOrder(domains, concurrency, async domain => {
      const raw = await service.call({
        stage: 'S4_vote',
        ...votePrompt(domain, currentReport),
        maxTokens: STAGE_MAX_TOKENS.S4_vote,
        temperature: 0,
        meta: { ...options.meta, domain, round },
      });
      return classifyVote(raw);
    });

    const record: VoteRecord = {};
    const dissenters: string[] = [];
    opinions.forEach((opinion, i) => {
      record[domains[i]] = opinion;
      if (opinion === 'no') dissenters.push(domains[i]);
    });
    voteHistory.push(record);

    console.error(`[Consensus] Round ${round}/${maxRounds}: ${opinions.length - dissenters.length} yes, ${dissenters.length} no`);

    if (dissenters.length === 0) {
      state = 'CONVERGED';
      break;
    }

    // REVISING
    const adviceTexts = await mapInOrder(dissenters, concurrency, domain =>
      service.call({
        stage: 'S4_advice',
        ...advicePrompt(domain, currentReport),
        maxTokens: STAGE_MAX_TOKENS.S4_advice,
        temperature: 0,
        meta: { ...options.meta, domain, round },
      })
    );
    const advice: RevisionAdvice = {};
    dissenters.forEach((domain, i) => {
      advice[domain] = adviceTexts[i];
    });

    const revised = await service.call({
      stage: 'S4_revision',
      ...revisionPrompt(currentReport, advice),
      maxTokens: STAGE_MAX_TOKENS.S4_revision,
      temperature: 0,
      meta: { ...options.meta, round },
    });
    report = buildReport(question.text, question.options, revised);
    revisionHistory.push(advice);
    reportHistory.push(report);
  }

  if (state === 'EXHAUSTED') {
    console.error(`[Consensus] No agreement after ${maxRounds} rounds`);
  }

  return { state, rounds: round, report, voteHistory, revisionHistory, reportHistory };
}
