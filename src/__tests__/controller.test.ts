/**
 * Deliberation Controller Tests
 *
 * End-to-end runs of the five stages against a scripted service: stage order,
 * evidence confinement to Stage 2, the assembled record, and the all-failures
 * path that must still produce a record.
 *
 * Run with: npm run test
 */

import { describe, it, expect } from 'vitest';
import { DeliberationController, StageEvent } from '../controller.js';
import { NO_ANALYSIS_MARKER } from '../analysis.js';
import { NO_REPORT_TEXT } from '../report-parser.js';
import { DEFAULT_DOMAIN } from '../routing.js';
import { Question } from '../types/index.js';
import { ScriptedService, StageScript } from './helpers/scripted-service.js';

const question: Question = {
  text: 'A 54-year-old man with type 2 diabetes has an HbA1c of 8.5%. Which drug should be started first?',
  options: { A: 'Metformin', B: 'Insulin glargine', C: 'Glipizide' },
  goldAnswer: 'A',
  metaInfo: 'step2&3',
};

const OPTIONS_JSON = '{"A":"Metformin","B":"Insulin glargine","C":"Glipizide"}';

const script: StageScript = {
  S1_question_domain: 'Medical Field: Endocrinology | Cardiology',
  S1_options_domain: 'Medical Field: Pharmacology',
  S2_question_analysis: request => `${request.meta?.domain} view of the question.`,
  S2_options_analysis: request => `${request.meta?.domain} view of the options.`,
  S3_synth_report: 'Key Knowledge: Metformin is first line.\nTotal Analysis: Start metformin.',
  S4_vote: request => (request.meta?.domain === 'Pharmacology' && request.meta?.round === 1 ? 'No' : 'Yes'),
  S4_advice: 'Mention renal function.',
  S4_revision: 'Key Knowledge: Check eGFR.\nTotal Analysis: Start metformin if eGFR allows.',
  S5_final: 'Rationale: First-line therapy.\nAnswer: A',
};

const EVIDENCE = '[E1] Metformin remains first-line pharmacotherapy for type 2 diabetes in most adults.';

// ============================================================================
// Full run
// ============================================================================

describe('DeliberationController', () => {
  it('runs the stages in order and assembles the record', async () => {
    const service = new ScriptedService(script);
    const controller = new DeliberationController(service, { maxAttemptVote: 3 });

    const record = await controller.answer(question);

    expect(service.stages()).toEqual([
      'S1_question_domain',
      'S1_options_domain',
      'S2_question_analysis',
      'S2_question_analysis',
      'S2_options_analysis',
      'S3_synth_report',
      'S4_vote',
      'S4_vote',
      'S4_vote',
      'S4_advice',
      'S4_revision',
      'S4_vote',
      'S4_vote',
      'S4_vote',
      'S5_final',
    ]);

    const initial = `Question: ${question.text} \nOptions: ${OPTIONS_JSON} \nKey Knowledge: Metformin is first line. \nTotal Analysis: Start metformin. \n`;
    const revised = `Question: ${question.text} \nOptions: ${OPTIONS_JSON} \nKey Knowledge: Check eGFR. \nTotal Analysis: Start metformin if eGFR allows. \n`;

    expect(record).toEqual({
      question: question.text,
      options: question.options,
      predAnswer: 'A',
      goldAnswer: 'A',
      metaInfo: 'step2&3',
      questionDomains: ['Endocrinology', 'Cardiology'],
      optionDomains: ['Pharmacology'],
      questionAnalyses: [
        { domain: 'Endocrinology', analysis: 'Endocrinology view of the question.' },
        { domain: 'Cardiology', analysis: 'Cardiology view of the question.' },
      ],
      optionAnalyses: [{ domain: 'Pharmacology', analysis: 'Pharmacology view of the options.' }],
      synReport: revised,
      voteHistory: [
        { Endocrinology: 'yes', Cardiology: 'yes', Pharmacology: 'no' },
        { Endocrinology: 'yes', Cardiology: 'yes', Pharmacology: 'yes' },
      ],
      revisionHistory: [{ Pharmacology: 'Mention renal function.' }],
      reportHistory: [initial, revised],
      rawOutput: 'Rationale: First-line therapy.\nAnswer: A',
      decisionStatus: 'parsed',
      consensusState: 'CONVERGED',
      consensusRounds: 2,
    });
  });

  it('shows evidence to the analysis stage only', async () => {
    const service = new ScriptedService(script);
    await new DeliberationController(service).answer(question, { evidenceContext: EVIDENCE });

    const withEvidence = service.requests.filter(r => r.userInput.includes(EVIDENCE)).map(r => r.stage);
    expect(withEvidence).toEqual(['S2_question_analysis', 'S2_question_analysis', 'S2_options_analysis']);
  });

  it('votes with the question domains followed by the option domains', async () => {
    const service = new ScriptedService(script);
    await new DeliberationController(service).answer(question);

    const voters = service.callsFor('S4_vote').filter(r => r.meta?.round === 1).map(r => r.meta?.domain);
    expect(voters).toEqual(['Endocrinology', 'Cardiology', 'Pharmacology']);
  });

  it('labels every call with the caller meta and announces each stage', async () => {
    const service = new ScriptedService(script);
    const events: StageEvent[] = [];

    await new DeliberationController(service).answer(question, {
      meta: { idx: 7 },
      onStage: event => events.push(event),
    });

    expect(events.map(e => e.stage)).toEqual(service.stages());
    for (const request of service.requests) {
      expect(request.meta?.idx).toBe(7);
      expect(request.temperature).toBe(0);
    }
  });

  it('honours the vote budget', async () => {
    const service = new ScriptedService({ ...script, S4_vote: 'No' });
    const record = await new DeliberationController(service, { maxAttemptVote: 1 }).answer(question);

    expect(record.consensusState).toBe('EXHAUSTED');
    expect(record.consensusRounds).toBe(1);
    expect(record.voteHistory).toHaveLength(1);
    expect(record.reportHistory).toHaveLength(2);
    // Stage 5 still runs on the last report
    expect(record.predAnswer).toBe('A');
  });

  it('decides on report version 0 when the vote budget is 0', async () => {
    const service = new ScriptedService(script);
    const record = await new DeliberationController(service, { maxAttemptVote: 0 }).answer(question);

    expect(record.voteHistory).toEqual([]);
    expect(record.consensusState).toBe('EXHAUSTED');
    expect(record.consensusRounds).toBe(0);
    expect(record.reportHistory).toEqual([record.synReport]);
    expect(service.callsFor('S4_vote')).toHaveLength(0);
    expect(record.predAnswer).toBe('A');
  });

  it('completes with fallbacks when every call fails', async () => {
    const service = new ScriptedService();
    const record = await new DeliberationController(service).answer(question);

    expect(record.questionDomains).toEqual(Array(5).fill(DEFAULT_DOMAIN));
    expect(record.optionDomains).toEqual(Array(2).fill(DEFAULT_DOMAIN));
    expect(record.questionAnalyses.every(a => a.analysis === NO_ANALYSIS_MARKER)).toBe(true);
    expect(record.synReport).toBe(`Question: ${question.text} \nOptions: ${OPTIONS_JSON} \nTotal Analysis: ${NO_REPORT_TEXT} \n`);
    expect(record.voteHistory).toEqual([{ [DEFAULT_DOMAIN]: 'yes' }]);
    expect(record.consensusState).toBe('CONVERGED');
    expect(record.predAnswer).toBe('');
    expect(record.decisionStatus).toBe('ambiguous');
    expect(record.rawOutput).toBe('ERROR.');
    // 2 routing + 5 + 2 analyses + 1 synthesis + 7 votes + 1 final
    expect(service.requests).toHaveLength(18);
  });

  it('answers free-text questions without labels', async () => {
    const service = new ScriptedService({ ...script, S5_final: 'Rationale: r\nAnswer: Take it in the morning.' });
    const record = await new DeliberationController(service).answer({
      text: 'When should levothyroxine be taken?',
      options: {},
      goldAnswer: '',
    });

    expect(record.predAnswer).toBe('Take it in the morning.');
    expect(record.synReport.startsWith('Question: When should levothyroxine be taken? \nOptions:  \n')).toBe(true);
  });
});
