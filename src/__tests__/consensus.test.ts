/**
 * Consensus Loop Tests
 *
 * Deterministic vote scripts drive the VOTING → REVISING → VOTING cycle and
 * check the histories it leaves behind.
 *
 * Run with: npm run test
 */

import { describe, it, expect } from 'vitest';
import { classifyVote, runConsensus } from '../consensus.js';
import { Opinion, Question } from '../types/index.js';
import { ScriptedService } from './helpers/scripted-service.js';

const question: Question = {
  text: 'Which drug should be started first?',
  options: { A: 'Metformin', B: 'Insulin' },
  goldAnswer: 'A',
};

const REPORT_V0 = 'Question: Which drug should be started first? \nOptions: {"A":"Metformin","B":"Insulin"} \nTotal Analysis: Start metformin. \n';

const reportWith = (totalAnalysis: string, keyKnowledge?: string): string =>
  'Question: Which drug should be started first? \nOptions: {"A":"Metformin","B":"Insulin"} \n' +
  (keyKnowledge ? `Key Knowledge: ${keyKnowledge} \n` : '') +
  `Total Analysis: ${totalAnalysis} \n`;

// ============================================================================
// Vote classification
// ============================================================================

describe('classifyVote', () => {
  const cases: Array<[string, Opinion]> = [
    ['YES', 'yes'],
    ['Yes, the report is consistent.', 'yes'],
    ['No, the dose is wrong.', 'no'],
    ['[NO]', 'no'],
    ['yes and no', 'yes'],
    ['I am not sure', 'yes'],
    ['ERROR.', 'yes'],
    ['', 'yes'],
  ];

  it.each(cases)('%j → %s', (raw, expected) => {
    expect(classifyVote(raw)).toBe(expected);
  });
});

// ============================================================================
// Loop behaviour
// ============================================================================

describe('runConsensus', () => {
  it('revises once on a single dissent, then converges', async () => {
    const service = new ScriptedService({
      S4_vote: request => (request.meta?.domain === 'Cardiology' && request.meta?.round === 1 ? 'No' : 'Yes'),
      S4_advice: 'Mention the cardiovascular benefit.',
      S4_revision: 'Key Knowledge: Metformin lowers cardiovascular risk.\nTotal Analysis: Start metformin.',
    });

    const outcome = await runConsensus(service, {
      question,
      report: REPORT_V0,
      domains: ['Cardiology', 'Endocrinology'],
      maxAttemptVote: 2,
    });

    expect(outcome.state).toBe('CONVERGED');
    expect(outcome.rounds).toBe(2);
    expect(outcome.voteHistory).toEqual([
      { Cardiology: 'no', Endocrinology: 'yes' },
      { Cardiology: 'yes', Endocrinology: 'yes' },
    ]);
    expect(outcome.revisionHistory).toEqual([{ Cardiology: 'Mention the cardiovascular benefit.' }]);
    expect(outcome.reportHistory).toEqual([
      REPORT_V0,
      reportWith('Start metformin.', 'Metformin lowers cardiovascular risk.'),
    ]);
    expect(outcome.report).toBe(outcome.reportHistory[1]);

    expect(service.stages()).toEqual(['S4_vote', 'S4_vote', 'S4_advice', 'S4_revision', 'S4_vote', 'S4_vote']);
    const [advice] = service.callsFor('S4_advice');
    expect(advice.meta).toEqual({ domain: 'Cardiology', round: 1 });
    expect(advice.userInput).toContain(REPORT_V0);
    const [revision] = service.callsFor('S4_revision');
    expect(revision.systemRole).toBe('');
    expect(revision.userInput).toContain('- Cardiology expert: Mention the cardiovascular benefit.');
  });

  it('stops after one round when everyone agrees', async () => {
    const service = new ScriptedService({ S4_vote: 'Yes.' });

    const outcome = await runConsensus(service, {
      question,
      report: REPORT_V0,
      domains: ['Cardiology', 'Endocrinology', 'Pharmacology'],
    });

    expect(outcome.state).toBe('CONVERGED');
    expect(outcome.voteHistory).toHaveLength(1);
    expect(outcome.reportHistory).toEqual([REPORT_V0]);
    expect(outcome.revisionHistory).toEqual([]);
    expect(service.callsFor('S4_advice')).toHaveLength(0);
    expect(service.callsFor('S4_revision')).toHaveLength(0);
  });

  it('exhausts the budget and keeps the last revision', async () => {
    const service = new ScriptedService({
      S4_vote: 'No',
      S4_advice: 'Disagree.',
      S4_revision: ['Total Analysis: R1', 'Total Analysis: R2', 'Total Analysis: R3'],
    });

    const outcome = await runConsensus(service, {
      question,
      report: REPORT_V0,
      domains: ['Cardiology'],
      maxAttemptVote: 3,
    });

    expect(outcome.state).toBe('EXHAUSTED');
    expect(outcome.rounds).toBe(3);
    expect(outcome.voteHistory).toHaveLength(3);
    expect(outcome.voteHistory[2]).toEqual({ Cardiology: 'no' });
    expect(outcome.revisionHistory).toHaveLength(3);
    expect(outcome.reportHistory).toEqual([REPORT_V0, reportWith('R1'), reportWith('R2'), reportWith('R3')]);
    expect(outcome.report).toBe(reportWith('R3'));

    // Round 2 votes on the first revision
    const round2 = service.callsFor('S4_vote').filter(r => r.meta?.round === 2);
    expect(round2).toHaveLength(1);
    expect(round2[0].userInput).toContain('Total Analysis: R1');
  });

  it('skips consultation when the vote budget is 0', async () => {
    const service = new ScriptedService({ S4_vote: 'No' });

    const outcome = await runConsensus(service, { question, report: REPORT_V0, domains: ['Cardiology'], maxAttemptVote: 0 });

    expect(outcome).toEqual({
      state: 'EXHAUSTED',
      rounds: 0,
      report: REPORT_V0,
      voteHistory: [],
      revisionHistory: [],
      reportHistory: [REPORT_V0],
    });
    expect(service.requests).toHaveLength(0);
  });

  it('converges immediately with no domains', async () => {
    const service = new ScriptedService();

    const outcome = await runConsensus(service, { question, report: REPORT_V0, domains: [] });

    expect(outcome).toEqual({
      state: 'CONVERGED',
      rounds: 1,
      report: REPORT_V0,
      voteHistory: [{}],
      revisionHistory: [],
      reportHistory: [REPORT_V0],
    });
    expect(service.requests).toHaveLength(0);
  });

  it('records the last vote of a duplicated domain but still revises on its dissent', async () => {
    const service = new ScriptedService({
      S4_vote: ['No', 'Yes', 'Yes', 'Yes'],
      S4_advice: 'Check renal function.',
      S4_revision: 'Total Analysis: Start metformin if eGFR allows.',
    });

    const outcome = await runConsensus(service, {
      question,
      report: REPORT_V0,
      domains: ['Cardiology', 'Cardiology'],
      maxAttemptVote: 3,
    });

    expect(outcome.voteHistory).toEqual([{ Cardiology: 'yes' }, { Cardiology: 'yes' }]);
    expect(outcome.revisionHistory).toEqual([{ Cardiology: 'Check renal function.' }]);
    expect(outcome.state).toBe('CONVERGED');
    expect(outcome.rounds).toBe(2);
  });

  it('treats failed vote calls as agreement', async () => {
    const service = new ScriptedService();
    const outcome = await runConsensus(service, { question, report: REPORT_V0, domains: ['Cardiology'] });
    expect(outcome.voteHistory).toEqual([{ Cardiology: 'yes' }]);
    expect(outcome.state).toBe('CONVERGED');
  });

  it('keeps the vote record in domain order when votes run concurrently', async () => {
    const service = new ScriptedService({ S4_vote: 'Yes' });
    const outcome = await runConsensus(service, {
      question,
      report: REPORT_V0,
      domains: ['Neurology', 'Cardiology', 'Endocrinology'],
      concurrency: 3,
    });
    expect(Object.keys(outcome.voteHistory[0])).toEqual(['Neurology', 'Cardiology', 'Endocrinology']);
  });
});
