/**
 * Synthesis Tests
 *
 * Run with: npm run test
 */

import { describe, it, expect } from 'vitest';
import { synthesizeReport } from '../synthesis.js';
import { Question } from '../types/index.js';
import { ScriptedService } from './helpers/scripted-service.js';

const question: Question = {
  text: 'Which drug lowers hepatic glucose output?',
  options: { A: 'Metformin', B: 'Insulin' },
  goldAnswer: 'A',
};

const questionAnalyses = [{ domain: 'Endocrinology', analysis: 'Biguanides act on the liver.' }];
const optionAnalyses = [
  { domain: 'Pharmacology', analysis: 'Metformin inhibits gluconeogenesis.' },
  { domain: 'Nephrology', analysis: 'Check renal function first.' },
];

describe('synthesizeReport', () => {
  it('builds report version 0 from the reply', async () => {
    const service = new ScriptedService({ S3_synth_report: 'Key Knowledge: Metformin acts on the liver.\nTotal Analysis: A fits.' });

    const report = await synthesizeReport(service, question, questionAnalyses, optionAnalyses, { idx: 7 });

    expect(report).toBe(
      'Question: Which drug lowers hepatic glucose output? \n' +
        'Options: {"A":"Metformin","B":"Insulin"} \n' +
        'Key Knowledge: Metformin acts on the liver. \n' +
        'Total Analysis: A fits. \n'
    );
    expect(service.requests[0]).toMatchObject({ stage: 'S3_synth_report', maxTokens: 2500, temperature: 0, meta: { idx: 7 } });
  });

  it('lists every analysis in the prompt', async () => {
    const service = new ScriptedService({ S3_synth_report: 'Total Analysis: A.' });
    await synthesizeReport(service, question, questionAnalyses, optionAnalyses);

    const prompt = service.requests[0].userInput;
    expect(prompt).toContain('(A) Metformin\n(B) Insulin');
    expect(prompt).toContain('**Question analyses:**\n- Endocrinology expert: Biguanides act on the liver.');
    expect(prompt).toContain(
      '**Option analyses:**\n- Pharmacology expert: Metformin inhibits gluconeogenesis.\n- Nephrology expert: Check renal function first.'
    );
  });

  it('falls back to the no-report text on a failed call', async () => {
    const report = await synthesizeReport(new ScriptedService(), question, [], []);
    expect(report).toBe(
      'Question: Which drug lowers hepatic glucose output? \n' +
        'Options: {"A":"Metformin","B":"Insulin"} \n' +
        'Total Analysis: There is no synthesized report. \n'
    );
  });
});
