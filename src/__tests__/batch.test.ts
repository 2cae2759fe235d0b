/**
 * Batch Runner Tests
 *
 * Runs small datasets from a temp directory against a scripted service.
 *
 * Run with: npm run test
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { batchOutputFilename, runBatch, runTimestamp, sanitizeRunTag, ServiceFactory } from '../batch.js';
import { GenerationServiceOptions } from '../clients/llm.js';
import { parseJsonl } from '../datasets.js';
import { ScriptedService, StageScript } from './helpers/scripted-service.js';

const RUN_DATE = new Date(2025, 0, 2, 3, 4, 5);

const CLINICAL = 'Beta blockers reduce mortality after myocardial infarction in most patients.';

const script: StageScript = {
  S1_question_domain: 'Medical Field: Cardiology',
  S1_options_domain: 'Medical Field: Pharmacology',
  S2_question_analysis: 'Question analysis.',
  S2_options_analysis: 'Option analysis.',
  S3_synth_report: 'Key Knowledge: K\nTotal Analysis: T',
  S4_vote: 'Yes',
  S5_final: 'Rationale: r\nAnswer: B',
};

const rows = [
  { question: 'Which drug reduces mortality after MI', options: { A: 'Digoxin', B: 'Metoprolol' }, answer_idx: 'B', meta_info: 'step2&3' },
  { question: 'Which drug is contraindicated in asthma?', options: { A: 'Metoprolol', B: 'Amlodipine' }, answer_idx: 'A', meta_info: 'step1' },
  { question: 'Which electrolyte causes peaked T waves?', options: { A: 'Potassium', B: 'Sodium' }, answer_idx: 'A', meta_info: 'step1' },
];

// ============================================================================
// File naming
// ============================================================================

describe('batch output naming', () => {
  it('formats the local run timestamp', () => {
    expect(runTimestamp(RUN_DATE)).toBe('20250102_030405');
  });

  it('sanitizes and caps run tags', () => {
    expect(sanitizeRunTag('  ev topk/5! ')).toBe('evtopk5');
    expect(sanitizeRunTag('x'.repeat(50))).toHaveLength(40);
  });

  it('names the output after model, tag and range', () => {
    expect(batchOutputFilename('gpt-4o-mini', 0, -1, RUN_DATE, 'ev topk/5!')).toBe(
      'gpt-4o-mini-evtopk5-s0-eall-20250102_030405.jsonl'
    );
    expect(batchOutputFilename('gpt-4o-mini', 10, 20, RUN_DATE)).toBe('gpt-4o-mini-s10-e20-20250102_030405.jsonl');
  });
});

// ============================================================================
// Runs
// ============================================================================

describe('runBatch', () => {
  let dir: string;
  let datasetPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'medagents-batch-'));
    datasetPath = join(dir, 'test.jsonl');
    await writeFile(datasetPath, rows.map(r => JSON.stringify(r)).join('\n') + '\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function readLines(path: string): Promise<unknown[]> {
    return parseJsonl(await readFile(path, 'utf-8'));
  }

  it('writes stub records on a dry run', async () => {
    const result = await runBatch({
      datasetPath,
      datasetName: 'MedQA',
      modelName: 'test',
      startPos: 1,
      endPos: 3,
      outputDir: join(dir, 'out'),
      dryRun: true,
      now: RUN_DATE,
    });

    expect(result).toEqual({
      outputPath: join(dir, 'out', 'test-s1-e3-20250102_030405.jsonl'),
      total: 2,
      failed: 0,
    });
    expect(await readLines(result.outputPath)).toEqual([
      {
        idx: 1,
        question: 'Which drug is contraindicated in asthma?',
        options: { A: 'Metoprolol', B: 'Amlodipine' },
        pred_answer: '',
        gold_answer: 'A',
        meta_info: 'step1',
        raw_output: 'DRY_RUN',
      },
      {
        idx: 2,
        question: 'Which electrolyte causes peaked T waves?',
        options: { A: 'Potassium', B: 'Sodium' },
        pred_answer: '',
        gold_answer: 'A',
        meta_info: 'step1',
        raw_output: 'DRY_RUN',
      },
    ]);
  });

  it('clamps the range to the dataset', async () => {
    const result = await runBatch({
      datasetPath,
      datasetName: 'MedQA',
      modelName: 'test',
      startPos: 2,
      endPos: 50,
      outputDir: dir,
      dryRun: true,
      now: RUN_DATE,
    });
    expect(result.total).toBe(1);
  });

  it('runs every question and records evidence use', async () => {
    const evidencePath = join(dir, 'evidence.json');
    await writeFile(evidencePath, JSON.stringify([
      { evidence: [CLINICAL] },
      { evidence: ['Option A: short'] },
    ]));

    const progress: Array<[number, number]> = [];
    const service = new ScriptedService(script);
    const result = await runBatch(
      {
        datasetPath,
        datasetName: 'MedQA',
        modelName: 'test',
        endPos: 2,
        outputDir: dir,
        evidencePath,
        evidenceConfig: { topk: 5, maxChars: 2500, minSnipChars: 20, filterMode: 'artifact_only' },
        logEvidence: true,
        onProgress: (completed, total) => progress.push([completed, total]),
        now: RUN_DATE,
      },
      () => service
    );

    expect(result).toMatchObject({ total: 2, failed: 0, logPath: undefined, usage: undefined });
    expect(progress).toEqual([[1, 2], [2, 2]]);

    const [first, second] = await readLines(result.outputPath);
    expect(first).toMatchObject({
      idx: 0,
      question: 'Which drug reduces mortality after MI?',
      pred_answer: 'B',
      gold_answer: 'B',
      meta_info: 'step2&3',
      consensus_state: 'CONVERGED',
      evidence_enabled: true,
      evidence_injected: true,
      evidence_json: evidencePath,
      evidence_params: { topk: 5, max_chars: 2500, min_snip_chars: 20, filter_mode: 'artifact_only' },
      evidence_candidate_context: `[E1] ${CLINICAL}`,
      evidence_used_context: `[E1] ${CLINICAL}`,
    });
    expect(second).toMatchObject({ idx: 1, evidence_injected: false, evidence_candidate_context: '' });

    // Evidence reaches the analysis prompts of question 0 only
    const grounded = service.requests.filter(r => r.userInput.includes(CLINICAL));
    expect(grounded.every(r => r.meta?.idx === 0 && r.stage.startsWith('S2_'))).toBe(true);
    expect(grounded).toHaveLength(2);
  });

  it('records a failed question and carries on', async () => {
    const service = new ScriptedService({
      ...script,
      S1_question_domain: request => {
        if (request.meta?.idx === 1) throw new Error('provider exploded');
        return 'Medical Field: Cardiology';
      },
    });

    const result = await runBatch(
      { datasetPath, datasetName: 'MedQA', modelName: 'test', outputDir: dir, now: RUN_DATE },
      () => service
    );

    expect(result.total).toBe(3);
    expect(result.failed).toBe(1);
    const lines = await readLines(result.outputPath);
    expect(lines).toHaveLength(3);
    expect(lines[1]).toEqual({
      idx: 1,
      question: 'Which drug is contraindicated in asthma?',
      options: { A: 'Metoprolol', B: 'Amlodipine' },
      pred_answer: '',
      gold_answer: 'A',
      meta_info: 'step1',
      error: 'provider exploded',
    });
    expect(lines[2]).toMatchObject({ idx: 2, pred_answer: 'B' });
  });

  it('keeps question order with concurrent questions', async () => {
    const result = await runBatch(
      { datasetPath, datasetName: 'MedQA', modelName: 'test', outputDir: dir, questionConcurrency: 3, now: RUN_DATE },
      () => new ScriptedService(script)
    );
    const lines = await readLines(result.outputPath);
    expect(lines.map(line => (line && typeof line === 'object' && 'idx' in line ? line.idx : undefined))).toEqual([0, 1, 2]);
  });

  it('installs a call log when asked', async () => {
    let received: GenerationServiceOptions | undefined;
    const factory: ServiceFactory = options => {
      received = options;
      const scripted = new ScriptedService(script);
      return {
        async call(request) {
          const output = await scripted.call(request);
          options.onCall?.({
            callNo: scripted.requests.length,
            attempt: 1,
            model: 'test',
            stage: request.stage,
            meta: request.meta ?? {},
            maxTokens: request.maxTokens,
            temperature: request.temperature ?? 0,
            durationSeconds: 0,
            prompt: { system: request.systemRole, user: request.userInput },
            output,
          });
          return output;
        },
      };
    };

    const result = await runBatch(
      { datasetPath, datasetName: 'MedQA', modelName: 'test', endPos: 1, outputDir: dir, logCalls: true, now: RUN_DATE },
      factory
    );

    expect(received?.onCall).toBeTypeOf('function');
    expect(result.logPath).toBe(join(dir, 'test-s0-e1-20250102_030405.log'));
    const entries = parseJsonl(await readFile(join(dir, 'test-s0-e1-20250102_030405.log'), 'utf-8'));
    // 2 routing + 1 + 1 analyses + 1 synthesis + 2 votes + 1 final
    expect(entries).toHaveLength(8);
    expect(entries[0]).toMatchObject({ callNo: 1, stage: 'S1_question_domain', meta: { idx: 0 } });
  });

  it('needs a service factory unless it is a dry run', async () => {
    await expect(
      runBatch({ datasetPath, datasetName: 'MedQA', modelName: 'test', outputDir: dir, now: RUN_DATE })
    ).rejects.toThrow('runBatch needs a generation service unless dryRun is set');
  });
});
