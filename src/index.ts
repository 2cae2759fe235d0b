#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { ServiceFactory } from './batch.js';
import { LLMGenerationService } from './clients/llm.js';
import { AppConfig, loadConfig, requireLLMConfig } from './config.js';
import { DATASET_NAMES } from './datasets.js';
import {
  answerQuestion,
  auditEvidence,
  checkBatchStatus,
  evaluateResultsFile,
  formatEvidence,
  startBatchRun,
} from './tools.js';

// Note: process.env is populated by the MCP host at runtime from mcp.json
const config: AppConfig = loadConfig();

const server = new McpServer({
  name: 'medagents-mcp',
  version: '1.0.0',
});

// One shared service so usage totals cover the whole session
let sharedService: LLMGenerationService | null = null;

function getService(): LLMGenerationService {
  if (!sharedService) {
    sharedService = new LLMGenerationService(requireLLMConfig(config));
  }
  return sharedService;
}

// Batches get their own service so the call log hook stays per-run
const createBatchService: ServiceFactory = options => new LLMGenerationService(requireLLMConfig(config), options);

function textResult(payload: unknown) {
  return {
    content: [{ type: 'text' as const, text: typeof payload === 'string' ? payload : JSON.stringify(payload, null, 2) }],
  };
}

function errorResult(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  return {
    content: [{ type: 'text' as const, text: JSON.stringify({ error: message }, null, 2) }],
    isError: true,
  };
}

const evidenceInputs = {
  evidence_topk: z.number().int().optional().describe('Use the first K snippets; 0 or less means all. Default 5'),
  evidence_max_chars: z.number().int().positive().optional().describe('Hard cap on the formatted evidence block. Default 2500'),
  evidence_min_snip_chars: z.number().int().min(0).optional().describe('Drop snippets shorter than this after whitespace normalization. Default 80'),
  evidence_filter_mode: z.enum(['off', 'artifact_only']).optional().describe('artifact_only drops snippets that look like answered exam items'),
};

server.registerTool(
  'answer_question',
  {
    title: 'Answer a Medical Question by Multi-Expert Deliberation',
    description: `Runs the full five-stage deliberation for one question: domain routing, per-domain analyses, report synthesis, a vote/revise consensus loop, and a final decision.

**Returns** the result record as JSON: predicted label, domains, analyses, final report, vote and revision history, consensus state.

Optional evidence snippets are filtered and numbered [E1], [E2], ... and shown to the analysis stage only.
Expect roughly 20 generation calls per question.`,
    inputSchema: {
      question: z.string().min(1).describe('Question text'),
      options: z.record(z.string()).optional().describe('Option label → text, e.g. {"A": "Metformin", "B": "Insulin"}. Omit for free-text questions'),
      gold_answer: z.string().optional().describe('Reference label, stored in the record for scoring only; never shown to the model'),
      evidence: z.array(z.string()).optional().describe('Pre-retrieved evidence snippets, most relevant first'),
      max_attempt_vote: z.number().int().min(1).max(10).optional().describe('Consensus round budget. Default 3'),
      ...evidenceInputs,
    },
  },
  async (args) => {
    try {
      return textResult(await answerQuestion(args, config, getService()));
    } catch (error) {
      console.error('[Server] answer_question failed:', error);
      return errorResult(error);
    }
  }
);

server.registerTool(
  'format_evidence',
  {
    title: 'Preview Evidence Formatting',
    description: 'Applies the evidence gate to snippets and returns the exact block the analysis prompts would receive. An empty context means nothing survived and no evidence would be injected.',
    inputSchema: {
      snippets: z.array(z.string()).describe('Raw evidence snippets in rank order'),
      ...evidenceInputs,
    },
  },
  async (args) => textResult(formatEvidence(args, config))
);

server.registerTool(
  'start_batch_run',
  {
    title: 'Start a Batch Run (Async)',
    description: `Runs the deliberation over a slice of a dataset JSONL file in the background and appends one result line per question.

Returns a job_id immediately. Poll check_batch_status until status is "completed" or "failed".
Use dry_run to check wiring without any generation calls.`,
    inputSchema: {
      dataset_path: z.string().describe('Dataset JSONL file'),
      dataset_name: z.enum(DATASET_NAMES).describe('Dataset conventions to apply'),
      model_name: z.string().optional().describe('Run label for the output file name. Default: the configured model'),
      run_tag: z.string().optional().describe('Short tag appended to the output file name'),
      start_pos: z.number().int().min(0).optional().describe('First index. Default 0'),
      end_pos: z.number().int().min(-1).optional().describe('Exclusive end index; -1 means the whole dataset. Default -1'),
      output_dir: z.string().optional().describe('Where the results file goes. Default: RESULTS_DIR'),
      dry_run: z.boolean().optional().describe('Write stub records without generation calls'),
      evidence_json: z.string().optional().describe('Evidence cache JSON aligned with the dataset by index'),
      log_evidence: z.boolean().optional().describe('Store candidate and injected evidence blocks in each record'),
      log_calls: z.boolean().optional().describe('Write every prompt and output to a .log file beside the results'),
      ...evidenceInputs,
    },
  },
  async (args) => {
    try {
      return textResult(await startBatchRun(args, config, args.dry_run ? undefined : createBatchService));
    } catch (error) {
      console.error('[Server] start_batch_run failed:', error);
      return errorResult(error);
    }
  }
);

server.registerTool(
  'check_batch_status',
  {
    title: 'Check Batch Job Status',
    description: `Status of a job started with start_batch_run.

**Status values:**
- running: questions are being processed; progress shows completed/total
- completed: output_path names the results file
- failed: error is included`,
    inputSchema: {
      job_id: z.string().describe('The job_id returned from start_batch_run'),
    },
  },
  async ({ job_id }) => {
    try {
      const status = await checkBatchStatus(job_id);
      if (!status) {
        return {
          content: [{ type: 'text' as const, text: JSON.stringify({ error: 'Job not found', message: `No job with ID "${job_id}".` }, null, 2) }],
          isError: true,
        };
      }
      return textResult(status);
    } catch (error) {
      return errorResult(error);
    }
  }
);

server.registerTool(
  'evaluate_results',
  {
    title: 'Evaluate a Results File',
    description: 'Accuracy of a results JSONL against the gold labels stored in each record, overall and per meta_info.',
    inputSchema: {
      results_path: z.string().describe('Results JSONL written by a batch run'),
    },
  },
  async ({ results_path }) => {
    try {
      return textResult(await evaluateResultsFile(results_path));
    } catch (error) {
      return errorResult(error);
    }
  }
);

server.registerTool(
  'audit_evidence',
  {
    title: 'Audit Evidence Leakage',
    description: 'Measures how often an evidence cache contains answered-exam artifacts, the gold answer text, or option texts. Offline; no generation calls.',
    inputSchema: {
      dataset_path: z.string().describe('Dataset JSONL file'),
      evidence_json: z.string().describe('Evidence cache JSON aligned by index'),
      topk: z.number().int().optional().describe('Inspect only the first K snippets per record. Default 5'),
      results_path: z.string().optional().describe('Audit only the idx values present in this results file'),
      max_examples: z.number().int().min(0).optional().describe('Example indices to list per leak type. Default 5'),
    },
  },
  async (args) => {
    try {
      return textResult(await auditEvidence(args));
    } catch (error) {
      return errorResult(error);
    }
  }
);

// Start the server
async function main() {
  console.error('[Server] Starting medagents-mcp...');
  if (!config.llm) {
    console.error('[Server] No provider key configured; only offline tools will work');
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('[Server] Ready on stdio');
  console.error('[Server] Available tools: answer_question, format_evidence, start_batch_run, check_batch_status, evaluate_results, audit_evidence');

  const shutdown = () => {
    const usage = sharedService?.summary();
    if (usage?.calls) {
      console.error(`[Server] Session usage: calls=${usage.calls} tokens=${usage.totalTokens}`);
    }
    console.error('\n[Server] Shutting down...');
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[Server] Fatal error:', error);
  process.exit(1);
});
