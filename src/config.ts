/**
 * Environment-backed configuration.
 *
 * The MCP host populates process.env from its server entry (mcp.json);
 * the CLI scripts read the shell environment.
 */

import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { LLMConfig } from './clients/llm.js';
import { EvidenceFormatConfig } from './types/index.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_EVIDENCE_CONFIG: Readonly<EvidenceFormatConfig> = {
  topk: 5,
  maxChars: 2500,
  minSnipChars: 80,
  filterMode: 'artifact_only',
};

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().optional().transform(v => v ?? fallback);

const envSchema = z.object({
  GENERATION_PROVIDER: z.enum(['openai', 'gemini', 'anthropic']).default('openai'),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL_NAME: z.string().min(1).optional(),
  GEMINI_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL_NAME: z.string().min(1).default('gemini-2.5-flash'),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  ANTHROPIC_MODEL_NAME: z.string().min(1).default('claude-3-5-haiku-latest'),
  LLM_TIMEOUT_MS: intFromEnv(60000),
  MAX_ATTEMPT_VOTE: intFromEnv(3).pipe(z.number().int().min(1)),
  DOMAIN_CONCURRENCY: intFromEnv(1).pipe(z.number().int().min(1)),
  QUESTION_CONCURRENCY: intFromEnv(1).pipe(z.number().int().min(1)),
  RESULTS_DIR: z.string().min(1).optional(),
  EVIDENCE_TOPK: intFromEnv(DEFAULT_EVIDENCE_CONFIG.topk),
  EVIDENCE_MAX_CHARS: intFromEnv(DEFAULT_EVIDENCE_CONFIG.maxChars),
  EVIDENCE_MIN_SNIP_CHARS: intFromEnv(DEFAULT_EVIDENCE_CONFIG.minSnipChars),
  EVIDENCE_FILTER_MODE: z.enum(['off', 'artifact_only']).default(DEFAULT_EVIDENCE_CONFIG.filterMode),
});

export interface AppConfig {
  llm?: LLMConfig;
  maxAttemptVote: number;
  domainConcurrency: number;
  questionConcurrency: number;
  resultsDir: string;
  evidence: EvidenceFormatConfig;
}

/**
 * Resolve the provider config; undefined when the selected provider has no key.
 * OpenAI additionally needs an explicit model name.
 */
function resolveLLMConfig(env: z.infer<typeof envSchema>): LLMConfig | undefined {
  const timeout = env.LLM_TIMEOUT_MS;
  switch (env.GENERATION_PROVIDER) {
    case 'openai':
      if (!env.OPENAI_API_KEY) return undefined;
      if (!env.OPENAI_MODEL_NAME) {
        throw new ConfigError('OPENAI_MODEL_NAME is required when GENERATION_PROVIDER=openai');
      }
      return { provider: 'openai', model: env.OPENAI_MODEL_NAME, apiKey: env.OPENAI_API_KEY, timeout };
    case 'gemini':
      if (!env.GEMINI_API_KEY) return undefined;
      return { provider: 'gemini', model: env.GEMINI_MODEL_NAME, apiKey: env.GEMINI_API_KEY, timeout };
    case 'anthropic':
      if (!env.ANTHROPIC_API_KEY) return undefined;
      return { provider: 'anthropic', model: env.ANTHROPIC_MODEL_NAME, apiKey: env.ANTHROPIC_API_KEY, timeout };
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;

  return {
    llm: resolveLLMConfig(e),
    maxAttemptVote: e.MAX_ATTEMPT_VOTE,
    domainConcurrency: e.DOMAIN_CONCURRENCY,
    questionConcurrency: e.QUESTION_CONCURRENCY,
    resultsDir: e.RESULTS_DIR ?? join(homedir(), 'medagents-results'),
    evidence: {
      topk: e.EVIDENCE_TOPK,
      maxChars: e.EVIDENCE_MAX_CHARS,
      minSnipChars: e.EVIDENCE_MIN_SNIP_CHARS,
      filterMode: e.EVIDENCE_FILTER_MODE,
    },
  };
}

/**
 * Provider config for runs that make calls; a missing key is an error here.
 */
export function requireLLMConfig(config: AppConfig): LLMConfig {
  if (!config.llm) {
    throw new ConfigError('No API key for the selected GENERATION_PROVIDER (set OPENAI_API_KEY, GEMINI_API_KEY or ANTHROPIC_API_KEY)');
  }
  return config.llm;
}
