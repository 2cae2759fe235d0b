import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import { StageName } from '../types/index.js';

/**
 * Text returned by a generation call once every attempt has failed.
 * Stages compare against it and substitute their own fallback.
 */
export const GENERATION_FAILURE = 'ERROR.';

export const DEFAULT_MAX_ATTEMPTS = 3;

export type LLMProvider = 'gemini' | 'openai' | 'anthropic';

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  timeout?: number;  // Timeout in milliseconds (default: 60000)
}

export interface GenerationRequest {
  stage: StageName;
  systemRole: string;
  userInput: string;
  maxTokens: number;
  temperature?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stop?: string[];
  /** Free-form labels for call logs, e.g. { domain: 'Cardiology', round: 2 } */
  meta?: Record<string, string | number>;
}

/**
 * The single capability every stage receives. Implementations own retries and
 * must resolve to GENERATION_FAILURE instead of rejecting.
 */
export interface GenerationService {
  call(request: GenerationRequest): Promise<string>;
  /** Totals so far, where the implementation tracks them */
  summary?(): UsageSummary;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CallLogEntry {
  callNo: number;
  attempt: number;
  model: string;
  stage: StageName;
  meta: Record<string, string | number>;
  maxTokens: number;
  temperature: number;
  durationSeconds: number;
  tokens?: TokenUsage;
  prompt: { system: string; user: string };
  output: string;
}

export interface UsageSummary {
  calls: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  wallSeconds: number;
}

export class LLMError extends Error {
  constructor(
    message: string,
    public readonly model: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'LLMError';
  }
}

interface ProviderReply {
  content: string;
  usage?: TokenUsage;
}

const openAIResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }).optional(),
  })).optional(),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number(),
  }).optional(),
});

const geminiResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).optional(),
    }).optional(),
  })).optional(),
  usageMetadata: z.object({
    promptTokenCount: z.number().optional(),
    candidatesTokenCount: z.number().optional(),
    totalTokenCount: z.number().optional(),
  }).optional(),
});

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).optional(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }).optional(),
});

async function postJSON(url: string, headers: Record<string, string>, body: unknown, timeout: number, label: string): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`${label} API error: ${response.status} ${response.statusText}`);
    }

    return await response.json();
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Call OpenAI chat completions with a system + user message pair
 */
async function callOpenAI(request: GenerationRequest, config: LLMConfig, timeout: number): Promise<ProviderReply> {
  const data = openAIResponseSchema.parse(await postJSON(
    'https://api.openai.com/v1/chat/completions',
    { Authorization: `Bearer ${config.apiKey}` },
    {
      model: config.model,
      messages: [
        { role: 'system', content: request.systemRole },
        { role: 'user', content: request.userInput },
      ],
      max_tokens: request.maxTokens,
      temperature: request.temperature ?? 0,
      top_p: 1,
      frequency_penalty: request.frequencyPenalty ?? 0,
      presence_penalty: request.presencePenalty ?? 0,
      ...(request.stop?.length ? { stop: request.stop } : {}),
    },
    timeout,
    'OpenAI'
  ));

  return {
    content: data.choices?.[0]?.message?.content ?? '',
    usage: data.usage
      ? {
          promptTokens: data.usage.prompt_tokens,
          completionTokens: data.usage.completion_tokens,
          totalTokens: data.usage.total_tokens,
        }
      : undefined,
  };
}

/**
 * Call Gemini generateContent; the system role goes into systemInstruction
 */
async function callGemini(request: GenerationRequest, config: LLMConfig, timeout: number): Promise<ProviderReply> {
  const url = `https://generativelanguage.googleapis.com/v1beta/models/${config.model}:generateContent?key=${config.apiKey}`;
  const data = geminiResponseSchema.parse(await postJSON(
    url,
    {},
    {
      ...(request.systemRole ? { systemInstruction: { parts: [{ text: request.systemRole }] } } : {}),
      contents: [{ role: 'user', parts: [{ text: request.userInput }] }],
      generationConfig: {
        temperature: request.temperature ?? 0,
        maxOutputTokens: request.maxTokens,
        ...(request.stop?.length ? { stopSequences: request.stop } : {}),
        ...(request.frequencyPenalty ? { frequencyPenalty: request.frequencyPenalty } : {}),
        ...(request.presencePenalty ? { presencePenalty: request.presencePenalty } : {}),
      },
    },
    timeout,
    'Gemini'
  ));

  const meta = data.usageMetadata;
  return {
    content: data.candidates?.[0]?.content?.parts?.map(p => p.text ?? '').join('') ?? '',
    usage: meta
      ? {
          promptTokens: meta.promptTokenCount ?? 0,
          completionTokens: meta.candidatesTokenCount ?? 0,
          totalTokens: meta.totalTokenCount ?? 0,
        }
      : undefined,
  };
}

/**
 * Call Anthropic messages. Penalties are not supported by this API and are dropped.
 */
async function callAnthropic(request: GenerationRequest, config: LLMConfig, timeout: number): Promise<ProviderReply> {
  const data = anthropicResponseSchema.parse(await postJSON(
    'https://api.anthropic.com/v1/messages',
    { 'x-api-key': config.apiKey, 'anthropic-version': '2023-06-01' },
    {
      model: config.model,
      ...(request.systemRole ? { system: request.systemRole } : {}),
      messages: [{ role: 'user', content: request.userInput }],
      max_tokens: request.maxTokens,
      temperature: request.temperature ?? 0,
      ...(request.stop?.length ? { stop_sequences: request.stop } : {}),
    },
    timeout,
    'Anthropic'
  ));

  return {
    content: data.content?.filter(block => block.type === 'text').map(block => block.text ?? '').join('') ?? '',
    usage: data.usage
      ? {
          promptTokens: data.usage.input_tokens,
          completionTokens: data.usage.output_tokens,
          totalTokens: data.usage.input_tokens + data.usage.output_tokens,
        }
      : undefined,
  };
}

function callProvider(request: GenerationRequest, config: LLMConfig, timeout: number): Promise<ProviderReply> {
  switch (config.provider) {
    case 'openai':
      return callOpenAI(request, config, timeout);
    case 'gemini':
      return callGemini(request, config, timeout);
    case 'anthropic':
      return callAnthropic(request, config, timeout);
  }
}

export interface GenerationServiceOptions {
  maxAttempts?: number;
  /** Delay before retry n (1-based) is `retryDelayMs * n`. Default 1000. */
  retryDelayMs?: number;
  /** Receives the full prompt/output record of every completed call */
  onCall?: (entry: CallLogEntry) => void;
}

/**
 * Generation service backed by one provider model.
 * Retries transient failures and resolves to GENERATION_FAILURE when exhausted.
 */
export class LLMGenerationService implements GenerationService {
  private callCount = 0;
  private readonly usage: UsageSummary = { calls: 0, promptTokens: 0, completionTokens: 0, totalTokens: 0, wallSeconds: 0 };
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly config: LLMConfig,
    private readonly options: GenerationServiceOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  get model(): string {
    return this.config.model;
  }

  async call(request: GenerationRequest): Promise<string> {
    const timeout = this.config.timeout || 60000;
    const temperature = request.temperature ?? 0;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      this.callCount++;
      const callNo = this.callCount;
      const start = Date.now();
      console.error(
        `[LLM] ${request.stage} call#${callNo} attempt=${attempt}/${this.maxAttempts} model=${this.config.model} ` +
        `max_tokens=${request.maxTokens} temp=${temperature} chars(system=${request.systemRole.length},user=${request.userInput.length})`
      );

      try {
        const reply = await callProvider(request, this.config, timeout);
        const durationSeconds = (Date.now() - start) / 1000;
        this.recordUsage(durationSeconds, reply.usage);

        // A reply without text is not retried; the stage fallback covers it
        const output = reply.content ? reply.content : GENERATION_FAILURE;
        console.error(
          `[LLM] call#${callNo} done in ${durationSeconds.toFixed(2)}s ` +
          (reply.usage
            ? `tokens(prompt=${reply.usage.promptTokens},completion=${reply.usage.completionTokens},total=${reply.usage.totalTokens})`
            : 'tokens(usage=missing)')
        );

        this.options.onCall?.({
          callNo,
          attempt,
          model: this.config.model,
          stage: request.stage,
          meta: request.meta ?? {},
          maxTokens: request.maxTokens,
          temperature,
          durationSeconds: Math.round(durationSeconds * 10000) / 10000,
          tokens: reply.usage,
          prompt: { system: request.systemRole, user: request.userInput },
          output,
        });
        return output;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[LLM] ${this.config.model} failed (attempt ${attempt}/${this.maxAttempts}): ${message}`);
        if (attempt < this.maxAttempts && this.retryDelayMs > 0) {
          await sleep(this.retryDelayMs * attempt);
        }
      }
    }

    return GENERATION_FAILURE;
  }

  summary(): UsageSummary {
    return { ...this.usage };
  }

  private recordUsage(durationSeconds: number, usage?: TokenUsage): void {
    this.usage.calls++;
    this.usage.wallSeconds += durationSeconds;
    if (usage) {
      this.usage.promptTokens += usage.promptTokens;
      this.usage.completionTokens += usage.completionTokens;
      this.usage.totalTokens += usage.totalTokens;
    }
  }
}

/**
 * Single call that throws instead of degrading; used for provider checks only.
 */
export async function probeProvider(config: LLMConfig): Promise<string> {
  try {
    const reply = await callProvider(
      { stage: 'S5_final', systemRole: '', userInput: 'Reply with OK.', maxTokens: 5 },
      config,
      config.timeout || 60000
    );
    return reply.content;
  } catch (error) {
    throw new LLMError(
      `Provider check failed: ${error instanceof Error ? error.message : String(error)}`,
      config.model,
      error
    );
  }
}
