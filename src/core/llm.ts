import { z } from 'zod';
import type { Logger } from 'pino';
import type { GuideConfig } from '../config/guide.js';
import { getFetch, isAbortError, type FetchLike } from '../util/fetch.js';
import type { ChatMessage } from './prompts.js';

export type LLMErrorCode = 'http' | 'timeout' | 'network' | 'bad_envelope' | 'empty_content';

export class LLMError extends Error {
  code: LLMErrorCode;
  status?: number;
  constructor(code: LLMErrorCode, message: string, status?: number) {
    super(message);
    this.name = 'LLMError';
    this.code = code;
    this.status = status;
  }
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string().optional(),
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

const ModelListSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

export type LLMClientConfig = Pick<GuideConfig, 'llmBaseUrl' | 'llmApiKey' | 'llmModel' | 'llmTemperature' | 'llmTimeoutMs'>;

export interface LLMCallOptions {
  config: LLMClientConfig;
  log?: Logger;
  fetchImpl?: FetchLike;
}

function endpoint(baseUrl: string, p: string): string {
  return `${baseUrl.replace(/\/$/, '')}${p}`;
}

// Simple token counter (approximate, for logs only)
function countTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

async function request(
  url: string,
  init: { method: string; body?: string },
  opts: LLMCallOptions,
): Promise<unknown> {
  const { config, log } = opts;
  const fetchImpl = opts.fetchImpl ?? getFetch();
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), config.llmTimeoutMs);

  try {
    const res = await fetchImpl(url, {
      method: init.method,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${config.llmApiKey}`,
      },
      body: init.body,
      signal: controller.signal,
    });
    if (!res.ok) {
      const errorText = await res.text().catch(() => '');
      log?.debug({ url, status: res.status, body: errorText.slice(0, 200) }, 'LLM endpoint error');
      throw new LLMError('http', `HTTP ${res.status}: ${errorText.slice(0, 100)}`, res.status);
    }
    const text = await res.text();
    try {
      return JSON.parse(text);
    } catch {
      throw new LLMError('bad_envelope', 'LLM endpoint returned non-JSON body');
    }
  } catch (err) {
    if (err instanceof LLMError) throw err;
    if (isAbortError(err)) throw new LLMError('timeout', `LLM request timed out after ${config.llmTimeoutMs}ms`);
    throw new LLMError('network', err instanceof Error ? err.message : String(err));
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Sends one chat completion in JSON-object mode and returns the message content.
 * No fallback models and no retry; the first failure is final.
 */
export async function chatCompletion(messages: ChatMessage[], opts: LLMCallOptions): Promise<string> {
  const { config, log } = opts;
  const body = {
    model: config.llmModel,
    messages,
    temperature: config.llmTemperature,
    response_format: { type: 'json_object' },
  };
  const inputTokens = countTokens(messages.map((m) => m.content).join('\n'));
  log?.debug({ model: config.llmModel, inputTokens }, 'LLM call');

  const start = Date.now();
  const payload = await request(endpoint(config.llmBaseUrl, '/chat/completions'), { method: 'POST', body: JSON.stringify(body) }, opts);
  const parsed = ChatCompletionSchema.safeParse(payload);
  if (!parsed.success) {
    throw new LLMError('bad_envelope', `Unexpected chat completion shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }

  const content = parsed.data.choices[0]?.message.content?.trim() ?? '';
  if (!content) throw new LLMError('empty_content', `Model ${config.llmModel} returned empty content`);

  log?.debug(
    {
      model: config.llmModel,
      latencyMs: Date.now() - start,
      outputTokens: countTokens(content),
      usage: parsed.data.usage,
    },
    'LLM call succeeded',
  );
  return content;
}

/** Lists model ids served by the endpoint (`GET /models`). */
export async function listModels(opts: LLMCallOptions): Promise<string[]> {
  const payload = await request(endpoint(opts.config.llmBaseUrl, '/models'), { method: 'GET' }, opts);
  const parsed = ModelListSchema.safeParse(payload);
  if (!parsed.success) throw new LLMError('bad_envelope', 'Unexpected model list shape');
  return parsed.data.data.map((m) => m.id);
}
