import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';
import type { GenerateOptions, LLMClient } from './client.js';
import { RateLimitedError, parseRetryAfter, withRateLimitRetry } from './retry.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_TEMPERATURE = 0.1;

export interface OpenAIClientOptions {
  apiKey: string;
  model?: string;
  /** Any chat-completions compatible endpoint, e.g. a local gateway. */
  baseUrl?: string;
  timeoutMs?: number;
}

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});

function classify(err: unknown): RateLimitedError | null {
  return err instanceof RateLimitedError ? err : null;
}

export function createOpenAIClient(options: OpenAIClientOptions): LLMClient {
  const model = options.model ?? DEFAULT_MODEL;
  const url = `${(options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')}/chat/completions`;
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.ORACLE_REQUEST;

  async function post(body: string): Promise<unknown> {
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
      body,
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (response.status === 429) {
      throw new RateLimitedError('OpenAI', parseRetryAfter(response.headers.get('retry-after')));
    }
    if (!response.ok) {
      throw new Error(`OpenAI API error (${String(response.status)}): ${await response.text()}`);
    }
    return response.json();
  }

  return {
    async generate(systemPrompt: string, userPrompt: string, opts?: GenerateOptions): Promise<string> {
      const body = JSON.stringify({
        model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: opts?.temperature ?? DEFAULT_TEMPERATURE,
        ...(opts?.maxTokens !== undefined ? { max_tokens: opts.maxTokens } : {}),
        response_format: { type: 'json_object' },
      });

      const json = await withRateLimitRetry('OpenAI', () => post(body), classify);
      return chatResponseSchema.parse(json).choices[0].message.content;
    },
  };
}
