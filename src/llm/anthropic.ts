import Anthropic from '@anthropic-ai/sdk';

import { TIMEOUTS } from '../config/defaults.js';
import type { GenerateOptions, LLMClient } from './client.js';
import { RateLimitedError, withRateLimitRetry } from './retry.js';

const DEFAULT_MODEL = 'claude-3-5-haiku-latest';
const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_TEMPERATURE = 0.1;

export interface AnthropicClientOptions {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}

function classify(err: unknown): RateLimitedError | null {
  if (err instanceof Anthropic.RateLimitError) return new RateLimitedError('Anthropic');
  if (err instanceof Error && err.message.includes('429')) return new RateLimitedError('Anthropic');
  return null;
}

export function createAnthropicClient(options: AnthropicClientOptions): LLMClient {
  const model = options.model ?? DEFAULT_MODEL;
  // Retries are ours; the SDK's own would stack on top.
  const client = new Anthropic({
    apiKey: options.apiKey,
    maxRetries: 0,
    timeout: options.timeoutMs ?? TIMEOUTS.ORACLE_REQUEST,
  });

  return {
    async generate(systemPrompt: string, userPrompt: string, opts?: GenerateOptions): Promise<string> {
      const response = await withRateLimitRetry(
        'Anthropic',
        () =>
          client.messages.create({
            model,
            max_tokens: opts?.maxTokens ?? DEFAULT_MAX_TOKENS,
            system: systemPrompt,
            messages: [{ role: 'user', content: userPrompt }],
            temperature: opts?.temperature ?? DEFAULT_TEMPERATURE,
          }),
        classify,
      );

      const textBlock = response.content.find((block) => block.type === 'text');
      if (!textBlock || textBlock.type !== 'text') {
        throw new Error('Anthropic API returned no text content');
      }
      return textBlock.text;
    },
  };
}
