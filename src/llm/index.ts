/**
 * Oracle transport: provider clients behind one `LLMClient` shape,
 * and the oracle that turns their replies into validated answers.
 */

import type { LLMClient, LLMConfig } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export type { AnthropicClientOptions } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export type { OpenAIClientOptions } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockCall, MockLLMClient, MockResponder } from './mock.js';
export { RateLimitedError, withRateLimitRetry } from './retry.js';
export { createOracle, extractJSON, renderTemplate } from './oracle.js';
export type { Oracle, ClassifyRequest } from './oracle.js';

function requireKey(config: LLMConfig, variable: string): string {
  if (!config.apiKey) {
    throw new Error(`${variable} is required when using the ${config.provider} provider`);
  }
  return config.apiKey;
}

export function createLLMClient(config: LLMConfig): LLMClient {
  const shared = {
    ...(config.model !== undefined ? { model: config.model } : {}),
    ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
  };

  switch (config.provider) {
    case 'anthropic':
      return createAnthropicClient({ apiKey: requireKey(config, 'ANTHROPIC_API_KEY'), ...shared });
    case 'openai':
      return createOpenAIClient({
        apiKey: requireKey(config, 'OPENAI_API_KEY'),
        ...shared,
        ...(config.baseUrl !== undefined ? { baseUrl: config.baseUrl } : {}),
      });
    case 'mock':
      return createMockClient();
  }
}
