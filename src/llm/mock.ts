import type { GenerateOptions, LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"index":-1,"confidence":0,"reasoning":"mock"}';

export interface MockCall {
  systemPrompt: string;
  userPrompt: string;
  options: GenerateOptions | undefined;
}

export type MockResponder = (call: MockCall) => string | Promise<string>;

export interface MockLLMClient extends LLMClient {
  /** Every prompt the client has received, oldest first. */
  readonly calls: readonly MockCall[];
}

/**
 * Mock LLM provider for testing.
 * Either cycles through canned responses (falling back to a
 * "nothing matched" answer) or delegates to a responder function.
 */
export function createMockClient(
  responses?: readonly string[] | MockResponder,
): MockLLMClient {
  const calls: MockCall[] = [];

  return {
    calls,

    async generate(
      systemPrompt: string,
      userPrompt: string,
      options?: GenerateOptions,
    ): Promise<string> {
      const call: MockCall = { systemPrompt, userPrompt, options };
      const callIndex = calls.length;
      calls.push(call);

      if (typeof responses === 'function') {
        return responses(call);
      }
      return responses?.[callIndex] ?? DEFAULT_RESPONSE;
    },
  };
}
