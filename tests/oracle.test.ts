import { describe, it, expect } from 'vitest';

import { loadLLMConfig } from '../src/llm/client.js';
import { createLLMClient } from '../src/llm/index.js';
import { createMockClient } from '../src/llm/mock.js';
import { createOracle, extractJSON, renderTemplate } from '../src/llm/oracle.js';
import { resolutionResultSchema } from '../src/schema/index.js';

const MATCH = {
  template: 'element_matcher.txt',
  values: { description: 'the submit button', elements: '[0] button "Submit" pos=(10,20)' },
};

describe('extractJSON', () => {
  it('unwraps fenced blocks', () => {
    expect(extractJSON('Here you go:\n```json\n{"index": 2}\n```')).toBe('{"index": 2}');
  });

  it('cuts the outermost braces out of prose', () => {
    expect(extractJSON('The answer is {"index": 1, "meta": {"a": 1}} as requested.')).toBe(
      '{"index": 1, "meta": {"a": 1}}',
    );
  });

  it('returns other text trimmed', () => {
    expect(extractJSON('  no json here  ')).toBe('no json here');
  });
});

describe('renderTemplate', () => {
  it('substitutes known keys and leaves unknown ones', () => {
    expect(renderTemplate('Find {{description}} in {{scope}}', { description: 'the logo' })).toBe(
      'Find the logo in {{scope}}',
    );
  });
});

describe('createOracle', () => {
  it('renders the template and validates the answer', async () => {
    const client = createMockClient(['```json\n{"index": 0}\n```']);
    const oracle = createOracle(client);

    const answer = await oracle.classify(MATCH, resolutionResultSchema);

    expect(answer).toEqual({ index: 0, confidence: 0, reasoning: '' });
    expect(client.calls[0]?.userPrompt).toContain('"the submit button"');
    expect(client.calls[0]?.userPrompt).toContain('[0] button "Submit" pos=(10,20)');
    expect(client.calls[0]?.options).toEqual({});
  });

  it('returns null for invalid JSON', async () => {
    const oracle = createOracle(createMockClient(['I think it is the first one.']));

    expect(await oracle.classify(MATCH, resolutionResultSchema)).toBeNull();
  });

  it('returns null when the answer has no usable index', async () => {
    const oracle = createOracle(createMockClient(['{"index": "first", "confidence": 0.9}']));

    expect(await oracle.classify(MATCH, resolutionResultSchema)).toBeNull();
  });

  it('applies the fixup before validation', async () => {
    const oracle = createOracle(createMockClient(['{"choice": 3}']));

    const answer = await oracle.classify(
      {
        ...MATCH,
        fixup: (parsed) =>
          typeof parsed === 'object' && parsed !== null && 'choice' in parsed
            ? { index: parsed.choice }
            : parsed,
      },
      resolutionResultSchema,
    );

    expect(answer).toEqual({ index: 3, confidence: 0, reasoning: '' });
  });

  it('lets transport errors through', async () => {
    const oracle = createOracle(
      createMockClient(() => {
        throw new Error('429 Too Many Requests');
      }),
    );

    await expect(oracle.classify(MATCH, resolutionResultSchema)).rejects.toThrow('429 Too Many Requests');
  });
});

describe('loadLLMConfig', () => {
  it('defaults to the anthropic provider', () => {
    expect(loadLLMConfig({ ANTHROPIC_API_KEY: 'test-secret' })).toEqual({
      provider: 'anthropic',
      apiKey: 'test-secret',
    });
  });

  it('reads the key that belongs to the chosen provider', () => {
    expect(
      loadLLMConfig({
        WAYFIND_PROVIDER: 'openai',
        OPENAI_API_KEY: 'test-openai-key',
        ANTHROPIC_API_KEY: 'test-secret',
        WAYFIND_MODEL: 'test-model',
      }),
    ).toEqual({ provider: 'openai', apiKey: 'test-openai-key', model: 'test-model' });
  });

  it('rejects unknown providers', () => {
    expect(() => loadLLMConfig({ WAYFIND_PROVIDER: 'carrier-pigeon' })).toThrow();
  });
});

describe('createLLMClient', () => {
  it('requires an API key for remote providers', () => {
    expect(() => createLLMClient({ provider: 'anthropic' })).toThrow(
      'ANTHROPIC_API_KEY is required when using the anthropic provider',
    );
    expect(() => createLLMClient({ provider: 'openai' })).toThrow(
      'OPENAI_API_KEY is required when using the openai provider',
    );
  });

  it('builds the mock provider without a key', async () => {
    const client = createLLMClient({ provider: 'mock' });

    expect(await client.generate('system', 'user')).toBe('{"index":-1,"confidence":0,"reasoning":"mock"}');
  });
});
