import { z } from 'zod';

// ── Transport ────────────────────────────────────────────────

export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
}

/** One prompt in, raw model text out. The oracle does the parsing. */
export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string, options?: GenerateOptions): Promise<string>;
}

// ── Provider config ──────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

/**
 * Read provider settings from the environment:
 * WAYFIND_PROVIDER, WAYFIND_MODEL, WAYFIND_ORACLE_TIMEOUT_MS,
 * OPENAI_BASE_URL and the provider's API key variable.
 */
export function loadLLMConfig(env: NodeJS.ProcessEnv = process.env): LLMConfig {
  const provider = env['WAYFIND_PROVIDER'] ?? 'anthropic';
  const apiKey = provider === 'openai' ? env['OPENAI_API_KEY'] : env['ANTHROPIC_API_KEY'];

  return llmConfigSchema.parse({
    provider,
    apiKey: apiKey || undefined,
    model: env['WAYFIND_MODEL'] || undefined,
    baseUrl: (provider === 'openai' && env['OPENAI_BASE_URL']) || undefined,
    timeoutMs: env['WAYFIND_ORACLE_TIMEOUT_MS'] || undefined,
  });
}
