import { z } from 'zod';

import { CACHE, LIMITS, PATHS } from '../config/defaults.js';

// ── Cache block ─────────────────────────────────────────────

export const cacheConfigSchema = z.object({
  persistent: z.boolean().optional().default(true),
  path: z.string().min(1).optional().default(CACHE.DEFAULT_PATH),
});

export type CacheConfig = z.infer<typeof cacheConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  headless: z.boolean().optional().default(false),
  profileDir: z.string().min(1).optional(),
  screenshotDir: z.string().min(1).optional().default(PATHS.SCREENSHOT_DIR),
  cache: cacheConfigSchema.optional().default({}),
  catalogLimit: z.number().int().positive().optional().default(LIMITS.CATALOG_MAX_ELEMENTS),
  minConfidence: z.number().min(0).max(1).optional().default(LIMITS.MIN_CONFIDENCE),
  settleAfterActionMs: z.number().int().nonnegative().optional(),
  provider: z.enum(['anthropic', 'openai', 'mock']).optional(),
  model: z.string().min(1).optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
