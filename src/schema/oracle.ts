import { z } from 'zod';

// ── Element selection ───────────────────────────────────────
// Only the index is load-bearing; the rest degrades to defaults
// so a sloppy answer still selects an element.

export const resolutionResultSchema = z.object({
  index: z.number().int(),
  confidence: z.number().optional().default(0),
  reasoning: z.string().optional().default(''),
});

export type ResolutionResult = z.infer<typeof resolutionResultSchema>;

// ── Scroll strategy ─────────────────────────────────────────

export const scrollStrategySchema = z.object({
  method: z.string().optional().default(''),
  selector: z.string().optional().default(''),
  script: z.string().min(1),
  explanation: z.string().optional().default(''),
});

export type ScrollStrategy = z.infer<typeof scrollStrategySchema>;
