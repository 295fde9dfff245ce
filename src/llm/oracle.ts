import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { z } from 'zod';

import type { LLMClient } from './client.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface ClassifyRequest {
  /** Template file name under prompts/. */
  template: string;
  /** Values substituted for `{{key}}` placeholders. */
  values: Readonly<Record<string, string>>;
  temperature?: number;
  /** Pre-validation repair for near-miss answers. */
  fixup?: (parsed: unknown) => unknown;
}

/**
 * The semantic-matching oracle.
 * Returns the validated answer, or null when nothing usable came back.
 * Transport failures propagate; callers decide how to degrade.
 */
export interface Oracle {
  classify<T>(
    request: ClassifyRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T | null>;
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

const SYSTEM_PROMPT =
  'You select targets on web pages for a browser automation tool. ' +
  'Reply with a single JSON object and nothing else.';

// ── JSON extraction ─────────────────────────────────────────

export function extractJSON(raw: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}

// ── Template rendering ───────────────────────────────────────

export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string>>,
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    values[key] ?? match,
  );
}

const templateCache = new Map<string, string>();

async function loadTemplate(name: string): Promise<string> {
  const cached = templateCache.get(name);
  if (cached !== undefined) return cached;

  const template = await readFile(path.join(PROMPTS_DIR, name), 'utf-8');
  templateCache.set(name, template);
  return template;
}

// ── Factory ──────────────────────────────────────────────────

export function createOracle(client: LLMClient): Oracle {
  return {
    async classify<T>(
      request: ClassifyRequest,
      schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    ): Promise<T | null> {
      const template = await loadTemplate(request.template);
      const prompt = renderTemplate(template, request.values);

      const raw = await client.generate(
        SYSTEM_PROMPT,
        prompt,
        request.temperature !== undefined ? { temperature: request.temperature } : {},
      );

      let parsed: unknown;
      try {
        parsed = JSON.parse(extractJSON(raw));
      } catch {
        log.warn(`Oracle returned invalid JSON: ${raw.slice(0, 200)}`);
        return null;
      }

      const fixed = request.fixup ? request.fixup(parsed) : parsed;
      const result = schema.safeParse(fixed);
      if (!result.success) {
        log.warn(`Oracle response validation failed: ${result.error.issues[0]?.message ?? 'unknown'}`);
        return null;
      }

      return result.data;
    },
  };
}
