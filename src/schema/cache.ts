import { z } from 'zod';

// ── Cache entry ─────────────────────────────────────────────
// The locator plus enough of the element to tell whether the node
// it matches today is the node it matched when it was stored.

export const cacheEntrySchema = z.object({
  locator: z.string().min(1),
  tag: z.string().min(1),
  /** aria-label, else placeholder, else visible text. */
  label: z.string(),
  frameIndex: z.number().int().nonnegative(),
});

export type CacheEntry = z.infer<typeof cacheEntrySchema>;

// ── Cache document ──────────────────────────────────────────
// pageKey → description → entry

export const pageEntriesSchema = z.record(z.string(), cacheEntrySchema);

export const cachePagesSchema = z.record(z.string(), pageEntriesSchema);

export type CachePages = z.infer<typeof cachePagesSchema>;

export const cacheDocumentSchema = z.object({
  version: z.literal(2),
  pages: cachePagesSchema,
});

export type CacheDocument = z.infer<typeof cacheDocumentSchema>;

// ── Earlier layouts ─────────────────────────────────────────
// Both stored bare locators, which cannot be checked against the
// element they were chosen for.

const bareLocatorPagesSchema = z.record(z.string(), z.record(z.string(), z.string()));

export const cacheDocumentV1Schema = z.object({
  version: z.literal(1),
  pages: bareLocatorPagesSchema,
});

/** Unversioned flat layout written before the document carried a version. */
export const legacyCacheDocumentSchema = bareLocatorPagesSchema;

// ── Load status ─────────────────────────────────────────────

export type CacheLoadStatus =
  | { state: 'fresh' }
  | { state: 'loaded'; entries: number }
  | { state: 'migrated'; from: 'legacy' | 'v1'; dropped: number }
  | { state: 'reset'; reason: string };
