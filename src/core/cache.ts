import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  cacheDocumentSchema,
  cacheDocumentV1Schema,
  legacyCacheDocumentSchema,
} from '../schema/index.js';
import type {
  CacheDocument,
  CacheEntry,
  CacheLoadStatus,
  CachePages,
  InteractiveElement,
} from '../schema/index.js';
import { CACHE } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Key normalization ───────────────────────────────────────

/**
 * Case-fold the address and drop one trailing slash. Query strings
 * stay: they often select a different layout.
 */
export function normalizePageKey(url: string): string {
  const lower = url.toLowerCase();
  return lower.endsWith('/') ? lower.slice(0, -1) : lower;
}

// ── Entries ─────────────────────────────────────────────────

function labelOf(element: InteractiveElement): string {
  return element.ariaLabel ?? element.placeholder ?? element.text;
}

export function cacheEntryFor(element: InteractiveElement): CacheEntry {
  return {
    locator: element.locator,
    tag: element.tag,
    label: labelOf(element),
    frameIndex: element.frameIndex,
  };
}

/** Same frame, same tag, same label: the node the entry was made for. */
export function entryDescribes(entry: CacheEntry, element: InteractiveElement): boolean {
  return (
    entry.frameIndex === element.frameIndex &&
    entry.tag === element.tag &&
    entry.label === labelOf(element)
  );
}

// ── Stores ──────────────────────────────────────────────────

export interface LoadedCache {
  pages: CachePages;
  status: CacheLoadStatus;
}

export interface CacheStore {
  load(): Promise<LoadedCache>;
  save(document: CacheDocument): Promise<void>;
}

/** Keeps nothing; the cache lives and dies with the process. */
export function createMemoryStore(): CacheStore {
  return {
    async load(): Promise<LoadedCache> {
      return { pages: {}, status: { state: 'fresh' } };
    },
    async save(): Promise<void> {
      // Nothing to persist
    },
  };
}

function countEntries(pages: Readonly<Record<string, Readonly<Record<string, unknown>>>>): number {
  return Object.values(pages).reduce(
    (total, entries) => total + Object.keys(entries).length,
    0,
  );
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Parse a stored cache document. The current version loads as-is.
 * Version 1 and the legacy flat layout hold bare locators with nothing
 * to verify them by, so they migrate to an empty cache. Anything else
 * resets to empty.
 */
export function parseCacheDocument(raw: string): LoadedCache {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { pages: {}, status: { state: 'reset', reason: 'invalid JSON' } };
  }

  const current = cacheDocumentSchema.safeParse(parsed);
  if (current.success) {
    return {
      pages: current.data.pages,
      status: { state: 'loaded', entries: countEntries(current.data.pages) },
    };
  }

  const v1 = cacheDocumentV1Schema.safeParse(parsed);
  if (v1.success) {
    return {
      pages: {},
      status: { state: 'migrated', from: 'v1', dropped: countEntries(v1.data.pages) },
    };
  }

  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
    return {
      pages: {},
      status: { state: 'reset', reason: `unsupported document version ${String(parsed.version)}` },
    };
  }

  const legacy = legacyCacheDocumentSchema.safeParse(parsed);
  if (legacy.success) {
    return {
      pages: {},
      status: { state: 'migrated', from: 'legacy', dropped: countEntries(legacy.data) },
    };
  }

  return { pages: {}, status: { state: 'reset', reason: 'unrecognized document shape' } };
}

/** Versioned JSON document on disk, rewritten after every change. */
export function createFileStore(filePath: string): CacheStore {
  return {
    async load(): Promise<LoadedCache> {
      let raw: string;
      try {
        raw = await readFile(filePath, 'utf-8');
      } catch (err) {
        if (isMissingFile(err)) {
          return { pages: {}, status: { state: 'fresh' } };
        }
        const msg = err instanceof Error ? err.message : String(err);
        return { pages: {}, status: { state: 'reset', reason: msg } };
      }
      return parseCacheDocument(raw);
    },

    async save(document: CacheDocument): Promise<void> {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, JSON.stringify(document, null, 2) + '\n', 'utf-8');
    },
  };
}

// ── LocatorCache ────────────────────────────────────────────

/**
 * (page key, description) → entry.
 *
 * Entries are never expired by time. Whoever reads an entry must
 * re-check it against the live page with `entryDescribes` and
 * `invalidate` it when the node it matches is not the one stored.
 */
export class LocatorCache {
  private readonly pages: Map<string, Map<string, CacheEntry>>;

  private constructor(
    private readonly store: CacheStore,
    pages: CachePages,
    readonly loadStatus: CacheLoadStatus,
  ) {
    this.pages = new Map(
      Object.entries(pages).map(([key, entries]) => [key, new Map(Object.entries(entries))]),
    );
  }

  static async open(store: CacheStore = createMemoryStore()): Promise<LocatorCache> {
    const { pages, status } = await store.load();

    if (status.state === 'reset') {
      log.warn(`Selector cache reset to empty: ${status.reason}`);
    } else if (status.state === 'migrated') {
      log.info(
        `Selector cache migrated to version ${String(CACHE.DOCUMENT_VERSION)} ` +
          `(${String(status.dropped)} unverifiable entries dropped)`,
      );
    }

    return new LocatorCache(store, pages, status);
  }

  get size(): number {
    let total = 0;
    for (const entries of this.pages.values()) total += entries.size;
    return total;
  }

  get(pageKey: string, description: string): CacheEntry | undefined {
    return this.pages.get(normalizePageKey(pageKey))?.get(description);
  }

  async put(pageKey: string, description: string, entry: CacheEntry): Promise<void> {
    const key = normalizePageKey(pageKey);
    let entries = this.pages.get(key);
    if (!entries) {
      entries = new Map();
      this.pages.set(key, entries);
    }
    entries.set(description, entry);
    await this.flush();
  }

  async invalidate(pageKey: string, description: string): Promise<void> {
    const key = normalizePageKey(pageKey);
    const entries = this.pages.get(key);
    if (!entries?.delete(description)) return;

    if (entries.size === 0) {
      this.pages.delete(key);
    }
    await this.flush();
  }

  toDocument(): CacheDocument {
    const pages: CachePages = {};
    for (const [key, entries] of this.pages) {
      pages[key] = Object.fromEntries(entries);
    }
    return { version: CACHE.DOCUMENT_VERSION, pages };
  }

  private async flush(): Promise<void> {
    try {
      await this.store.save(this.toDocument());
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.warn(`Selector cache not saved: ${msg}`);
    }
  }
}
