import type { PageDriver } from '../browser/driver.js';
import type { Oracle } from '../llm/oracle.js';
import { resolutionResultSchema } from '../schema/index.js';
import type {
  CacheEntry,
  ExtractionSnapshot,
  InteractiveElement,
  ResolutionResult,
} from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { cacheEntryFor, entryDescribes } from './cache.js';
import type { LocatorCache } from './cache.js';
import { formatCatalog, frameElementExtractor } from './extractor.js';
import type { ElementExtractor } from './extractor.js';

// ── Public types ─────────────────────────────────────────────

export type Resolution =
  | { kind: 'found'; element: InteractiveElement; source: 'cache' | 'oracle' }
  | { kind: 'not_found'; reason: string };

export interface ResolverConfig {
  oracle: Oracle;
  cache: LocatorCache;
  extractor?: ElementExtractor;
  catalogLimit?: number;
  minConfidence?: number;
}

export interface Resolver {
  resolve(page: PageDriver, description: string): Promise<Resolution>;
  /** The resolved locator, or a "Could not find" line. */
  findLocator(page: PageDriver, description: string): Promise<string>;
  /** Drop the cached locator for this description on the current page. */
  forget(page: PageDriver, description: string): Promise<void>;
}

const MATCHER_TEMPLATE = 'element_matcher.txt';
const MATCHER_TEMPERATURE = 0.1;

// ── Pre-validation fixups ────────────────────────────────────
// Some models answer with a string index or a 0–100 confidence.

function fixupResolution(parsed: unknown): unknown {
  if (typeof parsed !== 'object' || parsed === null) return parsed;
  const obj = parsed as Record<string, unknown>;

  const index = obj['index'];
  if (typeof index === 'string' && /^-?\d+$/.test(index.trim())) {
    obj['index'] = Number(index.trim());
  }

  const confidence = obj['confidence'];
  if (typeof confidence === 'number') {
    const scaled = confidence > 1 && confidence <= 100 ? confidence / 100 : confidence;
    obj['confidence'] = Math.max(0, Math.min(1, scaled));
  }

  return parsed;
}

// ── Cache validation ────────────────────────────────────────

/**
 * A cached entry is trusted only if its locator names a node in the
 * current catalog, that node is the element the entry was stored for,
 * and the locator still matches it live.
 */
async function validateCached(
  page: PageDriver,
  snapshot: ExtractionSnapshot,
  entry: CacheEntry,
): Promise<InteractiveElement | undefined> {
  const element = snapshot.elements.find(
    (el) => el.locator === entry.locator && el.frameIndex === entry.frameIndex,
  );
  if (!element || !entryDescribes(entry, element)) return undefined;

  const live = await page
    .locate(entry.locator, element.frameIndex)
    .count()
    .catch(() => 0);

  return live > 0 ? element : undefined;
}

// ── Factory ──────────────────────────────────────────────────

export function createResolver(config: ResolverConfig): Resolver {
  const { oracle, cache } = config;
  const extractor = config.extractor ?? frameElementExtractor;
  const catalogLimit = config.catalogLimit ?? LIMITS.CATALOG_MAX_ELEMENTS;
  const minConfidence = config.minConfidence ?? LIMITS.MIN_CONFIDENCE;

  async function askOracle(
    snapshot: ExtractionSnapshot,
    description: string,
  ): Promise<Resolution> {
    const catalog = snapshot.elements.slice(0, catalogLimit);

    log.oracle(`Matching "${description}" against ${String(catalog.length)} elements...`);

    let answer: ResolutionResult | null;
    try {
      answer = await oracle.classify(
        {
          template: MATCHER_TEMPLATE,
          values: {
            description,
            elements: formatCatalog(catalog, catalogLimit),
          },
          temperature: MATCHER_TEMPERATURE,
          fixup: fixupResolution,
        },
        resolutionResultSchema,
      );
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.error(`Oracle call failed: ${msg}`);
      return { kind: 'not_found', reason: `oracle unavailable: ${msg}` };
    }

    if (!answer) {
      return { kind: 'not_found', reason: 'oracle gave no usable answer' };
    }

    const element = answer.index >= 0 ? catalog[answer.index] : undefined;
    if (!element) {
      return { kind: 'not_found', reason: `oracle chose index ${String(answer.index)}` };
    }

    if (answer.confidence < minConfidence) {
      return {
        kind: 'not_found',
        reason: `confidence ${answer.confidence.toFixed(2)} below ${minConfidence.toFixed(2)}`,
      };
    }

    if (answer.reasoning) {
      log.detail(`[${String(element.index)}] ${answer.reasoning}`);
    }

    return { kind: 'found', element, source: 'oracle' };
  }

  async function resolve(page: PageDriver, description: string): Promise<Resolution> {
    const snapshot = await extractor.extract(page);
    const pageKey = page.url();

    const cached = cache.get(pageKey, description);
    if (cached !== undefined) {
      const element = await validateCached(page, snapshot, cached);
      if (element) {
        log.cache('hit', description);
        return { kind: 'found', element, source: 'cache' };
      }
      log.cache('stale', description);
      await cache.invalidate(pageKey, description);
    } else {
      log.cache('miss', description);
    }

    if (snapshot.elements.length === 0) {
      return { kind: 'not_found', reason: 'no interactive elements on the page' };
    }

    const resolution = await askOracle(snapshot, description);
    if (resolution.kind === 'found') {
      await cache.put(pageKey, description, cacheEntryFor(resolution.element));
    }
    return resolution;
  }

  return {
    resolve,

    async findLocator(page: PageDriver, description: string): Promise<string> {
      const resolution = await resolve(page, description);
      return resolution.kind === 'found'
        ? resolution.element.locator
        : `Could not find element matching: ${description}`;
    },

    async forget(page: PageDriver, description: string): Promise<void> {
      await cache.invalidate(page.url(), description);
    },
  };
}
