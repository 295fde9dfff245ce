import type { PageDriver } from '../browser/driver.js';
import type { ExtractionSnapshot, InteractiveElement, ScannedElement } from '../schema/index.js';
import * as log from '../utils/logger.js';

// ── Capability ───────────────────────────────────────────────

export interface ElementExtractor {
  extract(page: PageDriver): Promise<ExtractionSnapshot>;
}

// ── Extraction ───────────────────────────────────────────────

/**
 * Walk every frame in document order and collect a flat catalog of
 * interactive elements.
 *
 * Indices are dense across frames. Nested-frame coordinates are moved
 * into top-level space by the hosting <iframe>'s box. A frame whose
 * host cannot be reached, or whose scan throws, is skipped and counted;
 * it never fails the snapshot.
 */
export async function extractElements(page: PageDriver): Promise<ExtractionSnapshot> {
  const frames = page.frames();
  const elements: InteractiveElement[] = [];
  let skippedFrames = 0;

  for (const frame of frames) {
    let offsetX = 0;
    let offsetY = 0;

    if (frame.ordinal > 0) {
      const host = await frame.hostBox().catch(() => null);
      if (!host) {
        skippedFrames++;
        continue;
      }
      offsetX = host.x;
      offsetY = host.y;
    }

    let scanned: ScannedElement[];
    try {
      scanned = await frame.scan(elements.length);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.detail(`Frame ${String(frame.ordinal)} skipped: ${msg}`);
      skippedFrames++;
      continue;
    }

    for (const raw of scanned) {
      elements.push({
        ...raw,
        index: elements.length,
        x: Math.round(raw.x + offsetX),
        y: Math.round(raw.y + offsetY),
        frameIndex: frame.ordinal,
      });
    }
  }

  log.extracted(elements.length, skippedFrames, page.url());

  return { elements, frameCount: frames.length, skippedFrames };
}

export const frameElementExtractor: ElementExtractor = {
  extract: extractElements,
};

// ── Catalog formatting ──────────────────────────────────────

/** One compact line per element, as shown to the oracle. */
export function formatElement(el: InteractiveElement): string {
  const parts = [`[${String(el.index)}]`, el.tag];

  if (el.text) parts.push(`"${el.text}"`);
  else if (el.placeholder) parts.push(`placeholder="${el.placeholder}"`);
  else if (el.ariaLabel) parts.push(`aria="${el.ariaLabel}"`);

  parts.push(`pos=(${String(el.x)},${String(el.y)})`);
  if (el.frameIndex > 0) parts.push('(in iframe)');

  return parts.join(' ');
}

export function formatCatalog(
  elements: readonly InteractiveElement[],
  maxCount: number,
): string {
  return elements
    .slice(0, maxCount)
    .map((el) => formatElement(el))
    .join('\n');
}
