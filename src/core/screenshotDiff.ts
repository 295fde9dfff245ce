import { readFile } from 'node:fs/promises';

import { PNG } from 'pngjs';

import { SCROLL } from '../config/defaults.js';

// ── Pixel comparison ────────────────────────────────────────

export interface RgbaImage {
  width: number;
  height: number;
  /** RGBA bytes, row-major. */
  data: Uint8Array;
}

/** Sum of absolute R, G and B differences; alpha is ignored. */
export function pixelDifference(a: RgbaImage, b: RgbaImage): number {
  const length = Math.min(a.data.length, b.data.length);
  let total = 0;

  for (let i = 0; i < length; i += 4) {
    total +=
      Math.abs((a.data[i] ?? 0) - (b.data[i] ?? 0)) +
      Math.abs((a.data[i + 1] ?? 0) - (b.data[i + 1] ?? 0)) +
      Math.abs((a.data[i + 2] ?? 0) - (b.data[i + 2] ?? 0));
  }

  return total;
}

export function differenceThreshold(image: RgbaImage, ratio: number = SCROLL.DIFF_RATIO): number {
  return image.width * image.height * 3 * ratio;
}

export interface ScreenshotComparison {
  differ: boolean;
  difference: number;
  threshold: number;
}

/**
 * Compare two PNG files. An unreadable file or a size change counts
 * as different so verification never blocks progress.
 */
export async function compareScreenshots(
  beforePath: string,
  afterPath: string,
  ratio: number = SCROLL.DIFF_RATIO,
): Promise<ScreenshotComparison> {
  let before: RgbaImage;
  let after: RgbaImage;
  try {
    const [beforeBytes, afterBytes] = await Promise.all([
      readFile(beforePath),
      readFile(afterPath),
    ]);
    before = PNG.sync.read(beforeBytes);
    after = PNG.sync.read(afterBytes);
  } catch {
    return { differ: true, difference: Number.NaN, threshold: Number.NaN };
  }

  const threshold = differenceThreshold(before, ratio);
  if (before.width !== after.width || before.height !== after.height) {
    return { differ: true, difference: Number.POSITIVE_INFINITY, threshold };
  }

  const difference = pixelDifference(before, after);
  return { differ: difference > threshold, difference, threshold };
}

export async function screenshotsDiffer(beforePath: string, afterPath: string): Promise<boolean> {
  const { differ } = await compareScreenshots(beforePath, afterPath);
  return differ;
}
