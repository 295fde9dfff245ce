import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { PageDriver } from '../browser/driver.js';
import type { Oracle } from '../llm/oracle.js';
import { scrollStrategySchema } from '../schema/index.js';
import { LIMITS, SCROLL } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { compareScreenshots } from './screenshotDiff.js';

// ── Public types ─────────────────────────────────────────────

export interface ScrollAttemptRecord {
  strategy: string;
  beforeScreenshot: string;
  afterScreenshot: string;
  difference: number;
  threshold: number;
  success: boolean;
}

export interface ScrollReport {
  message: string;
  /** Name of the strategy that visibly moved the page, or null. */
  strategy: string | null;
  attempts: ScrollAttemptRecord[];
}

export interface ScrollOptions {
  times?: number;
  description?: string;
}

export interface ScrollRunnerConfig {
  oracle: Oracle;
  screenshotDir: string;
}

export interface ScrollRunner {
  scroll(page: PageDriver, options?: ScrollOptions): Promise<ScrollReport>;
}

interface ScrollStrategyStep {
  name: string;
  run(page: PageDriver, times: number, description: string): Promise<void>;
}

const STRATEGY_TEMPLATE = 'scroll_strategy.txt';

// ── Pre-validation fixups ────────────────────────────────────
// Older prompts asked for "javascript" rather than "script".

function fixupStrategy(parsed: unknown): unknown {
  if (typeof parsed !== 'object' || parsed === null) return parsed;
  const obj = parsed as Record<string, unknown>;

  if (obj['script'] === undefined && typeof obj['javascript'] === 'string') {
    obj['script'] = obj['javascript'];
  }
  return parsed;
}

// ── Strategies ───────────────────────────────────────────────

function aiStrategy(oracle: Oracle): ScrollStrategyStep {
  return {
    name: 'AI strategy',
    async run(page, times, description) {
      const [scrollables, html] = await Promise.all([
        page.scrollables(LIMITS.SCROLLABLE_SAMPLE),
        page.prunedHtml(LIMITS.PRUNED_HTML_CHARS),
      ]);

      const strategy = await oracle.classify(
        {
          template: STRATEGY_TEMPLATE,
          values: {
            description,
            scrollables: JSON.stringify(scrollables),
            html,
          },
          temperature: 0.1,
          fixup: fixupStrategy,
        },
        scrollStrategySchema,
      );
      if (!strategy) {
        log.detail('AI: no usable strategy');
        return;
      }
      log.detail(`AI: ${strategy.explanation || strategy.method || 'custom script'}`);

      for (let i = 0; i < times; i++) {
        await page.evaluate(strategy.script);
        await page.wait(SCROLL.AI_ITERATION_DELAY);
      }
    },
  };
}

const elementStrategy: ScrollStrategyStep = {
  name: 'Element scroll',
  async run(page, times) {
    for (let i = 0; i < times; i++) {
      const moved = await page.scrollFirstScrollable(SCROLL.STEP_PIXELS);
      if (!moved) return;
      await page.wait(SCROLL.ITERATION_DELAY);
    }
  },
};

const pageStrategy: ScrollStrategyStep = {
  name: 'Page scroll',
  async run(page, times) {
    for (let i = 0; i < times; i++) {
      await page.scrollWindow(SCROLL.STEP_PIXELS);
      await page.wait(SCROLL.ITERATION_DELAY);
    }
  },
};

// ── Runner ───────────────────────────────────────────────────

/** A failed capture leaves no file, which verification reads as "changed". */
async function capture(page: PageDriver, filePath: string): Promise<void> {
  try {
    await page.screenshot(filePath);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    log.warn(`Screenshot failed: ${msg}`);
  }
}

/**
 * Try each strategy in order, screenshotting before and after.
 * The first one whose screenshots differ wins; a failed attempt's
 * after-shot is the next attempt's before-shot.
 */
export function createScrollRunner(config: ScrollRunnerConfig): ScrollRunner {
  const strategies: readonly ScrollStrategyStep[] = [
    aiStrategy(config.oracle),
    elementStrategy,
    pageStrategy,
  ];
  let runCount = 0;

  return {
    async scroll(page: PageDriver, options: ScrollOptions = {}): Promise<ScrollReport> {
      const times = options.times ?? SCROLL.DEFAULT_TIMES;
      const description = options.description ?? SCROLL.DEFAULT_DESCRIPTION;

      await mkdir(config.screenshotDir, { recursive: true });
      runCount++;
      const stamp = `${String(Date.now())}-${String(runCount)}`;
      const shot = (label: string): string =>
        path.join(config.screenshotDir, `scroll-${stamp}-${label}.png`);

      let before = shot('before');
      await capture(page, before);

      const attempts: ScrollAttemptRecord[] = [];

      for (const [i, strategy] of strategies.entries()) {
        log.detail(`Trying: ${strategy.name}...`);
        try {
          await strategy.run(page, times, description);
        } catch (err) {
          const msg = err instanceof Error ? err.message : String(err);
          log.detail(`${strategy.name} errored: ${msg}`);
        }

        await page.wait(SCROLL.VERIFY_DELAY);
        const after = shot(`after-${String(i)}`);
        await capture(page, after);

        const comparison = await compareScreenshots(before, after);
        attempts.push({
          strategy: strategy.name,
          beforeScreenshot: before,
          afterScreenshot: after,
          difference: comparison.difference,
          threshold: comparison.threshold,
          success: comparison.differ,
        });
        log.attempt(strategy.name, comparison.differ);

        if (comparison.differ) {
          return { message: `Scrolled using ${strategy.name}`, strategy: strategy.name, attempts };
        }
        before = after;
      }

      return { message: 'All scroll strategies failed', strategy: null, attempts };
    },
  };
}
