import type { Frame, Locator, Page } from 'playwright';

import type { Box } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import type { FrameDriver, InteractOptions, PageDriver, TargetLocator } from './driver.js';
import {
  listFormFields,
  listScrollables,
  prunedBodyHtml,
  scanInteractive,
  scrollElementBy,
  scrollFirstScrollable,
  scrollWindowBy,
  scrollWindowTo,
} from './dom.js';

// ── Option mapping ───────────────────────────────────────────

function actionOptions(options?: InteractOptions): { force?: boolean; timeout: number } {
  return {
    ...(options?.force !== undefined ? { force: options.force } : {}),
    timeout: options?.timeout ?? TIMEOUTS.ACTION_TIMEOUT,
  };
}

// ── TargetLocator over a Playwright Locator ─────────────────

function wrapLocator(locator: Locator): TargetLocator {
  const first = locator.first();

  return {
    count: () => locator.count(),
    boundingBox: () => first.boundingBox(),
    click: (options) => first.click(actionOptions(options)),
    fill: (value, options) => first.fill(value, actionOptions(options)),
    async selectOption(label, options) {
      await first.selectOption({ label }, actionOptions(options));
    },
    setChecked: (checked, options) => first.setChecked(checked, actionOptions(options)),
    press: (key, options) => first.press(key, { timeout: actionOptions(options).timeout }),
    waitFor: (timeoutMs) => first.waitFor({ state: 'visible', timeout: timeoutMs }),
    allInnerTexts: () => locator.allInnerTexts(),
  };
}

// ── FrameDriver over a Playwright Frame ─────────────────────

function wrapFrame(frame: Frame, ordinal: number): FrameDriver {
  return {
    ordinal,

    scan: (startIndex) => frame.evaluate(scanInteractive, startIndex),

    async hostBox(): Promise<Box | null> {
      if (ordinal === 0) return { x: 0, y: 0, width: 0, height: 0 };
      try {
        const host = await frame.frameElement();
        return await host.boundingBox();
      } catch {
        // Cross-origin isolation or a detached frame
        return null;
      }
    },
  };
}

// ── PageDriver factory ───────────────────────────────────────

/**
 * Adapt a Playwright page to the engine's driver port.
 * Frames are listed fresh on every call so ordinals follow the
 * current frame tree.
 */
export function createPlaywrightDriver(page: Page): PageDriver {
  function frameAt(frameIndex: number): Frame {
    return page.frames()[frameIndex] ?? page.mainFrame();
  }

  return {
    url: () => page.url(),

    async goto(url: string): Promise<void> {
      await page.goto(url, {
        timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
        waitUntil: 'domcontentloaded',
      });
    },

    frames: () => page.frames().map((frame, ordinal) => wrapFrame(frame, ordinal)),

    locate: (selector, frameIndex = 0) => wrapLocator(frameAt(frameIndex).locator(selector)),

    findByText: (text) => wrapLocator(page.getByText(text)),

    mouseClick: (x, y) => page.mouse.click(x, y),

    evaluate: (script) => page.evaluate(script),

    scrollables: (limit) => page.evaluate(listScrollables, limit),

    prunedHtml: (limit) => page.evaluate(prunedBodyHtml, limit),

    scrollFirstScrollable: (pixels) => page.evaluate(scrollFirstScrollable, pixels),

    scrollWindow: (pixels) => page.evaluate(scrollWindowBy, pixels),

    scrollWindowTo: (edge) => page.evaluate(scrollWindowTo, edge),

    scrollElement: (selector, pixels) => page.evaluate(scrollElementBy, { selector, pixels }),

    formFields: () => page.evaluate(listFormFields),

    screenshot: (filePath) => page.screenshot({ path: filePath }),

    innerText: () => page.innerText('body'),

    wait: (ms) => page.waitForTimeout(ms),

    bringToFront: () => page.bringToFront(),

    close: () => page.close(),
  };
}
