import { mkdir } from 'node:fs/promises';

import { chromium } from 'playwright';
import type { Browser, BrowserContext } from 'playwright';

import { TIMEOUTS, VIEWPORT } from '../config/defaults.js';
import type { BrowserBackend, PageDriver } from './driver.js';
import { createPlaywrightDriver } from './playwright.js';

// ── Public types ─────────────────────────────────────────────

export interface LaunchConfig {
  headless: boolean;
  /** Persistent profile directory; omitted means a throwaway context. */
  profileDir?: string | undefined;
}

const LAUNCH_ARGS = ['--disable-blink-features=AutomationControlled'];
const IGNORE_DEFAULT_ARGS = ['--enable-automation'];

const HIDE_WEBDRIVER = `
  Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
`;

// ── Backend launcher ─────────────────────────────────────────

export async function launchBrowser(
  config: LaunchConfig,
): Promise<BrowserBackend> {
  let browser: Browser | undefined;
  let context: BrowserContext;

  if (config.profileDir) {
    await mkdir(config.profileDir, { recursive: true });
    context = await chromium.launchPersistentContext(config.profileDir, {
      headless: config.headless,
      args: LAUNCH_ARGS,
      ignoreDefaultArgs: IGNORE_DEFAULT_ARGS,
      timeout: TIMEOUTS.LAUNCH_TIMEOUT,
      viewport: VIEWPORT,
    });
  } else {
    browser = await chromium.launch({
      headless: config.headless,
      args: LAUNCH_ARGS,
      ignoreDefaultArgs: IGNORE_DEFAULT_ARGS,
      timeout: TIMEOUTS.LAUNCH_TIMEOUT,
    });
    context = await browser.newContext({ viewport: VIEWPORT });
  }

  await context.addInitScript(HIDE_WEBDRIVER);

  // A persistent context opens with one blank tab; hand that out first.
  const spare = context.pages().slice();

  return {
    persistentProfile: Boolean(config.profileDir),

    async newPage(): Promise<PageDriver> {
      const page = spare.shift() ?? (await context.newPage());
      page.setDefaultNavigationTimeout(TIMEOUTS.NAVIGATION_TIMEOUT);
      return createPlaywrightDriver(page);
    },

    async close(): Promise<void> {
      await context.close();
      if (browser) {
        await browser.close();
      }
    },
  };
}
