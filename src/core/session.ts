import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { BrowserBackend, PageDriver } from '../browser/driver.js';
import type { Oracle } from '../llm/oracle.js';
import { interaction, precondition } from '../schema/index.js';
import type { ActionOutcome, FormField, ScrollDirection } from '../schema/index.js';
import { PATHS, SCROLL, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import type { LocatorCache } from './cache.js';
import { createExecutor } from './executor.js';
import type { Executor, FormEntry } from './executor.js';
import type { ElementExtractor } from './extractor.js';
import { createResolver } from './resolver.js';
import type { Resolver } from './resolver.js';
import { createScrollRunner } from './scroll.js';
import type { ScrollRunner } from './scroll.js';

// ── Public types ─────────────────────────────────────────────

export interface SessionConfig {
  /** Starts the browser; called once per `open()`. */
  launch: () => Promise<BrowserBackend>;
  oracle: Oracle;
  cache: LocatorCache;
  extractor?: ElementExtractor;
  screenshotDir?: string;
  catalogLimit?: number;
  minConfidence?: number;
  /** Defaults to a short flush pause with a persistent profile, none otherwise. */
  settleAfterActionMs?: number;
}

/** The element actions, for callers that want the tagged outcome. */
export type ElementAction =
  | { op: 'click'; description: string }
  | { op: 'type'; description: string; text: string }
  | { op: 'select'; description: string; option: string }
  | { op: 'check'; description: string; checked: boolean };

export const MAIN_TAB = 'main';

const SUBMIT_SELECTORS = [
  "button[type='submit']",
  "input[type='submit']",
  "button:has-text('Submit')",
  "button:has-text('Send')",
  "button:has-text('Continue')",
  "button:has-text('Next')",
] as const;

interface OpenState {
  backend: BrowserBackend;
  executor: Executor;
  tabs: Map<string, PageDriver>;
  active: string;
  settleMs: number;
}

// ── URL handling ─────────────────────────────────────────────

/**
 * Add a scheme to bare addresses: https for anything that looks like
 * a public host, http for local names such as `localhost:3000`.
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  if (/^[a-z][a-z\d+.-]*:\/\//i.test(trimmed) || /^(about|data):/i.test(trimmed)) {
    return trimmed;
  }
  const host = trimmed.split('/')[0] ?? '';
  return host.includes('.') ? `https://${trimmed}` : `http://${trimmed}`;
}

function formatField(field: FormField): string {
  const details = [field.type];
  if (field.name && field.name !== field.label) details.push(`name=${field.name}`);
  if (field.required) details.push('required');
  if (field.value) details.push(`value="${field.value}"`);
  const line = `- ${field.label} (${details.join(', ')})`;
  return field.options.length > 0 ? `${line} options: ${field.options.join(', ')}` : line;
}

function firstLine(err: unknown): string {
  return err instanceof Error ? err.message.split('\n')[0] ?? err.message : String(err);
}

function timestamp(): string {
  return new Date().toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
}

// ── Session ──────────────────────────────────────────────────

/**
 * One browser, any number of named tabs, one active at a time.
 *
 * Every operation resolves to a human-readable line. Nothing throws
 * past this boundary: a missing browser reads "Browser not open" and
 * unexpected errors read "<operation> failed: <reason>".
 */
export class AutomationSession {
  readonly resolver: Resolver;
  readonly scrollRunner: ScrollRunner;
  private readonly screenshotDir: string;
  private state: OpenState | null = null;
  private tabCounter = 0;

  constructor(private readonly config: SessionConfig) {
    this.resolver = createResolver({
      oracle: config.oracle,
      cache: config.cache,
      ...(config.extractor !== undefined ? { extractor: config.extractor } : {}),
      ...(config.catalogLimit !== undefined ? { catalogLimit: config.catalogLimit } : {}),
      ...(config.minConfidence !== undefined ? { minConfidence: config.minConfidence } : {}),
    });
    this.screenshotDir = config.screenshotDir ?? PATHS.SCREENSHOT_DIR;
    this.scrollRunner = createScrollRunner({
      oracle: config.oracle,
      screenshotDir: this.screenshotDir,
    });
  }

  get isOpen(): boolean {
    return this.state !== null;
  }

  get activeTab(): string | null {
    return this.state?.active ?? null;
  }

  /** Fields typed since `open()`, oldest first. */
  get formData(): ReadonlyMap<string, FormEntry> {
    return this.state?.executor.formData ?? new Map<string, FormEntry>();
  }

  // ── Lifecycle ──────────────────────────────────────────────

  async open(): Promise<string> {
    if (this.state) return 'Browser already open';

    try {
      const backend = await this.config.launch();
      const page = await backend.newPage();
      const settleMs =
        this.config.settleAfterActionMs ??
        (backend.persistentProfile ? TIMEOUTS.PROFILE_FLUSH : 0);

      this.state = {
        backend,
        executor: createExecutor({
          resolver: this.resolver,
          cache: this.config.cache,
          settleAfterActionMs: settleMs,
        }),
        tabs: new Map([[MAIN_TAB, page]]),
        active: MAIN_TAB,
        settleMs,
      };
      this.tabCounter = 0;
    } catch (err) {
      return this.failure('open', err);
    }

    log.info('Browser opened');
    return 'Browser opened';
  }

  async close(): Promise<string> {
    const state = this.state;
    if (!state) return 'Browser closed';
    this.state = null;

    try {
      const page = state.tabs.get(state.active);
      if (page && state.settleMs > 0) {
        await page.wait(state.settleMs);
      }
      await state.backend.close();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.warn(`Browser did not close cleanly: ${msg}`);
    }

    return 'Browser closed';
  }

  // ── Navigation and tabs ────────────────────────────────────

  goTo(url: string): Promise<string> {
    return this.guarded('goTo', async (page) => {
      await this.navigate(page, url);
      return `Navigated to ${page.url()}`;
    });
  }

  newTab(url: string, name?: string): Promise<string> {
    return this.guarded('newTab', async (_page, state) => {
      const tabName = name ?? `tab-${String(++this.tabCounter)}`;
      if (state.tabs.has(tabName)) {
        return `Cannot open tab '${tabName}': name already in use`;
      }

      const page = await state.backend.newPage();
      state.tabs.set(tabName, page);
      state.active = tabName;
      await page.bringToFront();
      await this.navigate(page, url);
      return `Opened tab '${tabName}' at ${page.url()}`;
    });
  }

  switchTab(name: string): Promise<string> {
    return this.guarded('switchTab', async (_page, state) => {
      const page = state.tabs.get(name);
      if (!page) return `No tab named '${name}'`;

      state.active = name;
      await page.bringToFront();
      return `Switched to tab '${name}'`;
    });
  }

  listTabs(): Promise<string> {
    return this.guarded('listTabs', async (_page, state) => {
      const names = [...state.tabs.keys()].map((tab) =>
        tab === state.active ? `${tab} (active)` : tab,
      );
      return `Open tabs: ${names.join(', ')}`;
    });
  }

  closeTab(name: string): Promise<string> {
    return this.guarded('closeTab', async (_page, state) => {
      const page = state.tabs.get(name);
      if (!page) return `No tab named '${name}'`;
      if (state.tabs.size === 1) return 'Cannot close the last tab';

      state.tabs.delete(name);
      await page.close();

      if (state.active === name) {
        const nextName = [...state.tabs.keys()][0];
        const nextPage = nextName !== undefined ? state.tabs.get(nextName) : undefined;
        if (nextName !== undefined && nextPage) {
          state.active = nextName;
          await nextPage.bringToFront();
        }
      }
      return `Closed tab '${name}'`;
    });
  }

  // ── Elements ───────────────────────────────────────────────

  findElement(description: string): Promise<string> {
    return this.guarded('findElement', (page) => this.resolver.findLocator(page, description));
  }

  /**
   * Run one element action and return its tagged outcome. A closed
   * browser is a `precondition` outcome; anything thrown on the way
   * is an `interaction` outcome.
   */
  async act(action: ElementAction): Promise<ActionOutcome> {
    const state = this.state;
    const page = state?.tabs.get(state.active);
    if (!state || !page) return precondition();

    const { executor } = state;
    try {
      switch (action.op) {
        case 'click':
          return await executor.click(page, action.description);
        case 'type':
          return await executor.typeText(page, action.description, action.text);
        case 'select':
          return await executor.selectOption(page, action.description, action.option);
        case 'check':
          return await executor.setChecked(page, action.description, action.checked);
      }
    } catch (err) {
      const reason = firstLine(err);
      log.error(`${action.op} failed: ${reason}`);
      return interaction(`${action.op} failed: ${reason}`, reason);
    }
  }

  async click(description: string): Promise<string> {
    return (await this.act({ op: 'click', description })).message;
  }

  async typeText(description: string, text: string): Promise<string> {
    return (await this.act({ op: 'type', description, text })).message;
  }

  async selectOption(description: string, option: string): Promise<string> {
    return (await this.act({ op: 'select', description, option })).message;
  }

  async checkCheckbox(description: string, checked = true): Promise<string> {
    return (await this.act({ op: 'check', description, checked })).message;
  }

  /**
   * Wait until the described element is visible. When it cannot be
   * resolved, wait for the description to appear as text instead.
   */
  waitForElement(description: string, timeoutSeconds: number = TIMEOUTS.WAIT_FOR_SECONDS): Promise<string> {
    return this.guarded('waitForElement', async (page) => {
      const timeoutMs = timeoutSeconds * 1000;
      const resolution = await this.resolver.resolve(page, description);

      if (resolution.kind === 'not_found') {
        await page.findByText(description).waitFor(timeoutMs);
        return `Found text: '${description}'`;
      }

      const { locator, frameIndex } = resolution.element;
      await page.locate(locator, frameIndex).waitFor(timeoutMs);
      return `Element appeared: ${description}`;
    });
  }

  waitForText(text: string, timeoutSeconds: number = TIMEOUTS.WAIT_FOR_SECONDS): Promise<string> {
    return this.guarded('waitForText', async (page) => {
      await page.findByText(text).waitFor(timeoutSeconds * 1000);
      return `Found text: '${text}'`;
    });
  }

  /** Inner text of every node matching a CSS selector, one per line. */
  extractData(selector: string): Promise<string> {
    return this.guarded('extractData', async (page) => {
      const texts = await page.locate(selector).allInnerTexts();
      if (texts.length === 0) return `No elements match ${selector}`;
      return texts.join('\n');
    });
  }

  // ── Forms ──────────────────────────────────────────────────

  fillForm(fields: Readonly<Record<string, string>>): Promise<string> {
    return this.guarded('fillForm', async (page, state) => {
      const lines: string[] = [];
      for (const [field, value] of Object.entries(fields)) {
        const outcome = await state.executor.typeText(page, field, value);
        lines.push(`${field}: ${outcome.message}`);
      }
      return lines.join('\n');
    });
  }

  /** Every input, textarea and select on the active tab. */
  findForms(): Promise<string> {
    return this.guarded('findForms', async (page) => {
      const fields = await page.formFields();
      if (fields.length === 0) return 'No form fields found';
      return [`Found ${String(fields.length)} form fields:`, ...fields.map(formatField)].join('\n');
    });
  }

  submitForm(): Promise<string> {
    return this.guarded('submitForm', async (page, state) => {
      for (const selector of SUBMIT_SELECTORS) {
        const button = page.locate(selector);
        if ((await button.count()) > 0) {
          await button.click();
          log.action(`Submitted via ${selector}`);
          return 'Form submitted';
        }
      }

      const last = [...state.executor.formData.values()].at(-1);
      if (last) {
        await page.locate(last.locator, last.frameIndex).press('Enter');
        log.action('Submitted with Enter key');
        return 'Form submitted with Enter key';
      }

      return 'Could not find submit button';
    });
  }

  // ── Page ───────────────────────────────────────────────────

  scroll(
    times: number = SCROLL.DEFAULT_TIMES,
    description: string = SCROLL.DEFAULT_DESCRIPTION,
  ): Promise<string> {
    return this.guarded('scroll', async (page) => {
      const report = await this.scrollRunner.scroll(page, { times, description });
      return report.message;
    });
  }

  /** Scroll the window directly, without the strategy runner. */
  scrollPage(direction: ScrollDirection = 'down', amount: number = SCROLL.STEP_PIXELS): Promise<string> {
    return this.guarded('scrollPage', async (page) => {
      switch (direction) {
        case 'top':
        case 'bottom':
          await page.scrollWindowTo(direction);
          return `Scrolled to ${direction} of page`;
        case 'down':
          await page.scrollWindow(amount);
          return `Scrolled down ${String(amount)} pixels`;
        case 'up':
          await page.scrollWindow(-amount);
          return `Scrolled up ${String(amount)} pixels`;
      }
    });
  }

  /** Scroll one element by CSS selector, e.g. a mail client's message list. */
  scrollElement(selector: string, amount: number = SCROLL.STEP_PIXELS): Promise<string> {
    return this.guarded('scrollElement', async (page) => {
      const result = await page.scrollElement(selector, amount);
      if (!result) return `Element not found: ${selector}`;
      const { before, after } = result;
      return `Scrolled from ${String(before)}px to ${String(after)}px (delta: ${String(after - before)}px)`;
    });
  }

  getText(): Promise<string> {
    return this.guarded('getText', (page) => page.innerText());
  }

  takeScreenshot(name?: string): Promise<string> {
    return this.guarded('takeScreenshot', async (page) => {
      let filePath: string;
      if (name !== undefined && name.includes('/')) {
        filePath = name;
        await mkdir(path.dirname(filePath), { recursive: true });
      } else {
        await mkdir(this.screenshotDir, { recursive: true });
        const fileName = name ?? `step-${timestamp()}.png`;
        filePath = path.join(this.screenshotDir, fileName.endsWith('.png') ? fileName : `${fileName}.png`);
      }

      await page.screenshot(filePath);
      return `Screenshot saved to ${filePath}`;
    });
  }

  waitFor(seconds: number): Promise<string> {
    return this.guarded('waitFor', async (page) => {
      await page.wait(seconds * 1000);
      return `Waited for ${String(seconds)} seconds`;
    });
  }

  // ── Internals ──────────────────────────────────────────────

  private async navigate(page: PageDriver, url: string): Promise<void> {
    const target = normalizeUrl(url);
    log.info(`Navigating to ${target}`);
    await page.goto(target);
    await page.wait(TIMEOUTS.NAVIGATION_SETTLE);
  }

  private async guarded(
    operation: string,
    body: (page: PageDriver, state: OpenState) => Promise<string>,
  ): Promise<string> {
    const state = this.state;
    const page = state?.tabs.get(state.active);
    if (!state || !page) return precondition().message;

    try {
      return await body(page, state);
    } catch (err) {
      return this.failure(operation, err);
    }
  }

  private failure(operation: string, err: unknown): string {
    const msg = firstLine(err);
    log.error(`${operation} failed: ${msg}`);
    return `${operation} failed: ${msg}`;
  }
}
