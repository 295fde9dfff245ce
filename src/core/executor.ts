import type { PageDriver, TargetLocator } from '../browser/driver.js';
import { interaction, notFound, ok } from '../schema/index.js';
import type { ActionOutcome, ActionVia, InteractiveElement } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { cacheEntryFor } from './cache.js';
import type { LocatorCache } from './cache.js';
import type { Resolver } from './resolver.js';

// ── Public types ─────────────────────────────────────────────

export interface FormEntry {
  value: string;
  locator: string;
  frameIndex: number;
}

export interface ExecutorConfig {
  resolver: Resolver;
  cache: LocatorCache;
  /** Pause after each successful action so profile state reaches disk. */
  settleAfterActionMs?: number;
}

export interface Executor {
  click(page: PageDriver, description: string): Promise<ActionOutcome>;
  typeText(page: PageDriver, description: string, text: string): Promise<ActionOutcome>;
  selectOption(page: PageDriver, description: string, option: string): Promise<ActionOutcome>;
  setChecked(page: PageDriver, description: string, checked: boolean): Promise<ActionOutcome>;
  /** Fields typed this session, in typing order. Never pruned. */
  readonly formData: ReadonlyMap<string, FormEntry>;
}

// ── Action plans ─────────────────────────────────────────────
// The ladder is the same for every action; a plan supplies the
// action-specific pieces.

interface FallbackTarget {
  target: TargetLocator;
  selector: string;
  via: ActionVia;
}

interface ActionPlan {
  verb: string;
  notFoundMessage: string;
  perform(target: TargetLocator, force: boolean): Promise<void>;
  describe(element: InteractiveElement | undefined, via: ActionVia): string;
  fallbacks(): FallbackTarget[];
  /** Last resort when the resolved locator no longer matches anything. */
  onVanished?(element: InteractiveElement): Promise<string | undefined>;
  recordSuccess?(locator: string, frameIndex: number): void;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message.split('\n')[0] ?? err.message : String(err);
}

function center(box: { x: number; y: number; width: number; height: number }): { x: number; y: number } {
  return { x: box.x + box.width / 2, y: box.y + box.height / 2 };
}

/** Double-quoted CSS attribute value. */
function cssString(value: string): string {
  return `"${value.replace(/["\\]/g, '\\$&')}"`;
}

// ── Factory ──────────────────────────────────────────────────

export function createExecutor(config: ExecutorConfig): Executor {
  const { resolver, cache } = config;
  const settleMs = config.settleAfterActionMs ?? 0;
  const formData = new Map<string, FormEntry>();

  async function afterSuccess(
    page: PageDriver,
    description: string,
    element: InteractiveElement | undefined,
  ): Promise<void> {
    if (element !== undefined) {
      await cache.put(page.url(), description, cacheEntryFor(element));
    }
    if (settleMs > 0) {
      await page.wait(settleMs);
    }
  }

  async function runFallbacks(
    page: PageDriver,
    description: string,
    plan: ActionPlan,
  ): Promise<ActionOutcome> {
    let lastError: string | undefined;

    for (const { target, selector, via } of plan.fallbacks()) {
      const count = await target.count().catch(() => 0);
      if (count === 0) continue;

      try {
        await plan.perform(target, false);
      } catch (err) {
        lastError = errorMessage(err);
        continue;
      }

      plan.recordSuccess?.(selector, 0);
      await afterSuccess(page, description, undefined);
      return ok(plan.describe(undefined, via), via);
    }

    if (lastError !== undefined) {
      return interaction(`Failed to ${plan.verb} '${description}': ${lastError}`, lastError);
    }
    return notFound(plan.notFoundMessage);
  }

  async function execute(
    page: PageDriver,
    description: string,
    plan: ActionPlan,
  ): Promise<ActionOutcome> {
    const resolution = await resolver.resolve(page, description);

    if (resolution.kind === 'not_found') {
      log.detail(`Resolution failed (${resolution.reason}), trying fallbacks`);
      return runFallbacks(page, description, plan);
    }

    const element = resolution.element;
    const target = page.locate(element.locator, element.frameIndex);
    const live = await target.count().catch(() => 0);

    if (live === 0) {
      await resolver.forget(page, description);
      const message = plan.onVanished ? await plan.onVanished(element) : undefined;
      if (message !== undefined) {
        await afterSuccess(page, description, undefined);
        return ok(message, 'coordinates');
      }
      return runFallbacks(page, description, plan);
    }

    let via: ActionVia = 'resolved';
    try {
      await plan.perform(target, false);
    } catch (err) {
      log.detail(`Normal ${plan.verb} failed (${errorMessage(err)}), forcing`);
      via = 'forced';
    }

    if (via === 'forced') {
      try {
        await plan.perform(target, true);
      } catch (err) {
        const reason = errorMessage(err);
        return interaction(`Failed to ${plan.verb} '${description}': ${reason}`, reason);
      }
    }

    plan.recordSuccess?.(element.locator, element.frameIndex);
    await afterSuccess(page, description, element);
    return ok(plan.describe(element, via), via);
  }

  function textFallback(page: PageDriver, description: string): FallbackTarget[] {
    return [{ target: page.findByText(description), selector: `text=${description}`, via: 'text' }];
  }

  function report(outcome: ActionOutcome): ActionOutcome {
    if (outcome.kind === 'ok') log.action(outcome.message);
    else log.warn(outcome.message);
    return outcome;
  }

  return {
    formData,

    async click(page, description) {
      const plan: ActionPlan = {
        verb: 'click',
        notFoundMessage: `Could not find element matching: ${description}`,

        // Centre of a freshly read box; the snapshot may be stale.
        async perform(target, force) {
          if (force) {
            await target.click({ force: true });
            return;
          }
          const box = await target.boundingBox();
          if (!box || box.width === 0 || box.height === 0) {
            throw new Error('element has no visible box');
          }
          const point = center(box);
          await page.mouseClick(point.x, point.y);
        },

        describe(element, via) {
          if (!element) return `Clicked on '${description}' (by text fallback)`;
          const label = `Clicked [${String(element.index)}] ${element.tag} '${element.text}'`;
          return via === 'forced' ? `${label} (force)` : label;
        },

        fallbacks: () => textFallback(page, description),

        async onVanished(element) {
          if (element.width === 0 || element.height === 0) return undefined;
          const x = element.x + Math.floor(element.width / 2);
          const y = element.y + Math.floor(element.height / 2);
          try {
            await page.mouseClick(x, y);
          } catch {
            return undefined;
          }
          return `Clicked [${String(element.index)}] '${element.text}' at (${String(x)}, ${String(y)})`;
        },
      };
      return report(await execute(page, description, plan));
    },

    async typeText(page, description, text) {
      const plan: ActionPlan = {
        verb: 'type into',
        notFoundMessage: `Could not find field: ${description}`,

        perform: (target, force) => target.fill(text, { force }),

        describe: () => `Typed into ${description}`,

        fallbacks() {
          const needle = cssString(description);
          return [
            `input[placeholder*=${needle} i]`,
            `[aria-label*=${needle} i]`,
            `input[name*=${needle} i]`,
          ].map((selector): FallbackTarget => ({
            target: page.locate(selector),
            selector,
            via: 'field-fallback',
          }));
        },

        recordSuccess(locator, frameIndex) {
          // Re-typing moves the field to the end: Enter-submit uses the last one
          formData.delete(description);
          formData.set(description, { value: text, locator, frameIndex });
        },
      };
      return report(await execute(page, description, plan));
    },

    async selectOption(page, description, option) {
      const plan: ActionPlan = {
        verb: 'select from',
        notFoundMessage: `Could not find element matching: ${description}`,
        perform: (target, force) => target.selectOption(option, { force }),
        describe: () => `Selected '${option}' in ${description}`,
        fallbacks: () => textFallback(page, description),
      };
      return report(await execute(page, description, plan));
    },

    async setChecked(page, description, checked) {
      const plan: ActionPlan = {
        verb: checked ? 'check' : 'uncheck',
        notFoundMessage: `Could not find element matching: ${description}`,
        perform: (target, force) => target.setChecked(checked, { force }),
        describe: () => `${checked ? 'Checked' : 'Unchecked'} ${description}`,
        fallbacks: () => textFallback(page, description),
      };
      return report(await execute(page, description, plan));
    },
  };
}
