/**
 * Browser module.
 * The driver port the engine talks to, plus its Playwright
 * implementation. No LLM calls, no resolution policy.
 */

export type {
  BrowserBackend,
  FrameDriver,
  InteractOptions,
  PageDriver,
  TargetLocator,
} from './driver.js';
export { createPlaywrightDriver } from './playwright.js';
export { launchBrowser } from './runner.js';
export type { LaunchConfig } from './runner.js';
