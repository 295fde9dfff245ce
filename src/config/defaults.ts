/**
 * Default configuration values.
 * Session-level values are overridable via config file.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 30_000,
  ACTION_TIMEOUT: 5_000,
  LAUNCH_TIMEOUT: 120_000,
  NAVIGATION_SETTLE: 2_000,
  PROFILE_FLUSH: 500,
  ORACLE_REQUEST: 60_000,
  WAIT_FOR_SECONDS: 30,
} as const;

export const LIMITS = {
  CATALOG_MAX_ELEMENTS: 150,
  PRUNED_HTML_CHARS: 5_000,
  SCROLLABLE_SAMPLE: 3,
  MIN_CONFIDENCE: 0,
} as const;

export const SCROLL = {
  DEFAULT_TIMES: 5,
  DEFAULT_DESCRIPTION: 'the main content area',
  STEP_PIXELS: 1_000,
  AI_ITERATION_DELAY: 1_000,
  ITERATION_DELAY: 800,
  VERIFY_DELAY: 500,
  DIFF_RATIO: 0.01,
} as const;

export const CACHE = {
  DOCUMENT_VERSION: 2,
  DEFAULT_PATH: '.wayfind/selector-cache.json',
} as const;

export const PATHS = {
  SCREENSHOT_DIR: '.wayfind/screenshots',
  CONFIG_FILE: '.wayfind.yaml',
} as const;

export const VIEWPORT = {
  width: 1920,
  height: 1200,
} as const;
