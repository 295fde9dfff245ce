/**
 * Core engine.
 * Extraction, caching, resolution, action execution and scrolling,
 * tied together by AutomationSession. Browser access goes through
 * the PageDriver port only.
 */

export { extractElements, formatCatalog, formatElement, frameElementExtractor } from './extractor.js';
export type { ElementExtractor } from './extractor.js';
export {
  LocatorCache,
  cacheEntryFor,
  createFileStore,
  createMemoryStore,
  entryDescribes,
  normalizePageKey,
  parseCacheDocument,
} from './cache.js';
export type { CacheStore, LoadedCache } from './cache.js';
export { createResolver } from './resolver.js';
export type { Resolution, Resolver, ResolverConfig } from './resolver.js';
export { createExecutor } from './executor.js';
export type { Executor, ExecutorConfig, FormEntry } from './executor.js';
export { compareScreenshots, differenceThreshold, pixelDifference, screenshotsDiffer } from './screenshotDiff.js';
export type { RgbaImage, ScreenshotComparison } from './screenshotDiff.js';
export { createScrollRunner } from './scroll.js';
export type { ScrollAttemptRecord, ScrollOptions, ScrollReport, ScrollRunner, ScrollRunnerConfig } from './scroll.js';
export { AutomationSession, MAIN_TAB, normalizeUrl } from './session.js';
export type { ElementAction, SessionConfig } from './session.js';
export { OPERATIONS, describeStep, dispatch, isOperationName, reportsContent } from './operations.js';
export type { OperationName } from './operations.js';
