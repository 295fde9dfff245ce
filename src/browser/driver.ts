import type {
  Box,
  ElementScroll,
  FormField,
  ScannedElement,
  ScrollableSummary,
} from '../schema/index.js';

// ── Interaction options ──────────────────────────────────────

export interface InteractOptions {
  /** Skip actionability checks (visibility, stability, occlusion). */
  force?: boolean;
  timeout?: number;
}

// ── TargetLocator ────────────────────────────────────────────

/**
 * A lazily-evaluated reference to nodes in one frame.
 * Actions apply to the first match; `count` sees all of them.
 */
export interface TargetLocator {
  count(): Promise<number>;
  boundingBox(): Promise<Box | null>;
  click(options?: InteractOptions): Promise<void>;
  fill(value: string, options?: InteractOptions): Promise<void>;
  selectOption(label: string, options?: InteractOptions): Promise<void>;
  setChecked(checked: boolean, options?: InteractOptions): Promise<void>;
  press(key: string, options?: InteractOptions): Promise<void>;
  /** Resolves once the first match is visible; rejects after `timeoutMs`. */
  waitFor(timeoutMs: number): Promise<void>;
  /** Inner text of every match, in document order. */
  allInnerTexts(): Promise<string[]>;
}

// ── FrameDriver ──────────────────────────────────────────────

export interface FrameDriver {
  /** 0 for the top-level document, document order after that. */
  readonly ordinal: number;
  /** Stamp and return interactive elements, numbering from `startIndex`. */
  scan(startIndex: number): Promise<ScannedElement[]>;
  /** Box of the hosting <iframe> in top-level coordinates; null when unreachable. */
  hostBox(): Promise<Box | null>;
}

// ── PageDriver ───────────────────────────────────────────────

/** Everything the engine needs from one browser tab. */
export interface PageDriver {
  url(): string;
  goto(url: string): Promise<void>;
  frames(): FrameDriver[];

  locate(selector: string, frameIndex?: number): TargetLocator;
  findByText(text: string): TargetLocator;
  mouseClick(x: number, y: number): Promise<void>;

  /** Run a script expression in the top-level document. */
  evaluate(script: string): Promise<unknown>;
  scrollables(limit: number): Promise<ScrollableSummary[]>;
  prunedHtml(limit: number): Promise<string>;
  /** Returns false when nothing on the page scrolls. */
  scrollFirstScrollable(pixels: number): Promise<boolean>;
  scrollWindow(pixels: number): Promise<void>;
  scrollWindowTo(edge: 'top' | 'bottom'): Promise<void>;
  /** null when `selector` matches nothing. */
  scrollElement(selector: string, pixels: number): Promise<ElementScroll | null>;
  formFields(): Promise<FormField[]>;

  screenshot(filePath: string): Promise<Buffer>;
  innerText(): Promise<string>;
  wait(ms: number): Promise<void>;
  bringToFront(): Promise<void>;
  close(): Promise<void>;
}

// ── BrowserBackend ───────────────────────────────────────────

/** Owns the browser process; hands out tabs. */
export interface BrowserBackend {
  newPage(): Promise<PageDriver>;
  /** True when cookies and storage persist to a profile directory. */
  readonly persistentProfile: boolean;
  close(): Promise<void>;
}
