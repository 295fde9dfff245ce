import { z } from 'zod';

// ── Geometry ─────────────────────────────────────────────────

export const boxSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});

export type Box = z.infer<typeof boxSchema>;

// ── InteractiveElement ───────────────────────────────────────

export const interactiveElementSchema = z.object({
  index: z.number().int().nonnegative(),
  tag: z.string().min(1),
  text: z.string(),
  role: z.string().optional(),
  ariaLabel: z.string().optional(),
  placeholder: z.string().optional(),
  inputType: z.string().optional(),
  href: z.string().optional(),
  x: z.number().int(),
  y: z.number().int(),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
  locator: z.string().min(1),
  frameIndex: z.number().int().nonnegative(),
});

export type InteractiveElement = z.infer<typeof interactiveElementSchema>;

/** What the in-page scan returns: frame placement is added by the extractor. */
export const scannedElementSchema = interactiveElementSchema.omit({ frameIndex: true });

export type ScannedElement = z.infer<typeof scannedElementSchema>;

// ── Snapshot ─────────────────────────────────────────────────

export interface ExtractionSnapshot {
  readonly elements: readonly InteractiveElement[];
  readonly frameCount: number;
  readonly skippedFrames: number;
}

// ── Scrollable summary ───────────────────────────────────────

export const scrollableSummarySchema = z.object({
  tag: z.string(),
  id: z.string(),
  classes: z.string(),
});

export type ScrollableSummary = z.infer<typeof scrollableSummarySchema>;

// ── Form fields ──────────────────────────────────────────────

export const formFieldSchema = z.object({
  /** name attribute, else id, else the label. */
  name: z.string(),
  /** <label> text, else placeholder, name, id, or "Unknown". */
  label: z.string(),
  /** input type, or the tag name for textarea and select. */
  type: z.string(),
  value: z.string(),
  required: z.boolean(),
  /** Option texts of a <select>; empty otherwise. */
  options: z.array(z.string()),
});

export type FormField = z.infer<typeof formFieldSchema>;

// ── Direct scrolling ─────────────────────────────────────────

export type ScrollDirection = 'up' | 'down' | 'top' | 'bottom';

/** scrollTop of an element before and after it was scrolled. */
export interface ElementScroll {
  before: number;
  after: number;
}
