import { z } from 'zod';

// ── Script steps ─────────────────────────────────────────────
// One entry per session operation the `run` command can drive.

const clickStepSchema = z.object({
  op: z.literal('click'),
  description: z.string().min(1),
});

const typeStepSchema = z.object({
  op: z.literal('type'),
  description: z.string().min(1),
  text: z.string(),
});

const selectStepSchema = z.object({
  op: z.literal('select'),
  description: z.string().min(1),
  option: z.string().min(1),
});

const checkStepSchema = z.object({
  op: z.literal('check'),
  description: z.string().min(1),
  checked: z.boolean().optional().default(true),
});

const scrollStepSchema = z.object({
  op: z.literal('scroll'),
  times: z.number().int().positive().optional(),
  description: z.string().min(1).optional(),
});

const gotoStepSchema = z.object({
  op: z.literal('goto'),
  url: z.string().min(1),
});

const newTabStepSchema = z.object({
  op: z.literal('new_tab'),
  url: z.string().min(1),
  name: z.string().min(1).optional(),
});

const switchTabStepSchema = z.object({
  op: z.literal('switch_tab'),
  name: z.string().min(1),
});

const submitStepSchema = z.object({
  op: z.literal('submit'),
});

const screenshotStepSchema = z.object({
  op: z.literal('screenshot'),
  name: z.string().min(1).optional(),
});

const waitStepSchema = z.object({
  op: z.literal('wait'),
  seconds: z.number().positive(),
});

const textStepSchema = z.object({
  op: z.literal('text'),
});

const waitForStepSchema = z.object({
  op: z.literal('wait_for'),
  description: z.string().min(1),
  timeout: z.number().positive().optional(),
});

const waitForTextStepSchema = z.object({
  op: z.literal('wait_for_text'),
  text: z.string().min(1),
  timeout: z.number().positive().optional(),
});

const formsStepSchema = z.object({
  op: z.literal('forms'),
});

const fillStepSchema = z.object({
  op: z.literal('fill'),
  fields: z.record(z.string().min(1), z.string()),
});

const scrollPageStepSchema = z.object({
  op: z.literal('scroll_page'),
  direction: z.enum(['up', 'down', 'top', 'bottom']).optional(),
  amount: z.number().int().positive().optional(),
});

const scrollElementStepSchema = z.object({
  op: z.literal('scroll_element'),
  selector: z.string().min(1),
  amount: z.number().int().optional(),
});

const extractStepSchema = z.object({
  op: z.literal('extract'),
  selector: z.string().min(1),
});

const closeTabStepSchema = z.object({
  op: z.literal('close_tab'),
  name: z.string().min(1),
});

const tabsStepSchema = z.object({
  op: z.literal('tabs'),
});

export const scriptStepSchema = z.discriminatedUnion('op', [
  clickStepSchema,
  typeStepSchema,
  selectStepSchema,
  checkStepSchema,
  scrollStepSchema,
  gotoStepSchema,
  newTabStepSchema,
  switchTabStepSchema,
  submitStepSchema,
  screenshotStepSchema,
  waitStepSchema,
  textStepSchema,
  waitForStepSchema,
  waitForTextStepSchema,
  formsStepSchema,
  fillStepSchema,
  scrollPageStepSchema,
  scrollElementStepSchema,
  extractStepSchema,
  closeTabStepSchema,
  tabsStepSchema,
]);

export type ScriptStep = z.infer<typeof scriptStepSchema>;

export const scriptSchema = z.object({
  url: z.string().min(1),
  steps: z.array(scriptStepSchema).min(1),
});

export type Script = z.infer<typeof scriptSchema>;
