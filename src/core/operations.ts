import type { ScriptStep } from '../schema/index.js';
import type { AutomationSession } from './session.js';

// ── Operation catalog ────────────────────────────────────────

export const OPERATIONS = [
  'click',
  'type',
  'select',
  'check',
  'scroll',
  'goto',
  'new_tab',
  'switch_tab',
  'submit',
  'screenshot',
  'wait',
  'text',
  'wait_for',
  'wait_for_text',
  'forms',
  'fill',
  'scroll_page',
  'scroll_element',
  'extract',
  'close_tab',
  'tabs',
] as const satisfies readonly ScriptStep['op'][];

export type OperationName = (typeof OPERATIONS)[number];

export function isOperationName(value: string): value is OperationName {
  return OPERATIONS.some((op) => op === value);
}

// ── Dispatch ─────────────────────────────────────────────────

/** Short label for progress output, e.g. `click "the submit button"`. */
export function describeStep(step: ScriptStep): string {
  switch (step.op) {
    case 'click':
    case 'check':
      return `${step.op} "${step.description}"`;
    case 'type':
      return `type "${step.description}"`;
    case 'select':
      return `select "${step.option}" in "${step.description}"`;
    case 'scroll':
      return step.times !== undefined ? `scroll x${String(step.times)}` : 'scroll';
    case 'goto':
      return `goto ${step.url}`;
    case 'new_tab':
      return `new_tab ${step.url}`;
    case 'switch_tab':
      return `switch_tab ${step.name}`;
    case 'screenshot':
      return step.name !== undefined ? `screenshot ${step.name}` : 'screenshot';
    case 'wait':
      return `wait ${String(step.seconds)}s`;
    case 'wait_for':
      return `wait_for "${step.description}"`;
    case 'wait_for_text':
      return `wait_for_text "${step.text}"`;
    case 'fill':
      return `fill ${Object.keys(step.fields).join(', ')}`;
    case 'scroll_page':
      return `scroll_page ${step.direction ?? 'down'}`;
    case 'scroll_element':
      return `scroll_element ${step.selector}`;
    case 'extract':
      return `extract ${step.selector}`;
    case 'close_tab':
      return `close_tab ${step.name}`;
    case 'submit':
    case 'text':
    case 'forms':
    case 'tabs':
      return step.op;
  }
}

/** Steps whose output is page content rather than a status line. */
export function reportsContent(step: ScriptStep): boolean {
  return step.op === 'text' || step.op === 'extract' || step.op === 'forms';
}

export function dispatch(session: AutomationSession, step: ScriptStep): Promise<string> {
  switch (step.op) {
    case 'click':
      return session.click(step.description);
    case 'type':
      return session.typeText(step.description, step.text);
    case 'select':
      return session.selectOption(step.description, step.option);
    case 'check':
      return session.checkCheckbox(step.description, step.checked);
    case 'scroll':
      return session.scroll(step.times, step.description);
    case 'goto':
      return session.goTo(step.url);
    case 'new_tab':
      return session.newTab(step.url, step.name);
    case 'switch_tab':
      return session.switchTab(step.name);
    case 'submit':
      return session.submitForm();
    case 'screenshot':
      return session.takeScreenshot(step.name);
    case 'wait':
      return session.waitFor(step.seconds);
    case 'text':
      return session.getText();
    case 'wait_for':
      return session.waitForElement(step.description, step.timeout);
    case 'wait_for_text':
      return session.waitForText(step.text, step.timeout);
    case 'forms':
      return session.findForms();
    case 'fill':
      return session.fillForm(step.fields);
    case 'scroll_page':
      return session.scrollPage(step.direction, step.amount);
    case 'scroll_element':
      return session.scrollElement(step.selector, step.amount);
    case 'extract':
      return session.extractData(step.selector);
    case 'close_tab':
      return session.closeTab(step.name);
    case 'tabs':
      return session.listTabs();
  }
}
