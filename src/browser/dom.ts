import type { ElementScroll, FormField, ScannedElement, ScrollableSummary } from '../schema/index.js';

// ── Browser-context functions ───────────────────────────────
// Each function here is serialized and executed inside the browser.
// None may reference outer-scope variables.

/**
 * Describe every visible interactive node in this document and stamp
 * it with an id. Stamps persist across scans: a node keeps the id it
 * was first given, and new nodes draw from a per-document counter that
 * never goes back, so a stamp is never handed to a different node.
 * `startIndex` only numbers the catalog.
 */
export function scanInteractive(startIndex: number): ScannedElement[] {
  const ATTRIBUTE = 'data-wayfind-id';
  const COUNTER = 'data-wayfind-next';

  const INTERACTIVE_TAGS = new Set([
    'a', 'button', 'input', 'select', 'textarea', 'label',
    'details', 'summary', 'dialog',
  ]);

  const INTERACTIVE_ROLES = new Set([
    'button', 'link', 'menuitem', 'menuitemcheckbox', 'menuitemradio',
    'option', 'radio', 'switch', 'tab', 'checkbox', 'textbox',
    'searchbox', 'combobox', 'listbox', 'slider', 'spinbutton',
  ]);

  function isVisible(el: Element, style: CSSStyleDeclaration): boolean {
    if (style.display === 'none') return false;
    if (style.visibility === 'hidden') return false;
    if (parseFloat(style.opacity) === 0) return false;

    const rect = el.getBoundingClientRect();
    return rect.width > 0 && rect.height > 0;
  }

  function textOf(el: Element): string {
    if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) {
      return el.value || el.placeholder || '';
    }
    const raw = el instanceof HTMLElement ? el.innerText : el.textContent;
    return (raw ?? '').trim().replace(/\s+/g, ' ').substring(0, 80);
  }

  function optional(value: string | null | undefined): string | undefined {
    return value ? value : undefined;
  }

  const root = document.documentElement;
  let nextStamp = Number(root.getAttribute(COUNTER) ?? '0');
  if (!Number.isInteger(nextStamp) || nextStamp < 0) nextStamp = 0;
  // cloneNode copies attributes; the second holder of a stamp gets a new one
  const seen = new Set<string>();

  function stampOf(el: Element): string {
    const existing = el.getAttribute(ATTRIBUTE);
    if (existing !== null && /^\d+$/.test(existing) && !seen.has(existing)) {
      seen.add(existing);
      nextStamp = Math.max(nextStamp, Number(existing) + 1);
      return existing;
    }
    const stamp = String(nextStamp++);
    el.setAttribute(ATTRIBUTE, stamp);
    seen.add(stamp);
    return stamp;
  }

  const results: ScannedElement[] = [];
  let index = startIndex;

  document.querySelectorAll('*').forEach((el) => {
    const tag = el.tagName.toLowerCase();
    const role = el.getAttribute('role');
    const style = window.getComputedStyle(el);
    const tabIndex = el instanceof HTMLElement ? el.tabIndex : -1;

    const interactive =
      INTERACTIVE_TAGS.has(tag) ||
      (role !== null && INTERACTIVE_ROLES.has(role)) ||
      style.cursor === 'pointer' ||
      (el.hasAttribute('tabindex') && tabIndex >= 0);

    if (!interactive) return;
    if (el instanceof HTMLInputElement && el.type === 'hidden') return;
    if (!isVisible(el, style)) return;

    const placeholder =
      el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement
        ? el.placeholder
        : '';
    const ariaLabel = el.getAttribute('aria-label');
    const text = textOf(el);
    if (!text && !ariaLabel && !placeholder && tag !== 'input') return;

    const stamp = stampOf(el);
    const rect = el.getBoundingClientRect();

    results.push({
      index: index++,
      tag,
      text,
      role: optional(role),
      ariaLabel: optional(ariaLabel),
      placeholder: optional(placeholder),
      inputType:
        el instanceof HTMLInputElement ||
        el instanceof HTMLButtonElement ||
        el instanceof HTMLSelectElement
          ? optional(el.type)
          : undefined,
      href: el instanceof HTMLAnchorElement ? optional(el.href.substring(0, 100)) : undefined,
      x: Math.round(rect.x),
      y: Math.round(rect.y),
      width: Math.round(rect.width),
      height: Math.round(rect.height),
      locator: `[${ATTRIBUTE}="${stamp}"]`,
    });
  });

  root.setAttribute(COUNTER, String(nextStamp));
  return results;
}

/** Describe up to `limit` elements that scroll on their own. */
export function listScrollables(limit: number): ScrollableSummary[] {
  return Array.from(document.querySelectorAll('*'))
    .filter((el) => {
      const s = window.getComputedStyle(el);
      return (
        (s.overflow === 'auto' || s.overflowY === 'auto' || s.overflowY === 'scroll') &&
        el.scrollHeight > el.clientHeight
      );
    })
    .slice(0, limit)
    .map((el) => ({
      tag: el.tagName.toLowerCase(),
      id: el.id,
      classes: typeof el.className === 'string' ? el.className : '',
    }));
}

/** Body markup without scripts, styles and media, cut to `limit` chars. */
export function prunedBodyHtml(limit: number): string {
  const clone = document.body.cloneNode(true);
  if (!(clone instanceof HTMLElement)) return '';
  clone.querySelectorAll('script,style,img,svg,noscript').forEach((el) => el.remove());
  return clone.innerHTML.substring(0, limit);
}

/** Scroll the first self-scrolling element; false when there is none. */
export function scrollFirstScrollable(pixels: number): boolean {
  const el = Array.from(document.querySelectorAll('*')).find((candidate) => {
    const s = window.getComputedStyle(candidate);
    return (
      (s.overflow === 'auto' || s.overflowY === 'auto' || s.overflowY === 'scroll') &&
      candidate.scrollHeight > candidate.clientHeight
    );
  });
  if (!el) return false;
  el.scrollTop += pixels;
  return true;
}

export function scrollWindowBy(pixels: number): void {
  window.scrollBy(0, pixels);
}

export function scrollWindowTo(edge: 'top' | 'bottom'): void {
  window.scrollTo(0, edge === 'top' ? 0 : document.body.scrollHeight);
}

/** Scroll the first element matching `selector`; null when nothing matches. */
export function scrollElementBy(args: { selector: string; pixels: number }): ElementScroll | null {
  const el = document.querySelector(args.selector);
  if (!el) return null;
  const before = el.scrollTop;
  el.scrollTop += args.pixels;
  return { before, after: el.scrollTop };
}

/** Every input, textarea and select in this document, in document order. */
export function listFormFields(): FormField[] {
  const fields: FormField[] = [];

  document.querySelectorAll('input, textarea, select').forEach((el) => {
    if (
      !(el instanceof HTMLInputElement) &&
      !(el instanceof HTMLTextAreaElement) &&
      !(el instanceof HTMLSelectElement)
    ) {
      return;
    }

    const placeholder = el instanceof HTMLSelectElement ? '' : el.placeholder;
    const label = (
      el.labels?.[0]?.textContent ||
      placeholder ||
      el.name ||
      el.id ||
      'Unknown'
    ).trim();

    fields.push({
      name: el.name || el.id || label,
      label,
      type: el.type || el.tagName.toLowerCase(),
      value: el.value || '',
      required: el.required,
      options: el instanceof HTMLSelectElement ? Array.from(el.options).map((o) => o.text) : [],
    });
  });

  return fields;
}
