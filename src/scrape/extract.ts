import { JSDOM } from 'jsdom';
import type { FieldSpec, SelectorAlternative, TargetConfig } from './targetConfig.js';
import { SelectorError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type ExtractedRow = Record<string, string>;

const SHOW_TEXT = 4; // NodeFilter.SHOW_TEXT

/**
 * Collapse every whitespace run (newlines included) to one space and trim.
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Text of an element with its text nodes joined by spaces, so that
 * `<h2>Jane<br>Doe</h2>` reads "Jane Doe" rather than "JaneDoe".
 */
export function elementText(el: Element | null): string {
  if (!el) return '';
  const walker = el.ownerDocument.createTreeWalker(el, SHOW_TEXT);
  const parts: string[] = [];
  for (let node = walker.nextNode(); node; node = walker.nextNode()) {
    if (node.nodeValue) parts.push(node.nodeValue);
  }
  return normalizeText(parts.join(' '));
}

/**
 * querySelector that treats a selector the DOM rejects (e.g. jQuery-only
 * `:contains`) as "no match" for that alternative.
 */
function selectOne(root: ParentNode, selector: string): Element | null {
  try {
    return root.querySelector(selector);
  } catch (err) {
    logger.debug({ selector, error: err instanceof Error ? err.message : String(err) }, 'Unsupported field selector skipped');
    return null;
  }
}

function extractText(row: Element, selectors: string[]): string {
  for (const selector of selectors) {
    const value = elementText(selectOne(row, selector));
    if (value) return value;
  }
  return '';
}

/**
 * First non-empty attribute value. Alternatives without an `@attr` suffix
 * name no attribute and are skipped.
 */
function extractAttr(row: Element, alternatives: SelectorAlternative[]): string {
  for (const { selector, attr } of alternatives) {
    if (attr === undefined) continue;
    const value = selectOne(row, selector)?.getAttribute(attr) ?? '';
    if (value) return value;
  }
  return '';
}

function applyRegex(value: string, regex: RegExp): string {
  const match = regex.exec(value);
  if (!match) return '';
  if (match.length > 1) return match[1] ?? '';
  return match[0];
}

export function extractField(row: Element, spec: FieldSpec): string {
  switch (spec.kind) {
    case 'text':
      return extractText(row, spec.alternatives);
    case 'attr':
      return extractAttr(row, spec.alternatives);
    case 'structured': {
      const el = selectOne(row, spec.selector);
      if (!el) return spec.default;

      const value =
        spec.attr !== undefined
          ? el.getAttribute(spec.attr) || spec.default
          : elementText(el) || spec.default;

      return spec.regex ? applyRegex(value, spec.regex) : value;
    }
  }
}

export function parseDocument(html: string): Document {
  return new JSDOM(html).window.document;
}

function selectAll(doc: Document, selector: string): Element[] {
  try {
    return Array.from(doc.querySelectorAll(selector));
  } catch (err) {
    throw new SelectorError(`Invalid item selector "${selector}"`, {
      selector,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Turn one HTML page into flat rows: one per element matching the item
 * selector, one key per configured field. Missing data yields "" or the
 * field's default; only an unusable item selector raises.
 */
export function extractItems(
  html: string,
  config: Pick<TargetConfig, 'itemSelector' | 'fields'>,
): ExtractedRow[] {
  const doc = parseDocument(html);
  const containers = selectAll(doc, config.itemSelector);

  return containers.map((container) => {
    const out: ExtractedRow = {};
    for (const [name, spec] of Object.entries(config.fields)) {
      out[name] = extractField(container, spec);
    }
    return out;
  });
}

/**
 * `href` of the first element matching `selector`, resolved against the
 * page's own URL. Null when absent, empty or unresolvable.
 */
export function extractNextPageUrl(html: string, selector: string, pageUrl: string): string | null {
  if (!selector) return null;
  const doc = parseDocument(html);
  const el = selectOne(doc, selector);
  const href = el?.getAttribute('href')?.trim();
  if (!href) return null;

  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
}
