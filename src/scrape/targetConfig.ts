import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';

/**
 * One selector alternative inside an attribute spec. `attr` is absent when the
 * alternative carries no `@attr` suffix; extraction skips such alternatives.
 */
export interface SelectorAlternative {
  selector: string;
  attr?: string;
}

export type FieldSpec =
  | { kind: 'text'; alternatives: string[] }
  | { kind: 'attr'; alternatives: SelectorAlternative[] }
  | {
      kind: 'structured';
      selector: string;
      attr?: string;
      regex?: RegExp;
      default: string;
    };

/** Keys the fetcher adds to every row; configured fields may not use them. */
export const BOOKKEEPING_KEYS = ['_page_url', '_target_id', '_target_name'] as const;

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';

export interface TargetConfig {
  itemSelector: string;
  fields: Record<string, FieldSpec>;
  nextPageSelector: string | null;
  maxPages: number;
  headers: Record<string, string>;
  timeoutSeconds: number;
  waitUntil: WaitUntil;
}

const StructuredFieldSchema = z
  .object({
    selector: z.string().trim().min(1, 'structured field needs a selector'),
    attr: z.string().trim().min(1).optional(),
    attribute: z.string().trim().min(1).optional(),
    regex: z.string().min(1).optional(),
    default: z
      .union([z.string(), z.number(), z.boolean(), z.null()])
      .transform((v) => (v === null ? '' : String(v)))
      .default(''),
  });

/** Null, empty and zero mean "not set" for numeric limits. */
const unset = (value: unknown): unknown =>
  value === null || value === '' || value === 0 || value === '0' ? undefined : value;

const RawTargetConfigSchema = z.object({
  item_selector: z.string().trim().optional(),
  items_selector: z.string().trim().optional(),
  fields: z
    .record(z.union([z.string().trim().min(1), StructuredFieldSchema]))
    .default({}),
  next_page_selector: z.string().trim().optional(),
  max_pages: z.preprocess(unset, z.coerce.number().int().min(1).default(1)),
  headers: z.record(z.string()).default({}),
  timeout_seconds: z.preprocess(unset, z.coerce.number().int().positive().default(30)),
  wait_until: z.enum(['load', 'domcontentloaded', 'networkidle', 'commit']).default('networkidle'),
});

export type RawTargetConfig = z.input<typeof RawTargetConfigSchema>;

/**
 * Split a comma-separated selector list at top level only: commas inside
 * brackets, parentheses, braces or quoted strings belong to the selector.
 */
export function splitSelectorList(text: string): string[] {
  const parts: string[] = [];
  let current = '';
  let depth = 0;
  let quote: string | null = null;

  for (const ch of text) {
    if (quote) {
      if (ch === quote) quote = null;
      current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(' || ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      depth = Math.max(0, depth - 1);
    } else if (ch === ',' && depth === 0) {
      if (current.trim()) parts.push(current.trim());
      current = '';
      continue;
    }
    current += ch;
  }

  if (current.trim()) parts.push(current.trim());
  return parts;
}

/**
 * Find the `@attr` suffix: the last `@` outside quotes and brackets, so that
 * `a[href*='@']@href` keeps its attribute selector intact.
 */
export function splitAttrSuffix(alternative: string): SelectorAlternative {
  let depth = 0;
  let quote: string | null = null;
  let at = -1;

  for (let i = 0; i < alternative.length; i++) {
    const ch = alternative.charAt(i);
    if (quote) {
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(' || ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      depth = Math.max(0, depth - 1);
    } else if (ch === '@' && depth === 0) {
      at = i;
    }
  }

  if (at === -1) return { selector: alternative.trim() };

  const selector = alternative.slice(0, at).trim();
  const attr = alternative.slice(at + 1).trim();
  if (!selector || !attr) return { selector: alternative.trim() };
  return { selector, attr };
}

function compileRegex(field: string, pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new ConfigError(`Invalid config regex for field "${field}"`, {
      field,
      pattern,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export function parseFieldSpec(
  field: string,
  raw: string | z.output<typeof StructuredFieldSchema>,
): FieldSpec {
  if (typeof raw === 'string') {
    const alternatives = splitSelectorList(raw);
    const parsed = alternatives.map(splitAttrSuffix);
    if (parsed.some((alt) => alt.attr !== undefined)) {
      return { kind: 'attr', alternatives: parsed };
    }
    return { kind: 'text', alternatives };
  }

  const attr = raw.attr ?? raw.attribute;
  return {
    kind: 'structured',
    selector: raw.selector,
    ...(attr !== undefined ? { attr } : {}),
    ...(raw.regex !== undefined ? { regex: compileRegex(field, raw.regex) } : {}),
    default: raw.default,
  };
}

/**
 * Validate a target's configuration document and turn every field spec into
 * its tagged form. Runs before any network call; all failures are ConfigError.
 */
export function parseTargetConfig(raw: unknown): TargetConfig {
  const parsed = RawTargetConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError('Invalid target config', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  const cfg = parsed.data;
  const itemSelector = cfg.item_selector || cfg.items_selector;
  if (!itemSelector) {
    throw new ConfigError('Target config is missing item_selector');
  }

  const fieldEntries = Object.entries(cfg.fields);
  if (fieldEntries.length === 0) {
    throw new ConfigError('Target config needs at least one entry in fields');
  }

  const reserved = fieldEntries.find(([name]) => (BOOKKEEPING_KEYS as readonly string[]).includes(name));
  if (reserved) {
    throw new ConfigError(`Target config field name "${reserved[0]}" is reserved`);
  }

  const fields: Record<string, FieldSpec> = {};
  for (const [name, spec] of fieldEntries) {
    fields[name] = parseFieldSpec(name, spec);
  }

  return {
    itemSelector,
    fields,
    nextPageSelector: cfg.next_page_selector || null,
    maxPages: cfg.max_pages,
    headers: cfg.headers,
    timeoutSeconds: cfg.timeout_seconds,
    waitUntil: cfg.wait_until,
  };
}
