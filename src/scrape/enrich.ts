import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { Fetchers } from './fetch.js';
import type { ProspectEvents } from '../prospects/events.js';
import { detectPlatform, loadPlatforms, type PlatformTable } from './discover.js';
import { extractField, normalizeText, parseDocument } from './extract.js';
import { parseFieldSpec } from './targetConfig.js';
import { normalizePhone, parseEventWhen } from '../prospects/normalize.js';
import {
  getProspect,
  parseRawPayload,
  updateProspect,
  type Prospect,
  type ProspectUpdate,
} from '../prospects/prospectDb.js';
import { isTerminal } from '../prospects/status.js';
import { classifyError, errorText, isContained, type FailureCategory } from '../shared/classify.js';
import { NotFoundError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/** Record fields a detail page can fill. */
export const DETAIL_FIELDS = ['email', 'phone', 'full_name', 'company', 'website', 'event_name', 'event_date'] as const;
export type DetailField = (typeof DETAIL_FIELDS)[number];
export type DetailFields = Partial<Record<DetailField, string>>;

export const ENRICH_FILTERS = ['unenriched', 'no-contact', 'all'] as const;
export type EnrichFilter = (typeof ENRICH_FILTERS)[number];

export function isEnrichFilter(value: string): value is EnrichFilter {
  return (ENRICH_FILTERS as readonly string[]).includes(value);
}

export interface EnrichDeps {
  db: Database.Database;
  config: Pick<Config, 'scrape' | 'enrich'>;
  fetchers: Fetchers;
  events?: ProspectEvents;
  platforms?: PlatformTable;
  sleep?: (ms: number) => Promise<void>;
}

export interface EnrichRecordOptions {
  /** Platform preset whose detail selectors apply; detected from the URL when absent. */
  platform?: string;
  /** Render in the headless browser; defaults to the platform preset's render mode. */
  browser?: boolean;
}

export type EnrichResult =
  | { status: 'enriched'; recordId: number; url: string; updatedFields: string[] }
  | { status: 'skipped'; recordId: number; reason: 'terminal' | 'no_url' | 'already_enriched' | 'nothing_new' }
  | { status: 'failed'; recordId: number; url: string; category: FailureCategory; error: string };

const SKIP_WORDS = ['noreply', 'no-reply', 'example', 'spam'];
const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
const EMAIL_ONLY = new RegExp(`^${EMAIL_PATTERN.source}$`);
const PHONE_PATTERN = /\+?\(?\d[\d\s().-]{6,}\d/g;
const ORGANIZER_CUES = ['organized by', 'organised by', 'hosted by', 'presented by', 'contact:'];
const SHOW_TEXT = 4; // NodeFilter.SHOW_TEXT

// ================================================================
// Detail page extraction
// ================================================================

/**
 * Normalized text of every visible text node, in document order.
 */
function textBlocks(doc: Document): string[] {
  const walker = doc.createTreeWalker(doc.body, SHOW_TEXT);
  const blocks: string[] = [];
  for (let node = walker.nextNode(); node; node = walker.nextNode()) {
    const tag = node.parentElement?.tagName;
    if (tag === 'SCRIPT' || tag === 'STYLE' || tag === 'NOSCRIPT') continue;
    const text = normalizeText(node.nodeValue ?? '');
    if (text) blocks.push(text);
  }
  return blocks;
}

function usableEmail(candidate: string): string | null {
  const email = candidate.trim();
  if (!EMAIL_ONLY.test(email)) return null;
  const lower = email.toLowerCase();
  return SKIP_WORDS.some((word) => lower.includes(word)) ? null : email;
}

function decodeAddress(address: string): string {
  try {
    return decodeURIComponent(address);
  } catch {
    return address;
  }
}

function findEmail(doc: Document, text: string): string {
  for (const link of Array.from(doc.querySelectorAll('a[href^="mailto:" i]'))) {
    const address = (link.getAttribute('href') ?? '').slice('mailto:'.length).split('?')[0] ?? '';
    const email = usableEmail(decodeAddress(address));
    if (email) return email;
  }
  for (const match of text.matchAll(EMAIL_PATTERN)) {
    const email = usableEmail(match[0]);
    if (email) return email;
  }
  return '';
}

function findPhone(doc: Document, text: string, defaultRegion?: string): string {
  for (const link of Array.from(doc.querySelectorAll('a[href^="tel:" i]'))) {
    const number = (link.getAttribute('href') ?? '').slice('tel:'.length).trim();
    if (normalizePhone(number, defaultRegion)) return number;
  }
  for (const match of text.matchAll(PHONE_PATTERN)) {
    const number = match[0].trim();
    if (normalizePhone(number, defaultRegion)) return number;
  }
  return '';
}

/**
 * Name following an "organized by" style cue, in the same text node or the
 * next one (`Hosted by <b>Acme</b>`). Stops at the first sentence break.
 */
function findOrganizer(blocks: string[]): string {
  for (let i = 0; i < blocks.length; i++) {
    const block = blocks[i] ?? '';
    const lower = block.toLowerCase();
    for (const cue of ORGANIZER_CUES) {
      const idx = lower.indexOf(cue);
      if (idx === -1) continue;
      let rest = block.slice(idx + cue.length).replace(/^[\s:]+/, '');
      if (!rest) rest = blocks[i + 1] ?? '';
      const match = /^([A-Z][^.,;|!?]*)/.exec(rest);
      if (match?.[1]) return match[1].trim().slice(0, 120);
    }
  }
  return '';
}

/**
 * Contact and event fields found on one detail page. Platform `detail`
 * selectors win; generic heuristics (mailto and tel links, text patterns,
 * organizer cues, the meta description, `time[datetime]`) fill the rest.
 * Fields with nothing found are absent.
 */
export function extractDetailFields(
  html: string,
  selectors: Record<string, string> = {},
  defaultRegion?: string,
): DetailFields {
  const doc = parseDocument(html);
  const found: DetailFields = {};

  for (const field of DETAIL_FIELDS) {
    const selector = selectors[field];
    if (!selector) continue;
    const value = normalizeText(extractField(doc.documentElement, parseFieldSpec(field, selector)));
    if (value) found[field] = value;
  }

  const blocks = textBlocks(doc);
  const text = blocks.join(' ');
  const fill = (field: DetailField, find: () => string): void => {
    if (found[field]) return;
    const value = find();
    if (value) found[field] = value;
  };

  fill('email', () => findEmail(doc, text));
  fill('phone', () => findPhone(doc, text, defaultRegion));
  fill('company', () => findOrganizer(blocks));
  fill('event_name', () =>
    normalizeText(doc.querySelector('meta[name="description"]')?.getAttribute('content') ?? '').slice(0, 500),
  );
  fill('event_date', () => doc.querySelector('time[datetime]')?.getAttribute('datetime')?.trim() ?? '');

  return found;
}

// ================================================================
// Applying detail fields to a record
// ================================================================

function isBlank(value: string | null): boolean {
  return value === null || value.trim() === '';
}

/**
 * Update that fills only the record's empty fields. Phones are stored only
 * when they normalize; dates go through the same parser as scraped rows.
 */
export function emptyFieldUpdate(prospect: Prospect, found: DetailFields, defaultRegion?: string): ProspectUpdate {
  const update: ProspectUpdate = {};

  if (found.email && isBlank(prospect.email)) update.email = found.email;

  if (found.phone && isBlank(prospect.phone_raw) && isBlank(prospect.phone_e164)) {
    const phone = normalizePhone(found.phone, defaultRegion);
    if (phone) {
      update.phone_raw = phone.raw;
      update.phone_e164 = phone.e164;
      update.phone_region = phone.region;
    }
  }

  for (const field of ['full_name', 'company', 'website', 'event_name'] as const) {
    const value = found[field];
    if (value && isBlank(prospect[field])) update[field] = value;
  }

  if (found.event_date) {
    const when = parseEventWhen(found.event_date);
    if (when.date && prospect.event_date === null) update.event_date = when.date;
    if (when.datetime && prospect.event_datetime === null) update.event_datetime = when.datetime;
  }

  return update;
}

function httpUrl(value: unknown, base: string): string | null {
  if (typeof value !== 'string' || !value.trim()) return null;
  try {
    const url = base ? new URL(value.trim(), base) : new URL(value.trim());
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : null;
  } catch {
    return null;
  }
}

/**
 * The record's own page: the scraped `url` (or `detail_url`/`link`) of its
 * row, resolved against the listing page, else its website. The listing
 * page itself never counts.
 */
export function detailUrlOf(prospect: Pick<Prospect, 'raw_payload' | 'source_url' | 'website'>): string | null {
  const raw = parseRawPayload(prospect);
  for (const candidate of [raw['url'], raw['detail_url'], raw['link'], prospect.website]) {
    const url = httpUrl(candidate, prospect.source_url);
    if (url && url !== prospect.source_url) return url;
  }
  return null;
}

function hasContact(prospect: Prospect): boolean {
  return !isBlank(prospect.email) && !isBlank(prospect.company) && !(isBlank(prospect.phone_raw) && isBlank(prospect.phone_e164));
}

/**
 * Visit one record's detail page and fill its empty fields. Records in a
 * terminal status are never touched. Network, timeout and config failures
 * come back as a `failed` result; anything else is thrown.
 */
export async function enrichRecord(
  deps: EnrichDeps,
  recordId: number,
  opts: EnrichRecordOptions = {},
): Promise<EnrichResult> {
  const prospect = getProspect(deps.db, recordId);
  if (!prospect) throw new NotFoundError(`Record ${recordId} not found`, { recordId });
  if (isTerminal(prospect.status)) return { status: 'skipped', recordId, reason: 'terminal' };
  if (hasContact(prospect)) return { status: 'skipped', recordId, reason: 'already_enriched' };

  const url = detailUrlOf(prospect);
  if (!url) return { status: 'skipped', recordId, reason: 'no_url' };

  const platforms = deps.platforms ?? loadPlatforms();
  const platformId = opts.platform ?? detectPlatform(url, platforms);
  const preset = platformId ? platforms[platformId] : undefined;
  const browser = opts.browser ?? preset?.render_mode === 'browser';
  const region = deps.config.scrape.default_region;

  let found: DetailFields;
  try {
    const fetcher = browser ? deps.fetchers.browser : deps.fetchers.static;
    const html = await fetcher.fetchPage(url, { timeoutSeconds: deps.config.scrape.default_timeout_seconds });
    found = extractDetailFields(html, preset?.detail ?? {}, region);
  } catch (err) {
    const category = classifyError(err);
    const error = errorText(err);
    if (!isContained(category)) throw err;
    logger.warn({ recordId, url, category, error }, 'Detail page fetch failed');
    return { status: 'failed', recordId, url, category, error };
  }

  // Re-read: the record may have changed while the page was loading.
  const current = getProspect(deps.db, recordId);
  if (!current || isTerminal(current.status)) return { status: 'skipped', recordId, reason: 'terminal' };

  const update = emptyFieldUpdate(current, found, region);
  const updatedFields = Object.keys(update);
  if (updatedFields.length === 0 || !updateProspect(deps.db, recordId, update)) {
    return { status: 'skipped', recordId, reason: 'nothing_new' };
  }

  deps.events?.publish({ prospectId: recordId, created: false, targetId: null, runId: null });
  logger.info({ recordId, url, platform: platformId, fields: updatedFields }, 'Record enriched');
  return { status: 'enriched', recordId, url, updatedFields };
}

// ================================================================
// Batches
// ================================================================

export interface EnrichSelection {
  ids?: number[];
  filter?: EnrichFilter;
  /** Case-insensitive substring of the source name. */
  source?: string;
  limit?: number;
}

/**
 * Records worth a detail-page visit, oldest first: not terminal, with a
 * detail URL, and matching the filter. Explicit ids bypass the filter.
 */
export function selectEnrichCandidates(db: Database.Database, selection: EnrichSelection = {}): Prospect[] {
  const limit = selection.limit ?? 50;

  if (selection.ids && selection.ids.length > 0) {
    const placeholders = selection.ids.map(() => '?').join(', ');
    return db
      .prepare(`SELECT * FROM records WHERE id IN (${placeholders}) ORDER BY id`)
      .all(...selection.ids) as Prospect[];
  }

  const where = ["status NOT IN ('converted', 'rejected')"];
  const params: unknown[] = [];
  const filter = selection.filter ?? 'unenriched';
  if (filter !== 'all') where.push("(email IS NULL OR trim(email) = '')");
  if (filter === 'unenriched') where.push("trim(company) = ''");
  if (selection.source) {
    where.push("source_name LIKE ? ESCAPE '\\'");
    params.push(`%${selection.source.replace(/[\\%_]/g, (c) => `\\${c}`)}%`);
  }

  const rows = db.prepare(`SELECT * FROM records WHERE ${where.join(' AND ')} ORDER BY id`).all(...params) as Prospect[];
  return rows.filter((row) => detailUrlOf(row) !== null).slice(0, limit);
}

export interface EnrichStats {
  total: number;
  enriched: number;
  skipped: number;
  failed: number;
  errors: Array<{ recordId: number; error: string }>;
  durationMs: number;
}

/**
 * Enrich the given records one at a time, pausing `enrich.delay_seconds`
 * between page visits. One record's failure never stops the batch.
 */
export async function enrichRecords(
  deps: EnrichDeps,
  recordIds: number[],
  opts: EnrichRecordOptions = {},
): Promise<EnrichStats> {
  const startTime = Date.now();
  const sleep = deps.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  const delayMs = deps.config.enrich.delay_seconds * 1000;
  const stats: EnrichStats = { total: recordIds.length, enriched: 0, skipped: 0, failed: 0, errors: [], durationMs: 0 };

  let visited = false;
  for (const recordId of recordIds) {
    if (visited && delayMs > 0) await sleep(delayMs);
    visited = false;

    try {
      const result = await enrichRecord(deps, recordId, opts);
      visited = result.status !== 'skipped';
      if (result.status === 'enriched') {
        stats.enriched++;
      } else if (result.status === 'skipped') {
        stats.skipped++;
      } else {
        stats.failed++;
        stats.errors.push({ recordId, error: result.error });
      }
    } catch (err) {
      visited = true;
      const error = errorText(err);
      logger.error({ recordId, error }, 'Enrichment failed');
      stats.failed++;
      stats.errors.push({ recordId, error });
    }
  }

  stats.durationMs = Date.now() - startTime;
  logger.info(
    { total: stats.total, enriched: stats.enriched, skipped: stats.skipped, failed: stats.failed },
    'Enrichment complete',
  );
  return stats;
}
