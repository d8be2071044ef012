import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { Target } from '../scrape/targetDb.js';
import { hashObject } from '../shared/hashing.js';
import { normalizePhone, parseEventWhen } from './normalize.js';
import { isTerminal } from './status.js';
import {
  findByEmail,
  findByPhone,
  findByPayloadHash,
  insertProspect,
  updateProspect,
  requireProspect,
  PROSPECT_FIELD_NAMES,
  type Prospect,
  type ProspectFields,
  type ProspectUpdate,
} from './prospectDb.js';

export type ScrapedValue = string | number | boolean | null | undefined;
export type RowInput = Record<string, ScrapedValue>;

export interface UpsertOptions {
  defaultRegion?: string;
  matchByContentHash: boolean;
  contentHashScope: 'global' | 'source';
}

export interface UpsertResult {
  prospect: Prospect;
  created: boolean;
}

export interface UpsertBatchResult {
  created: number;
  updated: number;
  results: Array<{ id: number; created: boolean }>;
}

export function upsertOptionsFromConfig(config: Pick<Config, 'scrape' | 'dedup'>): UpsertOptions {
  return {
    ...(config.scrape.default_region ? { defaultRegion: config.scrape.default_region } : {}),
    matchByContentHash: config.dedup.match_by_content_hash,
    contentHashScope: config.dedup.content_hash_scope,
  };
}

/**
 * First candidate key whose value is non-empty after trimming.
 */
export function firstNonEmpty(row: RowInput, keys: readonly string[]): string {
  for (const key of keys) {
    const value = row[key];
    if (value === null || value === undefined) continue;
    const text = String(value).trim();
    if (text) return text;
  }
  return '';
}

const CANDIDATES = {
  email: ['email', 'email_address'],
  phone: ['phone', 'phone_number', 'phonenumber'],
  full_name: ['full_name', 'name', 'title'],
  company: ['company', 'organization'],
  website: ['website', 'url', 'website_url', 'site'],
  event_name: ['event_name', 'event_text', 'date_text', 'event_description', 'description'],
  event_when: ['event_date', 'date', 'date_text', 'start_date'],
  source_ref: ['source_ref', 'id', 'ref', 'listing_id'],
} as const;

export function mapRowToFields(
  target: Pick<Target, 'name' | 'start_url'>,
  row: RowInput,
  defaultRegion?: string,
): ProspectFields {
  const email = firstNonEmpty(row, CANDIDATES.email);
  const phone = firstNonEmpty(row, CANDIDATES.phone);
  const normalized = phone ? normalizePhone(phone, defaultRegion) : null;
  const when = parseEventWhen(firstNonEmpty(row, CANDIDATES.event_when));
  const pageUrl = row['_page_url'];

  return {
    source_name: target.name,
    source_url: typeof pageUrl === 'string' && pageUrl ? pageUrl : target.start_url,
    source_ref: firstNonEmpty(row, CANDIDATES.source_ref),
    email: email || null,
    phone_raw: phone,
    phone_e164: normalized?.e164 ?? '',
    phone_region: normalized?.region ?? '',
    full_name: firstNonEmpty(row, CANDIDATES.full_name),
    company: firstNonEmpty(row, CANDIDATES.company),
    website: firstNonEmpty(row, CANDIDATES.website),
    event_name: firstNonEmpty(row, CANDIDATES.event_name),
    event_date: when.date,
    event_datetime: when.datetime,
  };
}

/**
 * Conservative union merge: a field changes only when the new value is
 * non-empty and differs from the trimmed current value. Blank never erases.
 */
export function mergeFields(existing: Prospect, incoming: ProspectFields): Partial<ProspectFields> {
  const dirty: Partial<ProspectFields> = {};
  for (const key of PROSPECT_FIELD_NAMES) {
    const next = incoming[key];
    if (next === null) continue;
    const trimmed = next.trim();
    const current = existing[key];
    if (trimmed && (current ?? '').trim() !== trimmed) {
      dirty[key] = trimmed;
    }
  }
  return dirty;
}

function resolveExisting(
  db: Database.Database,
  fields: ProspectFields,
  rawHash: string,
  options: UpsertOptions,
): Prospect | undefined {
  if (fields.email) {
    const byEmail = findByEmail(db, fields.email);
    if (byEmail) return byEmail;
  }
  if (fields.phone_e164) {
    const byPhone = findByPhone(db, fields.phone_e164);
    if (byPhone) return byPhone;
  }
  if (options.matchByContentHash && rawHash) {
    const scope = options.contentHashScope === 'source' ? fields.source_name : undefined;
    return findByPayloadHash(db, rawHash, scope);
  }
  return undefined;
}

/**
 * Create or cautiously update one record from one scraped row. Identity is
 * resolved by email, then phone, then raw-payload hash. Records in a terminal
 * status come back untouched.
 */
export function upsertProspect(
  db: Database.Database,
  target: Pick<Target, 'name' | 'start_url'>,
  row: RowInput,
  options: UpsertOptions,
): UpsertResult {
  const rawHash = hashObject(row);
  const rawPayload = JSON.stringify(row);
  const fields = mapRowToFields(target, row, options.defaultRegion);

  const existing = resolveExisting(db, fields, rawHash, options);
  if (!existing) {
    const id = insertProspect(db, fields, rawPayload, rawHash);
    return { prospect: requireProspect(db, id), created: true };
  }

  if (isTerminal(existing.status)) {
    return { prospect: existing, created: false };
  }

  const update: ProspectUpdate = {
    ...mergeFields(existing, fields),
    raw_payload: rawPayload,
    raw_payload_hash: rawHash,
  };
  updateProspect(db, existing.id, update);
  return { prospect: requireProspect(db, existing.id), created: false };
}

/**
 * Upsert a batch of rows inside one transaction.
 */
export function upsertRows(
  db: Database.Database,
  target: Pick<Target, 'name' | 'start_url'>,
  rows: readonly RowInput[],
  options: UpsertOptions,
): UpsertBatchResult {
  const run = db.transaction((batch: readonly RowInput[]) => {
    const summary: UpsertBatchResult = { created: 0, updated: 0, results: [] };
    for (const row of batch) {
      const { prospect, created } = upsertProspect(db, target, row, options);
      if (created) summary.created++;
      else summary.updated++;
      summary.results.push({ id: prospect.id, created });
    }
    return summary;
  });
  return run(rows);
}
