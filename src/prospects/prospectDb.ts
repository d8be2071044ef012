import type Database from 'better-sqlite3';
import { assertRecordTransition, type RecordStatus } from './status.js';
import { DbError, NotFoundError } from '../shared/errors.js';
import { nowISO, isPlainObject } from '../shared/utils.js';

/**
 * Database row shape for the records table.
 */
export interface Prospect {
  id: number;
  status: RecordStatus;
  email: string | null;
  phone_raw: string;
  phone_e164: string;
  phone_region: string;
  full_name: string;
  company: string;
  website: string;
  event_name: string;
  event_date: string | null;
  event_datetime: string | null;
  source_name: string;
  source_url: string;
  source_ref: string;
  raw_payload: string;
  raw_payload_hash: string;
  notes: string;
  created_at: string;
  updated_at: string;
}

/**
 * Fields the upsert engine maps out of a scraped row.
 */
export interface ProspectFields {
  source_name: string;
  source_url: string;
  source_ref: string;
  email: string | null;
  phone_raw: string;
  phone_e164: string;
  phone_region: string;
  full_name: string;
  company: string;
  website: string;
  event_name: string;
  event_date: string | null;
  event_datetime: string | null;
}

export const PROSPECT_FIELD_NAMES: ReadonlyArray<keyof ProspectFields> = [
  'source_name',
  'source_url',
  'source_ref',
  'email',
  'phone_raw',
  'phone_e164',
  'phone_region',
  'full_name',
  'company',
  'website',
  'event_name',
  'event_date',
  'event_datetime',
];

export type ProspectUpdate = Partial<ProspectFields> & {
  raw_payload?: string;
  raw_payload_hash?: string;
  notes?: string;
};

export function getProspect(db: Database.Database, id: number): Prospect | undefined {
  return db.prepare('SELECT * FROM records WHERE id = ?').get(id) as Prospect | undefined;
}

export function requireProspect(db: Database.Database, id: number): Prospect {
  const prospect = getProspect(db, id);
  if (!prospect) throw new NotFoundError(`Record ${id} not found`, { id });
  return prospect;
}

export function findByEmail(db: Database.Database, email: string): Prospect | undefined {
  return db
    .prepare('SELECT * FROM records WHERE email = ? COLLATE NOCASE ORDER BY id DESC LIMIT 1')
    .get(email.trim()) as Prospect | undefined;
}

export function findByPhone(db: Database.Database, e164: string): Prospect | undefined {
  return db
    .prepare('SELECT * FROM records WHERE phone_e164 = ? ORDER BY id DESC LIMIT 1')
    .get(e164) as Prospect | undefined;
}

export function findByPayloadHash(
  db: Database.Database,
  hash: string,
  sourceName?: string,
): Prospect | undefined {
  if (!hash) return undefined;
  if (sourceName !== undefined) {
    return db
      .prepare('SELECT * FROM records WHERE raw_payload_hash = ? AND source_name = ? ORDER BY id DESC LIMIT 1')
      .get(hash, sourceName) as Prospect | undefined;
  }
  return db
    .prepare('SELECT * FROM records WHERE raw_payload_hash = ? ORDER BY id DESC LIMIT 1')
    .get(hash) as Prospect | undefined;
}

export function insertProspect(
  db: Database.Database,
  fields: ProspectFields,
  rawPayload: string,
  rawPayloadHash: string,
): number {
  const now = nowISO();
  try {
    const result = db
      .prepare(
        `INSERT INTO records
         (status, email, phone_raw, phone_e164, phone_region, full_name, company, website, event_name,
          event_date, event_datetime, source_name, source_url, source_ref, raw_payload, raw_payload_hash,
          created_at, updated_at)
         VALUES ('new', ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        fields.email,
        fields.phone_raw,
        fields.phone_e164,
        fields.phone_region,
        fields.full_name,
        fields.company,
        fields.website,
        fields.event_name,
        fields.event_date,
        fields.event_datetime,
        fields.source_name,
        fields.source_url,
        fields.source_ref,
        rawPayload,
        rawPayloadHash,
        now,
        now,
      );
    return Number(result.lastInsertRowid);
  } catch (err) {
    throw new DbError(`Failed to insert record: ${err instanceof Error ? err.message : String(err)}`, {
      source_name: fields.source_name,
    });
  }
}

const UPDATABLE_COLUMNS: ReadonlySet<string> = new Set<string>([
  ...PROSPECT_FIELD_NAMES,
  'raw_payload',
  'raw_payload_hash',
  'notes',
]);

export function updateProspect(db: Database.Database, id: number, update: ProspectUpdate): boolean {
  const entries = Object.entries(update).filter(
    ([column, value]) => UPDATABLE_COLUMNS.has(column) && value !== undefined,
  );
  if (entries.length === 0) return false;

  const sets = entries.map(([column]) => `${column} = ?`);
  const values: unknown[] = entries.map(([, value]) => value);
  sets.push('updated_at = ?');
  values.push(nowISO(), id);

  const result = db.prepare(`UPDATE records SET ${sets.join(', ')} WHERE id = ?`).run(...values);
  return result.changes > 0;
}

/**
 * Move a record along its status model; invalid moves raise TransitionError.
 */
export function setProspectStatus(db: Database.Database, id: number, to: RecordStatus): Prospect {
  const current = requireProspect(db, id);
  assertRecordTransition(current.status, to);
  if (current.status !== to) {
    db.prepare('UPDATE records SET status = ?, updated_at = ? WHERE id = ?').run(to, nowISO(), id);
  }
  return requireProspect(db, id);
}

export function listProspects(
  db: Database.Database,
  opts: { status?: RecordStatus; limit?: number } = {},
): Prospect[] {
  const limit = opts.limit ?? 100;
  if (opts.status) {
    return db
      .prepare('SELECT * FROM records WHERE status = ? ORDER BY id DESC LIMIT ?')
      .all(opts.status, limit) as Prospect[];
  }
  return db.prepare('SELECT * FROM records ORDER BY id DESC LIMIT ?').all(limit) as Prospect[];
}

export function parseRawPayload(prospect: Pick<Prospect, 'raw_payload'>): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(prospect.raw_payload);
    return isPlainObject(parsed) ? parsed : {};
  } catch {
    return {};
  }
}
