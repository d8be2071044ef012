import type Database from 'better-sqlite3';
import { assertSyncTransition, type SyncStatus } from '../prospects/status.js';
import { nowISO, toSqlTimestamp } from '../shared/utils.js';
import { DbError } from '../shared/errors.js';

/**
 * Database row shape for the sync_states table.
 */
export interface SyncState {
  record_id: number;
  external_id: string;
  status: SyncStatus;
  payload_hash: string;
  last_payload: string;
  last_error: string;
  attempts: number;
  last_sync_at: string | null;
  next_retry_at: string | null;
  created_at: string;
  updated_at: string;
}

export function getSyncState(db: Database.Database, recordId: number): SyncState | undefined {
  return db.prepare('SELECT * FROM sync_states WHERE record_id = ?').get(recordId) as SyncState | undefined;
}

/**
 * Fetch the sync row for a record, creating it as `pending` on first use.
 */
export function ensureSyncState(db: Database.Database, recordId: number): SyncState {
  db.prepare(`INSERT OR IGNORE INTO sync_states (record_id, status) VALUES (?, 'pending')`).run(recordId);
  const state = getSyncState(db, recordId);
  if (!state) throw new DbError(`Sync state for record ${recordId} could not be created`, { recordId });
  return state;
}

export interface SyncSuccess {
  payloadHash: string;
  payload: string;
  externalId: string;
  at: Date;
}

export function markSynced(db: Database.Database, state: SyncState, success: SyncSuccess): void {
  assertSyncTransition(state.status, 'synced');
  db.prepare(
    `UPDATE sync_states
     SET status = 'synced', last_sync_at = ?, last_error = '', attempts = 0, next_retry_at = NULL,
         payload_hash = ?, last_payload = ?,
         external_id = CASE WHEN ? <> '' THEN ? ELSE external_id END,
         updated_at = ?
     WHERE record_id = ?`,
  ).run(
    toSqlTimestamp(success.at),
    success.payloadHash,
    success.payload,
    success.externalId,
    success.externalId,
    nowISO(),
    state.record_id,
  );
}

export interface SyncFailure {
  attempts: number;
  error: string;
  payload: string;
  nextRetryAt: Date;
}

export function markFailed(db: Database.Database, state: SyncState, failure: SyncFailure): void {
  assertSyncTransition(state.status, 'error');
  db.prepare(
    `UPDATE sync_states
     SET status = 'error', attempts = ?, last_error = ?, last_payload = ?, next_retry_at = ?, updated_at = ?
     WHERE record_id = ?`,
  ).run(
    failure.attempts,
    failure.error,
    failure.payload,
    toSqlTimestamp(failure.nextRetryAt),
    nowISO(),
    state.record_id,
  );
}

/**
 * Record ids whose sync is pending or errored and due: no retry time yet,
 * or a retry time at or before `now`. Oldest due first, nulls leading.
 */
export function listDueSyncs(db: Database.Database, now: Date, limit: number): number[] {
  const rows = db
    .prepare(
      `SELECT record_id FROM sync_states
       WHERE status IN ('pending', 'error')
         AND (next_retry_at IS NULL OR next_retry_at <= ?)
       ORDER BY next_retry_at IS NOT NULL, next_retry_at, record_id
       LIMIT ?`,
    )
    .all(toSqlTimestamp(now), limit) as Array<{ record_id: number }>;
  return rows.map((row) => row.record_id);
}
