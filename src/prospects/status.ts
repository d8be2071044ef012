import { TransitionError } from '../shared/errors.js';

export const RECORD_STATUSES = ['new', 'contacted', 'synced', 'converted', 'rejected'] as const;
export type RecordStatus = (typeof RECORD_STATUSES)[number];

export const SYNC_STATUSES = ['pending', 'synced', 'error'] as const;
export type SyncStatus = (typeof SYNC_STATUSES)[number];

/** Statuses after which scraping never overwrites a record. */
export const TERMINAL_RECORD_STATUSES: ReadonlySet<RecordStatus> = new Set(['converted', 'rejected']);

const RECORD_TRANSITIONS: Record<RecordStatus, readonly RecordStatus[]> = {
  new: ['contacted', 'synced', 'converted', 'rejected'],
  contacted: ['synced', 'converted', 'rejected'],
  synced: ['synced', 'contacted', 'converted', 'rejected'],
  converted: [],
  rejected: [],
};

const SYNC_TRANSITIONS: Record<SyncStatus, readonly SyncStatus[]> = {
  pending: ['synced', 'error'],
  error: ['synced', 'error'],
  synced: ['synced', 'error'],
};

export function isTerminal(status: RecordStatus): boolean {
  return TERMINAL_RECORD_STATUSES.has(status);
}

export function canTransitionRecord(from: RecordStatus, to: RecordStatus): boolean {
  return from === to || RECORD_TRANSITIONS[from].includes(to);
}

export function canTransitionSync(from: SyncStatus, to: SyncStatus): boolean {
  return SYNC_TRANSITIONS[from].includes(to);
}

export function assertRecordTransition(from: RecordStatus, to: RecordStatus): void {
  if (!canTransitionRecord(from, to)) {
    throw new TransitionError(`Record status cannot move from ${from} to ${to}`, { from, to });
  }
}

export function assertSyncTransition(from: SyncStatus, to: SyncStatus): void {
  if (!canTransitionSync(from, to)) {
    throw new TransitionError(`Sync status cannot move from ${from} to ${to}`, { from, to });
  }
}

export function isRecordStatus(value: string): value is RecordStatus {
  return (RECORD_STATUSES as readonly string[]).includes(value);
}
