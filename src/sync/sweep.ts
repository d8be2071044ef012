import type Database from 'better-sqlite3';
import type { JobQueue } from '../queue/queue.js';
import { logger } from '../shared/logger.js';
import { listDueSyncs } from './syncDb.js';

/**
 * Enqueue a sync job for every pending or errored record whose retry time
 * has come. Returns the number of jobs enqueued.
 */
export function sweepDueSyncs(db: Database.Database, queue: JobQueue, now: Date, limit: number): number {
  const ids = listDueSyncs(db, now, limit);
  for (const recordId of ids) {
    queue.enqueue('sync.record', { recordId });
  }
  if (ids.length > 0) {
    logger.info({ enqueued: ids.length }, 'Due syncs enqueued');
  }
  return ids.length;
}
