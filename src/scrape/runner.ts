import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { Fetchers } from './fetch.js';
import type { JobQueue } from '../queue/queue.js';
import type { ProspectEvents } from '../prospects/events.js';
import { upsertRows, upsertOptionsFromConfig, type UpsertBatchResult } from '../prospects/upsert.js';
import { scrapeTarget } from './paginate.js';
import {
  createRun,
  finishRun,
  getTarget,
  listDueTargets,
  listTargets,
  loadTargetConfig,
  markTargetRun,
  type RunOutcome,
  type RunTrigger,
} from './targetDb.js';
import { classifyError, errorText, isContained, type FailureCategory } from '../shared/classify.js';
import { NotFoundError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface ScrapeDeps {
  db: Database.Database;
  config: Pick<Config, 'scrape' | 'dedup'>;
  fetchers: Fetchers;
  events: ProspectEvents;
}

export interface ScrapeJobResult {
  runId: number;
  targetId: number;
  status: 'success' | 'failed';
  itemCount: number;
  created: number;
  updated: number;
  category?: FailureCategory;
  error?: string;
}

/**
 * One scrape of one target, recorded as a Run. Rows are upserted in a single
 * transaction; "record ready" events go out only after it commits.
 *
 * Network, timeout and configuration failures fail the Run and come back as
 * a result, so sibling targets keep running. Anything else fails the Run and
 * is re-thrown to the queue.
 */
export async function runScrapeJob(
  deps: ScrapeDeps,
  targetId: number,
  trigger: RunTrigger = 'manual',
): Promise<ScrapeJobResult> {
  const { db } = deps;
  const target = getTarget(db, targetId);
  if (!target) throw new NotFoundError(`Target ${targetId} not found`, { targetId });

  const startTime = Date.now();
  const runId = createRun(db, target.id, trigger);
  let outcome: RunOutcome = {
    status: 'failed',
    itemCount: 0,
    created: 0,
    updated: 0,
    stats: {},
    errorText: 'Run ended without an outcome',
  };

  try {
    const config = loadTargetConfig(target);
    const rows = await scrapeTarget(target, config, deps.fetchers);
    const batch: UpsertBatchResult = upsertRows(db, target, rows, upsertOptionsFromConfig(deps.config));

    outcome = {
      status: 'success',
      itemCount: rows.length,
      created: batch.created,
      updated: batch.updated,
      stats: { created: batch.created, updated: batch.updated, durationMs: Date.now() - startTime },
    };

    for (const result of batch.results) {
      deps.events.publish({ prospectId: result.id, created: result.created, targetId: target.id, runId });
    }

    logger.info(
      { target: target.name, runId, items: rows.length, created: batch.created, updated: batch.updated },
      'Scrape complete',
    );
    return { runId, targetId: target.id, status: 'success', itemCount: rows.length, created: batch.created, updated: batch.updated };
  } catch (err) {
    const category = classifyError(err);
    const message = errorText(err);
    outcome = {
      status: 'failed',
      itemCount: 0,
      created: 0,
      updated: 0,
      stats: { category, durationMs: Date.now() - startTime },
      errorText: message,
    };

    if (!isContained(category)) {
      logger.error({ target: target.name, runId, error: message }, 'Scrape failed');
      throw err;
    }
    logger.warn({ target: target.name, runId, category, error: message }, 'Scrape failed, continuing');
    return { runId, targetId: target.id, status: 'failed', itemCount: 0, created: 0, updated: 0, category, error: message };
  } finally {
    finishRun(db, runId, outcome);
    markTargetRun(db, target.id, new Date());
  }
}

/**
 * Enqueue a scheduled scrape for every enabled target whose interval has
 * elapsed. Returns the number enqueued.
 */
export function enqueueDueTargets(db: Database.Database, queue: JobQueue, now: Date = new Date()): number {
  const due = listDueTargets(db, now);
  for (const target of due) {
    queue.enqueue('scrape.target', { targetId: target.id, trigger: 'scheduled' });
  }
  if (due.length > 0) logger.info({ count: due.length }, 'Due targets enqueued');
  return due.length;
}

export function enqueueAllEnabledTargets(
  db: Database.Database,
  queue: JobQueue,
  trigger: RunTrigger = 'manual',
): number {
  const targets = listTargets(db, { enabledOnly: true });
  for (const target of targets) {
    queue.enqueue('scrape.target', { targetId: target.id, trigger });
  }
  return targets.length;
}
