import type Database from 'better-sqlite3';
import { crmReadiness, type Config } from '../shared/config.js';
import type { Fetchers } from '../scrape/fetch.js';
import type { ProspectEvents } from '../prospects/events.js';
import type { SyncOrchestrator } from '../sync/orchestrator.js';
import type { JobQueue } from './queue.js';
import { runScrapeJob, enqueueAllEnabledTargets } from '../scrape/runner.js';
import { sweepDueSyncs } from '../sync/sweep.js';
import { logger } from '../shared/logger.js';

export interface JobContext {
  db: Database.Database;
  config: Readonly<Config>;
  queue: JobQueue;
  fetchers: Fetchers;
  events: ProspectEvents;
  orchestrator: SyncOrchestrator;
}

export function registerJobs(ctx: JobContext): void {
  const { db, config, queue } = ctx;

  queue.register('scrape.target', async ({ targetId, trigger }) => {
    await runScrapeJob(
      { db, config, fetchers: ctx.fetchers, events: ctx.events },
      targetId,
      trigger,
    );
  });

  queue.register('scrape.all', async ({ trigger }) => {
    enqueueAllEnabledTargets(db, queue, trigger);
  });

  queue.register('sync.record', async ({ recordId, force }) => {
    const result = await ctx.orchestrator.syncRecord(recordId, { force: force ?? false });
    if (result.status !== 'error') return;

    if (result.willRetry) {
      queue.enqueue('sync.record', { recordId }, { delaySeconds: result.retryDelaySeconds });
    } else {
      logger.error({ recordId, attempts: result.attempts }, 'CRM sync retries exhausted');
    }
  });

  queue.register('sync.sweep', async () => {
    if (crmReadiness(config.crm) !== 'ready') return;
    sweepDueSyncs(db, queue, new Date(), config.crm.sweep_limit);
  });
}
