import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { createFetchers, type Fetchers } from '../scrape/fetch.js';
import { ProspectEvents } from '../prospects/events.js';
import { HttpCrmClient, type CrmClient } from '../sync/crmClient.js';
import { SyncOrchestrator } from '../sync/orchestrator.js';
import { SyncListener } from '../sync/listener.js';
import { LocalJobQueue } from './queue.js';
import { registerJobs, type JobContext } from './jobs.js';

export interface Pipeline extends JobContext {
  queue: LocalJobQueue;
  listener: SyncListener;
}

export interface PipelineOverrides {
  fetchers?: Fetchers;
  crmClient?: CrmClient;
}

/**
 * Wire the in-process pipeline: queue, fetchers, record events, CRM sync and
 * the listener between them. The listener is started; jobs are registered.
 */
export function createPipeline(
  db: Database.Database,
  config: Readonly<Config>,
  overrides: PipelineOverrides = {},
): Pipeline {
  const queue = new LocalJobQueue();
  const events = new ProspectEvents();
  const fetchers = overrides.fetchers ?? createFetchers(config.scrape);
  const orchestrator = new SyncOrchestrator(db, config.crm, overrides.crmClient ?? new HttpCrmClient(config.crm));
  const listener = new SyncListener(events, queue);

  const pipeline: Pipeline = { db, config, queue, events, fetchers, orchestrator, listener };
  registerJobs(pipeline);
  listener.start();
  return pipeline;
}
