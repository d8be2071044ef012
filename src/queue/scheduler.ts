/**
 * Scheduler: node-cron ticks that feed the job queue.
 * Started by `leadline serve`.
 */

import cron from 'node-cron';
import type Database from 'better-sqlite3';
import { crmReadiness, type Config } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { enqueueDueTargets } from '../scrape/runner.js';
import type { JobQueue } from './queue.js';

let targetsTask: cron.ScheduledTask | null = null;
let sweepTask: cron.ScheduledTask | null = null;

/**
 * Start the due-target tick and, when CRM sync is usable, the retry sweep.
 * Returns false when an expression does not validate.
 */
export function startScheduler(db: Database.Database, config: Readonly<Config>, queue: JobQueue): boolean {
  const targetsCron = config.schedule.targets_cron;
  const sweepCron = config.schedule.sync_sweep_cron;

  if (!cron.validate(targetsCron)) {
    logger.warn({ targetsCron }, 'Invalid targets_cron expression, skipping scheduler');
    return false;
  }
  if (!cron.validate(sweepCron)) {
    logger.warn({ sweepCron }, 'Invalid sync_sweep_cron expression, skipping scheduler');
    return false;
  }

  targetsTask = cron.schedule(targetsCron, () => {
    try {
      enqueueDueTargets(db, queue, new Date());
    } catch (e) {
      logger.error({ error: e instanceof Error ? e.message : String(e) }, 'Scheduled target tick failed');
    }
  });

  if (crmReadiness(config.crm) === 'ready') {
    sweepTask = cron.schedule(sweepCron, () => {
      queue.enqueue('sync.sweep', {});
    });
  }

  logger.info(
    { targets_cron: targetsCron, sync_sweep_cron: sweepTask ? sweepCron : null },
    'Scheduler started',
  );
  return true;
}

export function stopScheduler(): void {
  targetsTask?.stop();
  sweepTask?.stop();
  targetsTask = null;
  sweepTask = null;
  logger.info('Scheduler stopped');
}
