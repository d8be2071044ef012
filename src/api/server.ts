import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { JobQueue } from '../queue/queue.js';
import { LeadlineError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { resolvePath, getLeadlineDir } from '../shared/utils.js';
import { createPipeline } from '../queue/pipeline.js';
import { startScheduler, stopScheduler } from '../queue/scheduler.js';
import { requireTriggerSecret } from './auth.js';
import { systemRoutes } from './routes/system.js';
import { triggerRoutes } from './routes/triggers.js';
import { targetRoutes } from './routes/targets.js';

export interface AppContext {
  db: Database.Database;
  config: Readonly<Config>;
  queue: JobQueue;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  // Health stays open; everything else needs the trigger secret
  app.route('/api', systemRoutes(ctx));

  const gate = requireTriggerSecret(ctx.config.server.trigger_secret);
  app.use('/api/scrape', gate);
  app.use('/api/sync', gate);
  app.use('/api/targets', gate);
  app.use('/api/targets/*', gate);

  app.route('/api', triggerRoutes(ctx));
  app.route('/api', targetRoutes(ctx));

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof LeadlineError) {
      return c.json({ error: err.message, code: err.code, details: err.details }, errorCodeToHttpStatus(err.code));
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
    case 'SELECTOR_ERROR':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'TRANSITION_ERROR':
      return 409;
    case 'FETCH_ERROR':
    case 'CRM_API_ERROR':
      return 502;
    default:
      return 500;
  }
}

/**
 * Write ~/.leadline/config.yaml on first run. Idempotent.
 */
export function autoInit(): string {
  const configPath = path.join(getLeadlineDir(), 'config.yaml');
  if (!fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
    logger.info({ configPath }, 'First run: created default config');
  }
  return configPath;
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  autoInit();

  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = initDb(resolvePath(config.db.path));
  runMigrations(db);

  const pipeline = createPipeline(db, config);
  const app = createApp({ db, config, queue: pipeline.queue });

  if (!config.server.trigger_secret) {
    logger.warn('server.trigger_secret is empty; trigger endpoints will answer 503');
  }

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ port: info.port, host }, 'Leadline server listening');
  });

  startScheduler(db, config, pipeline.queue);

  const shutdown = () => {
    logger.info('Shutting down...');
    stopScheduler();
    pipeline.listener.stop();
    const dropped = pipeline.queue.close();
    if (dropped > 0) logger.info({ dropped }, 'Delayed jobs dropped; the sync sweep picks them up next start');
    server.close();
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
