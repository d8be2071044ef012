import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { crmReadiness } from '../../shared/config.js';
import { getTarget } from '../../scrape/targetDb.js';
import { enqueueAllEnabledTargets } from '../../scrape/runner.js';
import { getProspect } from '../../prospects/prospectDb.js';
import { sweepDueSyncs } from '../../sync/sweep.js';

const ScrapeBody = z.object({
  target_id: z.number().int().positive().optional(),
});

const SyncBody = z.object({
  record_id: z.number().int().positive().optional(),
  force: z.boolean().default(false),
});

export function triggerRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/scrape: one target, or every enabled target
  app.post('/scrape', async (c) => {
    const raw: unknown = await c.req.json().catch(() => ({}));
    const body = ScrapeBody.safeParse(raw);
    if (!body.success) {
      return c.json({ error: 'Invalid body', errors: body.error.flatten().fieldErrors }, 400);
    }

    const targetId = body.data.target_id;
    if (targetId === undefined) {
      const enqueued = enqueueAllEnabledTargets(ctx.db, ctx.queue, 'manual');
      return c.json({ enqueued }, 202);
    }

    if (!getTarget(ctx.db, targetId)) {
      return c.json({ error: `Target ${targetId} not found` }, 404);
    }
    ctx.queue.enqueue('scrape.target', { targetId, trigger: 'manual' });
    return c.json({ enqueued: 1 }, 202);
  });

  // POST /api/sync: one record, or a sweep of everything due
  app.post('/sync', async (c) => {
    const raw: unknown = await c.req.json().catch(() => ({}));
    const body = SyncBody.safeParse(raw);
    if (!body.success) {
      return c.json({ error: 'Invalid body', errors: body.error.flatten().fieldErrors }, 400);
    }

    const readiness = crmReadiness(ctx.config.crm);
    if (readiness !== 'ready') {
      return c.json({ error: 'CRM sync is not available', crm: readiness }, 409);
    }

    const recordId = body.data.record_id;
    if (recordId === undefined) {
      const enqueued = sweepDueSyncs(ctx.db, ctx.queue, new Date(), ctx.config.crm.sweep_limit);
      return c.json({ enqueued }, 202);
    }

    if (!getProspect(ctx.db, recordId)) {
      return c.json({ error: `Record ${recordId} not found` }, 404);
    }
    ctx.queue.enqueue('sync.record', { recordId, force: body.data.force });
    return c.json({ enqueued: 1 }, 202);
  });

  return app;
}
