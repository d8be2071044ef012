import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { getTarget, listRuns, listTargets } from '../../scrape/targetDb.js';

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function targetRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/targets
  app.get('/targets', (c) => {
    const targets = listTargets(ctx.db).map(({ config_json, ...target }) => ({
      ...target,
      enabled: target.enabled === 1,
      config: parseJson(config_json),
    }));
    return c.json(targets);
  });

  // GET /api/targets/:id/runs?limit=N
  app.get('/targets/:id/runs', (c) => {
    const id = Number(c.req.param('id'));
    if (!Number.isInteger(id) || !getTarget(ctx.db, id)) {
      return c.json({ error: 'Target not found' }, 404);
    }
    const limit = Math.min(Math.max(Number(c.req.query('limit') ?? '20') || 20, 1), 200);
    const runs = listRuns(ctx.db, id, { limit }).map(({ stats_json, ...run }) => ({
      ...run,
      stats: parseJson(stats_json),
    }));
    return c.json(runs);
  });

  return app;
}
