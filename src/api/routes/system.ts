import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { crmReadiness } from '../../shared/config.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health: basic health check
  app.get('/health', (c) => {
    let db = 'ok';
    try {
      ctx.db.prepare('SELECT 1').get();
    } catch {
      db = 'error';
    }

    return c.json({
      status: db === 'ok' ? 'ok' : 'degraded',
      version: '0.1.0',
      uptime: process.uptime(),
      db,
      crm: crmReadiness(ctx.config.crm),
    });
  });

  return app;
}
