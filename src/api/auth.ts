import { createHash, timingSafeEqual } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';

export const TRIGGER_SECRET_HEADER = 'X-Trigger-Secret';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Constant-time comparison; both sides are hashed first so lengths match.
 */
export function secretsMatch(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected));
}

/**
 * Gate operator triggers behind the shared secret. With no secret configured
 * the triggers are unavailable rather than open.
 */
export function requireTriggerSecret(secret: string): MiddlewareHandler {
  return async (c, next) => {
    if (!secret) {
      return c.json({ error: 'Trigger secret is not configured' }, 503);
    }
    const provided = c.req.header(TRIGGER_SECRET_HEADER) ?? '';
    if (!secretsMatch(provided, secret)) {
      return c.json({ error: 'Invalid trigger secret' }, 401);
    }
    await next();
  };
}
