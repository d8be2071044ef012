import { logger } from '../shared/logger.js';
import { CrmApiError } from '../shared/errors.js';
import type { Config } from '../shared/config.js';

export type CrmPayload = Record<string, unknown>;

/**
 * Minimal surface of the external CRM's lead API.
 */
export interface CrmClient {
  create(payload: CrmPayload): Promise<unknown>;
  update(externalId: string, payload: CrmPayload): Promise<unknown>;
}

export class HttpCrmClient implements CrmClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;

  constructor(config: Pick<Config['crm'], 'base_url' | 'token' | 'timeout_ms'>) {
    this.baseUrl = config.base_url.trim().replace(/\/+$/, '');
    this.token = config.token.trim();
    this.timeoutMs = config.timeout_ms;
  }

  create(payload: CrmPayload): Promise<unknown> {
    return this.request('POST', '/api/leads', payload);
  }

  update(externalId: string, payload: CrmPayload): Promise<unknown> {
    return this.request('PUT', `/api/leads/${encodeURIComponent(externalId)}`, payload);
  }

  private async request(method: 'POST' | 'PUT', path: string, payload: CrmPayload): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new CrmApiError(`CRM request timed out after ${this.timeoutMs}ms`, 0, '', { url, method });
      }
      const reason = err instanceof Error && err.cause instanceof Error ? err.cause.message : String(err);
      throw new CrmApiError(`CRM network error: ${reason}`, 0, '', { url, method });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      const body = text.slice(0, 500);
      throw new CrmApiError(`CRM API error ${response.status}: ${body}`, response.status, body, { url, method });
    }

    logger.debug({ method, url, status: response.status }, 'CRM call completed');

    // Some CRM modules answer with plain text
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      return text;
    }
  }
}
