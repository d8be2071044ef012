import { chromium } from 'playwright-core';
import type { Config } from '../shared/config.js';
import { FetchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { WaitUntil } from './targetConfig.js';

export interface FetchPageOptions {
  timeoutSeconds: number;
  headers?: Record<string, string>;
  waitUntil?: WaitUntil;
}

/**
 * Fetches one page and returns its HTML. Implementations turn every failure
 * into a FetchError whose kind separates network/DNS, timeout and HTTP.
 */
export interface PageFetcher {
  fetchPage(url: string, options: FetchPageOptions): Promise<string>;
}

function causeText(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause;
  if (cause instanceof Error) return cause.message;
  if (cause && typeof cause === 'object' && 'code' in cause) return String(cause.code);
  return err.message;
}

/**
 * Static GET through the global fetch.
 */
export class HttpFetcher implements PageFetcher {
  constructor(private readonly userAgent: string) {}

  async fetchPage(url: string, options: FetchPageOptions): Promise<string> {
    const timeoutMs = options.timeoutSeconds * 1000;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          headers: {
            'User-Agent': this.userAgent,
            Accept: 'text/html,application/xhtml+xml',
            ...options.headers,
          },
          signal: controller.signal,
          redirect: 'follow',
        });
      } catch (err) {
        if (controller.signal.aborted) {
          throw new FetchError(`Request timeout after ${timeoutMs}ms fetching ${url}`, 'timeout', { url });
        }
        throw new FetchError(`Network error fetching ${url}: ${causeText(err)}`, 'network', { url });
      }

      if (!response.ok) {
        throw new FetchError(`HTTP ${response.status} ${response.statusText} fetching ${url}`, 'http', {
          url,
          status: response.status,
        });
      }

      try {
        return await response.text();
      } catch (err) {
        if (controller.signal.aborted) {
          throw new FetchError(`Request timeout after ${timeoutMs}ms reading ${url}`, 'timeout', { url });
        }
        throw new FetchError(`Network error reading ${url}: ${causeText(err)}`, 'network', { url });
      }
    } finally {
      clearTimeout(timer);
    }
  }
}

const NETWORK_ERROR_MARKERS = ['net::err_name_not_resolved', 'net::err_connection', 'net::err_address_unreachable', 'net::err_internet_disconnected'];

/**
 * Headless chromium navigation for script-rendered pages. A fresh browser per
 * page keeps units of work free of shared state.
 */
export class BrowserFetcher implements PageFetcher {
  constructor(private readonly timeoutFactor: number) {}

  async fetchPage(url: string, options: FetchPageOptions): Promise<string> {
    const timeoutMs = Math.round(options.timeoutSeconds * 1000 * this.timeoutFactor);
    const browser = await chromium.launch({ headless: true });
    try {
      const context = await browser.newContext(
        options.headers ? { extraHTTPHeaders: options.headers } : {},
      );
      const page = await context.newPage();
      await page.goto(url, { waitUntil: options.waitUntil ?? 'networkidle', timeout: timeoutMs });
      return await page.content();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const lower = message.toLowerCase();
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new FetchError(`Browser navigation timeout after ${timeoutMs}ms for ${url}`, 'timeout', { url });
      }
      if (NETWORK_ERROR_MARKERS.some((m) => lower.includes(m))) {
        throw new FetchError(`Network error navigating to ${url}: ${message}`, 'network', { url });
      }
      throw err;
    } finally {
      await browser.close().catch((closeErr: unknown) => {
        logger.warn({ url, error: closeErr instanceof Error ? closeErr.message : String(closeErr) }, 'Browser close failed');
      });
    }
  }
}

export interface Fetchers {
  static: PageFetcher;
  browser: PageFetcher;
}

export function createFetchers(scrape: Config['scrape']): Fetchers {
  return {
    static: new HttpFetcher(scrape.user_agent),
    browser: new BrowserFetcher(scrape.browser_timeout_factor),
  };
}
