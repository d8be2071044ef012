import type { Fetchers } from './fetch.js';
import type { Target } from './targetDb.js';
import type { TargetConfig } from './targetConfig.js';
import { extractItems, extractNextPageUrl } from './extract.js';
import { logger } from '../shared/logger.js';

/**
 * Extracted row plus bookkeeping keys naming where it came from. The
 * bookkeeping keys are part of the raw snapshot but never candidate values.
 */
export interface ScrapedRow extends Record<string, string | number> {
  _page_url: string;
  _target_id: number;
  _target_name: string;
}

function tagRow(row: Record<string, string>, pageUrl: string, target: Target): ScrapedRow {
  // Field names never collide with bookkeeping keys; parseTargetConfig rejects them.
  const tagged: ScrapedRow = {
    _page_url: pageUrl,
    _target_id: target.id,
    _target_name: target.name,
  };
  for (const [key, value] of Object.entries(row)) {
    tagged[key] = value;
  }
  return tagged;
}

/**
 * Fetch a target's pages one after another, extracting rows from each and
 * following the next-page link. Stops when no next-page selector is set, no
 * link is found, the page cap is reached, or the link points back to a page
 * already visited.
 */
export async function scrapeTarget(
  target: Target,
  config: TargetConfig,
  fetchers: Fetchers,
): Promise<ScrapedRow[]> {
  const fetcher = target.render_mode === 'browser' ? fetchers.browser : fetchers.static;
  const rows: ScrapedRow[] = [];
  const visited = new Set<string>();
  let url: string | null = target.start_url;

  for (let page = 1; url && page <= config.maxPages; page++) {
    visited.add(url);
    const html = await fetcher.fetchPage(url, {
      timeoutSeconds: config.timeoutSeconds,
      headers: config.headers,
      waitUntil: config.waitUntil,
    });

    const items = extractItems(html, config);
    for (const item of items) {
      rows.push(tagRow(item, url, target));
    }
    logger.debug({ target: target.name, page, url, items: items.length }, 'Page extracted');

    if (!config.nextPageSelector) break;
    const next = extractNextPageUrl(html, config.nextPageSelector, url);
    if (!next || visited.has(next)) break;

    logger.info({ target: target.name, page, next }, 'Following next page');
    url = next;
  }

  return rows;
}
