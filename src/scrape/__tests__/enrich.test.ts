import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { ConfigSchema } from '../../shared/config.js';
import { FetchError } from '../../shared/errors.js';
import { ProspectEvents, type ProspectReadyEvent } from '../../prospects/events.js';
import { getProspect, setProspectStatus } from '../../prospects/prospectDb.js';
import { upsertProspect } from '../../prospects/upsert.js';
import type { PlatformTable } from '../discover.js';
import type { Fetchers } from '../fetch.js';
import {
  detailUrlOf,
  enrichRecord,
  enrichRecords,
  extractDetailFields,
  selectEnrichCandidates,
  type EnrichDeps,
} from '../enrich.js';

const TARGET = { name: 'County Fairs', start_url: 'https://fairs.test/list' };
const CARD_CONFIG = { item_selector: '.card', fields: { name: 'h2' } };

const PLATFORMS: PlatformTable = {
  generic: { domains: [], render_mode: 'static', config: CARD_CONFIG, detail: {} },
  tickets: {
    domains: ['tickets.test'],
    render_mode: 'browser',
    config: CARD_CONFIG,
    detail: { company: '.organizer h3', website: 'a.org-site@href' },
  },
};

const DETAIL_HTML = `<html>
<head><meta name="description" content="  Crafts, food and   music.  "></head>
<body>
  <p>Organized by <strong>Valley Makers Guild</strong></p>
  <p>Write to <a href="mailto:noreply@fairs.test">us</a> or <a href="mailto:hello@valleymakers.test?subject=Hi">hello</a></p>
  <p>Call (650) 253-0000 for tickets.</p>
  <time datetime="2026-05-02T10:00:00Z">May 2</time>
  <script>var contact = "ops@fairs.test";</script>
</body>
</html>`;

let db: Database.Database;
let events: ProspectEvents;
let published: ProspectReadyEvent[];

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  events = new ProspectEvents();
  published = [];
  events.subscribe((event) => published.push(event));
});

afterEach(() => {
  db.close();
});

function addRecord(row: Record<string, string>, target = TARGET): number {
  return upsertProspect(db, target, row, { matchByContentHash: true, contentHashScope: 'global' }).prospect.id;
}

function fetchersFor(fetchPage: (url: string) => Promise<string>): Fetchers {
  return { static: { fetchPage }, browser: { fetchPage } };
}

function deps(fetchers: Fetchers, delaySeconds = 0): EnrichDeps {
  return {
    db,
    config: ConfigSchema.parse({ scrape: { default_region: 'US' }, enrich: { delay_seconds: delaySeconds } }),
    fetchers,
    events,
    platforms: PLATFORMS,
  };
}

describe('extractDetailFields', () => {
  it('finds contact details with the generic heuristics', () => {
    expect(extractDetailFields(DETAIL_HTML, {}, 'US')).toEqual({
      email: 'hello@valleymakers.test',
      phone: '(650) 253-0000',
      company: 'Valley Makers Guild',
      event_name: 'Crafts, food and music.',
      event_date: '2026-05-02T10:00:00Z',
    });
  });

  it('prefers platform detail selectors', () => {
    const html = `<div class="organizer"><h3>Acme Events</h3></div>
      <p>Hosted by Someone Else</p>
      <a class="org-site" href="https://acme.test/">site</a>`;
    expect(extractDetailFields(html, { company: '.organizer h3', website: 'a.org-site@href' })).toEqual({
      company: 'Acme Events',
      website: 'https://acme.test/',
    });
  });

  it('reads the organizer from the same text node and skips placeholder addresses', () => {
    const html = '<p>Contact: Riverside Arts Council, 12 Main St</p><p>info@example.test</p>';
    expect(extractDetailFields(html)).toEqual({ company: 'Riverside Arts Council' });
  });

  it('ignores phone-like text that does not parse as a number', () => {
    expect(extractDetailFields('<p>Ref 2026-05-01</p>', {}, 'US')).toEqual({});
  });
});

describe('detailUrlOf', () => {
  const listing = 'https://fairs.test/list';

  it('resolves the scraped url against the listing page', () => {
    expect(detailUrlOf({ raw_payload: '{"url":"/events/1"}', source_url: listing, website: '' })).toBe(
      'https://fairs.test/events/1',
    );
  });

  it('falls back to the website when the scraped url is not http', () => {
    expect(
      detailUrlOf({ raw_payload: '{"url":"javascript:void(0)"}', source_url: listing, website: 'https://acme.test' }),
    ).toBe('https://acme.test/');
  });

  it('never returns the listing page itself', () => {
    expect(detailUrlOf({ raw_payload: `{"url":"${listing}"}`, source_url: listing, website: '' })).toBeNull();
    expect(detailUrlOf({ raw_payload: 'not json', source_url: listing, website: '' })).toBeNull();
  });
});

describe('enrichRecord', () => {
  it('fills only empty fields and announces the change', async () => {
    const id = addRecord({ name: 'Spring Fair', url: '/events/1', company: 'Fair Co' });
    const fetchPage = vi.fn(async () => DETAIL_HTML);

    const result = await enrichRecord(deps(fetchersFor(fetchPage)), id);

    expect(result).toEqual({
      status: 'enriched',
      recordId: id,
      url: 'https://fairs.test/events/1',
      updatedFields: ['email', 'phone_raw', 'phone_e164', 'phone_region', 'event_name', 'event_date', 'event_datetime'],
    });
    expect(fetchPage).toHaveBeenCalledWith('https://fairs.test/events/1', { timeoutSeconds: 30 });
    expect(getProspect(db, id)).toMatchObject({
      full_name: 'Spring Fair',
      company: 'Fair Co',
      email: 'hello@valleymakers.test',
      phone_raw: '(650) 253-0000',
      phone_e164: '+16502530000',
      phone_region: 'US',
      event_name: 'Crafts, food and music.',
      event_date: '2026-05-02',
      event_datetime: '2026-05-02T10:00:00.000Z',
      status: 'new',
    });
    expect(published).toEqual([{ prospectId: id, created: false, targetId: null, runId: null }]);
  });

  it('uses the platform preset for detail selectors and rendering', async () => {
    const id = addRecord({ name: 'Gala', url: 'https://www.tickets.test/e/9' });
    const staticPage = vi.fn(async () => '');
    const browserPage = vi.fn(async () => '<div class="organizer"><h3>Acme Events</h3></div>');

    const result = await enrichRecord(deps({ static: { fetchPage: staticPage }, browser: { fetchPage: browserPage } }), id);

    expect(result).toMatchObject({ status: 'enriched', updatedFields: ['company'] });
    expect(browserPage).toHaveBeenCalledTimes(1);
    expect(staticPage).not.toHaveBeenCalled();
    expect(getProspect(db, id)?.company).toBe('Acme Events');
  });

  it('never touches a record in a terminal status', async () => {
    const id = addRecord({ name: 'Old Fair', url: '/events/2' });
    setProspectStatus(db, id, 'converted');
    const fetchPage = vi.fn(async () => DETAIL_HTML);

    expect(await enrichRecord(deps(fetchersFor(fetchPage)), id)).toEqual({ status: 'skipped', recordId: id, reason: 'terminal' });
    expect(fetchPage).not.toHaveBeenCalled();
    expect(getProspect(db, id)?.email).toBeNull();
  });

  it('skips records that already have contact details or no detail page', async () => {
    const complete = addRecord({
      name: 'Jane Doe',
      email: 'jane@fairs.test',
      phone: '+1 650 253 0000',
      company: 'Fair Co',
      url: '/events/3',
    });
    const linkless = addRecord({ name: 'No Link' });
    const fetchPage = vi.fn(async () => DETAIL_HTML);
    const enrich = deps(fetchersFor(fetchPage));

    expect(await enrichRecord(enrich, complete)).toEqual({ status: 'skipped', recordId: complete, reason: 'already_enriched' });
    expect(await enrichRecord(enrich, linkless)).toEqual({ status: 'skipped', recordId: linkless, reason: 'no_url' });
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it('reports a page with nothing new without announcing it', async () => {
    const id = addRecord({ name: 'Quiet Fair', url: '/events/4' });
    const result = await enrichRecord(deps(fetchersFor(async () => '<p>Nothing to see</p>')), id);

    expect(result).toEqual({ status: 'skipped', recordId: id, reason: 'nothing_new' });
    expect(published).toHaveLength(0);
  });

  it('contains network failures', async () => {
    const id = addRecord({ name: 'Far Fair', url: '/events/5' });
    const failing = fetchersFor(async (url) => {
      throw new FetchError(`Network error fetching ${url}: getaddrinfo ENOTFOUND fairs.test`, 'network');
    });

    expect(await enrichRecord(deps(failing), id)).toEqual({
      status: 'failed',
      recordId: id,
      url: 'https://fairs.test/events/5',
      category: 'network',
      error: 'Network error fetching https://fairs.test/events/5: getaddrinfo ENOTFOUND fairs.test',
    });
  });
});

describe('enrichRecords', () => {
  it('keeps going past failures and pauses between page visits', async () => {
    const good = addRecord({ name: 'Good Fair', url: '/events/good' });
    const down = addRecord({ name: 'Down Fair', url: '/events/down' });
    const linkless = addRecord({ name: 'Linkless Fair' });
    const fetchers = fetchersFor(async (url) => {
      if (url.endsWith('/down')) throw new FetchError(`HTTP 500 Internal Server Error fetching ${url}`, 'http');
      return DETAIL_HTML;
    });
    const sleep = vi.fn(async () => {});

    const stats = await enrichRecords({ ...deps(fetchers, 2), sleep }, [good, down, linkless]);

    expect(stats).toMatchObject({
      total: 3,
      enriched: 1,
      skipped: 1,
      failed: 1,
      errors: [{ recordId: down, error: 'HTTP 500 Internal Server Error fetching https://fairs.test/events/down' }],
    });
    expect(sleep.mock.calls).toEqual([[2000], [2000]]);
    expect(getProspect(db, good)?.email).toBe('hello@valleymakers.test');
  });
});

describe('selectEnrichCandidates', () => {
  it('selects by filter, skipping terminal records and records without a detail page', () => {
    const bare = addRecord({ name: 'Bare', url: '/a' });
    const withCompany = addRecord({ name: 'Has Company', url: '/b', company: 'Co' });
    const withEmail = addRecord({ name: 'Has Email', url: '/c', email: 'c@fairs.test' });
    addRecord({ name: 'No Link' });
    const converted = addRecord({ name: 'Converted', url: '/e' });
    setProspectStatus(db, converted, 'converted');

    const ids = (filter: 'unenriched' | 'no-contact' | 'all', limit?: number): number[] =>
      selectEnrichCandidates(db, { filter, ...(limit ? { limit } : {}) }).map((p) => p.id);

    expect(ids('unenriched')).toEqual([bare]);
    expect(ids('no-contact')).toEqual([bare, withCompany]);
    expect(ids('all')).toEqual([bare, withCompany, withEmail]);
    expect(ids('all', 1)).toEqual([bare]);
  });

  it('filters by source name and takes explicit ids as given', () => {
    const local = addRecord({ name: 'Local', url: '/a' });
    const other = addRecord({ name: 'Elsewhere', url: '/f' }, { name: 'Other Shows', start_url: 'https://shows.test/' });
    const linkless = addRecord({ name: 'No Link' });

    expect(selectEnrichCandidates(db, { source: 'other' }).map((p) => p.id)).toEqual([other]);
    expect(selectEnrichCandidates(db, { ids: [linkless, local] }).map((p) => p.id)).toEqual([local, linkless]);
  });
});
