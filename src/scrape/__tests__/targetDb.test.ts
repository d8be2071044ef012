import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import {
  addTarget,
  createRun,
  finishRun,
  getRun,
  getTarget,
  getTargetByName,
  listDueTargets,
  listRuns,
  listTargets,
  loadTargetConfig,
  markTargetRun,
  updateTarget,
} from '../targetDb.js';
import { ConfigError } from '../../shared/errors.js';

const CONFIG = { item_selector: '.card', fields: { name: 'h2' } };

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
});

afterEach(() => {
  db.close();
});

function add(name: string, extra: { run_every_minutes?: number; enabled?: boolean } = {}): number {
  const id = addTarget(db, { name, start_url: 'https://events.example.test/', config: CONFIG, ...extra });
  if (id === null) throw new Error('duplicate');
  return id;
}

describe('addTarget', () => {
  it('stores a validated target', () => {
    const id = add('alpha');
    const target = getTarget(db, id);
    expect(target?.name).toBe('alpha');
    expect(target?.enabled).toBe(1);
    expect(target?.render_mode).toBe('static');
    expect(target?.run_every_minutes).toBe(60);
    expect(getTargetByName(db, 'alpha')?.id).toBe(id);
  });

  it('returns null for a duplicate name', () => {
    add('alpha');
    expect(addTarget(db, { name: 'alpha', start_url: 'https://other.example.test/', config: CONFIG })).toBeNull();
  });

  it('rejects an invalid config before storing anything', () => {
    expect(() => addTarget(db, { name: 'bad', start_url: 'https://a.test/', config: { fields: {} } })).toThrow(
      ConfigError,
    );
    expect(listTargets(db)).toHaveLength(0);
  });

  it('rejects non-http start URLs', () => {
    expect(() => addTarget(db, { name: 'ftp', start_url: 'ftp://a.test/', config: CONFIG })).toThrow(/http\(s\)/);
    expect(() => addTarget(db, { name: 'junk', start_url: 'not a url', config: CONFIG })).toThrow(ConfigError);
  });
});

describe('updateTarget', () => {
  it('toggles enabled and validates new config', () => {
    const id = add('alpha');
    expect(updateTarget(db, id, { enabled: false })).toBe(true);
    expect(listTargets(db, { enabledOnly: true })).toHaveLength(0);
    expect(() => updateTarget(db, id, { config: { item_selector: '.x' } })).toThrow(ConfigError);
    expect(updateTarget(db, id, {})).toBe(false);
  });
});

describe('listDueTargets', () => {
  it('returns never-run and overdue enabled targets', () => {
    const fresh = add('fresh', { run_every_minutes: 30 });
    const recent = add('recent', { run_every_minutes: 30 });
    const overdue = add('overdue', { run_every_minutes: 30 });
    add('off', { enabled: false });

    const now = new Date('2026-05-01T12:00:00Z');
    markTargetRun(db, recent, new Date('2026-05-01T11:45:00Z'));
    markTargetRun(db, overdue, new Date('2026-05-01T11:30:00Z'));

    expect(listDueTargets(db, now).map((t) => t.id)).toEqual([fresh, overdue]);
  });
});

describe('loadTargetConfig', () => {
  it('parses the stored document', () => {
    const target = getTarget(db, add('alpha'));
    expect(target && loadTargetConfig(target).itemSelector).toBe('.card');
  });

  it('raises ConfigError when the stored JSON is corrupt', () => {
    const id = add('alpha');
    db.prepare(`UPDATE targets SET config_json = '{oops' WHERE id = ?`).run(id);
    const target = getTarget(db, id);
    expect(() => target && loadTargetConfig(target)).toThrow(/config document that is not JSON/);
  });
});

describe('runs', () => {
  it('finishes a run once and never overwrites the terminal status', () => {
    const targetId = add('alpha');
    const runId = createRun(db, targetId, 'manual', new Date('2026-05-01T12:00:00Z'));
    expect(getRun(db, runId)?.status).toBe('running');

    const first = finishRun(db, runId, { status: 'success', itemCount: 3, created: 2, updated: 1, stats: { a: 1 } });
    const second = finishRun(db, runId, { status: 'failed', itemCount: 0, created: 0, updated: 0, stats: {}, errorText: 'late' });

    expect(first).toBe(true);
    expect(second).toBe(false);
    const run = getRun(db, runId);
    expect(run?.status).toBe('success');
    expect(run?.created_count).toBe(2);
    expect(run?.error_text).toBe('');
    expect(run?.stats_json).toBe('{"a":1}');
  });

  it('lists runs newest first', () => {
    const targetId = add('alpha');
    const older = createRun(db, targetId, 'scheduled', new Date('2026-05-01T10:00:00Z'));
    const newer = createRun(db, targetId, 'manual', new Date('2026-05-01T11:00:00Z'));
    expect(listRuns(db, targetId).map((r) => r.id)).toEqual([newer, older]);
  });
});
