import type Database from 'better-sqlite3';
import { parseTargetConfig, type TargetConfig } from './targetConfig.js';
import { DbError, ConfigError } from '../shared/errors.js';
import { nowISO, toSqlTimestamp } from '../shared/utils.js';

export type RenderMode = 'static' | 'browser';
export type RunTrigger = 'scheduled' | 'manual';
export type RunStatus = 'running' | 'success' | 'failed';

/**
 * Database row shape for the targets table.
 */
export interface Target {
  id: number;
  name: string;
  enabled: number;
  render_mode: RenderMode;
  start_url: string;
  run_every_minutes: number;
  config_json: string;
  last_run_at: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Database row shape for the runs table.
 */
export interface Run {
  id: number;
  target_id: number;
  trigger: RunTrigger;
  status: RunStatus;
  started_at: string;
  finished_at: string | null;
  item_count: number;
  created_count: number;
  updated_count: number;
  stats_json: string;
  error_text: string;
}

// ================================================================
// Targets
// ================================================================

export interface AddTargetInput {
  name: string;
  start_url: string;
  config: unknown;
  render_mode?: RenderMode;
  run_every_minutes?: number;
  enabled?: boolean;
}

function assertHttpUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(`Target config start_url is not a URL: ${url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(`Target config start_url must be http(s): ${url}`);
  }
}

/**
 * Insert a target after validating its configuration document.
 * Returns null when a target with the same name already exists.
 */
export function addTarget(db: Database.Database, input: AddTargetInput): number | null {
  parseTargetConfig(input.config);
  assertHttpUrl(input.start_url);

  try {
    const result = db
      .prepare(
        `INSERT INTO targets (name, enabled, render_mode, start_url, run_every_minutes, config_json)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.name,
        input.enabled === false ? 0 : 1,
        input.render_mode ?? 'static',
        input.start_url,
        input.run_every_minutes ?? 60,
        JSON.stringify(input.config),
      );
    return Number(result.lastInsertRowid);
  } catch (err) {
    if (err instanceof Error && err.message.includes('UNIQUE')) {
      return null;
    }
    throw new DbError(`Failed to add target: ${err instanceof Error ? err.message : String(err)}`, {
      name: input.name,
    });
  }
}

export function getTarget(db: Database.Database, id: number): Target | undefined {
  return db.prepare('SELECT * FROM targets WHERE id = ?').get(id) as Target | undefined;
}

export function getTargetByName(db: Database.Database, name: string): Target | undefined {
  return db.prepare('SELECT * FROM targets WHERE name = ?').get(name) as Target | undefined;
}

export function listTargets(db: Database.Database, opts: { enabledOnly?: boolean } = {}): Target[] {
  const where = opts.enabledOnly ? 'WHERE enabled = 1' : '';
  return db.prepare(`SELECT * FROM targets ${where} ORDER BY id`).all() as Target[];
}

/**
 * Enabled targets whose interval has elapsed since their last run, or that
 * never ran.
 */
export function listDueTargets(db: Database.Database, now: Date): Target[] {
  return db
    .prepare(
      `SELECT * FROM targets
       WHERE enabled = 1
         AND (last_run_at IS NULL
              OR datetime(last_run_at, '+' || run_every_minutes || ' minutes') <= ?)
       ORDER BY id`,
    )
    .all(toSqlTimestamp(now)) as Target[];
}

export function updateTarget(
  db: Database.Database,
  id: number,
  updates: {
    enabled?: boolean;
    start_url?: string;
    render_mode?: RenderMode;
    run_every_minutes?: number;
    config?: unknown;
  },
): boolean {
  const sets: string[] = [];
  const values: unknown[] = [];

  if (updates.enabled !== undefined) {
    sets.push('enabled = ?');
    values.push(updates.enabled ? 1 : 0);
  }
  if (updates.start_url !== undefined) {
    assertHttpUrl(updates.start_url);
    sets.push('start_url = ?');
    values.push(updates.start_url);
  }
  if (updates.render_mode !== undefined) {
    sets.push('render_mode = ?');
    values.push(updates.render_mode);
  }
  if (updates.run_every_minutes !== undefined) {
    sets.push('run_every_minutes = ?');
    values.push(updates.run_every_minutes);
  }
  if (updates.config !== undefined) {
    parseTargetConfig(updates.config);
    sets.push('config_json = ?');
    values.push(JSON.stringify(updates.config));
  }

  if (sets.length === 0) return false;

  sets.push('updated_at = ?');
  values.push(nowISO());
  values.push(id);
  const result = db.prepare(`UPDATE targets SET ${sets.join(', ')} WHERE id = ?`).run(...values);
  return result.changes > 0;
}

export function markTargetRun(db: Database.Database, id: number, at: Date): void {
  db.prepare('UPDATE targets SET last_run_at = ? WHERE id = ?').run(toSqlTimestamp(at), id);
}

/**
 * Parse the stored configuration document. Stored JSON that no longer parses
 * is a configuration error of this target.
 */
export function loadTargetConfig(target: Target): TargetConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(target.config_json);
  } catch {
    throw new ConfigError(`Target ${target.name} has a config document that is not JSON`);
  }
  return parseTargetConfig(raw);
}

// ================================================================
// Runs
// ================================================================

export function createRun(
  db: Database.Database,
  targetId: number,
  trigger: RunTrigger,
  now: Date = new Date(),
): number {
  const result = db
    .prepare(`INSERT INTO runs (target_id, trigger, status, started_at) VALUES (?, ?, 'running', ?)`)
    .run(targetId, trigger, toSqlTimestamp(now));
  return Number(result.lastInsertRowid);
}

export interface RunOutcome {
  status: Exclude<RunStatus, 'running'>;
  itemCount: number;
  created: number;
  updated: number;
  stats: Record<string, unknown>;
  errorText?: string;
}

/**
 * Move a run to its terminal status. A run that already left `running` is
 * left untouched; returns whether this call finalized it.
 */
export function finishRun(
  db: Database.Database,
  runId: number,
  outcome: RunOutcome,
  now: Date = new Date(),
): boolean {
  const result = db
    .prepare(
      `UPDATE runs
       SET status = ?, finished_at = ?, item_count = ?, created_count = ?, updated_count = ?,
           stats_json = ?, error_text = ?
       WHERE id = ? AND status = 'running'`,
    )
    .run(
      outcome.status,
      toSqlTimestamp(now),
      outcome.itemCount,
      outcome.created,
      outcome.updated,
      JSON.stringify(outcome.stats),
      outcome.errorText ?? '',
      runId,
    );
  return result.changes > 0;
}

export function getRun(db: Database.Database, id: number): Run | undefined {
  return db.prepare('SELECT * FROM runs WHERE id = ?').get(id) as Run | undefined;
}

export function listRuns(db: Database.Database, targetId: number, opts: { limit?: number } = {}): Run[] {
  return db
    .prepare('SELECT * FROM runs WHERE target_id = ? ORDER BY started_at DESC, id DESC LIMIT ?')
    .all(targetId, opts.limit ?? 20) as Run[];
}
