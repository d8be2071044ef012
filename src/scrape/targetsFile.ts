import type Database from 'better-sqlite3';
import { z } from 'zod';
import { parse as yamlParse } from 'yaml';
import { addTarget, getTargetByName, listTargets, updateTarget, type RenderMode } from './targetDb.js';
import { parseTargetConfig } from './targetConfig.js';
import { ConfigError, LeadlineError } from '../shared/errors.js';
import { isPlainObject } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

const TargetEntrySchema = z.object({
  name: z.string().trim().min(1),
  start_url: z.string().trim().min(1, 'missing start_url'),
  enabled: z.boolean().default(true),
  render_mode: z.enum(['static', 'browser']).optional(),
  target_type: z.string().optional(),
  run_every_minutes: z.coerce.number().int().positive().default(60),
  config: z.record(z.unknown()).default({}),
});

export interface TargetEntry {
  name: string;
  start_url: string;
  enabled: boolean;
  render_mode: RenderMode;
  run_every_minutes: number;
  config: Record<string, unknown>;
}

export interface SyncTargetsOptions {
  /** Overwrite targets that already exist by name; otherwise they are skipped. */
  update?: boolean;
  /** Disable stored targets the file does not name. */
  disableMissing?: boolean;
  dryRun?: boolean;
}

export interface SyncTargetsReport {
  dryRun: boolean;
  created: string[];
  updated: string[];
  skipped: string[];
  disabled: string[];
  invalid: Array<{ entry: string; error: string }>;
}

/**
 * Parse a targets file. YAML is a superset of JSON, so one parser reads both.
 */
export function parseTargetsFile(text: string): unknown {
  try {
    return yamlParse(text);
  } catch (err) {
    throw new ConfigError(`Targets file does not parse: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * `target_type` is the older spelling of render mode: `playwright` means
 * browser, anything else static.
 */
function renderModeOf(entry: z.output<typeof TargetEntrySchema>): RenderMode {
  if (entry.render_mode) return entry.render_mode;
  if (entry.target_type === undefined || entry.target_type === 'html') return 'static';
  if (entry.target_type === 'playwright') return 'browser';
  logger.warn({ target: entry.name, target_type: entry.target_type }, 'Unknown target_type, using static');
  return 'static';
}

/**
 * Validate one entry of a targets file, including its selector config.
 */
export function parseTargetEntry(raw: unknown): TargetEntry {
  const parsed = TargetEntrySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') ?? '';
    throw new ConfigError(`Invalid target entry${where ? ` (${where})` : ''}: ${issue?.message ?? 'unknown error'}`);
  }
  parseTargetConfig(parsed.data.config);
  return {
    name: parsed.data.name,
    start_url: parsed.data.start_url,
    enabled: parsed.data.enabled,
    render_mode: renderModeOf(parsed.data),
    run_every_minutes: parsed.data.run_every_minutes,
    config: parsed.data.config,
  };
}

function entryName(raw: unknown): string | null {
  if (!isPlainObject(raw)) return null;
  const name = raw['name'];
  return typeof name === 'string' && name.trim() ? name.trim() : null;
}

/**
 * Make the stored targets match a declarative list. New names are created;
 * existing ones are updated with `update`, else skipped. Bad entries are
 * reported and never stop the rest. Everything is one transaction; a dry
 * run validates and reports without writing.
 */
export function syncTargetsFile(
  db: Database.Database,
  document: unknown,
  opts: SyncTargetsOptions = {},
): SyncTargetsReport {
  if (!Array.isArray(document)) {
    throw new ConfigError('Targets file must contain a list of targets');
  }

  const dryRun = opts.dryRun ?? false;
  const report: SyncTargetsReport = { dryRun, created: [], updated: [], skipped: [], disabled: [], invalid: [] };
  const named = new Set<string>();

  const apply = (): void => {
    document.forEach((raw: unknown, index) => {
      const name = entryName(raw);
      const label = name ?? `#${index + 1}`;
      if (name) named.add(name);

      try {
        const entry = parseTargetEntry(raw);
        const existing = getTargetByName(db, entry.name);

        if (!existing) {
          if (!dryRun) addTarget(db, entry);
          report.created.push(entry.name);
        } else if (opts.update) {
          if (!dryRun) {
            updateTarget(db, existing.id, {
              start_url: entry.start_url,
              enabled: entry.enabled,
              render_mode: entry.render_mode,
              run_every_minutes: entry.run_every_minutes,
              config: entry.config,
            });
          }
          report.updated.push(entry.name);
        } else {
          report.skipped.push(entry.name);
        }
      } catch (err) {
        if (!(err instanceof LeadlineError)) throw err;
        logger.warn({ entry: label, error: err.message }, 'Target entry skipped');
        report.invalid.push({ entry: label, error: err.message });
      }
    });

    if (opts.disableMissing) {
      for (const target of listTargets(db, { enabledOnly: true })) {
        if (named.has(target.name)) continue;
        if (!dryRun) updateTarget(db, target.id, { enabled: false });
        report.disabled.push(target.name);
      }
    }
  };

  if (dryRun) {
    apply();
  } else {
    db.transaction(apply)();
  }

  logger.info(
    {
      dryRun,
      created: report.created.length,
      updated: report.updated.length,
      skipped: report.skipped.length,
      disabled: report.disabled.length,
      invalid: report.invalid.length,
    },
    'Targets file synced',
  );
  return report;
}
