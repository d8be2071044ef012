#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { loadConfig, writeDefaultConfig, crmReadiness } from '../shared/config.js';
import { getLeadlineDir, resolvePath } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import {
  addTarget,
  getTarget,
  getTargetByName,
  listRuns,
  listTargets,
  updateTarget,
  type Target,
} from '../scrape/targetDb.js';
import { runScrapeJob } from '../scrape/runner.js';
import { suggestTargetConfig } from '../scrape/discover.js';
import { enrichRecords, isEnrichFilter, selectEnrichCandidates, detailUrlOf, ENRICH_FILTERS } from '../scrape/enrich.js';
import { parseTargetsFile, syncTargetsFile } from '../scrape/targetsFile.js';
import { listProspects, type Prospect } from '../prospects/prospectDb.js';
import { isRecordStatus } from '../prospects/status.js';
import { sweepDueSyncs } from '../sync/sweep.js';
import { createPipeline, type Pipeline } from '../queue/pipeline.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('leadline')
  .description('Scrape listing pages into deduplicated prospect records and sync them to a CRM')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create config and database')
  .action(async () => {
    const configPath = path.join(getLeadlineDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const dbPath = resolvePath(config.db.path);
    const db = initDb(dbPath);
    const { applied } = runMigrations(db);
    if (applied.length > 0) {
      log(`✓ ${dbPath} created (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${dbPath} already up to date`);
    }
    closeDb();
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database and CRM settings')
  .action(async () => {
    const { db, config, cleanup } = await getDb();
    try {
      db.prepare('SELECT 1').get();
      log('Config: ok');
      log('DB: ok');
      log(`Targets: ${listTargets(db).length} (${listTargets(db, { enabledOnly: true }).length} enabled)`);
      log(`CRM: ${crmReadiness(config.crm)}`);
      log(`Trigger secret: ${config.server.trigger_secret ? 'set' : '(unset)'}`);
    } finally {
      cleanup();
    }
  });

// === serve ===
program
  .command('serve')
  .description('Start the trigger API, job queue and scheduler')
  .option('-p, --port <n>', 'Port number')
  .action(async (opts: { port?: string }) => {
    await startServer(opts.port ? { port: parseInt(opts.port, 10) } : {});
  });

// === target ===
const targetCmd = program.command('target').description('Manage scrape targets');

targetCmd
  .command('add <name> <url>')
  .description('Add a target from a JSON or YAML selector config file')
  .requiredOption('-c, --config <file>', 'Selector config file')
  .option('--browser', 'Render pages in a headless browser')
  .option('-e, --every <minutes>', 'Run interval in minutes', '60')
  .option('--disabled', 'Add without scheduling it')
  .action(async (name: string, url: string, opts: { config: string; browser?: boolean; every: string; disabled?: boolean }) => {
    const { db, cleanup } = await getDb();
    try {
      const config: unknown = yamlParse(fs.readFileSync(resolvePath(opts.config), 'utf-8'));
      const id = addTarget(db, {
        name,
        start_url: url,
        config,
        render_mode: opts.browser ? 'browser' : 'static',
        run_every_minutes: parseInt(opts.every, 10),
        enabled: !opts.disabled,
      });
      if (id === null) {
        log(`Target already exists: ${name}`);
      } else {
        log(`✓ Target ${id} added: ${name}`);
      }
    } finally {
      cleanup();
    }
  });

targetCmd
  .command('list')
  .description('List targets')
  .action(async () => {
    const { db, cleanup } = await getDb();
    try {
      const targets = listTargets(db);
      if (targets.length === 0) {
        log('No targets configured. Use: leadline target add <name> <url> -c <file>');
        return;
      }
      for (const t of targets) {
        const status = t.enabled ? '●' : '○';
        log(
          `${status} ${String(t.id).padStart(4)} ${t.name.padEnd(24)} ${t.render_mode.padEnd(8)} every ${t.run_every_minutes}m  last: ${t.last_run_at ?? 'never'}`,
        );
      }
    } finally {
      cleanup();
    }
  });

for (const [command, enabled] of [['enable', true], ['disable', false]] as const) {
  targetCmd
    .command(`${command} <target>`)
    .description(`${enabled ? 'Enable' : 'Disable'} a target by id or name`)
    .action(async (ref: string) => {
      const { db, cleanup } = await getDb();
      try {
        const target = findTarget(db, ref);
        updateTarget(db, target.id, { enabled });
        log(`✓ ${target.name} ${enabled ? 'enabled' : 'disabled'}`);
      } finally {
        cleanup();
      }
    });
}

targetCmd
  .command('sync <file>')
  .description('Create targets from a JSON or YAML list of targets')
  .option('-u, --update', 'Overwrite targets that already exist')
  .option('--disable-missing', 'Disable targets the file does not list')
  .option('--dry-run', 'Show what would change without writing')
  .action(async (file: string, opts: { update?: boolean; disableMissing?: boolean; dryRun?: boolean }) => {
    const filePath = resolvePath(file);
    if (!fs.existsSync(filePath)) {
      log(`Targets file not found: ${filePath}`);
      process.exitCode = 1;
      return;
    }
    const { db, cleanup } = await getDb();
    try {
      const report = syncTargetsFile(db, parseTargetsFile(fs.readFileSync(filePath, 'utf-8')), {
        update: opts.update ?? false,
        disableMissing: opts.disableMissing ?? false,
        dryRun: opts.dryRun ?? false,
      });
      const prefix = report.dryRun ? '[dry run] would have ' : '';
      for (const name of report.created) log(`${prefix}created: ${name}`);
      for (const name of report.updated) log(`${prefix}updated: ${name}`);
      for (const name of report.skipped) log(`skipped existing: ${name} (use --update to modify)`);
      for (const name of report.disabled) log(`${prefix}disabled: ${name}`);
      for (const { entry, error } of report.invalid) log(`✗ ${entry}: ${error}`);
      log(
        `\n${report.created.length} created, ${report.updated.length} updated, ${report.skipped.length} skipped, ${report.disabled.length} disabled, ${report.invalid.length} invalid`,
      );
    } finally {
      cleanup();
    }
  });

targetCmd
  .command('runs <target>')
  .description('Show recent runs of a target')
  .option('-l, --limit <n>', 'Number of runs', '10')
  .action(async (ref: string, opts: { limit: string }) => {
    const { db, cleanup } = await getDb();
    try {
      const target = findTarget(db, ref);
      for (const run of listRuns(db, target.id, { limit: parseInt(opts.limit, 10) })) {
        const counts = `${run.item_count} items, ${run.created_count} new, ${run.updated_count} updated`;
        log(`#${run.id} ${run.started_at} ${run.trigger.padEnd(9)} ${run.status.padEnd(8)} ${counts}${run.error_text ? `  ${run.error_text}` : ''}`);
      }
    } finally {
      cleanup();
    }
  });

// === discover ===
program
  .command('discover <url>')
  .description('Suggest a target config for a URL from known platform presets')
  .option('-n, --name <name>', 'Target name')
  .option('--add', 'Add the suggested target')
  .action(async (url: string, opts: { name?: string; add?: boolean }) => {
    const suggestion = suggestTargetConfig(url, opts.name);
    log(`Platform: ${suggestion.platform ?? '(generic)'}`);
    log(JSON.stringify(suggestion, null, 2));
    if (!opts.add) return;

    const { db, cleanup } = await getDb();
    try {
      const id = addTarget(db, {
        name: suggestion.name,
        start_url: suggestion.start_url,
        config: suggestion.config,
        render_mode: suggestion.render_mode,
        run_every_minutes: suggestion.run_every_minutes,
      });
      log(id === null ? `Target already exists: ${suggestion.name}` : `✓ Target ${id} added: ${suggestion.name}`);
    } finally {
      cleanup();
    }
  });

// === enrich ===
program
  .command('enrich [ids...]')
  .description('Visit record detail pages and fill empty contact fields')
  .option('-f, --filter <filter>', `Which records: ${ENRICH_FILTERS.join(', ')}`, 'unenriched')
  .option('-s, --source <name>', 'Only records whose source name contains this text')
  .option('-l, --limit <n>', 'Maximum records to visit')
  .option('-p, --platform <id>', 'Platform preset for detail selectors')
  .option('--browser', 'Render detail pages in a headless browser')
  .option('--dry-run', 'List the records without visiting them')
  .action(
    async (
      ids: string[],
      opts: { filter: string; source?: string; limit?: string; platform?: string; browser?: boolean; dryRun?: boolean },
    ) => {
      if (!isEnrichFilter(opts.filter)) {
        log(`Unknown filter: ${opts.filter}`);
        process.exitCode = 1;
        return;
      }
      const { pipeline, cleanup } = await getPipeline();
      try {
        const records = selectEnrichCandidates(pipeline.db, {
          ids: ids.map((id) => parseInt(id, 10)),
          filter: opts.filter,
          ...(opts.source ? { source: opts.source } : {}),
          limit: opts.limit ? parseInt(opts.limit, 10) : pipeline.config.enrich.batch_limit,
        });
        if (records.length === 0) {
          log('No records match.');
          return;
        }
        if (opts.dryRun) {
          for (const r of records) {
            log(`${String(r.id).padStart(6)} ${(r.full_name || r.event_name || '(no name)').slice(0, 40).padEnd(40)} ${detailUrlOf(r) ?? '-'}`);
          }
          log(`\n${records.length} records would be visited`);
          return;
        }

        const stats = await enrichRecords(
          pipeline,
          records.map((r) => r.id),
          {
            ...(opts.platform ? { platform: opts.platform } : {}),
            ...(opts.browser ? { browser: true } : {}),
          },
        );
        await pipeline.queue.onIdle();
        log(`✓ ${stats.enriched} enriched, ${stats.skipped} skipped, ${stats.failed} failed of ${stats.total}`);
        for (const { recordId, error } of stats.errors.slice(0, 10)) log(`  record ${recordId}: ${error}`);
        if (stats.errors.length > 10) log(`  ... and ${stats.errors.length - 10} more`);
      } finally {
        cleanup();
      }
    },
  );

// === scrape ===
program
  .command('scrape [target]')
  .description('Scrape one target (id or name) now, or every enabled target')
  .action(async (ref: string | undefined) => {
    const { pipeline, cleanup } = await getPipeline();
    try {
      const targets: Target[] = ref ? [findTarget(pipeline.db, ref)] : listTargets(pipeline.db, { enabledOnly: true });
      for (const target of targets) {
        try {
          const result = await runScrapeJob(pipeline, target.id, 'manual');
          if (result.status === 'success') {
            log(`✓ ${target.name}: ${result.itemCount} items, ${result.created} new, ${result.updated} updated`);
          } else {
            log(`✗ ${target.name}: ${result.category} failure: ${result.error}`);
          }
        } catch (err) {
          log(`✗ ${target.name}: ${errorMessage(err)}`);
        }
      }
      await pipeline.queue.onIdle();
    } finally {
      cleanup();
    }
  });

// === sync ===
program
  .command('sync <recordId>')
  .description('Push one record to the CRM now')
  .option('-f, --force', 'Push even when the payload is unchanged')
  .action(async (recordId: string, opts: { force?: boolean }) => {
    const { pipeline, cleanup } = await getPipeline();
    try {
      const result = await pipeline.orchestrator.syncRecord(parseInt(recordId, 10), { force: opts.force ?? false });
      if (result.status === 'error') {
        log(`✗ Record ${result.recordId}: ${result.error}`);
        log(`  attempt ${result.attempts}, next retry ${result.nextRetryAt.toISOString()}${result.willRetry ? '' : ' (retries exhausted)'}`);
      } else if (result.status === 'synced') {
        log(`✓ Record ${result.recordId} synced${result.externalId ? ` as ${result.externalId}` : ''}`);
      } else {
        log(`Record ${result.recordId}: ${result.status}`);
      }
    } finally {
      cleanup();
    }
  });

// === sweep ===
program
  .command('sweep')
  .description('Retry every pending or errored sync that is due')
  .action(async () => {
    const { pipeline, cleanup } = await getPipeline();
    try {
      const readiness = crmReadiness(pipeline.config.crm);
      if (readiness !== 'ready') {
        log(`CRM sync is ${readiness}`);
        return;
      }
      const enqueued = sweepDueSyncs(pipeline.db, pipeline.queue, new Date(), pipeline.config.crm.sweep_limit);
      await pipeline.queue.onIdle();
      const stats = pipeline.queue.getStats();
      log(`✓ ${enqueued} syncs attempted, ${stats.delayed} scheduled for retry`);
    } finally {
      cleanup();
    }
  });

// === records ===
program
  .command('records')
  .description('List recent records')
  .option('-s, --status <status>', 'Only records in this status')
  .option('-l, --limit <n>', 'Number of records', '50')
  .action(async (opts: { status?: string; limit: string }) => {
    const { db, cleanup } = await getDb();
    try {
      const limit = parseInt(opts.limit, 10);
      let records: Prospect[];
      if (opts.status === undefined) {
        records = listProspects(db, { limit });
      } else if (isRecordStatus(opts.status)) {
        records = listProspects(db, { limit, status: opts.status });
      } else {
        log(`Unknown status: ${opts.status}`);
        return;
      }
      for (const r of records) {
        const contact = r.email ?? (r.phone_e164 || r.phone_raw || '-');
        log(`${String(r.id).padStart(6)} ${r.status.padEnd(10)} ${(r.full_name || '-').padEnd(30)} ${contact.padEnd(28)} ${r.source_name}`);
      }
      log(`\n${records.length} records`);
    } finally {
      cleanup();
    }
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

function findTarget(db: ReturnType<typeof initDb>, ref: string): Target {
  const target = /^\d+$/.test(ref) ? getTarget(db, parseInt(ref, 10)) : getTargetByName(db, ref);
  if (!target) {
    log(`Target not found: ${ref}`);
    process.exit(1);
  }
  return target;
}

// === Helper to get DB connection ===
async function getDb(): Promise<{
  db: ReturnType<typeof initDb>;
  config: Awaited<ReturnType<typeof loadConfig>>;
  cleanup: () => void;
}> {
  const config = await loadConfig();
  const dbPath = resolvePath(config.db.path);

  if (!fs.existsSync(dbPath)) {
    log('Database not found. Run leadline init first.');
    process.exit(1);
  }

  const db = initDb(dbPath);
  runMigrations(db);

  return { db, config, cleanup: () => closeDb() };
}

async function getPipeline(): Promise<{ pipeline: Pipeline; cleanup: () => void }> {
  const { db, config, cleanup } = await getDb();
  const pipeline = createPipeline(db, config);
  return {
    pipeline,
    cleanup: () => {
      pipeline.listener.stop();
      pipeline.queue.close();
      cleanup();
    },
  };
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
