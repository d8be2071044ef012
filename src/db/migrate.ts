import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

/**
 * Apply every `NNN_name.sql` file in lexical order that `_migrations` has not
 * recorded yet. Each file runs in its own transaction.
 */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string = defaultMigrationsDir(),
): MigrationResult {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  if (!fs.existsSync(migrationsDir)) {
    throw new DbError(`Migrations directory not found: ${migrationsDir}`);
  }

  const recorded = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  const done = new Set(recorded.map((r) => r.name));

  const files = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  const result: MigrationResult = { applied: [], skipped: [] };
  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');

  for (const file of files) {
    if (done.has(file)) {
      result.skipped.push(file);
      continue;
    }

    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
    const apply = db.transaction(() => {
      db.exec(sql);
      record.run(file);
    });

    try {
      apply();
    } catch (err) {
      throw new DbError(`Migration failed: ${file}`, {
        migration: file,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    result.applied.push(file);
    logger.info({ migration: file }, 'Migration applied');
  }

  return result;
}
