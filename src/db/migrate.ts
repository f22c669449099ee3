import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot, nowISO } from '../shared/utils.js';

export interface MigrationOptions {
  /** Directory of `NNN_name.sql` files; defaults to the bundled migrations. */
  dir?: string;
}

export interface MigrationStatus {
  applied: string[];
  pending: string[];
}

function migrationsDir(options: MigrationOptions): string {
  return options.dir ?? path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

/**
 * Migration file names in the order they must run.
 */
export function listMigrations(options: MigrationOptions = {}): string[] {
  const dir = migrationsDir(options);
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`, { dir });
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

function hasMigrationsTable(db: Database.Database): boolean {
  const row = db.prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = '_migrations'").get();
  return row !== undefined;
}

function appliedMigrations(db: Database.Database): string[] {
  if (!hasMigrationsTable(db)) return [];
  const rows = db.prepare('SELECT name FROM _migrations ORDER BY name').all() as Array<{ name: string }>;
  return rows.map((r) => r.name);
}

/**
 * Which migrations a database has and still needs. Never writes, so it is
 * safe on a read-only connection.
 */
export function migrationStatus(db: Database.Database, options: MigrationOptions = {}): MigrationStatus {
  const applied = appliedMigrations(db);
  const done = new Set(applied);
  return { applied, pending: listMigrations(options).filter((f) => !done.has(f)) };
}

/**
 * Apply pending migrations in name order, each in its own transaction. A
 * failing migration is rolled back and stops the run; earlier ones stay.
 */
export function runMigrations(
  db: Database.Database,
  options: MigrationOptions = {},
): { applied: string[]; skipped: string[] } {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL
    );
  `);

  const { applied: skipped, pending } = migrationStatus(db, options);
  const dir = migrationsDir(options);
  const record = db.prepare('INSERT INTO _migrations (name, applied_at) VALUES (?, ?)');
  const applied: string[] = [];

  for (const name of pending) {
    const sql = fs.readFileSync(path.join(dir, name), 'utf-8');
    const apply = db.transaction(() => {
      db.exec(sql);
      record.run(name, nowISO());
    });

    try {
      apply();
    } catch (err) {
      throw new DbError(`Migration failed: ${name}`, { migration: name, cause: errorMessage(err) });
    }
    applied.push(name);
    logger.info({ migration: name }, 'Migration applied');
  }

  return { applied, skipped };
}
