import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

let dbInstance: Database.Database | null = null;

/**
 * Open a SQLite file (or `:memory:`). Writable connections create the
 * parent directory and use WAL; read-only ones require the file to exist.
 */
export function openDatabase(dbPath: string, opts: { readonly?: boolean } = {}): Database.Database {
  const resolved = dbPath === ':memory:' ? dbPath : resolvePath(dbPath);
  const readonly = opts.readonly === true && resolved !== ':memory:';

  if (readonly && !fs.existsSync(resolved)) {
    throw new DbError(`Database not found: ${resolved}`, { path: resolved });
  }
  if (!readonly && resolved !== ':memory:') {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  try {
    const db = new Database(resolved, { readonly, fileMustExist: readonly });
    if (!readonly) {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');
    return db;
  } catch (err) {
    throw new DbError(`Failed to open database at ${resolved}`, { path: resolved, cause: errorMessage(err) });
  }
}

/** The process-wide writable connection, opened on first call. */
export function initDb(dbPath: string): Database.Database {
  if (!dbInstance) {
    dbInstance = openDatabase(dbPath);
    logger.debug({ path: dbPath }, 'Database initialized');
  }
  return dbInstance;
}

export function getDb(): Database.Database {
  if (!dbInstance) {
    throw new DbError('Database not initialized. Call initDb() first.');
  }
  return dbInstance;
}

export function closeDb(): void {
  dbInstance?.close();
  dbInstance = null;
}
