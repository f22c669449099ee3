import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { closeDb, getDb, initDb, openDatabase } from '../db.js';
import { DbError } from '../../shared/errors.js';

afterEach(() => {
  closeDb();
});

describe('initDb / getDb / closeDb', () => {
  it('creates the database file and its directory', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stowaway-db-'));
    const dbPath = path.join(dir, 'nested', 'stowaway.db');

    const db = initDb(dbPath);
    expect(fs.existsSync(dbPath)).toBe(true);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');

    closeDb();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns one shared connection until closed', () => {
    const db = initDb(':memory:');
    expect(initDb(':memory:')).toBe(db);
    expect(getDb()).toBe(db);

    closeDb();
    expect(() => getDb()).toThrow(DbError);
  });
});

describe('openDatabase', () => {
  it('refuses to open a missing file read-only', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stowaway-db-'));
    const dbPath = path.join(dir, 'absent.db');

    expect(() => openDatabase(dbPath, { readonly: true })).toThrow(DbError);
    expect(fs.existsSync(dbPath)).toBe(false);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('opens an existing file read-only', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stowaway-db-'));
    const dbPath = path.join(dir, 'stowaway.db');
    const writer = openDatabase(dbPath);
    writer.exec('CREATE TABLE t (v INTEGER)');
    writer.close();

    const reader = openDatabase(dbPath, { readonly: true });
    expect(reader.readonly).toBe(true);
    expect(() => reader.exec('INSERT INTO t (v) VALUES (1)')).toThrow();
    reader.close();

    fs.rmSync(dir, { recursive: true, force: true });
  });
});
