import type Database from 'better-sqlite3';
import { generateId, nowISO, sha1 } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';

export interface FeedRow {
  id: string;
  key: string;
  url: string;
  name: string | null;
  site_domain: string | null;
  is_active: number;
  created_at: string;
}

/**
 * Key used inside item ids for a private feed. Derived from the URL so ids
 * stay the same if the feed is removed and added again.
 */
export function feedKeyFor(url: string): string {
  return sha1(url.trim()).slice(0, 8);
}

export function addFeed(db: Database.Database, opts: { url: string; name?: string }): string | null {
  let domain: string | null = null;
  try {
    domain = new URL(opts.url).hostname.replace(/^www\./, '');
  } catch {
    // not a parseable URL; stored without a domain
  }

  const id = generateId();
  try {
    db.prepare(
      `INSERT INTO feeds (id, key, url, name, site_domain, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    ).run(id, feedKeyFor(opts.url), opts.url, opts.name ?? null, domain, nowISO());
    return id;
  } catch (err) {
    // UNIQUE constraint on url: already registered
    if (err instanceof Error && err.message.includes('UNIQUE')) {
      return null;
    }
    throw new DbError(`Failed to add feed: ${errorMessage(err)}`, { url: opts.url });
  }
}

export function listFeeds(db: Database.Database, opts: { activeOnly?: boolean } = {}): FeedRow[] {
  const where = opts.activeOnly ? 'WHERE is_active = 1' : '';
  return db.prepare(`SELECT * FROM feeds ${where} ORDER BY created_at ASC, url ASC`).all() as FeedRow[];
}

export function getFeed(db: Database.Database, id: string): FeedRow | undefined {
  return db.prepare('SELECT * FROM feeds WHERE id = ?').get(id) as FeedRow | undefined;
}

export function getFeedByUrl(db: Database.Database, url: string): FeedRow | undefined {
  return db.prepare('SELECT * FROM feeds WHERE url = ?').get(url) as FeedRow | undefined;
}

export function updateFeed(
  db: Database.Database,
  id: string,
  updates: { name?: string; is_active?: number },
): boolean {
  const sets: string[] = [];
  const values: unknown[] = [];

  if (updates.name !== undefined) {
    sets.push('name = ?');
    values.push(updates.name);
  }
  if (updates.is_active !== undefined) {
    sets.push('is_active = ?');
    values.push(updates.is_active);
  }

  if (sets.length === 0) return false;

  values.push(id);
  const result = db.prepare(`UPDATE feeds SET ${sets.join(', ')} WHERE id = ?`).run(...values);
  return result.changes > 0;
}

export function deleteFeed(db: Database.Database, id: string): boolean {
  const result = db.prepare('DELETE FROM feeds WHERE id = ?').run(id);
  return result.changes > 0;
}

/**
 * Register many feeds at once; already-known URLs are counted, not re-added.
 */
export function addFeeds(
  db: Database.Database,
  feeds: Array<{ url: string; name?: string }>,
): { added: number; existing: number } {
  let added = 0;
  let existing = 0;
  const insertAll = db.transaction(() => {
    for (const feed of feeds) {
      if (addFeed(db, feed)) added++;
      else existing++;
    }
  });
  insertAll();
  return { added, existing };
}
