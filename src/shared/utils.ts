import { createHash } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';

export function generateId(size = 21): string {
  return nanoid(size);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function sha1(input: string): string {
  return createHash('sha1').update(input, 'utf8').digest('hex');
}

export function nowISO(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Cut to at most `max` UTF-16 units without splitting a surrogate pair. */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  const last = text.charCodeAt(max - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? max - 1 : max;
  return text.slice(0, end);
}

/**
 * Make a string safe to use as a file or directory name on common filesystems.
 */
export function safeFilename(name: string): string {
  let safe = name.replace(/[<>:"/\\|?*]/g, '');
  safe = safe.replace(/\s+/g, '_');
  safe = safe.replace(/^[._]+|[._]+$/g, '');
  if (safe.length > 100) {
    safe = safe.slice(0, 100);
  }
  return safe || 'untitled';
}

export function getPackageRoot(): string {
  // Walk up from the current file to the directory holding package.json.
  // Works for both tsx (src/shared/utils.ts) and the compiled dist/shared/utils.js.
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getStowawayDir(): string {
  return resolvePath('~/.stowaway');
}
