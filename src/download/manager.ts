import { createHash } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { readJsonFile, writeJsonAtomicSync } from '../shared/atomic.js';
import { DownloadError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DOWNLOAD_STATUSES = [
  'pending',
  'in_progress',
  'partial',
  'complete',
  'failed',
  'skipped',
  'restricted',
] as const;

export type DownloadStatus = (typeof DOWNLOAD_STATUSES)[number];

/**
 * A completed file counts as present when its size is at least this share of
 * the expected size (transcoding and header variance).
 */
export const SIZE_TOLERANCE = 0.98;

const DownloadEntrySchema = z.object({
  id: z.string(),
  title: z.string().default(''),
  url: z.string().default(''),
  asset_type: z.string().default('unknown'),
  category: z.string().default('unknown'),
  // Kept as a free string: manifests written by older versions may carry
  // statuses this version does not know.
  status: z.string().default('pending'),
  local_path: z.string().nullable().default(null),
  size: z.number().nullable().default(null),
  expected_size: z.number().nullable().default(null),
  resume_position: z.number().nullable().default(null),
  checksum: z.string().nullable().default(null),
  downloaded_at: z.string().nullable().default(null),
  error: z.string().nullable().default(null),
});

export type DownloadEntry = z.infer<typeof DownloadEntrySchema>;

const ManifestSchema = z.object({
  created_at: z.string().default(() => timestamp()),
  last_sync: z.string().nullable().default(null),
  downloads: z.record(DownloadEntrySchema).default({}),
});

export type Manifest = z.infer<typeof ManifestSchema>;

const AccessLogSchema = z.object({
  accessible: z.array(z.record(z.unknown())).default([]),
  restricted: z.array(z.record(z.unknown())).default([]),
  errors: z.array(z.record(z.unknown())).default([]),
});

export type AccessLog = z.infer<typeof AccessLogSchema>;

export interface DownloadSummary {
  total: number;
  pending: number;
  in_progress: number;
  partial: number;
  complete: number;
  failed: number;
  restricted: number;
  skipped: number;
  unknown: number;
}

export interface DownloadManagerOptions {
  /** Persist progress ticks only every N calls to updateProgress. */
  progressSaveEvery?: number;
}

function isKnownStatus(status: string): status is DownloadStatus {
  return (DOWNLOAD_STATUSES as readonly string[]).includes(status);
}

function timestamp(): string {
  return new Date().toISOString();
}

function emptyEntry(id: string, overrides: Partial<DownloadEntry> = {}): DownloadEntry {
  return {
    id,
    title: id,
    url: '',
    asset_type: 'unknown',
    category: 'unknown',
    status: 'pending',
    local_path: null,
    size: null,
    expected_size: null,
    resume_position: null,
    checksum: null,
    downloaded_at: null,
    error: null,
    ...overrides,
  };
}

/**
 * Tracks per-item download status for one base directory.
 *
 * State lives in `manifest.json` (one entry per item id) and
 * `access_log.json` (append-only audit of restricted and failed accesses).
 * Every state change is written through an atomic rename, except progress
 * ticks, which are flushed every `progressSaveEvery` calls.
 */
export class DownloadManager {
  readonly manifestPath: string;
  readonly accessLogPath: string;

  private manifest: Manifest;
  private accessLog: AccessLog;
  private readonly progressSaveEvery: number;
  private progressTicks = 0;

  constructor(
    readonly baseDir: string,
    options: DownloadManagerOptions = {},
  ) {
    this.manifestPath = path.join(baseDir, 'manifest.json');
    this.accessLogPath = path.join(baseDir, 'access_log.json');
    this.progressSaveEvery = options.progressSaveEvery ?? 25;

    fs.mkdirSync(baseDir, { recursive: true });
    this.manifest = this.loadManifest();
    this.accessLog = this.loadAccessLog();
  }

  // ================================================================
  // Persistence
  // ================================================================

  private loadManifest(): Manifest {
    const raw = readJsonFile(this.manifestPath);
    if (raw !== undefined) {
      const parsed = ManifestSchema.safeParse(raw);
      if (parsed.success) return parsed.data;
      logger.warn({ path: this.manifestPath }, 'Manifest is malformed, starting fresh');
    }
    return { created_at: timestamp(), last_sync: null, downloads: {} };
  }

  private loadAccessLog(): AccessLog {
    const raw = readJsonFile(this.accessLogPath);
    if (raw !== undefined) {
      const parsed = AccessLogSchema.safeParse(raw);
      if (parsed.success) return parsed.data;
      logger.warn({ path: this.accessLogPath }, 'Access log is malformed, starting fresh');
    }
    return { accessible: [], restricted: [], errors: [] };
  }

  private saveManifest(): void {
    this.manifest.last_sync = timestamp();
    try {
      writeJsonAtomicSync(this.manifestPath, this.manifest);
    } catch (err) {
      throw new DownloadError(`Failed to write manifest: ${errorMessage(err)}`, {
        path: this.manifestPath,
      });
    }
    this.progressTicks = 0;
  }

  private saveAccessLog(): void {
    try {
      writeJsonAtomicSync(this.accessLogPath, this.accessLog);
    } catch (err) {
      throw new DownloadError(`Failed to write access log: ${errorMessage(err)}`, {
        path: this.accessLogPath,
      });
    }
  }

  /** Write both manifest and access log. */
  save(): void {
    this.saveManifest();
    this.saveAccessLog();
  }

  /** Drop in-memory state and re-read both files from disk. */
  reload(): void {
    this.manifest = this.loadManifest();
    this.accessLog = this.loadAccessLog();
    this.progressTicks = 0;
  }

  // ================================================================
  // Queries
  // ================================================================

  getEntry(id: string): DownloadEntry | undefined {
    const entry = this.manifest.downloads[id];
    return entry ? { ...entry } : undefined;
  }

  listEntries(filter: { status?: DownloadStatus; idPrefix?: string } = {}): DownloadEntry[] {
    return Object.values(this.manifest.downloads)
      .filter((e) => (filter.status ? e.status === filter.status : true))
      .filter((e) => (filter.idPrefix ? e.id.startsWith(filter.idPrefix) : true))
      .map((e) => ({ ...e }));
  }

  getAccessLog(): AccessLog {
    return {
      accessible: [...this.accessLog.accessible],
      restricted: [...this.accessLog.restricted],
      errors: [...this.accessLog.errors],
    };
  }

  /**
   * Decide whether an item needs a download attempt. Checks the disk on every
   * call; callers must not cache the answer.
   */
  shouldDownload(id: string, expectedSize?: number): boolean {
    const entry = this.manifest.downloads[id];
    if (!entry) return true;

    if (entry.status === 'complete') {
      if (!entry.local_path || !fs.existsSync(entry.local_path)) {
        return true;
      }
      const expected = expectedSize ?? entry.expected_size;
      if (!expected) return false;
      return (entry.size ?? 0) < expected * SIZE_TOLERANCE;
    }

    if (entry.status === 'failed' || entry.status === 'restricted') {
      return false;
    }

    return true;
  }

  getResumePosition(id: string): number {
    const entry = this.manifest.downloads[id];
    if (entry && entry.status === 'partial') {
      return entry.resume_position ?? 0;
    }
    return 0;
  }

  getSummary(): DownloadSummary {
    const summary: DownloadSummary = {
      total: 0,
      pending: 0,
      in_progress: 0,
      partial: 0,
      complete: 0,
      failed: 0,
      restricted: 0,
      skipped: 0,
      unknown: 0,
    };

    for (const entry of Object.values(this.manifest.downloads)) {
      summary.total++;
      if (isKnownStatus(entry.status)) {
        summary[entry.status]++;
      } else {
        summary.unknown++;
      }
    }

    return summary;
  }

  /**
   * Ids downloaded after `since` (defaults to the manifest's last sync time).
   * Returns nothing when there is no reference point.
   */
  getNewSince(since?: string): string[] {
    const reference = since ?? this.manifest.last_sync;
    if (!reference) return [];

    return Object.values(this.manifest.downloads)
      .filter((e) => e.downloaded_at !== null && e.downloaded_at > reference)
      .map((e) => e.id);
  }

  // ================================================================
  // Transitions
  // ================================================================

  startDownload(
    id: string,
    title: string,
    url: string,
    assetType: string,
    category: string,
    localPath: string,
  ): void {
    this.manifest.downloads[id] = emptyEntry(id, {
      title,
      url,
      asset_type: assetType,
      category,
      status: 'in_progress',
      local_path: localPath,
    });
    this.saveManifest();
  }

  updateProgress(id: string, bytesDownloaded: number, expectedSize?: number): void {
    const entry = this.manifest.downloads[id];
    if (!entry) return;

    entry.size = bytesDownloaded;
    entry.resume_position = bytesDownloaded;
    if (expectedSize) {
      entry.expected_size = expectedSize;
    }
    entry.status = 'partial';

    this.progressTicks++;
    if (this.progressTicks >= this.progressSaveEvery) {
      this.saveManifest();
    }
  }

  completeDownload(id: string, localPath: string, size: number, checksum?: string): void {
    const existing = this.manifest.downloads[id];
    const fields: Partial<DownloadEntry> = {
      status: 'complete',
      local_path: localPath,
      size,
      checksum: checksum ?? null,
      downloaded_at: timestamp(),
      error: null,
    };

    this.manifest.downloads[id] = existing ? { ...existing, ...fields } : emptyEntry(id, fields);
    this.saveManifest();
  }

  failDownload(id: string, error: string): void {
    const entry = this.manifest.downloads[id];
    if (entry) {
      entry.status = 'failed';
      entry.error = error;
      this.saveManifest();
    }

    this.accessLog.errors.push({ id, error, timestamp: timestamp() });
    this.saveAccessLog();
  }

  markRestricted(id: string, title: string, url: string, reason: string): void {
    const existing = this.manifest.downloads[id];
    this.manifest.downloads[id] = existing
      ? { ...existing, status: 'restricted', error: reason }
      : emptyEntry(id, { title, url, status: 'restricted', error: reason });
    this.saveManifest();

    this.accessLog.restricted.push({ id, title, url, reason, timestamp: timestamp() });
    this.saveAccessLog();
  }

  markAccessible(url: string, title: string): void {
    this.accessLog.accessible.push({ url, title, timestamp: timestamp() });
    this.saveAccessLog();
  }

  /**
   * Put a failed item back to pending so the batch retry pass may attempt it
   * again. Restricted items are left alone.
   */
  requeueFailed(id: string): boolean {
    const entry = this.manifest.downloads[id];
    if (!entry || entry.status !== 'failed') return false;
    entry.status = 'pending';
    this.saveManifest();
    return true;
  }

  /** Forget everything known about an item. */
  resetEntry(id: string): boolean {
    if (!(id in this.manifest.downloads)) return false;
    delete this.manifest.downloads[id];
    this.saveManifest();
    return true;
  }

  /** SHA-256 of a file's full contents, as `sha256:<hex>`. */
  async calculateChecksum(filePath: string): Promise<string> {
    const hash = createHash('sha256');
    for await (const chunk of fs.createReadStream(filePath)) {
      hash.update(chunk);
    }
    return `sha256:${hash.digest('hex')}`;
  }
}

const managers = new Map<string, DownloadManager>();

/**
 * Process-wide manager for a base directory. Sessions targeting the same
 * directory share it, so their manifest writes go through one document.
 */
export function getDownloadManager(baseDir: string, options?: DownloadManagerOptions): DownloadManager {
  const key = path.resolve(baseDir);
  let manager = managers.get(key);
  if (!manager) {
    manager = new DownloadManager(key, options);
    managers.set(key, manager);
  }
  return manager;
}

export function resetDownloadManagers(): void {
  managers.clear();
}
