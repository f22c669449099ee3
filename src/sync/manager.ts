import fs from 'node:fs';
import path from 'node:path';
import type { ContentItem } from '../content/item.js';
import type { DownloadManager } from '../download/manager.js';
import { errorMessage, SyncError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';

const TRANSCRIPT_SUFFIX = '_transcript.txt';
const MEDIA_EXTENSIONS = ['.mp3', '.m4a', '.wav', '.mp4'];
const ID_TOKEN_COUNT = 3;
const PREVIEW_SIZE = 10;
const TAIL_CHUNK_BYTES = 64 * 1024;

export interface SyncResult {
  sourceId: string;
  sourceName: string;
  indexedCount: number;
  localCount: number;
  newCount: number;
  newItemsPreview: Array<{ id: string; title: string }>;
  newItems: ContentItem[];
}

/**
 * Per-source outcome of a batch sync, as fed to the sync log.
 */
export interface SyncSourceDetail {
  sourceId: string;
  sourceName: string;
  indexed: number;
  local: number;
  newAvailable: number;
  downloaded: number;
  skipped: number;
  downloadErrors: number;
  retried: boolean;
  error: string | null;
}

export interface SyncRunSummary {
  searchDir: string;
  sourcesChecked: number;
  totalDownloaded: number;
  totalSkipped: number;
  totalErrors: number;
  durationSeconds: number;
  details: SyncSourceDetail[];
}

export interface SyncLogRecord {
  timestamp: string;
  operation: string;
  search_directory: string;
  sources_checked: number;
  total_downloaded: number;
  total_skipped: number;
  total_errors: number;
  duration_seconds: number;
  source_details: Array<{
    source: string;
    indexed: number;
    local: number;
    new_available: number;
    downloaded: number;
    skipped: number;
    download_errors: number;
    retried: boolean;
    error: string | null;
  }>;
}

/**
 * Candidate content id recovered from a file name: the first three
 * `_`-separated tokens (two when only two exist). Names yielding three
 * characters or fewer are ignored.
 */
export function idFromFilename(baseName: string): string | null {
  const parts = baseName.split('_');
  if (parts.length < 2) return null;
  const candidate = parts.slice(0, ID_TOKEN_COUNT).join('_');
  return candidate.length > 3 ? candidate : null;
}

function* walkFiles(dir: string): Generator<string> {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    logger.debug({ dir, error: errorMessage(err) }, 'Skipping unreadable directory');
    return;
  }
  for (const entry of entries) {
    if (entry.isDirectory()) {
      yield* walkFiles(path.join(dir, entry.name));
    } else if (entry.isFile()) {
      yield entry.name;
    }
  }
}

/**
 * Works out which remotely indexed items already exist locally, and keeps
 * the append-only `sync_log.jsonl` of batch sync runs.
 */
export class SyncManager {
  readonly syncLogPath: string;

  constructor(
    readonly baseDir: string,
    private readonly downloads: DownloadManager,
  ) {
    this.syncLogPath = path.join(baseDir, 'sync_log.jsonl');
  }

  /**
   * Ids considered present locally for a source: complete manifest entries
   * whose id starts with the source id, OR ids recovered from file names
   * under `searchDir`. The file scan is a permissive heuristic; a match is
   * enough to skip the item.
   */
  findLocalContent(sourceId: string, searchDir?: string): Set<string> {
    const localIds = new Set<string>();

    for (const entry of this.downloads.listEntries({ status: 'complete', idPrefix: `${sourceId}_` })) {
      localIds.add(entry.id);
    }

    const root = resolvePath(searchDir ?? this.baseDir);
    if (!fs.existsSync(root)) {
      return localIds;
    }

    const needle = sourceId.toLowerCase().replace(/_/g, '');
    const transcriptIds = new Set<string>();
    const mediaIds = new Set<string>();

    for (const fileName of walkFiles(root)) {
      if (!fileName.toLowerCase().replace(/_/g, '').includes(needle)) continue;

      if (fileName.endsWith(TRANSCRIPT_SUFFIX)) {
        const id = idFromFilename(fileName.slice(0, -TRANSCRIPT_SUFFIX.length));
        if (id) transcriptIds.add(id);
        continue;
      }

      const ext = MEDIA_EXTENSIONS.find((e) => fileName.endsWith(e));
      if (ext) {
        const id = idFromFilename(fileName.slice(0, -ext.length));
        if (id) mediaIds.add(id);
      }
    }

    // A transcript and its raw audio describe one episode; count it once,
    // through the transcript.
    let mediaOnly = 0;
    for (const id of transcriptIds) localIds.add(id);
    for (const id of mediaIds) {
      if (transcriptIds.has(id)) continue;
      mediaOnly++;
      localIds.add(id);
    }

    logger.debug(
      { sourceId, root, transcripts: transcriptIds.size, mediaOnly, total: localIds.size },
      'Local content scanned',
    );
    return localIds;
  }

  /**
   * Indexed items whose id is not in `localIds`, in their original order.
   */
  compareWithRemote(indexedItems: readonly ContentItem[], localIds: ReadonlySet<string>): ContentItem[] {
    return indexedItems.filter((item) => !localIds.has(item.id));
  }

  syncSource(
    sourceId: string,
    sourceName: string,
    indexedItems: readonly ContentItem[],
    searchDir?: string,
  ): SyncResult {
    const localIds = this.findLocalContent(sourceId, searchDir);
    const newItems = this.compareWithRemote(indexedItems, localIds);

    return {
      sourceId,
      sourceName,
      indexedCount: indexedItems.length,
      localCount: localIds.size,
      newCount: newItems.length,
      newItemsPreview: newItems.slice(0, PREVIEW_SIZE).map((item) => ({ id: item.id, title: item.title })),
      newItems,
    };
  }

  /**
   * Append one record for a batch sync run to the sync log.
   */
  logSyncOperation(run: SyncRunSummary, operation = 'sync_all'): SyncLogRecord {
    const record: SyncLogRecord = {
      timestamp: new Date().toISOString(),
      operation,
      search_directory: run.searchDir,
      sources_checked: run.sourcesChecked,
      total_downloaded: run.totalDownloaded,
      total_skipped: run.totalSkipped,
      total_errors: run.totalErrors,
      duration_seconds: run.durationSeconds,
      source_details: run.details.map((d) => ({
        source: d.sourceName || d.sourceId,
        indexed: d.indexed,
        local: d.local,
        new_available: d.newAvailable,
        downloaded: d.downloaded,
        skipped: d.skipped,
        download_errors: d.downloadErrors,
        retried: d.retried,
        error: d.error,
      })),
    };

    try {
      fs.mkdirSync(path.dirname(this.syncLogPath), { recursive: true });
      fs.appendFileSync(this.syncLogPath, JSON.stringify(record) + '\n', 'utf-8');
    } catch (err) {
      throw new SyncError(`Failed to append sync log: ${errorMessage(err)}`, { path: this.syncLogPath });
    }

    logger.info({ path: this.syncLogPath, sources: record.sources_checked }, 'Sync log written');
    return record;
  }

  /**
   * Last `limit` records, oldest first. Reads the file backwards in chunks
   * until enough lines are found; malformed lines are skipped.
   */
  getRecentLogs(limit = 10): SyncLogRecord[] {
    if (limit <= 0 || !fs.existsSync(this.syncLogPath)) return [];

    const lines = this.tailLines(limit);
    const records: SyncLogRecord[] = [];
    for (const line of lines) {
      try {
        records.push(JSON.parse(line) as SyncLogRecord);
      } catch {
        logger.debug({ path: this.syncLogPath }, 'Skipping malformed sync log line');
      }
    }
    return records;
  }

  private tailLines(limit: number): string[] {
    const fd = fs.openSync(this.syncLogPath, 'r');
    try {
      let position = fs.fstatSync(fd).size;
      let buffer = Buffer.alloc(0);
      let lines: string[] = [];

      while (position > 0) {
        const readSize = Math.min(TAIL_CHUNK_BYTES, position);
        position -= readSize;
        const chunk = Buffer.alloc(readSize);
        fs.readSync(fd, chunk, 0, readSize, position);
        buffer = Buffer.concat([chunk, buffer]);

        lines = buffer.toString('utf-8').split('\n').filter((l) => l.trim().length > 0);
        // The first line may be cut mid-record unless we reached the start.
        const complete = position === 0 ? lines.length : lines.length - 1;
        if (complete >= limit) break;
      }

      return lines.slice(-limit);
    } finally {
      fs.closeSync(fd);
    }
  }
}
