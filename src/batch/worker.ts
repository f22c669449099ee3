import fs from 'node:fs';
import { resolveItemDir, type ContentItem } from '../content/item.js';
import type { DownloadManager } from '../download/manager.js';
import type { BatchSettings } from '../shared/config.js';
import { AccessDeniedError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep as realSleep, truncate } from '../shared/utils.js';
import { isRestrictedMessage, type DownloadResult, type ProgressSink, type SiteAdapter } from '../sites/adapter.js';
import type { SiteRegistry } from '../sites/registry.js';
import type { ContentIndex } from './contentIndex.js';
import { progressEvent, type BatchStats, type EventChannel } from './events.js';

const BYTE_REPORT_STEP = 5 * 1024 * 1024;

export type ItemOutcome = 'downloaded' | 'skipped' | 'failed' | 'restricted';

/**
 * Everything a batch worker needs. `now` and `sleep` exist so tests can run
 * the loop on a fake clock.
 */
export interface BatchContext {
  downloads: DownloadManager;
  index: ContentIndex;
  registry: SiteRegistry;
  settings: BatchSettings;
  baseDir: string;
  channel: EventChannel;
  signal?: AbortSignal;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export function clock(ctx: BatchContext): number {
  return ctx.now ? ctx.now() : Date.now();
}

export async function pause(ctx: BatchContext, ms: number): Promise<void> {
  if (ms <= 0) return;
  await (ctx.sleep ?? realSleep)(ms);
}

function formatMb(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function fileSize(filePath: string): number {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return 0;
  }
}

/** How long a timed-out download may take to settle after being aborted. */
const ABORT_GRACE_MS = 30_000;

function failure(err: unknown): DownloadResult {
  return { ok: false, message: errorMessage(err), restricted: err instanceof AccessDeniedError };
}

/**
 * Run one adapter download under a deadline. Throws become failed results.
 * At the deadline the download's signal is aborted and the attempt is
 * awaited, so no transfer outlives its item; an adapter that ignores the
 * signal is given up on after a grace period.
 */
async function downloadWithTimeout(
  adapter: SiteAdapter,
  item: ContentItem,
  outputDir: string,
  sink: ProgressSink,
  timeoutMs: number,
): Promise<DownloadResult> {
  const controller = new AbortController();
  const timedOut: DownloadResult = {
    ok: false,
    message: `Timed out after ${Math.round(timeoutMs / 1000)}s`,
    restricted: false,
  };

  const attempt = Promise.resolve()
    .then(() => adapter.downloadItem(item, outputDir, sink, controller.signal))
    .catch(failure);

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<'deadline'>((resolve) => {
    timer = setTimeout(() => resolve('deadline'), timeoutMs);
  });

  try {
    const first = await Promise.race([attempt, deadline]);
    if (first !== 'deadline') return first;
  } finally {
    clearTimeout(timer);
  }

  controller.abort();
  let graceTimer: NodeJS.Timeout | undefined;
  const grace = new Promise<'abandoned'>((resolve) => {
    graceTimer = setTimeout(() => resolve('abandoned'), ABORT_GRACE_MS);
  });
  try {
    if ((await Promise.race([attempt, grace])) === 'abandoned') {
      logger.warn({ id: item.id }, 'Download ignored abort; continuing without it');
    }
  } finally {
    clearTimeout(graceTimer);
  }
  return timedOut;
}

function recordResult(
  ctx: BatchContext,
  item: ContentItem,
  outputDir: string,
  result: DownloadResult,
  title: string,
): ItemOutcome {
  const { downloads, channel } = ctx;

  if (result.ok) {
    const localPath = result.files[0] ?? outputDir;
    const size = result.files.reduce((sum, f) => sum + fileSize(f), 0);
    downloads.completeDownload(item.id, localPath, size);
    downloads.markAccessible(item.url, item.title);
    channel.emit({ type: 'status', message: `✓ ${title}` });
    return 'downloaded';
  }

  const message = truncate(result.message, 100);
  if (result.restricted || isRestrictedMessage(result.message)) {
    downloads.markRestricted(item.id, item.title, item.url, result.message);
    channel.emit({ type: 'warning', message: `✗ Restricted: ${title} - ${message}` });
    return 'restricted';
  }

  downloads.failDownload(item.id, result.message);
  channel.emit({ type: 'warning', message: `✗ ${title}: ${message}` });
  logger.warn({ id: item.id, error: result.message }, 'Item download failed');
  return 'failed';
}

/**
 * Download one item and record the outcome in the manifest. Never throws:
 * adapter failures and manifest write errors both come back as `failed`.
 * `timeoutMs` overrides the configured item timeout.
 */
export async function processItem(
  ctx: BatchContext,
  adapter: SiteAdapter,
  item: ContentItem,
  position: { current: number; total: number },
  timeoutMs = ctx.settings.item_timeout_ms,
): Promise<ItemOutcome> {
  const { downloads, channel } = ctx;
  const title = truncate(item.title, 40);

  channel.emit(progressEvent(position.current, position.total, `Processing: ${truncate(item.title, 50)}`));

  try {
    if (!downloads.shouldDownload(item.id)) {
      channel.emit({ type: 'status', message: `Skipping (already downloaded): ${title}` });
      return 'skipped';
    }

    const outputDir = resolveItemDir(ctx.baseDir, item);
    downloads.startDownload(item.id, item.title, item.url, item.asset_type, item.category, outputDir);

    let settled = false;
    let lastReported = 0;
    const sink: ProgressSink = (update) => {
      if (settled) return;
      if (update.message) {
        channel.emit({ type: 'status', message: update.message });
      }
      if (update.bytes !== undefined) {
        downloads.updateProgress(item.id, update.bytes, update.totalBytes);
        if (update.bytes - lastReported >= BYTE_REPORT_STEP) {
          lastReported = update.bytes;
          const total = update.totalBytes ? ` of ${formatMb(update.totalBytes)}` : '';
          channel.emit({ type: 'status', message: `${title}: ${formatMb(update.bytes)}${total}` });
        }
      }
    };

    const result = await downloadWithTimeout(adapter, item, outputDir, sink, timeoutMs);
    settled = true;
    return recordResult(ctx, item, outputDir, result, title);
  } catch (err) {
    const message = errorMessage(err);
    channel.emit({ type: 'warning', message: `✗ ${title}: ${truncate(message, 100)}` });
    logger.error({ id: item.id, error: message }, 'Could not record item outcome');
    return 'failed';
  }
}

/** Inter-item delay: longer after videos. */
export function delayAfter(item: ContentItem, settings: BatchSettings): number {
  return item.asset_type === 'video' ? settings.video_delay_ms : settings.item_delay_ms;
}

/**
 * Download a list of indexed item ids, strictly one at a time. With
 * `sourceId`, every id must belong to that source. Ends with exactly one
 * terminal event: `complete` with stats, or `error` when the request cannot
 * run at all.
 */
export async function runDownloadBatch(
  ctx: BatchContext,
  itemIds: readonly string[],
  sourceId?: string,
): Promise<void> {
  const { channel, index, registry } = ctx;

  if (itemIds.length === 0) {
    channel.emit({ type: 'error', message: 'No items selected' });
    return;
  }
  if (sourceId && !registry.has(sourceId)) {
    channel.emit({ type: 'error', message: `Unknown source: ${sourceId}` });
    return;
  }

  const stats = { total: itemIds.length, downloaded: 0, skipped: 0, failed: 0, restricted: 0 } satisfies BatchStats;
  const owned = new Map<string, SiteAdapter>();

  const adapterFor = (id: string): SiteAdapter => {
    const indexed = index.adapterFor(id);
    if (indexed) return indexed;
    let adapter = owned.get(id);
    if (!adapter) {
      adapter = registry.create(id);
      owned.set(id, adapter);
    }
    return adapter;
  };

  try {
    channel.emit({ type: 'info', message: `Starting download of ${itemIds.length} items` });
    let cancelled = false;

    for (let i = 0; i < itemIds.length; i++) {
      if (ctx.signal?.aborted) {
        cancelled = true;
        break;
      }

      const id = itemIds[i] ?? '';
      const entry = index.get(id);
      if (!entry || (sourceId && entry.sourceId !== sourceId) || !registry.has(entry.sourceId)) {
        channel.emit({ type: 'warning', message: `Item not found in index: ${id}` });
        stats.failed++;
        continue;
      }

      const outcome = await processItem(ctx, adapterFor(entry.sourceId), entry.item, {
        current: i + 1,
        total: itemIds.length,
      });
      stats[outcome]++;

      if (outcome !== 'skipped' && i < itemIds.length - 1) {
        await pause(ctx, delayAfter(entry.item, ctx.settings));
      }
    }

    ctx.downloads.save();

    const summary = `${stats.downloaded} downloaded, ${stats.skipped} skipped, ${stats.failed} failed, ${stats.restricted} restricted`;
    channel.emit({
      type: 'complete',
      message: cancelled ? `Download cancelled: ${summary}` : `Download complete: ${summary}`,
      stats,
    });
  } finally {
    for (const adapter of owned.values()) {
      await adapter.close();
    }
  }
}
