import type { ContentItem } from '../content/item.js';
import type { SiteAdapter } from '../sites/adapter.js';
import type { SyncManager, SyncSourceDetail } from '../sync/manager.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { progressEvent } from './events.js';
import { clock, delayAfter, pause, processItem, type BatchContext } from './worker.js';

export type AbandonReason = 'stalled' | 'error_burst';

/**
 * Per-source download health for one pass. A source that has produced no
 * success is abandoned once it has been attempting for longer than the
 * stall timeout, or after more than the allowed consecutive failures.
 */
export class SourceHealth {
  private successes = 0;
  private attempts = 0;
  private consecutiveFailures = 0;

  constructor(
    private readonly startedAt: number,
    private readonly limits: { stallTimeoutMs: number; maxConsecutiveFailures: number },
  ) {}

  recordSuccess(): void {
    this.attempts++;
    this.successes++;
    this.consecutiveFailures = 0;
  }

  recordFailure(): void {
    this.attempts++;
    this.consecutiveFailures++;
  }

  /** Time left before a source with no successes counts as stalled. */
  timeUntilStall(now: number): number | null {
    if (this.successes > 0) return null;
    return this.startedAt + this.limits.stallTimeoutMs - now;
  }

  abandonReason(now: number): AbandonReason | null {
    if (this.successes > 0 || this.attempts === 0) return null;
    if (this.consecutiveFailures > this.limits.maxConsecutiveFailures) return 'error_burst';
    if (now - this.startedAt > this.limits.stallTimeoutMs) return 'stalled';
    return null;
  }
}

export interface SyncAllOptions {
  sync: SyncManager;
  /** Restrict to these sources; defaults to every registered site. */
  sourceIds?: string[];
  searchDir: string;
  limitPerSource?: number;
}

interface PassResult {
  abandoned: AbandonReason | null;
  /** Items still owed to the source: failed here or never attempted. */
  outstanding: ContentItem[];
  cancelled: boolean;
}

interface RetryEntry {
  sourceId: string;
  adapter: SiteAdapter;
  items: ContentItem[];
  detail: SyncSourceDetail;
}

function emptyDetail(sourceId: string, sourceName: string): SyncSourceDetail {
  return {
    sourceId,
    sourceName,
    indexed: 0,
    local: 0,
    newAvailable: 0,
    downloaded: 0,
    skipped: 0,
    downloadErrors: 0,
    retried: false,
    error: null,
  };
}

const REASON_TEXT: Record<AbandonReason, string> = {
  stalled: 'no successful downloads before the stall timeout',
  error_burst: 'too many consecutive failures',
};

/**
 * Download `items` for one source, tracking its health.
 */
async function downloadPass(
  ctx: BatchContext,
  adapter: SiteAdapter,
  items: readonly ContentItem[],
  detail: SyncSourceDetail,
): Promise<PassResult> {
  const health = new SourceHealth(clock(ctx), {
    stallTimeoutMs: ctx.settings.stall_timeout_ms,
    maxConsecutiveFailures: ctx.settings.max_consecutive_failures,
  });
  const failed: ContentItem[] = [];

  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (!item) continue;
    if (ctx.signal?.aborted) {
      return { abandoned: null, outstanding: [], cancelled: true };
    }

    // Until the source proves itself, no single item may outlast the stall window.
    const untilStall = health.timeUntilStall(clock(ctx));
    const timeoutMs =
      untilStall === null
        ? ctx.settings.item_timeout_ms
        : Math.max(1, Math.min(ctx.settings.item_timeout_ms, untilStall));

    const outcome = await processItem(ctx, adapter, item, { current: i + 1, total: items.length }, timeoutMs);
    switch (outcome) {
      case 'downloaded':
        detail.downloaded++;
        health.recordSuccess();
        break;
      case 'skipped':
        detail.skipped++;
        break;
      case 'restricted':
        detail.downloadErrors++;
        health.recordFailure();
        break;
      case 'failed':
        detail.downloadErrors++;
        failed.push(item);
        health.recordFailure();
        break;
    }

    const reason = health.abandonReason(clock(ctx));
    if (reason) {
      return { abandoned: reason, outstanding: [...failed, ...items.slice(i + 1)], cancelled: false };
    }

    if (outcome !== 'skipped' && i < items.length - 1) {
      await pause(ctx, delayAfter(item, ctx.settings));
    }
  }

  return { abandoned: null, outstanding: failed, cancelled: false };
}

/**
 * Index, diff and download every source. Light sources run first, heavy
 * ones last. A source abandoned in the first pass gets exactly one retry
 * pass after all others; abandoned again, it is reported failed. Appends one
 * record to the sync log and ends with a `complete` event.
 */
export async function runSyncAll(ctx: BatchContext, options: SyncAllOptions): Promise<void> {
  const { channel, registry, index } = ctx;
  const startedAt = clock(ctx);

  const requested = options.sourceIds?.length ? options.sourceIds : registry.ids();
  const known: string[] = [];
  for (const id of requested) {
    if (registry.has(id)) known.push(id);
    else channel.emit({ type: 'warning', message: `Unknown source skipped: ${id}` });
  }
  if (known.length === 0) {
    channel.emit({ type: 'error', message: 'No sources to sync' });
    return;
  }

  // Stable sort: light sources keep their order ahead of heavy ones.
  const ordered = [...known].sort(
    (a, b) => Number(registry.get(a)?.heavy ?? false) - Number(registry.get(b)?.heavy ?? false),
  );

  const details: SyncSourceDetail[] = [];
  const retryQueue: RetryEntry[] = [];
  let sourceErrors = 0;
  let cancelled = false;

  channel.emit({ type: 'info', message: `Syncing ${ordered.length} sources into ${options.searchDir}` });

  for (let i = 0; i < ordered.length && !cancelled; i++) {
    const sourceId = ordered[i] ?? '';
    const name = registry.get(sourceId)?.name ?? sourceId;
    const detail = emptyDetail(sourceId, name);
    details.push(detail);

    channel.emit(progressEvent(i + 1, ordered.length, `Checking ${name}`));

    let adapter: SiteAdapter;
    let items: ContentItem[];
    try {
      adapter = registry.create(sourceId);
    } catch (err) {
      detail.error = errorMessage(err);
      sourceErrors++;
      channel.emit({ type: 'warning', message: `${name}: ${detail.error}` });
      continue;
    }

    try {
      const auth = await adapter.checkAuth();
      if (!auth.authenticated) {
        detail.error = `Not authenticated: ${auth.message}`;
        sourceErrors++;
        channel.emit({ type: 'warning', message: `${name}: not authenticated (${auth.message})` });
        await adapter.close();
        continue;
      }
      items = await adapter.indexContent((update) => {
        if (update.message) channel.emit({ type: 'info', message: update.message });
      });
    } catch (err) {
      detail.error = errorMessage(err);
      sourceErrors++;
      channel.emit({ type: 'warning', message: `Error indexing ${name}: ${detail.error}` });
      logger.warn({ sourceId, error: detail.error }, 'Source indexing failed');
      await adapter.close();
      continue;
    }

    await index.replace(sourceId, items, adapter);

    const delta = options.sync.syncSource(sourceId, name, items, options.searchDir);
    detail.indexed = delta.indexedCount;
    detail.local = delta.localCount;
    detail.newAvailable = delta.newCount;
    channel.emit({
      type: 'info',
      message: `${name}: ${delta.indexedCount} indexed, ${delta.localCount} local, ${delta.newCount} new`,
    });

    const toDownload =
      options.limitPerSource && options.limitPerSource > 0
        ? delta.newItems.slice(0, options.limitPerSource)
        : delta.newItems;
    if (toDownload.length === 0) {
      channel.emit({ type: 'success', message: `${name}: up to date` });
      continue;
    }

    const pass = await downloadPass(ctx, adapter, toDownload, detail);
    if (pass.cancelled) {
      cancelled = true;
    } else if (pass.abandoned) {
      retryQueue.push({ sourceId, adapter, items: pass.outstanding, detail });
      channel.emit({
        type: 'warning',
        message: `${name}: abandoned (${REASON_TEXT[pass.abandoned]}), will retry after other sources`,
      });
    } else {
      channel.emit({ type: 'success', message: `${name}: ${detail.downloaded} downloaded` });
    }
  }

  for (const entry of retryQueue) {
    if (cancelled || ctx.signal?.aborted) {
      cancelled = true;
      break;
    }
    const { detail } = entry;
    detail.retried = true;
    for (const item of entry.items) {
      ctx.downloads.requeueFailed(item.id);
    }

    channel.emit({ type: 'info', message: `Retrying ${detail.sourceName} (${entry.items.length} items)` });
    const pass = await downloadPass(ctx, entry.adapter, entry.items, detail);
    if (pass.cancelled) {
      cancelled = true;
    } else if (pass.abandoned) {
      detail.error = `Abandoned after retry: ${REASON_TEXT[pass.abandoned]}`;
      sourceErrors++;
      channel.emit({ type: 'warning', message: `${detail.sourceName}: ${detail.error}` });
    } else {
      channel.emit({ type: 'success', message: `${detail.sourceName}: retry finished` });
    }
  }

  ctx.downloads.save();

  const totalDownloaded = details.reduce((sum, d) => sum + d.downloaded, 0);
  const totalSkipped = details.reduce((sum, d) => sum + d.skipped, 0);
  const totalErrors = details.reduce((sum, d) => sum + d.downloadErrors, 0) + sourceErrors;
  const durationSeconds = Math.round((clock(ctx) - startedAt) / 100) / 10;

  try {
    options.sync.logSyncOperation({
      searchDir: options.searchDir,
      sourcesChecked: details.length,
      totalDownloaded,
      totalSkipped,
      totalErrors,
      durationSeconds,
      details,
    });
  } catch (err) {
    channel.emit({ type: 'warning', message: `Could not write sync log: ${errorMessage(err)}` });
  }

  const summary = `${totalDownloaded} downloaded, ${totalSkipped} skipped, ${totalErrors} errors`;
  channel.emit({
    type: 'complete',
    message: cancelled ? `Sync cancelled: ${summary}` : `Sync complete: ${summary}`,
    stats: {
      sources_checked: details.length,
      downloaded: totalDownloaded,
      skipped: totalSkipped,
      errors: totalErrors,
      duration_seconds: durationSeconds,
    },
  });
}
