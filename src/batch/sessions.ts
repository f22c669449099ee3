import type { DownloadManager } from '../download/manager.js';
import type { SiteRegistry } from '../sites/registry.js';
import type { SyncManager } from '../sync/manager.js';
import type { BatchSettings } from '../shared/config.js';
import { errorMessage, SessionError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { generateId } from '../shared/utils.js';
import type { ContentIndex } from './contentIndex.js';
import { EventChannel, type BatchEvent } from './events.js';
import { runSyncAll } from './syncAll.js';
import { runDownloadBatch, type BatchContext } from './worker.js';

export type SessionKind = 'download' | 'sync';

export interface SessionInfo {
  id: string;
  kind: SessionKind;
  startedAt: string;
  finishedAt: string | null;
  cancelled: boolean;
}

interface Session extends SessionInfo {
  channel: EventChannel;
  controller: AbortController;
  done: Promise<void>;
}

export interface SessionManagerDeps {
  registry: SiteRegistry;
  index: ContentIndex;
  downloads: DownloadManager;
  sync: SyncManager;
  settings: BatchSettings;
  baseDir: string;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface SyncSessionOptions {
  sourceIds?: string[];
  searchDir: string;
  limitPerSource?: number;
}

/**
 * Starts batch workers in the background and hands out their event streams.
 * Each session runs its items strictly one after another; sessions may run
 * side by side and share the download manager.
 */
export class SessionManager {
  private readonly sessions = new Map<string, Session>();

  constructor(private readonly deps: SessionManagerDeps) {}

  startDownload(itemIds: string[], sourceId?: string): string {
    return this.launch('download', (ctx) => runDownloadBatch(ctx, itemIds, sourceId));
  }

  startSync(options: SyncSessionOptions): string {
    return this.launch('sync', (ctx) => runSyncAll(ctx, { ...options, sync: this.deps.sync }));
  }

  private launch(kind: SessionKind, work: (ctx: BatchContext) => Promise<void>): string {
    const id = generateId();
    const channel = new EventChannel(this.deps.settings.heartbeat_ms);
    const controller = new AbortController();

    const ctx: BatchContext = {
      downloads: this.deps.downloads,
      index: this.deps.index,
      registry: this.deps.registry,
      settings: this.deps.settings,
      baseDir: this.deps.baseDir,
      channel,
      signal: controller.signal,
      now: this.deps.now,
      sleep: this.deps.sleep,
    };

    const session: Session = {
      id,
      kind,
      startedAt: new Date().toISOString(),
      finishedAt: null,
      cancelled: false,
      channel,
      controller,
      done: Promise.resolve(),
    };
    this.sessions.set(id, session);

    session.done = this.run(session, () => work(ctx));
    logger.info({ sessionId: id, kind }, 'Session started');
    return id;
  }

  private async run(session: Session, work: () => Promise<void>): Promise<void> {
    // Let the caller receive the id before any work happens.
    await Promise.resolve();
    try {
      await work();
      if (!session.channel.isClosed) {
        session.channel.emit({ type: 'complete', message: 'Finished', stats: {} });
      }
    } catch (err) {
      logger.error({ sessionId: session.id, error: errorMessage(err) }, 'Session failed');
      session.channel.emit({ type: 'error', message: errorMessage(err) });
    } finally {
      session.finishedAt = new Date().toISOString();
      this.scheduleRemoval(session.id);
    }
  }

  private scheduleRemoval(id: string): void {
    const retention = this.deps.settings.session_retention_ms;
    if (retention <= 0) {
      this.sessions.delete(id);
      return;
    }
    setTimeout(() => this.sessions.delete(id), retention).unref();
  }

  /**
   * Events of a session from its first one, until the terminal event.
   */
  events(id: string, signal?: AbortSignal): AsyncGenerator<BatchEvent> {
    return this.require(id).channel.stream(signal);
  }

  cancel(id: string): boolean {
    const session = this.require(id);
    if (session.finishedAt) return false;
    session.cancelled = true;
    session.controller.abort();
    logger.info({ sessionId: id }, 'Session cancel requested');
    return true;
  }

  get(id: string): SessionInfo | undefined {
    const session = this.sessions.get(id);
    return session ? toInfo(session) : undefined;
  }

  list(): SessionInfo[] {
    return [...this.sessions.values()].map(toInfo);
  }

  /** Resolves once the session's worker has stopped. */
  async wait(id: string): Promise<void> {
    await this.require(id).done;
  }

  /** Cancel everything still running and wait for the workers to stop. */
  async shutdown(): Promise<void> {
    const running = [...this.sessions.values()].filter((s) => !s.finishedAt);
    for (const session of running) {
      session.cancelled = true;
      session.controller.abort();
    }
    await Promise.all(running.map((s) => s.done));
  }

  private require(id: string): Session {
    const session = this.sessions.get(id);
    if (!session) {
      throw new SessionError(`Session not found: ${id}`, { sessionId: id });
    }
    return session;
  }
}

function toInfo(session: Session): SessionInfo {
  return {
    id: session.id,
    kind: session.kind,
    startedAt: session.startedAt,
    finishedAt: session.finishedAt,
    cancelled: session.cancelled,
  };
}
