import type Database from 'better-sqlite3';
import { getDownloadManager, type DownloadManager } from '../download/manager.js';
import { buildSiteRegistry } from '../sites/index.js';
import type { SiteRegistry } from '../sites/registry.js';
import { SyncManager } from '../sync/manager.js';
import { resolveBaseDir, type Config } from '../shared/config.js';
import { ContentIndex } from './contentIndex.js';
import { SessionManager } from './sessions.js';

/**
 * The long-lived objects one process works with, wired from a config.
 */
export interface Runtime {
  config: Config;
  baseDir: string;
  registry: SiteRegistry;
  index: ContentIndex;
  downloads: DownloadManager;
  sync: SyncManager;
  sessions: SessionManager;
}

export function createRuntime(
  config: Config,
  db?: Database.Database,
  overrides: { registry?: SiteRegistry; now?: () => number; sleep?: (ms: number) => Promise<void> } = {},
): Runtime {
  const baseDir = resolveBaseDir(config);
  const registry = overrides.registry ?? buildSiteRegistry(config, db);
  const index = new ContentIndex();
  const downloads = getDownloadManager(baseDir, { progressSaveEvery: config.batch.progress_save_every });
  const sync = new SyncManager(baseDir, downloads);
  const sessions = new SessionManager({
    registry,
    index,
    downloads,
    sync,
    settings: config.batch,
    baseDir,
    now: overrides.now,
    sleep: overrides.sleep,
  });

  return { config, baseDir, registry, index, downloads, sync, sessions };
}

/**
 * Index one source and store the result in the runtime's content index.
 */
export async function indexSource(
  runtime: Runtime,
  sourceId: string,
  onMessage?: (message: string) => void,
): Promise<number> {
  const adapter = runtime.registry.create(sourceId);
  try {
    const items = await adapter.indexContent((update) => {
      if (update.message) onMessage?.(update.message);
    });
    await runtime.index.replace(sourceId, items, adapter);
    return items.length;
  } catch (err) {
    await adapter.close();
    throw err;
  }
}
