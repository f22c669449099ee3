import type { AssetType, ContentItem } from '../content/item.js';
import type { SiteAdapter } from '../sites/adapter.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface IndexedItem {
  item: ContentItem;
  sourceId: string;
}

/**
 * Process-scoped map from item id to the last indexed item and its source.
 * Each indexing pass replaces a source's items wholesale. The adapter that
 * produced them is kept so later downloads can reuse whatever it learned
 * while indexing.
 */
export class ContentIndex {
  private readonly items = new Map<string, IndexedItem>();
  private readonly bySource = new Map<string, string[]>();
  private readonly adapters = new Map<string, SiteAdapter>();

  async replace(sourceId: string, items: readonly ContentItem[], adapter?: SiteAdapter): Promise<void> {
    for (const id of this.bySource.get(sourceId) ?? []) {
      if (this.items.get(id)?.sourceId === sourceId) {
        this.items.delete(id);
      }
    }

    const ids: string[] = [];
    for (const item of items) {
      this.items.set(item.id, { item, sourceId });
      ids.push(item.id);
    }
    this.bySource.set(sourceId, ids);

    if (adapter) {
      const previous = this.adapters.get(sourceId);
      this.adapters.set(sourceId, adapter);
      if (previous && previous !== adapter) {
        await closeQuietly(previous);
      }
    }
  }

  get(id: string): IndexedItem | undefined {
    return this.items.get(id);
  }

  adapterFor(sourceId: string): SiteAdapter | undefined {
    return this.adapters.get(sourceId);
  }

  list(filter: { sourceId?: string; assetType?: AssetType } = {}): IndexedItem[] {
    const sourceIds = filter.sourceId ? [filter.sourceId] : [...this.bySource.keys()];
    const result: IndexedItem[] = [];
    for (const sourceId of sourceIds) {
      for (const id of this.bySource.get(sourceId) ?? []) {
        const entry = this.items.get(id);
        if (!entry || entry.sourceId !== sourceId) continue;
        if (filter.assetType && entry.item.asset_type !== filter.assetType) continue;
        result.push(entry);
      }
    }
    return result;
  }

  sourceIds(): string[] {
    return [...this.bySource.keys()];
  }

  get size(): number {
    return this.items.size;
  }

  async clear(): Promise<void> {
    const adapters = [...this.adapters.values()];
    this.items.clear();
    this.bySource.clear();
    this.adapters.clear();
    for (const adapter of adapters) {
      await closeQuietly(adapter);
    }
  }
}

async function closeQuietly(adapter: SiteAdapter): Promise<void> {
  try {
    await adapter.close();
  } catch (err) {
    logger.warn({ site: adapter.descriptor.id, error: errorMessage(err) }, 'Adapter close failed');
  }
}
