import path from 'node:path';
import { safeFilename, sha1 } from '../shared/utils.js';

export const ASSET_TYPES = ['video', 'article', 'pdf', 'audio', 'transcript'] as const;

export type AssetType = (typeof ASSET_TYPES)[number];

/**
 * Universal descriptor of one downloadable unit, whatever site produced it.
 */
export interface ContentItem {
  readonly id: string;
  readonly title: string;
  readonly url: string;
  readonly asset_type: AssetType;
  readonly category: string;
  readonly subcategory: string;
  readonly date: string;
  readonly description: string;
  readonly download_url: string | null;
  readonly thumbnail: string | null;
}

export type ContentItemInit = Pick<ContentItem, 'id' | 'title' | 'url' | 'asset_type' | 'category'> &
  Partial<Pick<ContentItem, 'subcategory' | 'date' | 'description' | 'download_url' | 'thumbnail'>>;

export function createContentItem(init: ContentItemInit): ContentItem {
  return Object.freeze({
    id: init.id,
    title: init.title,
    url: init.url,
    asset_type: init.asset_type,
    category: init.category,
    subcategory: init.subcategory ?? '',
    date: init.date ?? '',
    description: init.description ?? '',
    download_url: init.download_url ?? null,
    thumbnail: init.thumbnail ?? null,
  });
}

export function isAssetType(value: string): value is AssetType {
  return (ASSET_TYPES as readonly string[]).includes(value);
}

/**
 * Deterministic item id: `<siteId>_<groupKey>_<12 hex chars of sha1(stableKey)>`.
 *
 * `stableKey` should be the most stable identifier the source offers
 * (feed guid, then link, then title + date) so that re-indexing converges
 * on the same ids.
 */
export function makeItemId(siteId: string, groupKey: string, stableKey: string): string {
  return `${siteId}_${groupKey}_${sha1(stableKey.trim()).slice(0, 12)}`;
}

/**
 * Directory an item is downloaded into: `base/category[/subcategory]/safe_title`.
 */
export function resolveItemDir(baseDir: string, item: ContentItem): string {
  const parts = [baseDir, safeFilename(item.category)];
  if (item.subcategory) {
    parts.push(safeFilename(item.subcategory));
  }
  parts.push(safeFilename(item.title));
  return path.join(...parts);
}
