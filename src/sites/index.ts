import type Database from 'better-sqlite3';
import type { Config, FeedSiteConfig } from '../shared/config.js';
import { FeedSiteAdapter, type FeedSource } from './feedSite.js';
import { listFeeds } from './feedDb.js';
import { SiteRegistry } from './registry.js';
import type { SiteDescriptor } from './adapter.js';

export const PRIVATE_RSS_SITE_ID = 'private-rss';

const FEED_ASSET_TYPES: SiteDescriptor['assetTypes'] = ['audio', 'video', 'pdf', 'article', 'transcript'];

function httpOptions(config: Config) {
  return {
    timeoutMs: config.http.fetch_timeout_ms,
    userAgent: config.http.user_agent,
    downloadTimeoutMs: config.http.download_timeout_ms,
  };
}

function registerFeedSite(registry: SiteRegistry, config: Config, site: FeedSiteConfig): void {
  const descriptor: SiteDescriptor = {
    id: site.id,
    name: site.name,
    requiresAuth: false,
    assetTypes: FEED_ASSET_TYPES,
    categories: [site.category],
    heavy: site.heavy,
  };
  const feeds: FeedSource[] = site.feeds.map((f) => ({ key: f.key, name: f.name, url: f.url }));

  registry.register(
    descriptor,
    () =>
      new FeedSiteAdapter({
        descriptor,
        category: site.category,
        preferTranscript: site.prefer_transcript,
        feeds: () => feeds,
        http: httpOptions(config),
      }),
  );
}

/**
 * Registry of every site this process can work with: one per configured
 * `feed_sites` entry, plus `private-rss` when a feed database is available.
 */
export function buildSiteRegistry(config: Config, db?: Database.Database): SiteRegistry {
  const registry = new SiteRegistry();

  for (const site of config.feed_sites) {
    registerFeedSite(registry, config, site);
  }

  if (db && !registry.has(PRIVATE_RSS_SITE_ID)) {
    const descriptor: SiteDescriptor = {
      id: PRIVATE_RSS_SITE_ID,
      name: 'Private RSS',
      requiresAuth: false,
      assetTypes: FEED_ASSET_TYPES,
      categories: ['rss'],
      heavy: false,
    };
    registry.register(
      descriptor,
      () =>
        new FeedSiteAdapter({
          descriptor,
          category: 'rss',
          preferTranscript: true,
          feeds: () =>
            listFeeds(db, { activeOnly: true }).map((row) => ({
              key: row.key,
              name: row.name ?? row.site_domain ?? row.url,
              url: row.url,
            })),
          http: httpOptions(config),
        }),
    );
  }

  return registry;
}
