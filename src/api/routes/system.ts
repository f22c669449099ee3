import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import type { Config } from '../../shared/config.js';
import { migrationStatus } from '../../db/migrate.js';

const PACKAGE_VERSION = '0.1.0';

/**
 * Config as served over the API: feed URLs may embed private tokens, so
 * their query strings are masked.
 */
export function redactConfig(config: Config): Config {
  return {
    ...config,
    feed_sites: config.feed_sites.map((site) => ({
      ...site,
      feeds: site.feeds.map((feed) => ({ ...feed, url: maskQuery(feed.url) })),
    })),
  };
}

function maskQuery(url: string): string {
  const q = url.indexOf('?');
  return q === -1 ? url : `${url.slice(0, q)}?***`;
}

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      version: PACKAGE_VERSION,
      uptime: process.uptime(),
    });
  });

  // GET /api/config
  app.get('/config', (c) => {
    return c.json(redactConfig(ctx.runtime.config));
  });

  // GET /api/doctor
  app.get('/doctor', (c) => {
    const checks: Record<string, string> = {};

    try {
      const { pending } = migrationStatus(ctx.db);
      checks['db'] = pending.length === 0 ? 'ok' : `${pending.length} pending migrations`;
    } catch {
      checks['db'] = 'error';
    }

    checks['sites'] = String(ctx.runtime.registry.ids().length);
    checks['download_dir'] = ctx.runtime.baseDir;
    checks['indexed_items'] = String(ctx.runtime.index.size);

    return c.json(checks);
  });

  return app;
}
