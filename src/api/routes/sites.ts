import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { indexSource } from '../../batch/runtime.js';
import { isAssetType } from '../../content/item.js';

const LoginSchema = z.record(z.string());

export function siteRoutes(ctx: AppContext): Hono {
  const app = new Hono();
  const { registry, index } = ctx.runtime;

  // GET /api/sites: registered sites with their indexed item counts
  app.get('/sites', (c) => {
    return c.json(
      registry.list().map((site) => ({
        ...site,
        indexed_count: index.list({ sourceId: site.id }).length,
      })),
    );
  });

  // GET /api/sites/:id/auth
  app.get('/sites/:id/auth', async (c) => {
    const id = c.req.param('id');
    if (!registry.has(id)) {
      return c.json({ error: `Unknown site: ${id}` }, 404);
    }
    const adapter = index.adapterFor(id) ?? registry.create(id);
    try {
      return c.json(await adapter.checkAuth());
    } finally {
      if (adapter !== index.adapterFor(id)) await adapter.close();
    }
  });

  // POST /api/sites/:id/login: credentials as a flat string map
  app.post('/sites/:id/login', async (c) => {
    const id = c.req.param('id');
    if (!registry.has(id)) {
      return c.json({ error: `Unknown site: ${id}` }, 404);
    }
    const parsed = LoginSchema.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: 'Credentials must be an object of strings' }, 400);
    }
    const adapter = index.adapterFor(id) ?? registry.create(id);
    try {
      return c.json(await adapter.login(parsed.data));
    } finally {
      if (adapter !== index.adapterFor(id)) await adapter.close();
    }
  });

  // POST /api/sites/:id/index: index and replace the site's items
  app.post('/sites/:id/index', async (c) => {
    const id = c.req.param('id');
    if (!registry.has(id)) {
      return c.json({ error: `Unknown site: ${id}` }, 404);
    }
    const count = await indexSource(ctx.runtime, id);
    return c.json({ site: id, indexed: count });
  });

  // GET /api/content?site=&asset_type=&limit=&offset=
  app.get('/content', (c) => {
    const site = c.req.query('site');
    const assetType = c.req.query('asset_type');
    const limit = Math.min(parseInt(c.req.query('limit') ?? '100', 10) || 100, 1000);
    const offset = Math.max(parseInt(c.req.query('offset') ?? '0', 10) || 0, 0);

    if (assetType && !isAssetType(assetType)) {
      return c.json({ error: `Unknown asset type: ${assetType}` }, 400);
    }

    const entries = index.list({
      sourceId: site,
      assetType: assetType && isAssetType(assetType) ? assetType : undefined,
    });

    return c.json({
      total: entries.length,
      items: entries.slice(offset, offset + limit).map((e) => ({
        ...e.item,
        source_id: e.sourceId,
        status: ctx.runtime.downloads.getEntry(e.item.id)?.status ?? null,
      })),
    });
  });

  return app;
}
