import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { addFeed, addFeeds, deleteFeed, getFeed, listFeeds, updateFeed } from '../../sites/feedDb.js';
import { parseOpml, type OpmlFeed } from '../../sites/opml.js';
import { errorMessage } from '../../shared/errors.js';

const AddFeedSchema = z.object({
  url: z.string().url(),
  name: z.string().optional(),
});

const UpdateFeedSchema = z.object({
  name: z.string().optional(),
  is_active: z.union([z.literal(0), z.literal(1)]).optional(),
});

export function feedRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/feeds
  app.post('/feeds', async (c) => {
    const parsed = AddFeedSchema.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: 'A valid url is required' }, 400);
    }

    const id = addFeed(ctx.db, parsed.data);
    if (id === null) {
      return c.json({ error: 'Feed already exists', url: parsed.data.url }, 409);
    }
    return c.json(getFeed(ctx.db, id), 201);
  });

  // GET /api/feeds
  app.get('/feeds', (c) => {
    return c.json(listFeeds(ctx.db));
  });

  // PATCH /api/feeds/:id: update name/is_active
  app.patch('/feeds/:id', async (c) => {
    const id = c.req.param('id');
    if (!getFeed(ctx.db, id)) {
      return c.json({ error: 'Feed not found' }, 404);
    }
    const parsed = UpdateFeedSchema.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: 'Invalid update', errors: parsed.error.flatten().fieldErrors }, 400);
    }

    updateFeed(ctx.db, id, parsed.data);
    return c.json(getFeed(ctx.db, id));
  });

  // DELETE /api/feeds/:id
  app.delete('/feeds/:id', (c) => {
    if (!deleteFeed(ctx.db, c.req.param('id'))) {
      return c.json({ error: 'Feed not found' }, 404);
    }
    return c.json({ ok: true });
  });

  // POST /api/feeds/import-opml: OPML XML as the request body
  app.post('/feeds/import-opml', async (c) => {
    const body = await c.req.text();
    if (!body) {
      return c.json({ error: 'OPML XML body required' }, 400);
    }

    let feeds: OpmlFeed[];
    try {
      feeds = parseOpml(body);
    } catch (err) {
      return c.json({ error: `Failed to parse OPML: ${errorMessage(err)}` }, 400);
    }

    const { added, existing } = addFeeds(ctx.db, feeds);
    return c.json({ added, skipped: existing, total: feeds.length }, 201);
  });

  return app;
}
