import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { resolveSearchDir } from '../../shared/config.js';

const DownloadRequestSchema = z.object({
  item_ids: z.array(z.string().min(1)).min(1),
  source_id: z.string().optional(),
});

const SyncRequestSchema = z.object({
  source_ids: z.array(z.string()).optional(),
  search_dir: z.string().optional(),
  limit_per_source: z.number().int().positive().optional(),
});

export function sessionRoutes(ctx: AppContext): Hono {
  const app = new Hono();
  const { sessions } = ctx.runtime;

  // POST /api/downloads: start a download session for indexed items
  app.post('/downloads', async (c) => {
    const parsed = DownloadRequestSchema.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: 'item_ids must be a non-empty array of strings' }, 400);
    }
    const sessionId = sessions.startDownload(parsed.data.item_ids, parsed.data.source_id);
    return c.json({ session_id: sessionId }, 202);
  });

  // POST /api/sync: start a sync-all session
  app.post('/sync', async (c) => {
    const parsed = SyncRequestSchema.safeParse(await c.req.json().catch(() => ({})));
    if (!parsed.success) {
      return c.json({ error: 'Invalid sync request', errors: parsed.error.flatten().fieldErrors }, 400);
    }
    const sessionId = sessions.startSync({
      sourceIds: parsed.data.source_ids,
      searchDir: resolveSearchDir(ctx.runtime.config, parsed.data.search_dir),
      limitPerSource: parsed.data.limit_per_source,
    });
    return c.json({ session_id: sessionId }, 202);
  });

  // GET /api/sessions
  app.get('/sessions', (c) => c.json(sessions.list()));

  // GET /api/sessions/:id/events: Server-Sent Events until complete/error
  app.get('/sessions/:id/events', (c) => {
    const id = c.req.param('id');
    if (!sessions.get(id)) {
      return c.json({ error: `Session not found: ${id}` }, 404);
    }

    return streamSSE(c, async (stream) => {
      const controller = new AbortController();
      stream.onAbort(() => controller.abort());
      for await (const event of sessions.events(id, controller.signal)) {
        await stream.writeSSE({ event: event.type, data: JSON.stringify(event) });
      }
    });
  });

  // POST /api/sessions/:id/cancel
  app.post('/sessions/:id/cancel', (c) => {
    const id = c.req.param('id');
    return c.json({ session_id: id, cancelled: sessions.cancel(id) });
  });

  // GET /api/downloads/summary
  app.get('/downloads/summary', (c) => {
    return c.json(ctx.runtime.downloads.getSummary());
  });

  // GET /api/sync/logs?limit=N
  app.get('/sync/logs', (c) => {
    const limit = Math.min(parseInt(c.req.query('limit') ?? '10', 10) || 10, 500);
    return c.json(ctx.runtime.sync.getRecentLogs(limit));
  });

  return app;
}
