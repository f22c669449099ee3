import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type Database from 'better-sqlite3';
import { createRuntime, type Runtime } from '../batch/runtime.js';
import { StowawayError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { getStowawayDir } from '../shared/utils.js';
import { startScheduler, stopScheduler } from '../schedule/scheduler.js';
import { systemRoutes } from './routes/system.js';
import { siteRoutes } from './routes/sites.js';
import { sessionRoutes } from './routes/sessions.js';
import { feedRoutes } from './routes/feeds.js';

export interface AppContext {
  db: Database.Database;
  runtime: Runtime;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', systemRoutes(ctx));
  app.route('/api', siteRoutes(ctx));
  app.route('/api', sessionRoutes(ctx));
  app.route('/api', feedRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof StowawayError) {
      const status = errorCodeToHttpStatus(err.code);
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
      return 400;
    case 'ACCESS_DENIED':
      return 403;
    case 'SESSION_ERROR':
      return 404;
    case 'SITE_ERROR':
      return 502;
    default:
      return 500;
  }
}

/**
 * Write a default config on first run so the server starts with no setup.
 */
function autoInit(): void {
  const configPath = path.join(getStowawayDir(), 'config.yaml');
  if (!process.env['STOWAWAY_CONFIG'] && !fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
    logger.info({ path: configPath }, 'First run: created default config');
  }
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  autoInit();

  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = initDb(config.db.path);
  runMigrations(db);

  const runtime = createRuntime(config, db);
  const app = createApp({ db, runtime });

  logger.info({ port, host, sites: runtime.registry.ids() }, 'Starting stowaway server');

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Server listening');
  });

  startScheduler(runtime);

  let stopping = false;
  const shutdown = async (): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down...');
    stopScheduler();
    try {
      await runtime.sessions.shutdown();
      await runtime.index.clear();
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Shutdown error');
    } finally {
      server.close();
      closeDb();
      process.exit(0);
    }
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}
