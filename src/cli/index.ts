#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, resolveSearchDir, writeDefaultConfig, type Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { getStowawayDir, resolvePath, truncate } from '../shared/utils.js';
import { initDb, closeDb, openDatabase } from '../db/db.js';
import { migrationStatus, runMigrations } from '../db/migrate.js';
import { addFeed, addFeeds, deleteFeed, listFeeds } from '../sites/feedDb.js';
import { parseOpmlFile, parseBatchUrlFile } from '../sites/opml.js';
import { createRuntime, indexSource, type Runtime } from '../batch/runtime.js';
import type { BatchEvent } from '../batch/events.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('stowaway')
  .description('Keep a local archive of podcasts, videos and articles from your sources')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the config file and database')
  .action(async () => {
    const configPath = process.env['STOWAWAY_CONFIG']
      ? resolvePath(process.env['STOWAWAY_CONFIG'])
      : path.join(getStowawayDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const db = initDb(config.db.path);
    const { applied } = runMigrations(db);
    if (applied.length > 0) {
      log(`✓ ${resolvePath(config.db.path)} created (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${resolvePath(config.db.path)} already up to date`);
    }
    closeDb();
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database and download directory')
  .action(async () => {
    const results: string[] = [];

    let config: Config;
    try {
      config = await loadConfig();
      results.push('Config: ok');
    } catch (err) {
      log(`✗ Config: error (${errorMessage(err)})`);
      process.exitCode = 1;
      return;
    }

    try {
      const dbPath = resolvePath(config.db.path);
      if (!fs.existsSync(dbPath)) {
        results.push('DB: missing (run stowaway init)');
      } else {
        const db = openDatabase(dbPath, { readonly: true });
        try {
          const { pending } = migrationStatus(db);
          results.push(
            pending.length === 0
              ? `DB: ok (${listFeeds(db).length} private feeds)`
              : `DB: ${pending.length} pending migrations (run stowaway init)`,
          );
        } finally {
          db.close();
        }
      }
    } catch (err) {
      results.push(`DB: error (${errorMessage(err)})`);
    }

    const baseDir = resolvePath(config.downloads.base_dir);
    try {
      fs.mkdirSync(baseDir, { recursive: true });
      fs.accessSync(baseDir, fs.constants.W_OK);
      results.push(`Downloads: ${baseDir}`);
    } catch {
      results.push(`Downloads: not writable (${baseDir})`);
    }

    results.push(`Sites: ${config.feed_sites.length} configured`);
    log(`✓ ${results.join(' | ')}`);
  });

// === sites ===
program
  .command('sites')
  .description('List available sites')
  .action(async () => {
    await withRuntime(async (runtime) => {
      for (const site of runtime.registry.list()) {
        const heavy = site.heavy ? ' (heavy)' : '';
        log(`${site.id.padEnd(20)} ${site.name.padEnd(28)} ${site.assetTypes.join(',')}${heavy}`);
      }
    });
  });

// === index ===
program
  .command('index <site>')
  .description('Index a site and list its content')
  .option('-l, --limit <n>', 'Max items to print', '50')
  .action(async (site: string, opts: { limit: string }) => {
    await withRuntime(async (runtime) => {
      const count = await indexSource(runtime, site, (message) => log(message));
      const items = runtime.index.list({ sourceId: site });
      for (const { item } of items.slice(0, parseInt(opts.limit, 10) || 50)) {
        const status = runtime.downloads.getEntry(item.id)?.status ?? '-';
        log(`${item.id.padEnd(40)} ${item.asset_type.padEnd(10)} ${status.padEnd(11)} ${truncate(item.title, 60)}`);
      }
      log(`\n${count} items indexed`);
    });
  });

// === download ===
program
  .command('download <site> <ids...>')
  .description('Download indexed items by id')
  .action(async (site: string, ids: string[]) => {
    await withRuntime(async (runtime) => {
      await indexSource(runtime, site);
      const sessionId = runtime.sessions.startDownload(ids, site);
      await followSession(runtime, sessionId);
    });
  });

// === sync ===
program
  .command('sync')
  .description('Index every source and download what is missing locally')
  .option('-s, --source <ids...>', 'Only these sources')
  .option('-d, --search-dir <dir>', 'Directory scanned for existing files')
  .option('-l, --limit-per-source <n>', 'Max new items per source')
  .action(async (opts: { source?: string[]; searchDir?: string; limitPerSource?: string }) => {
    await withRuntime(async (runtime) => {
      const sessionId = runtime.sessions.startSync({
        sourceIds: opts.source,
        searchDir: resolveSearchDir(runtime.config, opts.searchDir),
        limitPerSource: opts.limitPerSource ? parseInt(opts.limitPerSource, 10) : undefined,
      });
      await followSession(runtime, sessionId);
    });
  });

// === status ===
program
  .command('status')
  .description('Show download counts by status')
  .action(async () => {
    await withRuntime(async (runtime) => {
      const summary = runtime.downloads.getSummary();
      log(`Download dir: ${runtime.baseDir}`);
      for (const [status, count] of Object.entries(summary)) {
        log(`  ${status.padEnd(12)} ${String(count).padStart(6)}`);
      }
    });
  });

// === logs ===
program
  .command('logs')
  .description('Show recent sync runs')
  .option('-n, --limit <n>', 'Number of runs', '10')
  .action(async (opts: { limit: string }) => {
    await withRuntime(async (runtime) => {
      const records = runtime.sync.getRecentLogs(parseInt(opts.limit, 10) || 10);
      if (records.length === 0) {
        log('No sync runs recorded.');
        return;
      }
      for (const r of records) {
        log(
          `${r.timestamp}  ${r.sources_checked} sources  ${r.total_downloaded} downloaded  ` +
            `${r.total_skipped} skipped  ${r.total_errors} errors  ${r.duration_seconds}s`,
        );
        for (const d of r.source_details) {
          const error = d.error ? `  error: ${d.error}` : '';
          const retried = d.retried ? ' (retried)' : '';
          log(`    ${d.source.padEnd(24)} new ${d.new_available}, got ${d.downloaded}${retried}${error}`);
        }
      }
    });
  });

// === feed ===
const feedCmd = program.command('feed').description('Manage private RSS feeds');

feedCmd
  .command('add <url>')
  .description('Add a single feed')
  .option('-n, --name <name>', 'Feed name')
  .action(async (url: string, opts: { name?: string }) => {
    await withDb(async (db) => {
      const id = addFeed(db, { url, name: opts.name });
      log(id === null ? `Feed already exists: ${url}` : `✓ Feed added: ${url}`);
    });
  });

feedCmd
  .command('add-batch <file>')
  .description('Add feeds from a newline-separated URL file')
  .action(async (file: string) => {
    await withDb(async (db) => {
      const { added, existing } = addFeeds(db, parseBatchUrlFile(resolvePath(file)));
      log(`✓ ${added} feeds added, ${existing} duplicates skipped`);
    });
  });

feedCmd
  .command('import-opml <path>')
  .description('Import feeds from an OPML file')
  .action(async (opmlPath: string) => {
    await withDb(async (db) => {
      const { added, existing } = addFeeds(db, parseOpmlFile(resolvePath(opmlPath)));
      log(`✓ ${added} feeds imported from OPML, ${existing} duplicates skipped`);
    });
  });

feedCmd
  .command('list')
  .description('List private feeds')
  .action(async () => {
    await withDb(async (db) => {
      const feeds = listFeeds(db);
      if (feeds.length === 0) {
        log('No feeds yet. Use: stowaway feed add <url>');
        return;
      }
      for (const f of feeds) {
        const status = f.is_active ? '●' : '○';
        log(`${status} ${f.id.padEnd(22)} ${(f.name ?? f.site_domain ?? '').padEnd(28)} ${f.url}`);
      }
      log(`\n${feeds.length} feeds total`);
    });
  });

feedCmd
  .command('remove <id>')
  .description('Remove a feed by id')
  .action(async (id: string) => {
    await withDb(async (db) => {
      if (deleteFeed(db, id)) {
        log(`✓ Feed removed: ${id}`);
      } else {
        log(`Feed not found: ${id}`);
        process.exitCode = 1;
      }
    });
  });

// === server ===
program
  .command('server')
  .description('Start the API server')
  .option('-p, --port <n>', 'Port number')
  .action(async (opts: { port?: string }) => {
    await startServer({ port: opts.port ? parseInt(opts.port, 10) : undefined });
  });

// === Helpers ===

async function withDb(fn: (db: ReturnType<typeof initDb>, config: Config) => Promise<void>): Promise<void> {
  const config = await loadConfig();
  const db = initDb(config.db.path);
  runMigrations(db);
  try {
    await fn(db, config);
  } finally {
    closeDb();
  }
}

async function withRuntime(fn: (runtime: Runtime) => Promise<void>): Promise<void> {
  await withDb(async (db, config) => {
    const runtime = createRuntime(config, db);
    try {
      await fn(runtime);
    } finally {
      await runtime.index.clear();
    }
  });
}

function formatEvent(event: BatchEvent): string | null {
  switch (event.type) {
    case 'progress':
      return `[${event.current}/${event.total}] ${event.message}`;
    case 'complete':
      return `✓ ${event.message}`;
    case 'error':
      return `✗ ${event.message}`;
    case 'warning':
      return `! ${event.message}`;
    case 'keepalive':
      return null;
    default:
      return event.message;
  }
}

/**
 * Print a session's events until it ends. Ctrl+C cancels the session.
 */
async function followSession(runtime: Runtime, sessionId: string): Promise<void> {
  const onInterrupt = (): void => {
    log('Cancelling after the current item...');
    runtime.sessions.cancel(sessionId);
  };
  process.once('SIGINT', onInterrupt);

  try {
    for await (const event of runtime.sessions.events(sessionId)) {
      const line = formatEvent(event);
      if (line) log(line);
      if (event.type === 'error') process.exitCode = 1;
    }
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`✗ ${errorMessage(err)}`);
  process.exitCode = 1;
});
