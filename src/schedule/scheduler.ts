/**
 * Scheduler: node-cron job that starts a sync-all session.
 * Started by `stowaway server` when `schedule.sync_cron` is set.
 */

import cron from 'node-cron';
import type { Runtime } from '../batch/runtime.js';
import { resolveSearchDir } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

let syncTask: cron.ScheduledTask | null = null;
let runningSession: string | null = null;

/**
 * Start one sync-all session unless the previous scheduled one is still
 * running. Resolves when the session has finished.
 */
export async function runScheduledSync(runtime: Runtime): Promise<string | null> {
  if (runningSession && !runtime.sessions.get(runningSession)?.finishedAt) {
    logger.info({ sessionId: runningSession }, 'Previous scheduled sync still running, skipping');
    return null;
  }

  const sessionId = runtime.sessions.startSync({ searchDir: resolveSearchDir(runtime.config) });
  runningSession = sessionId;
  logger.info({ sessionId }, 'Scheduled sync started');

  try {
    for await (const event of runtime.sessions.events(sessionId)) {
      if (event.type === 'complete') logger.info({ sessionId, ...event.stats }, event.message);
      if (event.type === 'error') logger.error({ sessionId }, event.message);
    }
  } finally {
    runningSession = null;
  }
  return sessionId;
}

export function startScheduler(runtime: Runtime): boolean {
  const syncCron = runtime.config.schedule.sync_cron.trim();
  if (!syncCron) return false;

  if (!cron.validate(syncCron)) {
    logger.warn({ syncCron }, 'Invalid sync_cron expression, skipping scheduler');
    return false;
  }

  syncTask = cron.schedule(syncCron, () => {
    runScheduledSync(runtime).catch((err: unknown) => {
      logger.error({ error: errorMessage(err) }, 'Scheduled sync failed');
    });
  });

  logger.info({ sync_cron: syncCron }, 'Scheduler started');
  return true;
}

/**
 * Stop the scheduled task (for graceful shutdown).
 */
export function stopScheduler(): void {
  if (!syncTask) return;
  syncTask.stop();
  syncTask = null;
  logger.info('Scheduler stopped');
}
