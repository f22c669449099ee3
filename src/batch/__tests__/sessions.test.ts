import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DownloadManager } from '../../download/manager.js';
import { SyncManager } from '../../sync/manager.js';
import { SessionError } from '../../shared/errors.js';
import { SiteRegistry } from '../../sites/registry.js';
import { ContentIndex } from '../contentIndex.js';
import type { BatchEvent } from '../events.js';
import { SessionManager } from '../sessions.js';
import { FakeAdapter, descriptorFor, fakeItems, registryOf, succeed, testSettings, type Behavior } from './fakes.js';

let baseDir: string;

beforeEach(() => {
  baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stowaway-sessions-'));
});

afterEach(() => {
  fs.rmSync(baseDir, { recursive: true, force: true });
});

function managerFor(registry: SiteRegistry, index = new ContentIndex(), retention = 60_000): SessionManager {
  const downloads = new DownloadManager(baseDir);
  return new SessionManager({
    registry,
    index,
    downloads,
    sync: new SyncManager(baseDir, downloads),
    settings: testSettings({ session_retention_ms: retention }),
    baseDir,
    sleep: async () => {},
  });
}

async function collect(stream: AsyncGenerator<BatchEvent>): Promise<BatchEvent[]> {
  const out: BatchEvent[] = [];
  for await (const event of stream) out.push(event);
  return out;
}

async function indexed(behavior: Behavior = succeed) {
  const adapter = new FakeAdapter(descriptorFor('alpha', 'Alpha'), fakeItems('alpha', 2), behavior);
  const index = new ContentIndex();
  await index.replace('alpha', adapter.items, adapter);
  return { adapter, index, registry: registryOf(adapter) };
}

describe('SessionManager', () => {
  it('runs a download session in the background and streams its events', async () => {
    const { adapter, index, registry } = await indexed();
    const sessions = managerFor(registry, index);

    const id = sessions.startDownload(adapter.items.map((i) => i.id));
    expect(sessions.get(id)).toMatchObject({ id, kind: 'download', finishedAt: null, cancelled: false });

    const events = await collect(sessions.events(id));
    expect(events.at(-1)).toMatchObject({
      type: 'complete',
      message: 'Download complete: 2 downloaded, 0 skipped, 0 failed, 0 restricted',
    });

    await sessions.wait(id);
    expect(sessions.get(id)?.finishedAt).not.toBeNull();
    expect(sessions.list().map((s) => s.id)).toEqual([id]);
  });

  it('replays the whole stream to a reader that joins late', async () => {
    const { adapter, index, registry } = await indexed();
    const sessions = managerFor(registry, index);

    const id = sessions.startDownload(adapter.items.map((i) => i.id));
    await sessions.wait(id);

    const events = await collect(sessions.events(id));
    expect(events[0]).toEqual({ type: 'info', message: 'Starting download of 2 items' });
    expect(events.at(-1)?.type).toBe('complete');
  });

  it('cancels a running session between items', async () => {
    let sessionId = '';
    const { adapter, index, registry } = await indexed(async (item, dir, sink) => {
      expect(sessions.cancel(sessionId)).toBe(true);
      return succeed(item, dir, sink);
    });
    const sessions = managerFor(registry, index);

    sessionId = sessions.startDownload(adapter.items.map((i) => i.id));
    await sessions.wait(sessionId);

    expect(adapter.calls).toHaveLength(1);
    expect(sessions.get(sessionId)?.cancelled).toBe(true);
    expect(sessions.cancel(sessionId)).toBe(false);
    expect((await collect(sessions.events(sessionId))).at(-1)).toMatchObject({
      message: 'Download cancelled: 1 downloaded, 0 skipped, 0 failed, 0 restricted',
    });
  });

  it('turns a crashed worker into an error event', async () => {
    const registry = new SiteRegistry();
    registry.register(descriptorFor('alpha', 'Alpha'), () => {
      throw new Error('factory broke');
    });
    const index = new ContentIndex();
    await index.replace('alpha', fakeItems('alpha', 1));
    const sessions = managerFor(registry, index);

    const id = sessions.startDownload([fakeItems('alpha', 1)[0]!.id]);
    const events = await collect(sessions.events(id));

    expect(events.at(-1)).toEqual({ type: 'error', message: 'factory broke' });
  });

  it('runs sync sessions', async () => {
    const { registry } = await indexed();
    const sessions = managerFor(registry);

    const id = sessions.startSync({ searchDir: baseDir });
    const events = await collect(sessions.events(id));

    expect(sessions.get(id)?.kind).toBe('sync');
    expect(events.at(-1)).toMatchObject({ type: 'complete', message: 'Sync complete: 2 downloaded, 0 skipped, 0 errors' });
  });

  it('throws SessionError for unknown ids', () => {
    const sessions = managerFor(new SiteRegistry());
    expect(() => sessions.events('missing')).toThrow(SessionError);
    expect(() => sessions.cancel('missing')).toThrow('Session not found: missing');
    expect(sessions.get('missing')).toBeUndefined();
  });

  it('forgets finished sessions when retention is zero', async () => {
    const { adapter, index, registry } = await indexed();
    const sessions = managerFor(registry, index, 0);

    const id = sessions.startDownload(adapter.items.map((i) => i.id));
    const reading = collect(sessions.events(id));
    await sessions.wait(id);
    await reading;

    expect(sessions.get(id)).toBeUndefined();
  });

  it('shutdown cancels everything still running', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { adapter, index, registry } = await indexed(async (item, dir, sink) => {
      await gate;
      return succeed(item, dir, sink);
    });
    const sessions = managerFor(registry, index);

    const id = sessions.startDownload(adapter.items.map((i) => i.id));
    await new Promise((resolve) => setTimeout(resolve, 5));
    const stopping = sessions.shutdown();
    release();
    await stopping;

    expect(adapter.calls).toHaveLength(1);
    expect(sessions.get(id)?.cancelled).toBe(true);
  });
});
