import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { SyncManager, idFromFilename, type SyncRunSummary } from '../manager.js';
import { DownloadManager } from '../../download/manager.js';
import { createContentItem, type ContentItem } from '../../content/item.js';

let baseDir: string;
let dm: DownloadManager;
let sync: SyncManager;

beforeEach(() => {
  baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stowaway-sync-'));
  dm = new DownloadManager(baseDir);
  sync = new SyncManager(baseDir, dm);
});

afterEach(() => {
  fs.rmSync(baseDir, { recursive: true, force: true });
});

function item(id: string): ContentItem {
  return createContentItem({ id, title: id, url: `https://example.com/${id}`, asset_type: 'audio', category: 'podcast' });
}

function touch(relative: string): void {
  const filePath = path.join(baseDir, relative);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, 'x');
}

function run(overrides: Partial<SyncRunSummary> = {}): SyncRunSummary {
  return {
    searchDir: baseDir,
    sourcesChecked: 1,
    totalDownloaded: 2,
    totalSkipped: 0,
    totalErrors: 0,
    durationSeconds: 1.5,
    details: [
      {
        sourceId: 'tech-talk',
        sourceName: 'Tech Talk',
        indexed: 5,
        local: 3,
        newAvailable: 2,
        downloaded: 2,
        skipped: 0,
        downloadErrors: 0,
        retried: false,
        error: null,
      },
    ],
    ...overrides,
  };
}

describe('idFromFilename', () => {
  it('takes the first three tokens', () => {
    expect(idFromFilename('tech-talk_main_abc123_extra')).toBe('tech-talk_main_abc123');
  });

  it('takes two tokens when only two exist', () => {
    expect(idFromFilename('tech-talk_abc')).toBe('tech-talk_abc');
  });

  it('ignores names without underscores or too short', () => {
    expect(idFromFilename('episode')).toBeNull();
    expect(idFromFilename('a_b')).toBeNull();
  });
});

describe('findLocalContent', () => {
  it('includes complete manifest entries for the source', () => {
    dm.completeDownload('tech-talk_main_aaa', '/x', 1);
    dm.completeDownload('other_main_bbb', '/y', 1);
    dm.markRestricted('tech-talk_main_ccc', 'C', '', 'denied');

    const local = sync.findLocalContent('tech-talk', path.join(baseDir, 'missing'));
    expect([...local]).toEqual(['tech-talk_main_aaa']);
  });

  it('recovers ids from transcript and media file names', () => {
    touch('podcast/Main/Ep_1/tech-talk_main_aaa_transcript.txt');
    touch('podcast/Main/Ep_1/tech-talk_main_aaa.mp3');
    touch('podcast/Main/Ep_2/tech-talk_main_bbb.m4a');
    touch('podcast/Main/Ep_3/tech-talk_main_ccc.pdf');
    touch('podcast/Other/other_main_ddd.mp3');

    const local = sync.findLocalContent('tech-talk');
    expect([...local].sort()).toEqual(['tech-talk_main_aaa', 'tech-talk_main_bbb']);
  });

  it('matches the source id ignoring case and underscores', () => {
    touch('TechTalk_main_aaa.mp3');
    expect([...sync.findLocalContent('tech_talk')]).toEqual(['TechTalk_main_aaa']);
    expect([...sync.findLocalContent('TECHTALK')]).toEqual(['TechTalk_main_aaa']);
    expect([...sync.findLocalContent('tech-talk')]).toEqual([]);
  });
});

describe('syncSource', () => {
  it('returns the order-preserving delta against local content', () => {
    touch('tech-talk_main_bbb.mp3');
    const items = ['tech-talk_main_aaa', 'tech-talk_main_bbb', 'tech-talk_main_ccc'].map(item);

    const result = sync.syncSource('tech-talk', 'Tech Talk', items);
    expect(result.indexedCount).toBe(3);
    expect(result.localCount).toBe(1);
    expect(result.newCount).toBe(2);
    expect(result.newItems.map((i) => i.id)).toEqual(['tech-talk_main_aaa', 'tech-talk_main_ccc']);
    expect(result.newItemsPreview).toEqual([
      { id: 'tech-talk_main_aaa', title: 'tech-talk_main_aaa' },
      { id: 'tech-talk_main_ccc', title: 'tech-talk_main_ccc' },
    ]);
  });

  it('caps the preview at ten items', () => {
    const items = Array.from({ length: 12 }, (_, n) => item(`tech-talk_main_${n}x`));
    const result = sync.syncSource('tech-talk', 'Tech Talk', items);
    expect(result.newCount).toBe(12);
    expect(result.newItemsPreview).toHaveLength(10);
  });
});

describe('sync log', () => {
  it('appends one JSON line per run', () => {
    const record = sync.logSyncOperation(run());
    sync.logSyncOperation(run({ totalDownloaded: 5 }));

    const lines = fs.readFileSync(sync.syncLogPath, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(record.operation).toBe('sync_all');
    expect(record.source_details[0]).toEqual({
      source: 'Tech Talk',
      indexed: 5,
      local: 3,
      new_available: 2,
      downloaded: 2,
      skipped: 0,
      download_errors: 0,
      retried: false,
      error: null,
    });
  });

  it('returns the last N records oldest first, skipping malformed lines', () => {
    for (let n = 1; n <= 5; n++) {
      sync.logSyncOperation(run({ totalDownloaded: n }));
    }
    fs.appendFileSync(sync.syncLogPath, 'not json\n');

    const recent = sync.getRecentLogs(3);
    expect(recent.map((r) => r.total_downloaded)).toEqual([4, 5]);
  });

  it('reads across chunk boundaries', () => {
    const bigDetails = Array.from({ length: 400 }, (_, n) => ({
      ...run().details[0]!,
      sourceName: `Source number ${n} with a long name`,
    }));
    for (let n = 1; n <= 4; n++) {
      sync.logSyncOperation(run({ totalDownloaded: n, details: bigDetails }));
    }
    expect(fs.statSync(sync.syncLogPath).size).toBeGreaterThan(64 * 1024);

    const recent = sync.getRecentLogs(3);
    expect(recent.map((r) => r.total_downloaded)).toEqual([2, 3, 4]);
  });

  it('returns nothing when no log exists', () => {
    expect(sync.getRecentLogs(5)).toEqual([]);
  });
});
