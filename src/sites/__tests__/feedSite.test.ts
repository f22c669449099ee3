import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FeedSiteAdapter, mediaKind, pickTranscript, transcriptToText, type FeedSource } from '../feedSite.js';
import { makeItemId } from '../../content/item.js';
import { SiteError } from '../../shared/errors.js';

const FEED_URL = 'https://example.com/feed.xml';
const AUDIO_URL = 'https://cdn.example.com/ep1.mp3';
const TRANSCRIPT_URL = 'https://cdn.example.com/ep1.vtt';
const ARTICLE_URL = 'https://example.com/notes';

const SAMPLE_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:podcast="https://podcastindex.org/namespace/1.0">
  <channel>
    <title>Tech Talk</title>
    <link>https://example.com</link>
    <item>
      <title>Episode One</title>
      <link>https://example.com/ep1</link>
      <guid>guid-audio-1</guid>
      <pubDate>Mon, 01 Jan 2024 00:00:00 GMT</pubDate>
      <description>First episode</description>
      <enclosure url="${AUDIO_URL}" length="5" type="audio/mpeg"/>
      <podcast:transcript url="${TRANSCRIPT_URL}" type="text/vtt"/>
    </item>
    <item>
      <title>Weekly Notes</title>
      <link>${ARTICLE_URL}</link>
      <guid>guid-article-1</guid>
      <description>Notes of the week</description>
    </item>
    <item>
      <title>Nothing to keep</title>
    </item>
  </channel>
</rss>`;

const SAMPLE_VTT = `WEBVTT

1
00:00:00.000 --> 00:00:02.000
<v Host>Hello there

2
00:00:02.000 --> 00:00:04.000
General Kenobi
`;

const ARTICLE_TEXT = 'Stowaway keeps local copies of articles. '.repeat(20).trim();
const ARTICLE_PAGE = `<html><head><title>Weekly Notes</title></head><body>
<nav>Home | About</nav>
<article><h1>Weekly Notes</h1><p>${ARTICLE_TEXT}</p></article>
</body></html>`;

type Route = () => Response;

function stubFetch(routes: Record<string, Route>) {
  const mock = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    if (init?.signal?.aborted) throw new DOMException('The operation was aborted.', 'AbortError');
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const route = routes[url];
    return route ? route() : new Response('not found', { status: 404 });
  });
  vi.stubGlobal('fetch', mock);
  return mock;
}

function defaultRoutes(): Record<string, Route> {
  return {
    [FEED_URL]: () => new Response(SAMPLE_FEED, { headers: { 'Content-Type': 'application/rss+xml' } }),
    [AUDIO_URL]: () => new Response(new Uint8Array([1, 2, 3, 4, 5]), { headers: { 'Content-Type': 'audio/mpeg' } }),
    [TRANSCRIPT_URL]: () => new Response(SAMPLE_VTT, { headers: { 'Content-Type': 'text/vtt' } }),
    [ARTICLE_URL]: () => new Response(ARTICLE_PAGE, { headers: { 'Content-Type': 'text/html' } }),
  };
}

function makeAdapter(opts: { preferTranscript?: boolean; feeds?: FeedSource[] } = {}): FeedSiteAdapter {
  const descriptor = {
    id: 'tech-talk',
    name: 'Tech Talk',
    requiresAuth: false,
    assetTypes: ['audio' as const, 'article' as const],
    categories: ['podcast'],
    heavy: false,
  };
  const feeds = opts.feeds ?? [{ key: 'main', name: 'Main Show', url: FEED_URL }];
  return new FeedSiteAdapter({
    descriptor,
    category: 'podcast',
    preferTranscript: opts.preferTranscript ?? false,
    feeds: () => feeds,
    http: { timeoutMs: 5000, userAgent: 'stowaway-test', downloadTimeoutMs: 5000 },
  });
}

const audioId = makeItemId('tech-talk', 'main', 'guid-audio-1');
const articleId = makeItemId('tech-talk', 'main', 'guid-article-1');

let outDir: string;

beforeEach(() => {
  outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stowaway-feed-'));
});

afterEach(() => {
  vi.unstubAllGlobals();
  fs.rmSync(outDir, { recursive: true, force: true });
});

describe('FeedSiteAdapter.indexContent', () => {
  it('maps enclosures to media items and plain entries to articles', async () => {
    stubFetch(defaultRoutes());
    const items = await makeAdapter().indexContent();

    expect(items.map((i) => i.id)).toEqual([audioId, articleId]);

    const [audio, article] = items;
    expect(audio).toMatchObject({
      title: 'Episode One',
      url: 'https://example.com/ep1',
      asset_type: 'audio',
      category: 'podcast',
      subcategory: 'Main Show',
      date: '2024-01-01',
      description: 'First episode',
      download_url: AUDIO_URL,
    });
    expect(article).toMatchObject({ asset_type: 'article', url: ARTICLE_URL, download_url: null });
  });

  it('gives the same ids on every index', async () => {
    stubFetch(defaultRoutes());
    const adapter = makeAdapter();
    const first = await adapter.indexContent();
    const second = await adapter.indexContent();
    expect(second.map((i) => i.id)).toEqual(first.map((i) => i.id));
  });

  it('skips a failing feed when others succeed', async () => {
    stubFetch(defaultRoutes());
    const messages: string[] = [];
    const adapter = makeAdapter({
      feeds: [
        { key: 'gone', name: 'Gone', url: 'https://example.com/gone.xml' },
        { key: 'main', name: 'Main Show', url: FEED_URL },
      ],
    });

    const items = await adapter.indexContent((u) => {
      if (u.message) messages.push(u.message);
    });
    expect(items).toHaveLength(2);
    expect(messages).toContain('Error indexing Gone: Request failed: 404 from https://example.com/gone.xml');
  });

  it('throws when every feed fails', async () => {
    stubFetch({});
    await expect(makeAdapter().indexContent()).rejects.toThrow(SiteError);
  });
});

describe('FeedSiteAdapter.downloadItem', () => {
  it('streams the enclosure and writes metadata', async () => {
    stubFetch(defaultRoutes());
    const adapter = makeAdapter();
    const [audio] = await adapter.indexContent();
    const progress: number[] = [];

    const result = await adapter.downloadItem(audio!, outDir, (u) => {
      if (u.bytes !== undefined) progress.push(u.bytes);
    });

    const mediaPath = path.join(outDir, `${audioId}.mp3`);
    const metaPath = path.join(outDir, `${audioId}_metadata.json`);
    expect(result).toEqual({ ok: true, message: 'Downloaded audio (.mp3)', files: [mediaPath, metaPath] });
    expect(fs.readFileSync(mediaPath)).toEqual(Buffer.from([1, 2, 3, 4, 5]));
    expect(JSON.parse(fs.readFileSync(metaPath, 'utf-8'))).toMatchObject({ id: audioId, source: 'Tech Talk' });
    expect(progress.at(-1)).toBe(5);
  });

  it('saves the transcript instead of audio when preferred', async () => {
    const fetchMock = stubFetch(defaultRoutes());
    const adapter = makeAdapter({ preferTranscript: true });
    const [audio] = await adapter.indexContent();

    const result = await adapter.downloadItem(audio!, outDir);

    const transcriptPath = path.join(outDir, `${audioId}_transcript.txt`);
    expect(result.ok).toBe(true);
    expect(fs.readFileSync(transcriptPath, 'utf-8')).toBe('Episode One\n\nHello there\nGeneral Kenobi\n');
    expect(fs.existsSync(path.join(outDir, `${audioId}.mp3`))).toBe(false);
    expect(fetchMock.mock.calls.some(([input]) => input === AUDIO_URL)).toBe(false);
  });

  it('falls back to audio when the transcript cannot be fetched', async () => {
    const routes = defaultRoutes();
    routes[TRANSCRIPT_URL] = () => new Response('gone', { status: 404 });
    stubFetch(routes);
    const adapter = makeAdapter({ preferTranscript: true });
    const [audio] = await adapter.indexContent();

    const result = await adapter.downloadItem(audio!, outDir);

    expect(result).toMatchObject({ ok: true, message: 'Downloaded audio (.mp3)' });
    expect(fs.existsSync(path.join(outDir, `${audioId}.mp3`))).toBe(true);
    expect(fs.existsSync(path.join(outDir, `${audioId}_transcript.txt`))).toBe(false);
  });

  it('does not fall back once its signal is aborted', async () => {
    const fetchMock = stubFetch(defaultRoutes());
    const adapter = makeAdapter({ preferTranscript: true });
    const [audio] = await adapter.indexContent();
    const controller = new AbortController();
    controller.abort();

    const result = await adapter.downloadItem(audio!, outDir, undefined, controller.signal);

    expect(result).toEqual({ ok: false, message: `Request cancelled: ${TRANSCRIPT_URL}`, restricted: false });
    expect(fetchMock.mock.calls.some(([input]) => input === AUDIO_URL)).toBe(false);
  });

  it('reports 403 responses as restricted', async () => {
    const routes = defaultRoutes();
    routes[AUDIO_URL] = () => new Response('members only', { status: 403 });
    stubFetch(routes);
    const adapter = makeAdapter();
    const [audio] = await adapter.indexContent();

    const result = await adapter.downloadItem(audio!, outDir);

    expect(result).toEqual({ ok: false, message: `Access denied (403) for ${AUDIO_URL}`, restricted: true });
    expect(fs.existsSync(path.join(outDir, `${audioId}.mp3.part`))).toBe(false);
  });

  it('extracts articles to html and text files', async () => {
    stubFetch(defaultRoutes());
    const adapter = makeAdapter();
    const [, article] = await adapter.indexContent();

    const result = await adapter.downloadItem(article!, outDir);

    const htmlPath = path.join(outDir, `${articleId}.html`);
    const textPath = path.join(outDir, `${articleId}.txt`);
    expect(result).toEqual({
      ok: true,
      message: 'Saved article',
      files: [htmlPath, textPath, path.join(outDir, `${articleId}_metadata.json`)],
    });
    expect(fs.readFileSync(htmlPath, 'utf-8')).toContain('<h1>Weekly Notes</h1>');
    const text = fs.readFileSync(textPath, 'utf-8');
    expect(text.startsWith('Weekly Notes\n\n')).toBe(true);
    expect(text).toContain('Stowaway keeps local copies of articles.');
  });
});

describe('mediaKind', () => {
  it('classifies by MIME type first', () => {
    expect(mediaKind('https://x/file', 'audio/mpeg')).toBe('audio');
    expect(mediaKind('https://x/file', 'video/mp4')).toBe('video');
    expect(mediaKind('https://x/file', 'application/pdf')).toBe('pdf');
  });

  it('falls back to the URL extension', () => {
    expect(mediaKind('https://x/a.M4A?sig=1')).toBe('audio');
    expect(mediaKind('https://x/a.webm', 'application/octet-stream')).toBe('video');
    expect(mediaKind('https://x/a.html')).toBeNull();
  });
});

describe('pickTranscript', () => {
  it('prefers plain text over VTT and HTML', () => {
    const raw = [
      { $: { url: 'https://x/t.html', type: 'text/html' } },
      { $: { url: 'https://x/t.vtt', type: 'text/vtt' } },
      { $: { url: 'https://x/t.txt', type: 'text/plain' } },
    ];
    expect(pickTranscript(raw)).toEqual({ url: 'https://x/t.txt', type: 'text/plain' });
  });

  it('returns null without a usable link', () => {
    expect(pickTranscript(undefined)).toBeNull();
    expect(pickTranscript([{ $: { type: 'text/vtt' } }])).toBeNull();
  });
});

describe('transcriptToText', () => {
  it('drops cue numbers, timings and voice tags', () => {
    expect(transcriptToText(SAMPLE_VTT, 'text/vtt')).toBe('Hello there\nGeneral Kenobi');
  });

  it('handles SRT', () => {
    const srt = '1\n00:00:01,000 --> 00:00:02,000\nFirst line\n\n2\n00:00:02,000 --> 00:00:03,000\nSecond line\n';
    expect(transcriptToText(srt, 'application/srt')).toBe('First line\nSecond line');
  });

  it('strips tags from HTML transcripts', () => {
    expect(transcriptToText('<p>Hello <b>world</b></p>', 'text/html')).toBe('Hello world');
  });
});
