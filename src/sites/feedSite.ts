import fs from 'node:fs';
import path from 'node:path';
import Parser from 'rss-parser';
import { createContentItem, makeItemId, type AssetType, type ContentItem } from '../content/item.js';
import { AccessDeniedError, errorMessage, SiteError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { extractArticle, renderArticleHtml, stripHtml } from './article.js';
import { downloadToFile, fetchText, type HttpOptions } from './http.js';
import type {
  AuthStatus,
  ConfigField,
  DownloadResult,
  ProgressSink,
  SiteAdapter,
  SiteDescriptor,
} from './adapter.js';

const parser = new Parser<Record<string, unknown>, Record<string, unknown>>({
  timeout: 30000,
  customFields: {
    item: [
      ['content:encoded', 'contentEncoded'],
      ['podcast:transcript', 'transcripts', { keepArray: true }],
    ],
  },
});

const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';

const EXTENSIONS: Record<'audio' | 'video' | 'pdf', string[]> = {
  audio: ['.mp3', '.m4a', '.wav', '.ogg', '.aac'],
  video: ['.mp4', '.m4v', '.mov', '.webm'],
  pdf: ['.pdf'],
};

const TRANSCRIPT_TYPE_RANK = ['text/plain', 'text/vtt', 'application/srt', 'application/x-subrip', 'text/html'];

export interface FeedSource {
  /** Stable short key used inside item ids; no underscores. */
  key: string;
  name: string;
  url: string;
}

export interface FeedSiteOptions {
  descriptor: SiteDescriptor;
  category: string;
  preferTranscript: boolean;
  /** Feeds are resolved on every index so registry changes apply at once. */
  feeds: () => FeedSource[];
  http: HttpOptions & { downloadTimeoutMs: number };
}

interface TranscriptLink {
  url: string;
  type: string;
}

type MediaKind = keyof typeof EXTENSIONS;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function urlExtension(url: string): string {
  try {
    return path.extname(new URL(url).pathname).toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Classify an enclosure as audio, video or pdf from its MIME type, falling
 * back to the URL's extension.
 */
export function mediaKind(url: string, mimeType?: string): MediaKind | null {
  const type = (mimeType ?? '').toLowerCase();
  if (type.startsWith('audio/')) return 'audio';
  if (type.startsWith('video/')) return 'video';
  if (type === 'application/pdf') return 'pdf';

  const ext = urlExtension(url);
  for (const kind of Object.keys(EXTENSIONS) as MediaKind[]) {
    if (EXTENSIONS[kind].includes(ext)) return kind;
  }
  return null;
}

function fileExtension(kind: MediaKind, url: string): string {
  const ext = urlExtension(url);
  return EXTENSIONS[kind].includes(ext) ? ext : (EXTENSIONS[kind][0] ?? '.bin');
}

/**
 * Pick the most text-friendly `<podcast:transcript>` link of an entry.
 */
export function pickTranscript(raw: unknown): TranscriptLink | null {
  const candidates: TranscriptLink[] = [];
  for (const el of Array.isArray(raw) ? raw : [raw]) {
    if (!isRecord(el) || !isRecord(el['$'])) continue;
    const attrs = el['$'];
    const url = attrs['url'];
    if (typeof url !== 'string' || !url) continue;
    const type = typeof attrs['type'] === 'string' ? attrs['type'].toLowerCase() : '';
    candidates.push({ url, type });
  }

  const rank = (t: TranscriptLink): number => {
    const i = TRANSCRIPT_TYPE_RANK.indexOf(t.type);
    return i === -1 ? TRANSCRIPT_TYPE_RANK.length : i;
  };
  candidates.sort((a, b) => rank(a) - rank(b));
  return candidates[0] ?? null;
}

/**
 * Plain text from a transcript body: cue numbers, timing lines and voice
 * tags are removed from WebVTT/SRT, tags from HTML.
 */
export function transcriptToText(body: string, type: string): string {
  if (type === 'text/html') {
    return stripHtml(body);
  }
  if (type === 'text/plain') {
    return body.trim();
  }

  const lines: string[] = [];
  for (const rawLine of body.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    if (line === 'WEBVTT' || line.startsWith('NOTE')) continue;
    if (/^\d+$/.test(line)) continue;
    if (line.includes('-->')) continue;
    const text = line.replace(/<[^>]+>/g, '').trim();
    if (text && text !== lines[lines.length - 1]) lines.push(text);
  }
  return lines.join('\n');
}

/**
 * Site backed by one or more RSS/Atom feeds.
 *
 * Enclosures become audio, video or pdf items; entries without one become
 * article items. Files land in the orchestrator-chosen directory as
 * `<id><ext>`, `<id>_transcript.txt` or `<id>.html` + `<id>.txt`, plus
 * `<id>_metadata.json`.
 */
export class FeedSiteAdapter implements SiteAdapter {
  private readonly transcripts = new Map<string, TranscriptLink>();
  private readonly articleFallbacks = new Map<string, string>();

  constructor(private readonly options: FeedSiteOptions) {}

  get descriptor(): SiteDescriptor {
    return this.options.descriptor;
  }

  configFields(): ConfigField[] {
    return [];
  }

  async checkAuth(): Promise<AuthStatus> {
    return { authenticated: true, message: 'No authentication required' };
  }

  async login(_credentials: Record<string, string>): Promise<AuthStatus> {
    return { authenticated: true, message: 'No authentication required' };
  }

  async indexContent(sink?: ProgressSink): Promise<ContentItem[]> {
    const feeds = this.options.feeds();
    if (feeds.length === 0) {
      sink?.({ message: 'No feeds configured' });
      return [];
    }

    const items: ContentItem[] = [];
    const seen = new Set<string>();
    const failures: string[] = [];

    for (const feed of feeds) {
      sink?.({ message: `Indexing ${feed.name}...` });
      try {
        const xml = await fetchText(feed.url, this.options.http, FEED_ACCEPT);
        const parsed = await parser.parseString(xml);
        let added = 0;

        for (const entry of parsed.items) {
          const item = this.toItem(feed, entry);
          if (!item || seen.has(item.id)) continue;
          seen.add(item.id);
          items.push(item);
          added++;
        }

        sink?.({ message: `Indexed ${added} entries from ${feed.name}` });
      } catch (err) {
        failures.push(`${feed.name}: ${errorMessage(err)}`);
        sink?.({ message: `Error indexing ${feed.name}: ${errorMessage(err)}` });
        logger.warn({ site: this.descriptor.id, feed: feed.url, error: errorMessage(err) }, 'Feed index failed');
      }
    }

    if (failures.length === feeds.length) {
      throw new SiteError(`All feeds failed for ${this.descriptor.name}: ${failures.join('; ')}`, {
        site: this.descriptor.id,
      });
    }

    return items;
  }

  private toItem(feed: FeedSource, entry: Parser.Item & Record<string, unknown>): ContentItem | null {
    const title = entry.title?.trim() || 'Untitled';
    const link = entry.link?.trim() ?? '';
    const date = (entry.isoDate ?? '').slice(0, 10);
    const stableKey = entry.guid?.trim() || link || `${title}|${entry.pubDate ?? ''}`;
    const id = makeItemId(this.descriptor.id, feed.key, stableKey);

    const enclosureUrl = entry.enclosure?.url?.trim();
    const kind = enclosureUrl ? mediaKind(enclosureUrl, entry.enclosure?.type) : null;

    let assetType: AssetType;
    if (enclosureUrl && kind) {
      assetType = kind;
    } else if (link) {
      assetType = 'article';
      const html = entry['contentEncoded'];
      if (typeof html === 'string' && html) {
        this.articleFallbacks.set(id, html);
      }
    } else {
      return null;
    }

    const transcript = pickTranscript(entry['transcripts']);
    if (transcript) {
      this.transcripts.set(id, transcript);
    }

    return createContentItem({
      id,
      title,
      url: link || (enclosureUrl ?? ''),
      asset_type: assetType,
      category: this.options.category,
      subcategory: feed.name,
      date,
      description: (entry.contentSnippet ?? '').slice(0, 2000),
      download_url: kind ? enclosureUrl : null,
    });
  }

  async downloadItem(
    item: ContentItem,
    outputDir: string,
    sink?: ProgressSink,
    signal?: AbortSignal,
  ): Promise<DownloadResult> {
    try {
      fs.mkdirSync(outputDir, { recursive: true });

      const files: string[] = [];
      let message: string | null = null;

      const transcript = this.transcripts.get(item.id);
      if (this.options.preferTranscript && transcript) {
        try {
          files.push(await this.saveTranscript(item, transcript, outputDir, signal));
          message = 'Saved transcript';
        } catch (err) {
          if (signal?.aborted) throw err;
          if (err instanceof AccessDeniedError && item.asset_type === 'transcript') throw err;
          sink?.({ message: `Transcript unavailable, falling back: ${errorMessage(err)}` });
          logger.info({ id: item.id, error: errorMessage(err) }, 'Transcript failed, falling back to media');
        }
      }

      if (!message) {
        if (item.asset_type === 'article') {
          files.push(...(await this.saveArticle(item, outputDir, signal)));
          message = 'Saved article';
        } else if (item.asset_type === 'transcript') {
          return { ok: false, message: 'No transcript available', restricted: false };
        } else {
          const saved = await this.saveMedia(item, item.asset_type, outputDir, sink, signal);
          files.push(saved);
          message = `Downloaded ${item.asset_type} (${path.extname(saved)})`;
        }
      }

      files.push(this.writeMetadata(item, outputDir));
      return { ok: true, message, files };
    } catch (err) {
      return {
        ok: false,
        message: errorMessage(err),
        restricted: err instanceof AccessDeniedError,
      };
    }
  }

  private async saveTranscript(
    item: ContentItem,
    link: TranscriptLink,
    outputDir: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const body = await fetchText(link.url, { ...this.options.http, signal }, '*/*');
    const text = transcriptToText(body, link.type);
    if (!text) {
      throw new SiteError(`Transcript is empty: ${link.url}`, { url: link.url });
    }
    const filePath = path.join(outputDir, `${item.id}_transcript.txt`);
    fs.writeFileSync(filePath, `${item.title}\n\n${text}\n`, 'utf-8');
    return filePath;
  }

  private async saveArticle(item: ContentItem, outputDir: string, signal?: AbortSignal): Promise<string[]> {
    const html = await fetchText(item.url, { ...this.options.http, signal });
    const article = extractArticle(html, item.url, this.articleFallbacks.get(item.id));
    if (!article) {
      throw new SiteError(`No readable content at ${item.url}`, { url: item.url });
    }

    const htmlPath = path.join(outputDir, `${item.id}.html`);
    const textPath = path.join(outputDir, `${item.id}.txt`);
    fs.writeFileSync(htmlPath, renderArticleHtml(item.title, item.url, article), 'utf-8');
    fs.writeFileSync(textPath, `${item.title}\n\n${article.textContent}\n`, 'utf-8');
    return [htmlPath, textPath];
  }

  private async saveMedia(
    item: ContentItem,
    kind: MediaKind,
    outputDir: string,
    sink?: ProgressSink,
    signal?: AbortSignal,
  ): Promise<string> {
    if (!item.download_url) {
      throw new SiteError(`No download URL available for ${item.title}`, { id: item.id });
    }
    const dest = path.join(outputDir, `${item.id}${fileExtension(kind, item.download_url)}`);
    const result = await downloadToFile(item.download_url, dest, {
      timeoutMs: this.options.http.downloadTimeoutMs,
      userAgent: this.options.http.userAgent,
      signal,
      onProgress: (bytes, totalBytes) => sink?.({ bytes, totalBytes }),
    });
    return result.path;
  }

  private writeMetadata(item: ContentItem, outputDir: string): string {
    const metadataPath = path.join(outputDir, `${item.id}_metadata.json`);
    const metadata = {
      ...item,
      source: this.descriptor.name,
      saved_at: new Date().toISOString(),
    };
    fs.writeFileSync(metadataPath, JSON.stringify(metadata, null, 2), 'utf-8');
    return metadataPath;
  }

  async close(): Promise<void> {
    this.transcripts.clear();
    this.articleFallbacks.clear();
  }
}
