import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseOpml, parseOpmlFile, parseBatchUrlFile } from '../opml.js';
import { SiteError } from '../../shared/errors.js';

const SAMPLE_OPML = `<?xml version="1.0" encoding="UTF-8"?>
<opml version="1.0">
  <head><title>Listening</title></head>
  <body>
    <outline text="Shows" title="Shows">
      <outline type="rss" text="Morning Brief" title="Morning Brief" xmlUrl="https://brief.example.com/feed.xml"/>
      <outline type="rss" text="Garden Hour" xmlUrl="https://garden.example.org/podcast"/>
    </outline>
    <outline type="rss" text="Loose Feed" xmlUrl="https://example.com/rss"/>
    <outline text="Archive">
      <outline text="Old">
        <outline type="rss" text="Deep Show" title="Deep Show" xmlUrl="https://deep.example.net/feed"/>
      </outline>
    </outline>
  </body>
</opml>`;

describe('parseOpml', () => {
  it('collects feeds in document order, including nested folders', () => {
    expect(parseOpml(SAMPLE_OPML)).toEqual([
      { url: 'https://brief.example.com/feed.xml', name: 'Morning Brief' },
      { url: 'https://garden.example.org/podcast', name: 'Garden Hour' },
      { url: 'https://example.com/rss', name: 'Loose Feed' },
      { url: 'https://deep.example.net/feed', name: 'Deep Show' },
    ]);
  });

  it('uses the URL when an outline has neither title nor text', () => {
    const opml = '<opml version="1.0"><body><outline type="rss" xmlUrl="https://a.example/feed"/></body></opml>';
    expect(parseOpml(opml)).toEqual([{ url: 'https://a.example/feed', name: 'https://a.example/feed' }]);
  });

  it('returns an empty list for an empty body', () => {
    expect(parseOpml('<opml version="1.0"><body></body></opml>')).toEqual([]);
  });
});

describe('parseOpmlFile / parseBatchUrlFile', () => {
  it('reads an OPML file from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stowaway-opml-'));
    const file = path.join(dir, 'feeds.opml');
    fs.writeFileSync(file, SAMPLE_OPML);

    expect(parseOpmlFile(file)).toHaveLength(4);
    fs.rmSync(dir, { recursive: true });
  });

  it('parses newline-separated URLs, skipping blanks and comments', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stowaway-batch-'));
    const file = path.join(dir, 'urls.txt');
    fs.writeFileSync(file, 'https://a.example/feed\n# a comment\n  https://b.example/feed  \n\nhttps://c.example/feed\n');

    expect(parseBatchUrlFile(file).map((f) => f.url)).toEqual([
      'https://a.example/feed',
      'https://b.example/feed',
      'https://c.example/feed',
    ]);
    fs.rmSync(dir, { recursive: true });
  });

  it('throws SiteError for missing files', () => {
    expect(() => parseOpmlFile('/nonexistent/feeds.opml')).toThrow(SiteError);
    expect(() => parseBatchUrlFile('/nonexistent/urls.txt')).toThrow('not found');
  });
});
