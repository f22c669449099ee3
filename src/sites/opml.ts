import { JSDOM } from 'jsdom';
import fs from 'node:fs';
import { SiteError } from '../shared/errors.js';

export interface OpmlFeed {
  url: string;
  name: string;
}

/**
 * Feed URLs from an OPML document, including those inside nested folders.
 */
export function parseOpml(xmlString: string): OpmlFeed[] {
  const dom = new JSDOM(xmlString, { contentType: 'text/xml' });
  const doc = dom.window.document;
  const feeds: OpmlFeed[] = [];

  function traverse(node: Element): void {
    const outlines = Array.from(node.children).filter((el) => el.tagName.toLowerCase() === 'outline');
    for (const outline of outlines) {
      const xmlUrl = outline.getAttribute('xmlUrl');
      if (xmlUrl) {
        const name = outline.getAttribute('title') ?? outline.getAttribute('text') ?? xmlUrl;
        feeds.push({ url: xmlUrl, name });
      }
      traverse(outline);
    }
  }

  const body = doc.querySelector('body');
  if (body) {
    traverse(body);
  }

  return feeds;
}

export function parseOpmlFile(filePath: string): OpmlFeed[] {
  if (!fs.existsSync(filePath)) {
    throw new SiteError(`OPML file not found: ${filePath}`, { path: filePath });
  }
  return parseOpml(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Newline-separated feed URLs. Blank lines and `#` comments are skipped.
 */
export function parseBatchUrlFile(filePath: string): OpmlFeed[] {
  if (!fs.existsSync(filePath)) {
    throw new SiteError(`Batch URL file not found: ${filePath}`, { path: filePath });
  }
  return fs
    .readFileSync(filePath, 'utf-8')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map((url) => ({ url, name: url }));
}
