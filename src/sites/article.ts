import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';

export interface ExtractedArticle {
  title: string;
  byline: string | null;
  contentHtml: string;
  textContent: string;
  wordCount: number;
}

/**
 * Strip HTML tags and decode common entities.
 */
export function stripHtml(html: string): string {
  let text = html.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
  text = text.replace(/<[^>]+>/g, ' ');
  text = text
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, ' ');
  return text.replace(/\s+/g, ' ').trim();
}

export function countWords(text: string): number {
  if (!text) return 0;
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

/**
 * Pull the readable article out of a page. Falls back to `fallbackHtml`
 * (typically the feed entry's content) when Readability finds nothing.
 * Returns null when neither yields any text.
 */
export function extractArticle(html: string, url: string, fallbackHtml?: string): ExtractedArticle | null {
  const dom = new JSDOM(html, { url });
  const parsed = new Readability(dom.window.document).parse();

  if (parsed?.content && parsed.textContent?.trim()) {
    const textContent = parsed.textContent.replace(/\s+/g, ' ').trim();
    return {
      title: parsed.title ?? '',
      byline: parsed.byline ?? null,
      contentHtml: parsed.content,
      textContent,
      wordCount: countWords(textContent),
    };
  }

  if (fallbackHtml) {
    const textContent = stripHtml(fallbackHtml);
    if (textContent) {
      return {
        title: '',
        byline: null,
        contentHtml: fallbackHtml,
        textContent,
        wordCount: countWords(textContent),
      };
    }
  }

  return null;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Standalone HTML document for an archived article.
 */
export function renderArticleHtml(title: string, sourceUrl: string, article: ExtractedArticle): string {
  const safeTitle = escapeHtml(title);
  const byline = article.byline ? `<p class="byline">${escapeHtml(article.byline)}</p>\n` : '';
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${safeTitle}</title>`,
    '</head>',
    '<body>',
    `<h1>${safeTitle}</h1>`,
    `${byline}<p class="source"><a href="${escapeHtml(sourceUrl)}">${escapeHtml(sourceUrl)}</a></p>`,
    article.contentHtml,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}
