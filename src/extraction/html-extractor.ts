// src/extraction/html-extractor.ts
import { load } from 'cheerio';
import { normalizeText } from './text';

const NOISE_SELECTOR = 'script, style, nav, header, footer, noscript, iframe, form';
const BLOCK_SELECTOR =
  'p, div, li, tr, h1, h2, h3, h4, h5, h6, section, article, main, blockquote, pre, td, th';
const PRIMARY_CONTAINERS = ['article', 'main', '[role="main"]'];

/** A primary container shorter than this is treated as chrome, not content. */
export const MIN_PRIMARY_TEXT_CHARS = 50;

/**
 * Readable text of an HTML page. Prefers the page's article / main region,
 * then falls back to its paragraphs, then to the whole body.
 */
export function extractHtmlText(html: string): string {
  const $ = load(html);

  $(NOISE_SELECTOR).remove();
  // cheerio's text() concatenates nodes; keep block boundaries as line breaks
  $('br').replaceWith('\n');
  $(BLOCK_SELECTOR).append('\n');

  for (const selector of PRIMARY_CONTAINERS) {
    const node = $(selector).first();
    if (node.length === 0) continue;
    const text = normalizeText(node.text());
    if (text.length >= MIN_PRIMARY_TEXT_CHARS) return text;
  }

  const paragraphs = $('p')
    .map((_, el) => normalizeText($(el).text()))
    .get()
    .filter(Boolean);
  if (paragraphs.length) return paragraphs.join('\n');

  return normalizeText($('body').text());
}
