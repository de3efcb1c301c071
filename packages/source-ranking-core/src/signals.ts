/**
 * Credibility Signal Extraction
 *
 * Heuristic header/meta matching over a parsed page:
 * - author:  <meta name="author"> or <meta property="article:author">
 * - date:    <meta name="date">, <meta property="article:published_time">, or the first <time>
 * - references: an h1–h4 heading that mentions references, bibliography, works cited or sources
 *
 * Extraction never throws: a page that cannot be parsed yields NO_SIGNALS.
 */

import { JSDOM } from 'jsdom';
import { NO_SIGNALS, type CredibilitySignals } from './types.ts';

const REFERENCE_KEYWORDS = ['references', 'bibliography', 'works cited', 'sources'] as const;

const AUTHOR_SELECTORS = ['meta[name="author"]', 'meta[property="article:author"]'] as const;
const DATE_SELECTORS = ['meta[name="date"]', 'meta[property="article:published_time"]'] as const;

/**
 * Extract author/date/references signals from a parsed document.
 */
export function extractSignals(document: Document): CredibilitySignals {
  try {
    const signals: CredibilitySignals = { hasReferences: false };

    const author = firstMetaContent(document, AUTHOR_SELECTORS);
    if (author) signals.author = author;

    const date = firstMetaContent(document, DATE_SELECTORS) ?? timeElementValue(document);
    if (date) signals.date = date;

    const headings = Array.from(document.querySelectorAll('h1, h2, h3, h4'));
    signals.hasReferences = headings.some((h) => {
      const text = (h.textContent ?? '').toLowerCase();
      return REFERENCE_KEYWORDS.some((k) => text.includes(k));
    });

    return signals;
  } catch {
    return { ...NO_SIGNALS };
  }
}

/**
 * Parse HTML and extract signals in one step. Frees the jsdom window afterwards.
 */
export function parseSignals(html: string): CredibilitySignals {
  let dom: JSDOM;
  try {
    dom = new JSDOM(html);
  } catch {
    return { ...NO_SIGNALS };
  }
  try {
    return extractSignals(dom.window.document);
  } finally {
    dom.window.close();
  }
}

function firstMetaContent(document: Document, selectors: readonly string[]): string | undefined {
  for (const selector of selectors) {
    const el = document.querySelector(selector);
    if (el) {
      const content = el.getAttribute('content')?.trim();
      if (content) return content;
    }
  }
  return undefined;
}

function timeElementValue(document: Document): string | undefined {
  const time = document.querySelector('time');
  if (!time) return undefined;
  const value = time.getAttribute('content') ?? time.getAttribute('datetime') ?? time.textContent;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
