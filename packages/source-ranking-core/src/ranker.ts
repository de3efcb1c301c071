/**
 * Source Ranker
 *
 * Normalizes, health-checks, scores and sorts candidate sources.
 *
 * Each record is evaluated independently: a network failure, a non-2xx
 * response or a parse failure marks that record dead (tier C) without
 * affecting the others. Evaluation holds no shared mutable state, so the
 * optional concurrency only changes wall-clock time, never the output.
 *
 * Usage:
 * ```typescript
 * const ranked = await rankSources([
 *   { url: 'https://nasa.gov/missions?utm_source=x', confidence: 0.82 },
 *   { url: 'https://example.com/blog', confidence: 0.4 },
 * ]);
 * ranked[0].tier; // 'S'
 * ```
 */

import { normalizeUrl } from './normalize.ts';
import { parseSignals } from './signals.ts';
import { DEFAULT_TRUSTED_SUFFIXES, sanitizeConfidence, scoreSource, tierForScore } from './scoring.ts';
import {
  NO_SIGNALS,
  type FetchedPage,
  type PageFetcher,
  type RankOptions,
  type RankedSource,
  type RawSourceRecord,
} from './types.ts';

// ============================================================================
// CONSTANTS
// ============================================================================

/** Per-request bound for the default page fetcher. */
export const DEFAULT_LINK_TIMEOUT_MS = 5_000;

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/124.0.0.0 Safari/537.36';

// ============================================================================
// DEFAULT FETCHER
// ============================================================================

/**
 * Create a page fetcher backed by the global `fetch`.
 * Redirects are followed; the timeout covers the whole request including body.
 */
export function createHttpPageFetcher(timeoutMs: number = DEFAULT_LINK_TIMEOUT_MS): PageFetcher {
  return async (url: string): Promise<FetchedPage> => {
    const response = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT },
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
    });
    const body = await response.text();
    return { status: response.status, body };
  };
}

// ============================================================================
// RANKING
// ============================================================================

/**
 * Evaluate a single record: normalize, optionally fetch, extract signals, score.
 * Never rejects.
 */
export async function evaluateSource(
  record: RawSourceRecord,
  options: RankOptions = {},
): Promise<RankedSource> {
  const url = normalizeUrl(record.url);
  const confidence = sanitizeConfidence(record.confidence);
  const trustedSuffixes = options.trustedSuffixes ?? DEFAULT_TRUSTED_SUFFIXES;
  const base = {
    url,
    originalUrl: record.url,
    ...(record.title !== undefined ? { title: record.title } : {}),
    ...(record.content !== undefined ? { content: record.content } : {}),
  };

  if (options.verifyLinks === false) {
    const score = scoreSource(url, confidence, NO_SIGNALS, trustedSuffixes);
    return { ...base, status: 'live', score, tier: tierForScore(score), metadata: { ...NO_SIGNALS } };
  }

  const fetchPage = options.fetchPage ?? createHttpPageFetcher();

  try {
    const page = await fetchPage(url);
    if (page.status < 200 || page.status > 299) {
      return dead(base, `Status ${page.status}`);
    }

    const metadata = parseSignals(page.body);
    const score = scoreSource(url, confidence, metadata, trustedSuffixes);
    return { ...base, status: 'live', score, tier: tierForScore(score), metadata };
  } catch (error) {
    return dead(base, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Rank records by descending score. Ties keep input order.
 */
export async function rankSources(
  records: readonly RawSourceRecord[],
  options: RankOptions = {},
): Promise<RankedSource[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const evaluated: RankedSource[] = [];

  for (let start = 0; start < records.length; start += concurrency) {
    const batch = records.slice(start, start + concurrency);
    const results = await Promise.all(batch.map((record) => evaluateSource(record, options)));
    evaluated.push(...results);
  }

  // Array.prototype.sort is stable, so equal scores keep input order
  return evaluated.sort((a, b) => b.score - a.score);
}

function dead(
  base: Pick<RankedSource, 'url' | 'originalUrl' | 'title' | 'content'>,
  error: string,
): RankedSource {
  return { ...base, status: 'dead', score: 0, tier: 'C', metadata: { ...NO_SIGNALS }, error };
}
