/**
 * Source Ranking Types
 *
 * Shapes shared by the ranker and its consumers. Raw records come straight
 * from a web lookup tool; ranked records carry derived score/tier values that
 * are recomputed on every ranking call.
 */

// ============================================================================
// INPUT
// ============================================================================

/** Candidate source as returned by a web lookup, before ranking. */
export interface RawSourceRecord {
  /** URL as reported by the search provider (may carry tracking params). */
  url: string;
  /** Provider confidence in [0, 1]. */
  confidence: number;
  title?: string;
  /** Snippet or extracted page content from the provider. */
  content?: string;
}

// ============================================================================
// SIGNALS
// ============================================================================

/** Lightweight credibility signals extracted from a fetched page. */
export interface CredibilitySignals {
  author?: string;
  /** Publication date as written on the page (not parsed). */
  date?: string;
  hasReferences: boolean;
}

export const NO_SIGNALS: Readonly<CredibilitySignals> = Object.freeze({
  hasReferences: false,
});

// ============================================================================
// OUTPUT
// ============================================================================

export type SourceStatus = 'live' | 'dead';

/** Coarse credibility bucket. C is reserved for unreachable sources. */
export type CredibilityTier = 'S' | 'A' | 'B' | 'C';

export interface RankedSource {
  /** Normalized URL (no query string, no fragment). */
  url: string;
  originalUrl: string;
  status: SourceStatus;
  /** Score in [0, 100]. Always 0 for dead sources. */
  score: number;
  tier: CredibilityTier;
  metadata: CredibilitySignals;
  title?: string;
  content?: string;
  /** Why the source was marked dead, when it was. */
  error?: string;
}

// ============================================================================
// PAGE FETCHING — injected so ranking stays network-independent in tests
// ============================================================================

export interface FetchedPage {
  /** HTTP status code. */
  status: number;
  /** Response body as text. */
  body: string;
}

/** Fetches a page. May reject on network failure; the ranker catches it per record. */
export type PageFetcher = (url: string) => Promise<FetchedPage>;

export interface RankOptions {
  /** Page fetcher. Defaults to a global-fetch based fetcher with a timeout. */
  fetchPage?: PageFetcher;
  /** When false, sources are not fetched: status is live and no signals are extracted. Default: true. */
  verifyLinks?: boolean;
  /** Host suffixes that earn the domain-authority bonus. Default: ['.edu', '.gov']. */
  trustedSuffixes?: readonly string[];
  /** Max records evaluated at once. Default: 1 (sequential). */
  concurrency?: number;
}
