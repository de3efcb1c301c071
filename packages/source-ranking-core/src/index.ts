/**
 * Source Ranking Core
 *
 * Channel-independent credibility scoring and ranking for research sources.
 */

export type {
  CredibilitySignals,
  CredibilityTier,
  FetchedPage,
  PageFetcher,
  RankOptions,
  RankedSource,
  RawSourceRecord,
  SourceStatus,
} from './types.ts';
export { NO_SIGNALS } from './types.ts';

export { normalizeUrl, hostOf, matchesDomain } from './normalize.ts';
export { extractSignals, parseSignals } from './signals.ts';
export {
  scoreSource,
  tierForScore,
  isTrustedHost,
  sanitizeConfidence,
  AUTHOR_BONUS,
  DATE_BONUS,
  TRUSTED_DOMAIN_BONUS,
  DEFAULT_CONFIDENCE,
  DEFAULT_TRUSTED_SUFFIXES,
} from './scoring.ts';
export { rankSources, evaluateSource, createHttpPageFetcher, DEFAULT_LINK_TIMEOUT_MS } from './ranker.ts';
