/**
 * Hybrid credibility score.
 *
 * The provider confidence is the base (0–100 points); page signals and domain
 * authority add fixed bonuses. Result is clamped to [0, 100].
 */

import { hostOf } from './normalize.ts';
import type { CredibilitySignals, CredibilityTier } from './types.ts';

export const AUTHOR_BONUS = 10;
export const DATE_BONUS = 5;
export const TRUSTED_DOMAIN_BONUS = 15;

export const DEFAULT_TRUSTED_SUFFIXES: readonly string[] = ['.edu', '.gov'];

/** Confidence used when the provider does not report one. */
export const DEFAULT_CONFIDENCE = 0.5;

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

/**
 * Score a live source. Deterministic for identical inputs.
 *
 * @param url - Normalized source URL (only the host is consulted)
 * @param confidence - Provider confidence in [0, 1]
 */
export function scoreSource(
  url: string,
  confidence: number,
  signals: CredibilitySignals,
  trustedSuffixes: readonly string[] = DEFAULT_TRUSTED_SUFFIXES,
): number {
  let score = confidence * 100;

  if (signals.author) score += AUTHOR_BONUS;
  if (signals.date) score += DATE_BONUS;
  if (isTrustedHost(hostOf(url), trustedSuffixes)) score += TRUSTED_DOMAIN_BONUS;

  return clampScore(score);
}

/** Bucket a live source's score. Dead sources never reach this; they are always C. */
export function tierForScore(score: number): Exclude<CredibilityTier, 'C'> {
  if (score >= 80) return 'S';
  if (score >= 60) return 'A';
  return 'B';
}

export function isTrustedHost(host: string, trustedSuffixes: readonly string[]): boolean {
  if (!host) return false;
  return trustedSuffixes.some((suffix) => host.endsWith(suffix.toLowerCase()));
}

/** Coerce provider confidence into [0, 1]; non-numeric values get the default. */
export function sanitizeConfidence(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return DEFAULT_CONFIDENCE;
  return Math.min(1, Math.max(0, value));
}

function clampScore(score: number): number {
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, score));
}
