/**
 * Final-stage dedup and ranking.
 *
 * Dedup keys on the lower-cased URL without trailing slashes and keeps the
 * first occurrence; ranking is a stable sort by quality score. Applying
 * `dedupeAndRank` to its own output returns the same list.
 */

import { DEFAULT_LIMITS } from '../shared/constants.js';
import { dedupKey, isHttpUrl } from '../shared/utils.js';
import type { Candidate } from './types.js';

/** Final-result URL invariant: http(s) scheme and at least 10 characters. */
export function hasValidUrl(candidate: Candidate): boolean {
  return (
    candidate.url.length >= DEFAULT_LIMITS.MIN_URL_LENGTH &&
    isHttpUrl(candidate.url.toLowerCase())
  );
}

/** Keeps the first candidate per dedup key, preserving input order. */
export function dedupeCandidates(candidates: readonly Candidate[]): Candidate[] {
  const seen = new Set<string>();
  const unique: Candidate[] = [];
  for (const candidate of candidates) {
    const key = dedupKey(candidate.url);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(candidate);
  }
  return unique;
}

/** Stable sort by quality score, highest first. Does not mutate the input. */
export function rankCandidates(candidates: readonly Candidate[]): Candidate[] {
  return [...candidates].sort((a, b) => b.qualityScore - a.qualityScore);
}

export function dedupeAndRank(candidates: readonly Candidate[]): Candidate[] {
  return rankCandidates(dedupeCandidates(candidates.filter(hasValidUrl)));
}

/** Prefix of the ranked list; a non-positive budget yields an empty list. */
export function truncateToBudget(candidates: readonly Candidate[], maxResults: number): Candidate[] {
  return candidates.slice(0, Math.max(0, Math.floor(maxResults)));
}
