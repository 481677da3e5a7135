import { DEFAULT_LIMITS } from '../shared/constants.js';
import {
  clamp,
  collapseWhitespace,
  extractDomain,
  humanizeSlug,
  truncate,
} from '../shared/utils.js';
import type { Candidate, CandidateInput } from './types.js';

/**
 * Derives a readable name from the last meaningful path segment of a URL,
 * falling back to the domain.
 * Example: "https://example.com/events/ai-summit-2025/" -> "Ai Summit 2025"
 */
export function fallbackName(url: string): string {
  if (URL.canParse(url)) {
    const segments = new URL(url).pathname
      .split('/')
      .map((segment) => segment.replace(/%[0-9a-f]{2}/gi, ' '))
      .filter((segment) => segment.trim().length > 0 && !/^\d+$/.test(segment));
    const last = segments[segments.length - 1];
    const humanized = last ? humanizeSlug(last) : '';
    if (humanized.length > 0) {
      return humanized;
    }
  }
  return `Event at ${extractDomain(url)}`;
}

/** Collapses whitespace and bounds the length of a display name. */
export function cleanName(raw: string): string {
  return truncate(collapseWhitespace(raw), DEFAULT_LIMITS.NAME_MAX_LENGTH);
}

/**
 * Builds a candidate with its display fields bounded and its score clamped.
 * Never returns an empty name.
 */
export function createCandidate(input: CandidateInput): Candidate {
  const url = input.url.trim();
  const name = cleanName(input.name ?? '');
  const description = truncate(
    collapseWhitespace(input.description ?? ''),
    DEFAULT_LIMITS.DESCRIPTION_MAX_LENGTH,
  );

  return {
    url,
    name: name.length > 0 ? name : cleanName(fallbackName(url)),
    description,
    source: input.source.toLowerCase(),
    discoveryMethod: input.discoveryMethod,
    qualityScore: clamp(input.qualityScore),
    ...(input.searchQuery !== undefined ? { searchQuery: input.searchQuery } : {}),
    ...(input.location !== undefined ? { location: input.location } : {}),
  };
}
