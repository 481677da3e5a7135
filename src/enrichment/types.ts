import type { EventType } from '../shared/constants.js';
import type { Candidate, ContentFetcher } from '../discovery/types.js';

/**
 * A candidate enriched with fields read from its own page.
 * Dates are YYYY-MM-DD strings; null when the page did not state them.
 */
export interface EventRecord {
  url: string;
  name: string;
  eventType: EventType;
  description: string;
  startDate: string | null;
  endDate: string | null;
  location: string | null;
  isOnline: boolean;
  themes: string[];
  source: string;
  discoveryMethod: Candidate['discoveryMethod'];
  qualityScore: number;
  /** False when the record was built from the candidate alone */
  enriched: boolean;
}

/**
 * Turns page content into a structured record. A language-model backed
 * implementation plugs in here; the heuristic one ships by default.
 */
export interface StructuredExtractor {
  readonly name: string;
  extract(content: string, url: string, candidate: Candidate): Promise<EventRecord>;
}

export interface EnrichmentDependencies {
  fetcher: ContentFetcher;
  extractor: StructuredExtractor;
  eventType: EventType;
}

export interface EnrichmentOptions {
  batchSize?: number;
  concurrency?: number;
}

export interface EnrichmentResult {
  records: EventRecord[];
  /** Records built from the candidate alone after a fetch or extract failure */
  fallbacks: number;
}
