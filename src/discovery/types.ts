/**
 * Type definitions for the event discovery module.
 *
 * Covers source configuration, discovered candidates, scoring reports,
 * aggregator expansion results, and run statistics.
 */

import type { DiscoveryMethod, EventType } from '../shared/constants.js';

// ---------------------------------------------------------------------------
// Source configuration
// ---------------------------------------------------------------------------

/**
 * CSS selectors for sources whose listing pages wrap each event in a card.
 */
export interface SourceSelectors {
  /** Selector matching one event container */
  item: string;
  /** Selector for the link inside the container */
  link: string;
  /** Selector for the event title inside the container (defaults to the link text) */
  title?: string;
  /** Selector for a short description inside the container */
  description?: string;
}

/**
 * A discovery channel as declared in an event-type profile.
 */
export interface SourceConfig {
  /** Display name; lower-cased it becomes the candidate `source` tag */
  name: string;
  /** Root of the site, used for resolving relative links */
  baseUrl: string;
  /** Listing pages to paginate through */
  searchUrls: string[];
  /** Substrings at least one of which a candidate URL must contain (empty = no restriction) */
  urlPatterns: string[];
  /** Upper bound on pages fetched per search URL */
  maxPages: number;
  /** Prior trust in this channel, 0-1; the base of every quality score it produces */
  reliability: number;
  /** Use the channel's JSON API instead of scraping HTML */
  useApi: boolean;
  /** Query parameter carrying the page number on listing pages */
  pageParam: string;
  /** Search terms sent to an API channel, one paginated sweep per term */
  apiQueries: string[];
  /** Card selectors; generic anchor scanning is used when absent */
  selectors?: SourceSelectors;
}

/**
 * One row of the event-type bonus table applied by the quality scorer.
 */
export interface QualityBonus {
  name: string;
  /** Awarded once if the candidate text contains any of these terms */
  terms: string[];
  bonus: number;
}

export interface SearchSettings {
  enabled: boolean;
  queries: string[];
  maxResultsPerQuery: number;
  /** Restrict results to the profile's trusted domains */
  includeTrustedDomains: boolean;
}

/**
 * Everything a discovery run needs to know about one event type.
 */
export interface EventTypeProfile {
  eventType: EventType;
  /** Default budget when a run does not specify one */
  maxResults: number;
  keywords: string[];
  /** Domain -> trust score (0-1); subdomains inherit their parent's entry */
  trustedDomains: Record<string, number>;
  targetLocations: string[];
  onlineIndicators: string[];
  qualityBonuses: QualityBonus[];
  search: SearchSettings;
  sources: SourceConfig[];
}

// ---------------------------------------------------------------------------
// Candidates
// ---------------------------------------------------------------------------

/**
 * A possible event page produced by a source strategy or by expanding an
 * aggregator page.
 */
export interface Candidate {
  /** Absolute http(s) URL; the identity key for dedup */
  readonly url: string;
  /** At most 100 characters, never empty */
  readonly name: string;
  /** At most 300 characters, may be empty */
  readonly description: string;
  /** Lower-cased producing channel, `aggregator_expansion`, or the search channel name */
  readonly source: string;
  readonly discoveryMethod: DiscoveryMethod;
  /** Clamped to [0, 1] */
  readonly qualityScore: number;
  readonly searchQuery?: string;
  readonly location?: string;
}

export interface CandidateInput {
  url: string;
  name?: string;
  description?: string;
  source: string;
  discoveryMethod: DiscoveryMethod;
  qualityScore: number;
  searchQuery?: string;
  location?: string;
}

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

/**
 * An individual signal that contributed to a quality score.
 */
export interface ScoreFactor {
  /** Short identifier, e.g. "trusted-domain" */
  name: string;
  /** Contribution to the total (negative for penalties) */
  score: number;
  reason: string;
}

export interface QualityReport {
  /** Final clamped score */
  score: number;
  /** Sum before clamping; above 1 means the signals saturated */
  rawScore: number;
  factors: ScoreFactor[];
}

// ---------------------------------------------------------------------------
// Link extraction and aggregator expansion
// ---------------------------------------------------------------------------

export interface ScoredLink {
  url: string;
  /** Link quality score in [0, 1] */
  score: number;
  /** Anchor text, empty for URLs found in plain text */
  text: string;
}

/**
 * One URL coming out of a batch expansion. `aggregatorUrl` is set when the
 * URL was found on an aggregator page and is null when the input URL passed
 * through unchanged (not an aggregator, or expansion fell back).
 */
export interface ExpandedUrl {
  url: string;
  text: string;
  linkScore: number;
  aggregatorUrl: string | null;
}

export interface ExpansionBatchResult {
  urls: ExpandedUrl[];
  /** Aggregators that produced at least one link */
  expanded: number;
  /** Aggregators that produced nothing and fell back to themselves */
  failed: number;
}

// ---------------------------------------------------------------------------
// Content fetching
// ---------------------------------------------------------------------------

export type HeaderProfile = 'browser' | 'minimal' | 'json';

export interface FetchOptions {
  headers?: HeaderProfile;
  timeoutMs?: number;
  searchParams?: Record<string, string | number>;
  /** Extra headers merged over the profile */
  extraHeaders?: Record<string, string>;
}

export type FetchResult<T = string> =
  | { success: true; content: T; statusCode: number }
  | { success: false; error: string; statusCode?: number };

/**
 * Collaborator that reads a URL. Implementations own their timeout and
 * retry policy and never throw.
 */
export interface ContentFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>;
  fetchJson(url: string, options?: FetchOptions): Promise<FetchResult<unknown>>;
}

// ---------------------------------------------------------------------------
// Keyword search
// ---------------------------------------------------------------------------

export interface SearchHit {
  title: string;
  url: string;
  content: string;
}

export interface SearchOptions {
  maxResults: number;
  includeDomains: string[];
}

export interface SearchClient {
  /** Channel name used as the candidate `source` tag */
  readonly name: string;
  search(query: string, options: SearchOptions): Promise<SearchHit[]>;
}

// ---------------------------------------------------------------------------
// Run results
// ---------------------------------------------------------------------------

export interface SourceStats {
  source: string;
  found: number;
  failed: boolean;
  error?: string;
}

export interface DiscoveryStats {
  runId: string;
  eventType: EventType;
  maxResults: number;
  /** Raw candidates gathered before dedup (after expansion) */
  totalFound: number;
  uniqueCount: number;
  finalCount: number;
  perSource: SourceStats[];
  searchQueriesIssued: number;
  aggregatorsExpanded: number;
  aggregatorsFailed: number;
  durationMs: number;
}

export interface DiscoveryResult {
  candidates: Candidate[];
  stats: DiscoveryStats;
}
