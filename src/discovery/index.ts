/**
 * Discovery module public API.
 *
 * Re-exports the orchestrator, its building blocks (classification,
 * link extraction, aggregator expansion, scoring, dedup/rank) and the
 * source strategies.
 */

// Types
export type {
  SourceSelectors,
  SourceConfig,
  QualityBonus,
  SearchSettings,
  EventTypeProfile,
  Candidate,
  CandidateInput,
  ScoreFactor,
  QualityReport,
  ScoredLink,
  ExpandedUrl,
  ExpansionBatchResult,
  HeaderProfile,
  FetchOptions,
  FetchResult,
  ContentFetcher,
  SearchHit,
  SearchOptions,
  SearchClient,
  SourceStats,
  DiscoveryStats,
  DiscoveryResult,
} from './types.js';

// Pipeline
export { DiscoveryOrchestrator } from './orchestrator.js';
export type { OrchestratorDependencies } from './orchestrator.js';
export { AggregatorExpander } from './aggregator-expander.js';
export type { AggregatorExpanderOptions } from './aggregator-expander.js';
export { HttpContentFetcher } from './content-fetcher.js';
export type { HttpContentFetcherOptions } from './content-fetcher.js';

// Building blocks
export { UrlClassifier, eventYearTokens, isAggregator, isSkippedUrl, looksLikeEventLink } from './url-classifier.js';
export { LinkExtractor, TEXT_URL_SCORE, resolveUrl } from './link-extractor.js';
export type { AnchorContext } from './link-extractor.js';
export { DomainReputation, REPUTATION_THRESHOLD } from './domain-reputation.js';
export { QualityScorer } from './quality-scorer.js';
export { LocationFilter, LOCATION_POLICIES } from './location-filter.js';
export type { LocationPolicy, LocationVerdict } from './location-filter.js';
export { createCandidate, fallbackName, cleanName } from './candidate.js';
export {
  hasValidUrl,
  dedupeCandidates,
  rankCandidates,
  dedupeAndRank,
  truncateToBudget,
} from './deduplicator.js';

// Source strategies
export * from './sources/index.js';
