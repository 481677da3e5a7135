export type {
  EventRecord,
  StructuredExtractor,
  EnrichmentDependencies,
  EnrichmentOptions,
  EnrichmentResult,
} from './types.js';
export { HeuristicExtractor, extractDates } from './heuristic-extractor.js';
export type { HeuristicExtractorOptions } from './heuristic-extractor.js';
export { enrichCandidates, fallbackRecord } from './enricher.js';
