import type { DiscoveryDelays } from '../../shared/timing.js';
import type { LocationFilter } from '../location-filter.js';
import type { QualityScorer } from '../quality-scorer.js';
import type { UrlClassifier } from '../url-classifier.js';
import type {
  Candidate,
  ContentFetcher,
  EventTypeProfile,
  SourceConfig,
} from '../types.js';

/**
 * Collaborators shared by every strategy of one discovery run.
 */
export interface StrategyContext {
  profile: EventTypeProfile;
  fetcher: ContentFetcher;
  scorer: QualityScorer;
  classifier: UrlClassifier;
  locationFilter: LocationFilter;
  delays: DiscoveryDelays;
}

/**
 * Interface all source strategies implement: given a source declaration,
 * produce scored candidates from that one channel. Strategies paginate up
 * to `source.maxPages` and stop early on a page with nothing new.
 */
export interface SourceStrategy {
  readonly name: string;
  discover(source: SourceConfig): Promise<Candidate[]>;
}
