/**
 * Source registry - factory for source strategies.
 *
 * Dispatches on the source's `useApi` flag: API sources get the strategy
 * registered under their lower-cased name, everything else (and API
 * sources with no registered strategy) uses generic HTML scraping.
 */

import { getLogger } from '../../shared/logger.js';
import type { SourceConfig } from '../types.js';
import { DevpostApiStrategy } from './devpost-api.js';
import { SiteScrapeStrategy } from './site-scrape.js';
import type { SourceStrategy, StrategyContext } from './strategy.js';

const log = getLogger('discovery', { component: 'source-registry' });

/** Map of source names to API strategy classes. */
const API_STRATEGIES: Record<string, new (ctx: StrategyContext) => SourceStrategy> = {
  devpost: DevpostApiStrategy,
};

/**
 * Create the strategy for one configured source.
 */
export function createSourceStrategy(source: SourceConfig, ctx: StrategyContext): SourceStrategy {
  if (source.useApi) {
    const ApiStrategy = API_STRATEGIES[source.name.toLowerCase()];
    if (ApiStrategy) {
      log.debug({ source: source.name }, 'Using API strategy');
      return new ApiStrategy(ctx);
    }
    log.warn({ source: source.name }, 'No API strategy registered, scraping instead');
  }

  log.debug({ source: source.name }, 'Using HTML scraping strategy');
  return new SiteScrapeStrategy(ctx);
}

/**
 * Names of sources that have a dedicated API strategy.
 */
export function getApiStrategyNames(): string[] {
  return Object.keys(API_STRATEGIES);
}

export { SiteScrapeStrategy, buildPageUrl } from './site-scrape.js';
export { DevpostApiStrategy, DEVPOST_API_URL, unwrapDevpostPayload } from './devpost-api.js';
export { KeywordSearchStrategy, SEARCH_RELIABILITY } from './keyword-search.js';
export type { CandidateSink, SearchRunResult } from './keyword-search.js';
export { TavilySearchClient } from './tavily-client.js';
export { extractPageCandidates, isRelevantLink } from './html-candidates.js';
export type { SourceStrategy, StrategyContext } from './strategy.js';
