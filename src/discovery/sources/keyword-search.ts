/**
 * Keyword search strategy.
 *
 * Issues the profile's search queries one at a time against a
 * credit-limited search API and stops as soon as the run's budget is full,
 * checking both between queries and between the hits of one query.
 */

import { getLogger } from '../../shared/logger.js';
import { errorMessage } from '../../shared/errors.js';
import { sleep } from '../../shared/timing.js';
import { DISCOVERY_METHODS } from '../../shared/constants.js';
import { containsAny, isHttpUrl } from '../../shared/utils.js';
import { createCandidate } from '../candidate.js';
import type { Candidate, SearchClient, SearchHit } from '../types.js';
import type { StrategyContext } from './strategy.js';

const log = getLogger('discovery', { component: 'keyword-search' });

/** Base score of search hits before trusted-domain and content signals. */
export const SEARCH_RELIABILITY = 0.6;

/**
 * Run-wide budget view handed to the search strategy.
 */
export interface CandidateSink {
  /** True once the run holds as many unique candidates as it needs */
  isFull(): boolean;
  /** Returns true if the candidate was new to the run */
  offer(candidate: Candidate): boolean;
}

export interface SearchRunResult {
  queriesIssued: number;
  accepted: number;
}

export class KeywordSearchStrategy {
  readonly name = 'keyword-search';
  private readonly ctx: StrategyContext;
  private readonly client: SearchClient;

  constructor(ctx: StrategyContext, client: SearchClient) {
    this.ctx = ctx;
    this.client = client;
  }

  /**
   * Maps one search hit to a candidate, or null when it mentions no event
   * keyword or falls outside the location policy.
   */
  toCandidate(hit: SearchHit, query: string): Candidate | null {
    const url = hit.url.trim();
    const text = `${hit.title} ${hit.content}`;
    if (!isHttpUrl(url.toLowerCase()) || !containsAny(text, this.ctx.profile.keywords)) {
      return null;
    }

    const verdict = this.ctx.locationFilter.classify(text);
    if (verdict === 'excluded') {
      log.debug({ url, query }, 'Search hit outside target locations');
      return null;
    }

    const location = verdict === 'target'
      ? this.ctx.locationFilter.matchedLocation(text)
      : verdict === 'online' ? 'Online' : undefined;

    return createCandidate({
      url,
      name: hit.title,
      description: hit.content,
      source: this.client.name,
      discoveryMethod: DISCOVERY_METHODS.SEARCH,
      qualityScore: this.ctx.scorer.score(url, text, SEARCH_RELIABILITY),
      searchQuery: query,
      location,
    });
  }

  async run(sink: CandidateSink): Promise<SearchRunResult> {
    const { search, trustedDomains } = this.ctx.profile;
    const includeDomains = search.includeTrustedDomains ? Object.keys(trustedDomains) : [];
    let queriesIssued = 0;
    let accepted = 0;

    for (const query of search.queries) {
      if (sink.isFull()) {
        log.info({ queriesIssued, remaining: search.queries.length - queriesIssued }, 'Budget reached, skipping remaining queries');
        break;
      }

      try {
        queriesIssued++;
        const hits = await this.client.search(query, {
          maxResults: search.maxResultsPerQuery,
          includeDomains,
        });

        let fromQuery = 0;
        for (const hit of hits) {
          if (sink.isFull()) {
            break;
          }
          const candidate = this.toCandidate(hit, query);
          if (candidate && sink.offer(candidate)) {
            fromQuery++;
          }
        }
        accepted += fromQuery;
        log.info({ query, hits: hits.length, accepted: fromQuery }, 'Search query processed');
      } catch (error) {
        log.error({ query, error: errorMessage(error) }, 'Search query failed');
      } finally {
        await sleep(this.ctx.delays.queryMs);
      }
    }

    return { queriesIssued, accepted };
  }
}
