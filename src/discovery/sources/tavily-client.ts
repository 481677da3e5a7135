/**
 * Tavily web-search client.
 */

import got, { type Got } from 'got';
import { z } from 'zod';
import { getLogger } from '../../shared/logger.js';
import { DiscoveryError, errorMessage } from '../../shared/errors.js';
import { DEFAULT_LIMITS } from '../../shared/constants.js';
import type { SearchClient, SearchHit, SearchOptions } from '../types.js';

const log = getLogger('http', { component: 'tavily' });

export const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(''),
        url: z.string(),
        content: z.string().default(''),
      }),
    )
    .default([]),
});

export class TavilySearchClient implements SearchClient {
  readonly name = 'tavily';
  private readonly client: Got;
  private readonly apiKey: string;

  constructor(apiKey: string, timeoutMs: number = DEFAULT_LIMITS.HTTP_TIMEOUT_MS) {
    this.apiKey = apiKey;
    this.client = got.extend({
      timeout: { request: timeoutMs },
      retry: { limit: 1, methods: ['POST'] },
    });
  }

  /**
   * @throws DiscoveryError on transport failure or an unexpected response
   */
  async search(query: string, options: SearchOptions): Promise<SearchHit[]> {
    let body: unknown;
    try {
      body = await this.client
        .post(TAVILY_SEARCH_URL, {
          headers: { Authorization: `Bearer ${this.apiKey}` },
          json: {
            query,
            search_depth: 'basic',
            max_results: options.maxResults,
            ...(options.includeDomains.length > 0 ? { include_domains: options.includeDomains } : {}),
          },
        })
        .json<unknown>();
    } catch (error) {
      throw new DiscoveryError(`Tavily search failed: ${errorMessage(error)}`, 'SEARCH_FAILED', this.name);
    }

    const parsed = TavilyResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DiscoveryError('Unexpected Tavily response shape', 'SEARCH_PAYLOAD_INVALID', this.name);
    }

    log.debug({ query, results: parsed.data.results.length }, 'Tavily search complete');
    return parsed.data.results;
  }
}
