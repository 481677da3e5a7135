/**
 * Generic HTML scraping strategy.
 *
 * Walks every search URL of a source page by page (`?page=N` style),
 * extracting candidates from each listing. Paging stops at `maxPages`, on
 * a failed fetch, or on a page that adds nothing new.
 */

import { getLogger } from '../../shared/logger.js';
import { DiscoveryError } from '../../shared/errors.js';
import { sleep } from '../../shared/timing.js';
import { dedupKey } from '../../shared/utils.js';
import { extractPageCandidates } from './html-candidates.js';
import type { Candidate, SourceConfig } from '../types.js';
import type { SourceStrategy, StrategyContext } from './strategy.js';

const log = getLogger('discovery', { component: 'site-scrape' });

/**
 * URL of page `page` of a listing. Page 1 is the search URL itself.
 */
export function buildPageUrl(searchUrl: string, page: number, pageParam: string): string {
  if (page <= 1) {
    return searchUrl;
  }
  const parsed = new URL(searchUrl);
  parsed.searchParams.set(pageParam, String(page));
  return parsed.toString();
}

export class SiteScrapeStrategy implements SourceStrategy {
  readonly name = 'site-scrape';
  private readonly ctx: StrategyContext;

  constructor(ctx: StrategyContext) {
    this.ctx = ctx;
  }

  /**
   * Fetch one listing page and extract its candidates.
   *
   * @throws DiscoveryError when the page cannot be fetched
   */
  async fetchPage(source: SourceConfig, searchUrl: string, page: number): Promise<Candidate[]> {
    const pageUrl = buildPageUrl(searchUrl, page, source.pageParam);
    const result = await this.ctx.fetcher.fetch(pageUrl, { headers: 'browser' });
    if (!result.success) {
      throw new DiscoveryError(
        `Failed to fetch ${pageUrl}: ${result.error}`,
        'PAGE_FETCH_FAILED',
        source.name,
        result.statusCode ?? 502,
      );
    }
    return extractPageCandidates(result.content, pageUrl, source, this.ctx);
  }

  /**
   * Scrape every search URL of `source`.
   *
   * @throws DiscoveryError if not a single page could be fetched
   */
  async discover(source: SourceConfig): Promise<Candidate[]> {
    const candidates: Candidate[] = [];
    const seen = new Set<string>();
    let pagesFetched = 0;
    let requests = 0;
    let lastError: DiscoveryError | undefined;

    for (const searchUrl of source.searchUrls) {
      for (let page = 1; page <= source.maxPages; page++) {
        if (requests > 0) {
          await sleep(this.ctx.delays.pageMs);
        }
        requests++;

        let found: Candidate[];
        try {
          found = await this.fetchPage(source, searchUrl, page);
          pagesFetched++;
        } catch (error) {
          lastError = error instanceof DiscoveryError
            ? error
            : new DiscoveryError(String(error), 'PAGE_FETCH_FAILED', source.name);
          log.warn({ source: source.name, searchUrl, page, error: lastError.message }, 'Stopping pagination after failed page');
          break;
        }

        const fresh = found.filter((candidate) => !seen.has(dedupKey(candidate.url)));
        for (const candidate of fresh) {
          seen.add(dedupKey(candidate.url));
          candidates.push(candidate);
        }

        log.info(
          { source: source.name, searchUrl, page, found: found.length, fresh: fresh.length, total: candidates.length },
          'Page scraped',
        );

        if (fresh.length === 0) {
          break;
        }
      }
    }

    if (pagesFetched === 0 && lastError) {
      throw lastError;
    }
    return candidates;
  }
}
