/**
 * Devpost hackathon listing API.
 *
 * Pages through `https://devpost.com/api/hackathons` once per configured
 * search term and maps the JSON straight into candidates. Any failure
 * before the first hackathon is collected falls back to scraping the
 * source's HTML listing instead.
 */

import { z } from 'zod';
import { getLogger } from '../../shared/logger.js';
import { DiscoveryError, errorMessage } from '../../shared/errors.js';
import { sleep } from '../../shared/timing.js';
import { DISCOVERY_METHODS } from '../../shared/constants.js';
import { dedupKey, isHttpUrl } from '../../shared/utils.js';
import { createCandidate } from '../candidate.js';
import { SiteScrapeStrategy } from './site-scrape.js';
import type { Candidate, SourceConfig } from '../types.js';
import type { SourceStrategy, StrategyContext } from './strategy.js';

const log = getLogger('discovery', { component: 'devpost-api' });

export const DEVPOST_API_URL = 'https://devpost.com/api/hackathons';
const DEVPOST_ORIGIN = 'https://devpost.com';
const PER_PAGE = 20;
/** Base score of API listings before the quality bonuses. */
const API_RELIABILITY = 0.9;
const HTTP_TOO_MANY_REQUESTS = 429;

// ---------------------------------------------------------------------------
// Payload
// ---------------------------------------------------------------------------

const DevpostHackathonSchema = z.object({
  title: z.string().default(''),
  url: z.string().default(''),
  submission_deadline: z.string().nullish(),
  submission_period_dates: z.string().nullish(),
  location: z.string().nullish(),
  displayed_location: z.object({ location: z.string().nullish() }).nullish(),
  online: z.boolean().nullish(),
  open_state: z.string().nullish(),
});

export type DevpostHackathon = z.infer<typeof DevpostHackathonSchema>;

const DevpostPayloadSchema = z.union([
  z.object({ hackathons: z.array(z.unknown()) }),
  z.array(z.unknown()),
  z.object({ data: z.array(z.unknown()) }),
]);

/**
 * Pulls the item list out of any of the payload shapes the API has used:
 * `{ hackathons: [] }`, a bare array, or `{ data: [] }`.
 *
 * @throws DiscoveryError when the payload matches none of them
 */
export function unwrapDevpostPayload(payload: unknown): unknown[] {
  const parsed = DevpostPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new DiscoveryError('Unexpected Devpost payload shape', 'API_PAYLOAD_INVALID', 'devpost');
  }
  const data = parsed.data;
  if (Array.isArray(data)) {
    return data;
  }
  return 'hackathons' in data ? data.hackathons : data.data;
}

class RateLimitedError extends DiscoveryError {
  constructor() {
    super('Devpost API rate limit reached', 'API_RATE_LIMITED', 'devpost', HTTP_TOO_MANY_REQUESTS);
  }
}

// ---------------------------------------------------------------------------
// Strategy
// ---------------------------------------------------------------------------

export class DevpostApiStrategy implements SourceStrategy {
  readonly name = 'devpost-api';
  private readonly ctx: StrategyContext;
  private readonly fallback: SourceStrategy;

  constructor(ctx: StrategyContext, fallback: SourceStrategy = new SiteScrapeStrategy(ctx)) {
    this.ctx = ctx;
    this.fallback = fallback;
  }

  async discover(source: SourceConfig): Promise<Candidate[]> {
    try {
      return await this.fetchFromApi(source);
    } catch (error) {
      log.warn(
        { source: source.name, error: errorMessage(error) },
        'Devpost API failed, falling back to HTML scraping',
      );
      return this.fallback.discover(source);
    }
  }

  /**
   * Maps one API item to a candidate, or null when it is incomplete or
   * outside the location policy.
   */
  toCandidate(item: DevpostHackathon, source: SourceConfig): Candidate | null {
    const title = item.title.trim();
    let url = item.url.trim();
    if (!title || !url) {
      return null;
    }
    if (!isHttpUrl(url)) {
      url = `${DEVPOST_ORIGIN}${url.startsWith('/') ? '' : '/'}${url}`;
    }

    const location = (item.location ?? item.displayed_location?.location ?? '').trim();
    const flaggedOnline = item.online === true || this.ctx.locationFilter.isOnline(title);
    const verdict = this.ctx.locationFilter.classifyField(location, flaggedOnline);
    if (verdict === 'excluded') {
      log.debug({ title, location }, 'Hackathon outside target locations');
      return null;
    }

    const deadline = item.submission_deadline ?? item.submission_period_dates ?? 'TBD';
    const description = `Deadline: ${deadline}`;
    const isOnline = verdict === 'online' || (verdict === 'unknown' && location.length === 0);

    return createCandidate({
      url,
      name: title,
      description,
      source: source.name,
      discoveryMethod: DISCOVERY_METHODS.API,
      qualityScore: this.ctx.scorer.score(url, `${title} ${description} ${location}`, API_RELIABILITY),
      location: location.length > 0 ? location : isOnline ? 'Online' : undefined,
    });
  }

  private async fetchFromApi(source: SourceConfig): Promise<Candidate[]> {
    const candidates: Candidate[] = [];
    const seen = new Set<string>();
    let requests = 0;

    queries: for (const query of source.apiQueries) {
      for (let page = 1; page <= source.maxPages; page++) {
        if (requests > 0) {
          await sleep(this.ctx.delays.pageMs);
        }
        requests++;

        let items: unknown[];
        try {
          items = await this.fetchApiPage(query, page);
        } catch (error) {
          if (candidates.length === 0) {
            throw error;
          }
          if (error instanceof RateLimitedError) {
            log.warn({ query, page }, 'Devpost rate limit hit, stopping API paging');
            await sleep(this.ctx.delays.rateLimitedMs);
            break queries;
          }
          log.warn({ query, page, error: errorMessage(error) }, 'Devpost page failed, moving to next query');
          break;
        }

        if (items.length === 0) {
          log.debug({ query, page }, 'No more hackathons for query');
          break;
        }

        let added = 0;
        for (const raw of items) {
          const parsed = DevpostHackathonSchema.safeParse(raw);
          if (!parsed.success) {
            log.debug({ query, page }, 'Skipping malformed hackathon item');
            continue;
          }
          const candidate = this.toCandidate(parsed.data, source);
          if (!candidate || seen.has(dedupKey(candidate.url))) {
            continue;
          }
          seen.add(dedupKey(candidate.url));
          candidates.push(candidate);
          added++;
        }

        log.info({ query, page, items: items.length, added, total: candidates.length }, 'Devpost page processed');
      }
    }

    return candidates;
  }

  private async fetchApiPage(query: string, page: number): Promise<unknown[]> {
    const result = await this.ctx.fetcher.fetchJson(DEVPOST_API_URL, {
      headers: 'json',
      searchParams: {
        'search': query,
        'page': page,
        'per_page': PER_PAGE,
        'status[]': 'open',
      },
      extraHeaders: { Referer: `${DEVPOST_ORIGIN}/hackathons` },
    });

    if (!result.success) {
      if (result.statusCode === HTTP_TOO_MANY_REQUESTS) {
        throw new RateLimitedError();
      }
      throw new DiscoveryError(
        `Devpost API request failed: ${result.error}`,
        'API_FETCH_FAILED',
        'devpost',
        result.statusCode ?? 502,
      );
    }
    return unwrapDevpostPayload(result.content);
  }
}
