/**
 * Aggregator page expansion.
 *
 * Fetches a list/blog/calendar page, extracts the event links on it and
 * keeps those whose domain is reputable enough to follow. Expansion never
 * throws: a page that cannot be fetched or parsed expands to nothing, and
 * the batch form falls back to the aggregator URL itself.
 */

import { getLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { sleep } from '../shared/timing.js';
import { DEFAULT_LIMITS } from '../shared/constants.js';
import { dedupKey } from '../shared/utils.js';
import { UrlClassifier } from './url-classifier.js';
import { LinkExtractor } from './link-extractor.js';
import { DomainReputation, REPUTATION_THRESHOLD } from './domain-reputation.js';
import type {
  ContentFetcher,
  ExpandedUrl,
  ExpansionBatchResult,
  FetchResult,
  ScoredLink,
} from './types.js';

const log = getLogger('discovery', { component: 'aggregator-expander' });

export interface AggregatorExpanderOptions {
  fetcher: ContentFetcher;
  classifier?: UrlClassifier;
  extractor?: LinkExtractor;
  reputation?: DomainReputation;
  /** Pause before each aggregator fetch. Default: 1s */
  delayMs?: number;
  /** Timeout of the primary (full headers) fetch. Default: 30s */
  timeoutMs?: number;
  /** Timeout of the fallback (minimal headers) fetch. Default: 10s */
  fallbackTimeoutMs?: number;
  /** Minimum domain reputation for a link to be kept. Default: 0.3 */
  reputationThreshold?: number;
}

export class AggregatorExpander {
  private readonly fetcher: ContentFetcher;
  private readonly classifier: UrlClassifier;
  private readonly extractor: LinkExtractor;
  private readonly reputation: DomainReputation;
  private readonly delayMs: number;
  private readonly timeoutMs: number;
  private readonly fallbackTimeoutMs: number;
  private readonly reputationThreshold: number;

  constructor(options: AggregatorExpanderOptions) {
    this.fetcher = options.fetcher;
    this.classifier = options.classifier ?? new UrlClassifier();
    this.extractor = options.extractor ?? new LinkExtractor(this.classifier);
    this.reputation = options.reputation ?? new DomainReputation();
    this.delayMs = options.delayMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LIMITS.EXPANSION_TIMEOUT_MS;
    this.fallbackTimeoutMs = options.fallbackTimeoutMs ?? DEFAULT_LIMITS.FALLBACK_TIMEOUT_MS;
    this.reputationThreshold = options.reputationThreshold ?? REPUTATION_THRESHOLD;
  }

  isAggregator(url: string): boolean {
    return this.classifier.isAggregator(url);
  }

  /**
   * Expands one aggregator page into its event links, highest link score
   * first. Returns an empty list on any failure.
   */
  async expand(url: string): Promise<ScoredLink[]> {
    try {
      await sleep(this.delayMs);

      const page = await this.fetchWithFallback(url);
      if (!page.success) {
        log.warn({ url, error: page.error }, 'Aggregator fetch failed with both header sets');
        return [];
      }

      const selfKey = dedupKey(withoutFragment(url));
      const extracted = this.extractor
        .extract(page.content, url)
        .filter((link) => dedupKey(link.url) !== selfKey);

      const kept = extracted.filter((link) =>
        this.reputation.passes(link.url, this.reputationThreshold),
      );

      log.info(
        { url, extracted: extracted.length, kept: kept.length, filtered: extracted.length - kept.length },
        'Expanded aggregator page',
      );
      return kept;
    } catch (error) {
      log.error({ url, error: errorMessage(error) }, 'Aggregator expansion failed');
      return [];
    }
  }

  /**
   * Expands every aggregator in `urls` and passes the rest through.
   * An aggregator that yields nothing is replaced by itself. Output is
   * deduplicated by URL in first-seen order across the whole batch.
   */
  async expandMany(urls: readonly string[]): Promise<ExpansionBatchResult> {
    const collected: ExpandedUrl[] = [];
    let expanded = 0;
    let failed = 0;

    for (const url of urls) {
      if (!this.classifier.isAggregator(url)) {
        collected.push({ url, text: '', linkScore: 0, aggregatorUrl: null });
        continue;
      }

      let links: ScoredLink[] = [];
      try {
        links = await this.expand(url);
      } catch (error) {
        log.error({ url, error: errorMessage(error) }, 'Aggregator expansion threw');
      }

      if (links.length === 0) {
        failed++;
        collected.push({ url, text: '', linkScore: 0, aggregatorUrl: null });
        continue;
      }

      expanded++;
      for (const link of links) {
        collected.push({ url: link.url, text: link.text, linkScore: link.score, aggregatorUrl: url });
      }
    }

    const seen = new Set<string>();
    const unique = collected.filter((entry) => {
      const key = dedupKey(entry.url);
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });

    log.info(
      { inputs: urls.length, expanded, failed, output: unique.length },
      'Aggregator batch expansion complete',
    );
    return { urls: unique, expanded, failed };
  }

  private async fetchWithFallback(url: string): Promise<FetchResult> {
    const primary = await this.fetcher.fetch(url, { headers: 'browser', timeoutMs: this.timeoutMs });
    if (primary.success) {
      return primary;
    }

    log.debug({ url, error: primary.error }, 'Retrying aggregator with minimal headers');
    return this.fetcher.fetch(url, { headers: 'minimal', timeoutMs: this.fallbackTimeoutMs });
  }
}

function withoutFragment(url: string): string {
  const hash = url.indexOf('#');
  return hash === -1 ? url : url.slice(0, hash);
}
