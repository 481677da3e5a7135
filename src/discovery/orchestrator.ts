/**
 * Discovery orchestrator.
 *
 * Drives one discovery run for one event type:
 *   sources (in declaration order) -> keyword search (budget-limited)
 *   -> aggregator expansion (if still under budget) -> dedup -> rank
 *   -> truncate to budget.
 *
 * Every step is sequential. Per-source, per-query, per-page and
 * per-aggregator failures are logged and skipped; only an invalid profile
 * (at construction) is fatal.
 */

import { ulid } from 'ulid';
import { getRunLogger, type Logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { emitGuarded, eventBus } from '../shared/events.js';
import { DEFAULT_DELAYS, sleep, type DiscoveryDelays } from '../shared/timing.js';
import { AGGREGATOR_EXPANSION_SOURCE, DISCOVERY_METHODS } from '../shared/constants.js';
import { dedupKey } from '../shared/utils.js';
import { validateProfile } from '../config/loader.js';
import { AggregatorExpander } from './aggregator-expander.js';
import { createCandidate } from './candidate.js';
import { dedupeAndRank, truncateToBudget } from './deduplicator.js';
import { DomainReputation } from './domain-reputation.js';
import { LocationFilter } from './location-filter.js';
import { QualityScorer } from './quality-scorer.js';
import { UrlClassifier } from './url-classifier.js';
import { createSourceStrategy } from './sources/index.js';
import { KeywordSearchStrategy, type CandidateSink } from './sources/keyword-search.js';
import type { SourceStrategy, StrategyContext } from './sources/strategy.js';
import type {
  Candidate,
  ContentFetcher,
  DiscoveryResult,
  DiscoveryStats,
  EventTypeProfile,
  ExpandedUrl,
  SearchClient,
  SourceConfig,
  SourceStats,
} from './types.js';

/** Channel prior of candidates minted from an aggregator page. */
const EXPANSION_RELIABILITY = 0.5;

export interface OrchestratorDependencies {
  fetcher: ContentFetcher;
  /** Keyword search channel; search is skipped when absent */
  searchClient?: SearchClient;
  delays?: DiscoveryDelays;
  /** Date whose year counts as "current" for scoring and classification */
  referenceDate?: Date;
  /** Overrides for the domain-reputation table used during expansion */
  reputationOverrides?: Record<string, number>;
  /** Timeout of aggregator page fetches */
  expansionTimeoutMs?: number;
  /** Strategy factory; defaults to the source registry */
  strategyFactory?: (source: SourceConfig, ctx: StrategyContext) => SourceStrategy;
}

/**
 * Run-wide accumulator of raw candidates that tracks how many distinct
 * URLs have been seen against the budget.
 */
class RunAccumulator implements CandidateSink {
  readonly candidates: Candidate[] = [];
  private readonly keys = new Set<string>();

  constructor(private readonly budget: number) {}

  get uniqueCount(): number {
    return this.keys.size;
  }

  isFull(): boolean {
    return this.keys.size >= this.budget;
  }

  offer(candidate: Candidate): boolean {
    this.candidates.push(candidate);
    const key = dedupKey(candidate.url);
    if (this.keys.has(key)) {
      return false;
    }
    this.keys.add(key);
    return true;
  }

  addAll(candidates: readonly Candidate[]): number {
    let fresh = 0;
    for (const candidate of candidates) {
      if (this.offer(candidate)) {
        fresh++;
      }
    }
    return fresh;
  }
}

export class DiscoveryOrchestrator {
  readonly profile: EventTypeProfile;
  private readonly ctx: StrategyContext;
  private readonly expander: AggregatorExpander;
  private readonly searchClient: SearchClient | undefined;
  private readonly strategyFactory: (source: SourceConfig, ctx: StrategyContext) => SourceStrategy;

  /**
   * @throws ConfigurationError if the profile is missing required fields
   */
  constructor(profile: EventTypeProfile, deps: OrchestratorDependencies) {
    this.profile = validateProfile(profile);

    const delays = deps.delays ?? DEFAULT_DELAYS;
    const classifier = new UrlClassifier({ referenceDate: deps.referenceDate });

    this.ctx = {
      profile,
      fetcher: deps.fetcher,
      classifier,
      delays,
      scorer: new QualityScorer({
        trustedDomains: profile.trustedDomains,
        bonuses: profile.qualityBonuses,
        referenceDate: deps.referenceDate,
      }),
      locationFilter: new LocationFilter(profile),
    };

    this.expander = new AggregatorExpander({
      fetcher: deps.fetcher,
      classifier,
      reputation: new DomainReputation(deps.reputationOverrides),
      delayMs: delays.expansionMs,
      timeoutMs: deps.expansionTimeoutMs,
    });

    this.searchClient = deps.searchClient;
    this.strategyFactory = deps.strategyFactory ?? createSourceStrategy;
  }

  /**
   * Discover up to `maxResults` ranked, deduplicated candidates.
   * Never throws: failures are logged and reflected in the statistics.
   */
  async discoverAll(maxResults: number = this.profile.maxResults): Promise<DiscoveryResult> {
    const runId = ulid();
    const log = getRunLogger('discovery', runId);
    const startTime = Date.now();
    const budget = Number.isFinite(maxResults) ? Math.max(0, Math.floor(maxResults)) : 0;

    const stats: DiscoveryStats = {
      runId,
      eventType: this.profile.eventType,
      maxResults: budget,
      totalFound: 0,
      uniqueCount: 0,
      finalCount: 0,
      perSource: [],
      searchQueriesIssued: 0,
      aggregatorsExpanded: 0,
      aggregatorsFailed: 0,
      durationMs: 0,
    };

    log.info(
      { eventType: this.profile.eventType, maxResults: budget, sources: this.profile.sources.length },
      'Starting discovery run',
    );
    emitGuarded(() =>
      eventBus.emit('discovery:started', {
        runId,
        eventType: this.profile.eventType,
        sourceCount: this.profile.sources.length,
        maxResults: budget,
      }),
    );

    const accumulator = new RunAccumulator(budget);
    let raw: Candidate[] = [];

    if (budget > 0) {
      stats.perSource = await this.runSources(accumulator, runId, log);
      stats.searchQueriesIssued = await this.runSearch(accumulator, log);

      raw = accumulator.candidates;
      if (!accumulator.isFull()) {
        const expansion = await this.expandAggregators(raw, log);
        raw = expansion.candidates;
        stats.aggregatorsExpanded = expansion.expanded;
        stats.aggregatorsFailed = expansion.failed;
        emitGuarded(() =>
          eventBus.emit('discovery:expanded', {
            runId,
            expanded: expansion.expanded,
            failed: expansion.failed,
          }),
        );
      }
    }

    const ranked = dedupeAndRank(raw);
    const final = truncateToBudget(ranked, budget);

    stats.totalFound = raw.length;
    stats.uniqueCount = ranked.length;
    stats.finalCount = final.length;
    stats.durationMs = Date.now() - startTime;

    log.info(
      {
        totalFound: stats.totalFound,
        uniqueCount: stats.uniqueCount,
        finalCount: stats.finalCount,
        failedSources: stats.perSource.filter((s) => s.failed).map((s) => s.source),
        durationMs: stats.durationMs,
      },
      'Discovery run completed',
    );
    emitGuarded(() =>
      eventBus.emit('discovery:completed', {
        runId,
        eventType: this.profile.eventType,
        totalFound: stats.totalFound,
        uniqueCount: stats.uniqueCount,
        finalCount: stats.finalCount,
      }),
    );

    return { candidates: final, stats };
  }

  // -------------------------------------------------------------------------
  // Steps
  // -------------------------------------------------------------------------

  private async runSources(
    accumulator: RunAccumulator,
    runId: string,
    log: Logger,
  ): Promise<SourceStats[]> {
    const perSource: SourceStats[] = [];
    const sources = this.profile.sources;

    for (const [index, source] of sources.entries()) {
      let entry: SourceStats;
      try {
        const strategy = this.strategyFactory(source, this.ctx);
        const found = await strategy.discover(source);
        const fresh = accumulator.addAll(found);
        entry = { source: source.name, found: found.length, failed: false };
        log.info({ source: source.name, strategy: strategy.name, found: found.length, fresh }, 'Source completed');
      } catch (error) {
        const message = errorMessage(error);
        entry = { source: source.name, found: 0, failed: true, error: message };
        log.error({ source: source.name, error: message }, 'Source failed, continuing with next source');
      }

      perSource.push(entry);
      emitGuarded(() =>
        eventBus.emit('discovery:source-completed', {
          runId,
          source: entry.source,
          candidatesFound: entry.found,
          failed: entry.failed,
        }),
      );

      if (index < sources.length - 1) {
        await sleep(this.ctx.delays.sourceMs);
      }
    }

    return perSource;
  }

  private async runSearch(accumulator: RunAccumulator, log: Logger): Promise<number> {
    if (!this.profile.search.enabled || this.profile.search.queries.length === 0) {
      return 0;
    }
    if (!this.searchClient) {
      log.warn('Search is enabled for this event type but no search client is configured');
      return 0;
    }

    try {
      const strategy = new KeywordSearchStrategy(this.ctx, this.searchClient);
      const result = await strategy.run(accumulator);
      log.info({ queriesIssued: result.queriesIssued, accepted: result.accepted }, 'Keyword search completed');
      return result.queriesIssued;
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Keyword search failed');
      return 0;
    }
  }

  /**
   * Replaces every aggregator candidate with the candidates found on its
   * page, in place, or keeps it when expansion yields nothing.
   */
  private async expandAggregators(
    raw: Candidate[],
    log: Logger,
  ): Promise<{ candidates: Candidate[]; expanded: number; failed: number }> {
    const aggregatorKeys = new Set<string>();
    const aggregatorUrls: string[] = [];
    for (const candidate of raw) {
      const key = dedupKey(candidate.url);
      if (!aggregatorKeys.has(key) && this.expander.isAggregator(candidate.url)) {
        aggregatorKeys.add(key);
        aggregatorUrls.push(candidate.url);
      }
    }

    if (aggregatorUrls.length === 0) {
      return { candidates: raw, expanded: 0, failed: 0 };
    }

    try {
      const batch = await this.expander.expandMany(aggregatorUrls);

      const byOrigin = new Map<string, ExpandedUrl[]>();
      for (const entry of batch.urls) {
        const originKey = dedupKey(entry.aggregatorUrl ?? entry.url);
        const group = byOrigin.get(originKey) ?? [];
        group.push(entry);
        byOrigin.set(originKey, group);
      }

      const candidates = raw.flatMap((candidate) => {
        const key = dedupKey(candidate.url);
        if (!aggregatorKeys.has(key)) {
          return [candidate];
        }
        const entries = byOrigin.get(key);
        if (!entries) {
          return [];
        }
        byOrigin.delete(key);
        return entries.map((entry) =>
          entry.aggregatorUrl === null ? candidate : this.candidateFromExpansion(entry),
        );
      });

      log.info(
        { aggregators: aggregatorUrls.length, expanded: batch.expanded, failed: batch.failed, candidates: candidates.length },
        'Aggregator expansion completed',
      );
      return { candidates, expanded: batch.expanded, failed: batch.failed };
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Aggregator expansion failed, keeping unexpanded candidates');
      return { candidates: raw, expanded: 0, failed: aggregatorUrls.length };
    }
  }

  private candidateFromExpansion(entry: ExpandedUrl): Candidate {
    return createCandidate({
      url: entry.url,
      name: entry.text,
      description: entry.text,
      source: AGGREGATOR_EXPANSION_SOURCE,
      discoveryMethod: DISCOVERY_METHODS.AGGREGATOR_EXPANSION,
      qualityScore: this.ctx.scorer.score(entry.url, entry.text, EXPANSION_RELIABILITY),
    });
  }
}
