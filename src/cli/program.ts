/**
 * Command-line interface definition.
 *
 *   event-radar discover <type> [--max <n>] [--config-dir <dir>] [--no-search] [--enrich] [--save] [--json]
 *   event-radar sources <type> [--config-dir <dir>]
 */

import { Command, InvalidArgumentError } from 'commander';
import type { Env } from '../env.js';
import { getLogger } from '../shared/logger.js';
import { EVENT_TYPES, type EventType } from '../shared/constants.js';
import { ValidationError } from '../shared/errors.js';
import { eventBus, type AppEvents } from '../shared/events.js';
import { loadProfile } from '../config/loader.js';
import { DiscoveryOrchestrator } from '../discovery/orchestrator.js';
import { HttpContentFetcher } from '../discovery/content-fetcher.js';
import { TavilySearchClient } from '../discovery/sources/tavily-client.js';
import { getApiStrategyNames } from '../discovery/sources/index.js';
import type {
  Candidate,
  ContentFetcher,
  DiscoveryStats,
  SearchClient,
} from '../discovery/types.js';
import { HeuristicExtractor } from '../enrichment/heuristic-extractor.js';
import { enrichCandidates, fallbackRecord } from '../enrichment/enricher.js';
import type { EventRecord } from '../enrichment/types.js';
import { openDatabase } from '../db/index.js';
import { migrate } from '../db/migrate.js';
import { EventRepository } from '../db/event-repository.js';

const log = getLogger('cli');

export interface CliContext {
  env: Env;
  /** Sink for command output (stdout in production) */
  out: (line: string) => void;
  /** Sink for progress lines (stderr in production) */
  progress: (line: string) => void;
  createFetcher?: (env: Env) => ContentFetcher;
  createSearchClient?: (env: Env) => SearchClient | undefined;
}

interface DiscoverOptions {
  max?: number;
  configDir?: string;
  search: boolean;
  enrich?: boolean;
  save?: boolean;
  json?: boolean;
}

interface SourcesOptions {
  configDir?: string;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

export function parseEventType(value: string): EventType {
  const normalized = value.trim().toLowerCase();
  const match = Object.values(EVENT_TYPES).find((type) => type === normalized);
  if (!match) {
    throw new ValidationError(
      `Unknown event type "${value}" (expected one of: ${Object.values(EVENT_TYPES).join(', ')})`,
      'type',
      value,
    );
  }
  return match;
}

function parseMax(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Output formatting
// ---------------------------------------------------------------------------

export function formatCandidateLine(candidate: Candidate, rank: number): string {
  return `${String(rank).padStart(3)}. [${candidate.qualityScore.toFixed(2)}] ${candidate.name}\n     ${candidate.url} (${candidate.source}, ${candidate.discoveryMethod})`;
}

function formatRecordLine(record: EventRecord, rank: number): string {
  const when = record.startDate ?? 'date TBD';
  const where = record.isOnline ? 'online' : record.location ?? 'location TBD';
  return `${String(rank).padStart(3)}. [${record.qualityScore.toFixed(2)}] ${record.name} (${when}, ${where})\n     ${record.url}`;
}

export function formatStats(stats: DiscoveryStats): string[] {
  const failed = stats.perSource.filter((s) => s.failed);
  const lines = [
    `Run ${stats.runId} (${stats.eventType}) in ${(stats.durationMs / 1000).toFixed(1)}s`,
    `Found ${stats.totalFound} raw, ${stats.uniqueCount} unique, kept ${stats.finalCount} of ${stats.maxResults}`,
    `Search queries: ${stats.searchQueriesIssued}; aggregators expanded: ${stats.aggregatorsExpanded}, failed: ${stats.aggregatorsFailed}`,
  ];
  for (const source of failed) {
    lines.push(`Source failed: ${source.source}${source.error ? ` (${source.error})` : ''}`);
  }
  return lines;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function defaultSearchClient(env: Env): SearchClient | undefined {
  return env.TAVILY_API_KEY
    ? new TavilySearchClient(env.TAVILY_API_KEY, env.HTTP_TIMEOUT_MS)
    : undefined;
}

async function runDiscover(ctx: CliContext, rawType: string, options: DiscoverOptions): Promise<void> {
  const { env } = ctx;
  const eventType = parseEventType(rawType);
  const profile = loadProfile(eventType, { dir: options.configDir ?? env.CONFIG_DIR });

  const fetcher = ctx.createFetcher?.(env) ?? new HttpContentFetcher({ timeoutMs: env.HTTP_TIMEOUT_MS });
  const searchClient = options.search
    ? (ctx.createSearchClient ?? defaultSearchClient)(env)
    : undefined;

  const orchestrator = new DiscoveryOrchestrator(profile, {
    fetcher,
    searchClient,
    expansionTimeoutMs: env.EXPANSION_TIMEOUT_MS,
  });

  const onSource = (event: AppEvents['discovery:source-completed']): void => {
    ctx.progress(
      event.failed
        ? `  ${event.source}: failed`
        : `  ${event.source}: ${event.candidatesFound} candidates`,
    );
  };
  eventBus.on('discovery:source-completed', onSource);

  const result = await orchestrator
    .discoverAll(options.max ?? profile.maxResults)
    .finally(() => eventBus.off('discovery:source-completed', onSource));

  let records: EventRecord[] | undefined;
  if (options.enrich) {
    const extractor = new HeuristicExtractor(profile);
    const enrichment = await enrichCandidates(
      result.candidates,
      { fetcher, extractor, eventType },
      { batchSize: env.ENRICHMENT_BATCH_SIZE, concurrency: env.ENRICHMENT_CONCURRENCY },
    );
    records = enrichment.records;
  }

  if (options.save) {
    const toSave = records ?? result.candidates.map((c) => fallbackRecord(c, eventType));
    const handle = openDatabase(env.DATABASE_PATH);
    try {
      migrate(handle.sqlite);
      const saved = new EventRepository(handle).upsertMany(toSave);
      ctx.progress(`Saved ${saved.inserted} new and ${saved.updated} updated events to ${env.DATABASE_PATH}`);
    } finally {
      handle.sqlite.close();
    }
  }

  if (options.json) {
    ctx.out(JSON.stringify({ stats: result.stats, results: records ?? result.candidates }, null, 2));
    return;
  }

  if (records) {
    records.forEach((record, i) => ctx.out(formatRecordLine(record, i + 1)));
  } else {
    result.candidates.forEach((candidate, i) => ctx.out(formatCandidateLine(candidate, i + 1)));
  }
  for (const line of formatStats(result.stats)) {
    ctx.out(line);
  }
}

function runSources(ctx: CliContext, rawType: string, options: SourcesOptions): void {
  const eventType = parseEventType(rawType);
  const profile = loadProfile(eventType, { dir: options.configDir ?? ctx.env.CONFIG_DIR });
  const apiNames = new Set(getApiStrategyNames());

  for (const source of profile.sources) {
    const mode = source.useApi && apiNames.has(source.name.toLowerCase()) ? 'api' : 'scrape';
    ctx.out(
      `${source.name} [${mode}] reliability=${source.reliability.toFixed(2)} pages=${source.maxPages} urls=${source.searchUrls.length}`,
    );
  }
  ctx.out(`search: ${profile.search.enabled ? `${profile.search.queries.length} queries` : 'disabled'}`);
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('event-radar')
    .description('Discover, rank and store upcoming conferences and hackathons')
    .version('1.0.0');

  program
    .command('discover')
    .description('Run one discovery pass for an event type')
    .argument('<type>', `event type (${Object.values(EVENT_TYPES).join(' | ')})`)
    .option('-m, --max <n>', 'maximum number of results', parseMax)
    .option('-c, --config-dir <dir>', 'directory holding <type>.yaml profiles')
    .option('--no-search', 'skip keyword search even if enabled in the profile')
    .option('--enrich', 'fetch each result page and extract dates, location and themes')
    .option('--save', 'store the results in the events database')
    .option('--json', 'print machine-readable JSON')
    .action(async (type: string, options: DiscoverOptions) => {
      log.debug({ type, options }, 'discover command');
      await runDiscover(ctx, type, options);
    });

  program
    .command('sources')
    .description('List the sources configured for an event type')
    .argument('<type>', `event type (${Object.values(EVENT_TYPES).join(' | ')})`)
    .option('-c, --config-dir <dir>', 'directory holding <type>.yaml profiles')
    .action((type: string, options: SourcesOptions) => {
      runSources(ctx, type, options);
    });

  return program;
}
