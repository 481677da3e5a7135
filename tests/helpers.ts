import { createCandidate } from "../src/discovery/candidate.js";
import { LocationFilter } from "../src/discovery/location-filter.js";
import { QualityScorer } from "../src/discovery/quality-scorer.js";
import { UrlClassifier } from "../src/discovery/url-classifier.js";
import type { StrategyContext } from "../src/discovery/sources/strategy.js";
import type {
  Candidate,
  ContentFetcher,
  EventTypeProfile,
  FetchOptions,
  FetchResult,
  SearchClient,
  SearchHit,
  SearchOptions,
  SourceConfig,
} from "../src/discovery/types.js";
import { NO_DELAYS } from "../src/shared/timing.js";

/** Mid-year, so the local-time year is 2025 in every timezone. */
export const REFERENCE_DATE = new Date("2025-06-01T12:00:00Z");

export type PageResponder = (url: string, options: FetchOptions) => FetchResult;
export type JsonResponder = (url: string, options: FetchOptions) => FetchResult<unknown>;

const notFound = { success: false as const, error: "HTTP 404", statusCode: 404 };

/**
 * In-memory ContentFetcher. Pages are looked up by exact URL; anything
 * else answers 404.
 */
export class FakeFetcher implements ContentFetcher {
  readonly calls: { url: string; options: FetchOptions; kind: "html" | "json" }[] = [];
  private readonly respond: PageResponder;
  private readonly respondJson: JsonResponder;

  constructor(pages: Record<string, string> | PageResponder = {}, json?: JsonResponder) {
    this.respond =
      typeof pages === "function"
        ? pages
        : (url) => {
            const content = pages[url];
            return content === undefined
              ? notFound
              : { success: true, content, statusCode: 200 };
          };
    this.respondJson = json ?? (() => notFound);
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    this.calls.push({ url, options, kind: "html" });
    return this.respond(url, options);
  }

  async fetchJson(url: string, options: FetchOptions = {}): Promise<FetchResult<unknown>> {
    this.calls.push({ url, options, kind: "json" });
    return this.respondJson(url, options);
  }
}

/**
 * SearchClient answering from a query -> hits table; queries it does not
 * know return no hits.
 */
export class FakeSearchClient implements SearchClient {
  readonly name = "fake-search";
  readonly queries: { query: string; options: SearchOptions }[] = [];

  constructor(
    private readonly results: Record<string, SearchHit[]> = {},
    private readonly failing: readonly string[] = [],
  ) {}

  async search(query: string, options: SearchOptions): Promise<SearchHit[]> {
    this.queries.push({ query, options });
    if (this.failing.includes(query)) {
      throw new Error(`search backend unavailable for "${query}"`);
    }
    return this.results[query] ?? [];
  }
}

export function makeSource(overrides: Partial<SourceConfig> = {}): SourceConfig {
  return {
    name: "Listing",
    baseUrl: "https://listing.org",
    searchUrls: ["https://listing.org/list"],
    urlPatterns: [],
    maxPages: 1,
    reliability: 0.8,
    useApi: false,
    pageParam: "page",
    apiQueries: [""],
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<EventTypeProfile> = {}): EventTypeProfile {
  return {
    eventType: "conference",
    maxResults: 50,
    keywords: ["conference", "summit", "conf"],
    trustedDomains: {},
    targetLocations: ["san francisco", "sf", "new york", "ny"],
    onlineIndicators: ["online", "virtual"],
    qualityBonuses: [],
    search: {
      enabled: false,
      queries: [],
      maxResultsPerQuery: 5,
      includeTrustedDomains: false,
    },
    sources: [makeSource()],
    ...overrides,
  };
}

export function makeHackathonProfile(overrides: Partial<EventTypeProfile> = {}): EventTypeProfile {
  return makeProfile({
    eventType: "hackathon",
    keywords: ["hackathon", "hack"],
    trustedDomains: { "devpost.com": 0.95 },
    targetLocations: ["san francisco", "new york", "nyc"],
    onlineIndicators: ["online", "virtual", "remote"],
    ...overrides,
  });
}

export function makeContext(
  profile: EventTypeProfile,
  fetcher: ContentFetcher = new FakeFetcher(),
): StrategyContext {
  return {
    profile,
    fetcher,
    scorer: new QualityScorer({
      trustedDomains: profile.trustedDomains,
      bonuses: profile.qualityBonuses,
      referenceDate: REFERENCE_DATE,
    }),
    classifier: new UrlClassifier({ referenceDate: REFERENCE_DATE }),
    locationFilter: new LocationFilter(profile),
    delays: NO_DELAYS,
  };
}

export function makeCandidate(url: string, qualityScore: number, name = "Event"): Candidate {
  return createCandidate({
    url,
    name,
    source: "listing",
    discoveryMethod: "site_scraping",
    qualityScore,
  });
}
