import { describe, it, expect, afterEach } from "vitest";
import { DiscoveryOrchestrator } from "../../src/discovery/orchestrator.js";
import { ConfigurationError } from "../../src/shared/errors.js";
import { eventBus, type AppEvents } from "../../src/shared/events.js";
import { dedupKey } from "../../src/shared/utils.js";
import { NO_DELAYS } from "../../src/shared/timing.js";
import type { EventTypeProfile } from "../../src/discovery/types.js";
import {
  FakeFetcher,
  FakeSearchClient,
  REFERENCE_DATE,
  makeProfile,
  makeSource,
} from "../helpers.js";

const LISTING = "https://listing.org/list";
const AGGREGATOR = "https://confhub.org/blog/top-conferences";

const listingPage = `
<html><body><ul>
  <li><a href="https://aisummit.org/2025">AI Summit 2025 conference</a></li>
  <li><a href="https://mlconf.org/2025">ML Conf 2025 summit</a></li>
</ul></body></html>`;

const listingWithAggregator = `
<html><body><ul>
  <li><a href="${AGGREGATOR}">Top conferences 2025</a></li>
  <li><a href="https://mlconf.org/2025">ML Conf 2025 summit</a></li>
</ul></body></html>`;

const aggregatorPage = `
<html><body><ul>
  <li><a href="https://ai-summit.org/2025">AI Summit 2025 - register</a></li>
  <li><a href="https://lowrep.com/conference-2025">Conference 2025</a></li>
</ul></body></html>`;

function orchestrate(
  profile: EventTypeProfile,
  fetcher: FakeFetcher,
  searchClient?: FakeSearchClient,
): DiscoveryOrchestrator {
  return new DiscoveryOrchestrator(profile, {
    fetcher,
    searchClient,
    delays: NO_DELAYS,
    referenceDate: REFERENCE_DATE,
    reputationOverrides: { "lowrep.com": 0.2 },
  });
}

describe("DiscoveryOrchestrator", () => {
  const completed: AppEvents["discovery:source-completed"][] = [];
  const onSourceCompleted = (payload: AppEvents["discovery:source-completed"]): void => {
    completed.push(payload);
  };

  afterEach(() => {
    eventBus.off("discovery:source-completed", onSourceCompleted);
    completed.length = 0;
  });

  it("rejects a profile without sources", () => {
    expect(() => orchestrate(makeProfile({ sources: [] }), new FakeFetcher())).toThrow(
      ConfigurationError,
    );
  });

  it("isolates a failing source and keeps the others' candidates", async () => {
    eventBus.on("discovery:source-completed", onSourceCompleted);
    const profile = makeProfile({
      sources: [
        makeSource({ name: "Broken", baseUrl: "https://broken.org", searchUrls: ["https://broken.org/list"] }),
        makeSource({ name: "Working" }),
      ],
    });
    const fetcher = new FakeFetcher({ [LISTING]: listingPage });

    const { candidates, stats } = await orchestrate(profile, fetcher).discoverAll();

    expect(candidates.map((c) => c.url)).toEqual([
      "https://aisummit.org/2025",
      "https://mlconf.org/2025",
    ]);
    expect(candidates[0]?.qualityScore).toBeCloseTo(0.95);
    expect(stats.perSource).toEqual([
      { source: "Broken", found: 0, failed: true, error: "Failed to fetch https://broken.org/list: HTTP 404" },
      { source: "Working", found: 2, failed: false },
    ]);
    expect(completed.map((e) => [e.source, e.candidatesFound, e.failed])).toEqual([
      ["Broken", 0, true],
      ["Working", 2, false],
    ]);
    expect(stats.finalCount).toBe(2);
  });

  it("stops issuing search queries once the budget is full", async () => {
    const profile = makeProfile({
      search: { enabled: true, queries: ["q1", "q2"], maxResultsPerQuery: 5, includeTrustedDomains: false },
    });
    const search = new FakeSearchClient({
      q1: [
        { title: "Deep Learning Summit 2025", url: "https://dlsummit.com/2025", content: "Two days in San Francisco" },
        { title: "Robotics Summit 2025", url: "https://robosummit.com/2025", content: "New York" },
      ],
    });

    const { candidates, stats } = await orchestrate(
      profile,
      new FakeFetcher({ [LISTING]: listingPage }),
      search,
    ).discoverAll(3);

    expect(search.queries.map((q) => q.query)).toEqual(["q1"]);
    expect(stats.searchQueriesIssued).toBe(1);
    expect(candidates.map((c) => c.url)).toEqual([
      "https://aisummit.org/2025",
      "https://mlconf.org/2025",
      "https://dlsummit.com/2025",
    ]);
    expect(candidates[2]).toMatchObject({
      source: "fake-search",
      discoveryMethod: "search",
      searchQuery: "q1",
      location: "san francisco",
    });
    expect(candidates[2]?.qualityScore).toBeCloseTo(0.8);
  });

  it("skips search when no client is configured", async () => {
    const profile = makeProfile({
      search: { enabled: true, queries: ["q1"], maxResultsPerQuery: 5, includeTrustedDomains: false },
    });

    const { stats } = await orchestrate(profile, new FakeFetcher({ [LISTING]: listingPage })).discoverAll();

    expect(stats.searchQueriesIssued).toBe(0);
    expect(stats.finalCount).toBe(2);
  });

  it("does no work for a zero budget", async () => {
    const fetcher = new FakeFetcher({ [LISTING]: listingPage });

    const { candidates, stats } = await orchestrate(makeProfile(), fetcher).discoverAll(0);

    expect(candidates).toEqual([]);
    expect(fetcher.calls).toHaveLength(0);
    expect(stats.maxResults).toBe(0);
  });

  it("truncates the ranked list to the budget", async () => {
    const { candidates, stats } = await orchestrate(
      makeProfile(),
      new FakeFetcher({ [LISTING]: listingPage }),
    ).discoverAll(1);

    expect(candidates.map((c) => c.url)).toEqual(["https://aisummit.org/2025"]);
    expect(stats.uniqueCount).toBe(2);
    expect(stats.finalCount).toBe(1);
  });

  it("replaces an aggregator with the reputable events it links to", async () => {
    const fetcher = new FakeFetcher({
      [LISTING]: listingWithAggregator,
      [AGGREGATOR]: aggregatorPage,
    });

    const { candidates, stats } = await orchestrate(makeProfile(), fetcher).discoverAll();

    expect(candidates.map((c) => c.url)).toEqual([
      "https://mlconf.org/2025",
      "https://ai-summit.org/2025",
    ]);
    expect(candidates[1]).toMatchObject({
      url: "https://ai-summit.org/2025",
      name: "AI Summit 2025 - register",
      description: "AI Summit 2025 - register",
      source: "aggregator_expansion",
      discoveryMethod: "aggregator_expansion",
    });
    // neutral 0.5 prior + event year + clean URL; the anchor's own score is not used
    expect(candidates[1]?.qualityScore).toBeCloseTo(0.65);
    expect(stats.aggregatorsExpanded).toBe(1);
    expect(stats.aggregatorsFailed).toBe(0);
  });

  it("keeps an aggregator whose page cannot be fetched", async () => {
    const fetcher = new FakeFetcher({ [LISTING]: listingWithAggregator });

    const { candidates, stats } = await orchestrate(makeProfile(), fetcher).discoverAll();

    expect(candidates.map((c) => c.url)).toEqual([AGGREGATOR, "https://mlconf.org/2025"]);
    expect(stats.aggregatorsFailed).toBe(1);
    expect(fetcher.calls.filter((c) => c.url === AGGREGATOR).map((c) => c.options.headers)).toEqual([
      "browser",
      "minimal",
    ]);
  });

  it("returns bounded, ranked, unique candidates from mixed channels", async () => {
    const mirror = "https://mirror.org/list";
    const profile = makeProfile({
      sources: [
        makeSource(),
        makeSource({ name: "Mirror", baseUrl: "https://mirror.org", searchUrls: [mirror] }),
      ],
      search: { enabled: true, queries: ["q1"], maxResultsPerQuery: 5, includeTrustedDomains: false },
    });
    const fetcher = new FakeFetcher({
      [LISTING]: listingWithAggregator,
      [mirror]: `<ul>
        <li><a href="https://MLConf.org/2025/">ML Conf 2025 summit</a></li>
        <li><a href="https://aisummit.org/2025">AI Summit 2025 conference</a></li>
      </ul>`,
      [AGGREGATOR]: aggregatorPage,
    });
    const search = new FakeSearchClient({
      q1: [
        { title: "Deep Learning Summit 2025", url: "https://dlsummit.com/2025", content: "San Francisco" },
        { title: "ML Conf 2025 summit", url: "https://mlconf.org/2025", content: "" },
      ],
    });

    const { candidates } = await orchestrate(profile, fetcher, search).discoverAll();

    expect(candidates.map((c) => dedupKey(c.url)).sort()).toEqual([
      "https://ai-summit.org/2025",
      "https://aisummit.org/2025",
      "https://dlsummit.com/2025",
      "https://mlconf.org/2025",
    ]);
    for (const candidate of candidates) {
      expect(candidate.qualityScore).toBeGreaterThanOrEqual(0);
      expect(candidate.qualityScore).toBeLessThanOrEqual(1);
    }
    for (let i = 1; i < candidates.length; i++) {
      expect(candidates[i]?.qualityScore ?? 0).toBeLessThanOrEqual(candidates[i - 1]?.qualityScore ?? 0);
    }
  });

  it("completes the run when an event listener throws", async () => {
    const thrower = (): void => {
      throw new Error("listener failure");
    };
    eventBus.on("discovery:started", thrower);
    eventBus.on("discovery:source-completed", thrower);

    try {
      const { stats } = await orchestrate(makeProfile(), new FakeFetcher({ [LISTING]: listingPage })).discoverAll();
      expect(stats.finalCount).toBe(2);
    } finally {
      eventBus.off("discovery:started", thrower);
      eventBus.off("discovery:source-completed", thrower);
    }
  });
});
