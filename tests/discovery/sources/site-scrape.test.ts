import { describe, it, expect } from "vitest";
import { SiteScrapeStrategy, buildPageUrl } from "../../../src/discovery/sources/site-scrape.js";
import { DiscoveryError } from "../../../src/shared/errors.js";
import { FakeFetcher, makeContext, makeProfile, makeSource } from "../../helpers.js";

const LISTING = "https://listing.org/list";

const anchors = (...slugs: string[]): string =>
  `<html><body><ul>${slugs
    .map((slug) => `<li><a href="https://${slug}-conf.org/2025">${slug.toUpperCase()} Conf 2025</a></li>`)
    .join("")}</ul></body></html>`;

describe("buildPageUrl", () => {
  it("uses the search URL itself for the first page", () => {
    expect(buildPageUrl(LISTING, 1, "page")).toBe(LISTING);
  });

  it("sets the page parameter alongside existing ones", () => {
    expect(buildPageUrl("https://listing.org/list?sort=date", 2, "p")).toBe(
      "https://listing.org/list?sort=date&p=2",
    );
  });
});

describe("SiteScrapeStrategy", () => {
  it("paginates until a page adds nothing new", async () => {
    const fetcher = new FakeFetcher({
      [LISTING]: anchors("a", "b"),
      [`${LISTING}?page=2`]: anchors("b", "c"),
      [`${LISTING}?page=3`]: anchors("c"),
    });
    const source = makeSource({ maxPages: 5 });
    const strategy = new SiteScrapeStrategy(makeContext(makeProfile({ sources: [source] }), fetcher));

    const candidates = await strategy.discover(source);

    expect(candidates.map((c) => c.url)).toEqual([
      "https://a-conf.org/2025",
      "https://b-conf.org/2025",
      "https://c-conf.org/2025",
    ]);
    expect(fetcher.calls.map((c) => c.url)).toEqual([LISTING, `${LISTING}?page=2`, `${LISTING}?page=3`]);
    expect(candidates[0]).toMatchObject({
      name: "A Conf 2025",
      source: "listing",
      discoveryMethod: "site_scraping",
    });
  });

  it("applies the source's URL patterns and picks up sibling descriptions", async () => {
    const page = `
      <div><a href="/events/ai-conf-2025">AI Conf 2025</a><p>Two days of talks on applied machine learning.</p></div>
      <div><a href="https://other.org/summit">Other Summit</a></div>`;
    const source = makeSource({ urlPatterns: ["/events/"] });
    const strategy = new SiteScrapeStrategy(
      makeContext(makeProfile({ sources: [source] }), new FakeFetcher({ [LISTING]: page })),
    );

    const candidates = await strategy.discover(source);

    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({
      url: "https://listing.org/events/ai-conf-2025",
      name: "AI Conf 2025",
      description: "Two days of talks on applied machine learning.",
    });
    expect(candidates[0]?.qualityScore).toBeCloseTo(1);
  });

  it("takes the description from beside the anchor, not from inside it", async () => {
    const page = `
      <div><a href="https://aisummit.org/2025">AI Summit 2025 <span>Two days of applied ML talks</span></a><p>Hands-on workshops in San Francisco.</p></div>`;
    const source = makeSource();
    const strategy = new SiteScrapeStrategy(
      makeContext(makeProfile({ sources: [source] }), new FakeFetcher({ [LISTING]: page })),
    );

    const candidates = await strategy.discover(source);

    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({
      url: "https://aisummit.org/2025",
      name: "AI Summit 2025 Two days of applied ML talks",
      description: "Hands-on workshops in San Francisco.",
    });
  });

  it("reads cards through declared selectors", async () => {
    const page = `
      <article class="event">
        <h3>Robotics Summit 2025</h3>
        <p class="summary">Hands-on robotics sessions</p>
        <a href="/events/robotics-summit">Details</a>
      </article>`;
    const source = makeSource({
      selectors: { item: "article.event", link: "a", title: "h3", description: ".summary" },
    });
    const strategy = new SiteScrapeStrategy(
      makeContext(makeProfile({ sources: [source] }), new FakeFetcher({ [LISTING]: page })),
    );

    const candidates = await strategy.discover(source);

    expect(candidates.map((c) => [c.url, c.name, c.description])).toEqual([
      ["https://listing.org/events/robotics-summit", "Robotics Summit 2025", "Hands-on robotics sessions"],
    ]);
  });

  it("keeps earlier pages when a later page fails", async () => {
    const source = makeSource({ maxPages: 3 });
    const strategy = new SiteScrapeStrategy(
      makeContext(makeProfile({ sources: [source] }), new FakeFetcher({ [LISTING]: anchors("a") })),
    );

    await expect(strategy.discover(source)).resolves.toHaveLength(1);
  });

  it("throws when no page of the source could be fetched", async () => {
    const source = makeSource();
    const strategy = new SiteScrapeStrategy(makeContext(makeProfile({ sources: [source] })));

    await expect(strategy.discover(source)).rejects.toBeInstanceOf(DiscoveryError);
  });
});
