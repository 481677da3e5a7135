import { describe, it, expect } from "vitest";
import { LinkExtractor, TEXT_URL_SCORE, resolveUrl } from "../../src/discovery/link-extractor.js";
import { UrlClassifier } from "../../src/discovery/url-classifier.js";
import { REFERENCE_DATE } from "../helpers.js";

const extractor = new LinkExtractor(new UrlClassifier({ referenceDate: REFERENCE_DATE }));
const BASE = "https://example.com";

describe("LinkExtractor.extract", () => {
  it("scores an action anchor in a listing container with event class at the cap", () => {
    const html =
      '<html><body><div><a href="/conf/2025" class="event-link">Register now</a></div></body></html>';

    expect(extractor.extract(html, BASE)).toEqual([
      { url: "https://example.com/conf/2025", score: 1, text: "Register now" },
    ]);
  });

  it("keeps a register anchor from a blog post and skips its about link", () => {
    const html = [
      "<ul>",
      '<li><a href="/conf/2025" class="register">Register Now</a></li>',
      '<li><a href="/about">About</a></li>',
      "</ul>",
    ].join("");

    expect(extractor.extract(html, "https://example.com/blog/post")).toEqual([
      { url: "https://example.com/conf/2025", score: 1, text: "Register Now" },
    ]);
  });

  it("drops the listing-container bonus for anchors directly under body", () => {
    const html = '<html><body><a href="/conf/2025" class="event-link">Register now</a></body></html>';

    const links = extractor.extract(html, BASE);
    expect(links).toHaveLength(1);
    expect(links[0]?.score).toBeCloseTo(0.95);
  });

  it("excludes skip-pattern links", () => {
    const html =
      '<div><a href="/about">About our conference</a><a href="/conf/2025">Agenda</a></div>';

    expect(extractor.extract(html, BASE).map((l) => l.url)).toEqual([
      "https://example.com/conf/2025",
    ]);
  });

  it("picks up event-shaped URLs from plain text at the fixed score", () => {
    const html = "<body><p>Details at https://example.com/summit-2025. See you!</p></body>";

    expect(extractor.extract(html, BASE)).toEqual([
      { url: "https://example.com/summit-2025", score: TEXT_URL_SCORE, text: "" },
    ]);
  });

  it("keeps the higher score when an anchor and a text URL coincide", () => {
    const html =
      '<div><a href="https://example.com/summit-2025">https://example.com/summit-2025</a></div>';

    const links = extractor.extract(html, BASE);
    expect(links).toHaveLength(1);
    expect(links[0]?.score).toBeCloseTo(0.7);
  });

  it("sorts by score descending", () => {
    const html = [
      "<body>",
      '<a href="https://example.com/summit-b">Summit B</a>',
      '<ul><li><a href="https://example.com/summit-a">Get tickets</a></li></ul>',
      "</body>",
    ].join("");

    const links = extractor.extract(html, BASE);
    expect(links.map((l) => l.url)).toEqual([
      "https://example.com/summit-a",
      "https://example.com/summit-b",
    ]);
    expect(links[0]?.score).toBeCloseTo(0.9);
    expect(links[1]?.score).toBeCloseTo(0.6);
  });

  it("returns nothing for a page without links", () => {
    expect(extractor.extract("", BASE)).toEqual([]);
  });
});

describe("LinkExtractor.scoreLink", () => {
  const bare = { text: "", className: "", id: "", inListingContainer: false };

  it("penalises very long URLs", () => {
    expect(extractor.scoreLink(`https://example.com/${"a".repeat(200)}`, bare)).toBeCloseTo(0.3);
  });

  it("penalises URLs with more than one query string marker", () => {
    expect(extractor.scoreLink("https://example.com/x?a=1?b=2", bare)).toBeCloseTo(0.3);
  });

  it("rewards event tokens in the id attribute", () => {
    expect(extractor.scoreLink("https://example.com/x", { ...bare, id: "ticket-cta" })).toBeCloseTo(0.65);
  });
});

describe("resolveUrl", () => {
  it("resolves relative hrefs and strips the fragment", () => {
    expect(resolveUrl("/x#agenda", "https://example.com/a/")).toBe("https://example.com/x");
  });

  it("returns null for invalid URLs", () => {
    expect(resolveUrl("http://[bad", BASE)).toBeNull();
  });
});
