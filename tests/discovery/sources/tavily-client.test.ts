import { describe, it, expect, vi, beforeEach } from "vitest";

const mocks = vi.hoisted(() => ({ post: vi.fn() }));

vi.mock("got", () => ({
  default: { extend: vi.fn(() => ({ post: mocks.post })) },
}));

import { TAVILY_SEARCH_URL, TavilySearchClient } from "../../../src/discovery/sources/tavily-client.js";
import { DiscoveryError } from "../../../src/shared/errors.js";

const respond = (body: unknown): { json: () => Promise<unknown> } => ({
  json: () => Promise.resolve(body),
});

describe("TavilySearchClient", () => {
  beforeEach(() => {
    mocks.post.mockReset();
  });

  it("maps results and fills missing fields", async () => {
    mocks.post.mockReturnValueOnce(
      respond({ results: [{ url: "https://aiconf.org/2025", title: "AI Conf" }] }),
    );

    const hits = await new TavilySearchClient("test-secret").search("ai conference", {
      maxResults: 5,
      includeDomains: [],
    });

    expect(hits).toEqual([{ url: "https://aiconf.org/2025", title: "AI Conf", content: "" }]);
  });

  it("sends the key and domain restriction", async () => {
    mocks.post.mockReturnValueOnce(respond({ results: [] }));

    await new TavilySearchClient("test-secret").search("ai conference", {
      maxResults: 3,
      includeDomains: ["ieee.org"],
    });

    expect(mocks.post).toHaveBeenCalledWith(TAVILY_SEARCH_URL, {
      headers: { Authorization: "Bearer test-secret" },
      json: {
        query: "ai conference",
        search_depth: "basic",
        max_results: 3,
        include_domains: ["ieee.org"],
      },
    });
  });

  it("wraps transport failures", async () => {
    mocks.post.mockReturnValueOnce({
      json: () => Promise.reject(new Error("Response code 401 (Unauthorized)")),
    });

    const search = new TavilySearchClient("test-secret").search("q", { maxResults: 1, includeDomains: [] });

    await expect(search).rejects.toThrow("Tavily search failed: Response code 401 (Unauthorized)");
  });

  it("rejects an unexpected response shape", async () => {
    mocks.post.mockReturnValueOnce(respond({ results: "none" }));

    const search = new TavilySearchClient("test-secret").search("q", { maxResults: 1, includeDomains: [] });

    await expect(search).rejects.toBeInstanceOf(DiscoveryError);
  });
});
