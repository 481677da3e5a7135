import { describe, it, expect, vi, beforeEach } from "vitest";

const mocks = vi.hoisted(() => ({ get: vi.fn() }));

vi.mock("got", () => ({
  default: { extend: vi.fn(() => ({ get: mocks.get })) },
}));

import { HttpContentFetcher, isTransientFetchError } from "../../src/discovery/content-fetcher.js";

const URL_UNDER_TEST = "https://aiconf.org/2025";

describe("HttpContentFetcher", () => {
  beforeEach(() => {
    mocks.get.mockReset();
  });

  it("returns the body of a 2xx response", async () => {
    mocks.get.mockResolvedValueOnce({ statusCode: 200, body: "<html>ok</html>" });

    const result = await new HttpContentFetcher().fetch(URL_UNDER_TEST);

    expect(result).toEqual({ success: true, content: "<html>ok</html>", statusCode: 200 });
  });

  it("reports a non-2xx response without retrying", async () => {
    mocks.get.mockResolvedValueOnce({ statusCode: 404, body: "" });

    const result = await new HttpContentFetcher({ retryDelayMs: 0 }).fetch(URL_UNDER_TEST);

    expect(result).toEqual({ success: false, error: "HTTP 404", statusCode: 404 });
    expect(mocks.get).toHaveBeenCalledTimes(1);
  });

  it("retries server errors and reports the last one", async () => {
    mocks.get.mockResolvedValue({ statusCode: 503, body: "" });

    const result = await new HttpContentFetcher({ retryDelayMs: 0 }).fetch(URL_UNDER_TEST);

    expect(result).toEqual({ success: false, error: `HTTP 503 fetching ${URL_UNDER_TEST}` });
    expect(mocks.get).toHaveBeenCalledTimes(2);
  });

  it("retries transient network errors", async () => {
    mocks.get
      .mockRejectedValueOnce(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }))
      .mockResolvedValueOnce({ statusCode: 200, body: "second try" });

    const result = await new HttpContentFetcher({ retryDelayMs: 0 }).fetch(URL_UNDER_TEST);

    expect(result).toEqual({ success: true, content: "second try", statusCode: 200 });
  });

  it("does not retry errors that are not transient", async () => {
    mocks.get.mockRejectedValueOnce(Object.assign(new Error("certificate has expired"), { code: "CERT_HAS_EXPIRED" }));

    const result = await new HttpContentFetcher({ retryDelayMs: 0, maxAttempts: 3 }).fetch(URL_UNDER_TEST);

    expect(result).toEqual({ success: false, error: "certificate has expired" });
    expect(mocks.get).toHaveBeenCalledTimes(1);
  });

  it("honours the configured attempt count", async () => {
    mocks.get.mockRejectedValue(Object.assign(new Error("timed out"), { code: "ETIMEDOUT" }));

    await new HttpContentFetcher({ retryDelayMs: 0, maxAttempts: 3 }).fetch(URL_UNDER_TEST);

    expect(mocks.get).toHaveBeenCalledTimes(3);
  });

  it("sends the requested header profile, query and timeout", async () => {
    mocks.get.mockResolvedValueOnce({ statusCode: 200, body: "" });

    await new HttpContentFetcher().fetch(URL_UNDER_TEST, {
      headers: "minimal",
      timeoutMs: 500,
      searchParams: { page: 2 },
      extraHeaders: { Referer: "https://aiconf.org" },
    });

    expect(mocks.get).toHaveBeenCalledWith(
      URL_UNDER_TEST,
      expect.objectContaining({
        headers: expect.objectContaining({ Referer: "https://aiconf.org" }),
        searchParams: { page: 2 },
        timeout: { request: 500 },
      }),
    );
  });

  it("parses JSON bodies", async () => {
    mocks.get.mockResolvedValueOnce({ statusCode: 200, body: '{"hackathons":[]}' });

    const result = await new HttpContentFetcher().fetchJson(URL_UNDER_TEST);

    expect(result).toEqual({ success: true, content: { hackathons: [] }, statusCode: 200 });
  });

  it("reports a body that is not JSON", async () => {
    mocks.get.mockResolvedValueOnce({ statusCode: 200, body: "<html>" });

    const result = await new HttpContentFetcher().fetchJson(URL_UNDER_TEST);

    expect(result.success).toBe(false);
    expect(result.statusCode).toBe(200);
  });
});

describe("isTransientFetchError", () => {
  it("matches network codes and server errors only", () => {
    expect(isTransientFetchError(Object.assign(new Error("x"), { code: "ECONNRESET" }))).toBe(true);
    expect(isTransientFetchError(Object.assign(new Error("x"), { code: "HTTP_5XX" }))).toBe(true);
    expect(isTransientFetchError(Object.assign(new Error("x"), { code: "ERR_NON_2XX" }))).toBe(false);
    expect(isTransientFetchError(new Error("ECONNRESET"))).toBe(false);
    expect(isTransientFetchError("ECONNRESET")).toBe(false);
  });
});
