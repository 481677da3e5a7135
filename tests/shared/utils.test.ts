import { describe, it, expect } from "vitest";
import {
  chunkArray,
  dedupKey,
  domainMatches,
  extractDomain,
  humanizeSlug,
  truncate,
} from "../../src/shared/utils.js";

describe("truncate", () => {
  it("never exceeds the limit", () => {
    expect(truncate("abcdef", 4)).toBe("abc…");
    expect(truncate("abc", 4)).toBe("abc");
  });
});

describe("humanizeSlug", () => {
  it("drops the extension and capitalizes words", () => {
    expect(humanizeSlug("ai-summit_2025.html")).toBe("Ai Summit 2025");
  });
});

describe("URL helpers", () => {
  it("keys URLs without case or trailing slashes", () => {
    expect(dedupKey(" https://AIConf.org/2025// ")).toBe("https://aiconf.org/2025");
  });

  it("extracts the bare domain", () => {
    expect(extractDomain("https://www.AIConf.org/x")).toBe("aiconf.org");
  });

  it("matches subdomains but not lookalikes", () => {
    expect(domainMatches("events.ieee.org", "ieee.org")).toBe(true);
    expect(domainMatches("notieee.org", "ieee.org")).toBe(false);
  });
});

describe("chunkArray", () => {
  it("splits into fixed-size chunks", () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it("rejects non-positive sizes", () => {
    expect(() => chunkArray([1], 0)).toThrow("Chunk size must be a positive integer");
  });
});
