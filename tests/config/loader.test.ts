import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { loadProfile, parseProfile, validateProfile } from "../../src/config/loader.js";
import { ConfigurationError } from "../../src/shared/errors.js";
import { REFERENCE_DATE, makeProfile } from "../helpers.js";

const CONFIG_DIR = fileURLToPath(new URL("../../configs", import.meta.url));

const MINIMAL = `
event_type: conference
max_results: 5
keywords: [Conference]
sources:
  - name: Listing
    base_url: https://listing.org
    search_urls: ["https://listing.org/{year}/list"]
    max_pages: 1
    reliability: 0.8
`;

function configurationError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("parseProfile", () => {
  it("applies defaults and fills the year", () => {
    const profile = parseProfile(MINIMAL, { referenceDate: REFERENCE_DATE });

    expect(profile.keywords).toEqual(["conference"]);
    expect(profile.search).toEqual({
      enabled: false,
      queries: [],
      maxResultsPerQuery: 6,
      includeTrustedDomains: true,
    });
    expect(profile.sources[0]).toEqual({
      name: "Listing",
      baseUrl: "https://listing.org",
      searchUrls: ["https://listing.org/2025/list"],
      urlPatterns: [],
      maxPages: 1,
      reliability: 0.8,
      useApi: false,
      pageParam: "page",
      apiQueries: [""],
    });
  });

  it("lists every missing field", () => {
    const error = configurationError(() => parseProfile("event_type: conference\nmax_results: 5\nkeywords: [x]\n"));

    expect(error.issues).toEqual(["sources: Required"]);
  });

  it("rejects malformed YAML", () => {
    expect(() => parseProfile("keywords: [unclosed")).toThrow(ConfigurationError);
  });

  it("rejects reliability outside [0, 1]", () => {
    const error = configurationError(() => parseProfile(MINIMAL.replace("0.8", "1.5")));

    expect(error.issues).toEqual(["sources.0.reliability: Number must be less than or equal to 1"]);
  });
});

describe("loadProfile", () => {
  it("loads the bundled hackathon profile", () => {
    const profile = loadProfile("hackathon", { dir: CONFIG_DIR, referenceDate: REFERENCE_DATE });

    expect(profile.eventType).toBe("hackathon");
    expect(profile.maxResults).toBe(60);
    expect(profile.sources.map((s) => s.name)).toEqual(["Devpost", "MLH", "Eventbrite"]);
    expect(profile.sources[0]?.useApi).toBe(true);
    expect(profile.sources[1]?.searchUrls).toEqual(["https://mlh.io/seasons/2025/events"]);
    expect(profile.search.queries[0]).toBe("online hackathon 2025");
  });

  it("loads the bundled conference profile", () => {
    const profile = loadProfile("conference", { dir: CONFIG_DIR, referenceDate: REFERENCE_DATE });

    expect(profile.eventType).toBe("conference");
    expect(profile.maxResults).toBe(200);
  });

  describe("with a scratch directory", () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), "profiles-"));
      writeFileSync(join(dir, "conference.yaml"), readFileSync(join(CONFIG_DIR, "hackathon.yaml"), "utf-8"));
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("rejects a file declaring a different event type", () => {
      const error = configurationError(() => loadProfile("conference", { dir }));

      expect(error.issues).toEqual(["event_type: expected conference"]);
    });

    it("reports a missing file", () => {
      expect(() => loadProfile("hackathon", { dir })).toThrow(ConfigurationError);
    });
  });
});

describe("validateProfile", () => {
  it("returns a complete profile unchanged", () => {
    const profile = makeProfile();
    expect(validateProfile(profile)).toBe(profile);
  });

  it("rejects a non-positive result budget", () => {
    const error = configurationError(() => validateProfile(makeProfile({ maxResults: 0 })));

    expect(error.issues).toEqual(["maxResults: Number must be greater than 0"]);
  });
});
