// ---------------------------------------------------------------------------
// Discovery domain enums
// ---------------------------------------------------------------------------

export const EVENT_TYPES = {
  CONFERENCE: 'conference',
  HACKATHON: 'hackathon',
} as const;

export type EventType = (typeof EVENT_TYPES)[keyof typeof EVENT_TYPES];

export const DISCOVERY_METHODS = {
  SITE_SCRAPING: 'site_scraping',
  SEARCH: 'search',
  AGGREGATOR_EXPANSION: 'aggregator_expansion',
  API: 'api',
} as const;

export type DiscoveryMethod = (typeof DISCOVERY_METHODS)[keyof typeof DISCOVERY_METHODS];

/** `source` tag given to candidates minted from an aggregator page. */
export const AGGREGATOR_EXPANSION_SOURCE = 'aggregator_expansion';

// ---------------------------------------------------------------------------
// Default operational limits
// ---------------------------------------------------------------------------

export const DEFAULT_LIMITS = {
  NAME_MAX_LENGTH: 100,
  DESCRIPTION_MAX_LENGTH: 300,
  MIN_URL_LENGTH: 10,
  MIN_LINK_TEXT_LENGTH: 5,
  MIN_SIBLING_TEXT_LENGTH: 20,
  MAX_CANDIDATES_PER_PAGE: 20,
  HTTP_TIMEOUT_MS: 15_000,
  EXPANSION_TIMEOUT_MS: 30_000,
  FALLBACK_TIMEOUT_MS: 10_000,
  ENRICHMENT_CONCURRENCY: 3,
  ENRICHMENT_BATCH_SIZE: 10,
} as const;

// ---------------------------------------------------------------------------
// File-system paths
// ---------------------------------------------------------------------------

export const PATHS = {
  DATABASE: './data/events.db',
  CONFIGS: './configs',
} as const;

// ---------------------------------------------------------------------------
// Request headers
// ---------------------------------------------------------------------------

export const USER_AGENTS: readonly string[] = [
  // Chrome – Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  // Chrome – macOS
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  // Firefox
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:123.0) Gecko/20100101 Firefox/123.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:123.0) Gecko/20100101 Firefox/123.0',
  // Edge – Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36 Edg/122.0.0.0',
];

/** Full header set sent with every primary page fetch (user agent added per request). */
export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Accept-Encoding': 'gzip, deflate, br',
  'Connection': 'keep-alive',
  'Cache-Control': 'no-cache',
  'Upgrade-Insecure-Requests': '1',
};

/** Header set used when a site rejects the full browser profile. */
export const MINIMAL_HEADERS: Readonly<Record<string, string>> = {
  'Accept': '*/*',
};

export const JSON_HEADERS: Readonly<Record<string, string>> = {
  'Accept': 'application/json, text/plain, */*',
  'Accept-Language': 'en-US,en;q=0.9',
  'X-Requested-With': 'XMLHttpRequest',
};
