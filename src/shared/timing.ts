/**
 * Fixed pauses used for scraping etiquette. Discovery is sequential, so
 * every delay is a plain awaited sleep.
 */

/** Resolves after `ms` milliseconds. A non-positive value yields immediately. */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Delays between the steps of one discovery run, in milliseconds.
 */
export interface DiscoveryDelays {
  /** Between pages of one source. */
  pageMs: number;
  /** Between sources of one run. */
  sourceMs: number;
  /** After each search query. */
  queryMs: number;
  /** Before each aggregator fetch. */
  expansionMs: number;
  /** Cool-down after an API answers 429. */
  rateLimitedMs: number;
}

export const DEFAULT_DELAYS: DiscoveryDelays = {
  pageMs: 1000,
  sourceMs: 2000,
  queryMs: 400,
  expansionMs: 1000,
  rateLimitedMs: 5000,
};

/** All-zero delays, for tests and dry runs against local fixtures. */
export const NO_DELAYS: DiscoveryDelays = {
  pageMs: 0,
  sourceMs: 0,
  queryMs: 0,
  expansionMs: 0,
  rateLimitedMs: 0,
};
