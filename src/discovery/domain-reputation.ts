/**
 * Domain-only trust score used to gate aggregator-expansion output.
 *
 * Unlike the quality scorer this never looks at page content: it answers
 * "would we follow a link to this host at all".
 */

import { getLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { domainMatches } from '../shared/utils.js';

const log = getLogger('discovery', { component: 'domain-reputation' });

/** Minimum reputation for a link to survive aggregator expansion. */
export const REPUTATION_THRESHOLD = 0.3;

const KNOWN_DOMAINS: Readonly<Record<string, number>> = {
  // Professional societies and research venues
  'ieee.org': 0.95,
  'acm.org': 0.95,
  'usenix.org': 0.95,
  'neurips.cc': 0.95,
  'icml.cc': 0.95,
  'iclr.cc': 0.95,
  'aaai.org': 0.9,
  'siam.org': 0.9,
  // Established event platforms
  'lu.ma': 0.9,
  'devpost.com': 0.9,
  'mlh.io': 0.9,
  'eventbrite.com': 0.85,
  'meetup.com': 0.8,
  'sessionize.com': 0.8,
  // Predatory or mass-produced conference listings
  'waset.org': 0.1,
  'conferencealerts.co.in': 0.2,
};

const ACADEMIC_SCORE = 0.9;
const ORG_SCORE = 0.75;
const COMMERCIAL_SCORE = 0.5;
const UNKNOWN_SCORE = 0.3;
const ERROR_SCORE = 0.1;

const COMMERCIAL_TLDS = ['.com', '.net', '.io'];

export class DomainReputation {
  private readonly table: Readonly<Record<string, number>>;

  /**
   * @param overrides entries merged over the built-in table (subdomains inherit)
   */
  constructor(overrides: Record<string, number> = {}) {
    this.table = { ...KNOWN_DOMAINS, ...overrides };
  }

  /**
   * Reputation of the URL's host in [0, 1]: table entry, else 0.9 for
   * .edu/.gov, 0.75 for .org, 0.5 for .com/.net/.io, 0.3 otherwise.
   * An unparseable URL scores 0.1.
   */
  score(url: string): number {
    try {
      const host = new URL(url).hostname.toLowerCase().replace(/^www\./, '');
      if (host.length === 0) {
        return ERROR_SCORE;
      }

      // Longest matching table entry wins, so "events.acm.org" beats "acm.org"
      let best: { suffix: string; score: number } | undefined;
      for (const [suffix, score] of Object.entries(this.table)) {
        if (domainMatches(host, suffix) && (!best || suffix.length > best.suffix.length)) {
          best = { suffix, score };
        }
      }
      if (best) {
        return best.score;
      }

      if (host.endsWith('.edu') || host.endsWith('.gov')) {
        return ACADEMIC_SCORE;
      }
      if (host.endsWith('.org')) {
        return ORG_SCORE;
      }
      if (COMMERCIAL_TLDS.some((tld) => host.endsWith(tld))) {
        return COMMERCIAL_SCORE;
      }
      return UNKNOWN_SCORE;
    } catch (error) {
      log.debug({ url, error: errorMessage(error) }, 'Cannot score domain');
      return ERROR_SCORE;
    }
  }

  passes(url: string, threshold = REPUTATION_THRESHOLD): boolean {
    return this.score(url) >= threshold;
  }
}
