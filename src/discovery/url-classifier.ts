/**
 * URL heuristics used before any page is fetched.
 *
 * `isAggregator` gates the expensive expansion step; `looksLikeEventLink`
 * filters links pulled out of listing and aggregator pages. Both are pure
 * substring checks on the lower-cased URL.
 */

import { DEFAULT_LIMITS } from '../shared/constants.js';
import { domainMatches, extractDomain, isHttpUrl } from '../shared/utils.js';

// ---------------------------------------------------------------------------
// Aggregator indicators
// ---------------------------------------------------------------------------

const AGGREGATOR_PATH_PATTERNS = [
  '/blog/',
  '/posts/',
  '/news/',
  '/articles/',
  '/events/',
  '/conferences/',
  '/list',
  '/roundup',
  '/digest',
  '/weekly',
  '/monthly',
  '/collection',
  'conferences-',
  'events-',
  'upcoming',
  'calendar',
];

const AGGREGATOR_DOMAINS = [
  'tryolabs.com',
  'eventbrite.com',
  'meetup.com',
  'conferencelist.info',
  'conferenceindex.org',
  'allconferences.com',
  'papercrowd.com',
  'waset.org',
];

// ---------------------------------------------------------------------------
// Event-link filters
// ---------------------------------------------------------------------------

const SOCIAL_DOMAINS = [
  'facebook.com',
  'twitter.com',
  'x.com',
  'linkedin.com',
  'instagram.com',
  'youtube.com',
  'tiktok.com',
  'reddit.com',
  'github.com',
  'discord.gg',
  't.me',
];

/** Path and query fragments that mark auth, legal, marketing or tracking URLs. */
const SKIP_PATTERNS = [
  '/login',
  '/signin',
  '/sign-in',
  '/signup',
  '/sign-up',
  '/logout',
  '/account',
  '/about',
  '/contact',
  '/terms',
  '/privacy',
  '/cookie',
  '/legal',
  '/careers',
  '/jobs',
  '/press',
  '/help',
  '/support',
  '/pricing',
  '/newsletter',
  '/subscribe',
  '/advertise',
  '/cdn-cgi/',
  '/wp-admin',
  '/static/',
  '/assets/',
  '/feed',
  '/tag/',
  '/author/',
  'share=',
  'utm_',
  'fbclid=',
  'gclid=',
];

const SPAM_PATTERNS = ['casino', 'viagra', 'payday', 'loan', 'betting', 'xxx'];

const STATIC_ASSET = /\.(?:pdf|docx?|pptx?|xlsx?|jpe?g|png|gif|svg|webp|ico|css|js|zip|mp4|mp3)(?:$|\?)/;

/** Substrings that make a URL plausibly an event page. */
const EVENT_KEYWORDS = [
  'conference',
  'conf',
  'summit',
  'symposium',
  'workshop',
  'seminar',
  'congress',
  'convention',
  'forum',
  'expo',
  'festival',
  'meetup',
  'event',
  'hackathon',
  'hack',
  'bootcamp',
  'devday',
  'cfp',
  'call-for-papers',
  'callforpapers',
  'register',
  'registration',
  'tickets',
];

/** Path tokens that make a URL a preferred (not required) match. */
const MEANINGFUL_PATH_TOKENS = ['events', 'conferences', 'register'];

const MAX_PREFERRED_PATH_SEGMENTS = 4;

export interface UrlClassifierOptions {
  /** Date whose year (and the next) count as event-year tokens. Default: now */
  referenceDate?: Date;
}

/**
 * Current and next calendar year as strings. Event pages for the year just
 * ended are stale; anything further out is too speculative to trust.
 */
export function eventYearTokens(referenceDate: Date = new Date()): string[] {
  const year = referenceDate.getFullYear();
  return [String(year), String(year + 1)];
}

export class UrlClassifier {
  readonly yearTokens: readonly string[];

  constructor(options: UrlClassifierOptions = {}) {
    this.yearTokens = eventYearTokens(options.referenceDate);
  }

  /**
   * True if the URL looks like a list/blog/calendar page that links out to
   * many events rather than describing one.
   */
  isAggregator(url: string): boolean {
    const lower = url.toLowerCase();
    if (AGGREGATOR_PATH_PATTERNS.some((pattern) => lower.includes(pattern))) {
      return true;
    }
    const domain = extractDomain(lower);
    return AGGREGATOR_DOMAINS.some((aggregator) => domainMatches(domain, aggregator));
  }

  /**
   * True if the URL matches a skip pattern: social media, static asset,
   * auth/legal/marketing path, tracking parameter or spam marker.
   */
  isSkipped(url: string): boolean {
    const lower = url.toLowerCase();
    const domain = extractDomain(lower);
    if (SOCIAL_DOMAINS.some((social) => domainMatches(domain, social))) {
      return true;
    }
    if (STATIC_ASSET.test(lower)) {
      return true;
    }
    return (
      SKIP_PATTERNS.some((pattern) => lower.includes(pattern)) ||
      SPAM_PATTERNS.some((pattern) => lower.includes(pattern))
    );
  }

  /** True if the URL contains an event keyword or an event-year token. */
  hasEventKeyword(url: string): boolean {
    const lower = url.toLowerCase();
    return (
      EVENT_KEYWORDS.some((keyword) => lower.includes(keyword)) ||
      this.yearTokens.some((year) => lower.includes(year))
    );
  }

  /**
   * Two-stage filter: reject anything too short, without an http(s)
   * scheme, or matching a skip pattern; then require an event keyword.
   * `baseDomain` is accepted for context and does not restrict the result.
   */
  looksLikeEventLink(url: string, _baseDomain?: string): boolean {
    const trimmed = url.trim();
    if (trimmed.length < DEFAULT_LIMITS.MIN_URL_LENGTH) {
      return false;
    }
    if (!isHttpUrl(trimmed.toLowerCase())) {
      return false;
    }
    if (this.isSkipped(trimmed)) {
      return false;
    }
    return this.hasEventKeyword(trimmed);
  }

  /**
   * Structural preference: shallow paths (at most four segments) or paths
   * carrying a meaningful token. Used for ordering only, never to reject.
   */
  isPreferredStructure(url: string): boolean {
    if (!URL.canParse(url)) {
      return false;
    }
    const path = new URL(url).pathname.toLowerCase();
    const segments = path.split('/').filter((segment) => segment.length > 0);
    if (segments.length <= MAX_PREFERRED_PATH_SEGMENTS) {
      return true;
    }
    return (
      MEANINGFUL_PATH_TOKENS.some((token) => segments.includes(token)) ||
      this.yearTokens.some((year) => path.includes(year))
    );
  }
}

const defaultClassifier = new UrlClassifier();

export function isAggregator(url: string): boolean {
  return defaultClassifier.isAggregator(url);
}

export function isSkippedUrl(url: string): boolean {
  return defaultClassifier.isSkipped(url);
}

export function looksLikeEventLink(url: string, baseDomain?: string): boolean {
  return defaultClassifier.looksLikeEventLink(url, baseDomain);
}
