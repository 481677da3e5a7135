/**
 * Candidate-link extraction from listing and aggregator pages.
 *
 * Anchors are resolved, filtered through the URL classifier and scored by
 * their anchor text and DOM context. Bare URLs in the page text are picked
 * up as well, at a fixed low score since they carry no anchor context.
 */

import * as cheerio from 'cheerio';
import { getLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { clamp, dedupKey, extractDomain } from '../shared/utils.js';
import { UrlClassifier } from './url-classifier.js';
import type { ScoredLink } from './types.js';

const log = getLogger('discovery', { component: 'link-extractor' });

const BASE_SCORE = 0.5;
const DEFAULT_SCORE = 0.3;
export const TEXT_URL_SCORE = 0.3;

const ACTION_PHRASES = [
  'register',
  'buy tickets',
  'get tickets',
  'tickets',
  'agenda',
  'speakers',
  'call for papers',
  'submit a talk',
  'attend',
  'rsvp',
  'apply now',
  'join us',
];

const ATTRIBUTE_TOKENS = ['event', 'conference', 'register', 'ticket'];

const URL_TOKENS = ['event', 'conference', 'conf', 'summit', 'hackathon', 'register', 'cfp', 'ticket'];

const LONG_URL_LENGTH = 200;
const MAX_AMPERSANDS = 3;

const TEXT_URL_PATTERN = /https?:\/\/[^\s<>"'`]+/gi;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}]+$/;
const TEXT_URL_EVENT_PATTERN = /conference|summit|event|register|cfp/;

/**
 * What the scorer can see of an anchor without fetching its target.
 */
export interface AnchorContext {
  text: string;
  className: string;
  id: string;
  /** Parent is a list item, table cell or generic block container */
  inListingContainer: boolean;
}

export class LinkExtractor {
  private readonly classifier: UrlClassifier;
  private readonly yearAdjacentPattern: RegExp;

  constructor(classifier: UrlClassifier = new UrlClassifier()) {
    this.classifier = classifier;
    const years = classifier.yearTokens.join('|');
    const keywords = 'conference|conf|summit|event|hackathon|hack|expo|forum';
    this.yearAdjacentPattern = new RegExp(
      `(?:${keywords})[-_/.]?(?:${years})|(?:${years})[-_/.]?(?:${keywords})`,
    );
  }

  /**
   * Link quality score in [0, 1]: base 0.5, +0.2 action phrase, +0.1
   * listing container, +0.15 event token in class/id, +0.1 event token in
   * the URL, -0.2 for long or tracking-heavy URLs. Any failure scores 0.3.
   */
  scoreLink(url: string, anchor: AnchorContext): number {
    try {
      let score = BASE_SCORE;
      const text = anchor.text.toLowerCase();
      const attributes = `${anchor.className} ${anchor.id}`.toLowerCase();
      const lowerUrl = url.toLowerCase();

      if (ACTION_PHRASES.some((phrase) => text.includes(phrase))) {
        score += 0.2;
      }
      if (anchor.inListingContainer) {
        score += 0.1;
      }
      if (ATTRIBUTE_TOKENS.some((token) => attributes.includes(token))) {
        score += 0.15;
      }
      if (URL_TOKENS.some((token) => lowerUrl.includes(token))) {
        score += 0.1;
      }

      const questionMarks = lowerUrl.split('?').length - 1;
      const ampersands = lowerUrl.split('&').length - 1;
      if (lowerUrl.length > LONG_URL_LENGTH || questionMarks > 1 || ampersands > MAX_AMPERSANDS) {
        score -= 0.2;
      }

      return clamp(score);
    } catch (error) {
      log.debug({ url, error: errorMessage(error) }, 'Link scoring failed, using default');
      return DEFAULT_SCORE;
    }
  }

  /**
   * True if a bare URL found in page text is event-shaped: it names a
   * conference/summit/event, a registration or CFP, or puts a year next to
   * an event keyword.
   */
  isEventShapedTextUrl(url: string): boolean {
    const lower = url.toLowerCase();
    return TEXT_URL_EVENT_PATTERN.test(lower) || this.yearAdjacentPattern.test(lower);
  }

  /**
   * Extracts candidate links from `html`, resolving relative hrefs against
   * `baseUrl`. Returns one entry per normalized URL (highest score kept),
   * sorted by score descending. Malformed HTML yields an empty list.
   */
  extract(html: string, baseUrl: string): ScoredLink[] {
    const baseDomain = extractDomain(baseUrl);
    const byKey = new Map<string, ScoredLink>();

    const offer = (link: ScoredLink): void => {
      const key = dedupKey(link.url);
      const existing = byKey.get(key);
      if (!existing || link.score > existing.score) {
        byKey.set(key, {
          url: existing?.url ?? link.url,
          score: link.score,
          text: link.text.length > 0 ? link.text : (existing?.text ?? ''),
        });
      }
    };

    try {
      const $ = cheerio.load(html);

      $('a[href]').each((_index, element) => {
        const anchor = $(element);
        const href = (anchor.attr('href') ?? '').trim();
        if (!href) {
          return;
        }

        const url = resolveUrl(href, baseUrl);
        if (!url || !this.classifier.looksLikeEventLink(url, baseDomain)) {
          return;
        }

        const context: AnchorContext = {
          text: anchor.text().replace(/\s+/g, ' ').trim(),
          className: anchor.attr('class') ?? '',
          id: anchor.attr('id') ?? '',
          inListingContainer: anchor.parent().is('li, td, div'),
        };
        offer({ url, score: this.scoreLink(url, context), text: context.text });
      });

      const pageText = $('body').length > 0 ? $('body').text() : $.root().text();
      for (const match of pageText.matchAll(TEXT_URL_PATTERN)) {
        const url = match[0].replace(TRAILING_PUNCTUATION, '');
        if (this.isEventShapedTextUrl(url) && this.classifier.looksLikeEventLink(url, baseDomain)) {
          offer({ url, score: TEXT_URL_SCORE, text: '' });
        }
      }
    } catch (error) {
      log.warn({ baseUrl, error: errorMessage(error) }, 'Failed to parse page for links');
      return [];
    }

    const links = [...byKey.values()];
    const preferred = new Set(
      links.filter((link) => this.classifier.isPreferredStructure(link.url)).map((link) => link.url),
    );

    // Array.prototype.sort is stable: equal scores keep first-seen order
    links.sort((a, b) => {
      if (b.score !== a.score) {
        return b.score - a.score;
      }
      return Number(preferred.has(b.url)) - Number(preferred.has(a.url));
    });

    log.debug({ baseUrl, links: links.length }, 'Extracted candidate links');
    return links;
  }
}

/**
 * Resolves `href` against `baseUrl`. Returns null for hrefs that do not
 * form a valid URL.
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  if (!URL.canParse(href, baseUrl)) {
    return null;
  }
  const resolved = new URL(href, baseUrl);
  resolved.hash = '';
  return resolved.toString();
}
