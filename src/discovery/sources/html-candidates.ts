/**
 * Candidate extraction from a scraped listing page, shared by the
 * scraping strategy and the API strategies' scraping fallback.
 */

import * as cheerio from 'cheerio';
import { getLogger } from '../../shared/logger.js';
import { errorMessage } from '../../shared/errors.js';
import { DEFAULT_LIMITS, DISCOVERY_METHODS } from '../../shared/constants.js';
import { collapseWhitespace, containsAny, dedupKey } from '../../shared/utils.js';
import { createCandidate } from '../candidate.js';
import { resolveUrl } from '../link-extractor.js';
import type { Candidate, SourceConfig } from '../types.js';
import type { StrategyContext } from './strategy.js';

const log = getLogger('discovery', { component: 'html-candidates' });

interface RawLink {
  href: string;
  text: string;
  description: string;
}

/**
 * True if `url` passes the classifier, the source's URL patterns (when it
 * declares any) and mentions an event-type keyword in URL or text.
 */
export function isRelevantLink(
  url: string,
  text: string,
  source: SourceConfig,
  ctx: StrategyContext,
): boolean {
  if (!ctx.classifier.looksLikeEventLink(url)) {
    return false;
  }
  const lowerUrl = url.toLowerCase();
  if (
    source.urlPatterns.length > 0 &&
    !source.urlPatterns.some((pattern) => lowerUrl.includes(pattern.toLowerCase()))
  ) {
    return false;
  }
  return containsAny(`${url} ${text}`, ctx.profile.keywords);
}

function isDescriptionLength(text: string): boolean {
  return (
    text.length >= DEFAULT_LIMITS.MIN_SIBLING_TEXT_LENGTH &&
    text.length <= DEFAULT_LIMITS.DESCRIPTION_MAX_LENGTH
  );
}

function collectAnchors($: cheerio.CheerioAPI): RawLink[] {
  const links: RawLink[] = [];

  $('a[href]').each((_index, element) => {
    const anchor = $(element);
    const text = collapseWhitespace(anchor.text());
    if (text.length < DEFAULT_LIMITS.MIN_LINK_TEXT_LENGTH) {
      return;
    }

    let description = '';
    anchor
      .parent()
      .find('p, div, span')
      .not(anchor.find('*'))
      .each((_i, block) => {
        const blockText = collapseWhitespace($(block).text());
        if (isDescriptionLength(blockText) && blockText !== text) {
          description = blockText;
          return false;
        }
        return undefined;
      });

    links.push({ href: anchor.attr('href') ?? '', text, description });
  });

  return links;
}

function collectCards($: cheerio.CheerioAPI, source: SourceConfig): RawLink[] {
  const selectors = source.selectors;
  if (!selectors) {
    return [];
  }

  const links: RawLink[] = [];
  $(selectors.item).each((_index, element) => {
    const card = $(element);
    const link = card.is('a') ? card : card.find(selectors.link).first();
    const href = link.attr('href') ?? '';

    const title = selectors.title
      ? collapseWhitespace(card.find(selectors.title).first().text())
      : '';
    const description = selectors.description
      ? collapseWhitespace(card.find(selectors.description).first().text())
      : '';

    links.push({
      href,
      text: title.length > 0 ? title : collapseWhitespace(link.text()),
      description,
    });
  });
  return links;
}

/**
 * Turns one listing page into at most 20 scored candidates. Cards are read
 * through `source.selectors` when declared, otherwise every anchor with at
 * least five characters of text is considered. Malformed HTML yields none.
 */
export function extractPageCandidates(
  html: string,
  pageUrl: string,
  source: SourceConfig,
  ctx: StrategyContext,
): Candidate[] {
  let rawLinks: RawLink[];
  try {
    const $ = cheerio.load(html);
    rawLinks = source.selectors ? collectCards($, source) : collectAnchors($);
  } catch (error) {
    log.warn({ source: source.name, pageUrl, error: errorMessage(error) }, 'Failed to parse listing page');
    return [];
  }

  const candidates: Candidate[] = [];
  const seen = new Set<string>();

  for (const raw of rawLinks) {
    if (candidates.length >= DEFAULT_LIMITS.MAX_CANDIDATES_PER_PAGE) {
      break;
    }
    const url = raw.href ? resolveUrl(raw.href.trim(), pageUrl) : null;
    if (!url || seen.has(dedupKey(url))) {
      continue;
    }
    if (!isRelevantLink(url, raw.text, source, ctx)) {
      continue;
    }
    seen.add(dedupKey(url));

    const text = `${raw.text} ${raw.description}`.trim();
    candidates.push(
      createCandidate({
        url,
        name: raw.text,
        description: raw.description,
        source: source.name,
        discoveryMethod: DISCOVERY_METHODS.SITE_SCRAPING,
        qualityScore: ctx.scorer.score(url, text, source.reliability),
      }),
    );
  }

  log.debug({ source: source.name, pageUrl, links: rawLinks.length, kept: candidates.length }, 'Extracted page candidates');
  return candidates;
}
