/**
 * Rule-based page extractor.
 *
 * Reads title, description, dates, location, online flag and themes
 * from an event page with cheerio and a handful of regexes.
 */

import * as cheerio from 'cheerio';
import { getLogger } from '../shared/logger.js';
import { DEFAULT_LIMITS } from '../shared/constants.js';
import { collapseWhitespace, truncate } from '../shared/utils.js';
import { cleanName } from '../discovery/candidate.js';
import { LocationFilter } from '../discovery/location-filter.js';
import type { Candidate, EventTypeProfile } from '../discovery/types.js';
import type { EventRecord, StructuredExtractor } from './types.js';

const log = getLogger('enrichment', { component: 'heuristic-extractor' });

const MAX_THEMES = 5;

// ---------------------------------------------------------------------------
// Date extraction patterns
// ---------------------------------------------------------------------------

const MONTHS: Readonly<Record<string, number>> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const MONTH_NAME = '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\\.?';

/**
 * One global regex matching every supported date form, so that matches
 * come back in document order:
 *  - ISO "2025-03-15"
 *  - range "March 15-17, 2025" (yields start and end)
 *  - long form "March 15, 2025" / "Mar 15 2025"
 *  - day first "15 March 2025"
 *  - US "03/15/2025"
 */
const DATE_REGEX = new RegExp(
  [
    '\\b(\\d{4})-(\\d{2})-(\\d{2})\\b',
    `\\b${MONTH_NAME}\\s+(\\d{1,2})\\s*[-–]\\s*(\\d{1,2}),?\\s+(\\d{4})\\b`,
    `\\b${MONTH_NAME}\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b`,
    `\\b(\\d{1,2})\\s+${MONTH_NAME}\\s+(\\d{4})\\b`,
    '\\b(\\d{1,2})/(\\d{1,2})/(\\d{4})\\b',
  ].join('|'),
  'gi',
);

function isoDay(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) {
    return null;
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function monthNumber(name: string | undefined): number {
  return MONTHS[(name ?? '').slice(0, 3).toLowerCase()] ?? 0;
}

/**
 * All dates named in the text, in order of appearance, as YYYY-MM-DD.
 * Impossible dates ("February 30") are dropped.
 */
export function extractDates(text: string): string[] {
  const dates: string[] = [];
  for (const m of text.matchAll(DATE_REGEX)) {
    const g = m.slice(1);
    let found: (string | null)[] = [];

    if (g[0] !== undefined) {
      found = [isoDay(Number(g[0]), Number(g[1]), Number(g[2]))];
    } else if (g[3] !== undefined) {
      const month = monthNumber(g[3]);
      const year = Number(g[6]);
      found = [isoDay(year, month, Number(g[4])), isoDay(year, month, Number(g[5]))];
    } else if (g[7] !== undefined) {
      found = [isoDay(Number(g[9]), monthNumber(g[7]), Number(g[8]))];
    } else if (g[10] !== undefined) {
      found = [isoDay(Number(g[12]), monthNumber(g[11]), Number(g[10]))];
    } else if (g[13] !== undefined) {
      found = [isoDay(Number(g[15]), Number(g[13]), Number(g[14]))];
    }

    for (const date of found) {
      if (date !== null) {
        dates.push(date);
      }
    }
  }
  return dates;
}

// ---------------------------------------------------------------------------
// Extractor
// ---------------------------------------------------------------------------

export interface HeuristicExtractorOptions {
  /** Dates before this day are ignored (past editions, copyright lines) */
  referenceDate?: Date;
}

type ExtractorProfile = Pick<
  EventTypeProfile,
  'eventType' | 'keywords' | 'targetLocations' | 'onlineIndicators'
>;

export class HeuristicExtractor implements StructuredExtractor {
  readonly name = 'heuristic';
  private readonly profile: ExtractorProfile;
  private readonly locationFilter: LocationFilter;
  private readonly earliestYear: number;

  constructor(profile: ExtractorProfile, options: HeuristicExtractorOptions = {}) {
    this.profile = profile;
    this.locationFilter = new LocationFilter(profile);
    this.earliestYear = (options.referenceDate ?? new Date()).getFullYear();
  }

  async extract(content: string, url: string, candidate: Candidate): Promise<EventRecord> {
    const $ = cheerio.load(content);
    $('script, style, noscript').remove();

    const bodyText = collapseWhitespace($('body').text());
    const title = $('meta[property="og:title"]').attr('content') ?? $('title').first().text();
    const heading = $('h1').first().text();
    const name = cleanName(title) || cleanName(heading) || candidate.name;

    const metaDescription =
      $('meta[name="description"]').attr('content') ??
      $('meta[property="og:description"]').attr('content') ??
      '';
    const description =
      truncate(collapseWhitespace(metaDescription), DEFAULT_LIMITS.DESCRIPTION_MAX_LENGTH) ||
      candidate.description;

    const dates = extractDates(bodyText).filter(
      (date) => Number(date.slice(0, 4)) >= this.earliestYear,
    );
    const [startDate = null, endDate = null] = dates;

    const located = `${name} ${bodyText}`;
    const location = this.locationFilter.matchedLocation(located) ?? candidate.location ?? null;
    const isOnline = this.locationFilter.isOnline(located);

    const lowerText = located.toLowerCase();
    const themes = this.profile.keywords
      .filter((keyword) => lowerText.includes(keyword))
      .slice(0, MAX_THEMES);

    log.debug({ url, startDate, location, themes: themes.length }, 'Extracted event fields');

    return {
      url: candidate.url,
      name,
      eventType: this.profile.eventType,
      description,
      startDate,
      endDate: endDate !== null && startDate !== null && endDate >= startDate ? endDate : null,
      location,
      isOnline,
      themes,
      source: candidate.source,
      discoveryMethod: candidate.discoveryMethod,
      qualityScore: candidate.qualityScore,
      enriched: true,
    };
  }
}
