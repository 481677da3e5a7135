/**
 * Quality scoring for discovered candidates.
 *
 * One scorer for every event type: the shared signals (source reliability,
 * trusted domain, event year, substantive text, clean URL) plus an
 * event-type bonus table from the profile. Signals are additive and the
 * total is clamped to [0, 1].
 */

import { getLogger } from '../shared/logger.js';
import { clamp, containsAny, domainMatches, extractDomain } from '../shared/utils.js';
import { eventYearTokens } from './url-classifier.js';
import type { QualityBonus, QualityReport, ScoreFactor } from './types.js';

const log = getLogger('discovery', { component: 'quality-scorer' });

const YEAR_BONUS = 0.1;
const SUBSTANTIVE_TEXT_BONUS = 0.05;
const SUBSTANTIVE_TEXT_LENGTH = 30;
const CLEAN_URL_BONUS = 0.05;
const PLACEHOLDER_TOKENS = ['test', 'example', 'placeholder'];

export interface QualityScorerOptions {
  trustedDomains?: Record<string, number>;
  bonuses?: QualityBonus[];
  referenceDate?: Date;
}

export class QualityScorer {
  private readonly trustedDomains: Readonly<Record<string, number>>;
  private readonly bonuses: readonly QualityBonus[];
  private readonly yearTokens: readonly string[];

  constructor(options: QualityScorerOptions = {}) {
    this.trustedDomains = options.trustedDomains ?? {};
    this.bonuses = options.bonuses ?? [];
    this.yearTokens = eventYearTokens(options.referenceDate);
  }

  /**
   * Score a candidate on a 0-1 scale.
   * Returns just the numeric score for quick use while minting candidates.
   */
  score(url: string, text: string, reliability: number): number {
    return this.evaluate(url, text, reliability).score;
  }

  /**
   * Trust score of the URL's domain from the configured table, or
   * undefined when the domain is not listed.
   */
  trustedDomainScore(url: string): number | undefined {
    const domain = extractDomain(url.toLowerCase());
    let best: { suffix: string; score: number } | undefined;
    for (const [suffix, score] of Object.entries(this.trustedDomains)) {
      if (domainMatches(domain, suffix) && (!best || suffix.length > best.suffix.length)) {
        best = { suffix, score };
      }
    }
    return best?.score;
  }

  /**
   * Perform a full evaluation returning every contributing factor.
   */
  evaluate(url: string, text: string, reliability: number): QualityReport {
    const factors: ScoreFactor[] = [];

    // Base: channel prior, raised (never lowered) by a trusted domain
    let base = clamp(reliability);
    factors.push({
      name: 'source-reliability',
      score: base,
      reason: `Source reliability ${base.toFixed(2)}`,
    });

    const trusted = this.trustedDomainScore(url);
    if (trusted !== undefined && trusted > base) {
      factors.push({
        name: 'trusted-domain',
        score: trusted - base,
        reason: `Trusted domain raises base to ${trusted.toFixed(2)}`,
      });
      base = trusted;
    }

    let total = base;

    if (this.yearTokens.some((year) => text.includes(year))) {
      factors.push({
        name: 'event-year',
        score: YEAR_BONUS,
        reason: 'Mentions the current or next year',
      });
      total += YEAR_BONUS;
    }

    if (text.length > SUBSTANTIVE_TEXT_LENGTH) {
      factors.push({
        name: 'substantive-text',
        score: SUBSTANTIVE_TEXT_BONUS,
        reason: `Text longer than ${SUBSTANTIVE_TEXT_LENGTH} characters`,
      });
      total += SUBSTANTIVE_TEXT_BONUS;
    }

    if (!containsAny(url, PLACEHOLDER_TOKENS)) {
      factors.push({
        name: 'clean-url',
        score: CLEAN_URL_BONUS,
        reason: 'URL has no test/example/placeholder tokens',
      });
      total += CLEAN_URL_BONUS;
    }

    for (const bonus of this.bonuses) {
      if (matchesTerm(text, bonus.terms)) {
        factors.push({
          name: bonus.name,
          score: bonus.bonus,
          reason: `Text mentions ${bonus.name} terms`,
        });
        total += bonus.bonus;
      }
    }

    const score = clamp(total);
    if (total > 1) {
      log.trace({ url, rawScore: total }, 'Quality score saturated');
    }

    return { score, rawScore: total, factors };
  }
}

/**
 * Whole-word, case-insensitive term match so that short terms such as
 * "ai" or "ml" do not fire inside unrelated words.
 */
function matchesTerm(text: string, terms: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return terms.some((term) => {
    const escaped = term.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`(?:^|[^a-z0-9])${escaped}(?:$|[^a-z0-9])`).test(lower);
  });
}
