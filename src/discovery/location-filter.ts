/**
 * Target-location policy applied to candidates that carry location text
 * (API listings and search results).
 *
 * One rule per event type, decided up front:
 *  - text naming a target location always passes;
 *  - text naming only online indicators passes iff the type allows online events;
 *  - text naming neither passes (location is unknown, not wrong).
 */

import { EVENT_TYPES, type EventType } from '../shared/constants.js';
import type { EventTypeProfile } from './types.js';

export interface LocationPolicy {
  allowOnline: boolean;
  unknownLocation: 'include' | 'exclude';
}

export const LOCATION_POLICIES: Readonly<Record<EventType, LocationPolicy>> = {
  [EVENT_TYPES.CONFERENCE]: { allowOnline: false, unknownLocation: 'include' },
  [EVENT_TYPES.HACKATHON]: { allowOnline: true, unknownLocation: 'include' },
};

export type LocationVerdict = 'target' | 'online' | 'unknown' | 'excluded';

function containsWord(text: string, phrase: string): boolean {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(?:^|[^a-z0-9])${escaped}(?:$|[^a-z0-9])`).test(text);
}

export class LocationFilter {
  private readonly targetLocations: readonly string[];
  private readonly onlineIndicators: readonly string[];
  readonly policy: LocationPolicy;

  constructor(profile: Pick<EventTypeProfile, 'eventType' | 'targetLocations' | 'onlineIndicators'>) {
    this.targetLocations = profile.targetLocations.map((l) => l.toLowerCase());
    this.onlineIndicators = profile.onlineIndicators.map((l) => l.toLowerCase());
    this.policy = LOCATION_POLICIES[profile.eventType];
  }

  isOnline(text: string): boolean {
    const lower = text.toLowerCase();
    return this.onlineIndicators.some((indicator) => containsWord(lower, indicator));
  }

  matchesTarget(text: string): boolean {
    const lower = text.toLowerCase();
    return this.targetLocations.some((location) => containsWord(lower, location));
  }

  /** Classifies free text; short tokens like "sf" or "ny" match whole words only. */
  classify(text: string): LocationVerdict {
    if (this.matchesTarget(text)) {
      return 'target';
    }
    if (this.isOnline(text)) {
      return this.policy.allowOnline ? 'online' : 'excluded';
    }
    return this.policy.unknownLocation === 'include' ? 'unknown' : 'excluded';
  }

  accepts(text: string): boolean {
    return this.classify(text) !== 'excluded';
  }

  /**
   * Classifies a structured location field. Unlike free text, a non-empty
   * field that names neither a target nor an online indicator is a real
   * location outside the targets and is excluded; an empty field is unknown.
   */
  classifyField(location: string | null | undefined, flaggedOnline = false): LocationVerdict {
    const text = (location ?? '').trim();
    if (text.length > 0 && this.matchesTarget(text)) {
      return 'target';
    }
    if (flaggedOnline || this.isOnline(text)) {
      return this.policy.allowOnline ? 'online' : 'excluded';
    }
    if (text.length === 0) {
      return this.policy.unknownLocation === 'include' ? 'unknown' : 'excluded';
    }
    return 'excluded';
  }

  /** First target location named in the text, if any. */
  matchedLocation(text: string): string | undefined {
    const lower = text.toLowerCase();
    return this.targetLocations.find((location) => containsWord(lower, location));
  }
}
