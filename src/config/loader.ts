import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';
import { ConfigurationError, errorMessage } from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';
import { PATHS, type EventType } from '../shared/constants.js';
import type { EventTypeProfile } from '../discovery/types.js';
import { EventTypeProfileSchema, ProfileObjectSchema } from './schema.js';

const log = getLogger('config', { component: 'profile-loader' });

const YEAR_PLACEHOLDER = /\{year\}/g;

export interface LoadProfileOptions {
  /** Directory holding `<event-type>.yaml`. Default: ./configs */
  dir?: string;
  /** Date whose year replaces `{year}` placeholders. Default: now */
  referenceDate?: Date;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function fillYear(template: string, year: number): string {
  return template.replace(YEAR_PLACEHOLDER, String(year));
}

/**
 * Replaces `{year}` in search URLs and search queries so profiles do not
 * go stale every January.
 */
export function applyYear(profile: EventTypeProfile, year: number): EventTypeProfile {
  return {
    ...profile,
    search: {
      ...profile.search,
      queries: profile.search.queries.map((q) => fillYear(q, year)),
    },
    sources: profile.sources.map((source) => ({
      ...source,
      searchUrls: source.searchUrls.map((url) => fillYear(url, year)),
    })),
  };
}

/**
 * Parses and validates a YAML profile document.
 *
 * @throws ConfigurationError listing every missing or malformed field
 */
export function parseProfile(
  yamlContent: string,
  options: Pick<LoadProfileOptions, 'referenceDate'> = {},
): EventTypeProfile {
  let raw: unknown;
  try {
    raw = parseYaml(yamlContent);
  } catch (error) {
    throw new ConfigurationError(`Profile is not valid YAML: ${errorMessage(error)}`);
  }

  const result = EventTypeProfileSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(
      `Invalid event-type profile (${issues.length} issue(s))`,
      issues,
    );
  }

  const year = (options.referenceDate ?? new Date()).getFullYear();
  return applyYear(result.data, year);
}

/**
 * Reads `<dir>/<eventType>.yaml` and parses it.
 *
 * @throws ConfigurationError if the file is missing or invalid
 */
export function loadProfile(
  eventType: EventType,
  options: LoadProfileOptions = {},
): EventTypeProfile {
  const filePath = join(options.dir ?? PATHS.CONFIGS, `${eventType}.yaml`);

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read profile for "${eventType}" at ${filePath}: ${errorMessage(error)}`,
    );
  }

  const profile = parseProfile(content, options);
  if (profile.eventType !== eventType) {
    throw new ConfigurationError(
      `Profile at ${filePath} declares event_type "${profile.eventType}", expected "${eventType}"`,
      [`event_type: expected ${eventType}`],
    );
  }

  log.info(
    { eventType, filePath, sources: profile.sources.length, queries: profile.search.queries.length },
    'Loaded event-type profile',
  );
  return profile;
}

/**
 * Verifies a profile built in code carries every required field.
 *
 * @throws ConfigurationError listing every missing or malformed field
 */
export function validateProfile(profile: EventTypeProfile): EventTypeProfile {
  const result = ProfileObjectSchema.safeParse(profile);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(
      `Invalid event-type profile (${issues.length} issue(s))`,
      issues,
    );
  }
  return profile;
}
