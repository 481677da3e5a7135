import { z } from 'zod';
import { EVENT_TYPES } from '../shared/constants.js';
import type { EventTypeProfile, SourceConfig } from '../discovery/types.js';

// ---------------------------------------------------------------------------
// Raw (YAML) shapes
// ---------------------------------------------------------------------------

const score = z.number().min(0).max(1);

const SelectorsSchema = z.object({
  item: z.string().min(1),
  link: z.string().min(1).default('a'),
  title: z.string().min(1).optional(),
  description: z.string().min(1).optional(),
});

export const SourceConfigSchema = z
  .object({
    name: z.string().min(1),
    base_url: z.string().url(),
    search_urls: z.array(z.string().url()).min(1),
    url_patterns: z.array(z.string().min(1)).default([]),
    max_pages: z.number().int().positive(),
    reliability: score,
    use_api: z.boolean().default(false),
    page_param: z.string().min(1).default('page'),
    api_queries: z.array(z.string()).default(['']),
    selectors: SelectorsSchema.optional(),
  })
  .transform(
    (raw): SourceConfig => ({
      name: raw.name,
      baseUrl: raw.base_url,
      searchUrls: raw.search_urls,
      urlPatterns: raw.url_patterns,
      maxPages: raw.max_pages,
      reliability: raw.reliability,
      useApi: raw.use_api,
      pageParam: raw.page_param,
      apiQueries: raw.api_queries,
      ...(raw.selectors ? { selectors: raw.selectors } : {}),
    }),
  );

const QualityBonusSchema = z.object({
  name: z.string().min(1),
  terms: z.array(z.string().min(1)).min(1),
  bonus: z.number().min(-1).max(1),
});

const SearchSchema = z
  .object({
    enabled: z.boolean().default(false),
    queries: z.array(z.string().min(1)).default([]),
    max_results_per_query: z.number().int().positive().default(6),
    include_trusted_domains: z.boolean().default(true),
  })
  .default({});

export const EventTypeProfileSchema = z
  .object({
    event_type: z.enum([EVENT_TYPES.CONFERENCE, EVENT_TYPES.HACKATHON]),
    max_results: z.number().int().positive(),
    keywords: z.array(z.string().min(1)).min(1),
    trusted_domains: z.record(score).default({}),
    target_locations: z.array(z.string().min(1)).default([]),
    online_indicators: z.array(z.string().min(1)).default([]),
    quality_bonuses: z.array(QualityBonusSchema).default([]),
    search: SearchSchema,
    sources: z.array(SourceConfigSchema).min(1, 'At least one source must be configured'),
  })
  .transform(
    (raw): EventTypeProfile => ({
      eventType: raw.event_type,
      maxResults: raw.max_results,
      keywords: raw.keywords.map((k) => k.toLowerCase()),
      trustedDomains: raw.trusted_domains,
      targetLocations: raw.target_locations.map((l) => l.toLowerCase()),
      onlineIndicators: raw.online_indicators.map((l) => l.toLowerCase()),
      qualityBonuses: raw.quality_bonuses,
      search: {
        enabled: raw.search.enabled,
        queries: raw.search.queries,
        maxResultsPerQuery: raw.search.max_results_per_query,
        includeTrustedDomains: raw.search.include_trusted_domains,
      },
      sources: raw.sources,
    }),
  );

export type RawEventTypeProfile = z.input<typeof EventTypeProfileSchema>;

// ---------------------------------------------------------------------------
// Already-constructed profiles
// ---------------------------------------------------------------------------

/**
 * Shape check for profiles built in code rather than parsed from YAML.
 * Mirrors the YAML schema's required fields in their camelCase form.
 */
export const ProfileObjectSchema = z.object({
  eventType: z.enum([EVENT_TYPES.CONFERENCE, EVENT_TYPES.HACKATHON]),
  maxResults: z.number().int().positive(),
  keywords: z.array(z.string()).min(1),
  trustedDomains: z.record(score),
  targetLocations: z.array(z.string()),
  onlineIndicators: z.array(z.string()),
  qualityBonuses: z.array(QualityBonusSchema),
  search: z.object({
    enabled: z.boolean(),
    queries: z.array(z.string()),
    maxResultsPerQuery: z.number().int().positive(),
    includeTrustedDomains: z.boolean(),
  }),
  sources: z
    .array(
      z.object({
        name: z.string().min(1),
        baseUrl: z.string().url(),
        searchUrls: z.array(z.string().url()).min(1),
        urlPatterns: z.array(z.string()),
        maxPages: z.number().int().positive(),
        reliability: score,
        useApi: z.boolean(),
        pageParam: z.string().min(1),
        apiQueries: z.array(z.string()),
        selectors: SelectorsSchema.optional(),
      }),
    )
    .min(1, 'At least one source must be configured'),
});
