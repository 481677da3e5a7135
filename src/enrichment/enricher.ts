/**
 * Enrichment stage: fetch each ranked candidate's page and turn it into an
 * EventRecord. Runs in fixed-size batches with bounded concurrency inside a
 * batch; a failed fetch or extraction degrades to a record built from the
 * candidate alone.
 */

import pLimit from 'p-limit';
import { getLogger } from '../shared/logger.js';
import { DEFAULT_LIMITS } from '../shared/constants.js';
import { errorMessage } from '../shared/errors.js';
import { emitGuarded, eventBus } from '../shared/events.js';
import { chunkArray } from '../shared/utils.js';
import { isSkippedUrl } from '../discovery/url-classifier.js';
import type { Candidate } from '../discovery/types.js';
import type {
  EnrichmentDependencies,
  EnrichmentOptions,
  EnrichmentResult,
  EventRecord,
} from './types.js';
import type { EventType } from '../shared/constants.js';

const log = getLogger('enrichment', { component: 'enricher' });

/** Record carrying only what discovery already knew. */
export function fallbackRecord(candidate: Candidate, eventType: EventType): EventRecord {
  return {
    url: candidate.url,
    name: candidate.name,
    eventType,
    description: candidate.description,
    startDate: null,
    endDate: null,
    location: candidate.location ?? null,
    isOnline: false,
    themes: [],
    source: candidate.source,
    discoveryMethod: candidate.discoveryMethod,
    qualityScore: candidate.qualityScore,
    enriched: false,
  };
}

async function enrichOne(
  candidate: Candidate,
  deps: EnrichmentDependencies,
): Promise<EventRecord | null> {
  if (isSkippedUrl(candidate.url)) {
    log.debug({ url: candidate.url }, 'Not an event page, skipping fetch');
    return null;
  }

  const page = await deps.fetcher.fetch(candidate.url);
  if (!page.success) {
    log.warn({ url: candidate.url, error: page.error }, 'Page fetch failed, using candidate fields');
    return null;
  }

  try {
    return await deps.extractor.extract(page.content, candidate.url, candidate);
  } catch (error) {
    log.warn(
      { url: candidate.url, extractor: deps.extractor.name, error: errorMessage(error) },
      'Extraction failed, using candidate fields',
    );
    return null;
  }
}

/**
 * Enriches candidates in input order. Never rejects because of a single
 * candidate; every input yields exactly one record.
 */
export async function enrichCandidates(
  candidates: readonly Candidate[],
  deps: EnrichmentDependencies,
  options: EnrichmentOptions = {},
): Promise<EnrichmentResult> {
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_LIMITS.ENRICHMENT_BATCH_SIZE);
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_LIMITS.ENRICHMENT_CONCURRENCY);
  const limit = pLimit(concurrency);

  const records: EventRecord[] = [];
  let fallbacks = 0;

  const batches = chunkArray(candidates, batchSize);
  for (const [index, batch] of batches.entries()) {
    const results = await Promise.all(
      batch.map((candidate) => limit(() => enrichOne(candidate, deps))),
    );

    for (const [i, record] of results.entries()) {
      const candidate = batch[i];
      if (record) {
        records.push(record);
      } else if (candidate) {
        fallbacks++;
        records.push(fallbackRecord(candidate, deps.eventType));
      }
    }

    log.info(
      { batch: index + 1, of: batches.length, size: batch.length, extractor: deps.extractor.name },
      'Enrichment batch complete',
    );
  }

  emitGuarded(() => eventBus.emit('enrichment:completed', { processed: records.length, fallbacks }));
  log.info({ processed: records.length, fallbacks }, 'Enrichment complete');

  return { records, fallbacks };
}
