/**
 * Persistence for enriched event records, keyed by URL.
 */
import { desc, eq } from "drizzle-orm";
import { ulid } from "ulid";
import { z } from "zod";
import { getLogger } from "../shared/logger.js";
import type { EventType } from "../shared/constants.js";
import type { EventRecord } from "../enrichment/types.js";
import type { DatabaseHandle } from "./index.js";
import { events, type EventRow } from "./schema.js";

const log = getLogger("db", { component: "event-repository" });

const ThemesSchema = z.array(z.string()).catch([]);

export interface UpsertResult {
  inserted: number;
  updated: number;
}

function parseThemes(raw: string): string[] {
  try {
    return ThemesSchema.parse(JSON.parse(raw));
  } catch (error) {
    log.warn({ err: error }, "Stored themes are not valid JSON");
    return [];
  }
}

function toRecord(row: EventRow): EventRecord {
  return {
    url: row.url,
    name: row.name,
    eventType: row.eventType,
    description: row.description,
    startDate: row.startDate,
    endDate: row.endDate,
    location: row.location,
    isOnline: row.isOnline === 1,
    themes: parseThemes(row.themes),
    source: row.source,
    discoveryMethod: row.discoveryMethod,
    qualityScore: row.qualityScore,
    enriched: row.enriched === 1,
  };
}

export class EventRepository {
  constructor(private readonly handle: DatabaseHandle) {}

  /**
   * Inserts new URLs and overwrites the fields of known ones, atomically.
   * If any write fails, the entire batch is rolled back.
   */
  upsertMany(records: readonly EventRecord[]): UpsertResult {
    const { db, sqlite } = this.handle;
    const result: UpsertResult = { inserted: 0, updated: 0 };
    if (records.length === 0) return result;

    const writeBatch = sqlite.transaction(() => {
      const now = new Date().toISOString();
      for (const record of records) {
        const fields = {
          name: record.name,
          eventType: record.eventType,
          description: record.description,
          startDate: record.startDate,
          endDate: record.endDate,
          location: record.location,
          isOnline: record.isOnline ? 1 : 0,
          themes: JSON.stringify(record.themes),
          source: record.source,
          discoveryMethod: record.discoveryMethod,
          qualityScore: record.qualityScore,
          enriched: record.enriched ? 1 : 0,
        };

        const existing = db
          .select({ id: events.id })
          .from(events)
          .where(eq(events.url, record.url))
          .get();

        if (existing) {
          db.update(events)
            .set({ ...fields, updatedAt: now })
            .where(eq(events.id, existing.id))
            .run();
          result.updated++;
        } else {
          db.insert(events)
            .values({ id: ulid(), url: record.url, ...fields, createdAt: now, updatedAt: now })
            .run();
          result.inserted++;
        }
      }
    });

    writeBatch();

    log.info({ ...result, total: records.length }, "Event records saved");
    return result;
  }

  /** Stored events of one type, best quality first. */
  findByType(eventType: EventType): EventRecord[] {
    return this.handle.db
      .select()
      .from(events)
      .where(eq(events.eventType, eventType))
      .orderBy(desc(events.qualityScore))
      .all()
      .map(toRecord);
  }

  findByUrl(url: string): EventRecord | undefined {
    const row = this.handle.db.select().from(events).where(eq(events.url, url)).get();
    return row ? toRecord(row) : undefined;
  }
}
