import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------------------------------------------------------------------------
// Helper: current-timestamp default
// ---------------------------------------------------------------------------
const currentTimestamp = sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`;

// ---------------------------------------------------------------------------
// events
// ---------------------------------------------------------------------------
export const events = sqliteTable(
  "events",
  {
    id: text("id").primaryKey(), // ULID
    url: text("url").notNull(),
    name: text("name").notNull(),
    eventType: text("event_type", {
      enum: ["conference", "hackathon"],
    }).notNull(),
    description: text("description").default("").notNull(),
    startDate: text("start_date"), // YYYY-MM-DD
    endDate: text("end_date"), // YYYY-MM-DD
    location: text("location"),
    isOnline: integer("is_online").default(0).notNull(),
    themes: text("themes").default("[]").notNull(), // JSON string[]
    source: text("source").notNull(),
    discoveryMethod: text("discovery_method", {
      enum: ["site_scraping", "search", "aggregator_expansion", "api"],
    }).notNull(),
    qualityScore: real("quality_score").default(0).notNull(),
    enriched: integer("enriched").default(0).notNull(),
    createdAt: text("created_at").default(currentTimestamp).notNull(),
    updatedAt: text("updated_at").default(currentTimestamp).notNull(),
  },
  (table) => [
    uniqueIndex("idx_events_url").on(table.url),
    index("idx_events_type").on(table.eventType),
    index("idx_events_start_date").on(table.startDate),
    index("idx_events_quality").on(table.qualityScore),
  ],
);

export type EventRow = typeof events.$inferSelect;
export type NewEventRow = typeof events.$inferInsert;
