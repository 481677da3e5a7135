/**
 * Migration runner for the events database.
 *
 * Creates the table and its indexes if they do not already exist. Uses
 * raw SQL via better-sqlite3 so the migration is idempotent and can run
 * without drizzle-kit tooling at runtime.
 */
import type Database from "better-sqlite3";
import { getLogger } from "../shared/logger.js";

const log = getLogger("db", { component: "migrate" });

// ---------------------------------------------------------------------------
// DDL statements
// ---------------------------------------------------------------------------

const DDL_STATEMENTS: string[] = [
  `CREATE TABLE IF NOT EXISTS events (
    id                TEXT PRIMARY KEY,
    url               TEXT NOT NULL,
    name              TEXT NOT NULL,
    event_type        TEXT NOT NULL CHECK(event_type IN ('conference','hackathon')),
    description       TEXT NOT NULL DEFAULT '',
    start_date        TEXT,
    end_date          TEXT,
    location          TEXT,
    is_online         INTEGER NOT NULL DEFAULT 0,
    themes            TEXT NOT NULL DEFAULT '[]',
    source            TEXT NOT NULL,
    discovery_method  TEXT NOT NULL CHECK(discovery_method IN ('site_scraping','search','aggregator_expansion','api')),
    quality_score     REAL NOT NULL DEFAULT 0,
    enriched          INTEGER NOT NULL DEFAULT 0,
    created_at        TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    updated_at        TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,
];

const INDEX_STATEMENTS: string[] = [
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_events_url ON events(url)`,
  `CREATE INDEX IF NOT EXISTS idx_events_type ON events(event_type)`,
  `CREATE INDEX IF NOT EXISTS idx_events_start_date ON events(start_date)`,
  `CREATE INDEX IF NOT EXISTS idx_events_quality ON events(quality_score)`,
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run all migrations (idempotent). Creates tables and indexes if they
 * do not already exist.
 */
export function migrate(sqlite: Database.Database): void {
  sqlite.exec("BEGIN TRANSACTION");
  try {
    for (const ddl of DDL_STATEMENTS) {
      sqlite.exec(ddl);
    }
    for (const idx of INDEX_STATEMENTS) {
      sqlite.exec(idx);
    }
    sqlite.exec("COMMIT");
    log.info(
      { tables: DDL_STATEMENTS.length, indexes: INDEX_STATEMENTS.length },
      "Migrations applied",
    );
  } catch (err) {
    sqlite.exec("ROLLBACK");
    log.error({ err }, "Migration failed, rolled back");
    throw err;
  }
}
