import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { dirname, resolve } from "node:path";
import { mkdirSync, existsSync } from "node:fs";
import * as schema from "./schema.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const BUSY_TIMEOUT_MS = 5_000;
const IN_MEMORY = ":memory:";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database.Database;
}

/**
 * Opens a new connection with the standard pragmas applied.
 * Pass ":memory:" for a throwaway database.
 *
 * Configuration:
 * - WAL journal mode for concurrent read performance
 * - busy_timeout to avoid SQLITE_BUSY under contention
 */
export function openDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== IN_MEMORY) {
    const dir = dirname(resolve(dbPath));
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);

  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  sqlite.pragma("synchronous = NORMAL");

  return { db: drizzle(sqlite, { schema }), sqlite };
}

// Re-export schema for convenience
export { schema };
