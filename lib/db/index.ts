import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { DATABASE_CONFIG } from "@/config";
import * as schema from "./schema";

export type FleetDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: Database.Database;
  db: FleetDatabase;
}

/**
 * Create the tables if they do not exist yet
 */
export function ensureSchema(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS fleet_entries (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      connection_type TEXT NOT NULL,
      data TEXT NOT NULL,
      created_at INTEGER DEFAULT (unixepoch()) NOT NULL,
      updated_at INTEGER DEFAULT (unixepoch()) NOT NULL
    )
  `);
  sqlite.exec(
    `CREATE INDEX IF NOT EXISTS fleet_entries_connection_type_idx ON fleet_entries (connection_type)`,
  );

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS fleet_polling_status (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      entry_id TEXT NOT NULL,
      last_poll_time INTEGER,
      last_success_time INTEGER,
      last_error_time INTEGER,
      last_error TEXT,
      failed_devices TEXT,
      needs_reauthentication INTEGER DEFAULT 0 NOT NULL,
      consecutive_errors INTEGER DEFAULT 0 NOT NULL,
      total_polls INTEGER DEFAULT 0 NOT NULL,
      successful_polls INTEGER DEFAULT 0 NOT NULL,
      updated_at INTEGER DEFAULT (unixepoch()) NOT NULL,
      FOREIGN KEY (entry_id) REFERENCES fleet_entries(id) ON DELETE CASCADE
    )
  `);
  sqlite.exec(
    `CREATE UNIQUE INDEX IF NOT EXISTS fleet_polling_status_entry_id_unique ON fleet_polling_status (entry_id)`,
  );
}

/**
 * Open a SQLite database and make sure the tables exist
 * @param path - file path, or ":memory:"
 */
export function createDatabase(path: string): DatabaseHandle {
  const sqlite = new Database(path);

  if (path !== ":memory:") {
    // WAL for concurrent CLI and poller access
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma("foreign_keys = ON");
  ensureSchema(sqlite);

  return { sqlite, db: drizzle(sqlite, { schema }) };
}

let handle: DatabaseHandle | undefined;

/**
 * Shared database for this process (in memory under test)
 */
export function getDatabase(): DatabaseHandle {
  if (!handle) {
    const path = process.env.NODE_ENV === "test" ? ":memory:" : DATABASE_CONFIG.url.replace("file:", "");
    handle = createDatabase(path);
  }
  return handle;
}

export function closeDatabase(): void {
  handle?.sqlite.close();
  handle = undefined;
}

export * from "./schema";
export { schema };
