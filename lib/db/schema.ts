import { sqliteTable, text, integer, index, uniqueIndex } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// Fleet entries - one configured plant with its credentials and transports
export const fleetEntries = sqliteTable(
  "fleet_entries",
  {
    id: text("id").primaryKey(),
    title: text("title").notNull(),
    connectionType: text("connection_type").notNull(), // 'http', 'hybrid' or 'local'
    data: text("data", { mode: "json" }).notNull(), // FleetEntryData, validated on read
    createdAt: integer("created_at", { mode: "timestamp" })
      .notNull()
      .default(sql`(unixepoch())`),
    updatedAt: integer("updated_at", { mode: "timestamp" })
      .notNull()
      .default(sql`(unixepoch())`),
  },
  (table) => ({
    connectionTypeIdx: index("fleet_entries_connection_type_idx").on(table.connectionType),
  }),
);

// Polling status - health of each entry's poll cycles
export const fleetPollingStatus = sqliteTable(
  "fleet_polling_status",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    entryId: text("entry_id")
      .notNull()
      .references(() => fleetEntries.id, { onDelete: "cascade" }),
    lastPollTime: integer("last_poll_time", { mode: "timestamp" }),
    lastSuccessTime: integer("last_success_time", { mode: "timestamp" }),
    lastErrorTime: integer("last_error_time", { mode: "timestamp" }),
    lastError: text("last_error"),
    failedDevices: text("failed_devices", { mode: "json" }).$type<string[]>(),
    needsReauthentication: integer("needs_reauthentication", { mode: "boolean" })
      .notNull()
      .default(false),
    consecutiveErrors: integer("consecutive_errors").notNull().default(0),
    totalPolls: integer("total_polls").notNull().default(0),
    successfulPolls: integer("successful_polls").notNull().default(0),
    updatedAt: integer("updated_at", { mode: "timestamp" })
      .notNull()
      .default(sql`(unixepoch())`),
  },
  (table) => ({
    entryIdUnique: uniqueIndex("fleet_polling_status_entry_id_unique").on(table.entryId),
  }),
);

export type FleetEntryRow = typeof fleetEntries.$inferSelect;
export type NewFleetEntryRow = typeof fleetEntries.$inferInsert;
export type FleetPollingStatusRow = typeof fleetPollingStatus.$inferSelect;
