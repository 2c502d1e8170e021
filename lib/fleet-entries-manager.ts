import { randomUUID } from "node:crypto";
import { eq } from "drizzle-orm";
import { getDatabase } from "@/lib/db";
import type { FleetDatabase } from "@/lib/db";
import { fleetEntries, fleetPollingStatus } from "@/lib/db/schema";
import type { FleetEntryRow, FleetPollingStatusRow } from "@/lib/db/schema";
import type { PollCycleResult, PollingStatusRecorder } from "@/lib/coordinator/types";
import { DecodingError, FleetEntryNotFoundError } from "@/lib/errors";
import { fleetEntryDataSchema } from "@/lib/types/fleet-entry";
import type { FleetEntry, FleetEntryData } from "@/lib/types/fleet-entry";

/**
 * Stores fleet entries and their polling status.
 *
 * Entry data is validated with fleetEntryDataSchema both on write and on read,
 * so a row edited by hand cannot reach a coordinator unchecked.
 */
export class FleetEntriesManager implements PollingStatusRecorder {
  constructor(private db: FleetDatabase = getDatabase().db) {}

  private toEntry(row: FleetEntryRow): FleetEntry {
    const parsed = fleetEntryDataSchema.safeParse(row.data);
    if (!parsed.success) {
      throw new DecodingError(
        `Fleet entry ${row.id} has invalid data: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join(", ")}`,
        parsed.error.issues,
      );
    }
    return { id: row.id, title: row.title, data: parsed.data };
  }

  async listEntries(): Promise<FleetEntry[]> {
    const rows = await this.db.select().from(fleetEntries).orderBy(fleetEntries.createdAt);
    return rows.map((row) => this.toEntry(row));
  }

  async getEntry(entryId: string): Promise<FleetEntry | null> {
    const row = await this.db
      .select()
      .from(fleetEntries)
      .where(eq(fleetEntries.id, entryId))
      .limit(1)
      .then((rows) => rows[0]);

    return row ? this.toEntry(row) : null;
  }

  /**
   * Create a new entry
   * @param data - validated before it is stored
   */
  async createEntry(title: string, data: unknown, id: string = randomUUID()): Promise<FleetEntry> {
    const parsed = fleetEntryDataSchema.parse(data);

    const [row] = await this.db
      .insert(fleetEntries)
      .values({
        id,
        title,
        connectionType: parsed.connectionType,
        data: parsed,
        createdAt: new Date(),
        updatedAt: new Date(),
      })
      .returning();

    console.log(`[FleetEntries] Created entry ${row.id} (${parsed.connectionType})`);
    return this.toEntry(row);
  }

  /**
   * Replace an entry's data (and optionally its title) in one write
   */
  async updateEntry(
    entryId: string,
    update: { title?: string; data: FleetEntryData },
  ): Promise<FleetEntry> {
    const parsed = fleetEntryDataSchema.parse(update.data);

    const [row] = await this.db
      .update(fleetEntries)
      .set({
        ...(update.title !== undefined ? { title: update.title } : {}),
        connectionType: parsed.connectionType,
        data: parsed,
        updatedAt: new Date(),
      })
      .where(eq(fleetEntries.id, entryId))
      .returning();

    if (!row) {
      throw new FleetEntryNotFoundError(entryId);
    }

    console.log(`[FleetEntries] Updated entry ${entryId} (${parsed.connectionType})`);
    return this.toEntry(row);
  }

  async removeEntry(entryId: string): Promise<boolean> {
    const removed = await this.db
      .delete(fleetEntries)
      .where(eq(fleetEntries.id, entryId))
      .returning({ id: fleetEntries.id });

    if (removed.length > 0) {
      console.log(`[FleetEntries] Removed entry ${entryId}`);
    }
    return removed.length > 0;
  }

  async getPollingStatus(entryId: string): Promise<FleetPollingStatusRow | null> {
    const row = await this.db
      .select()
      .from(fleetPollingStatus)
      .where(eq(fleetPollingStatus.entryId, entryId))
      .limit(1)
      .then((rows) => rows[0]);

    return row ?? null;
  }

  /**
   * Record the outcome of one poll cycle
   */
  async recordPoll(entryId: string, result: PollCycleResult): Promise<void> {
    const existing = await this.getPollingStatus(entryId);
    const now = new Date();
    const failedDevices = result.failedDevices.map((device) => device.serial);
    const lastError =
      result.error ??
      (result.failedDevices.length > 0
        ? result.failedDevices.map((device) => `${device.serial}: ${device.error}`).join("; ")
        : null);

    const values = {
      lastPollTime: result.startedAt,
      lastSuccessTime: result.success ? now : (existing?.lastSuccessTime ?? null),
      lastErrorTime: lastError ? now : (existing?.lastErrorTime ?? null),
      lastError: lastError ?? existing?.lastError ?? null,
      failedDevices,
      needsReauthentication: result.needsReauthentication,
      consecutiveErrors: result.success ? 0 : (existing?.consecutiveErrors ?? 0) + 1,
      totalPolls: (existing?.totalPolls ?? 0) + 1,
      successfulPolls: (existing?.successfulPolls ?? 0) + (result.success ? 1 : 0),
      updatedAt: now,
    };

    await this.db
      .insert(fleetPollingStatus)
      .values({ entryId, ...values })
      .onConflictDoUpdate({ target: fleetPollingStatus.entryId, set: values });
  }
}
