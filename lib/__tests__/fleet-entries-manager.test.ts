import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import { createDatabase } from "@/lib/db";
import type { DatabaseHandle } from "@/lib/db";
import { FleetEntriesManager } from "@/lib/fleet-entries-manager";
import type { PollCycleResult } from "@/lib/coordinator/types";
import { DecodingError, FleetEntryNotFoundError } from "@/lib/errors";

const CLOUD_DATA = {
  connectionType: "http",
  username: "test-user",
  password: "test-secret",
  plantId: "42",
  plantName: "Workshop",
  devices: [{ serial: "4512670118", type: "inverter" }],
};

function cycle(overrides: Partial<PollCycleResult> = {}): PollCycleResult {
  return {
    success: true,
    degraded: false,
    failedDevices: [],
    needsReauthentication: false,
    startedAt: new Date("2025-06-01T10:00:00Z"),
    durationMs: 120,
    ...overrides,
  };
}

describe("FleetEntriesManager", () => {
  let handle: DatabaseHandle;
  let manager: FleetEntriesManager;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    handle = createDatabase(":memory:");
    manager = new FleetEntriesManager(handle.db);
  });

  afterEach(() => {
    handle.sqlite.close();
  });

  it("should create an entry and read it back with defaults applied", async () => {
    const created = await manager.createEntry("EG4 Web Monitor - Workshop", CLOUD_DATA, "entry-1");

    expect(created.id).toBe("entry-1");
    expect(created.data.devices).toEqual([{ serial: "4512670118", type: "inverter" }]);

    const loaded = await manager.getEntry("entry-1");
    expect(loaded).toEqual(created);
    expect(await manager.getEntry("missing")).toBeNull();
  });

  it("should list every entry", async () => {
    await manager.createEntry("First", CLOUD_DATA, "entry-1");
    await manager.createEntry("Second", { connectionType: "local" }, "entry-2");

    const entries = await manager.listEntries();

    expect(entries.map((entry) => entry.id).sort()).toEqual(["entry-1", "entry-2"]);
  });

  it("should reject invalid entry data on create", async () => {
    await expect(
      manager.createEntry("Broken", { connectionType: "satellite" }, "entry-1"),
    ).rejects.toThrow();

    expect(await manager.listEntries()).toEqual([]);
  });

  it("should refuse a stored row whose data no longer validates", async () => {
    handle.sqlite
      .prepare("INSERT INTO fleet_entries (id, title, connection_type, data) VALUES (?, ?, ?, ?)")
      .run("entry-1", "Edited", "http", JSON.stringify({ connectionType: "satellite" }));

    await expect(manager.getEntry("entry-1")).rejects.toBeInstanceOf(DecodingError);
  });

  it("should update data and title together", async () => {
    await manager.createEntry("Old title", CLOUD_DATA, "entry-1");

    const updated = await manager.updateEntry("entry-1", {
      title: "EG4 Hybrid - Workshop",
      data: {
        connectionType: "hybrid",
        username: "test-user",
        plantId: "42",
        devices: [],
        hybridLocalType: "modbus",
        modbusHost: "192.168.1.50",
      },
    });

    expect(updated.title).toBe("EG4 Hybrid - Workshop");
    expect(updated.data.connectionType).toBe("hybrid");

    const row = handle.sqlite
      .prepare("SELECT connection_type FROM fleet_entries WHERE id = ?")
      .get("entry-1");
    expect(row).toEqual({ connection_type: "hybrid" });
  });

  it("should keep the title when only data changes", async () => {
    await manager.createEntry("Kept title", CLOUD_DATA, "entry-1");

    const updated = await manager.updateEntry("entry-1", {
      data: { connectionType: "http", devices: [] },
    });

    expect(updated.title).toBe("Kept title");
  });

  it("should fail to update a missing entry", async () => {
    await expect(
      manager.updateEntry("missing", { data: { connectionType: "http", devices: [] } }),
    ).rejects.toBeInstanceOf(FleetEntryNotFoundError);
  });

  it("should count polls and errors across cycles", async () => {
    await manager.createEntry("Workshop", CLOUD_DATA, "entry-1");

    await manager.recordPoll(
      "entry-1",
      cycle({
        success: false,
        failedDevices: [{ serial: "4512670118", error: "timed out" }],
      }),
    );

    let status = await manager.getPollingStatus("entry-1");
    expect(status).toMatchObject({
      lastError: "4512670118: timed out",
      failedDevices: ["4512670118"],
      consecutiveErrors: 1,
      totalPolls: 1,
      successfulPolls: 0,
      lastSuccessTime: null,
    });

    await manager.recordPoll(
      "entry-1",
      cycle({ success: false, error: "All devices failed to update" }),
    );
    await manager.recordPoll("entry-1", cycle());

    status = await manager.getPollingStatus("entry-1");
    expect(status).toMatchObject({
      lastError: "All devices failed to update",
      failedDevices: [],
      consecutiveErrors: 0,
      totalPolls: 3,
      successfulPolls: 1,
      needsReauthentication: false,
    });
    expect(status?.lastSuccessTime).toBeInstanceOf(Date);
  });

  it("should remove an entry together with its polling status", async () => {
    await manager.createEntry("Workshop", CLOUD_DATA, "entry-1");
    await manager.recordPoll("entry-1", cycle());

    expect(await manager.removeEntry("entry-1")).toBe(true);
    expect(await manager.removeEntry("entry-1")).toBe(false);
    expect(await manager.getPollingStatus("entry-1")).toBeNull();
  });
});
