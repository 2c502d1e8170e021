import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import { FleetCoordinator, pollIntervalSeconds } from "@/lib/coordinator/fleet-coordinator";
import type { FleetCoordinatorDeps } from "@/lib/coordinator/fleet-coordinator";
import type { PollCycleResult } from "@/lib/coordinator/types";
import { AuthError, ConnectionError, TransportNotInstalledError } from "@/lib/errors";
import { fleetEntryDataSchema } from "@/lib/types/fleet-entry";
import type { FleetEntry } from "@/lib/types/fleet-entry";
import type { DeviceTransport, TransportEndpoint } from "@/lib/transports/types";
import { FakeCloudTransport, FakeTransport, deferred } from "@/lib/__tests__/fake-transport";

const INVERTER_A = "4512670118";
const INVERTER_B = "4512670119";
const GRIDBOSS = "4524850115";

function makeEntry(data: Record<string, unknown>): FleetEntry {
  return { id: "entry-1", title: "Workshop", data: fleetEntryDataSchema.parse(data) };
}

function cloudEntry(devices: Record<string, unknown>[]): FleetEntry {
  return makeEntry({
    connectionType: "http",
    username: "test-user",
    password: "test-secret",
    plantId: "42",
    inverterFamily: "EG4_HYBRID",
    devices,
  });
}

function stockCloud(): FakeCloudTransport {
  const cloud = new FakeCloudTransport();
  cloud.devices[INVERTER_A] = {
    runtime: { vacr: 2417, frequency: 5998, pinv: 1500, fwCode: "FAAB-2525" },
    energy: { todayYielding: 184, totalYielding: 90210 },
  };
  cloud.devices[INVERTER_B] = {
    runtime: { vacr: 2405, pinv: 900 },
    energy: { todayYielding: 70 },
  };
  cloud.devices[GRIDBOSS] = {
    midbox: { gridFreq: 6001, fwCode: "IAAB-1300" },
  };
  return cloud;
}

function coordinatorFor(
  entry: FleetEntry,
  transports: Partial<Record<TransportEndpoint["kind"], DeviceTransport>>,
  extra: Pick<FleetCoordinatorDeps, "callTimeoutMs" | "recorder"> = {},
): FleetCoordinator {
  return new FleetCoordinator(entry, {
    createTransport: (endpoint) => {
      const transport = transports[endpoint.kind];
      if (!transport) throw new TransportNotInstalledError(endpoint.kind);
      return transport;
    },
    ...extra,
  });
}

describe("FleetCoordinator", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
  });

  it("should publish canonical sensors for every device", async () => {
    const cloud = stockCloud();
    const coordinator = coordinatorFor(
      cloudEntry([
        { serial: INVERTER_A, type: "inverter" },
        { serial: GRIDBOSS, type: "gridboss" },
      ]),
      { http: cloud },
    );

    const result = await coordinator.refresh();
    const snapshot = result.snapshot;

    expect(result.success).toBe(true);
    expect(result.degraded).toBe(false);
    expect(snapshot?.cycle).toBe(1);

    const inverter = snapshot?.devices[INVERTER_A];
    expect(inverter?.model).toBe("18kPV");
    expect(inverter?.firmwareVersion).toBe("FAAB-2525");
    expect(inverter?.sensors.ac_voltage).toBe(241.7);
    expect(inverter?.sensors.frequency).toBe(59.98);
    expect(inverter?.sensors.yield).toBe(18.4);
    expect(inverter?.sensors.connection_transport).toBe("Cloud");

    const gridboss = snapshot?.devices[GRIDBOSS];
    expect(gridboss?.model).toBe("GridBOSS");
    expect(gridboss?.sensors.frequency).toBe(60.01);
    expect(gridboss?.firmwareVersion).toBe("IAAB-1300");

    expect(snapshot?.station).toEqual({
      name: "Workshop",
      timezone: "GMT -8",
      apiRequestRate: 4,
      apiRequestsToday: 12,
    });
    expect(coordinator.getState()).toBe("idle");
  });

  it("should keep other devices when one device fails", async () => {
    const cloud = stockCloud();
    cloud.before = (method, serial) => {
      if (serial === INVERTER_B && method === "readRuntime") {
        throw new ConnectionError("socket hang up", "io");
      }
    };
    const coordinator = coordinatorFor(
      cloudEntry([
        { serial: INVERTER_A, type: "inverter" },
        { serial: INVERTER_B, type: "inverter" },
        { serial: GRIDBOSS, type: "gridboss" },
      ]),
      { http: cloud },
    );

    const result = await coordinator.refresh();

    expect(result.success).toBe(true);
    expect(result.degraded).toBe(true);
    expect(result.failedDevices).toEqual([{ serial: INVERTER_B, error: "socket hang up" }]);
    expect(result.snapshot?.devices[INVERTER_A].sensors.ac_voltage).toBe(241.7);
    expect(result.snapshot?.devices[GRIDBOSS].error).toBeUndefined();
    expect(result.snapshot?.devices[INVERTER_B]).toEqual({
      serial: INVERTER_B,
      type: "inverter",
      model: "18kPV",
      firmwareVersion: "1.0.0",
      sensors: {},
      batteries: {},
      error: "socket hang up",
    });
    expect(coordinator.getState()).toBe("degraded");
  });

  it("should share one in-flight cycle between concurrent refreshes", async () => {
    const cloud = stockCloud();
    const gate = deferred();
    cloud.before = (method) => (method === "readRuntime" ? gate.promise : undefined);
    const coordinator = coordinatorFor(cloudEntry([{ serial: INVERTER_A, type: "inverter" }]), {
      http: cloud,
    });

    const first = coordinator.refresh();
    const second = coordinator.refresh();
    gate.resolve();

    expect(second).toBe(first);
    const [a, b] = await Promise.all([first, second]);
    expect(a).toBe(b);
    expect(cloud.callCount("readRuntime")).toBe(1);

    await coordinator.refresh();
    expect(cloud.callCount("readRuntime")).toBe(2);
  });

  it("should re-authenticate once and retry after an expired session", async () => {
    const cloud = stockCloud();
    let rejected = 0;
    cloud.before = (method) => {
      if (method === "readRuntime" && rejected < 2) {
        rejected++;
        throw new AuthError("session expired", 401);
      }
    };
    const coordinator = coordinatorFor(
      cloudEntry([
        { serial: INVERTER_A, type: "inverter" },
        { serial: INVERTER_B, type: "inverter" },
      ]),
      { http: cloud },
    );

    const result = await coordinator.refresh();

    expect(result.success).toBe(true);
    expect(result.failedDevices).toEqual([]);
    expect(result.needsReauthentication).toBe(false);
    expect(cloud.callCount("connect")).toBe(1);
    expect(cloud.callCount("readRuntime")).toBe(4);
  });

  it("should flag reauthentication when the credentials are rejected", async () => {
    const cloud = stockCloud();
    const coordinator = coordinatorFor(cloudEntry([{ serial: INVERTER_A, type: "inverter" }]), {
      http: cloud,
    });
    const reauth = jest.fn();
    coordinator.on("reauth-required", reauth);

    const first = await coordinator.refresh();
    expect(first.success).toBe(true);

    cloud.before = () => {
      throw new AuthError("bad credentials", 401);
    };
    const second = await coordinator.refresh();

    expect(second.success).toBe(false);
    expect(second.needsReauthentication).toBe(true);
    expect(second.error).toBe("Every device failed in this poll cycle.");
    expect(second.snapshot).toBe(first.snapshot);
    expect(coordinator.getSnapshot()).toEqual({ snapshot: first.snapshot, stale: true });
    expect(reauth).toHaveBeenCalledWith("entry-1");
    expect(cloud.callCount("connect")).toBe(1);
  });

  it("should report availability changes once each", async () => {
    const cloud = stockCloud();
    const coordinator = coordinatorFor(cloudEntry([{ serial: INVERTER_A, type: "inverter" }]), {
      http: cloud,
    });
    const events: string[] = [];
    coordinator.on("unavailable", () => events.push("unavailable"));
    coordinator.on("available", () => events.push("available"));

    cloud.before = () => {
      throw new ConnectionError("connect ECONNREFUSED", "refused");
    };
    await coordinator.refresh();
    await coordinator.refresh();
    cloud.before = undefined;
    const recovered = await coordinator.refresh();

    expect(events).toEqual(["unavailable", "available"]);
    expect(recovered.snapshot?.cycle).toBe(1);
    expect(coordinator.getSnapshot().stale).toBe(false);
  });

  it("should publish frozen snapshots", async () => {
    const coordinator = coordinatorFor(cloudEntry([{ serial: INVERTER_A, type: "inverter" }]), {
      http: stockCloud(),
    });

    const { snapshot } = await coordinator.refresh();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot?.devices[INVERTER_A].sensors)).toBe(true);
  });

  it("should time out a call that never answers", async () => {
    const cloud = stockCloud();
    cloud.before = (method, serial) =>
      method === "readRuntime" && serial === INVERTER_B ? new Promise<void>(() => undefined) : undefined;
    const coordinator = coordinatorFor(
      cloudEntry([
        { serial: INVERTER_A, type: "inverter" },
        { serial: INVERTER_B, type: "inverter" },
      ]),
      { http: cloud },
      { callTimeoutMs: 20 },
    );

    const result = await coordinator.refresh();

    expect(result.success).toBe(true);
    expect(result.failedDevices).toEqual([
      { serial: INVERTER_B, error: "Transport call timed out. (readRuntime)" },
    ]);
  });

  it("should serialize calls on a local transport and cache identity reads", async () => {
    const modbus = new FakeTransport("modbus", { host: "192.168.1.50" });
    modbus.devices[INVERTER_A] = {
      runtime: { vacr: 2417, fac: 5998 },
      energy: { epvday: 123 },
      deviceType: 12,
      firmwareVersion: "FAAB-2525",
      parallelConfig: 0,
    };
    let active = 0;
    let maxActive = 0;
    modbus.before = async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setImmediate(resolve));
      active--;
    };
    const entry = makeEntry({
      connectionType: "local",
      inverterFamily: "LXP",
      localTransports: [
        {
          serial: INVERTER_A,
          transportType: "modbus_tcp",
          host: "192.168.1.50",
          port: 502,
          inverterFamily: "LXP",
        },
      ],
    });
    const coordinator = coordinatorFor(entry, { modbus });

    const first = await coordinator.refresh();
    await coordinator.refresh();

    expect(maxActive).toBe(1);
    expect(modbus.callCount("readDeviceType")).toBe(1);
    expect(modbus.callCount("readFirmwareVersion")).toBe(1);

    const inverter = first.snapshot?.devices[INVERTER_A];
    expect(inverter?.sensors.frequency).toBe(59.98);
    expect(inverter?.sensors.connection_transport).toBe("Modbus");
    expect(inverter?.firmwareVersion).toBe("FAAB-2525");
    expect(first.snapshot?.deviceInfo[INVERTER_A]).toEqual({
      model: "LXP",
      firmwareVersion: "FAAB-2525",
      transport: "Modbus",
      host: "192.168.1.50",
      deviceTypeCode: 12,
      parallelConfig: 0,
    });
  });

  it("should keep polling when the identity reads fail", async () => {
    const modbus = new FakeTransport("modbus");
    modbus.devices[INVERTER_A] = { runtime: { vacr: 2417 }, energy: {} };
    const entry = makeEntry({
      connectionType: "local",
      hybridLocalType: "modbus",
      modbusHost: "192.168.1.50",
      inverterSerial: INVERTER_A,
      inverterFamily: "EG4_HYBRID",
    });
    const coordinator = coordinatorFor(entry, { modbus });

    const result = await coordinator.refresh();

    expect(result.success).toBe(true);
    expect(result.snapshot?.devices[INVERTER_A].firmwareVersion).toBe("1.0.0");
  });

  it("should route hybrid devices to the local transport and the rest to the cloud", async () => {
    const cloud = stockCloud();
    const modbus = new FakeTransport("modbus");
    modbus.devices[INVERTER_A] = { runtime: { vacr: 2399 }, energy: {} };
    const entry = makeEntry({
      connectionType: "hybrid",
      username: "test-user",
      password: "test-secret",
      hybridLocalType: "modbus",
      modbusHost: "192.168.1.50",
      inverterSerial: INVERTER_A,
      inverterFamily: "EG4_HYBRID",
      devices: [
        { serial: INVERTER_A, type: "inverter" },
        { serial: GRIDBOSS, type: "gridboss" },
      ],
    });
    const coordinator = coordinatorFor(entry, { http: cloud, modbus });

    const result = await coordinator.refresh();

    expect(result.snapshot?.devices[INVERTER_A].sensors.ac_voltage).toBe(239.9);
    expect(result.snapshot?.devices[INVERTER_A].sensors.connection_transport).toBe("Modbus");
    expect(result.snapshot?.devices[GRIDBOSS].sensors.connection_transport).toBe("Cloud");
    expect(cloud.callCount("readRuntime")).toBe(0);
  });

  it("should report a missing driver on the device it belongs to", async () => {
    const entry = makeEntry({
      connectionType: "local",
      hybridLocalType: "dongle",
      dongleHost: "192.168.1.60",
      dongleSerial: "BA12345678",
      inverterSerial: INVERTER_A,
    });
    const coordinator = coordinatorFor(entry, {});

    const result = await coordinator.refresh();

    expect(result.success).toBe(false);
    expect(result.failedDevices).toEqual([
      { serial: INVERTER_A, error: 'No driver installed for transport "dongle"' },
    ]);
  });

  it("should give a parallel group its leader's firmware", async () => {
    const cloud = stockCloud();
    cloud.devices[INVERTER_A].parallelEnergy = { todayYielding: 400 };
    const coordinator = coordinatorFor(
      cloudEntry([
        { serial: "parallel-A", type: "parallel_group", leaderSerial: INVERTER_A },
        { serial: INVERTER_A, type: "inverter" },
      ]),
      { http: cloud },
    );

    const result = await coordinator.refresh();
    const group = result.snapshot?.devices["parallel-A"];

    expect(group?.model).toBe("Parallel Group");
    expect(group?.firmwareVersion).toBe("FAAB-2525");
    expect(group?.sensors.yield).toBe(40);
    expect(result.snapshot?.devices[INVERTER_A].error).toBeUndefined();
  });

  describe("local parallel groups", () => {
    function localGroupEntry(group: Record<string, unknown>): FleetEntry {
      return makeEntry({
        connectionType: "local",
        inverterFamily: "EG4_HYBRID",
        localTransports: [INVERTER_A, INVERTER_B].map((serial, index) => ({
          serial,
          transportType: "modbus_tcp",
          host: `192.168.1.${50 + index}`,
          port: 502,
          inverterFamily: "EG4_HYBRID",
        })),
        devices: [
          { serial: INVERTER_A, type: "inverter" },
          { serial: INVERTER_B, type: "inverter" },
          { serial: "parallel-1", type: "parallel_group", ...group },
        ],
      });
    }

    function stockModbus(): FakeTransport {
      const modbus = new FakeTransport("modbus", { host: "192.168.1.50" });
      modbus.devices[INVERTER_A] = {
        runtime: { soc: 80, vbat: 530, ppv1: 3000, ppv2: 1000, pinv: 2500, ptouser: 0, ptogrid: 400 },
        energy: { epvday: 184, epvall: 90210 },
        firmwareVersion: "FAAB-2525",
      };
      modbus.devices[INVERTER_B] = {
        runtime: { soc: 75, vbat: 520, ppv1: 2000, pinv: 1800, ptouser: 150, ptogrid: 0 },
        energy: { epvday: 96, epvall: 50000 },
        firmwareVersion: "FAAB-2626",
      };
      return modbus;
    }

    it("should sum power and energy and average the battery over the members", async () => {
      const modbus = stockModbus();
      const coordinator = coordinatorFor(localGroupEntry({}), { modbus });

      const result = await coordinator.refresh();
      const group = result.snapshot?.devices["parallel-1"];

      expect(result.success).toBe(true);
      expect(result.failedDevices).toEqual([]);
      expect(group?.error).toBeUndefined();
      expect(group?.firmwareVersion).toBe("FAAB-2525");
      expect(group?.sensors).toEqual({
        pv_total_power: 6000,
        grid_power: -250,
        grid_import_power: 150,
        grid_export_power: 400,
        ac_power: 4300,
        yield: 28,
        yield_lifetime: 14021,
        state_of_charge: 77.5,
        battery_voltage: 52.5,
        firmware_version: "FAAB-2525",
        connection_transport: "Modbus",
      });
      expect(modbus.callCount("readEnergy")).toBe(2);
    });

    it("should only count the listed members and follow the named leader", async () => {
      const coordinator = coordinatorFor(
        localGroupEntry({ memberSerials: [INVERTER_B], leaderSerial: INVERTER_B }),
        { modbus: stockModbus() },
      );

      const result = await coordinator.refresh();
      const group = result.snapshot?.devices["parallel-1"];

      expect(group?.firmwareVersion).toBe("FAAB-2626");
      expect(group?.sensors.ac_power).toBe(1800);
      expect(group?.sensors.state_of_charge).toBe(75);
    });

    it("should leave failed members out of the group", async () => {
      const modbus = stockModbus();
      modbus.before = (method, serial) => {
        if (method === "readRuntime" && serial === INVERTER_B) {
          throw new ConnectionError("connect ECONNREFUSED 192.168.1.51:502", "refused");
        }
      };
      const coordinator = coordinatorFor(localGroupEntry({}), { modbus });

      const result = await coordinator.refresh();
      const group = result.snapshot?.devices["parallel-1"];

      expect(result.failedDevices.map((failed) => failed.serial)).toEqual([INVERTER_B]);
      expect(group?.sensors.ac_power).toBe(2500);
      expect(group?.sensors.state_of_charge).toBe(80);
    });

    it("should fail the group when no member reported", async () => {
      const modbus = stockModbus();
      modbus.before = (method) => {
        if (method === "readRuntime") {
          throw new ConnectionError("connect ECONNREFUSED", "refused");
        }
      };
      const coordinator = coordinatorFor(localGroupEntry({}), { modbus });

      const result = await coordinator.refresh();

      expect(result.success).toBe(false);
      expect(result.failedDevices).toContainEqual({
        serial: "parallel-1",
        error: "No member inverter of parallel-1 reported this cycle",
      });
    });
  });

  it("should fail a hybrid cycle whose cloud credentials were rejected", async () => {
    const cloud = stockCloud();
    const modbus = new FakeTransport("modbus");
    modbus.devices[INVERTER_A] = { runtime: { vacr: 2399 }, energy: {} };
    const recordPoll = jest.fn<(id: string, r: PollCycleResult) => Promise<void>>();
    const coordinator = coordinatorFor(
      makeEntry({
        connectionType: "hybrid",
        username: "test-user",
        password: "test-secret",
        plantId: "42",
        hybridLocalType: "modbus",
        modbusHost: "192.168.1.50",
        inverterSerial: INVERTER_A,
        inverterFamily: "EG4_HYBRID",
        devices: [
          { serial: INVERTER_A, type: "inverter" },
          { serial: GRIDBOSS, type: "gridboss" },
        ],
      }),
      { http: cloud, modbus },
      { recorder: { recordPoll } },
    );
    const reauth = jest.fn();
    coordinator.on("reauth-required", reauth);

    const first = await coordinator.refresh();
    expect(first.success).toBe(true);

    cloud.before = () => {
      throw new AuthError("bad credentials", 401);
    };
    const second = await coordinator.refresh();

    expect(second.success).toBe(false);
    expect(second.degraded).toBe(false);
    expect(second.needsReauthentication).toBe(true);
    expect(second.error).toBe("Cloud credentials were rejected twice. Reauthentication required.");
    expect(second.failedDevices.map((failed) => failed.serial)).toEqual([GRIDBOSS]);
    expect(second.snapshot).toBe(first.snapshot);
    expect(coordinator.getSnapshot().stale).toBe(true);
    expect(reauth).toHaveBeenCalledWith("entry-1");
    expect(recordPoll.mock.calls[1][1]).toMatchObject({
      success: false,
      needsReauthentication: true,
    });
  });

  it("should hold a local transport until a timed-out call has settled", async () => {
    const modbus = new FakeTransport("modbus");
    modbus.devices[INVERTER_A] = { runtime: { vacr: 2417 }, energy: {} };
    const gate = deferred();
    modbus.before = (method) => (method === "readRuntime" ? gate.promise : undefined);
    const entry = makeEntry({
      connectionType: "local",
      hybridLocalType: "modbus",
      modbusHost: "192.168.1.50",
      inverterSerial: INVERTER_A,
      inverterFamily: "EG4_HYBRID",
    });
    const coordinator = coordinatorFor(entry, { modbus }, { callTimeoutMs: 20 });

    const result = await coordinator.refresh();

    expect(result.failedDevices).toEqual([
      { serial: INVERTER_A, error: "Transport call timed out. (readRuntime)" },
    ]);
    expect(modbus.calls).toEqual([`readRuntime:${INVERTER_A}`]);

    gate.resolve();
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(modbus.calls).toEqual([
      `readRuntime:${INVERTER_A}`,
      `readEnergy:${INVERTER_A}`,
      `readBattery:${INVERTER_A}`,
    ]);
  });

  it("should not reopen transports after shutdown", async () => {
    const cloud = stockCloud();
    const createTransport = jest.fn<(endpoint: TransportEndpoint) => DeviceTransport>(
      () => cloud,
    );
    const coordinator = new FleetCoordinator(
      cloudEntry([{ serial: INVERTER_A, type: "inverter" }]),
      { createTransport },
    );
    const first = await coordinator.refresh();

    await coordinator.shutdown();
    cloud.calls = [];
    const after = await coordinator.refresh();
    coordinator.start();

    expect(after).toMatchObject({ success: false, error: "Poll cycle cancelled." });
    expect(after.snapshot).toBe(first.snapshot);
    expect(createTransport).toHaveBeenCalledTimes(1);
    expect(cloud.calls).toEqual([]);
    expect(coordinator.getState()).toBe("idle");
  });

  it("should record every completed cycle and survive recorder failures", async () => {
    const recordPoll = jest
      .fn<(id: string, r: PollCycleResult) => Promise<void>>()
      .mockRejectedValueOnce(new Error("database is locked"))
      .mockResolvedValue(undefined);
    const coordinator = coordinatorFor(
      cloudEntry([{ serial: INVERTER_A, type: "inverter" }]),
      { http: stockCloud() },
      { recorder: { recordPoll } },
    );

    const first = await coordinator.refresh();
    await coordinator.refresh();

    expect(first.success).toBe(true);
    expect(recordPoll).toHaveBeenCalledTimes(2);
    expect(recordPoll.mock.calls[0][0]).toBe("entry-1");
  });

  it("should cancel the in-flight cycle on shutdown without recording it", async () => {
    const cloud = stockCloud();
    cloud.before = (method) =>
      method === "readRuntime" ? new Promise<void>(() => undefined) : undefined;
    const recordPoll = jest.fn<(id: string, r: PollCycleResult) => Promise<void>>();
    const coordinator = coordinatorFor(
      cloudEntry([{ serial: INVERTER_A, type: "inverter" }]),
      { http: cloud },
      { recorder: { recordPoll } },
    );

    const cycle = coordinator.refresh();
    await new Promise((resolve) => setImmediate(resolve));
    await coordinator.shutdown();
    const result = await cycle;

    expect(result.success).toBe(false);
    expect(result.error).toBe("Poll cycle cancelled.");
    expect(recordPoll).not.toHaveBeenCalled();
    expect(cloud.disconnected).toBe(true);
  });

  it("should apply lifetime tracking to published values", async () => {
    const cloud = stockCloud();
    const coordinator = coordinatorFor(cloudEntry([{ serial: INVERTER_A, type: "inverter" }]), {
      http: cloud,
    });

    await coordinator.refresh();
    expect(coordinator.getTrackedValue(INVERTER_A, "yield_lifetime")).toBe(9021);

    cloud.devices[INVERTER_A].energy = { todayYielding: 190, totalYielding: 90100 };
    await coordinator.refresh();
    expect(coordinator.getTrackedValue(INVERTER_A, "yield_lifetime")).toBe(9021);
    expect(coordinator.getTrackedValue(INVERTER_A, "ac_power")).toBe(1500);
  });
});

describe("pollIntervalSeconds", () => {
  it("should poll local entries faster than cloud entries", () => {
    expect(pollIntervalSeconds(fleetEntryDataSchema.parse({ connectionType: "http" }))).toBe(30);
    expect(
      pollIntervalSeconds(
        fleetEntryDataSchema.parse({
          connectionType: "hybrid",
          hybridLocalType: "modbus",
          modbusHost: "192.168.1.50",
        }),
      ),
    ).toBe(5);
  });

  it("should clamp the configured interval", () => {
    expect(
      pollIntervalSeconds(fleetEntryDataSchema.parse({ connectionType: "http", scanIntervalSeconds: 1 })),
    ).toBe(5);
    expect(
      pollIntervalSeconds(fleetEntryDataSchema.parse({ connectionType: "http", scanIntervalSeconds: 900 })),
    ).toBe(300);
  });
});
