import { EventEmitter } from "events";
import { ERROR_MESSAGES, POLLING_CONFIG } from "@/config";
import { AuthError, ConnectionError, classifyError } from "@/lib/errors";
import type { PollFailure } from "@/lib/errors";
import { normalize, toNumber } from "@/lib/mapping/field-mapper";
import { normalizeBatteryUnits } from "@/lib/mapping/battery";
import { SensorStateTracker } from "@/lib/tracking/sensor-state-tracker";
import { TransportRegistry } from "@/lib/transports/registry";
import { isCloudTransport } from "@/lib/transports/types";
import type {
  DeviceTransport,
  PayloadSection,
  RawFields,
  TransportEndpoint,
} from "@/lib/transports/types";
import { resolveDevices, resolveLocalTransports } from "@/lib/types/fleet-entry";
import type {
  ConfiguredDevice,
  FleetEntry,
  FleetEntryData,
  LocalTransportConfig,
} from "@/lib/types/fleet-entry";
import type {
  DeviceInfo,
  DeviceRecord,
  SensorMap,
  SensorValue,
  Snapshot,
  StationRecord,
} from "@/lib/types/snapshot";
import {
  aggregateParallelMembers,
  assembleGridboss,
  assembleInverter,
  assembleParallelGroup,
  deriveModel,
  erroredRecord,
  featuresFromFamily,
} from "./device-assembly";
import type {
  CoordinatorState,
  FailedDevice,
  PollCycleResult,
  PollingStatusRecorder,
  SnapshotView,
} from "./types";

export interface FleetCoordinatorDeps {
  createTransport?: (endpoint: TransportEndpoint) => DeviceTransport;
  tracker?: SensorStateTracker;
  recorder?: PollingStatusRecorder;
  clock?: () => Date;
  callTimeoutMs?: number;
}

interface TransportBinding {
  transport: DeviceTransport;
  cloud: boolean;
  local?: LocalTransportConfig;
  /** Tail of the call queue for transports that are not session-safe */
  tail: Promise<void>;
}

interface CycleContext {
  signal: AbortSignal;
  needsReauthentication: boolean;
  reauth?: Promise<void>;
}

interface CachedDeviceInfo {
  deviceTypeCode?: number;
  firmwareVersion?: string;
  parallelConfig?: number;
}

interface DevicePoll {
  record: DeviceRecord;
  info?: DeviceInfo;
}

/**
 * Poll interval in seconds for an entry
 */
export function pollIntervalSeconds(data: FleetEntryData): number {
  const base =
    resolveLocalTransports(data).length > 0
      ? POLLING_CONFIG.localIntervalSeconds
      : POLLING_CONFIG.cloudIntervalSeconds;
  const requested = data.scanIntervalSeconds ?? base;
  return Math.min(
    POLLING_CONFIG.maxIntervalSeconds,
    Math.max(POLLING_CONFIG.minIntervalSeconds, requested),
  );
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function endpointFor(config: LocalTransportConfig): TransportEndpoint {
  if (config.transportType === "wifi_dongle") {
    return {
      kind: "dongle",
      host: config.host,
      port: config.port,
      dongleSerial: config.dongleSerial,
      inverterSerial: config.serial,
    };
  }
  return {
    kind: "modbus",
    host: config.host,
    port: config.port,
    unitId: config.unitId,
    inverterSerial: config.serial,
  };
}

/**
 * Polls one fleet entry.
 *
 * At most one cycle runs at a time; refresh() calls made while a cycle is in
 * flight share its result. Each device is polled independently, so one
 * failing device never drops another device's data. The published snapshot
 * is replaced as a whole and frozen.
 *
 * Events: "snapshot" (Snapshot), "cycle" (PollCycleResult),
 * "reauth-required" (entry id), "unavailable" and "available".
 */
export class FleetCoordinator extends EventEmitter {
  private entry: FleetEntry;
  private createTransport: (endpoint: TransportEndpoint) => DeviceTransport;
  private tracker: SensorStateTracker;
  private recorder?: PollingStatusRecorder;
  private clock: () => Date;
  private callTimeoutMs: number;

  private bindings?: Map<string, TransportBinding>;
  private cloudBinding?: TransportBinding;
  private bindingErrors = new Map<string, string>();
  private deviceCache = new Map<string, CachedDeviceInfo>();

  private snapshot?: Snapshot;
  private stale = false;
  private cycle = 0;
  private state: CoordinatorState = "idle";
  private available = true;
  private inFlight?: Promise<PollCycleResult>;
  private abortController?: AbortController;
  private intervalId?: NodeJS.Timeout;
  private closed = false;

  constructor(entry: FleetEntry, deps: FleetCoordinatorDeps = {}) {
    super();
    this.entry = entry;
    this.createTransport =
      deps.createTransport ?? ((endpoint) => TransportRegistry.create(endpoint));
    this.clock = deps.clock ?? (() => new Date());
    this.recorder = deps.recorder;
    this.callTimeoutMs = deps.callTimeoutMs ?? POLLING_CONFIG.callTimeoutMs;
    this.tracker =
      deps.tracker ??
      new SensorStateTracker({
        timezone: () => this.snapshot?.station?.timezone ?? this.entry.data.timezone,
        clock: this.clock,
        label: `SensorStateTracker:${entry.id}`,
      });
  }

  get entryId(): string {
    return this.entry.id;
  }

  getState(): CoordinatorState {
    return this.state;
  }

  getSnapshot(): SnapshotView {
    return { snapshot: this.snapshot, stale: this.stale };
  }

  /**
   * Start the repeating timer and run a first cycle
   */
  start(): void {
    if (this.closed) {
      console.warn(`[FleetCoordinator] ${this.entry.id} has been shut down; not starting`);
      return;
    }
    if (this.intervalId) {
      console.log(`[FleetCoordinator] ${this.entry.id} already running`);
      return;
    }

    const intervalSeconds = pollIntervalSeconds(this.entry.data);
    console.log(
      `[FleetCoordinator] Starting ${this.entry.id} (${this.entry.title}), polling every ${intervalSeconds}s`,
    );

    this.intervalId = setInterval(() => {
      void this.refresh();
    }, intervalSeconds * 1000);
    void this.refresh();
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      console.log(`[FleetCoordinator] Stopped ${this.entry.id}`);
    }
  }

  /**
   * Run a poll cycle, or join the one already in flight
   */
  refresh(): Promise<PollCycleResult> {
    if (this.inFlight) {
      return this.inFlight;
    }
    if (this.closed) {
      return Promise.resolve(this.closedResult());
    }

    const cycle = this.runCycle().finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = cycle;
    return cycle;
  }

  /**
   * Stop polling, cancel the in-flight cycle and release transports
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    this.stop();
    this.abortController?.abort();

    if (this.inFlight) {
      await this.inFlight;
    }

    const transports = new Set<DeviceTransport>();
    for (const binding of this.bindings?.values() ?? []) {
      transports.add(binding.transport);
    }
    if (this.cloudBinding) transports.add(this.cloudBinding.transport);

    for (const transport of transports) {
      try {
        await transport.disconnect();
      } catch (error) {
        console.error(
          `[FleetCoordinator] Failed to disconnect ${transport.label} for ${this.entry.id}:`,
          error,
        );
      }
    }

    this.bindings = undefined;
    this.cloudBinding = undefined;
    this.bindingErrors.clear();
    this.tracker.clear();
    console.log(`[FleetCoordinator] Shut down ${this.entry.id}`);
  }

  /**
   * Result of a refresh() after shutdown. No transport is created or called.
   */
  private closedResult(): PollCycleResult {
    console.warn(`[FleetCoordinator] ${this.entry.id} has been shut down; refresh ignored`);
    return {
      snapshot: this.snapshot,
      success: false,
      degraded: false,
      failedDevices: [],
      needsReauthentication: false,
      startedAt: this.clock(),
      durationMs: 0,
      error: ERROR_MESSAGES.POLL_CANCELLED,
    };
  }

  /**
   * Tracked value of a device sensor from the current snapshot
   */
  getTrackedValue(serial: string, sensorKey: string): SensorValue | null {
    const value = this.snapshot?.devices[serial]?.sensors[sensorKey];
    return this.tracker.track(serial, sensorKey, value);
  }

  getTrackedBatteryValue(
    serial: string,
    batteryKey: string,
    sensorKey: string,
  ): SensorValue | null {
    const value = this.snapshot?.devices[serial]?.batteries[batteryKey]?.[sensorKey];
    return this.tracker.track(
      SensorStateTracker.batteryDeviceKey(serial, batteryKey),
      sensorKey,
      value,
    );
  }

  private ensureBindings(): Map<string, TransportBinding> {
    if (this.bindings) return this.bindings;

    const bindings = new Map<string, TransportBinding>();
    const { data } = this.entry;

    if (data.connectionType !== "local" && data.username && data.password) {
      try {
        this.cloudBinding = {
          transport: this.createTransport({
            kind: "http",
            username: data.username,
            password: data.password,
            baseUrl: data.baseUrl,
            verifySsl: data.verifySsl,
          }),
          cloud: true,
          tail: Promise.resolve(),
        };
      } catch (error) {
        console.error(
          `[FleetCoordinator] Cannot create cloud transport for ${this.entry.id}:`,
          error,
        );
        this.bindingErrors.set("*", classifyError(error).message);
      }
    }

    if (data.connectionType !== "http") {
      for (const config of resolveLocalTransports(data)) {
        const serial = config.serial || data.inverterSerial || "";
        try {
          const transport = this.createTransport(endpointFor(config));
          bindings.set(serial, {
            transport,
            cloud: isCloudTransport(transport),
            local: config,
            tail: Promise.resolve(),
          });
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          console.error(
            `[FleetCoordinator] Cannot create ${config.transportType} transport for ${serial}: ${message}`,
          );
          this.bindingErrors.set(serial, message);
        }
      }
    }

    this.bindings = bindings;
    return bindings;
  }

  private bindingFor(serial: string): TransportBinding | undefined {
    return this.ensureBindings().get(serial) ?? this.cloudBinding;
  }

  private noTransportMessage(serial: string): string {
    return (
      this.bindingErrors.get(serial) ??
      this.bindingErrors.get("*") ??
      `No transport configured for ${serial}`
    );
  }

  /**
   * Run one transport call with the call timeout, honouring cancellation
   */
  private guard<T>(task: () => Promise<T>, label: string, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (signal.aborted) {
        reject(new ConnectionError(ERROR_MESSAGES.POLL_CANCELLED));
        return;
      }

      const onAbort = () => {
        cleanup();
        reject(new ConnectionError(ERROR_MESSAGES.POLL_CANCELLED));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new ConnectionError(`${ERROR_MESSAGES.TIMEOUT} (${label})`, "timeout"));
      }, this.callTimeoutMs);
      const cleanup = () => {
        clearTimeout(timer);
        signal.removeEventListener("abort", onAbort);
      };
      signal.addEventListener("abort", onAbort, { once: true });

      void Promise.resolve()
        .then(task)
        .then(
          (value) => {
            cleanup();
            resolve(value);
          },
          (error: unknown) => {
            cleanup();
            reject(error);
          },
        );
    });
  }

  private invoke<T>(
    binding: TransportBinding,
    label: string,
    read: (transport: DeviceTransport) => Promise<T>,
    context: CycleContext,
  ): Promise<T> {
    if (binding.transport.sessionSafe) {
      return this.guard(() => read(binding.transport), label, context.signal);
    }

    // The queue moves on when the transport call settles, not when the guard
    // gives up on it: a timed-out call still owns the connection
    let release: () => void = () => undefined;
    const previous = binding.tail;
    binding.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    let holding = false;
    return previous
      .then(() =>
        this.guard(
          () => {
            const task = read(binding.transport);
            holding = true;
            void task.then(release, release);
            return task;
          },
          label,
          context.signal,
        ),
      )
      .catch((error: unknown) => {
        if (!holding) release();
        throw error;
      });
  }

  /**
   * One transport call; an auth failure on the cloud session triggers a single
   * re-authentication per cycle and one retry
   */
  private async call<T>(
    binding: TransportBinding,
    label: string,
    read: (transport: DeviceTransport) => Promise<T>,
    context: CycleContext,
  ): Promise<T> {
    if (binding.cloud && context.needsReauthentication) {
      throw new AuthError(ERROR_MESSAGES.REAUTH_REQUIRED);
    }

    try {
      return await this.invoke(binding, label, read, context);
    } catch (error) {
      const failure = classifyError(error);
      if (!(failure instanceof AuthError) || !binding.cloud) {
        throw failure;
      }

      await this.reauthenticate(binding, context);

      try {
        return await this.invoke(binding, label, read, context);
      } catch (retryError) {
        const retryFailure = classifyError(retryError);
        if (retryFailure instanceof AuthError) {
          context.needsReauthentication = true;
        }
        throw retryFailure;
      }
    }
  }

  private reauthenticate(binding: TransportBinding, context: CycleContext): Promise<void> {
    if (!context.reauth) {
      console.warn(`[FleetCoordinator] ${this.entry.id}: ${ERROR_MESSAGES.SESSION_EXPIRED}`);
      context.reauth = this.invoke(
        binding,
        "connect",
        (transport) => transport.connect(),
        context,
      ).catch((error: unknown) => {
        const failure = classifyError(error);
        if (failure instanceof AuthError) {
          context.needsReauthentication = true;
          throw new AuthError(ERROR_MESSAGES.REAUTH_REQUIRED, failure.statusCode);
        }
        throw failure;
      });
    }
    return context.reauth;
  }

  /**
   * Optional identity reads for local transports, cached once they succeed
   */
  private async localDeviceInfo(
    serial: string,
    binding: TransportBinding,
    context: CycleContext,
  ): Promise<CachedDeviceInfo> {
    const cached = this.deviceCache.get(serial) ?? {};
    if (binding.cloud) return cached;

    const attempt = async <T>(
      label: string,
      read: (transport: DeviceTransport) => Promise<T>,
    ): Promise<T | undefined> => {
      try {
        return await this.call(binding, label, read, context);
      } catch (error) {
        console.warn(
          `[FleetCoordinator] ${label} failed for ${serial}: ${classifyError(error).message}`,
        );
        return undefined;
      }
    };

    if (cached.deviceTypeCode === undefined) {
      cached.deviceTypeCode = await attempt("readDeviceType", (t) =>
        t.readDeviceType(serial),
      );
    }
    if (cached.firmwareVersion === undefined) {
      cached.firmwareVersion = await attempt("readFirmwareVersion", (t) =>
        t.readFirmwareVersion(serial),
      );
    }
    if (cached.parallelConfig === undefined) {
      cached.parallelConfig = await attempt("readParallelConfig", (t) =>
        t.readParallelConfig(serial),
      );
    }

    this.deviceCache.set(serial, cached);
    return cached;
  }

  private map(binding: TransportBinding, section: PayloadSection, fields: RawFields): SensorMap {
    return normalize(binding.transport.kind, { section, fields });
  }

  private async pollInverter(
    device: ConfiguredDevice,
    binding: TransportBinding,
    context: CycleContext,
  ): Promise<DevicePoll> {
    const { serial } = device;
    const [runtime, energy, battery] = await Promise.all([
      this.call(binding, "readRuntime", (t) => t.readRuntime(serial), context),
      this.call(binding, "readEnergy", (t) => t.readEnergy(serial), context),
      this.call(binding, "readBattery", (t) => t.readBattery(serial), context),
    ]);
    const info = await this.localDeviceInfo(serial, binding, context);

    const family = binding.local?.inverterFamily || this.entry.data.inverterFamily;
    const deviceTypeCode =
      binding.local?.deviceTypeCode ??
      info.deviceTypeCode ??
      toNumber(runtime.deviceType) ??
      undefined;
    const model = deriveModel(device.model, family);
    const kind = binding.transport.kind;

    const record = assembleInverter({
      serial,
      model,
      runtime: this.map(binding, "runtime", runtime),
      energy: this.map(binding, "energy", energy),
      batteryBank: this.map(binding, "battery", battery.fields),
      batteries: normalizeBatteryUnits(kind, battery, serial),
      features: featuresFromFamily(
        family,
        deviceTypeCode,
        device.gridType ?? binding.local?.gridType,
      ),
      transportLabel: binding.transport.label,
      transportFirmware: info.firmwareVersion,
    });

    return {
      record,
      info: {
        model,
        firmwareVersion: record.firmwareVersion,
        transport: binding.transport.label,
        host: binding.transport.host,
        deviceTypeCode,
        parallelConfig: info.parallelConfig,
      },
    };
  }

  private async pollGridboss(
    device: ConfiguredDevice,
    binding: TransportBinding,
    context: CycleContext,
  ): Promise<DevicePoll> {
    const midbox = await this.call(
      binding,
      "readMidbox",
      (t) => t.readMidbox(device.serial),
      context,
    );
    const info = await this.localDeviceInfo(device.serial, binding, context);

    const record = assembleGridboss({
      serial: device.serial,
      model: device.model,
      midbox: this.map(binding, "midbox", midbox),
      transportLabel: binding.transport.label,
      transportFirmware: info.firmwareVersion,
    });

    return {
      record,
      info: {
        model: record.model,
        firmwareVersion: record.firmwareVersion,
        transport: binding.transport.label,
        host: binding.transport.host,
        deviceTypeCode: info.deviceTypeCode,
      },
    };
  }

  private async pollParallelGroup(
    device: ConfiguredDevice,
    binding: TransportBinding,
    context: CycleContext,
    records: Map<string, DeviceRecord>,
  ): Promise<DevicePoll> {
    const leader = device.leaderSerial ?? device.serial;
    const energy = await this.call(
      binding,
      "readEnergy(aggregate)",
      (t) => t.readEnergy(leader, { aggregate: true }),
      context,
    );

    const leaderRecord = records.get(leader);
    const record = assembleParallelGroup({
      serial: device.serial,
      model: device.model,
      sensors: this.map(binding, "parallelEnergy", energy),
      transportLabel: binding.transport.label,
      leaderFirmware:
        leaderRecord && !leaderRecord.error ? leaderRecord.firmwareVersion : undefined,
    });

    return {
      record,
      info: {
        model: record.model,
        firmwareVersion: record.firmwareVersion,
        transport: binding.transport.label,
        host: binding.transport.host,
      },
    };
  }

  /**
   * Parallel group without a cloud session, built from the member inverter
   * records of this cycle
   */
  private assembleLocalGroup(
    device: ConfiguredDevice,
    records: Map<string, DeviceRecord>,
  ): DevicePoll {
    const memberSerials =
      device.memberSerials ??
      resolveDevices(this.entry.data)
        .filter((candidate) => candidate.type === "inverter")
        .map((candidate) => candidate.serial);
    const members = memberSerials.flatMap((serial) => {
      const record = records.get(serial);
      return record && record.error === undefined ? [record] : [];
    });

    if (members.length === 0) {
      throw new ConnectionError(`No member inverter of ${device.serial} reported this cycle`);
    }

    const leader =
      members.find((member) => member.serial === (device.leaderSerial ?? memberSerials[0])) ??
      members[0];
    const leaderBinding = this.bindingFor(leader.serial);
    const transportLabel = leaderBinding?.transport.label ?? "Local";

    const record = assembleParallelGroup({
      serial: device.serial,
      model: device.model,
      sensors: aggregateParallelMembers(members),
      transportLabel,
      leaderFirmware: leader.firmwareVersion,
    });

    return {
      record,
      info: {
        model: record.model,
        firmwareVersion: record.firmwareVersion,
        transport: transportLabel,
        host: leaderBinding?.transport.host,
      },
    };
  }

  private fallbackModel(device: ConfiguredDevice): string {
    if (device.type === "gridboss") return device.model || "GridBOSS";
    if (device.type === "parallel_group") return device.model || "Parallel Group";
    const local = this.ensureBindings().get(device.serial)?.local;
    return deriveModel(device.model, local?.inverterFamily || this.entry.data.inverterFamily);
  }

  private async pollDevice(
    device: ConfiguredDevice,
    context: CycleContext,
    records: Map<string, DeviceRecord>,
  ): Promise<DevicePoll> {
    const binding = this.bindingFor(device.serial);

    try {
      if (device.type === "parallel_group" && !binding?.cloud) {
        return this.assembleLocalGroup(device, records);
      }
      if (!binding) {
        throw new ConnectionError(this.noTransportMessage(device.serial));
      }
      switch (device.type) {
        case "inverter":
          return await this.pollInverter(device, binding, context);
        case "gridboss":
          return await this.pollGridboss(device, binding, context);
        case "parallel_group":
          return await this.pollParallelGroup(device, binding, context, records);
      }
    } catch (error) {
      const failure: PollFailure = classifyError(error);
      const detail = failure instanceof ConnectionError ? ` (${failure.reason})` : "";
      console.error(
        `[FleetCoordinator] ${this.entry.id}: ${device.type} ${device.serial} failed: ${failure.name}${detail}: ${failure.message}`,
      );
      return {
        record: erroredRecord(
          device.serial,
          device.type,
          this.fallbackModel(device),
          failure.message,
        ),
      };
    }
  }

  private async pollStation(context: CycleContext): Promise<StationRecord | undefined> {
    const { data } = this.entry;
    const binding = this.cloudBinding;
    const transport = binding?.transport;

    if (binding && transport && isCloudTransport(transport) && data.plantId) {
      const plantId = data.plantId;
      try {
        const station = await this.call(
          binding,
          "readStation",
          () => transport.readStation(plantId),
          context,
        );
        const stats = transport.getRequestStats();
        return {
          ...station,
          timezone: station.timezone ?? data.timezone,
          apiRequestRate: stats.requestRatePerMinute,
          apiRequestsToday: stats.requestsToday,
        };
      } catch (error) {
        console.warn(
          `[FleetCoordinator] Station read failed for ${this.entry.id}: ${classifyError(error).message}`,
        );
        return this.snapshot?.station;
      }
    }

    if (data.stationName || data.plantName) {
      return {
        name: data.stationName ?? data.plantName ?? this.entry.title,
        timezone: data.timezone,
        apiRequestRate: 0,
        apiRequestsToday: 0,
      };
    }
    return undefined;
  }

  private async runCycle(): Promise<PollCycleResult> {
    const startedAt = this.clock();
    const controller = new AbortController();
    this.abortController = controller;
    this.state = "polling";

    const context: CycleContext = {
      signal: controller.signal,
      needsReauthentication: false,
    };

    const devices = resolveDevices(this.entry.data);
    this.ensureBindings();

    // Group records read their members' records, so members go first
    const records = new Map<string, DeviceRecord>();
    const deviceInfo: Record<string, DeviceInfo> = {};
    const collect = (poll: DevicePoll) => {
      records.set(poll.record.serial, poll.record);
      if (poll.info) deviceInfo[poll.record.serial] = poll.info;
    };

    const [members, station] = await Promise.all([
      Promise.all(
        devices
          .filter((device) => device.type !== "parallel_group")
          .map((device) => this.pollDevice(device, context, records)),
      ),
      this.pollStation(context),
    ]);
    members.forEach(collect);

    const groups = await Promise.all(
      devices
        .filter((device) => device.type === "parallel_group")
        .map((device) => this.pollDevice(device, context, records)),
    );
    groups.forEach(collect);

    const failedDevices: FailedDevice[] = [];
    for (const record of records.values()) {
      if (record.error !== undefined) {
        failedDevices.push({ serial: record.serial, error: record.error });
      }
    }

    const cancelled = controller.signal.aborted;
    const allFailed = devices.length > 0 && failedDevices.length === devices.length;
    // Rejected cloud credentials fail the cycle even when local reads worked
    const success = !cancelled && !allFailed && !context.needsReauthentication;

    if (success) {
      this.cycle++;
      const devicesBySerial: Record<string, DeviceRecord> = {};
      for (const device of devices) {
        const record = records.get(device.serial);
        if (record) devicesBySerial[device.serial] = record;
      }

      this.snapshot = deepFreeze({
        devices: devicesBySerial,
        station,
        deviceInfo,
        cycle: this.cycle,
        publishedAt: this.clock().toISOString(),
      });
      this.stale = false;
      this.emit("snapshot", this.snapshot);
    } else {
      this.stale = this.snapshot !== undefined;
    }

    const result: PollCycleResult = {
      snapshot: this.snapshot,
      success,
      degraded: success && failedDevices.length > 0,
      failedDevices,
      needsReauthentication: context.needsReauthentication,
      startedAt,
      durationMs: this.clock().getTime() - startedAt.getTime(),
      error: cancelled
        ? ERROR_MESSAGES.POLL_CANCELLED
        : allFailed
          ? ERROR_MESSAGES.ALL_DEVICES_FAILED
          : context.needsReauthentication
            ? ERROR_MESSAGES.REAUTH_REQUIRED
            : undefined,
    };

    this.state = success && failedDevices.length === 0 ? "idle" : "degraded";
    if (this.abortController === controller) {
      this.abortController = undefined;
    }

    if (!cancelled) {
      this.updateAvailability(success, result.error);
      await this.record(result);
    }

    if (context.needsReauthentication) {
      console.error(`[FleetCoordinator] ${this.entry.id}: ${ERROR_MESSAGES.REAUTH_REQUIRED}`);
      this.emit("reauth-required", this.entry.id);
    }

    console.log(
      `[FleetCoordinator] ${this.entry.id} cycle ${success ? "ok" : "failed"}: ` +
        `${devices.length - failedDevices.length}/${devices.length} devices in ${result.durationMs}ms`,
    );
    this.emit("cycle", result);
    return result;
  }

  private updateAvailability(success: boolean, error?: string): void {
    if (!success && this.available) {
      this.available = false;
      console.warn(`[FleetCoordinator] ${this.entry.id} is unavailable: ${error ?? "unknown"}`);
      this.emit("unavailable", this.entry.id);
    } else if (success && !this.available) {
      this.available = true;
      console.log(`[FleetCoordinator] ${this.entry.id} is back online`);
      this.emit("available", this.entry.id);
    }
  }

  private async record(result: PollCycleResult): Promise<void> {
    if (!this.recorder) return;
    try {
      await this.recorder.recordPoll(this.entry.id, result);
    } catch (error) {
      console.error(`[FleetCoordinator] Failed to record polling status:`, error);
    }
  }
}
