/**
 * Capability contract every transport driver implements.
 *
 * All reads are fallible. Drivers throw AuthError, ConnectionError or
 * DecodingError (see lib/errors.ts); the coordinator classifies anything else.
 */

export type TransportKind = "http" | "modbus" | "dongle";

export type PayloadSection =
  | "runtime"
  | "energy"
  | "parallelEnergy"
  | "battery"
  | "batteryUnit"
  | "midbox";

/** Raw, unscaled fields exactly as the transport reported them */
export type RawFields = Record<string, unknown>;

export interface RawPayload {
  section: PayloadSection;
  fields: RawFields;
}

export interface RawBatteryUnit {
  key: string;
  fields: RawFields;
}

export interface RawBatteryPayload {
  /** Bank-level fields */
  fields: RawFields;
  units: RawBatteryUnit[];
}

export interface EnergyReadOptions {
  /** Read the parallel group's aggregate energy instead of one inverter's */
  aggregate?: boolean;
}

export interface DeviceTransport {
  readonly kind: TransportKind;
  /** Human-readable label, e.g. "Cloud" or "Modbus" */
  readonly label: string;
  /** Safe to run several calls against one session at once */
  readonly sessionSafe: boolean;
  readonly host?: string;

  connect(): Promise<void>;
  readRuntime(serial: string): Promise<RawFields>;
  readEnergy(serial: string, options?: EnergyReadOptions): Promise<RawFields>;
  readBattery(serial: string): Promise<RawBatteryPayload>;
  readMidbox(serial: string): Promise<RawFields>;
  readDeviceType(serial: string): Promise<number>;
  readFirmwareVersion(serial: string): Promise<string>;
  readParallelConfig(serial: string): Promise<number>;
  disconnect(): Promise<void>;
}

export interface StationInfo {
  name: string;
  country?: string;
  timezone?: string;
  address?: string;
}

export interface RequestStats {
  requestRatePerMinute: number;
  requestsToday: number;
}

/**
 * Cloud transport adds plant metadata and request accounting
 */
export interface CloudTransport extends DeviceTransport {
  readonly kind: "http";
  readStation(plantId: string): Promise<StationInfo>;
  getRequestStats(): RequestStats;
}

export function isCloudTransport(
  transport: DeviceTransport,
): transport is CloudTransport {
  return transport.kind === "http" && "readStation" in transport;
}

/**
 * Connection settings handed to a transport factory
 */
export interface TransportEndpoint {
  kind: TransportKind;
  host?: string;
  port?: number;
  unitId?: number;
  dongleSerial?: string;
  inverterSerial?: string;
  username?: string;
  password?: string;
  baseUrl?: string;
  verifySsl?: boolean;
  timeoutMs?: number;
}

/**
 * Result of probing a newly entered local transport
 */
export interface ProbeResult {
  /** Serial reported by the device, if the transport can read it */
  detectedSerial?: string;
  deviceTypeCode?: number;
  firmwareVersion?: string;
}
