/**
 * Canonical snapshot model published by the coordinator
 */

export type DeviceType = "inverter" | "gridboss" | "parallel_group";

export type SensorValue = number | string;

export type SensorMap = Record<string, SensorValue>;

export interface DeviceRecord {
  serial: string;
  type: DeviceType;
  model: string;
  firmwareVersion: string;
  sensors: SensorMap;
  batteries: Record<string, SensorMap>;
  parameters?: Record<string, SensorValue>;
  /** Present only when the device failed this cycle */
  error?: string;
}

export interface StationRecord {
  name: string;
  country?: string;
  timezone?: string;
  address?: string;
  apiRequestRate: number;
  apiRequestsToday: number;
}

/**
 * Transport-level identity of a device, kept for diagnostics
 */
export interface DeviceInfo {
  model: string;
  firmwareVersion: string;
  transport: string;
  host?: string;
  deviceTypeCode?: number;
  parallelConfig?: number;
}

export interface Snapshot {
  devices: Record<string, DeviceRecord>;
  station?: StationRecord;
  deviceInfo: Record<string, DeviceInfo>;
  cycle: number;
  /** ISO timestamp */
  publishedAt: string;
}
