import { FIRMWARE_FALLBACK } from "@/config";
import { toNumber } from "@/lib/mapping/field-mapper";
import type { GridType } from "@/lib/types/fleet-entry";
import type { DeviceRecord, SensorMap } from "@/lib/types/snapshot";

export interface DeviceFeatures {
  inverterFamily?: string;
  supportsSplitPhase?: boolean;
  supportsThreePhase?: boolean;
}

const LEGACY_FAMILY_MAP: Record<string, string> = {
  SNA: "EG4_OFFGRID",
  PV_SERIES: "EG4_HYBRID",
  LXP_EU: "LXP",
  LXP_LV: "LXP",
};

const FAMILY_DEFAULT_MODELS: Record<string, string> = {
  EG4_HYBRID: "18kPV",
  EG4_OFFGRID: "12000XP",
  LXP: "LXP",
};

// Device type codes from holding register 19
const DEVICE_TYPE_LXP_EU = 12;
const DEVICE_TYPE_LXP_LB = 44;

export const SPLIT_PHASE_ONLY_SENSORS: ReadonlySet<string> = new Set([
  "eps_power_l1",
  "eps_power_l2",
  "eps_voltage_l1",
  "eps_voltage_l2",
  "grid_voltage_l1",
  "grid_voltage_l2",
  "output_power",
]);

export const THREE_PHASE_ONLY_SENSORS: ReadonlySet<string> = new Set([
  "grid_voltage_r",
  "grid_voltage_s",
  "grid_voltage_t",
  "grid_current_l1",
  "grid_current_l2",
  "grid_current_l3",
  "eps_voltage_r",
  "eps_voltage_s",
  "eps_voltage_t",
]);

export function normalizeFamily(family: string | undefined): string | undefined {
  if (!family || family === "MID_DEVICE") return undefined;
  return LEGACY_FAMILY_MAP[family] ?? family;
}

/**
 * Derive phase capabilities from inverter family and device type code.
 * Unknown families return no flags, so every phase sensor is kept.
 */
export function featuresFromFamily(
  family: string | undefined,
  deviceTypeCode?: number,
  gridType?: GridType,
): DeviceFeatures {
  const mapped = normalizeFamily(family);
  let features: DeviceFeatures = {};

  if (mapped === "EG4_OFFGRID" || mapped === "EG4_HYBRID") {
    features = {
      inverterFamily: mapped,
      supportsSplitPhase: true,
      supportsThreePhase: false,
    };
  } else if (mapped === "LXP" && deviceTypeCode === DEVICE_TYPE_LXP_EU) {
    features = {
      inverterFamily: mapped,
      supportsSplitPhase: false,
      supportsThreePhase: true,
    };
  } else if (mapped === "LXP" && deviceTypeCode === DEVICE_TYPE_LXP_LB) {
    features = {
      inverterFamily: mapped,
      supportsSplitPhase: true,
      supportsThreePhase: false,
    };
  }

  if (features.inverterFamily && gridType) {
    features.supportsSplitPhase = gridType === "split_phase";
    features.supportsThreePhase = gridType === "three_phase";
  }

  return features;
}

/**
 * Drop phase-specific sensors the device cannot measure.
 * A missing flag means "include".
 */
export function filterPhaseSensors(
  sensors: SensorMap,
  features: DeviceFeatures,
): SensorMap {
  const filtered: SensorMap = {};
  for (const [key, value] of Object.entries(sensors)) {
    if (features.supportsSplitPhase === false && SPLIT_PHASE_ONLY_SENSORS.has(key)) {
      continue;
    }
    if (features.supportsThreePhase === false && THREE_PHASE_ONLY_SENSORS.has(key)) {
      continue;
    }
    filtered[key] = value;
  }
  return filtered;
}

export function deriveModel(
  configuredModel: string | undefined,
  family: string | undefined,
): string {
  if (configuredModel) return configuredModel;
  const mapped = normalizeFamily(family);
  return (mapped && FAMILY_DEFAULT_MODELS[mapped]) || "Unknown";
}

/**
 * Firmware from the payload's firmware code, then the transport, then the
 * fallback. Never blank.
 */
export function resolveFirmware(
  sensors: SensorMap,
  transportFirmware?: string,
): string {
  const code = sensors.firmware_code;
  if (typeof code === "string" && code.trim()) return code.trim();
  if (transportFirmware && transportFirmware.trim()) return transportFirmware.trim();
  return FIRMWARE_FALLBACK;
}

function sumPhases(sensors: SensorMap, prefix: string): number | null {
  const l1 = toNumber(sensors[`${prefix}_l1`]);
  const l2 = toNumber(sensors[`${prefix}_l2`]);
  if (l1 === null && l2 === null) return null;
  return (l1 ?? 0) + (l2 ?? 0);
}

function addInverterDerived(sensors: SensorMap): void {
  const toUser = toNumber(sensors.grid_import_power);
  const toGrid = toNumber(sensors.grid_export_power);
  if (toUser !== null && toGrid !== null) {
    sensors.grid_power = toUser - toGrid;
  }

  if (sensors.pv_total_power === undefined) {
    const strings = ["pv1_power", "pv2_power", "pv3_power"]
      .map((key) => toNumber(sensors[key]))
      .filter((value): value is number => value !== null);
    if (strings.length > 0) {
      sensors.pv_total_power = strings.reduce((sum, value) => sum + value, 0);
    }
  }
}

function addGridbossDerived(sensors: SensorMap): void {
  for (const prefix of ["grid_power", "load_power", "ups_power", "generator_power"]) {
    if (sensors[prefix] !== undefined) continue;
    const total = sumPhases(sensors, prefix);
    if (total !== null) sensors[prefix] = total;
  }

  if (sensors.load_power !== undefined) {
    sensors.consumption_power = sensors.load_power;
  }
}

/**
 * Smart ports reported as "Unused" carry no smart-load or AC-couple data
 */
function dropUnusedSmartPorts(sensors: SensorMap): SensorMap {
  const unused: string[] = [];
  for (const port of [1, 2, 3, 4]) {
    if (sensors[`smart_port${port}_status`] === "Unused") {
      unused.push(`smart_load${port}_`, `ac_couple${port}_`);
    }
  }
  if (unused.length === 0) return sensors;

  const kept: SensorMap = {};
  for (const [key, value] of Object.entries(sensors)) {
    if (!unused.some((prefix) => key.startsWith(prefix))) {
      kept[key] = value;
    }
  }
  return kept;
}

function withMetadata(
  sensors: SensorMap,
  firmwareVersion: string,
  transportLabel: string,
): SensorMap {
  const rest = { ...sensors };
  delete rest.firmware_code;
  return {
    ...rest,
    firmware_version: firmwareVersion,
    connection_transport: transportLabel,
  };
}

export interface InverterParts {
  serial: string;
  model: string;
  runtime: SensorMap;
  energy: SensorMap;
  batteryBank: SensorMap;
  batteries: Record<string, SensorMap>;
  features: DeviceFeatures;
  transportLabel: string;
  transportFirmware?: string;
}

export function assembleInverter(parts: InverterParts): DeviceRecord {
  const merged: SensorMap = {
    ...parts.runtime,
    ...parts.energy,
    ...parts.batteryBank,
  };
  addInverterDerived(merged);

  const firmwareVersion = resolveFirmware(merged, parts.transportFirmware);
  const sensors = filterPhaseSensors(
    withMetadata(merged, firmwareVersion, parts.transportLabel),
    parts.features,
  );

  return {
    serial: parts.serial,
    type: "inverter",
    model: parts.model,
    firmwareVersion,
    sensors,
    batteries: parts.batteries,
  };
}

export interface GridbossParts {
  serial: string;
  model?: string;
  midbox: SensorMap;
  transportLabel: string;
  transportFirmware?: string;
}

export function assembleGridboss(parts: GridbossParts): DeviceRecord {
  const merged: SensorMap = { ...parts.midbox };
  addGridbossDerived(merged);

  const firmwareVersion = resolveFirmware(merged, parts.transportFirmware);
  return {
    serial: parts.serial,
    type: "gridboss",
    model: parts.model || "GridBOSS",
    firmwareVersion,
    sensors: dropUnusedSmartPorts(
      withMetadata(merged, firmwareVersion, parts.transportLabel),
    ),
    batteries: {},
  };
}

const GROUP_SUM_KEYS = [
  "pv_total_power",
  "grid_power",
  "grid_import_power",
  "grid_export_power",
  "consumption_power",
  "eps_power",
  "battery_power",
  "ac_power",
  "output_power",
  "yield",
  "charging",
  "discharging",
  "grid_import",
  "grid_export",
  "consumption",
  "yield_lifetime",
  "charging_lifetime",
  "discharging_lifetime",
  "grid_import_lifetime",
  "grid_export_lifetime",
  "consumption_lifetime",
];

const GROUP_AVERAGE_KEYS = ["state_of_charge", "battery_voltage"];

function roundTenths(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Group sensors built from member inverter records: power and energy are
 * summed, state of charge and battery voltage averaged. Members that failed
 * this cycle are left out.
 */
export function aggregateParallelMembers(members: readonly DeviceRecord[]): SensorMap {
  const reporting = members.filter((member) => member.error === undefined);
  const valuesOf = (key: string): number[] =>
    reporting.flatMap((member) => {
      const value = toNumber(member.sensors[key]);
      return value === null ? [] : [value];
    });

  const sensors: SensorMap = {};
  for (const key of GROUP_SUM_KEYS) {
    const values = valuesOf(key);
    if (values.length > 0) {
      sensors[key] = roundTenths(values.reduce((total, value) => total + value, 0));
    }
  }
  for (const key of GROUP_AVERAGE_KEYS) {
    const values = valuesOf(key);
    if (values.length > 0) {
      sensors[key] = roundTenths(
        values.reduce((total, value) => total + value, 0) / values.length,
      );
    }
  }
  return sensors;
}

export interface ParallelGroupParts {
  serial: string;
  model?: string;
  sensors: SensorMap;
  transportLabel: string;
  leaderFirmware?: string;
}

export function assembleParallelGroup(parts: ParallelGroupParts): DeviceRecord {
  const firmwareVersion = resolveFirmware(parts.sensors, parts.leaderFirmware);
  return {
    serial: parts.serial,
    type: "parallel_group",
    model: parts.model || "Parallel Group",
    firmwareVersion,
    sensors: withMetadata(parts.sensors, firmwareVersion, parts.transportLabel),
    batteries: {},
  };
}

/**
 * Placeholder record for a device whose reads failed this cycle
 */
export function erroredRecord(
  serial: string,
  type: DeviceRecord["type"],
  model: string,
  error: string,
): DeviceRecord {
  return {
    serial,
    type,
    model,
    firmwareVersion: FIRMWARE_FALLBACK,
    sensors: {},
    batteries: {},
    error,
  };
}
