import { z } from "zod";
import { DONGLE_CONFIG, MODBUS_CONFIG } from "@/config";

/**
 * Fleet entry configuration records.
 *
 * Stored as JSON by FleetEntriesManager and parsed back through
 * fleetEntryDataSchema on every load.
 */

export const connectionTypeSchema = z.enum(["http", "hybrid", "local"]);
export type ConnectionType = z.infer<typeof connectionTypeSchema>;

export const localTypeSchema = z.enum(["modbus", "dongle"]);
export type LocalType = z.infer<typeof localTypeSchema>;

export const gridTypeSchema = z.enum([
  "split_phase",
  "single_phase",
  "three_phase",
]);
export type GridType = z.infer<typeof gridTypeSchema>;

export const localTransportConfigSchema = z.object({
  serial: z.string(),
  transportType: z.enum(["modbus_tcp", "wifi_dongle"]),
  host: z.string().min(1),
  port: z.number().int().positive(),
  unitId: z.number().int().min(0).max(255).optional(),
  dongleSerial: z.string().optional(),
  inverterFamily: z.string(),
  gridType: gridTypeSchema.optional(),
  deviceTypeCode: z.number().int().optional(),
});
export type LocalTransportConfig = z.infer<typeof localTransportConfigSchema>;

export const configuredDeviceSchema = z.object({
  serial: z.string().min(1),
  type: z.enum(["inverter", "gridboss", "parallel_group"]),
  model: z.string().optional(),
  /** Inverter whose aggregate energy represents a parallel group */
  leaderSerial: z.string().optional(),
  /** Inverters summed into a parallel group read locally; every inverter when absent */
  memberSerials: z.array(z.string().min(1)).optional(),
  gridType: gridTypeSchema.optional(),
});
export type ConfiguredDevice = z.infer<typeof configuredDeviceSchema>;

export const fleetEntryDataSchema = z.object({
  connectionType: connectionTypeSchema,

  // Cloud credentials
  username: z.string().optional(),
  password: z.string().optional(),
  baseUrl: z.string().optional(),
  verifySsl: z.boolean().optional(),
  plantId: z.string().optional(),
  plantName: z.string().optional(),

  // Local transport
  hybridLocalType: localTypeSchema.optional(),
  localTransports: z.array(localTransportConfigSchema).optional(),
  modbusHost: z.string().optional(),
  modbusPort: z.number().int().optional(),
  modbusUnitId: z.number().int().optional(),
  dongleHost: z.string().optional(),
  donglePort: z.number().int().optional(),
  dongleSerial: z.string().optional(),
  inverterSerial: z.string().optional(),
  inverterFamily: z.string().optional(),

  devices: z.array(configuredDeviceSchema).default([]),
  timezone: z.string().optional(),
  stationName: z.string().optional(),
  scanIntervalSeconds: z.number().int().optional(),
});
export type FleetEntryData = z.infer<typeof fleetEntryDataSchema>;

export interface FleetEntry {
  id: string;
  title: string;
  data: FleetEntryData;
}

/**
 * Keys written only by local-transport configuration
 */
export const LOCAL_TRANSPORT_KEYS = [
  "hybridLocalType",
  "localTransports",
  "modbusHost",
  "modbusPort",
  "modbusUnitId",
  "dongleHost",
  "donglePort",
  "dongleSerial",
  "inverterSerial",
  "inverterFamily",
] as const satisfies readonly (keyof FleetEntryData)[];

export const CLOUD_CREDENTIAL_KEYS = [
  "username",
  "password",
  "baseUrl",
  "verifySsl",
  "plantId",
  "plantName",
] as const satisfies readonly (keyof FleetEntryData)[];

export function hasCloudCredentials(data: FleetEntryData): boolean {
  return Boolean(data.username && data.plantId);
}

/**
 * Local transports of an entry, including the single-transport fields
 * written by older configurations
 */
export function resolveLocalTransports(data: FleetEntryData): LocalTransportConfig[] {
  if (data.localTransports && data.localTransports.length > 0) {
    return data.localTransports;
  }

  const family = data.inverterFamily ?? "";
  if (data.hybridLocalType === "modbus" && data.modbusHost) {
    return [
      {
        serial: data.inverterSerial ?? "",
        transportType: "modbus_tcp",
        host: data.modbusHost,
        port: data.modbusPort ?? MODBUS_CONFIG.defaultPort,
        unitId: data.modbusUnitId,
        inverterFamily: family,
      },
    ];
  }
  if (data.hybridLocalType === "dongle" && data.dongleHost) {
    return [
      {
        serial: data.inverterSerial ?? "",
        transportType: "wifi_dongle",
        host: data.dongleHost,
        port: data.donglePort ?? DONGLE_CONFIG.defaultPort,
        dongleSerial: data.dongleSerial,
        inverterFamily: family,
      },
    ];
  }
  return [];
}

/**
 * Devices to poll: the configured list, or one inverter per local transport
 */
export function resolveDevices(data: FleetEntryData): ConfiguredDevice[] {
  if (data.devices.length > 0) return data.devices;
  return resolveLocalTransports(data)
    .filter((config) => config.serial)
    .map((config) => ({
      serial: config.serial,
      type: "inverter" as const,
      gridType: config.gridType,
    }));
}
