import { normalize, toNumber } from "./field-mapper";
import type { RawBatteryPayload, TransportKind } from "@/lib/transports/types";
import type { SensorMap } from "@/lib/types/snapshot";

const KEY_SEPARATOR = "_Battery_ID_";
const KEY_PREFIX = "Battery_ID_";
const SHORT_PREFIX = "BAT";

/**
 * Turn a raw battery key into a stable identifier.
 *
 * Examples:
 *   "1234567890_Battery_ID_01" -> "1234567890-01"
 *   "Battery_ID_01" (parent 4512670118) -> "4512670118-01"
 *   "BAT001" -> "BAT001"
 *   "3" (parent 4512670118) -> "4512670118-03"
 */
export function cleanBatteryKey(rawKey: string, parentSerial: string): string {
  if (!rawKey) {
    return "01";
  }

  if (rawKey.includes(KEY_SEPARATOR)) {
    const parts = rawKey.split(KEY_SEPARATOR);
    if (parts.length === 2) {
      return `${parts[0]}-${parts[1]}`;
    }
  }

  if (rawKey.startsWith(KEY_PREFIX)) {
    return `${parentSerial}-${rawKey.slice(KEY_PREFIX.length)}`;
  }

  if (rawKey.startsWith(SHORT_PREFIX)) {
    return rawKey;
  }

  if (/^\d{1,2}$/.test(rawKey)) {
    return `${parentSerial}-${rawKey.padStart(2, "0")}`;
  }

  return rawKey.replace(/_/g, "-");
}

function addCellVoltageDelta(sensors: SensorMap): void {
  const max = toNumber(sensors.battery_cell_voltage_max_mv);
  const min = toNumber(sensors.battery_cell_voltage_min_mv);
  if (max !== null && min !== null) {
    sensors.battery_cell_voltage_delta_mv = max - min;
  }
}

/**
 * Normalize every battery unit in a battery payload, keyed by cleaned key.
 * Units that produce no sensors are left out.
 */
export function normalizeBatteryUnits(
  kind: TransportKind,
  payload: RawBatteryPayload,
  parentSerial: string,
): Record<string, SensorMap> {
  const batteries: Record<string, SensorMap> = {};

  for (const unit of payload.units) {
    const sensors = normalize(kind, { section: "batteryUnit", fields: unit.fields });
    if (Object.keys(sensors).length === 0) continue;

    addCellVoltageDelta(sensors);
    batteries[cleanBatteryKey(unit.key, parentSerial)] = sensors;
  }

  return batteries;
}
