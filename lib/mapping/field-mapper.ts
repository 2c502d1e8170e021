import { fieldTables } from "./field-tables";
import type { FieldTables, ScaleOp } from "./field-tables";
import type { RawPayload, TransportKind } from "@/lib/transports/types";
import type { SensorMap, SensorValue } from "@/lib/types/snapshot";

const NUMERIC_STRING = /^\s*-?\d+(\.\d+)?\s*$/;

/**
 * Values the transports use to say "no reading"
 */
export function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || value === "" || value === "N/A";
}

/**
 * Parse a number or numeric string; null for anything else
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && NUMERIC_STRING.test(value)) {
    return Number(value);
  }
  return null;
}

function applyScale(
  value: unknown,
  scale: ScaleOp,
  tables: FieldTables,
): SensorValue | null {
  switch (scale.kind) {
    case "identity": {
      if (typeof value === "boolean") return value ? 1 : 0;
      const numeric = toNumber(value);
      if (numeric !== null) return numeric;
      return typeof value === "string" ? value.trim() : null;
    }
    case "divide": {
      const numeric = toNumber(value);
      return numeric === null ? null : numeric / scale.divisor;
    }
    case "lookup": {
      const code = toNumber(value);
      if (code === null) return null;
      return tables.lookups[scale.table]?.[String(code)] ?? `Unknown (${code})`;
    }
  }
}

/**
 * Convert one raw transport payload into canonical sensors.
 *
 * Only fields named in the transport's table are emitted. Zero readings are
 * emitted like any other value.
 */
export function normalize(
  kind: TransportKind,
  payload: RawPayload,
  tables: FieldTables = fieldTables,
): SensorMap {
  const table = tables.get(kind, payload.section);
  const sensors: SensorMap = {};

  for (const [rawField, rawValue] of Object.entries(payload.fields)) {
    const rule = table.get(rawField);
    if (!rule || isAbsent(rawValue)) continue;

    const value = applyScale(rawValue, rule.scale, tables);
    if (value !== null) {
      sensors[rule.key] = value;
    }
  }

  return sensors;
}
