import { z } from "zod";
import { DEFAULT_INVERTER_FAMILY, DONGLE_CONFIG, MODBUS_CONFIG } from "@/config";
import { localTypeSchema } from "@/lib/types/fleet-entry";
import type { FormValues } from "./types";

// Inverter families offered for register map selection
export const INVERTER_FAMILY_OPTIONS = {
  EG4_HYBRID: "EG4 18kPV / FlexBOSS (PV Series)",
  EG4_OFFGRID: "EG4 12000XP / 6000XP (SNA Series)",
  LXP: "LXP-EU 12K (European)",
} as const;

export const LOCAL_TYPE_OPTIONS = {
  modbus: "Modbus TCP (RS485 adapter - fastest)",
  dongle: "WiFi Dongle (no extra hardware)",
} as const;

const inverterFamilySchema = z
  .enum(["EG4_HYBRID", "EG4_OFFGRID", "LXP"])
  .default(DEFAULT_INVERTER_FAMILY);

// Form values may arrive as strings (command line answers)
const portSchema = (fallback: number) =>
  z.coerce.number().int().min(1).max(65535).default(fallback);

const trimmed = z.string().trim();

export const selectLocalTypeSchema = z.object({
  hybridLocalType: localTypeSchema,
});

export const modbusFormSchema = z.object({
  modbusHost: trimmed.min(1),
  modbusPort: portSchema(MODBUS_CONFIG.defaultPort),
  modbusUnitId: z.coerce.number().int().min(0).max(255).default(MODBUS_CONFIG.defaultUnitId),
  inverterSerial: trimmed.default(""),
  inverterFamily: inverterFamilySchema,
});
export type ModbusForm = z.infer<typeof modbusFormSchema>;

export const dongleFormSchema = z.object({
  dongleHost: trimmed.min(1),
  donglePort: portSchema(DONGLE_CONFIG.defaultPort),
  dongleSerial: trimmed.min(1),
  inverterSerial: trimmed.min(1),
  inverterFamily: inverterFamilySchema,
});
export type DongleForm = z.infer<typeof dongleFormSchema>;

export type FormParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: Record<string, string> };

/**
 * Parse form input, returning field errors keyed by field name
 */
export function parseForm<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: FormValues,
): FormParseResult<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }

  const errors: Record<string, string> = {};
  for (const issue of result.error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : "base";
    if (errors[field]) continue;
    const missing = issue.code === "invalid_type" && issue.received === "undefined";
    errors[field] = missing ? "required" : "invalid";
  }
  return { ok: false, errors };
}
