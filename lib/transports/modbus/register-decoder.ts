import { z } from "zod";
import rawRegisterMap from "./register-map.json";
import type { RawFields } from "@/lib/transports/types";

const singleFieldSchema = z.object({
  register: z.number().int().min(0),
  type: z.enum(["u16", "s16", "u32", "u8lo", "u8hi"]),
});

const summedFieldSchema = z.object({
  registers: z.array(z.number().int().min(0)).min(1),
  type: z.enum(["sum16", "sum32"]),
});

const fieldSpecSchema = z.union([singleFieldSchema, summedFieldSchema]);
export type RegisterFieldSpec = z.infer<typeof fieldSpecSchema>;

const blockSchema = z.object({
  start: z.number().int().min(0),
  count: z.number().int().min(1).max(125),
  fields: z.record(z.string(), fieldSpecSchema),
});
export type RegisterBlock = z.infer<typeof blockSchema>;

const registerMapSchema = z.object({
  inputBlocks: z.object({
    runtime: blockSchema,
    energy: blockSchema,
    battery: blockSchema,
    midbox: blockSchema,
  }),
  parallelConfigRegister: z.number().int().min(0),
  serialNumber: z.object({ start: z.number().int(), count: z.number().int() }),
  holding: z.object({
    deviceType: z.number().int(),
    firmwareStart: z.number().int(),
    firmwareCount: z.number().int(),
  }),
});
export type RegisterMap = z.infer<typeof registerMapSchema>;

export const registerMap: RegisterMap = registerMapSchema.parse(rawRegisterMap);

function word(words: number[], start: number, register: number): number | null {
  const value = words[register - start];
  return value === undefined ? null : value & 0xffff;
}

function u32(words: number[], start: number, register: number): number | null {
  const low = word(words, start, register);
  const high = word(words, start, register + 1);
  if (low === null || high === null) return null;
  return low + high * 0x10000;
}

function decodeField(
  words: number[],
  start: number,
  field: RegisterFieldSpec,
): number | null {
  switch (field.type) {
    case "u16":
      return word(words, start, field.register);
    case "s16": {
      const value = word(words, start, field.register);
      if (value === null) return null;
      return value >= 0x8000 ? value - 0x10000 : value;
    }
    case "u32":
      return u32(words, start, field.register);
    case "u8lo": {
      const value = word(words, start, field.register);
      return value === null ? null : value & 0xff;
    }
    case "u8hi": {
      const value = word(words, start, field.register);
      return value === null ? null : value >> 8;
    }
    case "sum16":
    case "sum32": {
      let total = 0;
      for (const register of field.registers) {
        const value =
          field.type === "sum16"
            ? word(words, start, register)
            : u32(words, start, register);
        if (value === null) return null;
        total += value;
      }
      return total;
    }
  }
}

/**
 * Decode a block of registers into raw named fields.
 * Fields whose registers fall outside the block are left out.
 */
export function decodeBlock(words: number[], block: RegisterBlock): RawFields {
  const fields: RawFields = {};
  for (const [name, field] of Object.entries(block.fields)) {
    const value = decodeField(words, block.start, field);
    if (value !== null) {
      fields[name] = value;
    }
  }
  return fields;
}

/**
 * Two characters per register, low byte first
 */
export function decodeAscii(words: number[]): string {
  return words
    .map((value) => String.fromCharCode(value & 0xff, (value >> 8) & 0xff))
    .join("")
    .replace(/\0/g, "")
    .trim();
}

/**
 * Firmware code such as "FAAB-2525" from the four firmware registers
 */
export function decodeFirmware(words: number[]): string {
  if (words.length < 4) return "";
  const prefix = decodeAscii(words.slice(0, 2));
  const version = words
    .slice(2, 4)
    .map((value) => (value & 0xff).toString(16).padStart(2, "0"))
    .join("");
  return prefix ? `${prefix}-${version}`.toUpperCase() : "";
}
