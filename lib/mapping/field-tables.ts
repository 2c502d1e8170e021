import micromatch from "micromatch";
import { z } from "zod";
import rawTables from "./field-tables.json";
import type { PayloadSection, TransportKind } from "@/lib/transports/types";

/**
 * Static field tables: raw transport field -> canonical sensor key + scale.
 * The data lives in field-tables.json and is validated once at load.
 */

export type ScaleOp =
  | { kind: "identity" }
  | { kind: "divide"; divisor: 10 | 100 }
  | { kind: "lookup"; table: string };

export interface FieldRule {
  key: string;
  scale: ScaleOp;
}

export type FieldTable = ReadonlyMap<string, FieldRule>;

export type CounterClass = "lifetime" | "daily";

const SECTIONS = [
  "runtime",
  "energy",
  "parallelEnergy",
  "battery",
  "batteryUnit",
  "midbox",
] as const satisfies readonly PayloadSection[];

const ruleSchema = z.tuple([z.string().min(1), z.string().min(1)]);
const sectionSchema = z.record(z.string(), ruleSchema);
const kindTablesSchema = z.object({
  runtime: sectionSchema,
  energy: sectionSchema,
  parallelEnergy: sectionSchema,
  battery: sectionSchema,
  batteryUnit: sectionSchema,
  midbox: sectionSchema,
});

const fieldTablesSchema = z.object({
  lookups: z.record(z.string(), z.record(z.string(), z.string())),
  aliases: z.record(z.string(), z.string()),
  tables: z.record(z.string(), kindTablesSchema),
  counters: z.object({
    lifetime: z.array(z.string()),
    daily: z.array(z.string()),
  }),
});

function parseScaleOp(op: string, lookups: Record<string, unknown>): ScaleOp {
  if (op === "identity") return { kind: "identity" };
  if (op === "div10") return { kind: "divide", divisor: 10 };
  if (op === "div100") return { kind: "divide", divisor: 100 };

  const match = /^enum:(\w+)$/.exec(op);
  if (match && match[1] in lookups) {
    return { kind: "lookup", table: match[1] };
  }

  throw new Error(`[FieldTables] Unknown scale operation "${op}"`);
}

export class FieldTables {
  readonly lookups: Record<string, Record<string, string>>;
  private tables = new Map<string, Map<PayloadSection, FieldTable>>();
  private aliases: Record<string, string>;
  private lifetimePatterns: string[];
  private dailyPatterns: string[];
  private counterCache = new Map<string, CounterClass | null>();

  constructor(source: unknown) {
    const parsed = fieldTablesSchema.parse(source);
    this.lookups = parsed.lookups;
    this.aliases = parsed.aliases;
    this.lifetimePatterns = parsed.counters.lifetime;
    this.dailyPatterns = parsed.counters.daily;

    for (const [kind, sections] of Object.entries(parsed.tables)) {
      const bySection = new Map<PayloadSection, FieldTable>();
      for (const section of SECTIONS) {
        const rules = new Map<string, FieldRule>();
        for (const [rawField, [key, op]] of Object.entries(sections[section])) {
          rules.set(rawField, { key, scale: parseScaleOp(op, this.lookups) });
        }
        bySection.set(section, rules);
      }
      this.tables.set(kind, bySection);
    }
  }

  /**
   * Table for a transport kind and payload section (empty when unknown)
   */
  get(kind: TransportKind, section: PayloadSection): FieldTable {
    const resolved = this.aliases[kind] ?? kind;
    return this.tables.get(resolved)?.get(section) ?? new Map();
  }

  /**
   * Classify a canonical key as a lifetime or daily counter.
   * Lifetime patterns win when both match.
   */
  classifyCounter(sensorKey: string): CounterClass | null {
    const cached = this.counterCache.get(sensorKey);
    if (cached !== undefined) return cached;

    let result: CounterClass | null = null;
    if (micromatch.isMatch(sensorKey, this.lifetimePatterns)) {
      result = "lifetime";
    } else if (micromatch.isMatch(sensorKey, this.dailyPatterns)) {
      result = "daily";
    }

    this.counterCache.set(sensorKey, result);
    return result;
  }
}

export const fieldTables = new FieldTables(rawTables);

export function classifyCounter(sensorKey: string): CounterClass | null {
  return fieldTables.classifyCounter(sensorKey);
}
