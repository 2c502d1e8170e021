/**
 * JSON helpers for transport payloads and CLI output
 */

import { DecodingError } from "./errors";

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse text that must hold a JSON object
 * @param context - included in the error message (endpoint, file name)
 */
export function parseJsonObject(text: string, context: string): JsonRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DecodingError(
      `Invalid JSON from ${context}: ${error instanceof Error ? error.message : String(error)}`,
      text,
    );
  }

  if (!isRecord(parsed)) {
    throw new DecodingError(`Expected a JSON object from ${context}`, parsed);
  }
  return parsed;
}

/**
 * Read an array of objects from a payload field, skipping anything else
 */
export function recordArray(value: unknown): JsonRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Stable, indented JSON for terminal output
 */
export function toPrettyJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
