/**
 * json.ts - Narrowing helpers for loosely-typed resource documents
 *
 * kubectl output is parsed as JsonValue; these helpers read nested fields
 * without casts and return undefined for anything of the wrong shape.
 */

import type { JsonObject, JsonValue } from "./types";

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function getObject(value: JsonValue | undefined, key: string): JsonObject | undefined {
  if (!isJsonObject(value)) return undefined;
  const child = value[key];
  return isJsonObject(child) ? child : undefined;
}

export function getArray(value: JsonValue | undefined, key: string): JsonValue[] | undefined {
  if (!isJsonObject(value)) return undefined;
  const child = value[key];
  return Array.isArray(child) ? child : undefined;
}

export function getString(value: JsonValue | undefined, key: string): string | undefined {
  if (!isJsonObject(value)) return undefined;
  const child = value[key];
  return typeof child === "string" ? child : undefined;
}

/**
 * Reads a string-to-string map such as metadata.labels, skipping non-string values.
 */
export function getStringMap(value: JsonValue | undefined, key: string): Record<string, string> {
  const map = getObject(value, key);
  const result: Record<string, string> = {};
  if (!map) return result;
  for (const [k, v] of Object.entries(map)) {
    if (typeof v === "string") result[k] = v;
  }
  return result;
}

/**
 * Parses kubectl JSON output. Throws with the given label on malformed input.
 */
export function parseJson(text: string, label: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new Error(
      `Failed to parse ${label}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * Deep copy of a JSON document; structuredClone keeps the JsonValue type.
 */
export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}
