/**
 * JSON value helpers for payloads that arrive untyped (agent output,
 * case files, persisted artifacts).
 */

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Trimmed string value, or "" for anything that is not a string. */
export function readString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

/** First non-empty string among several keys of an object. */
export function firstString(source: JsonObject, keys: readonly string[]): string {
  for (const key of keys) {
    const value = readString(source[key]);
    if (value !== "") {
      return value;
    }
  }
  return "";
}
