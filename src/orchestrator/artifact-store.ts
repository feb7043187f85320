/**
 * Deterministic artifact IO.
 *
 * Every write goes to a temp file first and is renamed into place, so a
 * reader never sees a half-written artifact. JSON is written with sorted
 * keys, two-space indentation and non-ASCII characters escaped.
 */

import { createHash } from "node:crypto";
import { mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname, relative, sep } from "node:path";
import { isRecord } from "../types/json.js";

export interface ManifestEntry {
  path: string;
  bytes: number;
  sha256: string;
}

/** Copy of a JSON value with object keys sorted at every level. */
export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

export function toStableJson(value: unknown): string {
  const text = JSON.stringify(sortKeys(value), null, 2);
  return text.replace(
    /[\u007f-\uffff]/g,
    (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`
  );
}

export function writeTextAtomic(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  writeFileSync(tmpPath, content, "utf-8");
  renameSync(tmpPath, filePath);
}

export function writeJsonAtomic(filePath: string, value: unknown): void {
  writeTextAtomic(filePath, `${toStableJson(value)}\n`);
}

export function readJson(filePath: string): unknown {
  return JSON.parse(readFileSync(filePath, "utf-8"));
}

/** `filePath` relative to `baseDir`, with forward slashes. */
export function relativeArtifactPath(filePath: string, baseDir: string): string {
  return relative(baseDir, filePath).split(sep).join("/");
}

/** Size and sha256 of an artifact, with its path relative to `baseDir`. */
export function buildManifestEntry(filePath: string, baseDir: string): ManifestEntry {
  const data = readFileSync(filePath);
  return {
    path: relativeArtifactPath(filePath, baseDir),
    bytes: data.length,
    sha256: createHash("sha256").update(data).digest("hex"),
  };
}
