/**
 * Deterministic JSON + hashing helpers for load set files.
 */

import { createHash } from "crypto";

export function sha256(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

/**
 * Deterministic JSON serialization.
 * Recursively sorts object keys; array order is preserved (rows and path
 * vertices are ordered data). Undefined properties are dropped, as JSON.stringify does.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== "object") return JSON.stringify(value) ?? "null";
  if (Array.isArray(value)) {
    return "[" + value.map(item => stableStringify(item)).join(",") + "]";
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return "{" + entries.map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v)).join(",") + "}";
}

/** One stable JSON object per line, newline-terminated. Empty table → empty string. */
export function toNdjson(rows: readonly unknown[]): string {
  return rows.map(row => stableStringify(row) + "\n").join("");
}
