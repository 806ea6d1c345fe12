/**
 * Load Set Verification
 *
 * Recomputes the hashes of a written load set before it is handed to the
 * storage layer. Any edited, truncated or swapped file is detected.
 *
 * Checks:
 *   1. manifest.json parses and matches the manifest schema
 *   2. every table in TABLE_ORDER is listed once, in order
 *   3. each file's SHA-256 matches its manifest entry
 *   4. each file's row count matches its manifest entry
 *   5. root_hash = SHA-256(concatenated file hashes)
 *   6. total_rows = sum of table rows
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { MANIFEST_FILE, TABLE_ORDER } from "./loadset_config";
import { LoadSetManifestSchema, type LoadSetManifest } from "./manifest_schema";
import { sha256 } from "./stable_json";

export interface LoadSetVerifyResult {
  valid: boolean;
  load_set_id: string | null;
  root_hash: string | null;
  total_rows: number;
  error?: string;
  error_at_file?: string;
}

function countRows(content: string): number {
  return content.split("\n").filter(Boolean).length;
}

function fail(error: string, manifest: LoadSetManifest | null, file?: string): LoadSetVerifyResult {
  return {
    valid: false,
    load_set_id: manifest?.load_set_id ?? null,
    root_hash: null,
    total_rows: manifest?.total_rows ?? 0,
    error,
    ...(file !== undefined ? { error_at_file: file } : {}),
  };
}

/**
 * Verify a load set directory written by writeLoadSet.
 */
export function verifyLoadSet(outDir: string): LoadSetVerifyResult {
  const manifestPath = join(outDir, MANIFEST_FILE);
  if (!existsSync(manifestPath)) {
    return fail(`${MANIFEST_FILE} not found in ${outDir}`, null, MANIFEST_FILE);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(manifestPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return fail(`Invalid JSON in ${MANIFEST_FILE}: ${message}`, null, MANIFEST_FILE);
  }

  const checked = LoadSetManifestSchema.safeParse(parsed);
  if (!checked.success) {
    const issue = checked.error.issues[0];
    return fail(
      `${MANIFEST_FILE} does not match schema: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown issue"}`,
      null,
      MANIFEST_FILE,
    );
  }
  const manifest = checked.data;

  // ─── Check 2: table list ───
  const listed = manifest.tables.map(t => t.table).join(",");
  if (listed !== TABLE_ORDER.join(",")) {
    return fail(`table list mismatch: expected ${TABLE_ORDER.join(",")}, got ${listed}`, manifest, MANIFEST_FILE);
  }

  for (const entry of manifest.tables) {
    const filePath = join(outDir, entry.file);
    if (!existsSync(filePath)) {
      return fail(`missing table file ${entry.file}`, manifest, entry.file);
    }
    const content = readFileSync(filePath, "utf-8");

    // ─── Check 3: file hash ───
    const hash = sha256(content);
    if (hash !== entry.sha256) {
      return fail(
        `sha256 mismatch for ${entry.file}: computed ${hash.slice(0, 16)}... != manifest ${entry.sha256.slice(0, 16)}...`,
        manifest,
        entry.file,
      );
    }

    // ─── Check 4: row count ───
    const rows = countRows(content);
    if (rows !== entry.rows) {
      return fail(`row count mismatch for ${entry.file}: ${rows} != ${entry.rows}`, manifest, entry.file);
    }
  }

  // ─── Check 5: root hash ───
  const rootHash = sha256(manifest.tables.map(t => t.sha256).join(""));
  if (rootHash !== manifest.root_hash) {
    return fail(
      `root_hash mismatch: computed ${rootHash.slice(0, 16)}... != manifest ${manifest.root_hash.slice(0, 16)}...`,
      manifest,
      MANIFEST_FILE,
    );
  }

  // ─── Check 6: total rows ───
  const totalRows = manifest.tables.reduce((sum, t) => sum + t.rows, 0);
  if (totalRows !== manifest.total_rows) {
    return fail(`total_rows mismatch: ${totalRows} != ${manifest.total_rows}`, manifest, MANIFEST_FILE);
  }

  return {
    valid: true,
    load_set_id: manifest.load_set_id,
    root_hash: manifest.root_hash,
    total_rows: totalRows,
  };
}
