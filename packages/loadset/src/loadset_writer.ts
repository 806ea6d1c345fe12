/**
 * Load Set Writer — record sets → NDJSON + manifest for the storage layer.
 *
 * Writes one NDJSON file per table (rows in pipeline order, keys sorted),
 * a files.sha256 list and manifest.json carrying the root hash.
 *
 *   file hash  = SHA-256(file content)
 *   root_hash  = SHA-256(concatenated file hashes, in TABLE_ORDER)
 *
 * Deterministic: no wall-clock time is written, so byte-identical sources
 * produce byte-identical load sets.
 */

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import type { LoadSet } from "../../besttrack/index";
import {
  FILES_SHA256_FILE,
  LOAD_SET_FORMAT,
  MANIFEST_FILE,
  TABLE_FILES,
  TABLE_ORDER,
  type LoadSetTable,
} from "./loadset_config";
import type { LoadSetManifest, SourceDigest, TableEntry } from "./manifest_schema";
import { sha256, toNdjson } from "./stable_json";

export interface LoadSetWriterInput {
  loadSet: LoadSet;
  /** Digest of each source file, in processing order */
  sources: SourceDigest[];
  outDir: string;
  /** Stamped into load_set_id; defaults to the root hash prefix */
  runId?: string | null;
}

export interface LoadSetWriterResult {
  load_set_id: string;
  root_hash: string;
  manifest_path: string;
  files_sha256_path: string;
  tables: TableEntry[];
}

export function digestSource(name: string, text: string): SourceDigest {
  return { name, sha256: sha256(text) };
}

export function generateLoadSetId(rootHash: string, runId?: string | null): string {
  return `BTLS-${runId ?? rootHash.slice(0, 12)}`;
}

function tableRows(loadSet: LoadSet, table: LoadSetTable): readonly unknown[] {
  switch (table) {
    case "identifier_codes":
      return loadSet.identifierCodes;
    case "status_codes":
      return loadSet.statusCodes;
    case "storms":
      return loadSet.storms;
    case "observations":
      return loadSet.observations;
  }
}

/**
 * Write a load set directory. Existing files of the same name are replaced.
 */
export function writeLoadSet(input: LoadSetWriterInput): LoadSetWriterResult {
  const { loadSet, sources, outDir, runId } = input;
  mkdirSync(outDir, { recursive: true });

  const tables: TableEntry[] = TABLE_ORDER.map((table) => {
    const rows = tableRows(loadSet, table);
    const content = toNdjson(rows);
    const file = TABLE_FILES[table];
    writeFileSync(join(outDir, file), content, "utf-8");
    return { table, file, rows: rows.length, sha256: sha256(content) };
  });

  const rootHash = sha256(tables.map(t => t.sha256).join(""));
  const loadSetId = generateLoadSetId(rootHash, runId);

  const filesSha256Path = join(outDir, FILES_SHA256_FILE);
  const sha256Content = tables.map(t => `${t.sha256}  ${t.file}`).join("\n") + "\n";
  writeFileSync(filesSha256Path, sha256Content, "utf-8");

  const manifest: LoadSetManifest = {
    load_set_id: loadSetId,
    format: LOAD_SET_FORMAT,
    sources,
    tables,
    total_rows: tables.reduce((sum, t) => sum + t.rows, 0),
    warnings: loadSet.warnings,
    root_hash: rootHash,
  };
  const manifestPath = join(outDir, MANIFEST_FILE);
  writeFileSync(manifestPath, JSON.stringify(manifest, null, 2) + "\n", "utf-8");

  return {
    load_set_id: loadSetId,
    root_hash: rootHash,
    manifest_path: manifestPath,
    files_sha256_path: filesSha256Path,
    tables,
  };
}
