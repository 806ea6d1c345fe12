/**
 * Load Set — Configuration
 *
 * Output layout and CLI/environment parsing for the best-track build.
 *
 * Output: data/canonical/besttrack/
 *   storms.ndjson, observations.ndjson,
 *   identifier_codes.ndjson, status_codes.ndjson,
 *   files.sha256, manifest.json
 *
 * Environment (used when the flag is absent):
 *   BESTTRACK_INPUTS   comma-separated source files
 *   BESTTRACK_OUT_DIR  output directory
 *   BESTTRACK_RUN_ID   run id stamped into load_set_id
 */

import { resolve, join } from "path";

export const PROJECT_ROOT = resolve(__dirname, "../../..");
export const DEFAULT_OUT_DIR = join(PROJECT_ROOT, "data", "canonical", "besttrack");

/** Manifest format. Bump on any change to file names or row shape. */
export const LOAD_SET_FORMAT = "besttrack_loadset_v1" as const;

/** Table → file, in load order (reference tables before the rows that use them) */
export const TABLE_FILES = {
  identifier_codes: "identifier_codes.ndjson",
  status_codes: "status_codes.ndjson",
  storms: "storms.ndjson",
  observations: "observations.ndjson",
} as const;

export type LoadSetTable = keyof typeof TABLE_FILES;

export const TABLE_ORDER: readonly LoadSetTable[] = [
  "identifier_codes",
  "status_codes",
  "storms",
  "observations",
];

export const MANIFEST_FILE = "manifest.json";
export const FILES_SHA256_FILE = "files.sha256";

// ─── CLI ─────────────────────────────────────────────────────────────────────

export interface BuildConfig {
  inputs: string[];
  outDir: string;
  runId: string | null;
}

function splitList(value: string): string[] {
  return value.split(",").map(s => s.trim()).filter(Boolean);
}

/**
 * --input a.txt,b.txt  [--out dir]  [--run_id id]
 * Relative paths resolve against the working directory.
 */
export function parseArgs(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): BuildConfig {
  let inputs = env.BESTTRACK_INPUTS ? splitList(env.BESTTRACK_INPUTS) : [];
  let outDir = env.BESTTRACK_OUT_DIR || DEFAULT_OUT_DIR;
  let runId: string | null = env.BESTTRACK_RUN_ID || null;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--input" && args[i + 1]) inputs = splitList(args[++i]);
    else if (args[i] === "--out" && args[i + 1]) outDir = args[++i];
    else if (args[i] === "--run_id" && args[i + 1]) runId = args[++i];
  }

  if (inputs.length === 0) throw new Error("--input required (or BESTTRACK_INPUTS)");
  if (runId !== null && !/^[A-Za-z0-9_-]+$/.test(runId)) {
    throw new Error(`--run_id may only contain letters, digits, "_" and "-": ${runId}`);
  }

  return {
    inputs: inputs.map(p => resolve(p)),
    outDir: resolve(outDir),
    runId,
  };
}
