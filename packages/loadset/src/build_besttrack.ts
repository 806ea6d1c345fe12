/**
 * Build Best-Track Load Set
 *
 * Pipeline (deterministic, no reordering):
 *   1. Read each source file (one per basin)
 *   2. Extract headers + observation rows
 *   3. Normalize: timestamps, code tables, sentinels, geometry
 *   4. Concatenate files in the order given
 *   5. Write NDJSON tables + files.sha256 + manifest.json
 *   6. Verify the written load set
 *
 * Output: data/canonical/besttrack/ (or --out)
 *
 * Usage:
 *   npx tsx packages/loadset/src/build_besttrack.ts --input atlantic.txt,nepac.txt [--out dir] [--run_id id]
 *
 * Any extraction or normalization error aborts the run: nothing is written.
 */

import { readFileSync } from "fs";
import { basename } from "path";
import { processSources, type SourceText } from "../../besttrack/index";
import { parseArgs, PROJECT_ROOT, type BuildConfig } from "./loadset_config";
import { digestSource, writeLoadSet, type LoadSetWriterResult } from "./loadset_writer";
import { verifyLoadSet } from "./verify_loadset";

export interface BuildSummary {
  result: LoadSetWriterResult;
  storms: number;
  observations: number;
  warnings: string[];
}

function displayPath(path: string): string {
  return path.startsWith(PROJECT_ROOT) ? "." + path.slice(PROJECT_ROOT.length) : path;
}

/**
 * Read, process and write. Sources are all processed before anything is
 * written, so a failing file leaves the output directory untouched.
 */
export function runBuild(config: BuildConfig): BuildSummary {
  const sources: SourceText[] = config.inputs.map(path => ({
    name: basename(path),
    text: readFileSync(path, "utf-8"),
  }));

  const loadSet = processSources(sources, (source, part) => {
    console.log(`  📄 ${source.name}: ${part.storms.length} storms, ${part.observations.length} observations`);
    for (const warning of part.warnings) console.warn(`  ⚠️ ${warning}`);
  });

  const result = writeLoadSet({
    loadSet,
    sources: sources.map(s => digestSource(s.name, s.text)),
    outDir: config.outDir,
    runId: config.runId,
  });

  const verified = verifyLoadSet(config.outDir);
  if (!verified.valid) {
    throw new Error(`[loadset] written load set failed verification: ${verified.error}`);
  }

  return {
    result,
    storms: loadSet.storms.length,
    observations: loadSet.observations.length,
    warnings: loadSet.warnings,
  };
}

async function main(): Promise<void> {
  const config = parseArgs();

  console.log("════════════════════════════════════════════════════════════════");
  console.log("  Best-Track Load Set Build");
  console.log(`  Inputs: ${config.inputs.map(displayPath).join(", ")}`);
  console.log("════════════════════════════════════════════════════════════════");

  const summary = runBuild(config);

  console.log();
  console.log(`  ✅ ${summary.result.load_set_id}: ${summary.storms} storms, ${summary.observations} observations`);
  console.log(`     root_hash: ${summary.result.root_hash.slice(0, 16)}...`);
  console.log(`     manifest: ${displayPath(summary.result.manifest_path)}`);
  if (summary.warnings.length > 0) {
    console.log(`     warnings: ${summary.warnings.length}`);
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error("[besttrack] FATAL:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
