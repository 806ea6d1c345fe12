/**
 * Golden test: best-track sources → load set files.
 *
 * Verifies:
 *   1. one NDJSON file per table, rows in pipeline order, keys sorted
 *   2. files.sha256 + manifest.json carry per-file hashes and the root hash
 *   3. deterministic output — identical sources → byte-identical files
 *   4. the written load set passes verification
 */

import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { processSources, type SourceText } from "../../../besttrack/index";
import { FILES_SHA256_FILE, MANIFEST_FILE, TABLE_FILES, TABLE_ORDER } from "../loadset_config";
import { digestSource, writeLoadSet } from "../loadset_writer";
import { LoadSetManifestSchema } from "../manifest_schema";
import { sha256 } from "../stable_json";
import { verifyLoadSet } from "../verify_loadset";

const FIXTURES = join(__dirname, "fixtures");

function readSource(file: string): SourceText {
  return { name: file, text: readFileSync(join(FIXTURES, file), "utf-8") };
}

function lines(dir: string, file: string): string[] {
  return readFileSync(join(dir, file), "utf-8").split("\n").filter(Boolean);
}

const SOURCES = [readSource("atlantic_sample.txt"), readSource("nepac_sample.txt")];

describe("load set writer", () => {
  const root = mkdtempSync(join(tmpdir(), "besttrack-golden-"));
  const outDir = join(root, "first");
  const loadSet = processSources(SOURCES);
  const result = writeLoadSet({
    loadSet,
    sources: SOURCES.map(s => digestSource(s.name, s.text)),
    outDir,
  });

  afterAll(() => {
    rmSync(root, { recursive: true, force: true });
  });

  test("row counts per table", () => {
    expect(lines(outDir, TABLE_FILES.identifier_codes)).toHaveLength(9);
    expect(lines(outDir, TABLE_FILES.status_codes)).toHaveLength(9);
    expect(lines(outDir, TABLE_FILES.storms)).toHaveLength(3);
    expect(lines(outDir, TABLE_FILES.observations)).toHaveLength(6);
    expect(result.tables.map(t => t.rows)).toEqual([9, 9, 3, 6]);
  });

  test("reference rows are key-sorted JSON", () => {
    expect(lines(outDir, TABLE_FILES.identifier_codes)[0]).toBe(
      '{"code_id":0,"description":"closest approach to a coast, not followed by a landfall"}',
    );
  });

  test("storm rows keep file order and carry the path", () => {
    const storms = lines(outDir, TABLE_FILES.storms);
    expect(storms.map(s => s.slice(0, 40))).toEqual([
      '{"basin":"AL","event_id":"AL012031","nam',
      '{"basin":"AL","event_id":"AL022031","nam',
      '{"basin":"EP","event_id":"EP022031","nam',
    ]);
    expect(storms[1]).toBe(
      '{"basin":"AL","event_id":"AL022031","name":"UNNAMED",' +
        '"path":{"type":"Point","vertex":{"latitude":30.2,"longitude":-70,"max_wind_knots":null,"min_pressure_mb":null}},' +
        '"path_wkt":"POINT(-70 30.2 NULL NULL)","start_time":"2031-07-20T18:00:00.000Z"}',
    );
  });

  test("observations from a CRLF source decode like any other", () => {
    const last = JSON.parse(lines(outDir, TABLE_FILES.observations)[5]);
    expect(last.event_id).toBe("EP022031");
    expect(last.point_time).toBe("2031-08-13T00:00:00.000Z");
    expect(last.status).toBeNull();
    expect(last.location_wkt).toBe("POINT(171 -9.1)");
  });

  test("files.sha256 lists every table file in load order", () => {
    const expected = TABLE_ORDER.map(table => {
      const file = TABLE_FILES[table];
      return `${sha256(readFileSync(join(outDir, file), "utf-8"))}  ${file}`;
    });
    expect(lines(outDir, FILES_SHA256_FILE)).toEqual(expected);
  });

  test("manifest matches its schema and the writer result", () => {
    const manifest = LoadSetManifestSchema.parse(JSON.parse(readFileSync(join(outDir, MANIFEST_FILE), "utf-8")));
    expect(manifest.root_hash).toBe(result.root_hash);
    expect(manifest.root_hash).toBe(sha256(result.tables.map(t => t.sha256).join("")));
    expect(manifest.load_set_id).toBe(`BTLS-${result.root_hash.slice(0, 12)}`);
    expect(manifest.total_rows).toBe(27);
    expect(manifest.sources).toEqual([
      { name: "atlantic_sample.txt", sha256: sha256(SOURCES[0].text) },
      { name: "nepac_sample.txt", sha256: sha256(SOURCES[1].text) },
    ]);
    expect(manifest.warnings).toEqual([]);
  });

  test("identical sources give byte-identical load sets", () => {
    const secondDir = join(root, "second");
    writeLoadSet({
      loadSet: processSources([readSource("atlantic_sample.txt"), readSource("nepac_sample.txt")]),
      sources: SOURCES.map(s => digestSource(s.name, s.text)),
      outDir: secondDir,
    });
    for (const file of [...Object.values(TABLE_FILES), FILES_SHA256_FILE, MANIFEST_FILE]) {
      expect(readFileSync(join(secondDir, file), "utf-8")).toBe(readFileSync(join(outDir, file), "utf-8"));
    }
  });

  test("a run id names the load set without changing the root hash", () => {
    const runDir = join(root, "named");
    const named = writeLoadSet({
      loadSet,
      sources: SOURCES.map(s => digestSource(s.name, s.text)),
      outDir: runDir,
      runId: "test_run",
    });
    expect(named.load_set_id).toBe("BTLS-test_run");
    expect(named.root_hash).toBe(result.root_hash);
  });

  test("the written load set verifies", () => {
    expect(verifyLoadSet(outDir)).toEqual({
      valid: true,
      load_set_id: result.load_set_id,
      root_hash: result.root_hash,
      total_rows: 27,
    });
  });
});
