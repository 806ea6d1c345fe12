/**
 * Multi-file pipeline: per-file processing, concatenation order and
 * cross-file event_id uniqueness.
 */

import { MalformedRecordError, processSource, processSources, type SourceText } from "../index";
import { ARLO_LINES, BRYN_LINES, headerRow, observationRow } from "./fixtures";

const ATLANTIC: SourceText = { name: "atlantic.txt", text: ARLO_LINES.join("\n") + "\n" };
const PACIFIC: SourceText = { name: "nepac.txt", text: BRYN_LINES.join("\n") + "\n" };

describe("processSource", () => {
  const loadSet = processSource(ATLANTIC);

  test("carries the code tables as reference rows", () => {
    expect(loadSet.identifierCodes).toHaveLength(9);
    expect(loadSet.statusCodes).toHaveLength(9);
  });

  test("names its source", () => {
    expect(loadSet.sources).toEqual(["atlantic.txt"]);
    expect(loadSet.storms.map(s => s.event_id)).toEqual(["AL012031"]);
    expect(loadSet.observations).toHaveLength(3);
  });
});

describe("processSources", () => {
  test("concatenates files in the order given", () => {
    const loadSet = processSources([PACIFIC, ATLANTIC]);
    expect(loadSet.sources).toEqual(["nepac.txt", "atlantic.txt"]);
    expect(loadSet.storms.map(s => s.event_id)).toEqual(["EP022031", "AL012031"]);
    expect(loadSet.observations.map(o => o.event_id)).toEqual([
      "EP022031", "AL012031", "AL012031", "AL012031",
    ]);
  });

  test("calls the hook once per file with that file's records", () => {
    const seen: Array<[string, number]> = [];
    processSources([ATLANTIC, PACIFIC], (source, part) => seen.push([source.name, part.observations.length]));
    expect(seen).toEqual([["atlantic.txt", 3], ["nepac.txt", 1]]);
  });

  test("collects warnings from every file", () => {
    const mismatched: SourceText = {
      name: "short.txt",
      text: [
        headerRow("AL042031", "DELL", 2),
        observationRow({ date: "20311001", time: "0000", status: "TD", lat: "15.0N", lon: "50.0W", wind: 25, pressure: 1009 }),
      ].join("\n"),
    };
    const loadSet = processSources([ATLANTIC, mismatched]);
    expect(loadSet.warnings).toEqual(["short.txt:1 AL042031 declares 2 points, found 1"]);
  });

  test("rejects an event_id already loaded from an earlier file", () => {
    const again: SourceText = { name: "atlantic_copy.txt", text: ATLANTIC.text };
    expect(() => processSources([ATLANTIC, again])).toThrow(MalformedRecordError);
    expect(() => processSources([ATLANTIC, again])).toThrow(
      'MalformedRecord: event_id "AL012031" already loaded from atlantic.txt (atlantic_copy.txt, storm AL012031)',
    );
  });

  test("no sources gives empty record sets with the code tables", () => {
    const loadSet = processSources([]);
    expect(loadSet.storms).toEqual([]);
    expect(loadSet.observations).toEqual([]);
    expect(loadSet.statusCodes).toHaveLength(9);
  });
});
