import {
  decodeIdentifier,
  decodeStatus,
  identifierCodeRows,
  statusCodeRows,
} from "../code_tables";
import { UnknownCodeError } from "../errors";

describe("code tables", () => {
  test("identifier reference rows are ids 0..8 in order", () => {
    const rows = identifierCodeRows();
    expect(rows.map(r => r.code_id)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
    expect(rows[3]).toEqual({ code_id: 3, description: "landfall" });
  });

  test("status reference rows are ids 0..8 in order", () => {
    const rows = statusCodeRows();
    expect(rows.map(r => r.code_id)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
    expect(rows[8]).toEqual({ code_id: 8, description: "disturbance of any intensity" });
  });

  test("reference rows carry only code_id and description", () => {
    for (const row of [...identifierCodeRows(), ...statusCodeRows()]) {
      expect(Object.keys(row).sort()).toEqual(["code_id", "description"]);
    }
  });

  test("every identifier letter decodes", () => {
    expect(["C", "G", "I", "L", "P", "R", "S", "T", "W"].map(c => decodeIdentifier(c))).toEqual([
      0, 1, 2, 3, 4, 5, 6, 7, 8,
    ]);
  });

  test("every status code decodes", () => {
    expect(["TD", "TS", "HU", "EX", "SD", "SS", "LO", "WV", "DB"].map(c => decodeStatus(c))).toEqual([
      0, 1, 2, 3, 4, 5, 6, 7, 8,
    ]);
  });

  test("blank codes decode to missing", () => {
    expect(decodeIdentifier(" ")).toBeNull();
    expect(decodeStatus("  ")).toBeNull();
  });

  test("lower-case and inherited property names are unknown", () => {
    expect(() => decodeIdentifier("l")).toThrow(UnknownCodeError);
    expect(() => decodeStatus("hu")).toThrow(UnknownCodeError);
    expect(() => decodeStatus("toString")).toThrow(UnknownCodeError);
  });
});
