/**
 * Best-Track Code Tables
 *
 * Fixed mappings from the 1–2 character source codes to small integer ids.
 * Loaded by the storage layer as lookup tables; observation rows reference
 * the ids.
 *
 * Codes listed under *_MISSING_CODES decode to null. Anything else outside
 * the tables is an UnknownCodeError.
 */

import type { CodeTableRow } from "./types";
import { UnknownCodeError, type ErrorLocation } from "./errors";

// ─── Record Identifier ───────────────────────────────────────────────────────

export const IDENTIFIER_CODES = {
  C: { code_id: 0, description: "closest approach to a coast, not followed by a landfall" },
  G: { code_id: 1, description: "genesis" },
  I: { code_id: 2, description: "an intensity peak in terms of both pressure and wind" },
  L: { code_id: 3, description: "landfall" },
  P: { code_id: 4, description: "minimum central pressure" },
  R: { code_id: 5, description: "additional detail on intensity of cyclone when rapid changes are underway" },
  S: { code_id: 6, description: "change in status of the system" },
  T: { code_id: 7, description: "provides additional detail on the track (position) of the cyclone" },
  W: { code_id: 8, description: "maximum sustained wind speed" },
} as const satisfies Record<string, CodeTableRow>;

export type IdentifierCode = keyof typeof IDENTIFIER_CODES;

/** Blank identifier column */
export const IDENTIFIER_MISSING_CODES: ReadonlySet<string> = new Set([" "]);

// ─── Storm Status ────────────────────────────────────────────────────────────

export const STATUS_CODES = {
  TD: { code_id: 0, description: "tropical cyclone of tropical depression intensity (<34 knots)" },
  TS: { code_id: 1, description: "tropical cyclone of tropical storm intensity (34-63 knots)" },
  HU: { code_id: 2, description: "tropical cyclone of hurricane intensity (>= 64 knots)" },
  EX: { code_id: 3, description: "extratropical cyclone of any intensity" },
  SD: { code_id: 4, description: "subtropical cyclone of subtropical depression intensity (<34 knots)" },
  SS: { code_id: 5, description: "subtropical cyclone of subtropical storm intensity (>= 34 knots)" },
  LO: { code_id: 6, description: "low that is neither a tropical cyclone, a subtropical cyclone, nor an extratropical cyclone" },
  WV: { code_id: 7, description: "a tropical wave" },
  DB: { code_id: 8, description: "disturbance of any intensity" },
} as const satisfies Record<string, CodeTableRow>;

export type StatusCode = keyof typeof STATUS_CODES;

/**
 * Blank status plus the codes seen only in the Northeast Pacific file.
 * ET/ST might mean EX/SS; they stay missing rather than guessed.
 */
export const STATUS_MISSING_CODES: ReadonlySet<string> = new Set(["  ", "ET", "TY", "ST", "PT"]);

// ─── Lookup ──────────────────────────────────────────────────────────────────

function isIdentifierCode(code: string): code is IdentifierCode {
  return Object.prototype.hasOwnProperty.call(IDENTIFIER_CODES, code);
}

function isStatusCode(code: string): code is StatusCode {
  return Object.prototype.hasOwnProperty.call(STATUS_CODES, code);
}

export function decodeIdentifier(code: string, loc: ErrorLocation = {}): number | null {
  if (isIdentifierCode(code)) return IDENTIFIER_CODES[code].code_id;
  if (IDENTIFIER_MISSING_CODES.has(code)) return null;
  throw new UnknownCodeError("identifier", code, loc);
}

export function decodeStatus(code: string, loc: ErrorLocation = {}): number | null {
  if (isStatusCode(code)) return STATUS_CODES[code].code_id;
  if (STATUS_MISSING_CODES.has(code)) return null;
  throw new UnknownCodeError("status", code, loc);
}

// ─── Reference Rows ──────────────────────────────────────────────────────────

function toRows(table: Record<string, CodeTableRow>): CodeTableRow[] {
  return Object.values(table)
    .map(({ code_id, description }) => ({ code_id, description }))
    .sort((a, b) => a.code_id - b.code_id);
}

export function identifierCodeRows(): CodeTableRow[] {
  return toRows(IDENTIFIER_CODES);
}

export function statusCodeRows(): CodeTableRow[] {
  return toRows(STATUS_CODES);
}
