/**
 * Best-Track Record Extractor
 *
 * Splits the raw line-oriented file into storm headers and raw observation
 * rows, in source order.
 *
 * Row shapes:
 *   header       AL092023,          IDA,    39,
 *   observation  20230826, 1200,  , TD, 16.5N,  81.5W,  30, 1006,    0, ...
 *
 * A line with exactly 4 comma-separated fields is a header; anything else is
 * an observation of the most recently seen header. Ownership is positional,
 * never a lookup by id.
 *
 * One malformed line fails the whole file. No partial recovery.
 */

import { MalformedRecordError, type ErrorLocation } from "./errors";
import {
  RADII_FIELDS,
  type ExtractedRecords,
  type RawHeader,
  type RawObservation,
  type WindRadii,
} from "./types";

// ─── Constants ───────────────────────────────────────────────────────────────

export const HEADER_FIELD_COUNT = 4;
export const MIN_OBSERVATION_FIELDS = 20;
export const EVENT_ID_LENGTH = 8;

/** Field positions within an observation row */
const COL = {
  DATE: 0,
  TIME: 1,
  IDENTIFIER: 2,
  STATUS: 3,
  LATITUDE: 4,
  LONGITUDE: 5,
  MAX_WIND: 6,
  MIN_PRESSURE: 7,
  RADII_START: 8,
  RADIUS_MAX_WIND: 20,
} as const;

const INTEGER_PATTERN = /^[+-]?\d+$/;
/** Coordinate magnitudes are unsigned: the hemisphere letter carries the sign */
const MAGNITUDE_PATTERN = /^(\d+\.?\d*|\.\d+)$/;

const BLANK_IDENTIFIER = " ";
const BLANK_STATUS = "  ";

export interface ExtractOptions {
  /** Name used in diagnostics, usually the file name */
  source?: string;
}

// ─── Field Parsing ───────────────────────────────────────────────────────────

function stripLeadingSpaces(value: string): string {
  return value.replace(/^ +/, "");
}

export function parseInteger(raw: string, column: string, loc: ErrorLocation): number {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new MalformedRecordError(`${column} is not an integer: "${raw}"`, loc);
  }
  return Number(trimmed);
}

/**
 * "16.5N" → 16.5, "81.5W" → -81.5.
 * The trailing letter must be one of the two hemispheres for the axis.
 */
export function parseCoordinate(
  raw: string,
  positive: "N" | "E",
  negative: "S" | "W",
  column: string,
  loc: ErrorLocation,
): number {
  const trimmed = raw.trim();
  const hemisphere = trimmed.slice(-1);
  if (hemisphere !== positive && hemisphere !== negative) {
    throw new MalformedRecordError(
      `${column} must end in ${positive} or ${negative}: "${raw}"`,
      loc,
    );
  }
  const magnitude = trimmed.slice(0, -1).trim();
  if (!MAGNITUDE_PATTERN.test(magnitude)) {
    throw new MalformedRecordError(
      `${column} must be an unsigned number followed by ${positive} or ${negative}: "${raw}"`,
      loc,
    );
  }
  const value = Number(magnitude);
  return hemisphere === negative ? -value : value;
}

// ─── Row Parsing ─────────────────────────────────────────────────────────────

export function parseHeaderRow(fields: string[], loc: ErrorLocation): RawHeader {
  const eventId = fields[0];
  if (eventId.length !== EVENT_ID_LENGTH) {
    throw new MalformedRecordError(
      `event_id must be ${EVENT_ID_LENGTH} characters, got "${eventId}"`,
      loc,
    );
  }
  return {
    event_id: eventId,
    basin: eventId.slice(0, 2),
    storm_num: eventId.slice(2, 4),
    year: eventId.slice(4, 8),
    name: stripLeadingSpaces(fields[1]),
    declared_point_count: parseInteger(fields[2], "declared_point_count", loc),
    line: loc.line ?? 0,
  };
}

export function parseObservationRow(
  fields: string[],
  eventId: string,
  loc: ErrorLocation,
): RawObservation {
  if (fields.length < MIN_OBSERVATION_FIELDS) {
    throw new MalformedRecordError(
      `observation has ${fields.length} fields, expected at least ${MIN_OBSERVATION_FIELDS}`,
      loc,
    );
  }

  const date = fields[COL.DATE];
  const time = fields[COL.TIME];
  const identifierField = fields[COL.IDENTIFIER];
  const statusField = fields[COL.STATUS];
  // A whitespace-only code column of any width is the blank code
  const identifierBlank = identifierField.trim() === "";
  const statusBlank = statusField.trim() === "";
  if (!statusBlank && statusField.length < 2) {
    throw new MalformedRecordError(`status column is too short: "${statusField}"`, loc);
  }

  const radius = (i: number): number =>
    parseInteger(fields[COL.RADII_START + i], RADII_FIELDS[i], loc);
  const radii: WindRadii<number> = {
    ne_34kt_radii_max_nm: radius(0),
    se_34kt_radii_max_nm: radius(1),
    sw_34kt_radii_max_nm: radius(2),
    nw_34kt_radii_max_nm: radius(3),
    ne_50kt_radii_max_nm: radius(4),
    se_50kt_radii_max_nm: radius(5),
    sw_50kt_radii_max_nm: radius(6),
    nw_50kt_radii_max_nm: radius(7),
    ne_64kt_radii_max_nm: radius(8),
    se_64kt_radii_max_nm: radius(9),
    sw_64kt_radii_max_nm: radius(10),
    nw_64kt_radii_max_nm: radius(11),
  };

  const rmwField = fields[COL.RADIUS_MAX_WIND];
  const radiusMaxWind =
    rmwField !== undefined && rmwField.trim() !== ""
      ? parseInteger(rmwField, "radius_max_wind_nm", loc)
      : null;

  return {
    event_id: eventId,
    year: date.slice(0, 4),
    month: date.slice(4, 6),
    day: date.slice(6, 8),
    hours_utc: stripLeadingSpaces(time).slice(0, 2),
    minutes_utc: time.slice(-2),
    identifier_code: identifierBlank ? BLANK_IDENTIFIER : identifierField.slice(-1),
    status_code: statusBlank ? BLANK_STATUS : statusField.slice(-2),
    latitude: parseCoordinate(fields[COL.LATITUDE], "N", "S", "latitude", loc),
    longitude: parseCoordinate(fields[COL.LONGITUDE], "E", "W", "longitude", loc),
    max_wind_knots: parseInteger(fields[COL.MAX_WIND], "max_wind_knots", loc),
    min_pressure_mb: parseInteger(fields[COL.MIN_PRESSURE], "min_pressure_mb", loc),
    radii,
    radius_max_wind_nm: radiusMaxWind,
    line: loc.line ?? 0,
  };
}

// ─── Extraction ──────────────────────────────────────────────────────────────

interface OpenStorm {
  header: RawHeader;
  observed: number;
}

/**
 * Extract headers and raw observations from one source file.
 *
 * @throws MalformedRecordError on the first line that cannot be extracted
 */
export function extractRecords(text: string, options: ExtractOptions = {}): ExtractedRecords {
  const source = options.source ?? "<input>";
  const headers: RawHeader[] = [];
  const observations: RawObservation[] = [];
  const warnings: string[] = [];
  const seenIds = new Set<string>();

  const closeStorm = (storm: OpenStorm): void => {
    const { header, observed } = storm;
    if (observed === 0) {
      throw new MalformedRecordError("storm header is not followed by any observation", {
        source,
        line: header.line,
        event_id: header.event_id,
      });
    }
    if (observed !== header.declared_point_count) {
      warnings.push(
        `${source}:${header.line} ${header.event_id} declares ${header.declared_point_count} points, found ${observed}`,
      );
    }
  };

  let current: OpenStorm | null = null;
  const lines = text.split("\n").map(l => (l.endsWith("\r") ? l.slice(0, -1) : l));

  // Blank lines after the last record are the file's tail; any earlier one is malformed
  let end = lines.length;
  while (end > 0 && lines[end - 1].trim() === "") end--;

  for (let i = 0; i < end; i++) {
    const line = i + 1;
    const row = lines[i];
    if (row.trim() === "") {
      throw new MalformedRecordError("blank line before the end of the file", {
        source,
        line,
        ...(current ? { event_id: current.header.event_id } : {}),
      });
    }

    const fields = row.split(",");

    if (fields.length === HEADER_FIELD_COUNT) {
      if (current) closeStorm(current);
      const header = parseHeaderRow(fields, { source, line });
      if (seenIds.has(header.event_id)) {
        throw new MalformedRecordError(`duplicate event_id "${header.event_id}"`, {
          source,
          line,
          event_id: header.event_id,
        });
      }
      seenIds.add(header.event_id);
      headers.push(header);
      current = { header, observed: 0 };
      continue;
    }

    if (!current) {
      throw new MalformedRecordError("observation row before any storm header", { source, line });
    }

    const eventId = current.header.event_id;
    observations.push(
      parseObservationRow(fields, eventId, {
        source,
        line,
        event_id: eventId,
        observation_index: current.observed,
      }),
    );
    current.observed++;
  }

  if (current) closeStorm(current);

  return { source, headers, observations, warnings };
}
