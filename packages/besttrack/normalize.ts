/**
 * Best-Track Normalizer
 *
 * Raw extracted rows → typed Storm / Observation records.
 *
 * Pipeline order per observation (deterministic, no reordering):
 *   1. point_time from the date + time subfields
 *   2. identifier / status through the code tables
 *   3. sentinel → null per measure (wind -99, pressure and radii -999)
 *   4. location geometry
 *
 * Then per storm, with its observations in source order:
 *   5. start_time = first observation's point_time
 *   6. path = Point (one observation) or LineString (more)
 *
 * All-or-nothing: the first error aborts the file.
 */

import { decodeIdentifier, decodeStatus } from "./code_tables";
import { MalformedRecordError, TimestampError, type ErrorLocation } from "./errors";
import { buildStormPath, pathToWkt, pointGeometry, pointToWkt } from "./geometry";
import type {
  ExtractedRecords,
  ObservationRecord,
  PathVertex,
  RawObservation,
  StormRecord,
  WindRadii,
} from "./types";

// ─── Sentinels ───────────────────────────────────────────────────────────────

export const WIND_MISSING = -99;
export const PRESSURE_MISSING = -999;
export const RADII_MISSING = -999;

function orMissing(value: number, sentinel: number): number | null {
  return value === sentinel ? null : value;
}

// ─── Timestamp ───────────────────────────────────────────────────────────────

const POINT_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:00\.000Z$/;

/**
 * YYYY-MM-DDThh:mm:00.000Z, rejected unless it names a real instant
 * (Feb 30 or hour 24 would otherwise roll over silently).
 */
export function buildPointTime(raw: RawObservation, loc: ErrorLocation = {}): string {
  const iso = `${raw.year}-${raw.month}-${raw.day}T${raw.hours_utc}:${raw.minutes_utc}:00.000Z`;
  if (!POINT_TIME_PATTERN.test(iso)) {
    throw new TimestampError(`"${iso}" is not a UTC timestamp`, loc);
  }
  const millis = Date.parse(iso);
  if (Number.isNaN(millis) || new Date(millis).toISOString() !== iso) {
    throw new TimestampError(`"${iso}" is not a valid date/time`, loc);
  }
  return iso;
}

// ─── Observation ─────────────────────────────────────────────────────────────

function normalizeRadii(radii: WindRadii<number>): WindRadii<number | null> {
  return {
    ne_34kt_radii_max_nm: orMissing(radii.ne_34kt_radii_max_nm, RADII_MISSING),
    se_34kt_radii_max_nm: orMissing(radii.se_34kt_radii_max_nm, RADII_MISSING),
    sw_34kt_radii_max_nm: orMissing(radii.sw_34kt_radii_max_nm, RADII_MISSING),
    nw_34kt_radii_max_nm: orMissing(radii.nw_34kt_radii_max_nm, RADII_MISSING),
    ne_50kt_radii_max_nm: orMissing(radii.ne_50kt_radii_max_nm, RADII_MISSING),
    se_50kt_radii_max_nm: orMissing(radii.se_50kt_radii_max_nm, RADII_MISSING),
    sw_50kt_radii_max_nm: orMissing(radii.sw_50kt_radii_max_nm, RADII_MISSING),
    nw_50kt_radii_max_nm: orMissing(radii.nw_50kt_radii_max_nm, RADII_MISSING),
    ne_64kt_radii_max_nm: orMissing(radii.ne_64kt_radii_max_nm, RADII_MISSING),
    se_64kt_radii_max_nm: orMissing(radii.se_64kt_radii_max_nm, RADII_MISSING),
    sw_64kt_radii_max_nm: orMissing(radii.sw_64kt_radii_max_nm, RADII_MISSING),
    nw_64kt_radii_max_nm: orMissing(radii.nw_64kt_radii_max_nm, RADII_MISSING),
  };
}

export function normalizeObservation(raw: RawObservation, loc: ErrorLocation = {}): ObservationRecord {
  const location = pointGeometry(raw.longitude, raw.latitude);
  return {
    event_id: raw.event_id,
    point_time: buildPointTime(raw, loc),
    identifier: decodeIdentifier(raw.identifier_code, loc),
    status: decodeStatus(raw.status_code, loc),
    latitude: raw.latitude,
    longitude: raw.longitude,
    location,
    location_wkt: pointToWkt(location),
    max_wind_knots: orMissing(raw.max_wind_knots, WIND_MISSING),
    min_pressure_mb: orMissing(raw.min_pressure_mb, PRESSURE_MISSING),
    ...normalizeRadii(raw.radii),
    radius_max_wind_nm: raw.radius_max_wind_nm === null ? null : orMissing(raw.radius_max_wind_nm, RADII_MISSING),
  };
}

function toVertex(obs: ObservationRecord): PathVertex {
  return {
    longitude: obs.longitude,
    latitude: obs.latitude,
    max_wind_knots: obs.max_wind_knots,
    min_pressure_mb: obs.min_pressure_mb,
  };
}

// ─── Records ─────────────────────────────────────────────────────────────────

export interface NormalizedRecords {
  storms: StormRecord[];
  observations: ObservationRecord[];
}

/**
 * Normalize one file's extracted records.
 *
 * @throws TimestampError | UnknownCodeError on the first bad observation,
 *         MalformedRecordError if a storm has no observations
 */
export function normalizeRecords(extracted: ExtractedRecords): NormalizedRecords {
  const { source } = extracted;

  // Seeded in header order so each storm collects its rows in source order
  const byStorm = new Map<string, ObservationRecord[]>();
  for (const header of extracted.headers) byStorm.set(header.event_id, []);

  const observations: ObservationRecord[] = [];
  for (const raw of extracted.observations) {
    const rows = byStorm.get(raw.event_id);
    if (!rows) {
      throw new MalformedRecordError("observation references no extracted storm header", {
        source,
        line: raw.line,
        event_id: raw.event_id,
      });
    }
    const record = normalizeObservation(raw, {
      source,
      line: raw.line,
      event_id: raw.event_id,
      observation_index: rows.length,
    });
    rows.push(record);
    observations.push(record);
  }

  const storms = extracted.headers.map((header): StormRecord => {
    const rows = byStorm.get(header.event_id) ?? [];
    if (rows.length === 0) {
      throw new MalformedRecordError("storm has no observations", {
        source,
        line: header.line,
        event_id: header.event_id,
      });
    }
    const path = buildStormPath(rows.map(toVertex));
    return {
      event_id: header.event_id,
      basin: header.basin,
      name: header.name,
      start_time: rows[0].point_time,
      path,
      path_wkt: pathToWkt(path),
    };
  });

  return { storms, observations };
}
