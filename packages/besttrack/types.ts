/**
 * Best-Track Types
 *
 * Raw shapes produced by the extractor and the normalized rows handed to the
 * storage layer. Field names follow the load set columns (snake_case), the
 * same names the storage collaborator binds to.
 */

// ─── Geometry ────────────────────────────────────────────────────────────────

/** One vertex of a storm path. Wind and pressure ride along for path consumers. */
export interface PathVertex {
  longitude: number;
  latitude: number;
  max_wind_knots: number | null;
  min_pressure_mb: number | null;
}

export interface PointGeometry {
  type: "Point";
  coordinates: [number, number]; // [longitude, latitude]
}

export interface PointPath {
  type: "Point";
  vertex: PathVertex;
}

export interface LineStringPath {
  type: "LineString";
  vertices: PathVertex[];
}

/** Keyed purely on observation count: one → Point, more → LineString. */
export type StormPath = PointPath | LineStringPath;

// ─── Wind Radii ──────────────────────────────────────────────────────────────

/** Column order of the twelve radii fields in an observation row. */
export const RADII_FIELDS = [
  "ne_34kt_radii_max_nm",
  "se_34kt_radii_max_nm",
  "sw_34kt_radii_max_nm",
  "nw_34kt_radii_max_nm",
  "ne_50kt_radii_max_nm",
  "se_50kt_radii_max_nm",
  "sw_50kt_radii_max_nm",
  "nw_50kt_radii_max_nm",
  "ne_64kt_radii_max_nm",
  "se_64kt_radii_max_nm",
  "sw_64kt_radii_max_nm",
  "nw_64kt_radii_max_nm",
] as const;

export type RadiiField = (typeof RADII_FIELDS)[number];

export type WindRadii<T> = Record<RadiiField, T>;

// ─── Extracted (raw) ─────────────────────────────────────────────────────────

export interface RawHeader {
  event_id: string;
  basin: string;
  storm_num: string;
  year: string;
  name: string;
  declared_point_count: number;
  /** 1-based line number in its source */
  line: number;
}

export interface RawObservation {
  event_id: string;
  year: string;
  month: string;
  day: string;
  hours_utc: string;
  minutes_utc: string;
  /** Single-character record identifier, blank when absent */
  identifier_code: string;
  /** Two-character status code, blank when absent */
  status_code: string;
  latitude: number;
  longitude: number;
  max_wind_knots: number;
  min_pressure_mb: number;
  radii: WindRadii<number>;
  /** Present only in revisions of the format that carry a 21st value */
  radius_max_wind_nm: number | null;
  line: number;
}

export interface ExtractedRecords {
  source: string;
  headers: RawHeader[];
  observations: RawObservation[];
  warnings: string[];
}

// ─── Normalized ──────────────────────────────────────────────────────────────

export interface StormRecord {
  event_id: string;
  basin: string;
  name: string;
  start_time: string;
  path: StormPath;
  path_wkt: string;
}

export interface ObservationRecord extends WindRadii<number | null> {
  event_id: string;
  point_time: string;
  identifier: number | null;
  status: number | null;
  latitude: number;
  longitude: number;
  location: PointGeometry;
  location_wkt: string;
  max_wind_knots: number | null;
  min_pressure_mb: number | null;
  radius_max_wind_nm: number | null;
}

/** Reference row for a code table: { code_id, description } */
export interface CodeTableRow {
  code_id: number;
  description: string;
}

/** Everything one pipeline run hands to the storage layer, in load order. */
export interface LoadSet {
  sources: string[];
  storms: StormRecord[];
  observations: ObservationRecord[];
  identifierCodes: CodeTableRow[];
  statusCodes: CodeTableRow[];
  warnings: string[];
}
