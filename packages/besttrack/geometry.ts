/**
 * Best-Track Geometry
 *
 * Storm paths and observation locations, plus their WKT text. The storage
 * layer builds its spatial column from the WKT (SRID 4326).
 *
 * Path vertices are rendered "lon lat wind pressure" with NULL for a missing
 * measure, so consumers that parse the path string keep one token per column.
 */

import type { LineStringPath, PathVertex, PointGeometry, PointPath, StormPath } from "./types";

export const NULL_TOKEN = "NULL";

export function pointGeometry(longitude: number, latitude: number): PointGeometry {
  return { type: "Point", coordinates: [longitude, latitude] };
}

/**
 * Build the path of one storm from its vertices in observation order.
 * @throws Error on an empty vertex list (extraction guarantees at least one)
 */
export function buildStormPath(vertices: PathVertex[]): StormPath {
  if (vertices.length === 0) {
    throw new Error("Cannot build a storm path from zero observations");
  }
  if (vertices.length === 1) {
    const point: PointPath = { type: "Point", vertex: vertices[0] };
    return point;
  }
  const line: LineStringPath = { type: "LineString", vertices: [...vertices] };
  return line;
}

export function pathVertices(path: StormPath): PathVertex[] {
  return path.type === "Point" ? [path.vertex] : path.vertices;
}

// ─── WKT ─────────────────────────────────────────────────────────────────────

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/** "1e-7" → "0.0000001", "1.5e+21" → "1500000000000000000000" */
function expandExponent(text: string): string {
  const match = EXPONENT_FORM.exec(text);
  if (!match) return text;
  const [, sign, lead, rest = "", exponent] = match;
  const digits = lead + rest;
  const point = 1 + Number(exponent);
  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`;
  if (point >= digits.length) return sign + digits + "0".repeat(point - digits.length);
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/** Plain decimal, never exponent notation; -0 renders as "0" */
export function formatNumber(value: number): string {
  return Object.is(value, -0) ? "0" : expandExponent(String(value));
}

function measureToken(value: number | null): string {
  return value === null ? NULL_TOKEN : formatNumber(value);
}

export function vertexToken(v: PathVertex): string {
  return [
    formatNumber(v.longitude),
    formatNumber(v.latitude),
    measureToken(v.max_wind_knots),
    measureToken(v.min_pressure_mb),
  ].join(" ");
}

export function pathToWkt(path: StormPath): string {
  const body = pathVertices(path).map(vertexToken).join(",");
  return path.type === "Point" ? `POINT(${body})` : `LINESTRING(${body})`;
}

export function pointToWkt(point: PointGeometry): string {
  const [lon, lat] = point.coordinates;
  return `POINT(${formatNumber(lon)} ${formatNumber(lat)})`;
}
