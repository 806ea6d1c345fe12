/**
 * Row builders for best-track test input.
 *
 * Columns are padded the way the published files pad them, and every
 * observation row ends with a trailing comma (one empty field past the last value).
 */

const pad = (value: number | string, width: number): string => String(value).padStart(width, " ");

export const NO_RADII: number[] = new Array<number>(12).fill(0);

export function headerRow(eventId: string, name: string, declared: number): string {
  return `${eventId},${pad(name, 19)},${pad(declared, 7)},`;
}

export interface ObservationFields {
  date: string;
  time: string;
  identifier?: string;
  status?: string;
  lat: string;
  lon: string;
  wind: number;
  pressure: number;
  radii?: number[];
  /** Extra columns after the 12 radii (e.g. radius of maximum wind) */
  extra?: string[];
}

export function observationRow(f: ObservationFields): string {
  return [
    f.date,
    pad(f.time, 5),
    pad(f.identifier ?? "", 2),
    pad(f.status ?? "", 3),
    pad(f.lat, 6),
    pad(f.lon, 7),
    pad(f.wind, 4),
    pad(f.pressure, 5),
    ...(f.radii ?? NO_RADII).map(r => pad(r, 5)),
    ...(f.extra ?? []),
    "",
  ].join(",");
}

/** Three-point storm with a landfall and one set of full radii */
export const ARLO_LINES = [
  headerRow("AL012031", "ARLO", 3),
  observationRow({ date: "20310704", time: "0000", status: "TD", lat: "12.0N", lon: "45.5W", wind: 30, pressure: 1008 }),
  observationRow({
    date: "20310704", time: "0600", status: "TS", lat: "12.4N", lon: "46.1W", wind: 40, pressure: 1004,
    radii: [60, 40, 0, 30, 0, 0, 0, 0, 0, 0, 0, 0],
  }),
  observationRow({
    date: "20310704", time: "1130", identifier: "L", status: "HU", lat: "13.0N", lon: "47.0W", wind: 65, pressure: 985,
    radii: [90, 70, 50, 60, 40, 30, 20, 30, 20, 15, 10, 15],
  }),
];

/** Single-point storm with every measure missing */
export const BRYN_LINES = [
  headerRow("EP022031", "BRYN", 1),
  observationRow({
    date: "20310812", time: "1800", status: "LO", lat: "8.5S", lon: "170.2E", wind: -99, pressure: -999,
    radii: new Array<number>(12).fill(-999),
  }),
];

export const SAMPLE_TEXT = [...ARLO_LINES, ...BRYN_LINES].join("\n") + "\n";
