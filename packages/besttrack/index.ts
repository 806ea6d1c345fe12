/**
 * Best-Track — Public API
 *
 * Extract + normalize best-track text files into the load set handed to the
 * storage layer: storms, observations and the two code tables.
 *
 * Several files (one per basin) are processed independently and concatenated
 * in the order given. Code tables are shared read-only constants.
 */

import { identifierCodeRows, statusCodeRows } from "./code_tables";
import { MalformedRecordError } from "./errors";
import { extractRecords } from "./extract";
import { normalizeRecords } from "./normalize";
import type { LoadSet } from "./types";

export interface SourceText {
  /** File name or other label used in diagnostics */
  name: string;
  text: string;
}

/**
 * Run extraction and normalization on one source file.
 * @throws BestTrackError subclasses, fatal for this file
 */
export function processSource(source: SourceText): LoadSet {
  const extracted = extractRecords(source.text, { source: source.name });
  const { storms, observations } = normalizeRecords(extracted);
  return {
    sources: [source.name],
    storms,
    observations,
    identifierCodes: identifierCodeRows(),
    statusCodes: statusCodeRows(),
    warnings: extracted.warnings,
  };
}

/** Called once per file, after it is processed and before it is appended. */
export type SourceProcessedHook = (source: SourceText, part: LoadSet) => void;

/**
 * Process files in order and concatenate. event_id stays unique across files.
 */
export function processSources(sources: SourceText[], onSource?: SourceProcessedHook): LoadSet {
  const combined: LoadSet = {
    sources: [],
    storms: [],
    observations: [],
    identifierCodes: identifierCodeRows(),
    statusCodes: statusCodeRows(),
    warnings: [],
  };
  const owner = new Map<string, string>();

  for (const source of sources) {
    const part = processSource(source);
    onSource?.(source, part);
    for (const storm of part.storms) {
      const first = owner.get(storm.event_id);
      if (first !== undefined) {
        throw new MalformedRecordError(`event_id "${storm.event_id}" already loaded from ${first}`, {
          source: source.name,
          event_id: storm.event_id,
        });
      }
      owner.set(storm.event_id, source.name);
    }
    combined.sources.push(...part.sources);
    combined.storms.push(...part.storms);
    combined.observations.push(...part.observations);
    combined.warnings.push(...part.warnings);
  }

  return combined;
}

export { extractRecords, parseCoordinate, parseHeaderRow, parseObservationRow } from "./extract";
export type { ExtractOptions } from "./extract";
export {
  normalizeRecords,
  normalizeObservation,
  buildPointTime,
  WIND_MISSING,
  PRESSURE_MISSING,
  RADII_MISSING,
} from "./normalize";
export type { NormalizedRecords } from "./normalize";
export {
  IDENTIFIER_CODES,
  STATUS_CODES,
  IDENTIFIER_MISSING_CODES,
  STATUS_MISSING_CODES,
  decodeIdentifier,
  decodeStatus,
  identifierCodeRows,
  statusCodeRows,
} from "./code_tables";
export { buildStormPath, formatNumber, pathToWkt, pointGeometry, pointToWkt, vertexToken, NULL_TOKEN } from "./geometry";
export {
  BestTrackError,
  MalformedRecordError,
  TimestampError,
  UnknownCodeError,
} from "./errors";
export type { BestTrackErrorKind, ErrorLocation } from "./errors";
export { RADII_FIELDS } from "./types";
export type {
  CodeTableRow,
  ExtractedRecords,
  LoadSet,
  LineStringPath,
  ObservationRecord,
  PathVertex,
  PointGeometry,
  PointPath,
  RadiiField,
  RawHeader,
  RawObservation,
  StormPath,
  StormRecord,
  WindRadii,
} from "./types";
