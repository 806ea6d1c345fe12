/**
 * Best-Track Errors
 *
 * Every kind is fatal for the file being processed. None is retried and none
 * is downgraded to a skipped row: a dropped observation would corrupt the path
 * geometry of its storm.
 */

export type BestTrackErrorKind = "MalformedRecord" | "TimestampError" | "UnknownCodeError";

export interface ErrorLocation {
  source?: string;
  line?: number;
  event_id?: string;
  /** 0-based index of the observation within its storm */
  observation_index?: number;
}

export class BestTrackError extends Error {
  readonly kind: BestTrackErrorKind;
  readonly location: ErrorLocation;

  constructor(kind: BestTrackErrorKind, detail: string, location: ErrorLocation = {}) {
    super(`${kind}: ${detail}${formatLocation(location)}`);
    this.name = kind;
    this.kind = kind;
    this.location = location;
  }
}

export class MalformedRecordError extends BestTrackError {
  constructor(detail: string, location: ErrorLocation = {}) {
    super("MalformedRecord", detail, location);
  }
}

export class TimestampError extends BestTrackError {
  constructor(detail: string, location: ErrorLocation = {}) {
    super("TimestampError", detail, location);
  }
}

export class UnknownCodeError extends BestTrackError {
  readonly table: "identifier" | "status";
  readonly code: string;

  constructor(table: "identifier" | "status", code: string, location: ErrorLocation = {}) {
    super("UnknownCodeError", `${table} code "${code}" is not in the code table`, location);
    this.table = table;
    this.code = code;
  }
}

function formatLocation(loc: ErrorLocation): string {
  const parts: string[] = [];
  if (loc.source !== undefined) parts.push(loc.line !== undefined ? `${loc.source}:${loc.line}` : loc.source);
  else if (loc.line !== undefined) parts.push(`line ${loc.line}`);
  if (loc.event_id !== undefined) parts.push(`storm ${loc.event_id}`);
  if (loc.observation_index !== undefined) parts.push(`observation #${loc.observation_index}`);
  return parts.length > 0 ? ` (${parts.join(", ")})` : "";
}
