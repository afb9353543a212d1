/**
 * Mapping and formatting for RingCentral call-log payloads.
 *
 * Raw JSON is narrowed field by field into the domain types; nothing
 * downstream reads the raw payload.
 */

import { MalformedResponseError } from "../core/index.js";
import type {
  CallLogExtensionRef,
  CallLogLeg,
  CallLogPage,
  CallLogParty,
  CallLogRecord,
  CallLogRecording,
  MalformedRecord,
} from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

// ─── Narrowing helpers ───

type RawObject = Record<string, unknown>;

function isRawObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asObject(value: unknown): RawObject | undefined {
  return isRawObject(value) ? value : undefined;
}

function str(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value)
    ? value
    : undefined;
}

// ─── Mappers ───

export function mapParty(raw: unknown): CallLogParty | undefined {
  const obj = asObject(raw);
  if (!obj) return undefined;
  return {
    phoneNumber: str(obj.phoneNumber),
    extensionNumber: str(obj.extensionNumber),
    name: str(obj.name),
    location: str(obj.location),
  };
}

export function mapRecording(raw: unknown): CallLogRecording | undefined {
  const obj = asObject(raw);
  if (!obj) return undefined;
  return {
    id: str(obj.id) ?? "",
    type: str(obj.type),
    contentUri: str(obj.contentUri),
  };
}

function mapExtension(raw: unknown): CallLogExtensionRef | undefined {
  const obj = asObject(raw);
  if (!obj) return undefined;
  return { id: str(obj.id), uri: str(obj.uri) };
}

export function mapLeg(raw: unknown): CallLogLeg {
  const obj = asObject(raw) ?? {};
  return {
    startTime: str(obj.startTime),
    duration: num(obj.duration),
    type: str(obj.type),
    direction: str(obj.direction),
    action: str(obj.action),
    result: str(obj.result),
    from: mapParty(obj.from),
    to: mapParty(obj.to),
    telephonySessionId: str(obj.telephonySessionId),
    transport: str(obj.transport),
    legType: str(obj.legType),
    extension: mapExtension(obj.extension),
    recording: mapRecording(obj.recording),
  };
}

/** Throws `MalformedResponseError` when the record has no usable id. */
export function mapRecord(raw: unknown): CallLogRecord {
  const obj = asObject(raw);
  if (!obj) {
    throw new MalformedResponseError("call-log record is not an object");
  }
  const id = str(obj.id);
  if (!id) {
    throw new MalformedResponseError("call-log record has no id");
  }

  return {
    id,
    uri: str(obj.uri),
    sessionId: str(obj.sessionId),
    telephonySessionId: str(obj.telephonySessionId),
    startTime: str(obj.startTime),
    duration: num(obj.duration),
    type: str(obj.type),
    direction: str(obj.direction),
    action: str(obj.action),
    result: str(obj.result),
    from: mapParty(obj.from),
    to: mapParty(obj.to),
    transport: str(obj.transport),
    lastModifiedTime: str(obj.lastModifiedTime),
    recording: mapRecording(obj.recording),
    legs: Array.isArray(obj.legs) ? obj.legs.map(mapLeg) : [],
  };
}

export function parseCallLogPage(raw: unknown): CallLogPage {
  const body = asObject(raw);
  if (!body || !Array.isArray(body.records)) {
    throw new MalformedResponseError(
      "call-log response has no records collection",
    );
  }

  const records: CallLogRecord[] = [];
  const malformed: MalformedRecord[] = [];
  body.records.forEach((item: unknown, index: number) => {
    try {
      records.push(mapRecord(item));
    } catch (err) {
      if (!(err instanceof MalformedResponseError)) throw err;
      malformed.push({ index, reason: err.message });
    }
  });

  const navigation = asObject(body.navigation);
  const nextPage = asObject(navigation?.nextPage);
  const nextPageUri = str(nextPage?.uri) || null;

  return { records, nextPageUri, malformed };
}

// ─── Predicates and URIs ───

export function hasRecording(record: CallLogRecord): boolean {
  return record.recording !== undefined;
}

/** Reduce an absolute URI to `path?query`; relative references pass through. */
export function pathFromAbsoluteUri(uri: string): string {
  let parsed: URL;
  try {
    parsed = new URL(uri);
  } catch {
    return uri;
  }
  return parsed.search ? `${parsed.pathname}${parsed.search}` : parsed.pathname;
}

// ─── Dates ───

/** ISO-8601 with milliseconds and a `Z` suffix, e.g. `2025-11-01T00:00:00.000Z`. */
export function toIsoMillis(date: Date): string {
  return date.toISOString();
}

export function daysBefore(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}

// ─── Printing ───

function show(value: string | number | undefined): string {
  return value === undefined ? "None" : String(value);
}

export function formatParty(label: string, party?: CallLogParty): string {
  if (!party) return `${label}: None`;
  const base = `${label}: ${show(party.phoneNumber)} (${show(party.name)})`;
  return party.location ? `${base} | location: ${party.location}` : base;
}

export function formatRecording(recording?: CallLogRecording): string {
  if (!recording) return "recording: None";
  const base = `recording: id=${recording.id}, type=${show(recording.type)}`;
  return recording.contentUri
    ? `${base}, contentUri=${recording.contentUri}`
    : base;
}

function formatLeg(index: number, leg: CallLogLeg): string[] {
  const lines = [
    `---- Leg ${index} ----`,
    `startTime: ${show(leg.startTime)}`,
    `duration: ${show(leg.duration)}`,
    `type: ${show(leg.type)}`,
    `direction: ${show(leg.direction)}`,
    `action: ${show(leg.action)}`,
    `result: ${show(leg.result)}`,
    formatParty("to", leg.to),
    formatParty("from", leg.from),
    `telephonySessionId: ${show(leg.telephonySessionId)}`,
    `transport: ${show(leg.transport)}`,
    `legType: ${show(leg.legType)}`,
  ];
  if (leg.extension) {
    lines.push(
      `extension: id=${show(leg.extension.id)}, uri=${show(leg.extension.uri)}`,
    );
  }
  lines.push(formatRecording(leg.recording));
  return lines;
}

export function formatCallLogRecord(
  record: CallLogRecord,
  opts: { legs?: boolean } = {},
): string[] {
  const lines = [
    "--------- Call Log Record ---------",
    `id: ${record.id}`,
    `uri: ${show(record.uri)}`,
    `sessionId: ${show(record.sessionId)}`,
    `startTime: ${show(record.startTime)}`,
    `duration: ${show(record.duration)}`,
    `type: ${show(record.type)}`,
    `direction: ${show(record.direction)}`,
    `action: ${show(record.action)}`,
    `result: ${show(record.result)}`,
    formatParty("to", record.to),
    formatParty("from", record.from),
    `transport: ${show(record.transport)}`,
    `lastModifiedTime: ${show(record.lastModifiedTime)}`,
    formatRecording(record.recording),
  ];

  if (opts.legs) {
    if (record.legs.length > 0) {
      lines.push(`legs count: ${record.legs.length}`);
      record.legs.forEach((leg, i) => lines.push(...formatLeg(i + 1, leg)));
    } else {
      lines.push("legs: []");
    }
  }

  lines.push("-----------------------------------");
  return lines;
}
