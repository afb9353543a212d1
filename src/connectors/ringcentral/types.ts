/**
 * RingCentral call-log type definitions.
 *
 * Domain types used by the connector, mapped from the raw JSON the call-log
 * endpoint returns. Every field except `id` is optional because the API
 * omits fields it has no value for.
 */

import type { AuditFormat } from "../core/index.js";

// ─── Parties and recordings ───

export interface CallLogParty {
  phoneNumber?: string;
  extensionNumber?: string;
  name?: string;
  location?: string;
}

export interface CallLogRecording {
  id: string;
  type?: string;
  contentUri?: string;
}

export interface CallLogExtensionRef {
  id?: string;
  uri?: string;
}

// ─── Legs (Detailed view only) ───

export interface CallLogLeg {
  startTime?: string;
  duration?: number;
  type?: string;
  direction?: string;
  action?: string;
  result?: string;
  from?: CallLogParty;
  to?: CallLogParty;
  telephonySessionId?: string;
  transport?: string;
  legType?: string;
  extension?: CallLogExtensionRef;
  recording?: CallLogRecording;
}

// ─── Record ───

export interface CallLogRecord {
  id: string;
  uri?: string;
  sessionId?: string;
  telephonySessionId?: string;
  startTime?: string;
  /** Seconds. */
  duration?: number;
  type?: string;
  direction?: string;
  action?: string;
  result?: string;
  from?: CallLogParty;
  to?: CallLogParty;
  transport?: string;
  lastModifiedTime?: string;
  recording?: CallLogRecording;
  legs: CallLogLeg[];
}

// ─── Pages ───

export interface MalformedRecord {
  index: number;
  reason: string;
}

export interface CallLogPage {
  records: CallLogRecord[];
  /** `navigation.nextPage.uri`, absent on the last page. */
  nextPageUri: string | null;
  malformed: MalformedRecord[];
}

// ─── Query ───

export type CallLogView = "Simple" | "Detailed";

export type RecordingTypeFilter = "All" | "Automatic" | "OnDemand";

export interface CallLogQuery {
  view: CallLogView;
  phoneNumber?: string;
  dateFrom?: string;
  dateTo?: string;
  recordingType: RecordingTypeFilter;
  perPage: number;
  page: number;
}

// ─── Config ───

export interface RingCentralConfig {
  clientId: string;
  clientSecret: string;
  jwt: string;
  server: string;
  requestsPerWindow: number;
  windowMs: number;
  maxRetries: number;
  auditFile: string;
  auditFormat: AuditFormat;
}
