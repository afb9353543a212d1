// Record actions
export {
  InteractiveDeleteAction,
  printRecord,
  toAuditEntry,
  UnattendedDeleteAction,
} from "./actions.js";
export type {
  CallLogDeleter,
  DeleteActionDeps,
  RecordPrinter,
} from "./actions.js";
// API
export { CALL_LOG_PATH, CallLogApi, callLogPath, toQueryParams } from "./api.js";
export type { ApiResponse, CallLogTransport } from "./api.js";
// Commands
export { deleteCallLogs, fetchCallLogs, purgeCallLogs } from "./commands.js";
export type {
  CommandContext,
  CommandResult,
  DeleteOptions,
  FetchOptions,
  PurgeOptions,
} from "./commands.js";
// Config and session
export { loadConfig } from "./config.js";
export { openSession } from "./session.js";
// Transforms
export {
  daysBefore,
  formatCallLogRecord,
  formatParty,
  formatRecording,
  hasRecording,
  mapLeg,
  mapParty,
  mapRecord,
  mapRecording,
  parseCallLogPage,
  pathFromAbsoluteUri,
  toIsoMillis,
} from "./transform.js";
// Types
export type {
  CallLogExtensionRef,
  CallLogLeg,
  CallLogPage,
  CallLogParty,
  CallLogQuery,
  CallLogRecord,
  CallLogRecording,
  CallLogView,
  MalformedRecord,
  RecordingTypeFilter,
  RingCentralConfig,
} from "./types.js";
