// Audit log
export {
  createAuditLog,
  FileAuditLog,
  formatAuditJsonl,
  formatAuditText,
} from "./audit-log.js";
// Clock
export { sleep, systemClock } from "./clock.js";
// Confirmation
export {
  CONFIRM_PROMPT,
  ConsoleConfirmer,
  isAffirmative,
  ScriptedConfirmer,
} from "./confirm.js";
// Errors
export {
  AuthenticationError,
  ConfigError,
  DeleteRejectedError,
  errorMessage,
  MalformedResponseError,
  readHeader,
  readStatus,
} from "./errors.js";
// Throttled executor
export { ThrottledExecutor } from "./executor.js";
// Logger
export {
  ConsoleLogger,
  createLogger,
  isLogLevel,
  LOG_LEVELS,
} from "./logger.js";
export type { LogSink } from "./logger.js";
// Pagination
export { collect, walkCursorPages, walkNumberedPages } from "./pagination.js";
// Rate limiter
export { createRateLimiter, SlidingWindowLimiter } from "./rate-limiter.js";
// Retry policy
export {
  classifyError,
  createRetryState,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_AFTER_MS,
  decideRetry,
  MAX_BACKOFF_MS,
  parseRetryAfter,
  withRetry,
} from "./retry.js";
// Workflow
export { DeletionWorkflow } from "./workflow.js";
export type { DeletionWorkflowConfig } from "./workflow.js";

export type {
  AttemptOutcome,
  AuditEntry,
  AuditFormat,
  AuditLog,
  Clock,
  Confirmer,
  CursorPage,
  DeletionResult,
  Logger,
  LogLevel,
  RateLimiter,
  RateLimiterConfig,
  RecordAction,
  RequestExecutor,
  RetryDecision,
  RetryOptions,
  RetryState,
  WorkflowError,
  WorkflowSummary,
} from "./types.js";
