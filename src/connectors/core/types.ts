/** Core type definitions for call-log-sweeper. */

// ─── Clock ───

export interface Clock {
  /** Monotonic milliseconds. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  maxRequests?: number;
  windowMs?: number;
}

export interface RateLimiter {
  admit(): Promise<void>;
  inWindow(): number;
}

// ─── Retry ───

export type AttemptOutcome<T> =
  | { kind: "success"; value: T }
  | { kind: "rate-limited"; retryAfterMs: number | null; error: unknown }
  | { kind: "transient"; error: unknown }
  | { kind: "fatal"; error: unknown };

export interface RetryState {
  attempt: number;
  readonly maxRetries: number;
}

export type RetryDecision =
  | { action: "done" }
  | { action: "retry"; delayMs: number; state: RetryState }
  | { action: "give-up" };

export interface RetryOptions {
  maxRetries?: number;
  defaultRetryAfterMs?: number;
  maxBackoffMs?: number;
  isFatal?: (err: unknown) => boolean;
}

// ─── Executor ───

export interface RequestExecutor {
  execute<T>(label: string, requestFn: () => Promise<T>): Promise<T>;
}

// ─── Pagination ───

export interface CursorPage<T> {
  items: T[];
  next: string | null;
}

// ─── Workflow ───

export type DeletionResult =
  | { status: "deleted" }
  | { status: "skipped"; reason: string }
  | { status: "failed"; cause: string };

export interface RecordAction<T> {
  decide(record: T): Promise<DeletionResult>;
}

export interface Confirmer<T> {
  confirm(record: T): Promise<boolean>;
}

export interface WorkflowError {
  entity: string;
  error: string;
}

export interface WorkflowSummary {
  processed: number;
  deleted: number;
  skipped: number;
  failed: number;
  errors: WorkflowError[];
  durationMs: number;
}

// ─── Logger ───

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

// ─── Audit Log ───

export interface AuditEntry {
  deletedAt: Date;
  id: string;
  startTime?: string;
  direction?: string;
  from?: string;
  to?: string;
}

export type AuditFormat = "text" | "jsonl";

export interface AuditLog {
  record(entry: AuditEntry): Promise<void>;
}
