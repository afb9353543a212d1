/**
 * The three call-log jobs behind the CLI: list, targeted delete, purge.
 *
 * Deleting jobs read the whole result set before the first DELETE so that
 * page offsets on the server do not move under the traversal.
 */

import type {
  AuditLog,
  Confirmer,
  Logger,
  RecordAction,
  WorkflowSummary,
} from "../core/index.js";
import { collect, DeletionWorkflow } from "../core/index.js";
import { InteractiveDeleteAction, UnattendedDeleteAction } from "./actions.js";
import type { CallLogApi } from "./api.js";
import { daysBefore, formatCallLogRecord, toIsoMillis } from "./transform.js";
import type { CallLogQuery, CallLogRecord } from "./types.js";

export interface CommandContext {
  api: CallLogApi;
  logger: Logger;
  /** Receives every printed line; defaults to stdout. */
  out?: (line: string) => void;
}

export type CommandResult =
  | { status: "empty"; notice: string }
  | { status: "done"; summary: WorkflowSummary };

function writer(ctx: CommandContext): (line: string) => void {
  return ctx.out ?? ((line) => console.log(line));
}

// ─── fetch ───

export interface FetchOptions {
  dateFrom?: string;
  dateTo?: string;
  phoneNumber?: string;
  perPage?: number;
  detailed?: boolean;
  now?: Date;
}

export async function fetchCallLogs(
  ctx: CommandContext,
  opts: FetchOptions = {},
): Promise<{ count: number }> {
  const out = writer(ctx);
  const now = opts.now ?? new Date();
  const dateTo = opts.dateTo ?? toIsoMillis(now);
  const dateFrom =
    opts.dateFrom ?? toIsoMillis(daysBefore(new Date(dateTo), 30));

  const query: CallLogQuery = {
    view: opts.detailed ? "Detailed" : "Simple",
    phoneNumber: opts.phoneNumber,
    dateFrom,
    dateTo,
    recordingType: "All",
    perPage: opts.perPage ?? 100,
    page: 1,
  };

  let count = 0;
  for await (const record of ctx.api.walkCallLogs(query)) {
    for (const line of formatCallLogRecord(record, { legs: opts.detailed })) {
      out(line);
    }
    out("");
    count++;
  }

  if (count === 0) {
    out(`No call logs found between ${dateFrom} and ${dateTo}.`);
  }
  return { count };
}

// ─── delete (targeted, interactive) ───

export interface DeleteOptions {
  phoneNumber: string;
  dateFrom?: string;
  dateTo?: string;
  confirmer: Confirmer<CallLogRecord>;
  auditLog: AuditLog;
  now?: Date;
}

export async function deleteCallLogs(
  ctx: CommandContext,
  opts: DeleteOptions,
): Promise<CommandResult> {
  const out = writer(ctx);
  const now = opts.now ?? new Date();
  const dateTo = opts.dateTo ?? toIsoMillis(now);
  const dateFrom = opts.dateFrom ?? toIsoMillis(daysBefore(now, 1));

  const records = await collect(
    ctx.api.walkCallLogs({
      view: "Simple",
      phoneNumber: opts.phoneNumber,
      dateFrom,
      dateTo,
      recordingType: "All",
      perPage: 100,
      page: 1,
    }),
  );

  if (records.length === 0) {
    const notice = `No call logs found for the specified phone number (${opts.phoneNumber}) between ${dateFrom} and ${dateTo}.`;
    out(notice);
    return { status: "empty", notice };
  }

  const action = new InteractiveDeleteAction({
    api: ctx.api,
    auditLog: opts.auditLog,
    logger: ctx.logger,
    confirmer: opts.confirmer,
    print: (record) => formatCallLogRecord(record).forEach((l) => out(l)),
  });
  const summary = await runWorkflow(ctx, action, records);
  return { status: "done", summary };
}

// ─── purge (older than N days, unattended) ───

export interface PurgeOptions {
  olderThanDays: number;
  dateFrom?: string;
  perPage?: number;
  auditLog: AuditLog;
  now?: Date;
}

export async function purgeCallLogs(
  ctx: CommandContext,
  opts: PurgeOptions,
): Promise<CommandResult> {
  const out = writer(ctx);
  const dateTo = toIsoMillis(
    daysBefore(opts.now ?? new Date(), opts.olderThanDays),
  );

  const records = await collect(
    ctx.api.walkCallLogsByPage({
      view: "Simple",
      dateFrom: opts.dateFrom,
      dateTo,
      recordingType: "All",
      perPage: opts.perPage ?? 250,
      page: 1,
    }),
  );

  if (records.length === 0) {
    const notice = `No call logs found older than ${dateTo}.`;
    out(notice);
    return { status: "empty", notice };
  }

  const action = new UnattendedDeleteAction({
    api: ctx.api,
    auditLog: opts.auditLog,
    logger: ctx.logger,
    print: (record) => formatCallLogRecord(record).forEach((l) => out(l)),
  });
  const summary = await runWorkflow(ctx, action, records);
  return { status: "done", summary };
}

function runWorkflow(
  ctx: CommandContext,
  action: RecordAction<CallLogRecord>,
  records: CallLogRecord[],
): Promise<WorkflowSummary> {
  ctx.logger.info(`Processing ${records.length} call log records`);
  return new DeletionWorkflow<CallLogRecord>({
    action,
    logger: ctx.logger,
    describe: (record) => `call log ${record.id}`,
  }).run(records);
}
