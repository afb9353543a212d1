/**
 * Per-record deletion policies.
 *
 *   **interactive**  Show the record, ask for confirmation, delete only on
 *                    an explicit yes.
 *
 *   **unattended**   Show the record, delete it without asking when it
 *                    passes the eligibility predicate (by default: it has a
 *                    recording attached), skip it otherwise.
 *
 * Both share one delete step: a 204 is a deletion and is written to the
 * audit log exactly once; anything else is a failure for that record only.
 */

import type {
  AuditEntry,
  AuditLog,
  Confirmer,
  DeletionResult,
  Logger,
  RecordAction,
} from "../core/index.js";
import { errorMessage } from "../core/index.js";
import { formatCallLogRecord, hasRecording } from "./transform.js";
import type { CallLogRecord } from "./types.js";

export interface CallLogDeleter {
  deleteCallLog(id: string): Promise<void>;
}

export type RecordPrinter = (record: CallLogRecord) => void;

export const printRecord: RecordPrinter = (record) => {
  for (const line of formatCallLogRecord(record)) {
    console.log(line);
  }
};

export interface DeleteActionDeps {
  api: CallLogDeleter;
  auditLog: AuditLog;
  logger: Logger;
  print?: RecordPrinter;
  now?: () => Date;
}

export function toAuditEntry(
  record: CallLogRecord,
  deletedAt: Date,
): AuditEntry {
  return {
    deletedAt,
    id: record.id,
    startTime: record.startTime,
    direction: record.direction,
    from: record.from?.phoneNumber,
    to: record.to?.phoneNumber,
  };
}

abstract class DeleteAction implements RecordAction<CallLogRecord> {
  protected readonly deps: DeleteActionDeps;

  constructor(deps: DeleteActionDeps) {
    this.deps = deps;
  }

  abstract decide(record: CallLogRecord): Promise<DeletionResult>;

  protected show(record: CallLogRecord): void {
    (this.deps.print ?? printRecord)(record);
  }

  protected async delete(record: CallLogRecord): Promise<DeletionResult> {
    const { api, auditLog, logger } = this.deps;

    try {
      await api.deleteCallLog(record.id);
    } catch (err) {
      return { status: "failed", cause: errorMessage(err) };
    }

    const deletedAt = (this.deps.now ?? (() => new Date()))();
    try {
      await auditLog.record(toAuditEntry(record, deletedAt));
    } catch (err) {
      logger.error(
        `Deleted ${record.id} but could not write the audit log: ${errorMessage(err)}`,
      );
    }
    return { status: "deleted" };
  }
}

export class InteractiveDeleteAction extends DeleteAction {
  private readonly confirmer: Confirmer<CallLogRecord>;

  constructor(deps: DeleteActionDeps & { confirmer: Confirmer<CallLogRecord> }) {
    super(deps);
    this.confirmer = deps.confirmer;
  }

  async decide(record: CallLogRecord): Promise<DeletionResult> {
    this.show(record);
    if (!(await this.confirmer.confirm(record))) {
      return { status: "skipped", reason: "declined" };
    }
    return this.delete(record);
  }
}

export class UnattendedDeleteAction extends DeleteAction {
  private readonly eligible: (record: CallLogRecord) => boolean;
  private readonly ineligibleReason: string;

  constructor(
    deps: DeleteActionDeps & {
      eligible?: (record: CallLogRecord) => boolean;
      ineligibleReason?: string;
    },
  ) {
    super(deps);
    this.eligible = deps.eligible ?? hasRecording;
    this.ineligibleReason = deps.ineligibleReason ?? "no recording";
  }

  async decide(record: CallLogRecord): Promise<DeletionResult> {
    this.show(record);
    if (!this.eligible(record)) {
      return { status: "skipped", reason: this.ineligibleReason };
    }
    return this.delete(record);
  }
}
