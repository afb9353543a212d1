import { errorMessage } from "./errors.js";
import type {
  DeletionResult,
  Logger,
  RecordAction,
  WorkflowSummary,
} from "./types.js";

export interface DeletionWorkflowConfig<T> {
  action: RecordAction<T>;
  logger: Logger;
  /** Identifier used in logs and the error summary. */
  describe: (record: T) => string;
  onResult?: (record: T, result: DeletionResult) => void;
}

/**
 * Drives a record action over a record stream, one record at a time.
 *
 * A failure on one record is recorded and the run moves on; a failure of
 * the stream itself propagates to the caller.
 */
export class DeletionWorkflow<T> {
  private readonly config: DeletionWorkflowConfig<T>;

  constructor(config: DeletionWorkflowConfig<T>) {
    this.config = config;
  }

  async run(records: AsyncIterable<T> | Iterable<T>): Promise<WorkflowSummary> {
    const { action, logger, describe, onResult } = this.config;
    const startTime = Date.now();
    const summary: WorkflowSummary = {
      processed: 0,
      deleted: 0,
      skipped: 0,
      failed: 0,
      errors: [],
      durationMs: 0,
    };

    for await (const record of records) {
      const entity = describe(record);
      let result: DeletionResult;
      try {
        result = await action.decide(record);
      } catch (err) {
        result = { status: "failed", cause: errorMessage(err) };
      }

      summary.processed++;
      switch (result.status) {
        case "deleted":
          summary.deleted++;
          logger.info(`Deleted ${entity}`);
          break;
        case "skipped":
          summary.skipped++;
          logger.info(`Skipped ${entity} (${result.reason})`);
          break;
        case "failed":
          summary.failed++;
          summary.errors.push({ entity, error: result.cause });
          logger.error(`Failed to delete ${entity}: ${result.cause}`);
          break;
      }
      onResult?.(record, result);
    }

    summary.durationMs = Date.now() - startTime;
    return summary;
  }
}
