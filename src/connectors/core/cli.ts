#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { config as loadDotenv } from "dotenv";
import {
  CallLogApi,
  deleteCallLogs,
  fetchCallLogs,
  loadConfig,
  openSession,
  purgeCallLogs,
} from "../ringcentral/index.js";
import type {
  CallLogRecord,
  CommandResult,
  RingCentralConfig,
} from "../ringcentral/index.js";
import { createAuditLog } from "./audit-log.js";
import { systemClock } from "./clock.js";
import { ConsoleConfirmer, ScriptedConfirmer } from "./confirm.js";
import { AuthenticationError, ConfigError, errorMessage } from "./errors.js";
import { ThrottledExecutor } from "./executor.js";
import { createLogger, isLogLevel, LOG_LEVELS } from "./logger.js";
import { createRateLimiter } from "./rate-limiter.js";
import type { Confirmer, Logger, LogLevel, WorkflowSummary } from "./types.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

// ─── Option parsers ───

function isoDate(value: string): string {
  if (Number.isNaN(Date.parse(value))) {
    throw new InvalidArgumentError(
      "Expected an ISO 8601 date, e.g. 2025-11-01T00:00:00.000Z",
    );
  }
  return value;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer");
  }
  return n;
}

function logLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(", ")}`);
  }
  return value;
}

// ─── Wiring ───

async function connect(
  logger: Logger,
): Promise<{ config: RingCentralConfig; api: CallLogApi }> {
  const config = loadConfig();
  const transport = await openSession(config, logger);
  const limiter = createRateLimiter(
    { maxRequests: config.requestsPerWindow, windowMs: config.windowMs },
    systemClock,
    logger,
  );
  const executor = new ThrottledExecutor({
    limiter,
    logger,
    retry: { maxRetries: config.maxRetries },
  });
  return { config, api: new CallLogApi({ transport, executor, logger }) };
}

/** Exit with the command's code; config, login and fetch failures exit 1. */
async function run(task: () => Promise<number>): Promise<void> {
  try {
    process.exit(await task());
  } catch (err) {
    if (err instanceof ConfigError || err instanceof AuthenticationError) {
      console.error(err.message);
    } else {
      console.error(`Error fetching call logs: ${errorMessage(err)}`);
    }
    process.exit(1);
  }
}

function printSummary(summary: WorkflowSummary): void {
  console.log("\n═══ Deletion Summary ═══\n");
  console.log(
    `${summary.deleted} deleted, ${summary.skipped} skipped, ${summary.failed} failed of ${summary.processed} [${(summary.durationMs / 1000).toFixed(1)}s]`,
  );
  for (const err of summary.errors.slice(0, 5)) {
    console.log(`  ✗ ${err.entity}: ${err.error}`);
  }
  if (summary.errors.length > 5) {
    console.log(`  ... and ${summary.errors.length - 5} more errors`);
  }
}

function finish(result: CommandResult): number {
  if (result.status === "done") {
    printSummary(result.summary);
    console.log("\nFinished processing call logs.");
  }
  return 0;
}

// ─── Program ───

const program = new Command()
  .name("call-log-sweeper")
  .description(
    "Fetch and delete RingCentral call-log records within the API request quota",
  )
  .version("1.0.0")
  .option("--log_level <level>", "Lowest level to log", logLevel, "info");

function commandLogger(scope: string): Logger {
  return createLogger(scope, program.opts<{ log_level: LogLevel }>().log_level);
}

interface FetchFlags {
  date_from?: string;
  date_to?: string;
  phone_number?: string;
  per_page: number;
  detailed?: boolean;
}

program
  .command("fetch")
  .description("Print call-log records, following every page")
  .option(
    "--date_from <iso>",
    "Start of the range (default: 30 days before date_to)",
    isoDate,
  )
  .option("--date_to <iso>", "End of the range (default: now)", isoDate)
  .option("--phone_number <number>", "Only calls to or from this number")
  .option("--per_page <n>", "Records per page", positiveInt, 100)
  .option("--detailed", "Request the Detailed view and print call legs")
  .action(async (opts: FetchFlags) => {
    const logger = commandLogger("fetch");
    await run(async () => {
      const { api } = await connect(logger);
      const { count } = await fetchCallLogs(
        { api, logger },
        {
          dateFrom: opts.date_from,
          dateTo: opts.date_to,
          phoneNumber: opts.phone_number,
          perPage: opts.per_page,
          detailed: opts.detailed,
        },
      );
      if (count > 0) {
        console.log(`\nFinished printing ${count} call log records.`);
      }
      return 0;
    });
  });

interface DeleteFlags {
  phone_number: string;
  date_from?: string;
  date_to?: string;
  yes?: boolean;
}

program
  .command("delete")
  .description("Delete call logs for one phone number, confirming each record")
  .requiredOption(
    "--phone_number <number>",
    "Phone number to filter call logs for",
  )
  .option(
    "--date_from <iso>",
    "Start of the range (default: 24 hours ago)",
    isoDate,
  )
  .option("--date_to <iso>", "End of the range (default: now)", isoDate)
  .option("--yes", "Delete without asking for each record")
  .action(async (opts: DeleteFlags) => {
    const logger = commandLogger("delete");
    const prompt = opts.yes ? null : new ConsoleConfirmer<CallLogRecord>();
    const confirmer: Confirmer<CallLogRecord> =
      prompt ?? new ScriptedConfirmer<CallLogRecord>(true);

    await run(async () => {
      try {
        const { config, api } = await connect(logger);
        const result = await deleteCallLogs(
          { api, logger },
          {
            phoneNumber: opts.phone_number,
            dateFrom: opts.date_from,
            dateTo: opts.date_to,
            confirmer,
            auditLog: createAuditLog(config.auditFile, config.auditFormat),
          },
        );
        return finish(result);
      } finally {
        prompt?.close();
      }
    });
  });

interface PurgeFlags {
  older_than_days: number;
  date_from?: string;
  per_page: number;
}

program
  .command("purge")
  .description(
    "Delete every call log older than N days that has a recording, without prompting",
  )
  .option("--older_than_days <n>", "Age threshold in days", positiveInt, 30)
  .option("--date_from <iso>", "Ignore records before this date", isoDate)
  .option("--per_page <n>", "Records per page", positiveInt, 250)
  .action(async (opts: PurgeFlags) => {
    const logger = commandLogger("purge");
    await run(async () => {
      const { config, api } = await connect(logger);
      const result = await purgeCallLogs(
        { api, logger },
        {
          olderThanDays: opts.older_than_days,
          dateFrom: opts.date_from,
          perPage: opts.per_page,
          auditLog: createAuditLog(config.auditFile, config.auditFormat),
        },
      );
      return finish(result);
    });
  });

await program.parseAsync();
