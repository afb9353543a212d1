import { describe, expect, it } from "vitest";
import {
  ScriptedConfirmer,
  SlidingWindowLimiter,
  ThrottledExecutor,
} from "../../../src/connectors/core/index.js";
import { CALL_LOG_PATH, CallLogApi } from "../../../src/connectors/ringcentral/api.js";
import {
  deleteCallLogs,
  fetchCallLogs,
  purgeCallLogs,
} from "../../../src/connectors/ringcentral/commands.js";
import type { CallLogRecord } from "../../../src/connectors/ringcentral/types.js";
import {
  FakeClock,
  FakeTransport,
  jsonResponse,
  makeLogger,
  MemoryAuditLog,
  rawRecords,
} from "../helpers.js";

const now = new Date("2025-12-01T00:00:00.000Z");

function setup() {
  const clock = new FakeClock();
  const logger = makeLogger();
  const transport = new FakeTransport();
  const api = new CallLogApi({
    transport,
    logger,
    executor: new ThrottledExecutor({
      limiter: new SlidingWindowLimiter({}, clock),
      logger,
      clock,
    }),
  });
  const lines: string[] = [];
  const ctx = { api, logger, out: (line: string) => lines.push(line) };
  return { transport, logger, lines, ctx };
}

describe("fetchCallLogs", () => {
  it("prints every record and defaults to the last 30 days", async () => {
    const { transport, lines, ctx } = setup();
    transport.onGet = async () => jsonResponse({ records: rawRecords(2) });

    const result = await fetchCallLogs(ctx, {
      dateTo: "2025-12-01T00:00:00.000Z",
      phoneNumber: "+15550000001",
    });

    expect(result).toEqual({ count: 2 });
    expect(transport.gets[0].query).toEqual({
      view: "Simple",
      recordingType: "All",
      perPage: 100,
      page: 1,
      phoneNumber: "+15550000001",
      dateFrom: "2025-11-01T00:00:00.000Z",
      dateTo: "2025-12-01T00:00:00.000Z",
    });
    expect(lines).toHaveLength(34);
    expect(lines[1]).toBe("id: rec-0");
    expect(lines[16]).toBe("");
    expect(lines[18]).toBe("id: rec-1");
  });

  it("asks for the detailed view and prints legs", async () => {
    const { transport, lines, ctx } = setup();
    transport.onGet = async () => jsonResponse({ records: rawRecords(1) });

    await fetchCallLogs(ctx, { detailed: true, now });

    expect(transport.gets[0].query?.view).toBe("Detailed");
    expect(transport.gets[0].query?.dateTo).toBe("2025-12-01T00:00:00.000Z");
    expect(lines).toContain("legs: []");
  });

  it("reports an empty range", async () => {
    const { lines, ctx } = setup();

    const result = await fetchCallLogs(ctx, { now });

    expect(result).toEqual({ count: 0 });
    expect(lines).toEqual([
      "No call logs found between 2025-11-01T00:00:00.000Z and 2025-12-01T00:00:00.000Z.",
    ]);
  });
});

describe("deleteCallLogs", () => {
  it("reads every page before the first delete", async () => {
    const { transport, ctx } = setup();
    const events: string[] = [];
    const next = `${CALL_LOG_PATH}?page=2&perPage=100`;
    transport.onGet = async (url) => {
      events.push("get");
      return url === next
        ? jsonResponse({ records: rawRecords(1, 2) })
        : jsonResponse({
            records: rawRecords(2),
            navigation: { nextPage: { uri: next } },
          });
    };
    transport.onDelete = async () => {
      events.push("delete");
      return jsonResponse(null, 204);
    };
    const auditLog = new MemoryAuditLog();

    const result = await deleteCallLogs(ctx, {
      phoneNumber: "+15550000001",
      confirmer: new ScriptedConfirmer((r: CallLogRecord) => r.id === "rec-1"),
      auditLog,
      now,
    });

    expect(events).toEqual(["get", "get", "delete"]);
    expect(transport.gets[0].query).toEqual({
      view: "Simple",
      recordingType: "All",
      perPage: 100,
      page: 1,
      phoneNumber: "+15550000001",
      dateFrom: "2025-11-30T00:00:00.000Z",
      dateTo: "2025-12-01T00:00:00.000Z",
    });
    expect(transport.deletes).toEqual([`${CALL_LOG_PATH}/rec-1`]);
    expect(auditLog.entries.map((e) => e.id)).toEqual(["rec-1"]);
    expect(result).toMatchObject({
      status: "done",
      summary: { processed: 3, deleted: 1, skipped: 2, failed: 0 },
    });
  });

  it("reports when nothing matches", async () => {
    const { transport, lines, ctx } = setup();

    const result = await deleteCallLogs(ctx, {
      phoneNumber: "+15550000001",
      confirmer: new ScriptedConfirmer(true),
      auditLog: new MemoryAuditLog(),
      now,
    });

    const notice =
      "No call logs found for the specified phone number (+15550000001) between 2025-11-30T00:00:00.000Z and 2025-12-01T00:00:00.000Z.";
    expect(result).toEqual({ status: "empty", notice });
    expect(lines).toEqual([notice]);
    expect(transport.deletes).toEqual([]);
  });
});

describe("purgeCallLogs", () => {
  it("deletes recorded calls older than the cutoff", async () => {
    const { transport, logger, ctx } = setup();
    transport.onGet = async (_url, params) => {
      if (params?.page !== 1) return jsonResponse({ records: [] });
      const [withRecording, withoutRecording] = rawRecords(2);
      return jsonResponse({
        records: [{ ...withRecording, recording: { id: "r1" } }, withoutRecording],
      });
    };
    const auditLog = new MemoryAuditLog();

    const result = await purgeCallLogs(ctx, {
      olderThanDays: 30,
      auditLog,
      now,
    });

    expect(transport.gets[0].query).toEqual({
      view: "Simple",
      recordingType: "All",
      perPage: 250,
      page: 1,
      dateTo: "2025-11-01T00:00:00.000Z",
    });
    expect(transport.gets).toHaveLength(2);
    expect(transport.deletes).toEqual([`${CALL_LOG_PATH}/rec-0`]);
    expect(auditLog.entries).toHaveLength(1);
    expect(logger.info).toHaveBeenCalledWith("Processing 2 call log records");
    expect(logger.info).toHaveBeenCalledWith(
      "Skipped call log rec-1 (no recording)",
    );
    expect(result).toMatchObject({
      status: "done",
      summary: { processed: 2, deleted: 1, skipped: 1, failed: 0, errors: [] },
    });
  });

  it("keeps going when one delete fails", async () => {
    const { transport, ctx } = setup();
    transport.onGet = async (_url, params) =>
      jsonResponse({
        records:
          params?.page === 1
            ? rawRecords(2).map((r) => ({ ...r, recording: { id: `${r.id}-audio` } }))
            : [],
      });
    transport.onDelete = async (url) =>
      url.endsWith("rec-0") ? jsonResponse({}, 200) : jsonResponse(null, 204);

    const result = await purgeCallLogs(ctx, {
      olderThanDays: 30,
      auditLog: new MemoryAuditLog(),
      now,
    });

    expect(result).toMatchObject({
      status: "done",
      summary: {
        processed: 2,
        deleted: 1,
        failed: 1,
        errors: [
          {
            entity: "call log rec-0",
            error: "Delete of rec-0 returned status 200",
          },
        ],
      },
    });
  });

  it("reports an empty purge", async () => {
    const { lines, ctx } = setup();

    const result = await purgeCallLogs(ctx, {
      olderThanDays: 30,
      auditLog: new MemoryAuditLog(),
      now,
    });

    expect(result).toEqual({
      status: "empty",
      notice: "No call logs found older than 2025-11-01T00:00:00.000Z.",
    });
    expect(lines).toEqual([
      "No call logs found older than 2025-11-01T00:00:00.000Z.",
    ]);
  });
});
