/**
 * Throttled RingCentral call-log API.
 *
 * Every GET and DELETE goes through the shared request executor, so the
 * account-wide request quota and 429 handling live in one place no matter
 * which command is running.
 */

import type { CursorPage, Logger, RequestExecutor } from "../core/index.js";
import {
  DeleteRejectedError,
  walkCursorPages,
  walkNumberedPages,
} from "../core/index.js";
import { parseCallLogPage, pathFromAbsoluteUri } from "./transform.js";
import type { CallLogPage, CallLogQuery, CallLogRecord } from "./types.js";

// ─── Constants ───

export const CALL_LOG_PATH = "/restapi/v1.0/account/~/call-log";
const DELETED_STATUS = 204;

// ─── Transport ───

export interface ApiResponse {
  status: number;
  json(): Promise<unknown>;
}

/** The subset of the SDK platform the connector calls. */
export interface CallLogTransport {
  get(
    url: string,
    query?: Record<string, string | number>,
  ): Promise<ApiResponse>;
  delete(url: string): Promise<ApiResponse>;
}

export function callLogPath(id: string): string {
  return `${CALL_LOG_PATH}/${encodeURIComponent(id)}`;
}

export function toQueryParams(
  query: CallLogQuery,
): Record<string, string | number> {
  const params: Record<string, string | number> = {
    view: query.view,
    recordingType: query.recordingType,
    perPage: query.perPage,
    page: query.page,
  };
  if (query.phoneNumber) params.phoneNumber = query.phoneNumber;
  if (query.dateFrom) params.dateFrom = query.dateFrom;
  if (query.dateTo) params.dateTo = query.dateTo;
  return params;
}

// ─── API ───

export class CallLogApi {
  private readonly transport: CallLogTransport;
  private readonly executor: RequestExecutor;
  private readonly logger: Logger;

  constructor(opts: {
    transport: CallLogTransport;
    executor: RequestExecutor;
    logger: Logger;
  }) {
    this.transport = opts.transport;
    this.executor = opts.executor;
    this.logger = opts.logger;
  }

  // ─── Listing ───

  async listCallLogPage(query: CallLogQuery): Promise<CallLogPage> {
    const body = await this.executor.execute(
      `call-log page ${query.page}`,
      async () => {
        const resp = await this.transport.get(
          CALL_LOG_PATH,
          toQueryParams(query),
        );
        return resp.json();
      },
    );
    return this.parsePage(body);
  }

  /** Follow a `navigation.nextPage` reference, absolute or relative. */
  async listCallLogPath(uri: string): Promise<CallLogPage> {
    const path = pathFromAbsoluteUri(uri);
    const body = await this.executor.execute(`call-log ${path}`, async () => {
      const resp = await this.transport.get(path);
      return resp.json();
    });
    return this.parsePage(body);
  }

  /** Cursor traversal: ends when a page carries no next-page reference. */
  walkCallLogs(query: CallLogQuery): AsyncGenerator<CallLogRecord> {
    return walkCursorPages(
      async () => toCursorPage(await this.listCallLogPage(query)),
      async (cursor) => toCursorPage(await this.listCallLogPath(cursor)),
    );
  }

  /** Page-number traversal: ends at the first page with no records. */
  walkCallLogsByPage(query: CallLogQuery): AsyncGenerator<CallLogRecord> {
    return walkNumberedPages(
      async (page) => {
        this.logger.info(`Fetching page ${page}`, {
          dateFrom: query.dateFrom ?? null,
          dateTo: query.dateTo ?? null,
        });
        const result = await this.listCallLogPage({ ...query, page });
        return result.records;
      },
      { startPage: query.page },
    );
  }

  // ─── Deletion ───

  /** Resolves on 204; any other status rejects with `DeleteRejectedError`. */
  async deleteCallLog(id: string): Promise<void> {
    const resp = await this.executor.execute(`delete call-log ${id}`, () =>
      this.transport.delete(callLogPath(id)),
    );
    if (resp.status !== DELETED_STATUS) {
      throw new DeleteRejectedError(id, resp.status);
    }
  }

  private parsePage(body: unknown): CallLogPage {
    const page = parseCallLogPage(body);
    for (const bad of page.malformed) {
      this.logger.warn(`Skipping malformed record #${bad.index}: ${bad.reason}`);
    }
    return page;
  }
}

function toCursorPage(page: CallLogPage): CursorPage<CallLogRecord> {
  return { items: page.records, next: page.nextPageUri };
}
