import { vi } from "vitest";
import type {
  AuditEntry,
  AuditLog,
  Clock,
  Logger,
} from "../../src/connectors/core/index.js";
import type {
  ApiResponse,
  CallLogRecord,
  CallLogTransport,
} from "../../src/connectors/ringcentral/index.js";

/** Time stands still until something sleeps; every sleep is recorded. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private t: number;

  constructor(start = 0) {
    this.t = start;
  }

  now(): number {
    return this.t;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.t += Math.max(ms, 0);
  }

  advance(ms: number): void {
    this.t += ms;
  }
}

export function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function jsonResponse(body: unknown, status = 200): ApiResponse {
  return { status, json: async () => body };
}

export function httpError(
  status: number,
  headers: Record<string, string> = {},
): Error & { response: { status: number; headers: Headers } } {
  return Object.assign(new Error(`HTTP ${status}`), {
    response: { status, headers: new Headers(headers) },
  });
}

/** Header bag that only answers `get()`, the way node-fetch's `Headers` does. */
export class GetterHeaders {
  readonly #values = new Map<string, string>();

  constructor(values: Record<string, string>) {
    for (const [key, value] of Object.entries(values)) {
      this.#values.set(key.toLowerCase(), value);
    }
  }

  get(name: string): string | null {
    return this.#values.get(name.toLowerCase()) ?? null;
  }
}

/** A rejection shaped like the one the SDK throws: `response` with getter headers. */
export function sdkHttpError(
  status: number,
  headers: Record<string, string> = {},
): Error & { response: { status: number; headers: GetterHeaders } } {
  return Object.assign(new Error(`HTTP ${status}`), {
    response: { status, headers: new GetterHeaders(headers) },
  });
}

type GetHandler = (
  url: string,
  query?: Record<string, string | number>,
) => Promise<ApiResponse>;
type DeleteHandler = (url: string) => Promise<ApiResponse>;

/** In-process stand-in for the SDK platform. */
export class FakeTransport implements CallLogTransport {
  readonly gets: Array<{ url: string; query?: Record<string, string | number> }> =
    [];
  readonly deletes: string[] = [];
  onGet: GetHandler = async () => jsonResponse({ records: [] });
  onDelete: DeleteHandler = async () => jsonResponse(null, 204);

  async get(
    url: string,
    query?: Record<string, string | number>,
  ): Promise<ApiResponse> {
    this.gets.push({ url, query });
    return this.onGet(url, query);
  }

  async delete(url: string): Promise<ApiResponse> {
    this.deletes.push(url);
    return this.onDelete(url);
  }
}

export class MemoryAuditLog implements AuditLog {
  readonly entries: AuditEntry[] = [];

  async record(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }
}

export function rawRecords(
  count: number,
  offset = 0,
): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, i) => ({
    id: `rec-${offset + i}`,
    startTime: "2025-10-01T12:00:00.000Z",
    direction: "Inbound",
  }));
}

export function makeRecord(
  overrides: Partial<CallLogRecord> = {},
): CallLogRecord {
  return {
    id: "rec-1",
    startTime: "2025-10-01T12:00:00.000Z",
    direction: "Inbound",
    from: { phoneNumber: "+15550000001", name: "Caller" },
    to: { phoneNumber: "+15550000002", name: "Front Desk" },
    legs: [],
    ...overrides,
  };
}
