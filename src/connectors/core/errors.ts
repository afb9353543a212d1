/** Error taxonomy shared by the connectors and the CLI. */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class AuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

export class DeleteRejectedError extends Error {
  readonly status: number;

  constructor(id: string, status: number) {
    super(`Delete of ${id} returned status ${status}`);
    this.name = "DeleteRejectedError";
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── HTTP details carried by thrown errors ───

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Read an HTTP status from the shapes SDK and fetch errors take:
 * `status`, `statusCode`, a numeric `code`, or `response.status`.
 */
export function readStatus(err: unknown): number | undefined {
  if (!isObject(err)) return undefined;
  for (const key of ["status", "statusCode", "code"]) {
    const value = err[key];
    if (typeof value === "number") return value;
  }
  const response = err.response;
  if (isObject(response) && typeof response.status === "number") {
    return response.status;
  }
  return undefined;
}

/** Case-insensitive header lookup on `err.headers` or `err.response.headers`. */
export function readHeader(err: unknown, name: string): string | undefined {
  if (!isObject(err)) return undefined;
  const response = err.response;
  const candidates = [
    isObject(response) ? response.headers : undefined,
    err.headers,
  ];
  for (const headers of candidates) {
    const value = lookupHeader(headers, name);
    if (value !== undefined) return value;
  }
  return undefined;
}

interface HeaderGetter {
  get(name: string): unknown;
}

/** WHATWG `Headers`, node-fetch `Headers` and anything else with `get()`. */
function hasGetter(value: unknown): value is HeaderGetter {
  return isObject(value) && typeof value.get === "function";
}

function lookupHeader(headers: unknown, name: string): string | undefined {
  if (hasGetter(headers)) {
    const value = headers.get(name);
    return typeof value === "string" ? value : undefined;
  }
  if (!isObject(headers)) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
  }
  return undefined;
}
