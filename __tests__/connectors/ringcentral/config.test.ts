import { describe, expect, it } from "vitest";
import { ConfigError } from "../../../src/connectors/core/index.js";
import { loadConfig } from "../../../src/connectors/ringcentral/config.js";

const baseEnv = {
  RC_CLIENT_ID: "test-client",
  RC_CLIENT_SECRET: "test-secret",
  RC_JWT_TOKEN: "test-jwt",
  RC_SERVER: "https://platform.example.test",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig(baseEnv)).toEqual({
      clientId: "test-client",
      clientSecret: "test-secret",
      jwt: "test-jwt",
      server: "https://platform.example.test",
      requestsPerWindow: 10,
      windowMs: 60_000,
      maxRetries: 3,
      auditFile: "deleted_call_logs.log",
      auditFormat: "text",
    });
  });

  it("lists every missing variable", () => {
    expect(() => loadConfig({ RC_SERVER: "https://platform.example.test" })).toThrow(
      "Missing required environment variables: RC_CLIENT_ID, RC_CLIENT_SECRET, RC_JWT_TOKEN",
    );
    expect(() => loadConfig({})).toThrow(ConfigError);
  });

  it("reads the optional settings", () => {
    const config = loadConfig({
      ...baseEnv,
      RC_REQUESTS_PER_WINDOW: "5",
      RC_WINDOW_SECONDS: "30",
      RC_MAX_RETRIES: "1",
      CALL_LOG_AUDIT_FILE: "/var/log/call-logs.jsonl",
      CALL_LOG_AUDIT_FORMAT: "jsonl",
    });
    expect(config).toMatchObject({
      requestsPerWindow: 5,
      windowMs: 30_000,
      maxRetries: 1,
      auditFile: "/var/log/call-logs.jsonl",
      auditFormat: "jsonl",
    });
  });

  it("rejects bad numbers", () => {
    expect(() => loadConfig({ ...baseEnv, RC_MAX_RETRIES: "0" })).toThrow(
      'RC_MAX_RETRIES must be a positive integer, got "0"',
    );
    expect(() =>
      loadConfig({ ...baseEnv, RC_WINDOW_SECONDS: "2.5" }),
    ).toThrow('RC_WINDOW_SECONDS must be a positive integer, got "2.5"');
  });

  it("rejects an unknown audit format", () => {
    expect(() =>
      loadConfig({ ...baseEnv, CALL_LOG_AUDIT_FORMAT: "csv" }),
    ).toThrow('CALL_LOG_AUDIT_FORMAT must be "text" or "jsonl", got "csv"');
  });
});
