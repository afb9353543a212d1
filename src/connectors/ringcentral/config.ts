import { ConfigError } from "../core/index.js";
import type { AuditFormat } from "../core/index.js";
import type { RingCentralConfig } from "./types.js";

const REQUIRED = [
  "RC_CLIENT_ID",
  "RC_CLIENT_SECRET",
  "RC_JWT_TOKEN",
  "RC_SERVER",
] as const;

function positiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function auditFormat(env: NodeJS.ProcessEnv): AuditFormat {
  const raw = env.CALL_LOG_AUDIT_FORMAT ?? "text";
  if (raw !== "text" && raw !== "jsonl") {
    throw new ConfigError(
      `CALL_LOG_AUDIT_FORMAT must be "text" or "jsonl", got "${raw}"`,
    );
  }
  return raw;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): RingCentralConfig {
  const missing = REQUIRED.filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(", ")}`,
    );
  }

  return {
    clientId: env.RC_CLIENT_ID ?? "",
    clientSecret: env.RC_CLIENT_SECRET ?? "",
    jwt: env.RC_JWT_TOKEN ?? "",
    server: env.RC_SERVER ?? "",
    requestsPerWindow: positiveInt(env, "RC_REQUESTS_PER_WINDOW", 10),
    windowMs: positiveInt(env, "RC_WINDOW_SECONDS", 60) * 1000,
    maxRetries: positiveInt(env, "RC_MAX_RETRIES", 3),
    auditFile: env.CALL_LOG_AUDIT_FILE || "deleted_call_logs.log",
    auditFormat: auditFormat(env),
  };
}
