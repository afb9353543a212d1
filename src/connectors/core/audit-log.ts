import * as fs from "node:fs";
import * as path from "node:path";
import type { AuditEntry, AuditFormat, AuditLog } from "./types.js";

const SEPARATOR = "-".repeat(30);

export function formatAuditText(entry: AuditEntry): string {
  return [
    `Timestamp: ${entry.deletedAt.toISOString()}`,
    `Deleted Call Log ID: ${entry.id}`,
    `Start Time: ${entry.startTime ?? "None"}`,
    `Direction: ${entry.direction ?? "None"}`,
    `From: ${entry.from ?? "None"}`,
    `To: ${entry.to ?? "None"}`,
    SEPARATOR,
    "",
  ].join("\n");
}

export function formatAuditJsonl(entry: AuditEntry): string {
  const record: Record<string, unknown> = {
    timestamp: entry.deletedAt.toISOString(),
    id: entry.id,
    startTime: entry.startTime ?? null,
    direction: entry.direction ?? null,
    from: entry.from ?? null,
    to: entry.to ?? null,
  };
  return `${JSON.stringify(record)}\n`;
}

/** Append-only record of completed deletions. */
export class FileAuditLog implements AuditLog {
  private readonly filePath: string;
  private readonly format: AuditFormat;

  constructor(filePath: string, format: AuditFormat = "text") {
    this.filePath = filePath;
    this.format = format;
  }

  async record(entry: AuditEntry): Promise<void> {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const content =
      this.format === "jsonl"
        ? formatAuditJsonl(entry)
        : formatAuditText(entry);
    fs.appendFileSync(this.filePath, content);
  }
}

export function createAuditLog(
  filePath: string,
  format: AuditFormat = "text",
): AuditLog {
  return new FileAuditLog(filePath, format);
}
