import type { Logger, LogLevel } from "./types.js";

const LEVEL_RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

export const LOG_LEVELS: readonly LogLevel[] = ["info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return value === "info" || value === "warn" || value === "error";
}

/** Where formatted lines go; defaults to the matching `console` method. */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

const MARKERS: Record<LogLevel, string> = { info: "", warn: "⚠ ", error: "✗ " };

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly minRank: number;
  private readonly sink: LogSink;

  constructor(
    scope: string,
    opts: { level?: LogLevel; sink?: LogSink } = {},
  ) {
    this.prefix = `[${scope}]`;
    this.minRank = LEVEL_RANK[opts.level ?? "info"];
    this.sink = opts.sink ?? consoleSink;
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.write("info", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.write("warn", msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.write("error", msg, data);
  }

  private write(
    level: LogLevel,
    msg: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_RANK[level] < this.minRank) return;
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    this.sink(level, `${this.prefix} ${MARKERS[level]}${msg}${extra}`);
  }
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  return new ConsoleLogger(scope, { level });
}
