/**
 * Scoped, leveled console logging.
 *
 * Starts from LOG_LEVEL, LOG_SCOPES and LOG_FORMAT so modules can log while
 * config is still loading; `configureLogger` applies the validated settings
 * once they exist.
 *
 *   LOG_LEVEL=debug LOG_SCOPES=relay,monitor npm run dev
 */

import type { LogFormat, LogLevel } from "../config/types.js";

export type { LogFormat, LogLevel };

export type LogScope =
  | "boot"
  | "bot"
  | "acquire"
  | "relay"
  | "monitor"
  | "audio"
  | "stt"
  | "transcript"
  | "llm"
  | "refine"
  | "summary"
  | "pipeline"
  | "results";

export type LoggerSettings = {
  level: LogLevel;
  /** Empty or missing means every scope. */
  scopes?: readonly string[];
  format: LogFormat;
};

type LogEntry = {
  time: string;
  level: LogLevel;
  scope?: LogScope;
  msg: string;
  data?: unknown;
};

const RANK: Record<LogLevel, number> = { trace: 0, debug: 1, info: 2, warn: 3, error: 4 };
const TAG: Record<LogLevel, string> = { trace: "TRC", debug: "DBG", info: "INF", warn: "WRN", error: "ERR" };

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error"];

function levelFromEnv(raw: string | undefined): LogLevel {
  const value = (raw ?? "").trim().toLowerCase();
  return LEVELS.find((l) => l === value) ?? "info";
}

/** JSON.stringify drops Error fields; keep the ones worth reading. */
function toPlain(data: unknown): unknown {
  if (data instanceof Error) {
    const status = Reflect.get(data, "status");
    return { name: data.name, message: data.message, ...(typeof status === "number" ? { status } : {}) };
  }
  return data;
}

class Logger {
  private minRank = RANK.info;
  private scopes = new Set<string>();
  private format: LogFormat = "pretty";

  constructor() {
    this.configure({
      level: levelFromEnv(process.env.LOG_LEVEL),
      scopes: (process.env.LOG_SCOPES ?? "").split(","),
      format: process.env.LOG_FORMAT === "json" ? "json" : "pretty",
    });
  }

  configure(settings: LoggerSettings): void {
    this.minRank = RANK[settings.level];
    this.scopes = new Set((settings.scopes ?? []).map((s) => s.trim()).filter(Boolean));
    this.format = settings.format;
  }

  log(level: LogLevel, msg: string, scope?: LogScope, data?: unknown): void {
    if (RANK[level] < this.minRank) return;
    if (scope && this.scopes.size > 0 && !this.scopes.has(scope)) return;

    const entry: LogEntry = { time: new Date().toISOString(), level, scope, msg, data: toPlain(data) };
    const line = this.format === "json" ? JSON.stringify(entry) : this.pretty(entry);

    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  }

  private pretty(entry: LogEntry): string {
    const scope = entry.scope ? ` ${entry.scope}:` : "";
    const data = entry.data === undefined ? "" : ` ${JSON.stringify(entry.data)}`;
    return `${entry.time.slice(11, 19)} [${TAG[entry.level]}]${scope} ${entry.msg}${data}`;
  }

  withScope(scope: LogScope): ScopedLogger {
    return new ScopedLogger(this, scope);
  }
}

export class ScopedLogger {
  constructor(
    private readonly logger: Logger,
    readonly scope: LogScope
  ) {}

  trace(msg: string, data?: unknown): void {
    this.logger.log("trace", msg, this.scope, data);
  }

  debug(msg: string, data?: unknown): void {
    this.logger.log("debug", msg, this.scope, data);
  }

  info(msg: string, data?: unknown): void {
    this.logger.log("info", msg, this.scope, data);
  }

  warn(msg: string, data?: unknown): void {
    this.logger.log("warn", msg, this.scope, data);
  }

  error(msg: string, data?: unknown): void {
    this.logger.log("error", msg, this.scope, data);
  }
}

export const log = new Logger();

export function configureLogger(settings: LoggerSettings): void {
  log.configure(settings);
}
