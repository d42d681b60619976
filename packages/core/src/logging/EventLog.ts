import { promises as fs } from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEvent {
  type: string;
  level: LogLevel;
  timestamp: string;
  data: Record<string, unknown>;
}

export interface SessionLogger {
  debug(type: string, data?: Record<string, unknown>): void;
  info(type: string, data?: Record<string, unknown>): void;
  warn(type: string, data?: Record<string, unknown>): void;
  error(type: string, data?: Record<string, unknown>): void;
}

export const NOOP_LOGGER: SessionLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && LOG_LEVELS.some((level) => level === value);

export interface EventLogOptions {
  logDir: string;
  fileName?: string;
  level?: LogLevel;
  console?: boolean;
  writeConsole?: (line: string) => void;
}

const formatValue = (value: unknown): string => {
  if (typeof value === "string") return /\s/.test(value) ? JSON.stringify(value) : value;
  if (value === undefined) return "undefined";
  return JSON.stringify(value) ?? String(value);
};

export const formatConsoleLine = (event: LogEvent): string => {
  const pairs = Object.entries(event.data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return [`[${event.level}]`, event.type, ...pairs].join(" ");
};

/**
 * Structured JSONL event log. Writes are appended in call order through a
 * single promise chain; `flush()` waits for everything logged so far.
 */
export class EventLog implements SessionLogger {
  readonly logPath: string;
  readonly logDir: string;
  private level: LogLevel;
  private echo: boolean;
  private writeConsole: (line: string) => void;
  private chain: Promise<void> = Promise.resolve();
  private writeFailures = 0;

  constructor(options: EventLogOptions) {
    this.logDir = path.resolve(options.logDir);
    this.logPath = path.join(this.logDir, options.fileName ?? "agentline.jsonl");
    this.level = options.level ?? "info";
    this.echo = options.console ?? false;
    this.writeConsole = options.writeConsole ?? ((line) => process.stderr.write(`${line}\n`));
  }

  get failedWrites(): number {
    return this.writeFailures;
  }

  debug(type: string, data: Record<string, unknown> = {}): void {
    this.log("debug", type, data);
  }

  info(type: string, data: Record<string, unknown> = {}): void {
    this.log("info", type, data);
  }

  warn(type: string, data: Record<string, unknown> = {}): void {
    this.log("warn", type, data);
  }

  error(type: string, data: Record<string, unknown> = {}): void {
    this.log("error", type, data);
  }

  log(level: LogLevel, type: string, data: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
    const event: LogEvent = { type, level, timestamp: new Date().toISOString(), data };
    if (this.echo) {
      this.writeConsole(formatConsoleLine(event));
    }
    const line = `${JSON.stringify(event)}\n`;
    this.chain = this.chain
      .then(async () => {
        await fs.mkdir(this.logDir, { recursive: true });
        await fs.appendFile(this.logPath, line, "utf8");
      })
      .catch((error: unknown) => {
        this.writeFailures += 1;
        if (this.writeFailures === 1) {
          this.writeConsole(`[error] log_write_failed path=${this.logPath} error=${String(error)}`);
        }
      });
  }

  async flush(): Promise<void> {
    await this.chain;
  }
}
