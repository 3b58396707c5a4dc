/**
 * Structured logging for engine and store events
 *
 * Lines go to stderr: stdout belongs to the CLI's command output and to the
 * MCP server's protocol frames.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  key?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogSink = (line: string, entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel | "silent";
  sink?: LogSink;
}

function renderDetails(details: Record<string, unknown>): string {
  return JSON.stringify(details, (_k, v: unknown) => (typeof v === "bigint" ? v.toString() : v));
}

function defaultLevel(): LogLevel {
  return process.env.SUBDOC_DEBUG ? "debug" : "info";
}

export class Logger {
  #level: LogLevel | "silent";
  #sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.#level = options.level ?? defaultLevel();
    this.#sink = options.sink ?? ((line) => console.error(line));
  }

  get level(): LogLevel | "silent" {
    return this.#level;
  }

  setLevel(level: LogLevel | "silent"): void {
    this.#level = level;
  }

  log(level: LogLevel, event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.#level]) return;

    const entry: LogEntry = {
      timestamp: data?.timestamp ?? new Date().toISOString(),
      level,
      event,
      ...(data?.key === undefined ? {} : { key: data.key }),
      ...(data?.message === undefined ? {} : { message: data.message }),
      ...(data?.details === undefined ? {} : { details: data.details }),
    };

    let line = `[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`;
    if (entry.key) line += ` key=${entry.key}`;
    if (entry.message) line += ` ${entry.message}`;
    if (entry.details) line += ` ${renderDetails(entry.details)}`;

    this.#sink(line, entry);
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }
}

/**
 * Shared by every engine and store that is not given its own
 */
export const logger = new Logger();
