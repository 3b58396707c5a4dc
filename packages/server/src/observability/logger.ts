/**
 * Structured logging to stderr for MCP server observability
 * All logs go to stderr since stdout is reserved for MCP protocol
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  tool?: string;
  duration_ms?: number;
  status?: string;
  err_code?: string;
  err_message?: string;
  [key: string]: unknown;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? "info";
}

function errorCode(err: unknown): string {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "UNKNOWN";
}

export class Logger {
  #minLevel: LogLevel;
  #write: (line: string) => void;

  constructor(minLevel: LogLevel = "info", write: (line: string) => void = (line) => console.error(line)) {
    this.#minLevel = minLevel;
    this.#write = write;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    // Always use stderr to avoid polluting stdout (MCP protocol channel)
    this.#write(
      JSON.stringify(logEvent, (_key, value: unknown) =>
        typeof value === "bigint" ? value.toString() : value
      )
    );
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log("error", event, data);
  }

  /**
   * One line per tool call. `status` is the subdoc status name when the
   * engine answered, whatever it answered.
   */
  toolCall(tool: string, duration_ms: number, outcome: { status?: string; err?: unknown }): void {
    if (outcome.err === undefined) {
      this.info("tool.success", { tool, duration_ms, status: outcome.status });
    } else {
      this.error("tool.error", {
        tool,
        duration_ms,
        err_code: errorCode(outcome.err),
        err_message: outcome.err instanceof Error ? outcome.err.message : String(outcome.err),
      });
    }
  }
}

// Singleton logger instance
export const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL));
