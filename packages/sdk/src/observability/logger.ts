/**
 * Structured logging to stderr
 *
 * Each event is one JSON line so that host applications can keep stdout for
 * their own output. The minimum level comes from JAWADB_LOG_LEVEL (default: warn).
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LogEvent {
  ts: string;
  level: Exclude<LogLevel, "silent">;
  event: string;
  [key: string]: unknown;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export class Logger {
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = "warn") {
    this.#minLevel = minLevel;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogEvent["level"], event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    console.error(JSON.stringify(logEvent));
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
}

/**
 * Fields describing an error for a log event
 */
export function errorFields(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? err.code : "UNKNOWN";
    return { err_code: code, err_message: err.message };
  }
  return { err_code: "UNKNOWN", err_message: String(err) };
}

const envLevel = process.env.JAWADB_LOG_LEVEL;

// Singleton logger instance
export const logger = new Logger(isLogLevel(envLevel) ? envLevel : "warn");
