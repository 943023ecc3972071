/**
 * Context-tagged logger
 * Writes to stderr so command output on stdout stays clean
 */

import { config } from "./config";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = (line: string) => void;

/**
 * Parse a level name, unknown names fall back to "info"
 */
export function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  const levels: LogLevel[] = ["debug", "info", "warn", "error", "silent"];
  return levels.find((level) => level === normalized) ?? "info";
}

let threshold: LogLevel = parseLogLevel(config.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function formatLogLine(
  level: Exclude<LogLevel, "silent">,
  context: string,
  message: string,
  data?: Record<string, unknown>,
  timestamp: string = new Date().toISOString()
): string {
  const dataStr = data ? ` ${JSON.stringify(data)}` : "";
  return `[${timestamp}] [${level.toUpperCase()}] [${context}] ${message}${dataStr}`;
}

/**
 * Render an unknown thrown value, keeping the stack when there is one
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

export class Logger {
  constructor(
    readonly context: string,
    private sink: LogSink = (line) => console.error(line)
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  /**
   * Log at error level; the error's stack goes on the lines below the message
   */
  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    if (!this.enabled("error")) return;
    const line = formatLogLine("error", this.context, message, data);
    this.sink(error === undefined ? line : `${line}\n${describeError(error)}`);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  }

  private write(level: Exclude<LogLevel, "silent" | "error">, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled(level)) return;
    this.sink(formatLogLine(level, this.context, message, data));
  }
}
