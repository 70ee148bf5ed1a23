import type { LoggerPort } from "../../ports/sys/LoggerPort";

type Level = "debug" | "info" | "warn" | "error";

export interface ConsoleLoggerOptions {
  debug?: boolean;
  prefix?: string;
}

function format(prefix: string | undefined, message: string, meta?: Record<string, unknown>): string {
  const text = prefix ? `[${prefix}] ${message}` : message;
  return meta && Object.keys(meta).length ? `${text} ${JSON.stringify(meta)}` : text;
}

export class ConsoleLogger implements LoggerPort {
  constructor(private readonly options: ConsoleLoggerOptions = {}) {}

  /** A logger sharing this one's settings with `prefix` on every line. */
  child(prefix: string): ConsoleLogger {
    return new ConsoleLogger({ ...this.options, prefix });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (!this.options.debug) return;
    this.log("debug", message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  private log(level: Level, message: string, meta?: Record<string, unknown>) {
    const payload = format(this.options.prefix, message, meta);
    switch (level) {
      case "debug":
        return console.debug(payload);
      case "info":
        return console.info(payload);
      case "warn":
        return console.warn(payload);
      case "error":
        return console.error(payload);
    }
  }
}
