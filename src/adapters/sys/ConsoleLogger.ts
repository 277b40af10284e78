import type { LoggerPort } from "../../ports/sys/LoggerPort";

type Level = "debug" | "info" | "warn" | "error";

export interface ConsoleLoggerOptions {
  debug?: boolean;
}

function format(message: string, meta?: Record<string, unknown>): string {
  return meta && Object.keys(meta).length ? `${message} ${JSON.stringify(meta)}` : message;
}

export class ConsoleLogger implements LoggerPort {
  private readonly debugEnabled: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (!this.debugEnabled) return;
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
    const payload = format(message, meta);
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
