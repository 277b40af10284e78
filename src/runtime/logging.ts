import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  shutdown(): void;
}

/**
 * Mirrors console output into `logFile` (appending, one timestamped line per
 * call) until `shutdown()` restores the original console methods.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  const startedAt = new Date().toISOString();
  stream.write(`[${startedAt}] --- livescribe session started ---\n`);

  const original = {
    log: console.log.bind(console),
    debug: console.debug.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  stream.on("error", (err) => {
    original.error(`Log file ${resolvedLog} is no longer writable:`, err);
  });

  const mirror = (level: keyof typeof original) =>
    (...args: unknown[]) => {
      original[level](...args);
      try {
        const timestamp = new Date().toISOString();
        const message = args
          .map((arg) =>
            typeof arg === "string"
              ? arg
              : arg instanceof Error
              ? arg.stack ?? arg.message
              : (() => {
                  try {
                    return JSON.stringify(arg);
                  } catch {
                    return String(arg);
                  }
                })()
          )
          .join(" ");
        stream.write(`[${timestamp}] ${level.toUpperCase()} ${message}\n`);
      } catch (err) {
        original.error("Failed to mirror console output to the log file:", err);
      }
    };

  console.log = mirror("log");
  console.debug = mirror("debug");
  console.info = mirror("info");
  console.warn = mirror("warn");
  console.error = mirror("error");

  let closed = false;
  const shutdown = () => {
    if (closed) return;
    closed = true;
    console.log = original.log;
    console.debug = original.debug;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
    const endedAt = new Date().toISOString();
    stream.write(`[${endedAt}] --- livescribe session ended ---\n`);
    stream.end();
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
