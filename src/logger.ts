import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import type { LogLevel } from "./config/schema";

export type LogFn = (message: string, extra?: Record<string, unknown>) => void;

export type Logger = {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Format one log line: "<timestamp> [LEVEL] message {extra}"
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  extra?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const extraStr = extra ? ` ${JSON.stringify(extra)}` : "";
  return `${now.toISOString()} [${level.toUpperCase()}] ${message}${extraStr}\n`;
}

export type LoggerOptions = {
  level: LogLevel;
  /** Append to this file; omit to log to stderr */
  file?: string;
  /** Override the sink (for testing) */
  write?: (line: string) => Promise<void>;
};

/**
 * Create a leveled logger.
 * Writes are fire-and-forget and never throw into the caller;
 * if the file sink fails the line goes to stderr.
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = LEVEL_ORDER[options.level];
  const file = options.file;
  let dirReady: Promise<unknown> | null = null;

  const write =
    options.write ??
    (file
      ? async (line: string) => {
          dirReady ??= mkdir(dirname(file), { recursive: true });
          await dirReady;
          await appendFile(file, line);
        }
      : async (line: string) => {
          process.stderr.write(line);
        });

  const log = (level: LogLevel): LogFn => (message, extra) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const line = formatLogLine(level, message, extra);
    write(line).catch((error: unknown) => {
      process.stderr.write(`${line.trimEnd()} (log sink failed: ${String(error)})\n`);
    });
  };

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}
