import fs from "node:fs";

import { formatLocalDateTime } from "./time";

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
}

export interface RunLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ClosableRunLogger extends RunLogger {
  close(): void;
}

export interface MemoryRunLogger extends RunLogger {
  entries: LogEntry[];
}

export const DEFAULT_LOG_FILE = "po_tickets_report.log";

export function formatLogLine(entry: LogEntry): string {
  return `${formatLocalDateTime(entry.timestamp)} - ${entry.level} - ${entry.message}`;
}

function makeLogger(sink: (entry: LogEntry) => void, now: () => Date): RunLogger {
  const emit = (level: LogLevel, message: string): void => {
    sink({ level, message, timestamp: now() });
  };

  return {
    debug: (message) => emit("DEBUG", message),
    info: (message) => emit("INFO", message),
    warn: (message) => emit("WARNING", message),
    error: (message) => emit("ERROR", message)
  };
}

/**
 * Truncates `filePath` and appends one line per entry. Writes are synchronous so
 * the log is complete even when the process exits right after a fatal error.
 */
export function createFileLogger(filePath: string, now: () => Date = () => new Date()): ClosableRunLogger {
  let fd: number | null = fs.openSync(filePath, "w");

  const logger = makeLogger((entry) => {
    if (fd === null) {
      return;
    }

    fs.writeSync(fd, `${formatLogLine(entry)}\n`);
  }, now);

  return {
    ...logger,
    close: () => {
      if (fd !== null) {
        fs.closeSync(fd);
        fd = null;
      }
    }
  };
}

export function createMemoryLogger(now: () => Date = () => new Date()): MemoryRunLogger {
  const entries: LogEntry[] = [];
  return {
    ...makeLogger((entry) => {
      entries.push(entry);
    }, now),
    entries
  };
}

export const silentLogger: RunLogger = makeLogger(() => undefined, () => new Date());
