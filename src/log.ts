// Run log: timestamped lines to the console and, optionally, appended to a file

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Append every line to this file (directory is created) */
  file?: string | null;
  /** Echo to stdout/stderr (default: true) */
  console?: boolean;
  now?: () => Date;
}

export function formatLine(level: LogLevel, message: string, at: Date): string {
  return `${at.toISOString()} - ${level} - ${message}`;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const { file = null, console: echo = true, now = () => new Date() } = opts;
  if (file) mkdirSync(dirname(file), { recursive: true });

  function write(level: LogLevel, message: string): void {
    const line = formatLine(level, message, now());
    if (file) appendFileSync(file, line + "\n");
    if (!echo) return;
    if (level === "INFO") console.log(line);
    else console.error(line);
  }

  return {
    info: (message) => write("INFO", message),
    warn: (message) => write("WARN", message),
    error: (message) => write("ERROR", message),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
