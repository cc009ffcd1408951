import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LoggingOptions {
  level: LogLevel;
  /** Echo records to stderr. Off outside debug mode so the chat screen stays clean. */
  stderr: boolean;
  /** Append records to this file, or null for no file. */
  file: string | null;
}

let options: LoggingOptions = { level: "info", stderr: false, file: null };

/**
 * Process-wide logging setup. Loggers read it on every call, so loggers
 * created before this runs pick up the new settings.
 */
export function configureLogging(next: Partial<LoggingOptions>): void {
  options = { ...options, ...next };
  if (options.file) {
    mkdirSync(dirname(options.file), { recursive: true });
  }
}

export function getLoggingOptions(): LoggingOptions {
  return { ...options };
}

export function formatLogLine(name: string, level: LogLevel, message: string, at: Date): string {
  return `${at.toISOString()} - ${name} - ${level.toUpperCase()} - ${message}`;
}

export class Logger {
  constructor(readonly name: string) {}

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  error(message: string): void {
    this.log("error", message);
  }

  isEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[options.level];
  }

  private log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;

    if (options.file) {
      try {
        appendFileSync(options.file, formatLogLine(this.name, level, message, new Date()) + "\n");
      } catch (err) {
        process.stderr.write(`parley: could not write log file: ${String(err)}\n`);
      }
    }
    if (options.stderr) {
      process.stderr.write(`${level.toUpperCase()} ${this.name}: ${message}\n`);
    }
  }
}

export function getLogger(name: string): Logger {
  return new Logger(name);
}
