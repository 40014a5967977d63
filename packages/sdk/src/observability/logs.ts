/**
 * Structured logging for engine operations
 */

import type { LogLevel } from "../types.js";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  table?: string;
  column?: string;
  message?: string;
  details?: Record<string, unknown>;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerOptions {
  enabled?: boolean;
  level?: LogLevel;
}

/**
 * Per-database logger. Disabled loggers drop every entry.
 */
export class Logger {
  #enabled: boolean;
  #minLevel: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.#enabled = options.enabled ?? false;
    this.#minLevel = options.level ?? "info";
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.#minLevel)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    console[level === "info" ? "log" : level](formatEntry(entry));
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }
}

/**
 * Render an entry as a single console line
 */
export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.table || entry.column) {
    parts.push(entry.column ? `${entry.table ?? ""}/${entry.column}` : (entry.table ?? ""));
  }

  if (entry.message) {
    parts.push(entry.message);
  }

  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}
