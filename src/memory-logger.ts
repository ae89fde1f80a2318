/**
 * Keeps log output in memory instead of writing to stdout.
 */

import type { Logger } from "./logger.js";

export interface LogEntry {
  text: string;
  level: "log" | "warn" | "error" | "debug";
}

export class MemoryLogger implements Logger {
  private readonly entries: LogEntry[] = [];

  log(message: string): void {
    this.entries.push({ level: "log", text: message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", text: message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", text: message });
  }

  debug(message: string): void {
    this.entries.push({ level: "debug", text: message });
  }

  /** Texts logged at the given level, in order */
  lines(level: LogEntry["level"]): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.text);
  }
}
