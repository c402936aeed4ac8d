/**
 * Adapter: MemoryLogger
 *
 * Logger implementation that keeps every line, for tests.
 */

import type { Logger } from "../../domain/ports/logger.ts";

export type LogLevel = "debug" | "info" | "success" | "warn" | "error";

export class MemoryLogger implements Logger {
  readonly lines: { level: LogLevel; message: string }[] = [];

  debug(message: string): void {
    this.lines.push({ level: "debug", message });
  }

  info(message: string): void {
    this.lines.push({ level: "info", message });
  }

  success(message: string): void {
    this.lines.push({ level: "success", message });
  }

  warn(message: string): void {
    this.lines.push({ level: "warn", message });
  }

  error(message: string): void {
    this.lines.push({ level: "error", message });
  }

  /** Messages logged at one level, in order. */
  at(level: LogLevel): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.message);
  }
}
