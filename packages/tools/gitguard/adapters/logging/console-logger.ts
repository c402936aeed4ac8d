/**
 * Adapter: ConsoleLogger
 *
 * Logger implementation writing progress to stdout and problems to stderr.
 * Debug lines are only written when enabled (GITGUARD_DEBUG or --verbose).
 */

import type { Logger } from "../../domain/ports/logger.ts";

export class ConsoleLogger implements Logger {
  constructor(private readonly verbose = false) {}

  debug(message: string): void {
    if (this.verbose) {
      console.error(`[debug] ${message}`);
    }
  }

  info(message: string): void {
    console.log(message);
  }

  success(message: string): void {
    console.log(`✓ ${message}`);
  }

  warn(message: string): void {
    console.error(`Warning: ${message}`);
  }

  error(message: string): void {
    console.error(message);
  }
}
