import type { Logger } from "../ports/logger";
import { systemClock, type Clock } from "../ports/clock";

export type ConsoleLoggerOptions = {
  /** When false, `debug` lines (per-file detail) are dropped. */
  verbose?: boolean;
  clock?: Clock;
};

function stamp(clock: Clock): string {
  // YYYY-MM-DD HH:mm:ss
  return clock.now().toISOString().replace("T", " ").slice(0, 19);
}

export class ConsoleLogger implements Logger {
  private readonly clock: Clock;

  constructor(private readonly options: ConsoleLoggerOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  debug(message: string, ...meta: unknown[]): void {
    if (!this.options.verbose) return;
    console.log(`[${stamp(this.clock)}] ${message}`, ...meta);
  }

  info(message: string, ...meta: unknown[]): void {
    console.log(`[${stamp(this.clock)}] ${message}`, ...meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    console.warn(`[${stamp(this.clock)}] WARNING: ${message}`, ...meta);
  }

  error(message: string, ...meta: unknown[]): void {
    console.error(`[${stamp(this.clock)}] ERROR: ${message}`, ...meta);
  }
}

export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
