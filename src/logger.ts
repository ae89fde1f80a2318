/**
 * Logger interface: abstracts console output so tests and embedders can capture it.
 *
 * Every long-lived component (Dispatcher, Chain, LongPoll, WebhookServer...)
 * accepts a Logger at construction time:
 * - ConsoleLogger (default) writes directly to stdout/stderr
 * - MemoryLogger keeps entries in memory for assertions
 */

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Print debug lines (logLevel: debug) */
  debug?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.debug ?? false;
  }

  log(message: string): void {
    console.log(message);
  }
  warn(message: string): void {
    console.warn(message);
  }
  error(message: string): void {
    console.error(message);
  }
  debug(message: string): void {
    if (this.verbose) {
      console.debug(message);
    }
  }
}
