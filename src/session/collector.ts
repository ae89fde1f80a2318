/**
 * Periodic removal of expired session entries
 */

import { describeError } from "../errors.js";
import { ConsoleLogger, type Logger } from "../logger.js";
import type { SessionBackend } from "./backend.js";

export interface SessionCollectorOptions {
  intervalMs: number;
  logger?: Logger;
}

export class SessionCollector {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly backend: SessionBackend,
    private readonly options: SessionCollectorOptions
  ) {
    this.logger = options.logger ?? new ConsoleLogger();
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.collect();
    }, this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * One collection pass. Failures are logged, never thrown.
   */
  async collect(): Promise<number> {
    try {
      const removed = await this.backend.collectGarbage();
      if (removed > 0) {
        this.logger.debug(`[Session] Removed ${removed} expired entries`);
      }
      return removed;
    } catch (err) {
      this.logger.error(`[Session] Garbage collection failed: ${describeError(err)}`);
      return 0;
    }
  }
}
