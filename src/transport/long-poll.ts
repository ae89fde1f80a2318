/**
 * LongPoll: pulls updates with getUpdates and yields them one at a time
 *
 * States:
 *   buffered  deliver the next fetched update, or go to running when empty
 *   running   call getUpdates; success → buffered, failure → idling
 *   idling    sleep for the backoff, then back to running
 *
 * The offset sent with each request is one past the highest update id delivered so far.
 * An update counts as delivered when it is yielded, before its dispatch completes:
 * a crash mid-dispatch loses it rather than replaying it.
 */

import { GrammyError } from "grammy";
import type { Update } from "grammy/types";
import type { UpdateSink } from "../dispatcher.js";
import { TransportError, describeError } from "../errors.js";
import { ConsoleLogger, type Logger } from "../logger.js";
import type { UpdateKind } from "../update.js";

export interface GetUpdatesParams {
  offset: number;
  limit: number;
  /** Long polling timeout in seconds */
  timeout: number;
  allowed_updates: readonly UpdateKind[];
}

/**
 * The one Bot API method the poller needs; grammy's Api satisfies it
 */
export interface UpdatesSource {
  getUpdates(params: GetUpdatesParams): Promise<Update[]>;
}

export interface LongPollOptions {
  /** Highest update id already handled (default: 0) */
  offset?: number;
  /** Updates per request, 1-100 (default: 100) */
  limit?: number;
  pollTimeoutSeconds?: number;
  /** Backoff after a failed request without a retry_after hint (default: 5000) */
  errorTimeoutMs?: number;
  allowedUpdates?: UpdateKind[];
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

type PollState =
  | { kind: "buffered"; queue: Update[] }
  | { kind: "running" }
  | { kind: "idling"; delayMs: number };

const DEFAULT_LIMIT = 100;
const DEFAULT_POLL_TIMEOUT_SECONDS = 10;
const DEFAULT_ERROR_TIMEOUT_MS = 5000;

const sleepFor = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Backoff requested by the API for a failed call, in ms; null when the error carries none
 */
export function retryAfterMs(err: unknown): number | null {
  if (err instanceof TransportError) {
    return err.retryAfterMs;
  }
  if (err instanceof GrammyError && err.parameters.retry_after !== undefined) {
    return err.parameters.retry_after * 1000;
  }
  return null;
}

export class LongPoll implements AsyncIterable<Update> {
  private cursor: number;
  private state: PollState = { kind: "buffered", queue: [] };
  private stopped = false;
  private started = false;

  private readonly limit: number;
  private readonly pollTimeoutSeconds: number;
  private readonly errorTimeoutMs: number;
  private readonly allowedUpdates: UpdateKind[];
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly source: UpdatesSource,
    options: LongPollOptions = {}
  ) {
    this.cursor = options.offset ?? 0;
    this.limit = options.limit ?? DEFAULT_LIMIT;
    this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? DEFAULT_POLL_TIMEOUT_SECONDS;
    this.errorTimeoutMs = options.errorTimeoutMs ?? DEFAULT_ERROR_TIMEOUT_MS;
    this.allowedUpdates = options.allowedUpdates ?? [];
    this.logger = options.logger ?? new ConsoleLogger();
    this.sleep = options.sleep ?? sleepFor;
  }

  /** Highest update id delivered so far */
  get offset(): number {
    return this.cursor;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Ask the loop to end. It notices before its next step; a request in flight is not aborted.
   */
  stop(): void {
    this.stopped = true;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Update, void, undefined> {
    if (this.started) {
      throw new Error("LongPoll cannot be iterated more than once");
    }
    this.started = true;

    while (!this.stopped) {
      const state = this.state;
      switch (state.kind) {
        case "buffered": {
          const next = state.queue.shift();
          if (next === undefined) {
            this.state = { kind: "running" };
            break;
          }
          this.cursor = Math.max(this.cursor, next.update_id);
          yield next;
          break;
        }
        case "running":
          this.state = await this.poll();
          break;
        case "idling":
          await this.sleep(state.delayMs);
          this.state = { kind: "running" };
          break;
      }
    }
  }

  /**
   * Feed every update to `sink`, one at a time, until stop() is called
   */
  async run(sink: UpdateSink): Promise<void> {
    this.logger.log("[LongPoll] Started");
    for await (const update of this) {
      try {
        await sink.dispatch(update);
      } catch (err) {
        this.logger.error(`[LongPoll] Failed to handle update ${update.update_id}: ${describeError(err)}`);
      }
    }
    this.logger.log("[LongPoll] Stopped");
  }

  private async poll(): Promise<PollState> {
    try {
      const updates = await this.source.getUpdates({
        offset: this.cursor + 1,
        limit: this.limit,
        timeout: this.pollTimeoutSeconds,
        allowed_updates: this.allowedUpdates,
      });
      if (updates.length > 0) {
        this.logger.debug(`[LongPoll] Received ${updates.length} update(s)`);
      }
      return { kind: "buffered", queue: [...updates] };
    } catch (err) {
      const delayMs = retryAfterMs(err) ?? this.errorTimeoutMs;
      this.logger.error(`[LongPoll] Failed to get updates: ${describeError(err)} (retrying in ${delayMs}ms)`);
      return { kind: "idling", delayMs };
    }
  }
}
