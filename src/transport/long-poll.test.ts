import { describe, it, expect, vi } from "vitest";
import { GrammyError } from "grammy";
import type { Update } from "grammy/types";
import { TransportError } from "../errors.js";
import { MemoryLogger } from "../memory-logger.js";
import { createMessageUpdate } from "../../test/helpers/updates.js";
import { LongPoll, retryAfterMs, type GetUpdatesParams, type UpdatesSource } from "./long-poll.js";

/**
 * Answers getUpdates from a script; once the script runs out it calls onExhausted and returns nothing
 */
class ScriptedSource implements UpdatesSource {
  readonly calls: GetUpdatesParams[] = [];
  onExhausted: () => void = () => {};

  constructor(private readonly script: Array<Update[] | Error>) {}

  async getUpdates(params: GetUpdatesParams): Promise<Update[]> {
    this.calls.push(params);
    const next = this.script.shift();
    if (next === undefined) {
      this.onExhausted();
      return [];
    }
    if (next instanceof Error) throw next;
    return next;
  }
}

function updates(...ids: number[]): Update[] {
  return ids.map((id) => createMessageUpdate({ updateId: id }));
}

function setup(script: Array<Update[] | Error>, options: { errorTimeoutMs?: number; offset?: number } = {}) {
  const source = new ScriptedSource(script);
  const logger = new MemoryLogger();
  const sleep = vi.fn(async (_ms: number) => {});
  const poll = new LongPoll(source, { ...options, logger, sleep });
  source.onExhausted = () => poll.stop();

  const received: number[] = [];
  const sink = {
    dispatch: vi.fn(async (update: Update) => {
      received.push(update.update_id);
    }),
  };
  return { source, logger, sleep, poll, sink, received };
}

describe("LongPoll", () => {
  it("delivers a batch in order and requests past its highest id", async () => {
    const { source, poll, sink, received } = setup([updates(5, 3, 9, 1)]);

    await poll.run(sink);

    expect(received).toEqual([5, 3, 9, 1]);
    expect(poll.offset).toBe(9);
    expect(source.calls.map((call) => call.offset)).toEqual([1, 10]);
  });

  it("never moves the offset backwards across batches", async () => {
    const { source, poll, sink } = setup([updates(20, 21), updates(4)]);

    await poll.run(sink);

    expect(source.calls.map((call) => call.offset)).toEqual([1, 22, 22]);
    expect(poll.offset).toBe(21);
  });

  it("starts from the configured offset", async () => {
    const { source, poll, sink } = setup([], { offset: 41 });

    await poll.run(sink);

    expect(source.calls[0]).toEqual({ offset: 42, limit: 100, timeout: 10, allowed_updates: [] });
  });

  it("passes limit, timeout and allowed updates to getUpdates", async () => {
    const source = new ScriptedSource([]);
    const poll = new LongPoll(source, {
      limit: 5,
      pollTimeoutSeconds: 30,
      allowedUpdates: ["message", "callback_query"],
      logger: new MemoryLogger(),
    });
    source.onExhausted = () => poll.stop();

    await poll.run({ dispatch: async () => {} });

    expect(source.calls).toEqual([
      { offset: 1, limit: 5, timeout: 30, allowed_updates: ["message", "callback_query"] },
    ]);
  });

  it("backs off for the retry_after the API asked for", async () => {
    const tooMany = new TransportError("Too Many Requests", { retryAfterMs: 3000 });
    const { poll, sink, sleep, logger, received } = setup([tooMany, updates(1)]);

    await poll.run(sink);

    expect(sleep.mock.calls).toEqual([[3000]]);
    expect(received).toEqual([1]);
    expect(logger.lines("error")).toEqual(["[LongPoll] Failed to get updates: Too Many Requests (retrying in 3000ms)"]);
  });

  it("backs off for the error timeout when no hint is given", async () => {
    const { poll, sink, sleep, source } = setup([new Error("socket hang up"), new Error("socket hang up")], {
      errorTimeoutMs: 250,
    });

    await poll.run(sink);

    expect(sleep.mock.calls).toEqual([[250], [250]]);
    expect(source.calls.map((call) => call.offset)).toEqual([1, 1, 1]);
  });

  it("keeps polling when a dispatch fails", async () => {
    const { poll, logger } = setup([updates(1, 2)]);
    const seen: number[] = [];
    const sink = {
      dispatch: async (update: Update) => {
        seen.push(update.update_id);
        if (update.update_id === 1) throw new Error("boom");
      },
    };

    await poll.run(sink);

    expect(seen).toEqual([1, 2]);
    expect(logger.lines("error")).toEqual(["[LongPoll] Failed to handle update 1: boom"]);
  });

  it("ends before the next update once stopped", async () => {
    const { poll, received } = setup([updates(1, 2, 3)]);
    const sink = {
      dispatch: async (update: Update) => {
        received.push(update.update_id);
        if (update.update_id === 2) poll.stop();
      },
    };

    await poll.run(sink);

    expect(received).toEqual([1, 2]);
    expect(poll.isStopped).toBe(true);
  });

  it("does not poll at all when stopped up front", async () => {
    const { poll, sink, source, logger } = setup([updates(1)]);
    poll.stop();

    await poll.run(sink);

    expect(source.calls).toEqual([]);
    expect(logger.lines("log")).toEqual(["[LongPoll] Started", "[LongPoll] Stopped"]);
  });

  it("cannot be iterated a second time", async () => {
    const { poll, sink } = setup([]);
    await poll.run(sink);

    await expect(poll[Symbol.asyncIterator]().next()).rejects.toThrow("LongPoll cannot be iterated more than once");
  });
});

describe("retryAfterMs", () => {
  it("reads the hint of a TransportError", () => {
    expect(retryAfterMs(new TransportError("slow down", { retryAfterMs: 1500 }))).toBe(1500);
    expect(retryAfterMs(new TransportError("gone"))).toBeNull();
  });

  it("converts the retry_after seconds of a GrammyError", () => {
    const err = new GrammyError(
      "Call to 'getUpdates' failed!",
      { ok: false, error_code: 429, description: "Too Many Requests: retry after 7", parameters: { retry_after: 7 } },
      "getUpdates",
      {}
    );

    expect(retryAfterMs(err)).toBe(7000);
  });

  it("returns null for anything else", () => {
    expect(retryAfterMs(new Error("nope"))).toBeNull();
    expect(retryAfterMs("nope")).toBeNull();
  });
});
