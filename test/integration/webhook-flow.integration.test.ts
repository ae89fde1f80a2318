/**
 * Integration tests for the webhook flow
 *
 * HTTP request (fastify inject) → WebhookServer → example bot Dispatcher → fake Messenger
 */

import { describe, it, expect, afterEach } from "vitest";
import { buildExampleDispatcher, type Messenger } from "../../src/example-bot.js";
import { MemoryLogger } from "../../src/memory-logger.js";
import { WebhookServer } from "../../src/transport/webhook.js";
import { createTestClock } from "../helpers/clock.js";
import { createCommandUpdate, createMessageUpdate } from "../helpers/updates.js";

describe("webhook flow", () => {
  let server: WebhookServer | undefined;

  afterEach(async () => {
    await server?.app.close();
    server = undefined;
  });

  function setup(messenger?: Messenger) {
    const sent: Array<[number, string]> = [];
    const logger = new MemoryLogger();
    const dispatcher = buildExampleDispatcher({
      messenger: messenger ?? {
        sendMessage: async (chatId, text) => {
          sent.push([chatId, text]);
        },
      },
      rateLimit: { capacity: 1, periodMs: 1000, method: "discard", key: "user", jitterMs: 0 },
      rateLimitOptions: createTestClock(),
      logger,
    });
    const created = new WebhookServer("/telegram", dispatcher, { logger });
    server = created;
    return { server: created, sent, logger };
  }

  function post(target: WebhookServer, body: unknown) {
    return target.app.inject({
      method: "POST",
      url: "/telegram",
      headers: { "content-type": "application/json" },
      payload: JSON.stringify(body),
    });
  }

  it("replies to a posted command before answering 200", async () => {
    const { server, sent } = setup();

    const response = await post(server, createCommandUpdate("/echo one two", { chatId: 4, userId: 4 }));

    expect(response.statusCode).toBe(200);
    expect(sent).toEqual([[4, "one\ntwo"]]);
  });

  it("answers 200 for an update the rate limiter drops", async () => {
    const { server, sent } = setup();

    await post(server, createMessageUpdate({ updateId: 1, userId: 6, text: "first" }));
    const response = await post(server, createMessageUpdate({ updateId: 2, userId: 6, text: "second" }));

    expect(response.statusCode).toBe(200);
    expect(sent).toEqual([[100, "first"]]);
  });

  it("answers 200 when a handler fails, since the dispatcher reports it", async () => {
    const { server, logger } = setup({
      sendMessage: async () => {
        throw new Error("Forbidden: bot was blocked by the user");
      },
    });

    const response = await post(server, createMessageUpdate({ text: "hi" }));

    expect(response.statusCode).toBe(200);
    expect(logger.lines("error")).toEqual([
      '[Dispatcher] An error has occurred: Handler "text echo" failed: Forbidden: bot was blocked by the user',
    ]);
  });

  it("rejects a body that is not an update", async () => {
    const { server, sent } = setup();

    const response = await post(server, { message: { text: "no id" } });

    expect(response.statusCode).toBe(400);
    expect(response.body).toBe("Failed to parse update: expected an object with a numeric update_id\n");
    expect(sent).toEqual([]);
  });
});
