import { describe, it, expect, vi } from "vitest";
import { ContextBuilder } from "../context.js";
import { CommandError } from "../errors.js";
import { createCommandUpdate, createMessageUpdate, createPollUpdate } from "../../test/helpers/updates.js";
import { CommandPredicate, command, commandHandler } from "./command.js";
import { extract, unit, type HandlerInput } from "./extractor.js";
import { fromFunction } from "./handler.js";
import { Allow, Continue, Skipped, done } from "./result.js";
import type { Update } from "grammy/types";

const context = new ContextBuilder().build();

function inputFor(update: Update): HandlerInput {
  return { update, context };
}

async function commandError(update: Update): Promise<unknown> {
  return extract(command, inputFor(update)).catch((err: unknown) => err);
}

describe("command extractor", () => {
  it("splits the name and shell-word arguments", async () => {
    const update = createMessageUpdate({
      text: "/cmd 'a b' c",
      entities: [{ type: "bot_command", offset: 0, length: 4 }],
    });

    const result = await extract(command, inputFor(update));

    expect(result?.name).toBe("/cmd");
    expect(result?.botName).toBeNull();
    expect(result?.args).toEqual(["a b", "c"]);
  });

  it("separates the bot name", async () => {
    const result = await extract(command, inputFor(createCommandUpdate("/start@test_bot hello")));

    expect(result?.name).toBe("/start");
    expect(result?.botName).toBe("test_bot");
    expect(result?.args).toEqual(["hello"]);
  });

  it("uses UTF-16 offsets for the entity", async () => {
    // The emoji takes two code units, so the command starts at offset 3
    const update = createMessageUpdate({
      text: "😀 /cmd x 🎉",
      entities: [{ type: "bot_command", offset: 3, length: 4 }],
    });

    const result = await extract(command, inputFor(update));

    expect(result?.name).toBe("/cmd");
    expect(result?.args).toEqual(["x", "🎉"]);
  });

  it("reports mismatched quotes", async () => {
    const error = await commandError(createCommandUpdate("/cmd 'a"));

    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({
      kind: "mismatched-quotes",
      message: "Failed to parse command: mismatched quotes at position 1",
    });
  });

  it("reports unpaired surrogates", async () => {
    const error = await commandError(createCommandUpdate("/cmd \uD83D"));

    expect(error).toMatchObject({ kind: "invalid-utf16" });
  });

  it("reports an entity outside of the text", async () => {
    const update = createMessageUpdate({
      text: "/cmd",
      entities: [{ type: "bot_command", offset: 0, length: 10 }],
    });

    expect(await commandError(update)).toMatchObject({ kind: "entity-out-of-range" });
  });

  it("yields undefined without a bot_command entity", async () => {
    const bold = createMessageUpdate({
      text: "/cmd",
      entities: [{ type: "bold", offset: 0, length: 4 }],
    });

    expect(await extract(command, inputFor(bold))).toBeUndefined();
    expect(await extract(command, inputFor(createMessageUpdate({ text: "/cmd" })))).toBeUndefined();
    expect(await extract(command, inputFor(createPollUpdate(1)))).toBeUndefined();
  });
});

describe("CommandPredicate", () => {
  it("allows the matching command only", async () => {
    const predicate = new CommandPredicate("/start");
    const start = await extract(command, inputFor(createCommandUpdate("/start")));
    const stop = await extract(command, inputFor(createCommandUpdate("/stop")));
    if (!start || !stop) throw new Error("fixtures must carry commands");

    expect(predicate.handle(start)).toBe(Allow);
    expect(predicate.handle(stop)).toEqual({ type: "false", result: Continue });
  });
});

describe("commandHandler", () => {
  it("runs the handler for its command", async () => {
    const fn = vi.fn();
    const handler = commandHandler("/start", unit, fromFunction("start", fn));

    expect(await handler.run(inputFor(createCommandUpdate("/start")))).toEqual(done({ type: "stop" }));
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("continues past other commands without running the handler", async () => {
    const fn = vi.fn();
    const handler = commandHandler("/start", unit, fromFunction("start", fn));

    expect(await handler.run(inputFor(createCommandUpdate("/help")))).toEqual(done(Continue));
    expect(fn).not.toHaveBeenCalled();
  });

  it("is skipped for plain text", async () => {
    const handler = commandHandler("/start", unit, fromFunction("start", vi.fn()));

    expect(await handler.run(inputFor(createMessageUpdate({ text: "hi" })))).toBe(Skipped);
  });
});
