import { describe, it, expect, vi } from "vitest";
import { ContextBuilder } from "../context.js";
import { MemoryLogger } from "../memory-logger.js";
import { createMessageUpdate } from "../../test/helpers/updates.js";
import { LoggingErrorHandler, onError, type Recover } from "./error.js";
import { callbackQuery, text, type HandlerInput } from "./extractor.js";
import { fromFunction, route, type UpdateHandler } from "./handler.js";
import { Continue, Skipped, Stop, chainError, done, failed } from "./result.js";

const input: HandlerInput = {
  update: createMessageUpdate({ text: "hello" }),
  context: new ContextBuilder().build(),
};

const failing: UpdateHandler = route(
  text,
  fromFunction("failing", () => {
    throw new Error("db down");
  })
);

describe("onError", () => {
  it("lets the handler recover from its own failure", async () => {
    const recover = vi.fn<Recover>(() => true);

    const result = await onError(failing, recover).run(input);

    expect(result).toEqual(done(Continue));
    expect(recover).toHaveBeenCalledTimes(1);
    const [error, seenInput] = recover.mock.calls[0];
    expect(error.message).toBe('Handler "failing" failed: db down');
    expect(seenInput).toBe(input);
  });

  it("also recovers from extraction errors", async () => {
    const error = new Error("bad payload");
    const broken: UpdateHandler = { name: "broken", run: async () => chainError(error) };
    const recover = vi.fn<Recover>(() => Stop);

    expect(await onError(broken, recover).run(input)).toEqual(done(Stop));
    expect(recover).toHaveBeenCalledWith(error, input);
  });

  it("leaves skipped and successful results alone", async () => {
    const recover = vi.fn<Recover>(() => true);

    const skipped = route(callbackQuery, fromFunction("callbacks", () => true));
    const ok = route(text, fromFunction("ok", () => true));

    expect(await onError(skipped, recover).run(input)).toBe(Skipped);
    expect(await onError(ok, recover).run(input)).toEqual(done(Continue));
    expect(recover).not.toHaveBeenCalled();
  });

  it("reports a failing recovery as an Error result", async () => {
    const cause = new Error("recovery failed too");

    const result = await onError(failing, () => {
      throw cause;
    }).run(input);

    expect(result).toEqual(done(failed(cause)));
  });

  it("keeps the wrapped handler's name", () => {
    expect(onError(failing, () => true).name).toBe("failing");
  });
});

describe("LoggingErrorHandler", () => {
  it("logs the error", () => {
    const logger = new MemoryLogger();

    new LoggingErrorHandler(logger).handle(new Error("something broke"));

    expect(logger.lines("error")).toEqual(["[Dispatcher] An error has occurred: something broke"]);
  });
});
