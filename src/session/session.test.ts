import { describe, it, expect } from "vitest";
import { ContextBuilder, createServiceKey } from "../context.js";
import { MissingServiceError } from "../errors.js";
import {
  createCallbackQueryUpdate,
  createMessageUpdate,
  createPollUpdate,
} from "../../test/helpers/updates.js";
import { SessionManager, session, sessionId } from "./session.js";
import { SqliteSessionBackend } from "./sqlite-backend.js";

const sessionsKey = createServiceKey<SessionManager>("sessions");

describe("sessionId", () => {
  it("combines chat and user", () => {
    expect(sessionId(createMessageUpdate({ chatId: -100, userId: 7 }))).toBe("-100-7");
  });

  it("falls back to the user alone", () => {
    expect(sessionId(createCallbackQueryUpdate(1, 7, "data"))).toBe("7");
  });

  it("is undefined without chat and user", () => {
    expect(sessionId(createPollUpdate(1))).toBeUndefined();
  });
});

describe("Session", () => {
  it("reads and writes through the backend under its id", async () => {
    const backend = new SqliteSessionBackend(":memory:");
    const manager = new SessionManager(backend);

    await manager.get("1-2").set("counter", 5);

    expect(await backend.get("1-2", "counter")).toBe(5);
    expect(await manager.get("1-2").get("counter")).toBe(5);
    expect(await manager.get("3-4").get("counter")).toBeUndefined();

    await manager.get("1-2").remove("counter");
    expect(await backend.get("1-2", "counter")).toBeUndefined();
    backend.close();
  });
});

describe("session extractor", () => {
  it("opens the session of the update's conversation", async () => {
    const manager = new SessionManager(new SqliteSessionBackend(":memory:"));
    const context = new ContextBuilder().insert(sessionsKey, manager).build();

    const current = await session(sessionsKey)({ update: createMessageUpdate({ chatId: 1, userId: 2 }), context });

    expect(current?.id).toBe("1-2");
  });

  it("is not applicable to updates without a conversation", async () => {
    const manager = new SessionManager(new SqliteSessionBackend(":memory:"));
    const context = new ContextBuilder().insert(sessionsKey, manager).build();

    expect(await session(sessionsKey)({ update: createPollUpdate(1), context })).toBeUndefined();
  });

  it("fails when no session manager is registered", async () => {
    const context = new ContextBuilder().build();

    await expect(session(sessionsKey)({ update: createMessageUpdate(), context })).rejects.toThrow(
      MissingServiceError
    );
  });
});
