/**
 * Per-conversation key/value state
 */

import type { Update } from "grammy/types";
import type { ServiceKey } from "../context.js";
import { service, type Extractor } from "../core/extractor.js";
import { getChatId, getUserId } from "../update.js";
import type { JsonValue, SessionBackend } from "./backend.js";

export class Session {
  constructor(
    readonly id: string,
    private readonly backend: SessionBackend
  ) {}

  get(key: string): Promise<JsonValue | undefined> {
    return this.backend.get(this.id, key);
  }

  set(key: string, value: JsonValue): Promise<void> {
    return this.backend.set(this.id, key, value);
  }

  expire(key: string, seconds: number): Promise<void> {
    return this.backend.expire(this.id, key, seconds);
  }

  remove(key: string): Promise<void> {
    return this.backend.remove(this.id, key);
  }
}

export class SessionManager {
  constructor(readonly backend: SessionBackend) {}

  get(id: string): Session {
    return new Session(id, this.backend);
  }
}

/**
 * "<chatId>-<userId>", or whichever of the two the update has
 */
export function sessionId(update: Update): string | undefined {
  const chatId = getChatId(update);
  const userId = getUserId(update);
  if (chatId !== undefined && userId !== undefined) return `${chatId}-${userId}`;
  if (chatId !== undefined) return String(chatId);
  if (userId !== undefined) return String(userId);
  return undefined;
}

/**
 * Session of the update's conversation, from the SessionManager registered under `key`
 */
export function session(key: ServiceKey<SessionManager>): Extractor<Session> {
  const manager = service(key);
  return async (input) => {
    const id = sessionId(input.update);
    if (id === undefined) return undefined;
    const sessions = await manager(input);
    return sessions?.get(id);
  };
}
