/**
 * The bot `switchyard start` runs
 *
 *   /start         greeting
 *   /echo args...  replies with the parsed arguments, one per line
 *   /count         per-conversation counter kept in the session (when sessions are configured)
 *   any text       echoed back; an unknown /command gets a hint
 *
 * The configured rate limiter sits in front of all of them.
 */

import type { Api } from "grammy";
import { ContextBuilder, createServiceKey, type ServiceKey } from "./context.js";
import { command, commandHandler, type Command } from "./core/command.js";
import { all, chatId, service, text, unit, type Extractor } from "./core/extractor.js";
import { fromFunction, route, type UpdateHandler } from "./core/handler.js";
import { Predicate, type Guard } from "./core/predicate.js";
import { Dispatcher } from "./dispatcher.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import { DirectRateLimitPredicate } from "./ratelimit/direct.js";
import { KeyedRateLimitPredicate } from "./ratelimit/keyed.js";
import { chatKey, chatUserKey, userKey } from "./ratelimit/keys.js";
import type { RateLimitOptions } from "./ratelimit/policy.js";
import { session, type Session, type SessionManager } from "./session/session.js";
import type { RateLimitConfig } from "./types.js";

/**
 * The slice of the Bot API the example handlers use
 */
export interface Messenger {
  sendMessage(chatId: number, text: string): Promise<unknown>;
}

export function createMessenger(api: Api): Messenger {
  return {
    sendMessage: (chatId, text) => api.sendMessage(chatId, text),
  };
}

export const messengerKey: ServiceKey<Messenger> = createServiceKey<Messenger>("messenger");
export const sessionsKey: ServiceKey<SessionManager> = createServiceKey<SessionManager>("sessions");

export const COUNTER_KEY = "counter";

const KEY_EXTRACTORS: Record<Exclude<RateLimitConfig["key"], "global">, Extractor<string>> = {
  chat: chatKey,
  user: userKey,
  "chat-user": chatUserKey,
};

/**
 * Build the rate-limit guard described by the config
 */
export function createRateLimiter(config: RateLimitConfig, options: RateLimitOptions = {}): Guard<string | null> {
  const quota = { capacity: config.capacity, periodMs: config.periodMs };
  const jitter = { minMs: 0, maxMs: config.jitterMs };

  if (config.key === "global") {
    switch (config.method) {
      case "discard":
        return DirectRateLimitPredicate.discard(quota, options);
      case "wait":
        return DirectRateLimitPredicate.wait(quota, options);
      case "wait-with-jitter":
        return DirectRateLimitPredicate.waitWithJitter(quota, jitter, options);
    }
  }

  const key = KEY_EXTRACTORS[config.key];
  switch (config.method) {
    case "discard":
      return KeyedRateLimitPredicate.discard(quota, key, options);
    case "wait":
      return KeyedRateLimitPredicate.wait(quota, key, options);
    case "wait-with-jitter":
      return KeyedRateLimitPredicate.waitWithJitter(quota, key, jitter, options);
  }
}

function formatEchoReply(args: string[]): string {
  return args.length === 0 ? "Nothing to echo" : args.join("\n");
}

function commandHandlers(withSessions: boolean): UpdateHandler[] {
  const handlers: UpdateHandler[] = [
    commandHandler(
      "/start",
      all(service(messengerKey), chatId),
      fromFunction("start", async ([messenger, chat]: [Messenger, number]) => {
        await messenger.sendMessage(chat, "Hello! Try /echo, /count or just send some text.");
      })
    ),
    commandHandler(
      "/echo",
      all(service(messengerKey), command),
      fromFunction("echo", async ([messenger, cmd]: [Messenger, Command]) => {
        await messenger.sendMessage(cmd.message.chat.id, formatEchoReply(cmd.args));
      })
    ),
  ];

  if (withSessions) {
    handlers.push(
      commandHandler(
        "/count",
        all(service(messengerKey), session(sessionsKey), chatId),
        fromFunction("count", async ([messenger, current, chat]: [Messenger, Session, number]) => {
          const previous = await current.get(COUNTER_KEY);
          const count = (typeof previous === "number" ? previous : 0) + 1;
          await current.set(COUNTER_KEY, count);
          await messenger.sendMessage(chat, `Count: ${count}`);
        })
      )
    );
  }

  return handlers;
}

const textEcho: UpdateHandler = route(
  all(service(messengerKey), chatId, text),
  fromFunction("text echo", async ([messenger, chat, message]: [Messenger, number, string]) => {
    const reply = message.startsWith("/") ? `Unknown command: ${message.split(/\s/)[0]}` : message;
    await messenger.sendMessage(chat, reply);
  })
);

export interface ExampleBotOptions {
  messenger: Messenger;
  sessions?: SessionManager;
  rateLimit?: RateLimitConfig;
  logger?: Logger;
  /** Clock overrides for the rate limiter */
  rateLimitOptions?: RateLimitOptions;
}

/**
 * Handlers are registered on the Dispatcher itself, in order:
 * a command that does not match answers Continue, so the next one gets its turn.
 */
export function buildExampleDispatcher(options: ExampleBotOptions): Dispatcher {
  const logger = options.logger ?? new ConsoleLogger();

  const builder = new ContextBuilder().insert(messengerKey, options.messenger);
  if (options.sessions) {
    builder.insert(sessionsKey, options.sessions);
  }
  const dispatcher = new Dispatcher(builder.build(), { logger });

  if (options.rateLimit) {
    const limiter = createRateLimiter(options.rateLimit, { logger, ...options.rateLimitOptions });
    // Passes with Continue; a discarded update ends here with Stop
    dispatcher.add(new Predicate(limiter, unit, fromFunction("rate limit", () => true)));
  }

  for (const handler of commandHandlers(options.sessions !== undefined)) {
    dispatcher.add(handler);
  }
  return dispatcher.add(textEcho);
}
