/**
 * Switchyard
 * Typed update dispatch for Telegram bots
 */

export * from "./errors.js";
export * from "./logger.js";
export { MemoryLogger, type LogEntry } from "./memory-logger.js";
export * from "./update.js";
export * from "./context.js";
export * from "./core/index.js";
export { Dispatcher, type DispatcherOptions, type UpdateSink } from "./dispatcher.js";
export * from "./ratelimit/index.js";
export { LongPoll, retryAfterMs, type GetUpdatesParams, type LongPollOptions, type UpdatesSource } from "./transport/long-poll.js";
export { WebhookServer, type ListenOptions, type WebhookOptions } from "./transport/webhook.js";
export * from "./session/index.js";
export { BotRunner, createUpdatesSource, type BotRunnerOptions } from "./bot.js";
export * from "./types.js";
export * from "./config.js";
export { VERSION } from "./version.js";
