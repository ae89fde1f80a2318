/**
 * Configuration types for Switchyard
 */

import type { UpdateKind } from "./update.js";

export type TransportKind = "longpoll" | "webhook";

export type LogLevel = "info" | "debug";

export interface LongPollConfig {
  /** Updates per request, 1-100 */
  limit: number;
  pollTimeoutSeconds: number;
  /** Backoff after a failed request when the API gives no retry_after */
  errorTimeoutSeconds: number;
  /** Update kinds to receive; empty means the Bot API default */
  allowedUpdates: UpdateKind[];
}

export interface WebhookConfig {
  host: string;
  port: number;
  /** Must start with "/" */
  path: string;
}

export type RateLimitMethodName = "discard" | "wait" | "wait-with-jitter";

/** What the limiter counts against: everything, or per chat/user/chat+user */
export type RateLimitKey = "global" | "chat" | "user" | "chat-user";

export interface RateLimitConfig {
  capacity: number;
  periodMs: number;
  method: RateLimitMethodName;
  key: RateLimitKey;
  /** Upper bound of the random extra delay for wait-with-jitter */
  jitterMs: number;
}

export interface SessionConfig {
  /** SQLite file, relative to the project root */
  database: string;
  gcIntervalSeconds: number;
  /** Drop keys not written for this long; unset keeps them until they expire */
  lifetimeSeconds?: number;
}

export interface Config {
  transport: TransportKind;
  logLevel: LogLevel;
  longPoll: LongPollConfig;
  webhook: WebhookConfig;
  rateLimit?: RateLimitConfig;
  session?: SessionConfig;
}
