/**
 * Update accessors
 *
 * The core treats an Update as opaque and only reads it through these queries.
 */

import type { Chat, Message, Update, User } from "grammy/types";

export type UpdateKind = Exclude<keyof Update, "update_id">;

/** Kinds accepted in allowed_updates */
export const UPDATE_KINDS = [
  "message",
  "edited_message",
  "channel_post",
  "edited_channel_post",
  "business_connection",
  "business_message",
  "edited_business_message",
  "deleted_business_messages",
  "message_reaction",
  "message_reaction_count",
  "inline_query",
  "chosen_inline_result",
  "callback_query",
  "shipping_query",
  "pre_checkout_query",
  "poll",
  "poll_answer",
  "my_chat_member",
  "chat_member",
  "chat_join_request",
  "chat_boost",
  "removed_chat_boost",
] as const satisfies readonly UpdateKind[];

export function isKnownUpdateKind(value: string): value is UpdateKind {
  return UPDATE_KINDS.some((kind) => kind === value);
}

function isUpdateKind(update: Update, key: string): key is UpdateKind {
  return key !== "update_id" && key in update;
}

/**
 * Returns the name of the payload field carried by the update ("message", "callback_query", ...)
 */
export function getUpdateKind(update: Update): UpdateKind | null {
  for (const key of Object.keys(update)) {
    if (isUpdateKind(update, key)) return key;
  }
  return null;
}

/**
 * Message-like payloads: new or edited messages and channel posts
 */
export function getMessage(update: Update): Message | undefined {
  return update.message ?? update.edited_message ?? update.channel_post ?? update.edited_channel_post;
}

export function getChat(update: Update): Chat | undefined {
  const message = getMessage(update);
  if (message) return message.chat;
  if (update.callback_query?.message) return update.callback_query.message.chat;
  return (
    update.my_chat_member?.chat ??
    update.chat_member?.chat ??
    update.chat_join_request?.chat ??
    update.message_reaction?.chat
  );
}

export function getChatId(update: Update): number | undefined {
  return getChat(update)?.id;
}

export function getChatUsername(update: Update): string | undefined {
  return getChat(update)?.username;
}

export function getUser(update: Update): User | undefined {
  const message = getMessage(update);
  if (message) return message.from;
  return (
    update.callback_query?.from ??
    update.inline_query?.from ??
    update.chosen_inline_result?.from ??
    update.shipping_query?.from ??
    update.pre_checkout_query?.from ??
    update.poll_answer?.user ??
    update.my_chat_member?.from ??
    update.chat_member?.from ??
    update.chat_join_request?.from ??
    update.message_reaction?.user
  );
}

export function getUserId(update: Update): number | undefined {
  return getUser(update)?.id;
}

export function getUsername(update: Update): string | undefined {
  return getUser(update)?.username;
}

export function getText(update: Update): string | undefined {
  return getMessage(update)?.text;
}

/**
 * Checks that a decoded JSON value looks like exactly one Update
 */
export function isUpdate(value: unknown): value is Update {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    "update_id" in value &&
    typeof value.update_id === "number"
  );
}
