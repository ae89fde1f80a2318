/**
 * Keys for the keyed rate limiter
 */

import type { Extractor } from "../core/extractor.js";
import { getChatId, getUserId } from "../update.js";

export function formatChatKey(chatId: number): string {
  return `chat:${chatId}`;
}

export function formatUserKey(userId: number): string {
  return `user:${userId}`;
}

export function formatChatUserKey(chatId: number, userId: number): string {
  return `chat:${chatId}/user:${userId}`;
}

export const chatKey: Extractor<string> = ({ update }) => {
  const chatId = getChatId(update);
  return chatId === undefined ? undefined : formatChatKey(chatId);
};

export const userKey: Extractor<string> = ({ update }) => {
  const userId = getUserId(update);
  return userId === undefined ? undefined : formatUserKey(userId);
};

export const chatUserKey: Extractor<string> = ({ update }) => {
  const chatId = getChatId(update);
  const userId = getUserId(update);
  if (chatId === undefined || userId === undefined) return undefined;
  return formatChatUserKey(chatId, userId);
};
